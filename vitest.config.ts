import os from "node:os";
import path from "node:path";
import { defineConfig } from "vitest/config";

export default defineConfig({
  test: {
    environment: "node",
    include: ["src/**/*.test.ts"],
    restoreMocks: true,
    env: {
      LLM_BAD_GEN_LOG_DIR: path.join(os.tmpdir(), "exam-question-generator-test-logs"),
    },
  },
});

import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";
import { LlmConfigError } from "../utils/errors";

export const DEFAULT_LLM_MODEL = "gpt-4o-mini";

const EnvSchema = z.object({
  LLM_API_KEY: z.string().trim().optional(),
  LLM_BASE_URL: z.string().trim().url().optional(),
  LLM_MODEL: z.string().trim().min(1).default(DEFAULT_LLM_MODEL),
  LLM_TEMPERATURE: z.coerce.number().min(0).max(2).optional(),
  LLM_MAX_TOKENS: z.coerce.number().int().positive().optional(),
  LLM_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),
});

export type LlmConfig = {
  apiKey: string;
  baseURL?: string;
  model: string;
  temperature?: number;
  maxTokens?: number;
  retryDelayMs: number;
};

// blank values in .env count as unset
function present(v: string | undefined) {
  return v === undefined || v.trim() === "" ? undefined : v;
}

export const DEFAULT_ENV_FILE = path.resolve(process.cwd(), ".env");

// per target env: keys the file has set -> the value each had before the file set it
const setFromFile = new WeakMap<NodeJS.ProcessEnv, Map<string, string | undefined>>();

function readEnvFile(file: string): Record<string, string> {
  try {
    return dotenv.parse(fs.readFileSync(file));
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return {};
    throw err;
  }
}

/**
 * Re-reads .env so edits to it apply to the next request; the file's values
 * win. A key an earlier read set and the file no longer has goes back to its
 * value from before that read, or is removed. A missing file counts as empty.
 */
export function reloadEnvFile(file: string = DEFAULT_ENV_FILE, env: NodeJS.ProcessEnv = process.env): void {
  const parsed = readEnvFile(file);
  let owned = setFromFile.get(env);
  if (!owned) {
    owned = new Map();
    setFromFile.set(env, owned);
  }

  for (const [key, before] of owned) {
    if (key in parsed) continue;
    if (before === undefined) delete env[key];
    else env[key] = before;
    owned.delete(key);
  }

  for (const [key, value] of Object.entries(parsed)) {
    if (!owned.has(key)) owned.set(key, env[key]);
    env[key] = value;
  }
}

/**
 * Reads the LLM settings from the environment. Called on every request so a
 * changed key or model is picked up without restarting the process.
 */
export function readLlmConfig(env: NodeJS.ProcessEnv = process.env): LlmConfig {
  const parsed = EnvSchema.safeParse({
    LLM_API_KEY: present(env.LLM_API_KEY),
    LLM_BASE_URL: present(env.LLM_BASE_URL),
    LLM_MODEL: present(env.LLM_MODEL),
    LLM_TEMPERATURE: present(env.LLM_TEMPERATURE),
    LLM_MAX_TOKENS: present(env.LLM_MAX_TOKENS),
    LLM_RETRY_DELAY_MS: present(env.LLM_RETRY_DELAY_MS),
  });
  if (!parsed.success) {
    const fields = Object.keys(parsed.error.flatten().fieldErrors).join(", ");
    throw new LlmConfigError(`Invalid LLM configuration: ${fields}`);
  }

  const cfg = parsed.data;
  if (!cfg.LLM_API_KEY) {
    throw new LlmConfigError(
      "LLM_API_KEY is not set. Set it in the environment or .env to enable question generation."
    );
  }

  return {
    apiKey: cfg.LLM_API_KEY,
    baseURL: cfg.LLM_BASE_URL,
    model: cfg.LLM_MODEL,
    temperature: cfg.LLM_TEMPERATURE,
    maxTokens: cfg.LLM_MAX_TOKENS,
    retryDelayMs: cfg.LLM_RETRY_DELAY_MS,
  };
}

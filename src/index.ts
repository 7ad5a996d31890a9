import { reloadEnvFile } from "./config/llm";
reloadEnvFile();

import createApp from "./app";

const PORT = Number(process.env.PORT) || 5000;

const app = createApp();

if (!process.env.LLM_API_KEY) {
  console.warn("⚠️ LLM_API_KEY is not set; generation requests will fail with 503 until it is.");
}

app.listen(PORT, () => {
  console.log(`Server running on http://localhost:${PORT}`);
});

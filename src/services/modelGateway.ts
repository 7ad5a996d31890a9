import OpenAI from "openai";
import { readLlmConfig, reloadEnvFile, type LlmConfig } from "../config/llm";
import { logBadGen } from "../doc/logBadGen";
import { LlmParseError, LlmRequestError, errorMessage } from "../utils/errors";
import { withRetry } from "./backoff";
import { parseModelJson } from "./jsonExtract";

export const GATEWAY_MAX_TRIES = 3;

export type ChatMessage = { role: "system"; content: string } | { role: "user"; content: string };

export type ChatRequest = {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  max_tokens?: number;
};

/** The slice of a chat-completions client the gateway needs. */
export interface ChatClient {
  complete(req: ChatRequest): Promise<string>;
}

/** Anything that turns a prompt pair into untrusted parsed JSON. */
export interface JsonCompleter {
  complete(userPrompt: string, systemPrompt: string): Promise<unknown>;
}

export type ClientFactory = (cfg: Pick<LlmConfig, "apiKey" | "baseURL">) => ChatClient;

export const openAIClientFactory: ClientFactory = ({ apiKey, baseURL }) => {
  const llm = new OpenAI({ apiKey, baseURL });
  return {
    async complete(req) {
      const resp = await llm.chat.completions.create({ ...req, stream: false });
      return resp.choices[0]?.message?.content ?? "";
    },
  };
};

type GatewayOptions = {
  clientFactory?: ClientFactory;
  readConfig?: () => LlmConfig;
  /** .env re-read before each call when `readConfig` is not given */
  envFile?: string;
};

export class ModelGateway implements JsonCompleter {
  private client: ChatClient | null = null;
  private clientKey: string | null = null;
  private readonly clientFactory: ClientFactory;
  private readonly readConfig: () => LlmConfig;

  constructor(opts: GatewayOptions = {}) {
    this.clientFactory = opts.clientFactory ?? openAIClientFactory;
    this.readConfig =
      opts.readConfig ??
      (() => {
        reloadEnvFile(opts.envFile);
        return readLlmConfig();
      });
  }

  // recreated whenever the key or endpoint changes
  private getClient(cfg: LlmConfig): ChatClient {
    const key = `${cfg.apiKey}|${cfg.baseURL ?? ""}`;
    if (!this.client || this.clientKey !== key) {
      this.client = this.clientFactory({ apiKey: cfg.apiKey, baseURL: cfg.baseURL });
      this.clientKey = key;
    }
    return this.client;
  }

  /**
   * One completion request, retried on transport failure, with the JSON object
   * pulled out of whatever text the model wrapped around it.
   *
   * @throws LlmConfigError when no credential is configured (not retried)
   * @throws LlmRequestError when every transport attempt failed
   * @throws LlmParseError when the text holds no parseable JSON object
   */
  async complete(userPrompt: string, systemPrompt: string): Promise<unknown> {
    const cfg = this.readConfig();
    const client = this.getClient(cfg);

    const req: ChatRequest = {
      model: cfg.model,
      messages: [
        { role: "system", content: systemPrompt },
        { role: "user", content: userPrompt },
      ],
    };
    if (cfg.temperature !== undefined) req.temperature = cfg.temperature;
    if (cfg.maxTokens !== undefined) req.max_tokens = cfg.maxTokens;

    let raw: string;
    try {
      raw = await withRetry(
        async () => {
          const text = await client.complete(req);
          if (!text.trim()) throw new Error("LLM returned an empty completion");
          return text;
        },
        {
          tries: GATEWAY_MAX_TRIES,
          baseDelayMs: cfg.retryDelayMs,
          onRetry: (e, attempt) =>
            console.warn(`[LLM] call failed (attempt ${attempt}/${GATEWAY_MAX_TRIES}), retrying:`, errorMessage(e)),
        }
      );
    } catch (e) {
      throw new LlmRequestError(
        `LLM request failed after ${GATEWAY_MAX_TRIES} attempts: ${errorMessage(e)}`,
        { cause: e }
      );
    }

    try {
      return parseModelJson(raw);
    } catch (e) {
      if (e instanceof LlmParseError) {
        console.error("[LLM json-parse-error]", { raw: e.rawPreview, cleaned: e.cleanedPreview });
        logBadGen("json-parse-error", { model: cfg.model, raw: e.rawPreview, cleaned: e.cleanedPreview });
      }
      throw e;
    }
  }
}

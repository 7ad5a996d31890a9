import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { reloadEnvFile, type LlmConfig } from "../config/llm";
import { LlmConfigError, LlmParseError, LlmRequestError } from "../utils/errors";
import { ModelGateway, type ChatClient, type ChatRequest, type ClientFactory } from "./modelGateway";

const baseConfig: LlmConfig = { apiKey: "test-key", model: "test-model", retryDelayMs: 0 };

function fakeClient(...replies: (string | Error)[]) {
  const requests: ChatRequest[] = [];
  const client: ChatClient = {
    complete: vi.fn(async (req: ChatRequest) => {
      requests.push(req);
      const next = replies.shift();
      if (next === undefined) throw new Error("no more replies");
      if (next instanceof Error) throw next;
      return next;
    }),
  };
  return { client, requests };
}

describe("ModelGateway", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  it("fails fast on a configuration error without creating a client", async () => {
    const factory = vi.fn<ClientFactory>();
    const gateway = new ModelGateway({
      clientFactory: factory,
      readConfig: () => {
        throw new LlmConfigError("LLM_API_KEY is not set");
      },
    });

    await expect(gateway.complete("user", "system")).rejects.toBeInstanceOf(LlmConfigError);
    expect(factory).not.toHaveBeenCalled();
  });

  it("re-reads the .env file before every call", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "gateway-env-"));
    const envFile = path.join(dir, ".env");
    const saved = { key: process.env.LLM_API_KEY, model: process.env.LLM_MODEL };
    delete process.env.LLM_API_KEY;
    delete process.env.LLM_MODEL;

    const requests: ChatRequest[] = [];
    const factory = vi.fn<ClientFactory>(() => ({
      complete: async (req: ChatRequest) => {
        requests.push(req);
        return "{}";
      },
    }));
    const gateway = new ModelGateway({ clientFactory: factory, envFile });

    try {
      fs.writeFileSync(envFile, "LLM_API_KEY=test-key-a\nLLM_MODEL=model-a\n");
      await gateway.complete("u", "s");
      expect(requests[0].model).toBe("model-a");
      expect(factory.mock.calls[0][0].apiKey).toBe("test-key-a");

      fs.writeFileSync(envFile, "LLM_API_KEY=test-key-b\nLLM_MODEL=model-b\n");
      await gateway.complete("u", "s");
      expect(requests[1].model).toBe("model-b");
      expect(factory.mock.calls[1][0].apiKey).toBe("test-key-b");

      fs.writeFileSync(envFile, "LLM_MODEL=model-b\n");
      await expect(gateway.complete("u", "s")).rejects.toBeInstanceOf(LlmConfigError);
      expect(factory).toHaveBeenCalledTimes(2);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
      reloadEnvFile(envFile);
      if (saved.key !== undefined) process.env.LLM_API_KEY = saved.key;
      if (saved.model !== undefined) process.env.LLM_MODEL = saved.model;
    }
  });

  it("sends system then user messages and parses fenced JSON", async () => {
    const { client, requests } = fakeClient('```json\n{"question_text": "Q"}\n```');
    const gateway = new ModelGateway({ clientFactory: () => client, readConfig: () => baseConfig });

    await expect(gateway.complete("the user prompt", "the system prompt")).resolves.toEqual({ question_text: "Q" });
    expect(requests).toEqual([
      {
        model: "test-model",
        messages: [
          { role: "system", content: "the system prompt" },
          { role: "user", content: "the user prompt" },
        ],
      },
    ]);
  });

  it("passes temperature and max tokens when configured", async () => {
    const { client, requests } = fakeClient("{}");
    const gateway = new ModelGateway({
      clientFactory: () => client,
      readConfig: () => ({ ...baseConfig, temperature: 0.2, maxTokens: 800 }),
    });

    await gateway.complete("u", "s");
    expect(requests[0].temperature).toBe(0.2);
    expect(requests[0].max_tokens).toBe(800);
  });

  it("retries transport failures and empty completions", async () => {
    const { client } = fakeClient(new Error("socket hang up"), "   ", '{"ok": true}');
    const gateway = new ModelGateway({ clientFactory: () => client, readConfig: () => baseConfig });

    await expect(gateway.complete("u", "s")).resolves.toEqual({ ok: true });
    expect(client.complete).toHaveBeenCalledTimes(3);
  });

  it("raises LlmRequestError carrying the last cause after 3 failures", async () => {
    const last = new Error("503 third");
    const { client } = fakeClient(new Error("503 first"), new Error("503 second"), last, '{"late": true}');
    const gateway = new ModelGateway({ clientFactory: () => client, readConfig: () => baseConfig });

    const err = await gateway.complete("u", "s").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(LlmRequestError);
    if (err instanceof LlmRequestError) expect(err.cause).toBe(last);
    expect(client.complete).toHaveBeenCalledTimes(3);
  });

  it("does not retry a parse failure", async () => {
    const { client } = fakeClient("Sorry, I can only answer in prose.", "{}");
    const gateway = new ModelGateway({ clientFactory: () => client, readConfig: () => baseConfig });

    await expect(gateway.complete("u", "s")).rejects.toBeInstanceOf(LlmParseError);
    expect(client.complete).toHaveBeenCalledTimes(1);
  });

  it("reads configuration per call and recreates the client when the key changes", async () => {
    const { client } = fakeClient("{}", "{}", "{}");
    const factory = vi.fn<ClientFactory>(() => client);
    let cfg: LlmConfig = baseConfig;
    const gateway = new ModelGateway({ clientFactory: factory, readConfig: () => cfg });

    await gateway.complete("u", "s");
    await gateway.complete("u", "s");
    expect(factory).toHaveBeenCalledTimes(1);

    cfg = { ...baseConfig, apiKey: "rotated-key" };
    await gateway.complete("u", "s");
    expect(factory).toHaveBeenCalledTimes(2);
    expect(factory).toHaveBeenLastCalledWith({ apiKey: "rotated-key", baseURL: undefined });
  });
});

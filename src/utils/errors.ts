// src/utils/errors.ts

/** Generation is not configured (no credential, bad parameters). Never retried. */
export class LlmConfigError extends Error {
  readonly status = 503;

  constructor(message: string) {
    super(message);
    this.name = "LlmConfigError";
  }
}

/** The provider kept failing after the gateway's own retries. */
export class LlmRequestError extends Error {
  readonly status = 502;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LlmRequestError";
  }
}

/** The completion text did not contain a parseable JSON object. */
export class LlmParseError extends Error {
  readonly status = 502;
  readonly rawPreview: string;
  readonly cleanedPreview: string;

  constructor(message: string, rawPreview: string, cleanedPreview: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "LlmParseError";
    this.rawPreview = rawPreview;
    this.cleanedPreview = cleanedPreview;
  }
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}

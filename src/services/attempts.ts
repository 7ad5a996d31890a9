export type AttemptOutcome<T> =
  | { kind: "accepted"; value: T }
  | { kind: "retry"; reason: string }
  | { kind: "fatal"; error: Error };

export const accepted = <T>(value: T): AttemptOutcome<T> => ({ kind: "accepted", value });
export const retry = (reason: string): AttemptOutcome<never> => ({ kind: "retry", reason });
export const fatal = (error: Error): AttemptOutcome<never> => ({ kind: "fatal", error });

export type AttemptLoop<T> = {
  label: string;
  maxAttempts: number;
  attempt: (index: number) => Promise<AttemptOutcome<T>>;
  fallback: () => T;
};

/**
 * Runs attempts one after another until one is accepted, one is fatal, or the
 * budget is spent; then the fallback value is returned. Fatal outcomes reject.
 */
export async function runAttempts<T>({ label, maxAttempts, attempt, fallback }: AttemptLoop<T>): Promise<T> {
  for (let i = 1; i <= maxAttempts; i++) {
    console.info(`[GEN] ${label}: attempt ${i}/${maxAttempts}`);
    const outcome = await attempt(i);
    switch (outcome.kind) {
      case "accepted":
        return outcome.value;
      case "fatal":
        throw outcome.error;
      case "retry":
        console.warn(`[GEN] ${label}: attempt ${i} rejected: ${outcome.reason}`);
        break;
    }
  }
  console.error(`[GEN] ${label}: all ${maxAttempts} attempts failed, using fallback`);
  return fallback();
}

import { describe, expect, it, vi } from "vitest";
import { withRetry } from "./backoff";

describe("withRetry", () => {
  it("returns the first successful result", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("503")).mockResolvedValueOnce("ok");
    const onRetry = vi.fn();

    await expect(withRetry(fn, { tries: 3, baseDelayMs: 0, onRetry })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(2);
    expect(onRetry).toHaveBeenCalledTimes(1);
    expect(onRetry).toHaveBeenCalledWith(new Error("503"), 1);
  });

  it("rethrows the last error once every try failed", async () => {
    const fn = vi
      .fn()
      .mockRejectedValueOnce(new Error("first"))
      .mockRejectedValueOnce(new Error("second"))
      .mockRejectedValueOnce(new Error("third"));

    await expect(withRetry(fn, { tries: 3, baseDelayMs: 0 })).rejects.toThrow("third");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("waits between tries with exponential backoff", async () => {
    vi.useFakeTimers();
    try {
      vi.spyOn(Math, "random").mockReturnValue(0);
      const fn = vi.fn().mockRejectedValueOnce(new Error("busy")).mockResolvedValueOnce(42);

      const p = withRetry(fn, { tries: 2, baseDelayMs: 100 });
      await vi.advanceTimersByTimeAsync(99);
      expect(fn).toHaveBeenCalledTimes(1);
      await vi.runAllTimersAsync();
      await expect(p).resolves.toBe(42);
      expect(fn).toHaveBeenCalledTimes(2);
    } finally {
      vi.useRealTimers();
    }
  });
});

import { describe, it, expect, vi } from "vitest";
import { withRetry, withTimeout } from "../retry.js";

describe("withTimeout", () => {
  it("should resolve with the value when the promise settles in time", async () => {
    await expect(withTimeout(Promise.resolve(42), 100, "answer")).resolves.toBe(42);
  });

  it("should reject with a labelled error when the promise is too slow", async () => {
    await expect(withTimeout(new Promise(() => {}), 10, "slow fetch")).rejects.toThrow("slow fetch timed out after 10ms");
  });

  it("should pass through the promise's own rejection", async () => {
    await expect(withTimeout(Promise.reject(new Error("refused")), 100)).rejects.toThrow("refused");
  });
});

describe("withRetry", () => {
  it("should retry until the operation succeeds", async () => {
    const fn = vi.fn()
      .mockRejectedValueOnce(new Error("flaky"))
      .mockRejectedValueOnce(new Error("flaky"))
      .mockResolvedValue("ok");

    await expect(withRetry(fn, { retries: 2, delayMs: 1 })).resolves.toBe("ok");
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it("should throw the last error once retries are exhausted", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("down"));

    await expect(withRetry(fn, { retries: 1, delayMs: 1 })).rejects.toThrow("down");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("should give up immediately when shouldRetry says no", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("Not Found"));

    await expect(
      withRetry(fn, { retries: 3, delayMs: 1, shouldRetry: (e) => !e.message.includes("Not Found") }),
    ).rejects.toThrow("Not Found");
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it("should wrap non-Error rejections", async () => {
    const fn = vi.fn().mockRejectedValue("plain string");

    await expect(withRetry(fn, { retries: 0 })).rejects.toThrow("plain string");
  });
});

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { withRetry, withTimeout } from "./retry";

describe("withTimeout", () => {
  it("resolves with the wrapped value", async () => {
    await expect(withTimeout(Promise.resolve("ok"), 50, "test")).resolves.toBe("ok");
  });

  it("rejects when the promise takes too long", async () => {
    await expect(withTimeout(new Promise<string>(() => {}), 10, "slow")).rejects.toThrow("Timeout 10ms in slow");
  });
});

describe("withRetry", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("returns the first success", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("boom")).mockResolvedValueOnce("second");

    await expect(withRetry(fn, 1, "test")).resolves.toBe("second");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("rethrows the last error once retries are spent", async () => {
    const fn = vi.fn().mockRejectedValueOnce(new Error("first")).mockRejectedValueOnce(new Error("last"));

    await expect(withRetry(fn, 1, "test")).rejects.toThrow("last");
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it("makes a single attempt with zero retries", async () => {
    const fn = vi.fn().mockRejectedValue(new Error("nope"));

    await expect(withRetry(fn, 0, "test")).rejects.toThrow("nope");
    expect(fn).toHaveBeenCalledTimes(1);
    expect(console.warn).not.toHaveBeenCalled();
  });
});

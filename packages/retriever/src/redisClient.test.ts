import { afterEach, describe, expect, it, vi } from "vitest";
import { reconnectStrategy } from "./redisClient";

describe("reconnectStrategy", () => {
  it("backs off while attempts remain", () => {
    expect(reconnectStrategy(0, new Error("ECONNREFUSED"))).toBe(100);
    expect(reconnectStrategy(2, new Error("ECONNREFUSED"))).toBe(300);
  });

  it("gives up after the configured attempts", () => {
    const out = reconnectStrategy(3, new Error("ECONNREFUSED"));

    expect(out).toBeInstanceOf(Error);
    expect(String(out)).toContain("after 3 retries: ECONNREFUSED");
  });
});

describe("startup against an unreachable Redis", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    vi.resetModules();
  });

  it("rejects the index check instead of waiting forever", async () => {
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.stubEnv("REDIS_URL", "redis://127.0.0.1:1");
    vi.stubEnv("REDIS_CONNECT_RETRIES", "1");
    vi.resetModules();
    const { assertVectorIndexReady } = await import("./vector");
    const { closeRedis } = await import("./redisClient");

    await expect(assertVectorIndexReady()).rejects.toThrow("Redis unreachable at redis://127.0.0.1:1");
    await closeRedis();
  }, 5000);
});

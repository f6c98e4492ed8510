import { describe, expect, it } from "vitest";
import { loadConfig } from "./config";

describe("loadConfig", () => {
  it("falls back to defaults and the in-memory cache", () => {
    const config = loadConfig({});

    expect(config.port).toBe(5000);
    expect(config.logLevel).toBe("info");
    expect(config.redis).toBeNull();
    expect(config.saucenao).toEqual({ apiKey: undefined, minSimilarity: 80 });
    expect(config.search).toEqual({
      notFoundTtlSeconds: 86400,
      maxResults: 20,
      resolverConcurrency: 4,
      hitChannelCapacity: 32,
    });
    expect(config.http.timeoutMs).toBe(25000);
  });

  it("reads redis and engine settings", () => {
    const config = loadConfig({
      REDIS_HOST: "cache",
      REDIS_DB: "2",
      SAUCENAO_API_KEY: "  ",
      SAUCENAO_MIN_SIMILARITY: "65.5",
      LOG_LEVEL: "debug",
    });

    expect(config.redis).toEqual({ url: undefined, host: "cache", port: 6379, password: undefined, database: 2 });
    expect(config.saucenao).toEqual({ apiKey: undefined, minSimilarity: 65.5 });
    expect(config.logLevel).toBe("debug");
  });

  it("names every invalid variable", () => {
    const load = () => loadConfig({ RESOLVER_CONCURRENCY: "0", LOG_LEVEL: "loud" });
    expect(load).toThrow("RESOLVER_CONCURRENCY");
    expect(load).toThrow("LOG_LEVEL");
  });
});

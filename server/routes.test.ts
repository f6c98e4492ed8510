import axios, { type AxiosInstance } from "axios";
import type { Server } from "http";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import type { SearchHit } from "@shared/schema";
import { loadConfig } from "./config";
import { createAppContext, type AppContext } from "./context";
import { createApp } from "./routes";
import { MemoryCacheBackend } from "./services/cache/memory-backend";
import type { SearchEngineAdapter } from "./services/engines/types";
import { stubHttp } from "./test-utils/http";

// Reports one unclassified hit for URLs containing "found"
class FakeEngine implements SearchEngineAdapter {
  readonly name = "saucenao" as const;
  readonly displayName = "SauceNAO";

  async *search(imageUrl: string): AsyncGenerator<SearchHit> {
    if (!imageUrl.includes("found")) return;
    yield {
      searchProvider: "saucenao",
      platform: "unknown",
      platformId: 7,
      similarity: 90,
      rawPayload: { title: "x", search_link: "https://s.example/q" },
      searchLink: "https://s.example/q",
    };
  }
}

describe("routes", () => {
  let context: AppContext;
  let server: Server;
  let client: AxiosInstance;

  beforeEach(async () => {
    context = await createAppContext(loadConfig({}), {
      cache: new MemoryCacheBackend(),
      http: stubHttp(() => ({ status: 404, data: "" })).http,
      engines: [new FakeEngine()],
    });
    server = createApp(context);
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") {
      throw new Error("server is not listening on a port");
    }
    client = axios.create({ baseURL: `http://127.0.0.1:${address.port}`, validateStatus: () => true });
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    await context.close();
  });

  it("streams results and a summary line", async () => {
    const response = await client.post<string>(
      "/api/search",
      { imageUrl: "https://img.example/found.png", imageId: "img-1" },
      { responseType: "text" },
    );

    expect(response.status).toBe(200);
    expect(response.headers["content-type"]).toContain("application/x-ndjson");
    const lines = response.data
      .trim()
      .split("\n")
      .map((line): unknown => JSON.parse(line));
    expect(lines).toHaveLength(2);
    expect(lines[0]).toEqual({
      priority_key: "7",
      provider_id: "saucenao:7",
      provider_link: "https://s.example/q",
      main_files: [],
      fields: { title: "x" },
      extra_links: [],
    });
    expect(lines[1]).toMatchObject({
      done: true,
      imageId: "img-1",
      stats: { hits: 1, resolved: 1, results: 1, fromCache: false },
    });
  });

  it("rejects an invalid search request", async () => {
    const response = await client.post("/api/search", { imageUrl: "not a url" });
    expect(response.status).toBe(400);
    expect(response.data).toMatchObject({ code: "VALIDATION_ERROR" });
  });

  it("counts searches made on behalf of a user", async () => {
    await client.post("/api/search", { imageUrl: "https://img.example/found.png", userId: "5" }, { responseType: "text" });

    const response = await client.get("/api/settings/5");

    expect(response.status).toBe(200);
    expect(response.data).toEqual({
      userId: 5,
      enabledEngines: ["IQDB", "SauceNAO"],
      cacheEnabled: true,
      bestResultsOnly: false,
      broadcastMessageChatId: null,
      broadcastMessageId: null,
      searchCount: 1,
    });
  });

  it("updates settings and refuses unknown engines", async () => {
    const refused = await client.patch("/api/settings/5", { enabledEngines: ["Bing"] });
    expect(refused.status).toBe(400);
    expect(refused.data).toEqual({ error: "Unknown search engines: Bing", code: "UNKNOWN_ENGINE" });

    const emptied = await client.patch("/api/settings/5", { enabledEngines: [] });
    expect(emptied.status).toBe(400);
    expect(emptied.data).toMatchObject({ code: "VALIDATION_ERROR" });

    const updated = await client.patch("/api/settings/5", { enabledEngines: ["SauceNAO"], bestResultsOnly: true });
    expect(updated.status).toBe(200);
    expect(updated.data).toMatchObject({ enabledEngines: ["SauceNAO"], bestResultsOnly: true, cacheEnabled: true });
  });

  it("clears the not-found markers", async () => {
    await client.post("/api/search", { imageUrl: "https://img.example/missing.png", imageId: "img-2" }, { responseType: "text" });
    expect(await context.results.isImageMarkedAsNotFound("img-2")).toBe(true);

    const response = await client.delete("/api/cache/not-found");

    expect(response.data).toEqual({ success: true, removed: 1 });
    expect(await context.results.isImageMarkedAsNotFound("img-2")).toBe(false);
  });

  it("reports health with the cache backend", async () => {
    const response = await client.get("/api/health");
    expect(response.status).toBe(200);
    expect(response.data).toMatchObject({
      status: "ok",
      cache: { backend: "memory", connected: true },
      engines: ["SauceNAO"],
    });
  });
});

import { CanceledError } from "axios";
import { describe, expect, it, vi } from "vitest";
import type { ProviderData } from "@shared/schema";
import { stubHttp } from "../../test-utils/http";
import { ProviderResolver, type ProviderRegistry } from "./resolver";
import type { ProviderFunction, ProviderRequest } from "./types";

const SEARCH_LINK = "https://saucenao.com/search.php?url=x";

const hit: ProviderRequest = {
  searchProvider: "saucenao",
  platform: "danbooru",
  platformId: 555,
  rawPayload: {
    header: { similarity: 92.5, index_id: 9, index_name: "Index #9: Danbooru", thumbnail: "https://img.example/t.jpg" },
    data: { ext_urls: ["https://danbooru.donmai.us/post/show/555"], danbooru_id: 555 },
    search_link: SEARCH_LINK,
  },
};

function data(providerLink: string): ProviderData {
  return {
    priorityKey: "danbooru",
    providerId: "danbooru:555",
    providerLink,
    mainFiles: [],
    fields: {},
    extraLinks: new Set(),
  };
}

function resolverWith(specific: ProviderFunction, engineGeneric: ProviderFunction, fallback: ProviderFunction) {
  const registry: ProviderRegistry = {
    specific: new Map([["danbooru", specific]]),
    engineGeneric: new Map([["saucenao", engineGeneric]]),
    fallback,
  };
  return new ProviderResolver({ http: stubHttp(() => ({ data: null })).http, browserUserAgent: "test-browser", registry });
}

describe("ProviderResolver", () => {
  it("stops at the first provider that returns data", async () => {
    const specific = vi.fn<ProviderFunction>(async () => data("specific"));
    const engineGeneric = vi.fn<ProviderFunction>(async () => data("engine"));
    const fallback = vi.fn<ProviderFunction>(async () => data("fallback"));

    const result = await resolverWith(specific, engineGeneric, fallback).resolve(hit);

    expect(result?.providerLink).toBe("specific");
    expect(engineGeneric).not.toHaveBeenCalled();
    expect(fallback).not.toHaveBeenCalled();
  });

  it("moves on after a failure or an empty answer", async () => {
    const specific = vi.fn<ProviderFunction>(async () => {
      throw new Error("boom");
    });
    const engineGeneric = vi.fn<ProviderFunction>(async () => null);
    const fallback = vi.fn<ProviderFunction>(async () => data("fallback"));

    const result = await resolverWith(specific, engineGeneric, fallback).resolve(hit);

    expect(result?.providerLink).toBe("fallback");
    expect(specific).toHaveBeenCalledTimes(1);
    expect(engineGeneric).toHaveBeenCalledTimes(1);
  });

  it("returns null when every step fails", async () => {
    const failing = vi.fn<ProviderFunction>(async () => {
      throw new Error("boom");
    });
    expect(await resolverWith(failing, failing, failing).resolve(hit)).toBeNull();
    expect(failing).toHaveBeenCalledTimes(3);
  });

  it("skips steps that have no provider for the hit", async () => {
    const fallback = vi.fn<ProviderFunction>(async () => data("fallback"));
    const resolver = resolverWith(
      async () => data("specific"),
      async () => data("engine"),
      fallback,
    );

    const result = await resolver.resolve({ ...hit, searchProvider: "iqdb", platform: "pixiv" });

    expect(result?.providerLink).toBe("fallback");
  });

  it("passes the signal to providers and rethrows cancellations", async () => {
    const controller = new AbortController();
    const specific = vi.fn<ProviderFunction>(async (_request, context) => {
      expect(context.signal).toBe(controller.signal);
      throw new CanceledError();
    });
    const engineGeneric = vi.fn<ProviderFunction>(async () => data("engine"));

    await expect(
      resolverWith(specific, engineGeneric, engineGeneric).resolve(hit, controller.signal),
    ).rejects.toBeInstanceOf(CanceledError);
    expect(engineGeneric).not.toHaveBeenCalled();
  });

  it("does not start when the signal is already aborted", async () => {
    const specific = vi.fn<ProviderFunction>(async () => data("specific"));
    const controller = new AbortController();
    controller.abort();

    await expect(resolverWith(specific, specific, specific).resolve(hit, controller.signal)).rejects.toThrow();
    expect(specific).not.toHaveBeenCalled();
  });

  it("falls back to the engine record when the board is down", async () => {
    const { http, requests } = stubHttp(() => ({ status: 500, data: "" }));
    const resolver = new ProviderResolver({ http, browserUserAgent: "test-browser" });

    const result = await resolver.resolve(hit);

    expect(requests).toHaveLength(1);
    expect(result).toEqual({
      priorityKey: "danbooru",
      providerId: "danbooru:555",
      providerLink: SEARCH_LINK,
      mainFiles: ["https://img.example/t.jpg"],
      fields: { danbooru_id: "555" },
      extraLinks: new Set([SEARCH_LINK, "https://danbooru.donmai.us/posts/555"]),
    });
  });
});

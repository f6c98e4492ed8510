import { describe, expect, it } from "vitest";
import { stubHttp, type StubHandler } from "../../test-utils/http";
import { TransportError } from "../errors";
import { danbooru, gelbooru, konachan, splitTags, threedbooru, yandere, zerochan } from "./boorus";
import type { ProviderContext, ProviderRequest } from "./types";

const SEARCH_LINK = "https://saucenao.com/search.php?url=x";

function contextFor(handler: StubHandler): ProviderContext & { requests: ReturnType<typeof stubHttp>["requests"] } {
  const { http, requests } = stubHttp(handler);
  return { http, browserUserAgent: "test-browser", requests };
}

function request(platform: ProviderRequest["platform"], platformId: number, rawPayload: unknown = {}): ProviderRequest {
  return { searchProvider: "saucenao", platform, platformId, rawPayload };
}

describe("splitTags", () => {
  it("drops empty entries", () => {
    expect(splitTags("a  b ")).toEqual(["a", "b"]);
    expect(splitTags(null)).toEqual([]);
  });
});

describe("danbooru", () => {
  it("maps the post and keeps the links the engine reported", async () => {
    const context = contextFor(() => ({
      data: {
        tag_string_artist: "artist_a",
        tag_string_character: "char_a char_b",
        tag_string_copyright: "series",
        tag_string_general: "1girl  solo",
        rating: "q",
        file_url: "https://cdn.example/f.png",
        preview_file_url: "https://cdn.example/p.png",
        source: "https://www.pixiv.net/artworks/1",
      },
    }));
    const rawPayload = {
      header: { similarity: 92.5, index_id: 9, index_name: "Index #9: Danbooru" },
      data: { ext_urls: ["https://danbooru.donmai.us/post/show/555"], danbooru_id: 555 },
      search_link: SEARCH_LINK,
    };

    const data = await danbooru(request("danbooru", 555, rawPayload), context);

    expect(context.requests[0].url).toBe("https://danbooru.donmai.us/posts/555.json");
    expect(data).toEqual({
      priorityKey: "danbooru",
      providerId: "danbooru:555",
      providerLink: "https://danbooru.donmai.us/posts/555",
      mainFiles: ["https://cdn.example/f.png"],
      fields: {
        authors: ["artist_a"],
        characters: ["char_a", "char_b"],
        tags: ["1girl", "solo"],
        copyrights: ["series"],
        nsfw: true,
      },
      extraLinks: new Set([SEARCH_LINK, "https://danbooru.donmai.us/posts/555", "https://www.pixiv.net/artworks/1"]),
    });
  });

  it("raises a transport error for a missing post", async () => {
    const context = contextFor(() => ({ status: 404, data: { success: false } }));
    const failure = danbooru(request("danbooru", 1), context);
    await expect(failure).rejects.toThrow(TransportError);
    await expect(failure).rejects.toMatchObject({ status: 404 });
  });

  it("raises a transport error for a body that is not a post", async () => {
    const context = contextFor(() => ({ data: "not json" }));
    await expect(danbooru(request("danbooru", 1), context)).rejects.toThrow(TransportError);
  });
});

describe("gelbooru", () => {
  it("reads the first post of the listing", async () => {
    const context = contextFor(() => ({
      data: { post: [{ tags: "a b", rating: "general", file_url: null, sample_url: "https://cdn.example/s.jpg", source: "" }] },
    }));

    const data = await gelbooru(request("gelbooru", 77), context);

    expect(context.requests[0].url).toBe("https://gelbooru.com/index.php?page=dapi&s=post&q=index&json=1&id=77");
    expect(data).toEqual({
      priorityKey: "gelbooru",
      providerId: "gelbooru:77",
      providerLink: "https://gelbooru.com/index.php?page=post&s=view&id=77",
      mainFiles: ["https://cdn.example/s.jpg"],
      fields: { tags: ["a", "b"], nsfw: false },
      extraLinks: new Set(),
    });
  });

  it("returns null for an empty listing", async () => {
    expect(await gelbooru(request("gelbooru", 77), contextFor(() => ({ data: {} })))).toBeNull();
  });
});

describe("moebooru boards", () => {
  it("query yande.re and konachan by id", async () => {
    const post = { tags: "x", rating: "s", jpeg_url: "https://cdn.example/j.jpg" };
    const yandereContext = contextFor(() => ({ data: [post] }));
    const konachanContext = contextFor(() => ({ data: [post] }));

    const fromYandere = await yandere(request("yandere", 31), yandereContext);
    const fromKonachan = await konachan(request("konachan", 32), konachanContext);

    expect(yandereContext.requests[0].url).toBe("https://yande.re/post.json?tags=id:31");
    expect(fromYandere?.providerLink).toBe("https://yande.re/post/show/31");
    expect(fromYandere?.mainFiles).toEqual(["https://cdn.example/j.jpg"]);
    expect(konachanContext.requests[0].url).toBe("https://konachan.com/post.json?tags=id:32");
    expect(fromKonachan?.providerId).toBe("konachan:32");
  });

  it("return null when the board has no such post", async () => {
    expect(await yandere(request("yandere", 31), contextFor(() => ({ data: [] })))).toBeNull();
  });

  it("fetch 3dbooru previews as a browser", async () => {
    const context = contextFor(() => ({
      data: [{ tags: "cosplay", rating: "e", file_url: "http://behoimi.org/data/f.jpg", preview_url: "http://behoimi.org/p.jpg" }],
    }));

    const data = await threedbooru(request("3dbooru", 8), context);

    expect(context.requests[0].url).toBe("http://behoimi.org/post/index.json?tags=id:8");
    expect(context.requests[0].headers.get("User-Agent")).toBe("test-browser");
    expect(data?.mainFiles).toEqual(["http://behoimi.org/p.jpg"]);
    expect(data?.fields).toEqual({ tags: ["cosplay"], nsfw: true });
  });
});

describe("zerochan", () => {
  it("takes the largest available file", async () => {
    const context = contextFor(() => ({
      data: { tags: ["Character A"], full: null, large: "https://cdn.example/l.jpg", small: "https://cdn.example/s.jpg" },
    }));

    const data = await zerochan(request("zerochan", 3377), context);

    expect(context.requests[0].url).toBe("https://www.zerochan.net/3377?json");
    expect(data).toEqual({
      priorityKey: "zerochan",
      providerId: "zerochan:3377",
      providerLink: "https://www.zerochan.net/3377",
      mainFiles: ["https://cdn.example/l.jpg"],
      fields: { tags: ["Character A"], nsfw: false },
      extraLinks: new Set(),
    });
  });
});

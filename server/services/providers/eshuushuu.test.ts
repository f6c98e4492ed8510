import { describe, expect, it } from "vitest";
import { stubHttp } from "../../test-utils/http";
import { eshuushuu, parseEshuushuuPage } from "./eshuushuu";
import type { ProviderRequest } from "./types";

const PAGE = `
<html><body><div class="image_thread">
  <a class="thumb_image" href="/images/2024-01-01-1042.jpeg"><img src="/thumbs/1042.jpeg"></a>
  <div class="meta"><dl>
    <dt>Tags:</dt>
    <dd><span class="tag">"<a href="/tags/1">blue hair</a>"</span> <span class="tag">"<a href="/tags/2">smile</a>"</span></dd>
    <dt>Source:</dt>
    <dd><span class="tag">"<a href="/tags/3">Series X</a>"</span></dd>
    <dt>Characters:</dt>
    <dd><span class="tag">"<a href="/tags/4">Hero</a>"</span></dd>
    <dt>Artist:</dt>
    <dd><span class="tag">"<a href="/tags/5">Painter</a>"</span></dd>
  </dl></div>
</div></body></html>
`;

const IQDB_LINK = "https://iqdb.org/?url=x";

const hit: ProviderRequest = {
  searchProvider: "iqdb",
  platform: "eshuushuu",
  platformId: 1042,
  rawPayload: {
    service: "E-Shuushuu",
    post_link: "https://e-shuushuu.net/image/1042/",
    post_id: 1042,
    thumbnail_src: "https://iqdb.org/e-shuushuu/t.jpg",
    size: "800×600",
    nsfw: false,
    search_link: IQDB_LINK,
  },
};

describe("parseEshuushuuPage", () => {
  it("separates named tags from general ones", () => {
    expect(parseEshuushuuPage(PAGE)).toEqual({
      file: "https://e-shuushuu.net/images/2024-01-01-1042.jpeg",
      tags: ["blue hair", "smile"],
      copyrights: ["Series X"],
      characters: ["Hero"],
      artists: ["Painter"],
    });
  });

  it("returns null without a full size image link", () => {
    expect(parseEshuushuuPage("<html><body><p>Image not found</p></body></html>")).toBeNull();
  });
});

describe("eshuushuu", () => {
  it("fetches the image page as a browser", async () => {
    const { http, requests } = stubHttp(() => ({ data: PAGE }));

    const data = await eshuushuu(hit, { http, browserUserAgent: "test-browser" });

    expect(requests[0].url).toBe("https://e-shuushuu.net/image/1042/");
    expect(requests[0].headers.get("User-Agent")).toBe("test-browser");
    expect(data).toEqual({
      priorityKey: "eshuushuu",
      providerId: "eshuushuu:1042",
      providerLink: "https://e-shuushuu.net/image/1042/",
      mainFiles: ["https://e-shuushuu.net/images/2024-01-01-1042.jpeg"],
      fields: {
        tags: ["blue hair", "smile"],
        copyrights: ["Series X"],
        characters: ["Hero"],
        authors: ["Painter"],
      },
      extraLinks: new Set(["https://e-shuushuu.net/image/1042/", IQDB_LINK]),
    });
  });

  it("returns null for an empty page", async () => {
    const { http } = stubHttp(() => ({ data: "" }));
    expect(await eshuushuu(hit, { http, browserUserAgent: "test-browser" })).toBeNull();
  });
});

import { describe, expect, it } from "vitest";
import { collect, stubHttp } from "../../test-utils/http";
import { TransportError } from "../errors";
import { IqdbEngine, iqdbSearchLink, parseIqdbPage } from "./iqdb";

const IMAGE_URL = "https://img.example/a.png";
const SEARCH_LINK = "https://iqdb.org/?url=https%3A%2F%2Fimg.example%2Fa.png&service[]=6&service[]=11&service[]=7";

const PAGE = `
<html><body><div id="pages">
  <div><table>
    <tr><th>Your image</th></tr>
    <tr><td class="image"><img src="/thu/upload.jpg"></td></tr>
    <tr><td>640×480 [Safe]</td></tr>
  </table></div>
  <div><table>
    <tr><th>Best match</th></tr>
    <tr><td class="image"><a href="//e-shuushuu.net/image/1042/"><img src="/e-shuushuu/thumb1.jpg"></a></td></tr>
    <tr><td><img class="service-icon" src="/icon/e-shuushuu.ico"> E-Shuushuu</td></tr>
    <tr><td>800×600 [Safe]</td></tr>
    <tr><td>93% similarity</td></tr>
  </table></div>
  <div><table>
    <tr><th>Additional match</th></tr>
    <tr><td class="image"><a href="https://www.zerochan.net/3377"><img src="https://iqdb.org/zerochan/thumb2.jpg"></a></td></tr>
    <tr><td><img class="service-icon" src="/icon/zerochan.ico"> Zerochan</td></tr>
    <tr><td>1200×1600 [Explicit]</td></tr>
    <tr><td>81% similarity</td></tr>
  </table></div>
  <div><table>
    <tr><th>Additional match</th></tr>
    <tr><td class="image"><a href="https://other.example/post/9"><img src="/other/thumb3.jpg"></a></td></tr>
    <tr><td>300×300 [Ero]</td></tr>
    <tr><td>70% similarity</td></tr>
  </table></div>
  <div><table>
    <tr><th>Additional match</th></tr>
    <tr><td class="image"><a href="https://www.zerochan.net/4000"><img src="/zerochan/thumb4.jpg"></a></td></tr>
    <tr><td>55% similarity</td></tr>
  </table></div>
</div></body></html>
`;

describe("iqdbSearchLink", () => {
  it("restricts the query to the boards IQDB handles", () => {
    expect(iqdbSearchLink(IMAGE_URL)).toBe(SEARCH_LINK);
  });
});

describe("parseIqdbPage", () => {
  it("reads every complete match table", () => {
    const matches = parseIqdbPage(PAGE, SEARCH_LINK);

    expect(matches).toHaveLength(3);
    expect(matches[0]).toEqual({
      similarity: 93,
      payload: {
        service: "E-Shuushuu",
        post_link: "https://e-shuushuu.net/image/1042/",
        post_id: 1042,
        thumbnail_src: "https://iqdb.org/e-shuushuu/thumb1.jpg",
        size: "800×600",
        nsfw: false,
        search_link: SEARCH_LINK,
      },
    });
    expect(matches[1].payload.nsfw).toBe(true);
    expect(matches[2].payload.service).toBe("");
  });

  it("keeps a match whose thumbnail link is broken", () => {
    const page = `
      <table>
        <tr><th>Best match</th></tr>
        <tr><td class="image"><a href="https://www.zerochan.net/1"><img src="http://[broken"></a></td></tr>
        <tr><td>100×100 [Safe]</td></tr>
        <tr><td>90% similarity</td></tr>
      </table>
      <table>
        <tr><th>Additional match</th></tr>
        <tr><td class="image"><a href="//e-shuushuu.net/image/5/"><img src="/e-shuushuu/t5.jpg"></a></td></tr>
        <tr><td>200×200 [Safe]</td></tr>
        <tr><td>80% similarity</td></tr>
      </table>
    `;

    const matches = parseIqdbPage(page, SEARCH_LINK);

    expect(matches.map((match) => [match.payload.post_id, match.payload.thumbnail_src])).toEqual([
      [1, ""],
      [5, "https://iqdb.org/e-shuushuu/t5.jpg"],
    ]);
  });

  it("returns nothing for a page without matches", () => {
    expect(parseIqdbPage("<html><body><p>No relevant matches</p></body></html>", SEARCH_LINK)).toEqual([]);
  });
});

describe("IqdbEngine", () => {
  it("classifies matches by the host of their post link", async () => {
    const { http, requests } = stubHttp(() => ({ data: PAGE }));
    const engine = new IqdbEngine(http, "test-browser");

    const hits = await collect(engine.search(IMAGE_URL, "img-1"));

    expect(hits.map((hit) => [hit.platform, hit.platformId, hit.similarity])).toEqual([
      ["eshuushuu", 1042, 93],
      ["zerochan", 3377, 81],
      ["unknown", 9, 70],
    ]);
    expect(hits.every((hit) => hit.searchProvider === "iqdb" && hit.searchLink === SEARCH_LINK)).toBe(true);
    expect(requests[0].url).toBe(SEARCH_LINK);
    expect(requests[0].headers.get("User-Agent")).toBe("test-browser");
  });

  it("rejects a response that is not a page", async () => {
    const { http } = stubHttp(() => ({ data: { unexpected: true } }));
    const engine = new IqdbEngine(http, "test-browser");
    await expect(collect(engine.search(IMAGE_URL, "img-1"))).rejects.toThrow(TransportError);
  });

  it("raises a transport error for a failed request", async () => {
    const { http } = stubHttp(() => ({ status: 502, data: "" }));
    const engine = new IqdbEngine(http, "test-browser");
    await expect(collect(engine.search(IMAGE_URL, "img-1"))).rejects.toThrow(TransportError);
  });
});

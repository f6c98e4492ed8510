import type { AxiosInstance } from "axios";
import * as cheerio from "cheerio";
import { z } from "zod";
import type { Platform, SearchHit } from "@shared/schema";
import { toTransportError } from "../../lib/http";
import { createLogger } from "../../lib/logger";
import { MalformedUpstreamRecordError, TransportError } from "../errors";
import type { SearchEngineAdapter } from "./types";

const logger = createLogger("ris.engines.iqdb");

export const IQDB_ORIGIN = "https://iqdb.org/";

// e-shuushuu (6), zerochan (11) and 3dbooru (7); SauceNAO covers the rest
const IQDB_SERVICES = [6, 11, 7];

const HOST_PLATFORMS: Readonly<Record<string, Platform>> = {
  "www.zerochan.net": "zerochan",
  "behoimi.org": "3dbooru",
  "e-shuushuu.net": "eshuushuu",
};

export const iqdbPayloadSchema = z.object({
  service: z.string(),
  post_link: z.string(),
  post_id: z.union([z.string(), z.number()]),
  thumbnail_src: z.string(),
  size: z.string(),
  nsfw: z.boolean(),
  search_link: z.string(),
});
export type IqdbPayload = z.infer<typeof iqdbPayloadSchema>;

export interface IqdbMatch {
  payload: IqdbPayload;
  similarity: number;
}

export function iqdbSearchLink(imageUrl: string): string {
  const services = IQDB_SERVICES.map((service) => `&service[]=${service}`).join("");
  return `${IQDB_ORIGIN}?url=${encodeURIComponent(imageUrl)}${services}`;
}

function postIdOf(link: URL): string | number | null {
  const segment = link.pathname.split("/").filter(Boolean).pop();
  if (!segment) return null;
  return /^\d+$/.test(segment) ? Number(segment) : segment;
}

/**
 * Extract the match tables from an IQDB result page. Rows that are missing a
 * link, a size line or a similarity are reported and skipped.
 */
export function parseIqdbPage(html: string, searchLink: string, logPrefix = "iqdb:"): IqdbMatch[] {
  const $ = cheerio.load(html);
  const matches: IqdbMatch[] = [];

  const skip = (detail: string) =>
    logger.debug(`${logPrefix} ${new MalformedUpstreamRecordError("iqdb", detail).message}`);

  for (const table of $("table").toArray()) {
    const $table = $(table);
    const heading = $table.find("th").first().text().trim();
    if (heading !== "Best match" && heading !== "Additional match") continue;

    const href = $table.find("td.image a").first().attr("href");
    const thumbnail = $table.find("td.image img").first().attr("src") ?? "";
    let service = "";
    let size: RegExpExecArray | null = null;
    let similarity: RegExpExecArray | null = null;
    for (const cell of $table.find("td").toArray()) {
      const $cell = $(cell);
      const text = $cell.text().trim();
      if ($cell.find("img.service-icon").length > 0) {
        service = text;
      }
      size = size ?? /^(\d+)×(\d+) \[([^\]]+)\]$/.exec(text);
      similarity = similarity ?? /^(\d+)% similarity$/.exec(text);
    }

    if (!href || !size || !similarity) {
      skip(`incomplete '${heading}' table`);
      continue;
    }

    let postLink: URL;
    try {
      postLink = new URL(href, IQDB_ORIGIN);
    } catch {
      skip(`bad post link '${href}'`);
      continue;
    }
    // Matches keep an empty preview when the thumbnail link is unusable
    let thumbnailSrc = "";
    if (thumbnail) {
      try {
        thumbnailSrc = new URL(thumbnail, IQDB_ORIGIN).href;
      } catch {
        logger.debug(`${logPrefix} dropping bad thumbnail '${thumbnail}'`);
      }
    }

    const postId = postIdOf(postLink);
    if (postId === null) {
      skip(`no post id in '${href}'`);
      continue;
    }

    const [, width, height, rating] = size;
    matches.push({
      similarity: Number(similarity[1]),
      payload: {
        service,
        post_link: postLink.href,
        post_id: postId,
        thumbnail_src: thumbnailSrc,
        size: `${width}×${height}`,
        nsfw: rating.trim().toLowerCase() !== "safe",
        search_link: searchLink,
      },
    });
  }

  return matches;
}

/**
 * IQDB is only asked about the boards SauceNAO does not index well.
 */
export class IqdbEngine implements SearchEngineAdapter {
  readonly name = "iqdb" as const;
  readonly displayName = "IQDB";

  constructor(
    private readonly http: AxiosInstance,
    private readonly browserUserAgent: string,
  ) {}

  async *search(imageUrl: string, imageId: string, signal?: AbortSignal): AsyncGenerator<SearchHit> {
    const logPrefix = `[${imageId}].iqdb:`;
    logger.info(`${logPrefix} starting search`);
    const searchLink = iqdbSearchLink(imageUrl);

    let html: unknown;
    try {
      const response = await this.http.get<unknown>(searchLink, {
        headers: { "User-Agent": this.browserUserAgent },
        responseType: "text",
        signal,
      });
      html = response.data;
    } catch (error) {
      throw toTransportError("iqdb", error);
    }
    if (typeof html !== "string") {
      throw new TransportError("iqdb", "expected an HTML page");
    }

    const matches = parseIqdbPage(html, searchLink, logPrefix);
    if (matches.length === 0 && html.includes("Best match")) {
      logger.warn(`${logPrefix} 'Best match' found but nothing parsed`);
    }

    for (const { payload, similarity } of matches) {
      const host = new URL(payload.post_link).host;
      logger.debug(`${logPrefix} found result service='${payload.service}' host='${host}'`);
      yield {
        searchProvider: "iqdb",
        platform: HOST_PLATFORMS[host] ?? "unknown",
        platformId: payload.post_id,
        similarity,
        rawPayload: payload,
        searchLink,
      };
    }
    logger.info(`${logPrefix} finished search`);
  }
}

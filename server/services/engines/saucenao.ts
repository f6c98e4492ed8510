import type { AxiosInstance } from "axios";
import { createHash } from "crypto";
import { z } from "zod";
import type { Platform, SearchHit } from "@shared/schema";
import { toTransportError } from "../../lib/http";
import { createLogger } from "../../lib/logger";
import { MalformedUpstreamRecordError, TransportError } from "../errors";
import type { SearchEngineAdapter } from "./types";

const logger = createLogger("ris.engines.saucenao");

export const SAUCENAO_ENDPOINT = "https://saucenao.com/search.php";

export const sauceNaoRecordSchema = z.object({
  header: z
    .object({
      similarity: z.coerce.number(),
      index_id: z.number(),
      index_name: z.string(),
      thumbnail: z.string().optional(),
    })
    .passthrough(),
  data: z.record(z.unknown()),
});

// What the resolver receives as the raw payload of a SauceNAO hit
export const sauceNaoPayloadSchema = sauceNaoRecordSchema.extend({
  search_link: z.string(),
});
export type SauceNaoPayload = z.infer<typeof sauceNaoPayloadSchema>;

const responseSchema = z
  .object({
    header: z.object({ status: z.number().optional(), message: z.string().optional() }).passthrough().optional(),
    results: z.array(z.unknown()).optional(),
  })
  .passthrough();

interface IdField {
  field: string;
  platform: Platform;
  /** Only match records from this SauceNAO index. */
  indexId?: number;
}

// Fields that carry a platform-local post id
const ID_FIELDS: IdField[] = [
  { field: "danbooru_id", platform: "danbooru" },
  { field: "yandere_id", platform: "yandere" },
  { field: "gelbooru_id", platform: "gelbooru" },
  { field: "konachan_id", platform: "konachan" },
  { field: "sankaku_id", platform: "sankaku" },
  { field: "pixiv_id", platform: "pixiv" },
  { field: "md_id", platform: "mangadex" },
  { field: "mu_id", platform: "mangaupdates" },
  { field: "mal_id", platform: "myanimelist" },
  { field: "da_id", platform: "deviantart" },
  { field: "as_project", platform: "artstation" },
  { field: "id", platform: "patreon", indexId: 43 },
  { field: "anidb_aid", platform: "anidb" },
  { field: "anilist_id", platform: "anilist" },
  { field: "tweet_id", platform: "twitter" },
  { field: "imdb_id", platform: "imdb" },
  { field: "e621_id", platform: "e621" },
];

// Platforms recognisable only by the shape of a link in `ext_urls`
const URL_PATTERNS: Array<{ platform: Platform; pattern: RegExp }> = [
  { platform: "twitter", pattern: /^https?:\/\/(?:www\.|mobile\.)?(?:twitter|x)\.com\/[^/]+\/status(?:es)?\/(\d+)/i },
  { platform: "pixiv", pattern: /^https?:\/\/(?:www\.)?pixiv\.net\/(?:en\/)?artworks\/(\d+)/i },
  { platform: "pixiv", pattern: /^https?:\/\/(?:www\.)?pixiv\.net\/member_illust\.php\?.*?\billust_id=(\d+)/i },
  { platform: "danbooru", pattern: /^https?:\/\/danbooru\.donmai\.us\/(?:posts|post\/show)\/(\d+)/i },
  { platform: "gelbooru", pattern: /^https?:\/\/gelbooru\.com\/index\.php\?.*?\bid=(\d+)/i },
  { platform: "yandere", pattern: /^https?:\/\/yande\.re\/post\/show\/(\d+)/i },
  { platform: "konachan", pattern: /^https?:\/\/konachan\.(?:com|net)\/post\/show\/(\d+)/i },
  { platform: "e621", pattern: /^https?:\/\/e621\.net\/(?:posts|post\/show)\/(\d+)/i },
  { platform: "deviantart", pattern: /^https?:\/\/(?:www\.)?deviantart\.com\/(?:[^/]+\/art\/(?:[^/?#]*-)?|view\/)(\d+)/i },
  { platform: "artstation", pattern: /^https?:\/\/(?:www\.)?artstation\.com\/artwork\/([A-Za-z0-9]+)/i },
];

export interface SauceNaoOptions {
  apiKey?: string;
  minSimilarity: number;
  userAgent: string;
}

function platformIdFrom(value: unknown): string | number | null {
  if (typeof value === "number" && Number.isFinite(value)) return value;
  if (typeof value === "string" && value.trim() !== "") return value.trim();
  return null;
}

/**
 * Classify a link by its shape. Returns null when no pattern matches.
 */
export function classifyUrl(url: string): { platform: Platform; platformId: string } | null {
  for (const { platform, pattern } of URL_PATTERNS) {
    const match = pattern.exec(url);
    if (match) {
      return { platform, platformId: match[1] };
    }
  }
  return null;
}

/**
 * SauceNAO covers most booru, pixiv, social media and anime/manga databases.
 * One record can point at several platforms; each becomes its own hit.
 */
export class SauceNaoEngine implements SearchEngineAdapter {
  readonly name = "saucenao" as const;
  readonly displayName = "SauceNAO";

  constructor(
    private readonly http: AxiosInstance,
    private readonly options: SauceNaoOptions,
  ) {}

  async *search(imageUrl: string, imageId: string, signal?: AbortSignal): AsyncGenerator<SearchHit> {
    const logPrefix = `[${imageId}].saucenao:`;
    logger.info(`${logPrefix} starting search`);
    const searchLink = `${SAUCENAO_ENDPOINT}?url=${encodeURIComponent(imageUrl)}`;

    const params: Record<string, string | number> = { url: imageUrl, output_type: 2, db: 999, testmode: 1 };
    if (this.options.apiKey) {
      logger.debug(`${logPrefix} using api key`);
      params.api_key = this.options.apiKey;
    }

    let body: unknown;
    try {
      const response = await this.http.get<unknown>(SAUCENAO_ENDPOINT, {
        params,
        headers: { "User-Agent": this.options.userAgent },
        signal,
      });
      body = response.data;
    } catch (error) {
      throw toTransportError("saucenao", error);
    }

    const parsed = responseSchema.safeParse(body);
    if (!parsed.success) {
      throw new TransportError("saucenao", "unexpected response body");
    }
    const status = parsed.data.header?.status ?? 0;
    if (status < 0) {
      logger.warn(`${logPrefix} search rejected (status ${status}): ${parsed.data.header?.message ?? "no message"}`);
      return;
    }

    for (const item of parsed.data.results ?? []) {
      const record = sauceNaoRecordSchema.safeParse(item);
      if (!record.success) {
        logger.debug(`${logPrefix} ${new MalformedUpstreamRecordError("saucenao", record.error.issues[0]?.message ?? "invalid").message}`);
        continue;
      }
      yield* this.hitsFor({ ...record.data, search_link: searchLink }, logPrefix);
    }
    logger.info(`${logPrefix} finished search`);
  }

  private *hitsFor(payload: SauceNaoPayload, logPrefix: string): Generator<SearchHit> {
    const { header, data } = payload;
    if (header.similarity < this.options.minSimilarity) {
      return;
    }

    const makeHit = (platform: Platform, platformId: string | number): SearchHit => ({
      searchProvider: "saucenao",
      platform,
      platformId,
      similarity: header.similarity,
      rawPayload: structuredClone(payload),
      searchLink: payload.search_link,
    });

    let found = false;
    for (const { field, platform, indexId } of ID_FIELDS) {
      if (!(field in data)) continue;
      if (indexId !== undefined && header.index_id !== indexId) continue;
      const platformId = platformIdFrom(data[field]);
      if (platformId === null) {
        logger.debug(`${logPrefix} ${new MalformedUpstreamRecordError("saucenao", `empty ${field}`).message}`);
        continue;
      }
      logger.debug(`${logPrefix} found known provider result platform='${platform}' ${field}='${platformId}'`);
      found = true;
      yield makeHit(platform, platformId);
    }
    if (found) return;

    const extUrls = Array.isArray(data.ext_urls) ? data.ext_urls : [];
    const seen = new Set<string>();
    for (const url of extUrls) {
      if (typeof url !== "string") continue;
      const classified = classifyUrl(url);
      if (!classified) continue;
      const key = `${classified.platform}:${classified.platformId}`;
      if (seen.has(key)) continue;
      seen.add(key);
      logger.debug(`${logPrefix} classified link platform='${classified.platform}' url='${url}'`);
      found = true;
      yield makeHit(classified.platform, classified.platformId);
    }
    if (found) return;

    logger.debug(`${logPrefix} found unknown provider result index='${header.index_name}'`);
    yield makeHit("unknown", createHash("sha1").update(header.index_name).digest("hex"));
  }
}

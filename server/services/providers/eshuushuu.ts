import * as cheerio from "cheerio";
import { providerIdOf } from "@shared/schema";
import { toTransportError } from "../../lib/http";
import { createLogger } from "../../lib/logger";
import { TransportError } from "../errors";
import { recoverLinks } from "./generic";
import type { ProviderFunction } from "./types";

const logger = createLogger("ris.providers.eshuushuu");

const ORIGIN = "https://e-shuushuu.net";

export interface EshuushuuPost {
  file: string;
  tags: string[];
  copyrights: string[];
  characters: string[];
  artists: string[];
}

/**
 * Reads the image page. Returns null when the page has no full size image link.
 */
export function parseEshuushuuPage(html: string): EshuushuuPost | null {
  const $ = cheerio.load(html);
  const href = $("a.thumb_image").first().attr("href");
  if (!href) return null;

  const sections = new Map<string, string[]>();
  for (const dt of $("dt").toArray()) {
    const label = $(dt).text().trim().replace(/:$/, "");
    const names = $(dt)
      .next("dd")
      .find("span.tag a")
      .toArray()
      .map((anchor) => $(anchor).text().trim())
      .filter((name) => name !== "");
    sections.set(label, names);
  }

  const copyrights = sections.get("Source") ?? [];
  const characters = sections.get("Characters") ?? [];
  const artists = sections.get("Artist") ?? [];
  const named = new Set([...copyrights, ...characters, ...artists]);
  const tags = new Set(
    $("span.tag a")
      .toArray()
      .map((anchor) => $(anchor).text().trim())
      .filter((name) => name !== "" && !named.has(name)),
  );

  return {
    file: new URL(href, ORIGIN).href,
    tags: Array.from(tags),
    copyrights,
    characters,
    artists,
  };
}

export const eshuushuu: ProviderFunction = async (request, context) => {
  const id = request.platformId;
  const logPrefix = `[${id}].eshuushuu:`;
  logger.debug(`${logPrefix} fetching post`);
  const url = `${ORIGIN}/image/${id}/`;

  let html: unknown;
  try {
    const response = await context.http.get<unknown>(url, {
      headers: { "User-Agent": context.browserUserAgent },
      responseType: "text",
      signal: context.signal,
    });
    html = response.data;
  } catch (error) {
    throw toTransportError("eshuushuu", error);
  }
  if (typeof html !== "string") {
    throw new TransportError("eshuushuu", "expected an HTML page");
  }
  if (html === "") {
    logger.debug(`${logPrefix} no data`);
    return null;
  }

  const post = parseEshuushuuPage(html);
  if (!post) {
    logger.debug(`${logPrefix} no full size image on the page`);
    return null;
  }
  if (post.tags.length === 0) {
    logger.debug(`${logPrefix} no tags found`);
  }

  return {
    priorityKey: "eshuushuu",
    providerId: providerIdOf(request),
    providerLink: url,
    mainFiles: [post.file],
    fields: {
      tags: post.tags,
      copyrights: post.copyrights,
      characters: post.characters,
      authors: post.artists,
    },
    extraLinks: recoverLinks(request),
  };
};

import { providerIdOf, type FieldValue } from "@shared/schema";
import { createLogger } from "../../lib/logger";
import { iqdbPayloadSchema } from "../engines/iqdb";
import { sauceNaoPayloadSchema } from "../engines/saucenao";
import type { ProviderFunction, ProviderRequest } from "./types";

const logger = createLogger("ris.providers.generic");

// Values SauceNAO uses for "no data"
const EMPTY_MARKERS = new Set(["", "None", "null"]);

export function isLink(value: unknown): value is string {
  if (typeof value !== "string" || !/^https?:\/\//i.test(value)) return false;
  try {
    return new URL(value).host !== "";
  } catch {
    return false;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeLink(link: string): string {
  if (link.includes("danbooru.donmai.us") && link.includes("post/show/")) {
    return link.replace("post/show", "posts");
  }
  return link;
}

function toFieldValue(value: unknown): FieldValue | null {
  if (typeof value === "boolean") return value;
  if (typeof value === "number") return Number.isFinite(value) ? String(value) : null;
  if (typeof value === "string") return EMPTY_MARKERS.has(value.trim()) ? null : value;
  if (Array.isArray(value)) {
    const items = value.filter((item): item is string | number => typeof item === "string" || typeof item === "number");
    const strings = items.map(String).filter((item) => !EMPTY_MARKERS.has(item.trim()));
    if (strings.length === 0 || (strings.length === 1 && strings[0] === "unknown")) return null;
    return strings;
  }
  return null;
}

/**
 * Split a flat record into displayable fields and the links found among its values.
 */
function splitFields(record: Record<string, unknown>, skip: readonly string[] = []): {
  fields: Record<string, FieldValue>;
  links: Set<string>;
} {
  const fields: Record<string, FieldValue> = {};
  const links = new Set<string>();
  for (const [key, value] of Object.entries(record)) {
    if (skip.includes(key)) continue;
    if (isLink(value)) {
      links.add(normalizeLink(value));
      continue;
    }
    if (Array.isArray(value) && value.length > 0 && value.every(isLink)) {
      value.forEach((link) => links.add(normalizeLink(link)));
      continue;
    }
    const field = toFieldValue(value);
    if (field !== null) {
      fields[key] = field;
    }
  }
  return { fields, links };
}

export function saucenaoLinks(rawPayload: unknown): Set<string> {
  const parsed = sauceNaoPayloadSchema.safeParse(rawPayload);
  if (!parsed.success) return new Set();
  const links = new Set<string>([parsed.data.search_link]);
  const extUrls = parsed.data.data.ext_urls;
  if (Array.isArray(extUrls)) {
    extUrls.filter(isLink).forEach((link) => links.add(normalizeLink(link)));
  }
  splitFields(parsed.data.data, ["ext_urls"]).links.forEach((link) => links.add(link));
  return links;
}

export function iqdbLinks(rawPayload: unknown): Set<string> {
  const parsed = iqdbPayloadSchema.safeParse(rawPayload);
  if (!parsed.success) return new Set();
  return new Set([parsed.data.post_link, parsed.data.search_link].filter(isLink));
}

export function genericLinks(rawPayload: unknown): Set<string> {
  return isRecord(rawPayload) ? splitFields(rawPayload).links : new Set();
}

/**
 * Every link the search engine already reported for this hit. Specific
 * providers merge these into their own extra links.
 */
export function recoverLinks(request: ProviderRequest): Set<string> {
  switch (request.searchProvider) {
    case "saucenao":
      return saucenaoLinks(request.rawPayload);
    case "iqdb":
      return iqdbLinks(request.rawPayload);
    default:
      return genericLinks(request.rawPayload);
  }
}

function fallbackPriorityKey(request: ProviderRequest): string {
  return request.platform !== "unknown" ? request.platform : String(request.platformId);
}

/** SauceNAO records carry their own metadata; use it as is. */
export const saucenaoGeneric: ProviderFunction = async (request) => {
  const parsed = sauceNaoPayloadSchema.safeParse(request.rawPayload);
  if (!parsed.success) {
    logger.debug(`[${request.platformId}].saucenao_generic: payload is not a SauceNAO record`);
    return null;
  }
  const { header, data, search_link } = parsed.data;
  const { fields } = splitFields(data, ["ext_urls"]);

  return {
    priorityKey: fallbackPriorityKey(request),
    providerId: providerIdOf(request),
    providerLink: search_link,
    mainFiles: header.thumbnail ? [header.thumbnail] : [],
    fields,
    extraLinks: saucenaoLinks(request.rawPayload),
  };
};

export const iqdbGeneric: ProviderFunction = async (request) => {
  const parsed = iqdbPayloadSchema.safeParse(request.rawPayload);
  if (!parsed.success) {
    logger.debug(`[${request.platformId}].iqdb_generic: payload is not an IQDB match`);
    return null;
  }
  const payload = parsed.data;
  const fields: Record<string, FieldValue> = { size: payload.size, nsfw: payload.nsfw };
  if (payload.service) {
    fields.service = payload.service;
  }

  return {
    priorityKey: fallbackPriorityKey(request),
    providerId: providerIdOf(request),
    providerLink: payload.post_link,
    mainFiles: payload.thumbnail_src ? [payload.thumbnail_src] : [],
    fields,
    extraLinks: new Set([payload.search_link]),
  };
};

/**
 * Last resort for payloads no other step understood: keep the flat scalar
 * values as fields and the links as extra links.
 */
export const generic: ProviderFunction = async (request) => {
  if (!isRecord(request.rawPayload)) return null;
  const { fields, links } = splitFields(request.rawPayload, ["search_link"]);
  const searchLink = request.rawPayload.search_link;
  if (Object.keys(fields).length === 0 && links.size === 0) return null;

  const [firstLink] = links;
  return {
    priorityKey: fallbackPriorityKey(request),
    providerId: providerIdOf(request),
    providerLink: isLink(searchLink) ? searchLink : firstLink ?? "",
    mainFiles: [],
    fields,
    extraLinks: links,
  };
};

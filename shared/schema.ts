import { z } from "zod";

// Search engines that can be queried with an image URL
export const SEARCH_PROVIDERS = ["saucenao", "iqdb"] as const;
export type SearchProviderName = (typeof SEARCH_PROVIDERS)[number];

// Display names used in user settings and the settings API
export const ENGINE_NAMES: Record<SearchProviderName, string> = {
  saucenao: "SauceNAO",
  iqdb: "IQDB",
};

export const PLATFORMS = [
  "danbooru",
  "gelbooru",
  "yandere",
  "konachan",
  "sankaku",
  "zerochan",
  "3dbooru",
  "eshuushuu",
  "e621",
  "pixiv",
  "twitter",
  "deviantart",
  "artstation",
  "patreon",
  "mangadex",
  "mangaupdates",
  "myanimelist",
  "anidb",
  "anilist",
  "imdb",
  "unknown",
] as const;
export type Platform = (typeof PLATFORMS)[number];

/**
 * One unresolved candidate match reported by a search engine.
 */
export interface SearchHit {
  searchProvider: SearchProviderName;
  platform: Platform;
  platformId: string | number;
  similarity: number; // 0-100, -1 when the engine reports none
  rawPayload: unknown;
  searchLink: string;
}

/**
 * Dedup and cache key of a hit. Unclassified hits are namespaced by the engine
 * that reported them.
 */
export function providerIdOf(hit: Pick<SearchHit, "searchProvider" | "platform" | "platformId">): string {
  if (hit.platform === "unknown") {
    return `${hit.searchProvider}:${hit.platformId}`;
  }
  return `${hit.platform}:${hit.platformId}`;
}

export const fieldValueSchema = z.union([z.string(), z.array(z.string()), z.boolean()]);
export type FieldValue = z.infer<typeof fieldValueSchema>;

/**
 * Enriched source record.
 */
export interface ProviderData {
  priorityKey: string;
  providerId: string;
  providerLink: string;
  mainFiles: string[];
  fields: Record<string, FieldValue>;
  extraLinks: Set<string>;
}

// Cached form, kept snake_case so rows written by older workers stay readable
export const providerDataWireSchema = z.object({
  priority_key: z.string(),
  provider_id: z.string().min(1),
  provider_link: z.string(),
  main_files: z.array(z.string()),
  fields: z.record(fieldValueSchema).default({}),
  extra_links: z.array(z.string()).default([]),
});
export type ProviderDataWire = z.infer<typeof providerDataWireSchema>;

export function toProviderDataWire(data: ProviderData): ProviderDataWire {
  return {
    priority_key: data.priorityKey,
    provider_id: data.providerId,
    provider_link: data.providerLink,
    main_files: [...data.mainFiles],
    fields: { ...data.fields },
    extra_links: Array.from(data.extraLinks).sort(),
  };
}

export function fromProviderDataWire(wire: ProviderDataWire): ProviderData {
  return {
    priorityKey: wire.priority_key,
    providerId: wire.provider_id,
    providerLink: wire.provider_link,
    mainFiles: wire.main_files,
    fields: wire.fields,
    extraLinks: new Set(wire.extra_links),
  };
}

export function serializeProviderData(data: ProviderData): string {
  return JSON.stringify(toProviderDataWire(data));
}

/**
 * Throws when the text is not JSON or does not have the cached shape.
 */
export function parseProviderData(json: string): ProviderData {
  const raw: unknown = JSON.parse(json);
  return fromProviderDataWire(providerDataWireSchema.parse(raw));
}

// API request schemas
export const searchRequestSchema = z.object({
  imageUrl: z.string().url(),
  imageId: z.string().min(1).max(128).optional(),
  userId: z.string().regex(/^\d+$/, "userId must be numeric").optional(),
});
export type SearchRequest = z.infer<typeof searchRequestSchema>;

export const userSettingsPatchSchema = z
  .object({
    enabledEngines: z.array(z.string()).min(1, "at least one search engine must stay enabled").optional(),
    cacheEnabled: z.boolean().optional(),
    bestResultsOnly: z.boolean().optional(),
  })
  .strict();
export type UserSettingsPatch = z.infer<typeof userSettingsPatchSchema>;

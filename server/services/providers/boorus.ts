import { z } from "zod";
import { providerIdOf } from "@shared/schema";
import { toTransportError } from "../../lib/http";
import { createLogger } from "../../lib/logger";
import { TransportError } from "../errors";
import { isLink, recoverLinks } from "./generic";
import type { ProviderContext, ProviderFunction, ProviderRequest } from "./types";

const logger = createLogger("ris.providers.boorus");

const optionalText = z.string().nullish();

const danbooruPostSchema = z
  .object({
    tag_string_artist: optionalText,
    tag_string_character: optionalText,
    tag_string_copyright: optionalText,
    tag_string_general: optionalText,
    rating: optionalText,
    file_url: optionalText,
    preview_file_url: optionalText,
    source: optionalText,
  })
  .passthrough();

// Gelbooru, Moebooru (yande.re, konachan) and 3dbooru share this post shape
const simplePostSchema = z
  .object({
    tags: optionalText,
    rating: optionalText,
    file_url: optionalText,
    jpeg_url: optionalText,
    sample_url: optionalText,
    preview_url: optionalText,
    source: optionalText,
  })
  .passthrough();
type SimplePost = z.infer<typeof simplePostSchema>;

const gelbooruResponseSchema = z.object({ post: z.array(simplePostSchema).optional() }).passthrough();

const zerochanPostSchema = z
  .object({
    tags: z.array(z.string()).optional(),
    full: optionalText,
    large: optionalText,
    medium: optionalText,
    small: optionalText,
    source: optionalText,
  })
  .passthrough();

export function splitTags(value: string | null | undefined): string[] {
  return (value ?? "").split(" ").filter((tag) => tag !== "");
}

function isNsfw(rating: string | null | undefined): boolean {
  const first = (rating ?? "").trim().charAt(0).toLowerCase();
  return first === "e" || first === "q";
}

function firstFile(...candidates: Array<string | null | undefined>): string[] {
  const file = candidates.find((candidate): candidate is string => typeof candidate === "string" && candidate !== "");
  return file ? [file] : [];
}

/**
 * The post's own source link plus everything the search engine reported.
 */
function extraLinksFor(request: ProviderRequest, source: string | null | undefined): Set<string> {
  const links = recoverLinks(request);
  if (isLink(source)) {
    links.add(source);
  }
  return links;
}

async function fetchJson<T extends z.ZodTypeAny>(
  target: string,
  url: string,
  schema: T,
  context: ProviderContext,
  headers: Record<string, string> = {},
): Promise<z.infer<T>> {
  let body: unknown;
  try {
    const response = await context.http.get<unknown>(url, { headers, signal: context.signal });
    body = response.data;
  } catch (error) {
    throw toTransportError(target, error);
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new TransportError(target, `unexpected response from ${url}`);
  }
  return parsed.data;
}

export const danbooru: ProviderFunction = async (request, context) => {
  const id = request.platformId;
  logger.debug(`[${id}].danbooru: fetching post`);
  const post = await fetchJson("danbooru", `https://danbooru.donmai.us/posts/${id}.json`, danbooruPostSchema, context);

  return {
    priorityKey: "danbooru",
    providerId: providerIdOf(request),
    providerLink: `https://danbooru.donmai.us/posts/${id}`,
    mainFiles: firstFile(post.file_url, post.preview_file_url),
    fields: {
      authors: splitTags(post.tag_string_artist),
      characters: splitTags(post.tag_string_character),
      tags: splitTags(post.tag_string_general),
      copyrights: splitTags(post.tag_string_copyright),
      nsfw: isNsfw(post.rating),
    },
    extraLinks: extraLinksFor(request, post.source),
  };
};

export const gelbooru: ProviderFunction = async (request, context) => {
  const id = request.platformId;
  logger.debug(`[${id}].gelbooru: fetching post`);
  const response = await fetchJson(
    "gelbooru",
    `https://gelbooru.com/index.php?page=dapi&s=post&q=index&json=1&id=${id}`,
    gelbooruResponseSchema,
    context,
  );
  const post = response.post?.[0];
  if (!post) {
    logger.debug(`[${id}].gelbooru: no data`);
    return null;
  }

  return {
    priorityKey: "gelbooru",
    providerId: providerIdOf(request),
    providerLink: `https://gelbooru.com/index.php?page=post&s=view&id=${id}`,
    mainFiles: firstFile(post.file_url, post.sample_url, post.preview_url),
    fields: { tags: splitTags(post.tags), nsfw: isNsfw(post.rating) },
    extraLinks: extraLinksFor(request, post.source),
  };
};

interface MoebooruSite {
  name: string;
  priorityKey: string;
  apiUrl: (id: string | number) => string;
  postUrl: (id: string | number) => string;
  files: (post: SimplePost) => string[];
  browserHeaders?: boolean;
}

function moebooru(site: MoebooruSite): ProviderFunction {
  const postsSchema = z.array(simplePostSchema);
  return async (request, context) => {
    const id = request.platformId;
    logger.debug(`[${id}].${site.name}: fetching post`);
    const headers: Record<string, string> = site.browserHeaders ? { "User-Agent": context.browserUserAgent } : {};
    const [post] = await fetchJson(site.name, site.apiUrl(id), postsSchema, context, headers);
    if (!post) {
      logger.debug(`[${id}].${site.name}: no data`);
      return null;
    }

    return {
      priorityKey: site.priorityKey,
      providerId: providerIdOf(request),
      providerLink: site.postUrl(id),
      mainFiles: site.files(post),
      fields: { tags: splitTags(post.tags), nsfw: isNsfw(post.rating) },
      extraLinks: extraLinksFor(request, post.source),
    };
  };
}

export const yandere = moebooru({
  name: "yandere",
  priorityKey: "yandere",
  apiUrl: (id) => `https://yande.re/post.json?tags=id:${id}`,
  postUrl: (id) => `https://yande.re/post/show/${id}`,
  files: (post) => firstFile(post.file_url, post.jpeg_url, post.sample_url, post.preview_url),
});

export const konachan = moebooru({
  name: "konachan",
  priorityKey: "konachan",
  apiUrl: (id) => `https://konachan.com/post.json?tags=id:${id}`,
  postUrl: (id) => `https://konachan.com/post/show/${id}`,
  files: (post) => firstFile(post.file_url, post.jpeg_url, post.sample_url, post.preview_url),
});

// The full size files on 3dbooru are placeholder images for crawlers
export const threedbooru = moebooru({
  name: "3dbooru",
  priorityKey: "3dbooru",
  apiUrl: (id) => `http://behoimi.org/post/index.json?tags=id:${id}`,
  postUrl: (id) => `http://behoimi.org/post/show/${id}`,
  files: (post) => firstFile(post.preview_url),
  browserHeaders: true,
});

export const zerochan: ProviderFunction = async (request, context) => {
  const id = request.platformId;
  logger.debug(`[${id}].zerochan: fetching post`);
  const post = await fetchJson("zerochan", `https://www.zerochan.net/${id}?json`, zerochanPostSchema, context, {
    "User-Agent": context.browserUserAgent,
  });

  return {
    priorityKey: "zerochan",
    providerId: providerIdOf(request),
    providerLink: `https://www.zerochan.net/${id}`,
    mainFiles: firstFile(post.full, post.large, post.medium, post.small),
    fields: { tags: post.tags ?? [], nsfw: false },
    extraLinks: extraLinksFor(request, post.source),
  };
};

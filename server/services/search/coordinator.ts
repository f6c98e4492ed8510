import pLimit from "p-limit";
import { providerIdOf, type ProviderData, type SearchHit } from "@shared/schema";
import { isAbortError } from "../../lib/http";
import { createLogger } from "../../lib/logger";
import type { ResultStore } from "../cache/result-store";
import type { SearchEngineAdapter } from "../engines/types";
import { CacheUnavailableError, errorMessage } from "../errors";
import type { ProviderRequest } from "../providers/types";
import type { UserSettings } from "../settings";
import { Channel } from "./channel";
import { filterByPriority } from "./priority";

const logger = createLogger("ris.search");

export interface ProviderResolving {
  resolve(request: ProviderRequest, signal?: AbortSignal): Promise<ProviderData | null>;
}

export type SearchSettings = Pick<UserSettings, "enabledEngines" | "cacheEnabled" | "bestResultsOnly">;

export interface SearchStats {
  hits: number;
  duplicates: number;
  cacheHits: number;
  resolved: number;
  failedAdapters: number;
  failedResolutions: number;
  results: number;
  /** Answered from the image cache (replay or negative marker) without searching. */
  fromCache: boolean;
  durationMs: number;
}

export interface SearchOptions {
  signal?: AbortSignal;
  /** Stop after this many results. Defaults to the coordinator's limit. */
  maxResults?: number;
  /** Called once the search ends, however it ends. */
  onStats?: (stats: SearchStats) => void;
}

export interface SearchCoordinatorOptions {
  engines: readonly SearchEngineAdapter[];
  resolver: ProviderResolving;
  results: ResultStore;
  resolverConcurrency: number;
  hitChannelCapacity: number;
  maxResults: number;
}

function emptyStats(): SearchStats {
  return {
    hits: 0,
    duplicates: 0,
    cacheHits: 0,
    resolved: 0,
    failedAdapters: 0,
    failedResolutions: 0,
    results: 0,
    fromCache: false,
    durationMs: 0,
  };
}

/**
 * Per-search cache switch. The first CacheUnavailableError turns caching off
 * for the rest of the search; any other error is rethrown.
 */
class SearchCache {
  constructor(
    private enabled: boolean,
    private readonly logPrefix: string,
  ) {}

  get isEnabled(): boolean {
    return this.enabled;
  }

  async attempt<T>(operation: () => Promise<T>): Promise<T | undefined> {
    if (!this.enabled) return undefined;
    try {
      return await operation();
    } catch (error) {
      if (!(error instanceof CacheUnavailableError)) {
        throw error;
      }
      logger.warn(`${this.logPrefix} cache unavailable, continuing without cache: ${error.message}`);
      this.enabled = false;
      return undefined;
    }
  }
}

/**
 * Runs one image search: cache check, concurrent engine queries, dedup of
 * their hits, bounded resolution of every unique hit and caching of each
 * result as it is handed to the caller.
 */
export class SearchCoordinator {
  private readonly engines: readonly SearchEngineAdapter[];
  private readonly resolver: ProviderResolving;
  private readonly results: ResultStore;
  private readonly resolverConcurrency: number;
  private readonly hitChannelCapacity: number;
  private readonly maxResults: number;

  constructor(options: SearchCoordinatorOptions) {
    this.engines = options.engines;
    this.resolver = options.resolver;
    this.results = options.results;
    this.resolverConcurrency = options.resolverConcurrency;
    this.hitChannelCapacity = options.hitChannelCapacity;
    this.maxResults = options.maxResults;
  }

  get engineNames(): string[] {
    return this.engines.map((engine) => engine.displayName);
  }

  async *search(
    imageUrl: string,
    imageId: string,
    settings: SearchSettings,
    options: SearchOptions = {},
  ): AsyncGenerator<ProviderData, void, undefined> {
    const logPrefix = `[${imageId}].search:`;
    const startedAt = Date.now();
    const stats = emptyStats();
    const maxResults = options.maxResults ?? this.maxResults;
    const cache = new SearchCache(settings.cacheEnabled, logPrefix);
    logger.info(`${logPrefix} starting search`);
    options.signal?.throwIfAborted();

    try {
      const notFound = await cache.attempt(() => this.results.isImageMarkedAsNotFound(imageId));
      if (notFound) {
        logger.debug(`${logPrefix} image is marked as not found`);
        stats.fromCache = true;
        return;
      }
      const cached = await cache.attempt(() => this.results.getCachedProviderDataByImage(imageId));
      if (cached && cached.length > 0) {
        logger.debug(`${logPrefix} image is cached`);
        stats.fromCache = true;
        const replay = settings.bestResultsOnly ? filterByPriority(cached) : cached;
        for (const item of replay.slice(0, maxResults)) {
          stats.results++;
          yield item;
        }
        return;
      }

      yield* this.runPipeline(imageUrl, imageId, settings, cache, stats, maxResults, options.signal);
    } finally {
      stats.durationMs = Date.now() - startedAt;
      logger.info(
        `${logPrefix} finished: results=${stats.results} hits=${stats.hits} duplicates=${stats.duplicates} ` +
          `cacheHits=${stats.cacheHits} resolved=${stats.resolved} failedAdapters=${stats.failedAdapters} ` +
          `failedResolutions=${stats.failedResolutions} ${stats.durationMs}ms`,
      );
      options.onStats?.(stats);
    }
  }

  private async *runPipeline(
    imageUrl: string,
    imageId: string,
    settings: SearchSettings,
    cache: SearchCache,
    stats: SearchStats,
    maxResults: number,
    outerSignal?: AbortSignal,
  ): AsyncGenerator<ProviderData, void, undefined> {
    const logPrefix = `[${imageId}].search:`;
    const controller = new AbortController();
    const onAbort = () => controller.abort(outerSignal?.reason);
    outerSignal?.addEventListener("abort", onAbort, { once: true });
    const signal = controller.signal;

    const hits = new Channel<SearchHit>(this.hitChannelCapacity);
    const resolved = new Channel<ProviderData>(this.hitChannelCapacity);

    const engines = this.engines.filter((engine) => settings.enabledEngines.has(engine.displayName));
    logger.debug(`${logPrefix} querying ${engines.map((engine) => engine.name).join(", ") || "no engines"}`);

    // Hits channel closes once every engine has finished, failed or not
    void Promise.allSettled(engines.map((engine) => this.pump(engine, imageUrl, imageId, hits, stats, signal))).then(
      () => hits.close(),
    );
    const merged = this.merge(imageId, hits, resolved, cache, stats, signal).then(
      () => null,
      (error: unknown) => ({ error }),
    );
    void merged.then(() => resolved.close());

    const deferred: ProviderData[] = [];
    let found = 0;
    try {
      for await (const item of resolved) {
        if (signal.aborted) break;
        await cache.attempt(() => this.results.cacheProviderData(imageId, item));
        found++;
        if (settings.bestResultsOnly) {
          logger.debug(`${logPrefix} deferring ${item.providerId} for best results only`);
          deferred.push(item);
          continue;
        }
        stats.results++;
        yield item;
        if (stats.results >= maxResults) {
          logger.debug(`${logPrefix} reached the limit of ${maxResults} results`);
          controller.abort();
          break;
        }
      }
      if (signal.aborted) {
        // Leaving the loop early closed `resolved`; stop the engines' side too
        hits.close();
      }

      const outcome = await merged;
      if (outcome) {
        throw outcome.error;
      }
      outerSignal?.throwIfAborted();

      if (settings.bestResultsOnly && deferred.length > 0) {
        const best = filterByPriority(deferred).slice(0, maxResults);
        logger.debug(`${logPrefix} best results only: before=${deferred.length} after=${best.length}`);
        for (const item of best) {
          stats.results++;
          yield item;
        }
      }

      if (found === 0) {
        logger.debug(`${logPrefix} nothing found`);
        await cache.attempt(() => this.results.markImageAsNotFound(imageId));
      }
    } finally {
      controller.abort();
      outerSignal?.removeEventListener("abort", onAbort);
      hits.close();
      resolved.close();
    }
  }

  /**
   * Relay one engine's hits into the shared channel. Failures are counted and
   * logged; they never reach the other engines.
   */
  private async pump(
    engine: SearchEngineAdapter,
    imageUrl: string,
    imageId: string,
    hits: Channel<SearchHit>,
    stats: SearchStats,
    signal: AbortSignal,
  ): Promise<void> {
    try {
      for await (const hit of engine.search(imageUrl, imageId, signal)) {
        if (!(await hits.send(hit))) {
          break;
        }
      }
    } catch (error) {
      if (isAbortError(error, signal)) {
        return;
      }
      stats.failedAdapters++;
      logger.error(`[${imageId}].search: engine '${engine.name}' failed: ${errorMessage(error)}`);
    }
  }

  private async merge(
    imageId: string,
    hits: Channel<SearchHit>,
    resolved: Channel<ProviderData>,
    cache: SearchCache,
    stats: SearchStats,
    signal: AbortSignal,
  ): Promise<void> {
    const logPrefix = `[${imageId}].merge:`;
    const limit = pLimit(this.resolverConcurrency);
    const seen = new Set<string>();
    const tasks: Promise<void>[] = [];

    try {
      for await (const hit of hits) {
        stats.hits++;
        const providerId = providerIdOf(hit);
        if (seen.has(providerId)) {
          stats.duplicates++;
          logger.debug(`${logPrefix} ${providerId} already seen`);
          continue;
        }
        seen.add(providerId);

        const [cached] = (await cache.attempt(() => this.results.getCachedProviderData([providerId]))) ?? [];
        if (cached) {
          stats.cacheHits++;
          logger.debug(`${logPrefix} ${providerId} cached`);
          await resolved.send(cached);
          continue;
        }

        logger.debug(`${logPrefix} ${providerId} resolving`);
        tasks.push(limit(() => this.resolveHit(imageId, hit, resolved, stats, signal)));
      }
    } finally {
      await Promise.allSettled(tasks);
    }
  }

  private async resolveHit(
    imageId: string,
    hit: SearchHit,
    resolved: Channel<ProviderData>,
    stats: SearchStats,
    signal: AbortSignal,
  ): Promise<void> {
    if (signal.aborted) return;
    try {
      const data = await this.resolver.resolve(hit, signal);
      if (!data) {
        stats.failedResolutions++;
        return;
      }
      stats.resolved++;
      await resolved.send(data);
    } catch (error) {
      if (isAbortError(error, signal)) return;
      stats.failedResolutions++;
      logger.warn(`[${imageId}].resolve: ${providerIdOf(hit)} failed: ${errorMessage(error)}`);
    }
  }
}

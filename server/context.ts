import type { AxiosInstance } from "axios";
import type { AppConfig } from "./config";
import { createHttpClient } from "./lib/http";
import { createLogger } from "./lib/logger";
import { RedisCacheBackend, type ICacheBackend } from "./services/cache/backend";
import { MemoryCacheBackend } from "./services/cache/memory-backend";
import { ResultStore } from "./services/cache/result-store";
import { TypedCacheStore } from "./services/cache/typed-store";
import { createSearchEngines, type SearchEngineAdapter } from "./services/engines";
import { errorMessage } from "./services/errors";
import { ProviderResolver } from "./services/providers";
import { SearchCoordinator } from "./services/search/coordinator";
import { UserSettingsRepository } from "./services/settings";

const logger = createLogger("ris.context");

/**
 * Long-lived services shared by every request.
 */
export interface AppContext {
  config: AppConfig;
  http: AxiosInstance;
  cache: ICacheBackend;
  store: TypedCacheStore;
  results: ResultStore;
  settings: UserSettingsRepository;
  engines: readonly SearchEngineAdapter[];
  resolver: ProviderResolver;
  coordinator: SearchCoordinator;
  close(): Promise<void>;
}

export interface AppContextOverrides {
  cache?: ICacheBackend;
  http?: AxiosInstance;
  engines?: readonly SearchEngineAdapter[];
}

async function createCacheBackend(config: AppConfig): Promise<ICacheBackend> {
  if (!config.redis) {
    logger.warn("Redis is not configured, using the in-memory cache; results are lost on restart");
    return new MemoryCacheBackend();
  }
  const backend = new RedisCacheBackend(config.redis);
  try {
    await backend.connect();
  } catch (error) {
    // Searches still run; every cache call degrades until the client reconnects
    logger.error(`Redis unavailable at startup: ${errorMessage(error)}`);
  }
  return backend;
}

export async function createAppContext(config: AppConfig, overrides: AppContextOverrides = {}): Promise<AppContext> {
  const http = overrides.http ?? createHttpClient({ timeoutMs: config.http.timeoutMs, userAgent: config.http.userAgent });
  const cache = overrides.cache ?? (await createCacheBackend(config));
  const store = new TypedCacheStore(cache);
  const results = new ResultStore(cache, config.search.notFoundTtlSeconds);
  const engines = overrides.engines ?? createSearchEngines(http, config);
  const resolver = new ProviderResolver({ http, browserUserAgent: config.http.browserUserAgent });
  const coordinator = new SearchCoordinator({
    engines,
    resolver,
    results,
    resolverConcurrency: config.search.resolverConcurrency,
    hitChannelCapacity: config.search.hitChannelCapacity,
    maxResults: config.search.maxResults,
  });

  return {
    config,
    http,
    cache,
    store,
    results,
    settings: new UserSettingsRepository(store),
    engines,
    resolver,
    coordinator,
    close: () => cache.close(),
  };
}

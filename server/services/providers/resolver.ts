import type { AxiosInstance } from "axios";
import { providerIdOf, type ProviderData } from "@shared/schema";
import { isAbortError } from "../../lib/http";
import { createLogger } from "../../lib/logger";
import { errorMessage } from "../errors";
import { danbooru, gelbooru, konachan, threedbooru, yandere, zerochan } from "./boorus";
import { eshuushuu } from "./eshuushuu";
import { generic, iqdbGeneric, saucenaoGeneric } from "./generic";
import type { ProviderFunction, ProviderRequest } from "./types";

const logger = createLogger("ris.providers");

export const SPECIFIC_PROVIDERS: ReadonlyMap<string, ProviderFunction> = new Map([
  ["danbooru", danbooru],
  ["gelbooru", gelbooru],
  ["yandere", yandere],
  ["konachan", konachan],
  ["zerochan", zerochan],
  ["3dbooru", threedbooru],
  ["eshuushuu", eshuushuu],
]);

export const ENGINE_GENERIC_PROVIDERS: ReadonlyMap<string, ProviderFunction> = new Map([
  ["saucenao", saucenaoGeneric],
  ["iqdb", iqdbGeneric],
]);

export interface ProviderRegistry {
  specific: ReadonlyMap<string, ProviderFunction>;
  engineGeneric: ReadonlyMap<string, ProviderFunction>;
  fallback: ProviderFunction;
}

export const DEFAULT_PROVIDER_REGISTRY: ProviderRegistry = {
  specific: SPECIFIC_PROVIDERS,
  engineGeneric: ENGINE_GENERIC_PROVIDERS,
  fallback: generic,
};

export interface ProviderResolverOptions {
  http: AxiosInstance;
  browserUserAgent: string;
  registry?: ProviderRegistry;
}

/**
 * Turns a hit into a ProviderData by trying, in order, the provider for its
 * platform, the generic extractor of the engine that found it and the fully
 * generic extractor. A step that fails is logged and the next one runs.
 */
export class ProviderResolver {
  private readonly http: AxiosInstance;
  private readonly browserUserAgent: string;
  private readonly registry: ProviderRegistry;

  constructor(options: ProviderResolverOptions) {
    this.http = options.http;
    this.browserUserAgent = options.browserUserAgent;
    this.registry = options.registry ?? DEFAULT_PROVIDER_REGISTRY;
  }

  async resolve(request: ProviderRequest, signal?: AbortSignal): Promise<ProviderData | null> {
    const logPrefix = `[${providerIdOf(request)}].resolve:`;
    const chain: Array<[string, ProviderFunction | undefined]> = [
      [request.platform, this.registry.specific.get(request.platform)],
      [`${request.searchProvider}_generic`, this.registry.engineGeneric.get(request.searchProvider)],
      ["generic", this.registry.fallback],
    ];
    const context = { http: this.http, browserUserAgent: this.browserUserAgent, signal };

    for (const [name, provider] of chain) {
      if (!provider) continue;
      signal?.throwIfAborted();
      try {
        const result = await provider(request, context);
        if (result) {
          logger.debug(`${logPrefix} provider '${name}' provided data`);
          return result;
        }
        logger.debug(`${logPrefix} provider '${name}' returned nothing`);
      } catch (error) {
        if (isAbortError(error, signal)) {
          throw error;
        }
        logger.warn(`${logPrefix} provider '${name}' failed: ${errorMessage(error)}`);
      }
    }

    logger.warn(`${logPrefix} no provider could resolve platform '${request.platform}'`);
    return null;
  }
}

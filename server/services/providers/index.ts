export {
  DEFAULT_PROVIDER_REGISTRY,
  ENGINE_GENERIC_PROVIDERS,
  ProviderResolver,
  SPECIFIC_PROVIDERS,
  type ProviderRegistry,
  type ProviderResolverOptions,
} from "./resolver";
export type { ProviderContext, ProviderFunction, ProviderRequest } from "./types";

import type { AxiosInstance } from "axios";
import type { ProviderData, SearchHit } from "@shared/schema";

/** The part of a hit a provider needs to look up its source item. */
export type ProviderRequest = Pick<SearchHit, "searchProvider" | "platform" | "platformId" | "rawPayload">;

export interface ProviderContext {
  http: AxiosInstance;
  /** Some boards reject anything that does not look like a browser. */
  browserUserAgent: string;
  signal?: AbortSignal;
}

/**
 * Turns a hit into a full record. `null` means the provider has nothing for
 * this hit; network failures are thrown.
 */
export type ProviderFunction = (request: ProviderRequest, context: ProviderContext) => Promise<ProviderData | null>;

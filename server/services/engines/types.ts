import type { SearchHit, SearchProviderName } from "@shared/schema";

/**
 * A reverse image search backend. Each call to `search` issues a fresh query
 * and yields the hits it could classify, in no particular order.
 */
export interface SearchEngineAdapter {
  readonly name: SearchProviderName;
  /** Name shown to users and stored in their enabled-engines setting. */
  readonly displayName: string;

  search(imageUrl: string, imageId: string, signal?: AbortSignal): AsyncIterable<SearchHit>;
}

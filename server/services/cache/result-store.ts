import { parseProviderData, serializeProviderData, type ProviderData } from "@shared/schema";
import { createLogger } from "../../lib/logger";
import { TypeMismatchError, errorMessage } from "../errors";
import type { ICacheBackend } from "./backend";

const logger = createLogger("ris.cache.results");

export const PROVIDER_RESULT_PREFIX = "ris:provider_result:";
export const IMAGE_LINK_PREFIX = "ris:image_to_provider_result_link:";
export const NOT_FOUND_PREFIX = "ris:no_found:";

/**
 * Positive and negative search outcomes, keyed by provider id and image id.
 */
export class ResultStore {
  constructor(
    private readonly backend: ICacheBackend,
    private readonly notFoundTtlSeconds: number,
  ) {}

  /**
   * Store provider data under its own id and link it to the image it was found for
   */
  async cacheProviderData(imageId: string, data: ProviderData): Promise<void> {
    await this.backend.set(PROVIDER_RESULT_PREFIX + data.providerId, serializeProviderData(data));
    await this.backend.sAdd(IMAGE_LINK_PREFIX + imageId, [data.providerId]);
  }

  /**
   * Cached provider data for the given ids; ids without a row are skipped.
   */
  async getCachedProviderData(providerIds: string[]): Promise<ProviderData[]> {
    if (providerIds.length === 0) return [];
    const keys = providerIds.map((id) => PROVIDER_RESULT_PREFIX + id);
    const rows = await this.backend.mGet(keys);
    const results: ProviderData[] = [];
    rows.forEach((row, index) => {
      if (row === null) return;
      try {
        results.push(parseProviderData(row));
      } catch (error) {
        throw new TypeMismatchError(keys[index], `cached provider data is corrupt: ${errorMessage(error)}`);
      }
    });
    return results;
  }

  async getProviderIdsByImage(imageId: string): Promise<string[]> {
    return this.backend.sMembers(IMAGE_LINK_PREFIX + imageId);
  }

  async getCachedProviderDataByImage(imageId: string): Promise<ProviderData[]> {
    const ids = await this.getProviderIdsByImage(imageId);
    return this.getCachedProviderData(ids.sort());
  }

  async markImageAsNotFound(imageId: string): Promise<void> {
    await this.backend.set(NOT_FOUND_PREFIX + imageId, "1", { ttlSeconds: this.notFoundTtlSeconds });
  }

  async isImageMarkedAsNotFound(imageId: string): Promise<boolean> {
    return this.backend.exists(NOT_FOUND_PREFIX + imageId);
  }

  /**
   * Drop every negative marker. Returns the number of removed keys.
   */
  async clearNotFoundCache(): Promise<number> {
    const keys = await this.backend.keys(`${NOT_FOUND_PREFIX}*`);
    const removed = await this.backend.del(keys);
    logger.info(`Cleared ${removed} not-found markers`);
    return removed;
  }

  /**
   * Drop every cached provider result and the image links pointing at them.
   */
  async clearProviderDataCache(): Promise<number> {
    const [results, links] = await Promise.all([
      this.backend.keys(`${PROVIDER_RESULT_PREFIX}*`),
      this.backend.keys(`${IMAGE_LINK_PREFIX}*`),
    ]);
    const removed = await this.backend.del([...results, ...links]);
    logger.info(`Cleared ${results.length} provider results and ${links.length} image links`);
    return removed;
  }
}

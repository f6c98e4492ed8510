import type { ProviderData } from "@shared/schema";

// Lower is better; anything not listed ranks below every listed platform
export const PRIORITIZED_PROVIDERS: Readonly<Record<string, number>> = {
  danbooru: 0,
  zerochan: 0,
  pixiv: 20,
  "3dbooru": 20,
  twitter: 20,
  yandere: 30,
  gelbooru: 30,
  konachan: 30,
  eshuushuu: 30,
};

const DEFAULT_PRIORITY = Math.max(...Object.values(PRIORITIZED_PROVIDERS)) + 10;

export function priorityOf(priorityKey: string): number {
  return Object.hasOwn(PRIORITIZED_PROVIDERS, priorityKey) ? PRIORITIZED_PROVIDERS[priorityKey] : DEFAULT_PRIORITY;
}

/**
 * Keep only the results of the best ranked platforms, one per priority key.
 * Among results sharing a key the one with the most extra links wins.
 */
export function filterByPriority(results: readonly ProviderData[]): ProviderData[] {
  if (results.length === 0) {
    return [];
  }
  const best = Math.min(...results.map((result) => priorityOf(result.priorityKey)));
  const candidates = results
    .filter((result) => priorityOf(result.priorityKey) === best)
    .sort((a, b) => b.extraLinks.size - a.extraLinks.size || a.priorityKey.localeCompare(b.priorityKey));

  const seen = new Set<string>();
  return candidates.filter((result) => {
    if (seen.has(result.priorityKey)) {
      return false;
    }
    seen.add(result.priorityKey);
    return true;
  });
}

import { ENGINE_NAMES, SEARCH_PROVIDERS, userSettingsPatchSchema, type UserSettingsPatch } from "@shared/schema";
import type { CacheValue } from "./cache/codec";
import type { TypedCacheStore } from "./cache/typed-store";

export const DEFAULT_ENABLED_ENGINES: readonly string[] = SEARCH_PROVIDERS.map((name) => ENGINE_NAMES[name]);

export interface UserSettings {
  userId: number;
  enabledEngines: Set<string>;
  cacheEnabled: boolean;
  bestResultsOnly: boolean;
  broadcastMessageChatId: number | null;
  broadcastMessageId: number | null;
  searchCount: number;
}

export type UserSettingsField = Exclude<keyof UserSettings, "userId">;

// Typed key of every persisted field
const FIELD_KEYS: Record<UserSettingsField, (userId: number) => string> = {
  enabledEngines: (userId) => `ris:xs:settings:${userId}:enabled_engines`,
  cacheEnabled: (userId) => `ris:sb:settings:${userId}:cache_enabled`,
  bestResultsOnly: (userId) => `ris:sb:settings:${userId}:best_results_only`,
  broadcastMessageChatId: (userId) => `ris:si:settings:${userId}:broadcast:chat_id`,
  broadcastMessageId: (userId) => `ris:si:settings:${userId}:broadcast:message_id`,
  searchCount: (userId) => `ris:si:settings:${userId}:search_count`,
};

const FIELDS: readonly UserSettingsField[] = [
  "enabledEngines",
  "cacheEnabled",
  "bestResultsOnly",
  "broadcastMessageChatId",
  "broadcastMessageId",
  "searchCount",
];

export function settingsKey(userId: number, field: UserSettingsField): string {
  return FIELD_KEYS[field](userId);
}

export function defaultUserSettings(userId: number): UserSettings {
  return {
    userId,
    enabledEngines: new Set(DEFAULT_ENABLED_ENGINES),
    cacheEnabled: true,
    bestResultsOnly: false,
    broadcastMessageChatId: null,
    broadcastMessageId: null,
    searchCount: 0,
  };
}

function stringSet(value: CacheValue | null, fallback: Set<string>): Set<string> {
  if (!(value instanceof Set)) return fallback;
  const result = new Set<string>();
  for (const member of value) {
    result.add(String(member));
  }
  return result;
}

function bool(value: CacheValue | null, fallback: boolean): boolean {
  return typeof value === "boolean" ? value : fallback;
}

function int(value: CacheValue | null, fallback: number): number;
function int(value: CacheValue | null, fallback: null): number | null;
function int(value: CacheValue | null, fallback: number | null): number | null {
  return typeof value === "number" ? value : fallback;
}

/**
 * Per-user settings persisted field by field in the typed cache. Users that
 * never saved anything read back the defaults.
 */
export class UserSettingsRepository {
  constructor(private readonly store: TypedCacheStore) {}

  async fetch(userId: number, fields: readonly UserSettingsField[] = FIELDS): Promise<UserSettings> {
    const settings = defaultUserSettings(userId);
    if (fields.length === 0) return settings;

    const keys = fields.map((field) => settingsKey(userId, field));
    const values = await this.store.mget(keys);
    fields.forEach((field, index) => {
      const value = values[index];
      switch (field) {
        case "enabledEngines":
          settings.enabledEngines = stringSet(value, settings.enabledEngines);
          break;
        case "cacheEnabled":
          settings.cacheEnabled = bool(value, settings.cacheEnabled);
          break;
        case "bestResultsOnly":
          settings.bestResultsOnly = bool(value, settings.bestResultsOnly);
          break;
        case "broadcastMessageChatId":
          settings.broadcastMessageChatId = int(value, null);
          break;
        case "broadcastMessageId":
          settings.broadcastMessageId = int(value, null);
          break;
        case "searchCount":
          settings.searchCount = int(value, 0);
          break;
      }
    });
    return settings;
  }

  /**
   * Persist the given fields. Null broadcast references are not written.
   */
  async save(settings: UserSettings, fields: readonly UserSettingsField[] = FIELDS): Promise<void> {
    for (const field of fields) {
      const key = settingsKey(settings.userId, field);
      const value = settings[field];
      if (value === null) continue;
      await this.store.set(key, value);
    }
  }

  /**
   * Apply a partial update. An empty engine list is rejected: the set it
   * would leave behind reads back as "never set".
   */
  async update(userId: number, patch: UserSettingsPatch): Promise<UserSettings> {
    userSettingsPatchSchema.parse(patch);
    const settings = await this.fetch(userId);
    const changed: UserSettingsField[] = [];
    if (patch.enabledEngines !== undefined) {
      settings.enabledEngines = new Set(patch.enabledEngines);
      changed.push("enabledEngines");
    }
    if (patch.cacheEnabled !== undefined) {
      settings.cacheEnabled = patch.cacheEnabled;
      changed.push("cacheEnabled");
    }
    if (patch.bestResultsOnly !== undefined) {
      settings.bestResultsOnly = patch.bestResultsOnly;
      changed.push("bestResultsOnly");
    }
    await this.save(settings, changed);
    return settings;
  }

  async incrementSearchCount(userId: number): Promise<number> {
    return this.store.incr(settingsKey(userId, "searchCount"));
  }
}

import { AmbiguousKeyError, InvalidKeyFormatError, KeyNotFoundError, TypeMismatchError } from "../errors";
import type { ICacheBackend } from "./backend";
import {
  KEY_NAMESPACE,
  TAG_GLOBS,
  decodeSetMembers,
  decodeStoredScalar,
  encodeScalar,
  encodeSetMembers,
  escapeGlob,
  formatKey,
  inferTag,
  parseKey,
  type CacheTag,
  type CacheValue,
  type ParsedKey,
  type SetElementType,
} from "./codec";

export interface MgetOptions {
  /** Report sets that do not exist as `null` instead of an empty set. Defaults to true. */
  markNonExistingSets?: boolean;
}

/**
 * Self-describing key/value store. Every key carries the type of its value
 * (see codec.ts), so any reader can decode a row without a schema.
 */
export class TypedCacheStore {
  constructor(private readonly backend: ICacheBackend) {}

  /**
   * Stores a value and returns the fully qualified key it was written under.
   *
   * Sets are never overwritten: the current members are read and only the
   * removed and added members are sent to the backend.
   */
  async set(key: string, value: CacheValue, setElementType: SetElementType = "string"): Promise<string> {
    const parsed = parseKey(key);
    const isSetValue = value instanceof Set;

    let tag: CacheTag;
    let qualifiedKey: string;
    if (parsed) {
      tag = parsed.tag;
      qualifiedKey = key;
      if (isSetValue !== (tag.container === "set")) {
        throw new TypeMismatchError(
          key,
          isSetValue ? `key defines a ${tag.type} scalar but value is a set` : "key defines a set but value is not a set",
        );
      }
    } else {
      tag = inferTag(value, setElementType);
      qualifiedKey = formatKey(tag, key);
    }

    if (tag.container === "set") {
      const members = value instanceof Set ? value : new Set<unknown>();
      const next = new Set(encodeSetMembers(qualifiedKey, tag.type, members));
      const current = new Set(await this.backend.sMembers(qualifiedKey));

      const toRemove = Array.from(current).filter((member) => !next.has(member));
      const toAdd = Array.from(next).filter((member) => !current.has(member));
      if (toRemove.length > 0) {
        await this.backend.sRem(qualifiedKey, toRemove);
      }
      if (toAdd.length > 0) {
        await this.backend.sAdd(qualifiedKey, toAdd);
      }
      return qualifiedKey;
    }

    await this.backend.set(qualifiedKey, encodeScalar(qualifiedKey, tag.type, value));
    return qualifiedKey;
  }

  /**
   * Reads one value. A bare key must resolve to exactly one typed key.
   * Without a fallback a missing key throws {@link KeyNotFoundError}.
   */
  async get(key: string): Promise<CacheValue>;
  async get<D>(key: string, fallback: D): Promise<CacheValue | D>;
  async get<D>(key: string, ...fallback: [] | [D]): Promise<CacheValue | D> {
    const resolved = await this.resolveKey(key);
    const value = resolved ? await this.readOne(resolved.key, resolved.parsed) : null;
    if (value !== null) {
      return value;
    }
    if (fallback.length === 1) {
      return fallback[0];
    }
    throw new KeyNotFoundError(key);
  }

  /**
   * Reads many fully qualified keys in at most two round trips: one for all set
   * keys and one for all scalar keys. Results follow input order; missing
   * scalars are `null`.
   */
  async mget(keys: string[], options: MgetOptions = {}): Promise<(CacheValue | null)[]> {
    const markNonExistingSets = options.markNonExistingSets ?? true;
    const setKeys: Array<{ index: number; key: string; parsed: ParsedKey }> = [];
    const scalarKeys: Array<{ index: number; key: string; parsed: ParsedKey }> = [];

    keys.forEach((key, index) => {
      const parsed = parseKey(key);
      if (!parsed) {
        throw new InvalidKeyFormatError(key);
      }
      (parsed.tag.container === "set" ? setKeys : scalarKeys).push({ index, key, parsed });
    });

    const values: (CacheValue | null)[] = new Array(keys.length).fill(null);

    const [setReplies, scalarReplies] = await Promise.all([
      setKeys.length > 0 ? this.backend.sMembersMany(setKeys.map((entry) => entry.key)) : Promise.resolve([]),
      scalarKeys.length > 0 ? this.backend.mGet(scalarKeys.map((entry) => entry.key)) : Promise.resolve([]),
    ]);

    setKeys.forEach((entry, position) => {
      const members = setReplies[position] ?? null;
      if (members === null) {
        values[entry.index] = markNonExistingSets ? null : new Set();
        return;
      }
      values[entry.index] = this.decode(entry.key, entry.parsed.tag, members);
    });

    scalarKeys.forEach((entry, position) => {
      const raw = scalarReplies[position] ?? null;
      values[entry.index] = raw === null ? null : this.decode(entry.key, entry.parsed.tag, raw);
    });

    return values;
  }

  async mgetDict(keys: string[], options: MgetOptions = {}): Promise<Record<string, CacheValue | null>> {
    const values = await this.mget(keys, options);
    return Object.fromEntries(keys.map((key, index) => [key, values[index]]));
  }

  /**
   * Like {@link mgetDict} but keyed by the name part, without `ris:<tag>:`.
   */
  async mgetDictShort(keys: string[], options: MgetOptions = {}): Promise<Record<string, CacheValue | null>> {
    const values = await this.mget(keys, options);
    const result: Record<string, CacheValue | null> = {};
    keys.forEach((key, index) => {
      const parsed = parseKey(key);
      if (parsed) {
        result[parsed.name] = values[index];
      }
    });
    return result;
  }

  /**
   * Finds typed keys. A bare pattern is searched under every tag.
   */
  async keys(pattern: string): Promise<string[]> {
    if (parseKey(pattern)) {
      return this.backend.keys(pattern);
    }
    const batches = await Promise.all(
      TAG_GLOBS.map((tagGlob) => this.backend.keys(`${KEY_NAMESPACE}:${tagGlob}:${pattern}`)),
    );
    const found = new Set<string>();
    for (const key of batches.flat()) {
      found.add(key);
    }
    return Array.from(found).sort();
  }

  /**
   * Increments an integer value, creating it at zero when absent.
   */
  async incr(key: string, by = 1): Promise<number> {
    const resolved = await this.resolveKey(key);
    const qualifiedKey = resolved?.key ?? formatKey({ container: "scalar", type: "int" }, key);
    const tag: CacheTag = resolved?.parsed.tag ?? { container: "scalar", type: "int" };
    if (tag.container !== "scalar" || tag.type !== "int") {
      throw new TypeMismatchError(qualifiedKey, "only integer keys can be incremented");
    }
    return this.backend.incrBy(qualifiedKey, by);
  }

  private async resolveKey(key: string): Promise<{ key: string; parsed: ParsedKey } | null> {
    const parsed = parseKey(key);
    if (parsed) {
      return { key, parsed };
    }
    const candidates = await this.keys(escapeGlob(key));
    if (candidates.length === 0) {
      return null;
    }
    if (candidates.length > 1) {
      throw new AmbiguousKeyError(key, candidates);
    }
    const [candidate] = candidates;
    const candidateParsed = parseKey(candidate);
    if (!candidateParsed) {
      throw new InvalidKeyFormatError(candidate);
    }
    return { key: candidate, parsed: candidateParsed };
  }

  private async readOne(key: string, parsed: ParsedKey): Promise<CacheValue | null> {
    if (parsed.tag.container === "set") {
      const [members] = await this.backend.sMembersMany([key]);
      return members ? this.decode(key, parsed.tag, members) : null;
    }
    const raw = await this.backend.get(key);
    return raw === null ? null : this.decode(key, parsed.tag, raw);
  }

  private decode(key: string, tag: CacheTag, raw: string | string[]): CacheValue {
    if (tag.container === "set") {
      if (!Array.isArray(raw)) {
        throw new TypeMismatchError(key, "expected set members");
      }
      return decodeSetMembers(key, tag.type, raw);
    }
    if (Array.isArray(raw)) {
      throw new TypeMismatchError(key, "expected a single value");
    }
    return decodeStoredScalar(key, tag.type, raw);
  }
}

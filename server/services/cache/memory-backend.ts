import { TypeMismatchError } from "../errors";
import type { ICacheBackend } from "./backend";

type MemoryEntry =
  | { kind: "string"; value: string; expiresAt: number | null }
  | { kind: "set"; members: Set<string> };

/**
 * Translate a Redis glob (`*`, `?`, `[...]`, `\` escapes) into a RegExp.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = "";
  for (let i = 0; i < pattern.length; i++) {
    const char = pattern[i];
    if (char === "\\" && i + 1 < pattern.length) {
      source += escapeRegExp(pattern[++i]);
    } else if (char === "*") {
      source += ".*";
    } else if (char === "?") {
      source += ".";
    } else if (char === "[") {
      const end = pattern.indexOf("]", i + 1);
      if (end === -1) {
        source += "\\[";
        continue;
      }
      let body = pattern.slice(i + 1, end);
      if (body.startsWith("^")) body = `^${body.slice(1).replace(/\\/g, "\\\\")}`;
      else body = body.replace(/\\/g, "\\\\");
      source += `[${body}]`;
      i = end;
    } else {
      source += escapeRegExp(char);
    }
  }
  return new RegExp(`^${source}$`, "s");
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * In-process stand-in for Redis. Used when no Redis is configured and in tests.
 */
export class MemoryCacheBackend implements ICacheBackend {
  readonly kind = "memory" as const;
  private store = new Map<string, MemoryEntry>();
  private readonly now: () => number;

  constructor(options: { now?: () => number } = {}) {
    this.now = options.now ?? (() => Date.now());
  }

  private read(key: string): MemoryEntry | undefined {
    const entry = this.store.get(key);
    if (entry?.kind === "string" && entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.store.delete(key);
      return undefined;
    }
    return entry;
  }

  private readSet(key: string): Set<string> | undefined {
    const entry = this.read(key);
    if (entry === undefined) return undefined;
    if (entry.kind !== "set") {
      throw new TypeMismatchError(key, "WRONGTYPE key holds a string, not a set");
    }
    return entry.members;
  }

  async get(key: string): Promise<string | null> {
    const entry = this.read(key);
    if (entry === undefined) return null;
    if (entry.kind !== "string") {
      throw new TypeMismatchError(key, "WRONGTYPE key holds a set, not a string");
    }
    return entry.value;
  }

  async mGet(keys: string[]): Promise<(string | null)[]> {
    return keys.map((key) => {
      const entry = this.read(key);
      return entry?.kind === "string" ? entry.value : null;
    });
  }

  async set(key: string, value: string, options: { ttlSeconds?: number } = {}): Promise<void> {
    const expiresAt = options.ttlSeconds ? this.now() + options.ttlSeconds * 1000 : null;
    this.store.set(key, { kind: "string", value, expiresAt });
  }

  async incrBy(key: string, by: number): Promise<number> {
    const current = await this.get(key);
    const base = current === null ? 0 : Number(current);
    if (!Number.isInteger(base)) {
      throw new TypeMismatchError(key, "value is not an integer");
    }
    const next = base + by;
    const previous = this.read(key);
    const expiresAt = previous?.kind === "string" ? previous.expiresAt : null;
    this.store.set(key, { kind: "string", value: String(next), expiresAt });
    return next;
  }

  async exists(key: string): Promise<boolean> {
    return this.read(key) !== undefined;
  }

  async del(keys: string[]): Promise<number> {
    let removed = 0;
    for (const key of keys) {
      if (this.read(key) !== undefined) {
        this.store.delete(key);
        removed++;
      }
    }
    return removed;
  }

  async keys(pattern: string): Promise<string[]> {
    const regex = globToRegExp(pattern);
    return Array.from(this.store.keys()).filter((key) => this.read(key) !== undefined && regex.test(key));
  }

  async sMembers(key: string): Promise<string[]> {
    return Array.from(this.readSet(key) ?? []);
  }

  async sMembersMany(keys: string[]): Promise<(string[] | null)[]> {
    return keys.map((key) => {
      const members = this.readSet(key);
      return members === undefined ? null : Array.from(members);
    });
  }

  async sAdd(key: string, members: string[]): Promise<number> {
    const existing = this.readSet(key);
    const target = existing ?? new Set<string>();
    let added = 0;
    for (const member of members) {
      if (!target.has(member)) {
        target.add(member);
        added++;
      }
    }
    if (!existing && target.size > 0) {
      this.store.set(key, { kind: "set", members: target });
    }
    return added;
  }

  async sRem(key: string, members: string[]): Promise<number> {
    const existing = this.readSet(key);
    if (!existing) return 0;
    let removed = 0;
    for (const member of members) {
      if (existing.delete(member)) removed++;
    }
    // Redis drops empty sets
    if (existing.size === 0) {
      this.store.delete(key);
    }
    return removed;
  }

  async ping(): Promise<boolean> {
    return true;
  }

  async close(): Promise<void> {
    this.store.clear();
  }
}

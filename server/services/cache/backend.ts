import { createClient } from "redis";
import { z } from "zod";
import type { RedisSettings } from "../../config";
import { createLogger } from "../../lib/logger";
import { CacheUnavailableError, TypeMismatchError, errorMessage } from "../errors";

const logger = createLogger("ris.cache");

/**
 * Primitive string/set store the typed cache and the result store are built on.
 */
export interface ICacheBackend {
  readonly kind: "redis" | "memory";

  get(key: string): Promise<string | null>;
  mGet(keys: string[]): Promise<(string | null)[]>;
  set(key: string, value: string, options?: { ttlSeconds?: number }): Promise<void>;
  incrBy(key: string, by: number): Promise<number>;
  exists(key: string): Promise<boolean>;
  del(keys: string[]): Promise<number>;
  keys(pattern: string): Promise<string[]>;

  sMembers(key: string): Promise<string[]>;
  /** Members of every key in one round trip; `null` where the set does not exist. */
  sMembersMany(keys: string[]): Promise<(string[] | null)[]>;
  sAdd(key: string, members: string[]): Promise<number>;
  sRem(key: string, members: string[]): Promise<number>;

  ping(): Promise<boolean>;
  close(): Promise<void>;
}

// `false` (not nil) keeps the Lua table dense so positions line up with KEYS
const SMEMBERS_MANY_SCRIPT = `
local results = {}
for i, key in ipairs(KEYS) do
  if redis.call("EXISTS", key) == 1 then
    results[i] = redis.call("SMEMBERS", key)
  else
    results[i] = false
  end
end
return results
`;

const sMembersManyReplySchema = z.array(z.array(z.string()).nullable());

type RedisClient = ReturnType<typeof createClient>;

/**
 * Map a failed command to the cache error taxonomy. Wrong-type replies can
 * arrive wrapped in a script error, so the marker is searched anywhere in
 * the message.
 */
export function toCacheError(key: string, error: unknown): TypeMismatchError | CacheUnavailableError {
  const message = errorMessage(error);
  if (message.includes("WRONGTYPE")) {
    return new TypeMismatchError(key, message);
  }
  return new CacheUnavailableError(`Redis command failed for '${key}': ${message}`, { cause: error });
}

export class RedisCacheBackend implements ICacheBackend {
  readonly kind = "redis" as const;
  private client: RedisClient;
  private reconnectAttempts = 0;
  private readonly maxReconnectAttempts = 10;

  constructor(settings: RedisSettings) {
    this.client = this.createRedisClient(settings);
    this.setupClientEventHandlers();
  }

  /**
   * Create Redis client with reconnect backoff
   */
  private createRedisClient(settings: RedisSettings): RedisClient {
    return createClient({
      url: settings.url,
      password: settings.password,
      database: settings.database,
      socket: {
        host: settings.url ? undefined : settings.host,
        port: settings.url ? undefined : settings.port,
        connectTimeout: 10000,
        reconnectStrategy: (retries: number) => {
          if (retries > this.maxReconnectAttempts) {
            logger.error("Max Redis reconnection attempts reached");
            return false;
          }
          return Math.min(retries * 100, 3000);
        },
      },
    });
  }

  private setupClientEventHandlers(): void {
    this.client.on("error", (error: unknown) => {
      logger.error(`Redis client error: ${errorMessage(error)}`);
    });

    this.client.on("ready", () => {
      this.reconnectAttempts = 0;
      logger.info("✅ Redis client connected");
    });

    this.client.on("end", () => {
      logger.warn("Redis client disconnected");
    });

    this.client.on("reconnecting", () => {
      this.reconnectAttempts++;
      logger.info(`Redis client reconnecting (attempt ${this.reconnectAttempts})`);
    });
  }

  async connect(): Promise<void> {
    try {
      await this.client.connect();
    } catch (error) {
      throw new CacheUnavailableError(`Redis connection failed: ${errorMessage(error)}`, { cause: error });
    }
  }

  /**
   * Runs a command, translating client failures into the cache error taxonomy.
   */
  private async run<T>(key: string, command: (client: RedisClient) => Promise<T>): Promise<T> {
    if (!this.client.isReady) {
      throw new CacheUnavailableError("Redis client is not connected");
    }
    try {
      return await command(this.client);
    } catch (error) {
      throw toCacheError(key, error);
    }
  }

  async get(key: string): Promise<string | null> {
    return this.run(key, (client) => client.get(key));
  }

  async mGet(keys: string[]): Promise<(string | null)[]> {
    if (keys.length === 0) return [];
    return this.run(keys.join(","), (client) => client.mGet(keys));
  }

  async set(key: string, value: string, options: { ttlSeconds?: number } = {}): Promise<void> {
    await this.run(key, (client) =>
      options.ttlSeconds ? client.set(key, value, { EX: options.ttlSeconds }) : client.set(key, value),
    );
  }

  async incrBy(key: string, by: number): Promise<number> {
    return this.run(key, (client) => client.incrBy(key, by));
  }

  async exists(key: string): Promise<boolean> {
    const count = await this.run(key, (client) => client.exists(key));
    return count > 0;
  }

  async del(keys: string[]): Promise<number> {
    if (keys.length === 0) return 0;
    return this.run(keys.join(","), (client) => client.del(keys));
  }

  async keys(pattern: string): Promise<string[]> {
    return this.run(pattern, (client) => client.keys(pattern));
  }

  async sMembers(key: string): Promise<string[]> {
    return this.run(key, (client) => client.sMembers(key));
  }

  async sMembersMany(keys: string[]): Promise<(string[] | null)[]> {
    if (keys.length === 0) return [];
    const reply: unknown = await this.run(keys.join(","), (client) =>
      client.eval(SMEMBERS_MANY_SCRIPT, { keys }),
    );
    const parsed = sMembersManyReplySchema.safeParse(reply);
    if (!parsed.success) {
      throw new TypeMismatchError(keys.join(","), "unexpected reply from set batch script");
    }
    return parsed.data;
  }

  async sAdd(key: string, members: string[]): Promise<number> {
    if (members.length === 0) return 0;
    return this.run(key, (client) => client.sAdd(key, members));
  }

  async sRem(key: string, members: string[]): Promise<number> {
    if (members.length === 0) return 0;
    return this.run(key, (client) => client.sRem(key, members));
  }

  async ping(): Promise<boolean> {
    try {
      await this.run("PING", (client) => client.ping());
      return true;
    } catch (error) {
      logger.warn(`Redis health check failed: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Graceful shutdown
   */
  async close(): Promise<void> {
    if (!this.client.isOpen) return;
    try {
      await this.client.quit();
      logger.info("Redis connection closed");
    } catch (error) {
      logger.error(`Error during Redis shutdown: ${errorMessage(error)}`);
    }
  }
}

import { createClient } from "redis";

/**
 * The subset of Redis operations the drivers, sessions and import
 * script rely on. Tests substitute an in-memory implementation.
 */
export interface RedisStore {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  del(key: string): Promise<number>;
  exists(key: string): Promise<boolean>;
  hSet(key: string, fields: Record<string, string>): Promise<number>;
  hGetAll(key: string): Promise<Record<string, string>>;
  scanKeys(pattern: string): Promise<string[]>;
}

/**
 * Redis client wrapper for the application.
 */
export class RedisClient implements RedisStore {
  public client: ReturnType<typeof createClient>;
  private connected = false;
  private connecting: Promise<void> | null = null;

  constructor(host: string, port: number) {
    this.client = createClient({
      url: `redis://${host}:${port}`,
      socket: {
        reconnectStrategy: (retries) => {
          if (retries > 10) {
            return new Error("Max reconnection attempts reached");
          }
          return Math.min(Math.pow(2, retries) * 100, 3000);
        },
      },
    });

    this.client.on("connect", () => {
      this.connected = true;
    });

    this.client.on("error", (err) => {
      console.error("Redis error:", err);
      this.connected = false;
    });

    this.client.on("end", () => {
      this.connected = false;
    });
  }

  public isConnected(): boolean {
    return this.connected;
  }

  /**
   * Ensure Redis connection is established
   */
  public async ensureConnection(): Promise<void> {
    if (this.connected) {
      return;
    }

    if (!this.connecting) {
      this.connecting = this.client
        .connect()
        .then(() => {
          this.connected = true;
        })
        .catch((error: unknown) => {
          console.error("Failed to connect to Redis:", error);
          throw error;
        })
        .finally(() => {
          this.connecting = null;
        });
    }

    await this.connecting;
  }

  public async disconnect(): Promise<void> {
    if (!this.connected) {
      return;
    }

    try {
      await this.client.quit();
    } catch (error) {
      console.warn("Redis quit failed, forcing disconnect:", error);
      await this.client.disconnect();
    } finally {
      this.connected = false;
    }
  }

  public async get(key: string): Promise<string | null> {
    await this.ensureConnection();
    return this.client.get(key);
  }

  public async set(
    key: string,
    value: string,
    ttlSeconds?: number
  ): Promise<void> {
    await this.ensureConnection();
    if (ttlSeconds) {
      await this.client.set(key, value, { EX: ttlSeconds });
    } else {
      await this.client.set(key, value);
    }
  }

  public async del(key: string): Promise<number> {
    await this.ensureConnection();
    return this.client.del(key);
  }

  public async exists(key: string): Promise<boolean> {
    await this.ensureConnection();
    return (await this.client.exists(key)) > 0;
  }

  public async hSet(
    key: string,
    fields: Record<string, string>
  ): Promise<number> {
    await this.ensureConnection();
    return this.client.hSet(key, fields);
  }

  public async hGetAll(key: string): Promise<Record<string, string>> {
    await this.ensureConnection();
    return this.client.hGetAll(key);
  }

  public async scanKeys(pattern: string): Promise<string[]> {
    await this.ensureConnection();

    const keys: string[] = [];
    let cursor = 0;

    do {
      const result = await this.client.scan(cursor, {
        MATCH: pattern,
        COUNT: 1000,
      });
      cursor = result.cursor;
      keys.push(...result.keys);
    } while (cursor !== 0);

    return keys;
  }
}

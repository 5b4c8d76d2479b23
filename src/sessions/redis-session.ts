import { RedisStore } from "../services/redis-client";
import { Session, SessionProvider } from "./session";

/**
 * Sessions kept in Redis as JSON under `session:{id}:{key}`, expiring
 * with the configured TTL.
 */
export class RedisSessionProvider implements SessionProvider {
  constructor(
    private readonly store: RedisStore,
    private readonly ttlSeconds: number
  ) {}

  forSession(sessionId: string): Session {
    return new RedisSession(this.store, sessionId, this.ttlSeconds);
  }
}

export class RedisSession implements Session {
  constructor(
    private readonly store: RedisStore,
    private readonly sessionId: string,
    private readonly ttlSeconds: number
  ) {}

  async has(key: string): Promise<boolean> {
    return this.store.exists(this.keyFor(key));
  }

  async get(key: string): Promise<unknown> {
    const raw = await this.store.get(this.keyFor(key));
    if (raw === null) {
      return null;
    }

    try {
      return JSON.parse(raw);
    } catch (error) {
      console.warn(`Discarding unreadable session value ${this.keyFor(key)}:`, error);
      return null;
    }
  }

  async set(key: string, value: unknown): Promise<void> {
    await this.store.set(this.keyFor(key), JSON.stringify(value), this.ttlSeconds);
  }

  async forget(key: string): Promise<void> {
    await this.store.del(this.keyFor(key));
  }

  private keyFor(key: string): string {
    return `session:${this.sessionId}:${key}`;
  }
}

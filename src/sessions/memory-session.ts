import { Session, SessionProvider } from "./session";

interface Entry {
  value: unknown;
  expiresAt: number;
}

type Entries = Map<string, Entry>;

/**
 * Process-local sessions. Entries expire `ttlSeconds` after they were
 * last written. A session holding no live entries is dropped, and
 * sessions nobody reads again are swept once per TTL.
 */
export class MemorySessionProvider implements SessionProvider {
  private readonly sessions = new Map<string, Entries>();
  private lastSweep: number;

  constructor(
    private readonly ttlSeconds: number,
    private readonly now: () => number = Date.now
  ) {
    this.lastSweep = now();
  }

  /**
   * Number of sessions currently holding entries
   */
  get size(): number {
    return this.sessions.size;
  }

  forSession(sessionId: string): Session {
    this.sweepIfDue();
    return new MemorySession(sessionId, this);
  }

  entry(sessionId: string, key: string): Entry | undefined {
    const entries = this.sessions.get(sessionId);
    const entry = entries?.get(key);
    if (entries && entry && entry.expiresAt <= this.now()) {
      this.remove(sessionId, entries, key);
      return undefined;
    }
    return entry;
  }

  write(sessionId: string, key: string, value: unknown): void {
    let entries = this.sessions.get(sessionId);
    if (!entries) {
      entries = new Map();
      this.sessions.set(sessionId, entries);
    }
    entries.set(key, { value, expiresAt: this.now() + this.ttlSeconds * 1000 });
  }

  delete(sessionId: string, key: string): void {
    const entries = this.sessions.get(sessionId);
    if (entries) this.remove(sessionId, entries, key);
  }

  /**
   * Drop every expired entry, and every session left empty
   */
  sweep(): void {
    const now = this.now();
    this.lastSweep = now;

    for (const [sessionId, entries] of this.sessions) {
      for (const [key, entry] of entries) {
        if (entry.expiresAt <= now) entries.delete(key);
      }
      if (entries.size === 0) this.sessions.delete(sessionId);
    }
  }

  private sweepIfDue(): void {
    if (this.now() - this.lastSweep >= this.ttlSeconds * 1000) {
      this.sweep();
    }
  }

  private remove(sessionId: string, entries: Entries, key: string): void {
    entries.delete(key);
    if (entries.size === 0) this.sessions.delete(sessionId);
  }
}

class MemorySession implements Session {
  constructor(
    private readonly sessionId: string,
    private readonly provider: MemorySessionProvider
  ) {}

  async has(key: string): Promise<boolean> {
    return this.provider.entry(this.sessionId, key) !== undefined;
  }

  async get(key: string): Promise<unknown> {
    return this.provider.entry(this.sessionId, key)?.value ?? null;
  }

  async set(key: string, value: unknown): Promise<void> {
    this.provider.write(this.sessionId, key, value);
  }

  async forget(key: string): Promise<void> {
    this.provider.delete(this.sessionId, key);
  }
}

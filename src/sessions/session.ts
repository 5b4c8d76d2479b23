/**
 * Per-visitor storage. One instance is bound to one session id.
 */
export interface Session {
  has(key: string): Promise<boolean>;
  get(key: string): Promise<unknown>;
  set(key: string, value: unknown): Promise<void>;
  forget(key: string): Promise<void>;
}

/**
 * Hands out the session bound to a visitor's session id.
 */
export interface SessionProvider {
  forSession(sessionId: string): Session;
}

export interface KeyValueEntry {
  key: string;
  value: unknown;
  expiresAt: number | null;
  updatedAt: number;
}

export interface SetOptions {
  /**
   * Entry is ignored once this many milliseconds have passed.
   */
  ttlMs?: number;
}

/**
 * Small persisted state shared by the foreground and background contexts.
 * Reads always go to storage; nothing is cached in memory.
 */
export interface IKeyValueStore {
  /**
   * @returns null when missing or expired
   */
  get(key: string): Promise<KeyValueEntry | null>;

  set(key: string, value: unknown, options?: SetOptions): Promise<void>;

  delete(key: string): Promise<boolean>;

  /**
   * Live entries whose key starts with `prefix`.
   */
  list(prefix: string): Promise<KeyValueEntry[]>;
}

/**
 * Minimal persistence contract shared by the settings blob and the per-date
 * prayer-time cache. Values are serialized JSON strings.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  /** Overwrites any existing value. */
  set(key: string, value: string): Promise<void>;
  /**
   * Synchronous read of an already-loaded value. `undefined` means the store
   * is not warm for this key and callers must fall back to `get`.
   */
  peek?(key: string): string | null | undefined;
}

export class InMemoryKeyValueStore implements KeyValueStore {
  private data = new Map<string, string>();

  constructor(initial?: Record<string, string>) {
    if (initial) {
      for (const [key, value] of Object.entries(initial)) {
        this.data.set(key, value);
      }
    }
  }

  async get(key: string): Promise<string | null> {
    return this.data.get(key) ?? null;
  }

  async set(key: string, value: string): Promise<void> {
    this.data.set(key, value);
  }

  peek(key: string): string | null {
    return this.data.get(key) ?? null;
  }
}

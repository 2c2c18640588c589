/**
 * Minimal string key-value contract shared by the cache and override store.
 * Implementations raise StoreUnavailableError when the backend is unreachable.
 */
export interface KeyValueStore {
  get(key: string): Promise<string | null>;
  /** `ttlMs` omitted means the value never expires. */
  set(key: string, value: string, ttlMs?: number): Promise<void>;
  delete(key: string): Promise<void>;
  close(): Promise<void>;
}

/**
 * Async key/value store for loaded documents.
 */
export interface CacheProvider<V> {
  get(key: string): Promise<V | undefined>;
  set(key: string, value: V): Promise<void>;
}

import { CacheProvider } from "./CacheProvider.js";

export class InMemoryCacheProvider<V> implements CacheProvider<V> {
  private readonly entries = new Map<string, V>();

  async get(key: string): Promise<V | undefined> {
    return this.entries.get(key);
  }

  async set(key: string, value: V): Promise<void> {
    this.entries.set(key, value);
  }
}

import type { CacheEntryMeta, CacheStore } from "./store.js";

/** Records every key a layer fetches or stores. */
export class RecordingCacheStore implements CacheStore {
  readonly fetched: string[] = [];
  readonly stored: string[] = [];

  constructor(private readonly inner: CacheStore) {}

  fetch(key: string): Promise<string | null> {
    this.fetched.push(key);
    return this.inner.fetch(key);
  }

  store(key: string, sourceDir: string, meta: CacheEntryMeta): Promise<string> {
    this.stored.push(key);
    return this.inner.store(key, sourceDir, meta);
  }

  touched(): Set<string> {
    return new Set([...this.fetched, ...this.stored]);
  }
}

/**
 * Bounded LRU cache of URL -> FormatCollection.
 * Entries are deep-copied on the way in and out.
 */

import type { FormatCollection } from "./media-types.ts";

export const DEFAULT_FORMAT_CACHE_SIZE = 100;

export function createFormatCache(maxEntries = DEFAULT_FORMAT_CACHE_SIZE) {
  const capacity = Math.max(1, Math.trunc(maxEntries));
  // Map iteration order is insertion order: first key = least recently used
  const entries = new Map<string, FormatCollection>();

  function get(url: string): FormatCollection | null {
    const entry = entries.get(url);
    if (!entry) return null;
    entries.delete(url);
    entries.set(url, entry);
    return structuredClone(entry);
  }

  function set(url: string, collection: FormatCollection): void {
    entries.delete(url);
    entries.set(url, structuredClone(collection));
    while (entries.size > capacity) {
      const oldest = entries.keys().next();
      if (oldest.done) break;
      entries.delete(oldest.value);
    }
  }

  return {
    get,
    set,
    has: (url: string) => entries.has(url),
    size: () => entries.size,
    /** Keys from least to most recently used */
    keys: () => [...entries.keys()],
    clear: () => entries.clear(),
  };
}

export type FormatCache = ReturnType<typeof createFormatCache>;

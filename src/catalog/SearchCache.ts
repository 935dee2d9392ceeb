import { CatalogIndex, cleanTerm } from './CatalogIndex.js';
import { FieldCandidate } from './types.js';
import { debugLog } from '../utils/logger.js';

export interface SearchCacheOptions {
  /** Maximum entries; 0 disables caching */
  maxSize: number;
  /** Entry lifetime in milliseconds; 0 means entries never expire */
  ttlMs: number;
  now?: () => number;
}

interface CacheEntry {
  candidates: FieldCandidate[];
  storedAt: number;
}

export interface SearchCacheStats {
  size: number;
  maxSize: number;
  ttlMs: number;
  hits: number;
  misses: number;
}

/**
 * LRU + TTL cache in front of CatalogIndex.search, keyed by the cleaned term
 * and the candidate limit. Cleared whenever the index is rebuilt.
 * Map insertion order doubles as recency order.
 */
export class SearchCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly index: CatalogIndex;
  private readonly maxSize: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(index: CatalogIndex, options: SearchCacheOptions) {
    this.index = index;
    this.maxSize = options.maxSize;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
    index.onRebuild(() => this.clear());
  }

  search(term: string, maxCandidates?: number): FieldCandidate[] {
    if (this.maxSize <= 0) {
      return this.index.search(term, maxCandidates);
    }

    const key = `${cleanTerm(term)}\u0000${maxCandidates ?? 'default'}`;
    const cached = this.entries.get(key);
    if (cached && !this.isExpired(cached)) {
      this.hits++;
      this.entries.delete(key);
      this.entries.set(key, cached);
      debugLog('index', 'Search cache hit', { term });
      // Candidates carry the caller's term, which may differ from the cached one in case or spacing
      const inputTerm = term.trim();
      return cached.candidates.map((candidate) => ({ ...candidate, term: inputTerm }));
    }

    this.misses++;
    if (cached) {
      this.entries.delete(key);
    }

    const candidates = this.index.search(term, maxCandidates);
    if (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) {
        this.entries.delete(oldest.value);
      }
    }
    this.entries.set(key, { candidates, storedAt: this.now() });
    return candidates.map((candidate) => ({ ...candidate }));
  }

  clear(): void {
    this.entries.clear();
  }

  getStats(): SearchCacheStats {
    return {
      size: this.entries.size,
      maxSize: this.maxSize,
      ttlMs: this.ttlMs,
      hits: this.hits,
      misses: this.misses,
    };
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.ttlMs > 0 && this.now() - entry.storedAt > this.ttlMs;
  }
}

import { CatalogLoader } from './CatalogLoader.js';
import { CatalogField, FieldCandidate, IndexStats } from './types.js';
import { similarityRatio } from '../utils/similarity.js';
import { debugLog, logger } from '../utils/logger.js';

export interface CatalogIndexOptions {
  keywordMatchThreshold: number;
  maxCandidatesPerTerm: number;
  minTermLength: number;
}

const EXACT_SCORE = 1.0;
const PARTIAL_MIN_OVERLAP = 0.3;
const PARTIAL_WEIGHT = 0.8;
const FUZZY_WEIGHT = 0.6;
const FUZZY_MIN_TERM_LENGTH = 3;

interface IndexSnapshot {
  readonly fields: readonly CatalogField[];
  readonly termIndex: ReadonlyMap<string, readonly number[]>;
  readonly pathIndex: ReadonlyMap<string, number>;
  readonly builtAt: Date;
}

/**
 * Lowercase, strip, drop anything that is not an ASCII letter, digit or
 * whitespace, then collapse runs of whitespace.
 */
export function cleanTerm(term: string): string {
  return term
    .toLowerCase()
    .trim()
    .replace(/[^a-z0-9\s]/g, '')
    .replace(/\s+/g, ' ')
    .trim();
}

export function tokenize(text: string, minLength: number): string[] {
  return text.split(/\s+/).filter((token) => token.length >= minLength);
}

/**
 * CatalogIndex
 * Term and path lookup over the catalog fields. A build creates a complete new
 * snapshot and swaps it in with a single assignment, so readers see either
 * the old index or the new one. A failed build leaves the old snapshot in place.
 */
export class CatalogIndex {
  private snapshot: IndexSnapshot | null = null;
  private readonly loader: CatalogLoader;
  private readonly options: CatalogIndexOptions;
  private readonly rebuildListeners: Array<() => void> = [];

  constructor(loader: CatalogLoader, options: CatalogIndexOptions) {
    this.loader = loader;
    this.options = options;
  }

  /**
   * Register a callback that runs after every successful build.
   * Used by the search cache to drop results computed against an old snapshot.
   */
  onRebuild(listener: () => void): void {
    this.rebuildListeners.push(listener);
  }

  buildIndex(forceRebuild = false): void {
    if (this.snapshot !== null && !forceRebuild) {
      return;
    }

    const fields = logger.withTimer('index.build', { forceRebuild }, () =>
      this.loader.loadCatalog(forceRebuild)
    );

    const termIndex = new Map<string, number[]>();
    const pathIndex = new Map<string, number>();
    const addTerm = (term: string, position: number): void => {
      const positions = termIndex.get(term);
      if (!positions) {
        termIndex.set(term, [position]);
      } else if (positions[positions.length - 1] !== position) {
        positions.push(position);
      }
    };

    fields.forEach((field, position) => {
      pathIndex.set(field.path, position);
      for (const searchable of field.searchableTerms) {
        const cleaned = cleanTerm(searchable);
        if (!cleaned) {
          continue;
        }
        addTerm(cleaned, position);
        for (const token of tokenize(cleaned, this.options.minTermLength)) {
          addTerm(token, position);
        }
      }
    });

    this.snapshot = { fields, termIndex, pathIndex, builtAt: new Date() };

    logger.info('Catalog index built', {
      fields: fields.length,
      indexedTerms: termIndex.size,
    });

    for (const listener of this.rebuildListeners) {
      listener();
    }
  }

  /**
   * Rebuild when the catalog file changed on disk since the last build.
   * Returns true when a rebuild happened.
   */
  reloadIfChanged(): boolean {
    if (this.snapshot !== null && !this.loader.hasChanged()) {
      return false;
    }
    this.buildIndex(true);
    return true;
  }

  /**
   * Look a user term up with the exact, partial and fuzzy strategies, keeping
   * the best candidate per field path, highest score first.
   */
  search(term: string, maxCandidates = this.options.maxCandidatesPerTerm): FieldCandidate[] {
    const snapshot = this.ensureBuilt();
    const inputTerm = term.trim();
    const cleaned = cleanTerm(term);
    if (!cleaned || maxCandidates <= 0) {
      return [];
    }

    const candidates = [
      ...this.exactMatches(snapshot, inputTerm, cleaned),
      ...this.partialMatches(snapshot, inputTerm, cleaned),
      ...this.fuzzyMatches(snapshot, inputTerm, cleaned),
    ];

    const bestByPath = new Map<string, FieldCandidate>();
    for (const candidate of candidates) {
      const existing = bestByPath.get(candidate.field.path);
      if (!existing || candidate.matchScore > existing.matchScore) {
        bestByPath.set(candidate.field.path, candidate);
      }
    }

    const results = [...bestByPath.values()]
      .sort((a, b) => b.matchScore - a.matchScore)
      .slice(0, maxCandidates);

    debugLog('index', 'Search completed', {
      term: inputTerm,
      cleaned,
      candidates: results.map((c) => `${c.field.path}:${c.matchScore.toFixed(3)}`),
    });

    return results;
  }

  getFieldByPath(path: string): CatalogField | undefined {
    const snapshot = this.ensureBuilt();
    const position = snapshot.pathIndex.get(path);
    return position === undefined ? undefined : snapshot.fields[position];
  }

  getAllPaths(): string[] {
    return this.ensureBuilt().fields.map((field) => field.path);
  }

  getAllFields(): readonly CatalogField[] {
    return this.ensureBuilt().fields;
  }

  isLoaded(): boolean {
    return this.snapshot !== null;
  }

  getEntryCount(): number {
    return this.snapshot ? this.snapshot.fields.length : 0;
  }

  getStats(): IndexStats {
    if (!this.snapshot) {
      return { totalFields: 0, indexedTerms: 0, pathsIndexed: 0, builtAt: null };
    }
    return {
      totalFields: this.snapshot.fields.length,
      indexedTerms: this.snapshot.termIndex.size,
      pathsIndexed: this.snapshot.pathIndex.size,
      builtAt: this.snapshot.builtAt.toISOString(),
    };
  }

  getLoader(): CatalogLoader {
    return this.loader;
  }

  private ensureBuilt(): IndexSnapshot {
    if (this.snapshot === null) {
      this.buildIndex();
    }
    if (this.snapshot === null) {
      // buildIndex either assigns a snapshot or throws
      throw new Error('Catalog index was not built');
    }
    return this.snapshot;
  }

  private exactMatches(snapshot: IndexSnapshot, term: string, cleaned: string): FieldCandidate[] {
    const positions = snapshot.termIndex.get(cleaned) ?? [];
    return positions.map((position): FieldCandidate => ({
      term,
      field: snapshot.fields[position],
      matchScore: EXACT_SCORE,
      matchStrategy: 'exact',
      matchReason: `Exact match on "${cleaned}"`,
    }));
  }

  // Each query token counts at most once per field
  private partialMatches(snapshot: IndexSnapshot, term: string, cleaned: string): FieldCandidate[] {
    const queryTokens = [...new Set(tokenize(cleaned, this.options.minTermLength))];
    if (queryTokens.length === 0) {
      return [];
    }

    const overlap = new Map<number, string[]>();
    for (const token of queryTokens) {
      for (const position of snapshot.termIndex.get(token) ?? []) {
        const matched = overlap.get(position);
        if (matched) {
          matched.push(token);
        } else {
          overlap.set(position, [token]);
        }
      }
    }

    const candidates: FieldCandidate[] = [];
    for (const [position, matched] of overlap) {
      const ratio = matched.length / queryTokens.length;
      if (ratio < PARTIAL_MIN_OVERLAP) {
        continue;
      }
      candidates.push({
        term,
        field: snapshot.fields[position],
        matchScore: ratio * PARTIAL_WEIGHT,
        matchStrategy: 'partial',
        matchReason: `Partial match on ${matched.map((t) => `"${t}"`).join(', ')} (${matched.length}/${queryTokens.length} tokens)`,
      });
    }
    return candidates;
  }

  private fuzzyMatches(snapshot: IndexSnapshot, term: string, cleaned: string): FieldCandidate[] {
    if (cleaned.length < FUZZY_MIN_TERM_LENGTH) {
      return [];
    }

    const threshold = this.options.keywordMatchThreshold;
    const candidates: FieldCandidate[] = [];
    for (const field of snapshot.fields) {
      let bestRatio = 0;
      let bestTerm = '';
      for (const searchable of field.searchableTerms) {
        const ratio = similarityRatio(cleaned, cleanTerm(searchable));
        if (ratio > bestRatio) {
          bestRatio = ratio;
          bestTerm = searchable;
        }
      }
      if (bestRatio > 0 && bestRatio >= threshold) {
        candidates.push({
          term,
          field,
          matchScore: bestRatio * FUZZY_WEIGHT,
          matchStrategy: 'fuzzy',
          matchReason: `Fuzzy match with "${bestTerm}" (similarity ${bestRatio.toFixed(2)})`,
        });
      }
    }
    return candidates;
  }
}

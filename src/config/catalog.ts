import { resolve } from 'path';

export interface CatalogConfig {
  catalogPath: string;
  keywordMatchThreshold: number;
  maxCandidatesPerTerm: number;
  minTermLength: number;
  searchCacheSize: number;
  searchCacheTtlMs: number;
}

export const DEFAULT_CATALOG_FILE = 'data/catalog.json';

const intFromEnv = (value: string | undefined, defaultValue: number, min: number): number => {
  if (!value || value.trim() === '') {
    return defaultValue;
  }

  const parsed = parseInt(value, 10);
  return Number.isFinite(parsed) ? Math.max(min, parsed) : defaultValue;
};

export function loadCatalogConfig(): CatalogConfig {
  const catalogPath = resolve(
    process.cwd(),
    process.env.CATALOG_PATH?.trim() || DEFAULT_CATALOG_FILE
  );

  const thresholdEnv = process.env.CATALOG_KEYWORD_MATCH_THRESHOLD;
  const parsedThreshold = thresholdEnv ? Number(thresholdEnv) : 0.8;
  const keywordMatchThreshold = Math.max(
    0,
    Math.min(1, Number.isFinite(parsedThreshold) ? parsedThreshold : 0.8)
  );

  return {
    catalogPath,
    keywordMatchThreshold,
    maxCandidatesPerTerm: intFromEnv(process.env.CATALOG_MAX_CANDIDATES_PER_TERM, 5, 1),
    minTermLength: intFromEnv(process.env.CATALOG_MIN_TERM_LENGTH, 2, 1),
    searchCacheSize: intFromEnv(process.env.CATALOG_SEARCH_CACHE_SIZE, 0, 0),
    searchCacheTtlMs: intFromEnv(process.env.CATALOG_SEARCH_CACHE_TTL_MS, 60 * 60 * 1000, 0),
  };
}

export type FieldType = 'enum' | 'string' | 'number' | 'boolean' | 'date';

export const FIELD_TYPES: readonly FieldType[] = ['enum', 'string', 'number', 'boolean', 'date'];

/**
 * A filterable field from the catalog. Nested entities use a dot-separated
 * path (`entity.field`). Instances are frozen once loaded and unique by path.
 */
export interface CatalogField {
  readonly path: string;
  readonly fieldType: FieldType;
  readonly enumValues?: readonly string[];
  readonly description?: string;
  /** Lowercased, trimmed, deduplicated terms a user might type for this field */
  readonly searchableTerms: readonly string[];
}

export type MatchStrategy = 'exact' | 'partial' | 'fuzzy';

export interface FieldCandidate {
  /** The term as passed to search */
  term: string;
  field: CatalogField;
  /** In [0, 1] */
  matchScore: number;
  matchStrategy: MatchStrategy;
  matchReason: string;
}

export interface CatalogStats {
  totalEntries: number;
  validFields: number;
  fieldTypes: Partial<Record<FieldType, number>>;
  lastLoaded: string | null;
  filePath: string;
}

export interface IndexStats {
  totalFields: number;
  indexedTerms: number;
  pathsIndexed: number;
  builtAt: string | null;
}

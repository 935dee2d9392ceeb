import { Combinator } from '../filters/types.js';

export interface ParsedTerm {
  /** The word or phrase as it appeared in the query */
  original: string;
  /** The form searched in the catalog */
  normalized: string;
  position: number;
  /** In [0, 1] */
  confidence: number;
}

export interface ParsedQuery {
  terms: ParsedTerm[];
  logic: Combinator;
  rawQuery: string;
  confidence: number;
}

/**
 * Turns a natural-language query into catalog search terms.
 */
export interface TermExtractor {
  readonly name: string;
  extract(text: string): Promise<ParsedQuery>;
}

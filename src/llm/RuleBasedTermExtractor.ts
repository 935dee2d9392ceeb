import termRules from '../../data/term-rules.json';
import { QueryParsingError } from '../pipeline/PipelineError.js';
import { debugLog } from '../utils/logger.js';
import { Combinator } from '../filters/types.js';
import { ParsedQuery, ParsedTerm, TermExtractor } from './TermExtractor.js';

export interface TermRules {
  /** `pattern` is a regex alternation matched against a whole word */
  normalizations: { replacement: string; pattern: string }[];
  highConfidenceTerms: string[];
  orWords: string[];
  stopWords: string[];
}

export interface RuleBasedOptions {
  minTermLength: number;
  rules?: TermRules;
}

const BASE_CONFIDENCE = 0.6;
const NORMALIZED_CONFIDENCE = 0.8;
const HIGH_CONFIDENCE = 0.9;
const FALLBACK_CONFIDENCE = 0.5;
const QUERY_CONFIDENCE = 0.7;

/**
 * Word-level extraction: synonyms are mapped to a canonical form, stop words
 * and short words are dropped, and "or"/"either" switches the logic to OR.
 */
export class RuleBasedTermExtractor implements TermExtractor {
  readonly name = 'rule-based';

  private readonly minTermLength: number;
  private readonly normalizations: { replacement: string; regex: RegExp }[];
  private readonly stopWords: ReadonlySet<string>;
  private readonly orWords: ReadonlySet<string>;
  private readonly highConfidenceTerms: ReadonlySet<string>;

  constructor(options: RuleBasedOptions) {
    const rules = options.rules ?? termRules;
    this.minTermLength = options.minTermLength;
    this.normalizations = rules.normalizations.map(({ replacement, pattern }) => ({
      replacement,
      regex: new RegExp(`^(?:${pattern})$`),
    }));
    this.stopWords = new Set(rules.stopWords);
    this.orWords = new Set(rules.orWords);
    this.highConfidenceTerms = new Set(rules.highConfidenceTerms);
  }

  async extract(text: string): Promise<ParsedQuery> {
    return this.parse(text);
  }

  parse(text: string): ParsedQuery {
    const words = text.toLowerCase().match(/\w+/g) ?? [];
    if (words.length === 0) {
      throw new QueryParsingError('Query contains no words', { query: text });
    }

    const logic: Combinator = words.some((word) => this.orWords.has(word)) ? 'OR' : 'AND';
    const terms: ParsedTerm[] = [];
    const seen = new Set<string>();

    for (const word of words) {
      const { normalized, matched } = this.normalize(word);
      if (
        this.stopWords.has(normalized) ||
        normalized.length < this.minTermLength ||
        seen.has(normalized)
      ) {
        continue;
      }

      seen.add(normalized);
      terms.push({
        original: word,
        normalized,
        position: terms.length,
        confidence: this.highConfidenceTerms.has(normalized)
          ? HIGH_CONFIDENCE
          : matched
            ? NORMALIZED_CONFIDENCE
            : BASE_CONFIDENCE,
      });
    }

    if (terms.length === 0) {
      const longest = words.reduce((best, word) => (word.length > best.length ? word : best));
      terms.push({ original: longest, normalized: longest, position: 0, confidence: FALLBACK_CONFIDENCE });
    }

    debugLog('extractor', 'Rule-based extraction', { terms: terms.map((t) => t.normalized), logic });
    return { terms, logic, rawQuery: text, confidence: QUERY_CONFIDENCE };
  }

  private normalize(word: string): { normalized: string; matched: boolean } {
    for (const { replacement, regex } of this.normalizations) {
      if (regex.test(word)) {
        return { normalized: replacement, matched: true };
      }
    }
    return { normalized: word, matched: false };
  }
}

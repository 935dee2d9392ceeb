import { CatalogField, FieldCandidate } from '../catalog/types.js';
import { debugLog, logger } from '../utils/logger.js';
import { ConflictRecord, FieldOperator, ResolutionResult, ResolvedField } from './types.js';

const PATH_BONUS = 0.1;
const ENUM_BONUS = 0.05;
const DESCRIPTION_BONUS = 0.02;
const ENUM_VALUE_BONUS = 0.15;
const CONFLICT_PENALTY = 0.9;

export function defaultOperator(field: CatalogField): FieldOperator {
  switch (field.fieldType) {
    case 'enum':
    case 'number':
    case 'date':
    case 'boolean':
      return 'eq';
    default:
      return 'contains';
  }
}

function matchesEitherWay(a: string, b: string): boolean {
  return a.includes(b) || b.includes(a);
}

/** Exact case-insensitive match first, then a substring match in either direction */
export function matchEnumValue(term: string, enumValues: readonly string[]): string | undefined {
  const needle = term.trim().toLowerCase();
  return (
    enumValues.find((value) => value.toLowerCase() === needle) ??
    enumValues.find((value) => matchesEitherWay(needle, value.toLowerCase()))
  );
}

/**
 * ConflictResolver
 * Settles each term on one catalog field with fixed scoring heuristics.
 * Deterministic: ties go to the candidate that came first.
 */
export class ConflictResolver {
  resolve(candidates: FieldCandidate[], unmatchedTerms: string[] = []): ResolutionResult {
    const groups = new Map<string, FieldCandidate[]>();
    for (const candidate of candidates) {
      const group = groups.get(candidate.term);
      if (group) {
        group.push(candidate);
      } else {
        groups.set(candidate.term, [candidate]);
      }
    }

    const resolvedFields: ResolvedField[] = [];
    const conflicts: ConflictRecord[] = [];
    const warnings = unmatchedTerms.map((term) => `No catalog field matched "${term}"`);

    for (const [term, group] of groups) {
      if (group.length === 1) {
        resolvedFields.push(this.resolveSingle(term, group[0]));
        continue;
      }

      const { resolved, conflict, warning } = this.resolveConflict(term, group);
      resolvedFields.push(resolved);
      conflicts.push(conflict);
      if (warning) {
        warnings.push(warning);
      }
    }

    debugLog('resolver', 'Resolved terms', {
      resolved: resolvedFields.map((f) => `${f.term} -> ${f.fieldPath}`),
      conflicts: conflicts.length,
    });

    return { resolvedFields, conflicts, warnings };
  }

  /**
   * Heuristic score for one of several candidates of the same term.
   */
  scoreCandidate(term: string, candidate: FieldCandidate): number {
    const needle = term.trim().toLowerCase();
    const { field } = candidate;
    let score = candidate.matchScore;

    if (field.path.toLowerCase().includes(needle)) {
      score += PATH_BONUS;
    }
    if (field.fieldType === 'enum') {
      score += ENUM_BONUS;
    }
    if (field.description) {
      score += DESCRIPTION_BONUS;
    }
    if (field.enumValues?.some((value) => matchesEitherWay(needle, value.toLowerCase()))) {
      score += ENUM_VALUE_BONUS;
    }
    return score;
  }

  private resolveSingle(term: string, candidate: FieldCandidate): ResolvedField {
    const { field } = candidate;
    const enumMatch =
      field.fieldType === 'enum' && field.enumValues
        ? matchEnumValue(term, field.enumValues)
        : undefined;

    return {
      term,
      fieldPath: field.path,
      fieldType: field.fieldType,
      value: enumMatch ?? term,
      operator: defaultOperator(field),
      confidence: candidate.matchScore,
    };
  }

  private resolveConflict(
    term: string,
    group: FieldCandidate[]
  ): { resolved: ResolvedField; conflict: ConflictRecord; warning?: string } {
    let best = group[0];
    let bestScore = this.scoreCandidate(term, best);
    for (const candidate of group.slice(1)) {
      const score = this.scoreCandidate(term, candidate);
      if (score > bestScore) {
        best = candidate;
        bestScore = score;
      }
    }

    const confidence = Math.min(1, bestScore * CONFLICT_PENALTY);
    const { field } = best;
    let value = term;
    let warning: string | undefined;

    if (field.fieldType === 'enum' && field.enumValues && field.enumValues.length > 0) {
      const enumMatch = matchEnumValue(term, field.enumValues);
      if (enumMatch !== undefined) {
        value = enumMatch;
      } else {
        // No textual match: the first enum value stands in, flagged for review
        value = field.enumValues[0];
        warning = `No enum value of "${field.path}" matched "${term}"; using "${value}"`;
        logger.warn('Falling back to first enum value', { term, path: field.path, value });
      }
    }

    return {
      resolved: {
        term,
        fieldPath: field.path,
        fieldType: field.fieldType,
        value,
        operator: defaultOperator(field),
        confidence,
      },
      conflict: {
        term,
        candidatePaths: group.map((c) => c.field.path),
        chosenPath: field.path,
        reason: `Highest score (${bestScore.toFixed(3)}) using rule-based heuristics`,
        confidence,
      },
      warning,
    };
  }
}

export type Combinator = 'AND' | 'OR';

export const COMBINATORS: readonly Combinator[] = ['AND', 'OR'];

export type ScalarValue = string | number | boolean;

export type RangeOperator = 'GT' | 'GTE' | 'LT' | 'LTE';

export type ConditionOperator = 'IN' | RangeOperator | 'CONTAINS';

/** How the query builder decorates a CONTAINS pattern */
export type ContainsMatch = 'contains' | 'prefix' | 'suffix';

export interface InCondition {
  kind: 'condition';
  operator: 'IN';
  field: string;
  values: ScalarValue[];
}

export interface RangeCondition {
  kind: 'condition';
  operator: RangeOperator;
  field: string;
  value: string | number;
}

export interface ContainsCondition {
  kind: 'condition';
  operator: 'CONTAINS';
  field: string;
  value: string;
  match: ContainsMatch;
}

export type FilterCondition = InCondition | RangeCondition | ContainsCondition;

export interface GroupNode {
  kind: 'group';
  combinator: Combinator;
  children: FilterNode[];
}

/**
 * Conditions scoped to a related entity. Children name fields local to the
 * entity and never contain another nested block.
 */
export interface NestedNode {
  kind: 'nested';
  path: string;
  combinator: Combinator;
  children: NestedChild[];
}

export type NestedChild = FilterCondition | NestedGroup;

export interface NestedGroup {
  kind: 'group';
  combinator: Combinator;
  children: NestedChild[];
}

export type FilterNode = FilterCondition | GroupNode | NestedNode;

// Wire representation, the JSON handed to the GraphQL `$filter` variable

export type WireFilter =
  | { AND: WireFilter[] }
  | { OR: WireFilter[] }
  | { IN: Record<string, ScalarValue[]> }
  | { GT: Record<string, string | number> }
  | { GTE: Record<string, string | number> }
  | { LT: Record<string, string | number> }
  | { LTE: Record<string, string | number> }
  | { CONTAINS: Record<string, string> }
  | { nested: WireNested };

export type WireNested = { path: string } & ({ AND: WireFilter[] } | { OR: WireFilter[] });

// UI-facing filter state

export type CombineMode = Combinator;

export interface OptionFilter {
  type: 'OPTION';
  selectedValues: ScalarValue[];
  isExclusion: boolean;
}

export interface RangeFilter {
  type: 'RANGE';
  lowerBound?: string | number;
  upperBound?: string | number;
}

/**
 * Ordered filters anchored on a related entity. Accepted in a state but
 * rejected by encode.
 */
export interface AnchoredFilter {
  type: 'ANCHORED';
  value?: unknown;
}

export type FilterValue = OptionFilter | RangeFilter | AnchoredFilter;

export interface StandardFilterState {
  kind: 'STANDARD';
  combineMode: CombineMode;
  values: Record<string, FilterValue>;
}

export interface ComposedFilterState {
  kind: 'COMPOSED';
  combineMode: CombineMode;
  values: FilterState[];
}

export type FilterState = StandardFilterState | ComposedFilterState;

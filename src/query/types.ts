export const OPERATOR_NAMES = [
  'exact',
  'iexact',
  'contains',
  'icontains',
  'ne',
  'in',
  'gt',
  'gte',
  'lt',
  'lte',
  'startswith',
  'istartswith',
  'endswith',
  'iendswith',
  'exists',
  'regex',
  'iregex',
] as const;

export type OperatorName = (typeof OPERATOR_NAMES)[number];

export type ScalarOperand = string | number | boolean | null;

export type FilterOperand = ScalarOperand | RegExp | readonly ScalarOperand[];

/**
 * Filter keys map to operands. A key is an attribute name, optionally
 * prefixed with child tags (`Media__Part__container`) and suffixed with an
 * operator (`viewCount__gte`). The pseudo-attribute `etag` is the node's tag.
 */
export type Filters = Record<string, FilterOperand>;

/** A value extracted from a node after coercion against the operand. */
export type CoercedValue = string | number | boolean | null;

export interface QueryPredicate {
  readonly key: string;
  readonly childPath: readonly string[];
  readonly attribute: string;
  readonly operator: OperatorName;
  readonly operand: FilterOperand;
}

import { OPERATOR_NAMES } from './types.js';
import type { Filters, OperatorName, QueryPredicate } from './types.js';

export const PATH_DELIMITER = '__';

export interface ParsedFilterKey {
  childPath: string[];
  attribute: string;
  operator: OperatorName;
}

/**
 * Splits a filter key into child path, attribute and operator.
 * `Media__Part__file__startswith` → childPath ['Media', 'Part'],
 * attribute 'file', operator 'startswith'. Keys without a known operator
 * suffix use `exact`.
 */
export function parseFilterKey(key: string): ParsedFilterKey {
  let valuePath = key;
  let operator: OperatorName = 'exact';
  for (const name of OPERATOR_NAMES) {
    const suffix = `${PATH_DELIMITER}${name}`;
    if (key.endsWith(suffix)) {
      valuePath = key.slice(0, -suffix.length);
      operator = name;
      break;
    }
  }

  const segments = valuePath.split(PATH_DELIMITER);
  const attribute = segments.pop() ?? valuePath;
  return { childPath: segments, attribute, operator };
}

export function compileFilters(filters: Readonly<Filters>): QueryPredicate[] {
  return Object.entries(filters).map(([key, operand]) => ({
    key,
    ...parseFilterKey(key),
    operand,
  }));
}

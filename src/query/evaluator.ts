import type { AttributeNode } from '../tree/attribute-node.js';
import { toFloat, toInt } from '../tree/casts.js';
import { OPERATORS } from './operators.js';
import { compileFilters } from './parser.js';
import type { CoercedValue, FilterOperand, Filters, OperatorName, QueryPredicate } from './types.js';

/** Pseudo-attribute resolving to the node's own tag. */
export const TAG_ATTRIBUTE = 'etag';

/**
 * Resolves a child path and attribute against a node. Child tags and
 * attribute names match case-insensitively; values found under several
 * matching children are concatenated in document order.
 */
export function extractValues(
  node: AttributeNode,
  childPath: readonly string[],
  attribute: string,
): string[] {
  const [head, ...rest] = childPath;
  if (head !== undefined) {
    const wanted = head.toLowerCase();
    return node.children
      .filter((child) => child.tag.toLowerCase() === wanted)
      .flatMap((child) => extractValues(child, rest, attribute));
  }

  const name = attribute.toLowerCase();
  if (name === TAG_ATTRIBUTE) return [node.tag];
  for (const [attr, value] of Object.entries(node.attributes)) {
    if (attr.toLowerCase() === name) return [value];
  }
  return [];
}

/** Converts a raw attribute string to the operand's type before comparing. */
export function coerceValue(
  operator: OperatorName,
  operand: FilterOperand,
  value: string | null,
): CoercedValue {
  if (operator === 'exists' || value === null) return value;
  if (typeof operand === 'boolean') {
    const flag = toInt(value) ?? Number.NaN;
    return !Number.isNaN(flag) && flag !== 0;
  }
  if (typeof operand === 'number' && Number.isInteger(operand)) {
    return (value.includes('.') ? toFloat(value) : toInt(value)) ?? Number.NaN;
  }
  if (typeof operand === 'number') return toFloat(value) ?? Number.NaN;
  return value;
}

function isEmptyOperand(operand: FilterOperand): boolean {
  return operand === null || operand === 0 || operand === '' || operand === false;
}

export function evaluatePredicate(node: AttributeNode, predicate: QueryPredicate): boolean {
  const { childPath, attribute, operator, operand } = predicate;
  const values = extractValues(node, childPath, attribute);

  if (values.length === 0) {
    // a missing attribute matches the empty operands, and `exists` sees null
    if (operator === 'exact') return isEmptyOperand(operand);
    if (operator === 'exists') return OPERATORS.exists(null, operand);
    return false;
  }

  const test = OPERATORS[operator];
  return values.some((value) => test(coerceValue(operator, operand, value), operand));
}

export function evaluatePredicates(node: AttributeNode, predicates: readonly QueryPredicate[]): boolean {
  return predicates.every((predicate) => evaluatePredicate(node, predicate));
}

/** True when every filter holds for the node; an empty filter set always holds. */
export function matchesFilters(node: AttributeNode, filters: Readonly<Filters>): boolean {
  return evaluatePredicates(node, compileFilters(filters));
}

import type { CoercedValue, FilterOperand, OperatorName } from './types.js';

export type Operator = (value: CoercedValue, operand: FilterOperand) => boolean;

function isScalar(operand: FilterOperand): operand is string | number | boolean | null {
  return operand === null || typeof operand !== 'object';
}

function text(value: CoercedValue | FilterOperand): string {
  return value === null ? '' : String(value);
}

/**
 * Orders two values the way the server's strings were coerced: numerically
 * when both sides are numbers or booleans, lexically when both are strings.
 * Anything else is unordered.
 */
function compare(value: CoercedValue, operand: FilterOperand): number | null {
  if (value === null || !isScalar(operand) || operand === null) return null;
  if (typeof value === 'string' && typeof operand === 'string') {
    return value < operand ? -1 : value > operand ? 1 : 0;
  }
  if (typeof value !== 'string' && typeof operand !== 'string') {
    return Number(value) - Number(operand);
  }
  return null;
}

function ordered(test: (cmp: number) => boolean): Operator {
  return (value, operand) => {
    const cmp = compare(value, operand);
    return cmp !== null && !Number.isNaN(cmp) && test(cmp);
  };
}

function pattern(operand: FilterOperand, ignoreCase: boolean): RegExp | null {
  if (operand instanceof RegExp) {
    // global/sticky patterns keep lastIndex between test() calls
    let flags = operand.flags.replace(/[gy]/g, '');
    if (ignoreCase && !flags.includes('i')) flags += 'i';
    return new RegExp(operand.source, flags);
  }
  if (typeof operand === 'string') return new RegExp(operand, ignoreCase ? 'i' : '');
  return null;
}

function matchesPattern(ignoreCase: boolean): Operator {
  return (value, operand) => {
    const re = pattern(operand, ignoreCase);
    return re !== null && value !== null && re.test(text(value));
  };
}

function textual(test: (value: string, operand: string) => boolean): Operator {
  return (value, operand) => isScalar(operand) && operand !== null && value !== null
    && test(text(value), text(operand));
}

const exact: Operator = (value, operand) => isScalar(operand) && value === operand;

export const OPERATORS: Readonly<Record<OperatorName, Operator>> = {
  exact,
  iexact: textual((v, q) => v.toLowerCase() === q.toLowerCase()),
  contains: textual((v, q) => v.includes(q)),
  icontains: textual((v, q) => v.toLowerCase().includes(q.toLowerCase())),
  ne: (value, operand) => !exact(value, operand),
  in: (value, operand) => {
    if (Array.isArray(operand)) {
      const candidates: readonly (string | number | boolean | null)[] = operand;
      return candidates.some((c) => c === value || (c !== null && value !== null && String(c) === text(value)));
    }
    return typeof operand === 'string' && value !== null && operand.includes(text(value));
  },
  gt: ordered((cmp) => cmp > 0),
  gte: ordered((cmp) => cmp >= 0),
  lt: ordered((cmp) => cmp < 0),
  lte: ordered((cmp) => cmp <= 0),
  startswith: textual((v, q) => v.startsWith(q)),
  istartswith: textual((v, q) => v.toLowerCase().startsWith(q.toLowerCase())),
  endswith: textual((v, q) => v.endsWith(q)),
  iendswith: textual((v, q) => v.toLowerCase().endsWith(q.toLowerCase())),
  exists: (value, operand) => (operand ? value !== null : value === null),
  regex: matchesPattern(false),
  iregex: matchesPattern(true),
};

/**
 * Binary Operator Precedence
 * Higher binds tighter. Operators missing from the table bind loosest (0).
 */

const PRECEDENCE: Readonly<Record<string, number>> = {
  '||': 1,
  '&&': 2,
  '==': 3,
  '!=': 3,
  '<': 4,
  '<=': 4,
  '>': 4,
  '>=': 4,
  '|': 5,
  '^': 6,
  '&': 7,
  '<<': 8,
  '>>': 8,
  '+': 9,
  '-': 9,
  '*': 10,
  '/': 10,
  '%': 10,
};

export function getPrecedence(op: string): number {
  return PRECEDENCE[op] ?? 0;
}

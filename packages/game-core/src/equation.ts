// packages/game-core/src/equation.ts
//
// Equation format and arithmetic checks, shared by the generator, the
// session logic and the CLI.
//
// An equation is exactly 8 characters: <digits><op><digits>=<digits>
//   • op is one of + - * /
//   • no operand has a leading zero unless it is exactly "0"
//   • left op right === result under integer arithmetic
//     (division must be exact and the divisor non-zero)

export const EQUATION_LENGTH = 8;
export const VALID_CHARACTERS = '0123456789+-*/=';
export const OPERATORS = ['+', '-', '*', '/'] as const;

export type Operator = (typeof OPERATORS)[number];

export type ParsedEquation = {
  left: number;
  operator: Operator;
  right: number;
  result: number;
};

/**
 * Why an equation was refused. Rules are checked in this order, so the
 * reason is always the first rule that fails.
 */
export type InvalidReason =
  | 'length'
  | 'characters'
  | 'equals'
  | 'format'
  | 'leading-zero'
  | 'division-by-zero'
  | 'remainder'
  | 'arithmetic';

export type ParseResult =
  | { ok: true; equation: ParsedEquation }
  | { ok: false; reason: InvalidReason };

export class InvalidEquationError extends Error {
  constructor(
    readonly equation: string,
    readonly reason: InvalidReason,
  ) {
    super(`Invalid equation "${equation}" (${reason})`);
    this.name = 'InvalidEquationError';
  }
}

const SHAPE = /^(\d+)([+\-*/])(\d+)=(\d+)$/;
const LEADING_ZERO = /^0\d/;

export function isOperator(c: string): c is Operator {
  return (OPERATORS as readonly string[]).includes(c);
}

/**
 * Applies an operator under integer semantics. Returns null where the
 * result is not a whole number (division by zero, inexact division).
 */
export function evaluateExpression(
  left: number,
  operator: Operator,
  right: number,
): number | null {
  switch (operator) {
    case '+':
      return left + right;
    case '-':
      return left - right;
    case '*':
      return left * right;
    case '/':
      if (right === 0 || left % right !== 0) return null;
      return left / right;
  }
}

export function parseEquation(text: string): ParseResult {
  if (text.length !== EQUATION_LENGTH) return { ok: false, reason: 'length' };
  for (const c of text) {
    if (!VALID_CHARACTERS.includes(c)) return { ok: false, reason: 'characters' };
  }
  if (text.split('=').length !== 2) return { ok: false, reason: 'equals' };

  const m = SHAPE.exec(text);
  if (!m) return { ok: false, reason: 'format' };
  const [, l, op, r, res] = m;
  if (!isOperator(op)) return { ok: false, reason: 'format' };
  if ([l, r, res].some((part) => LEADING_ZERO.test(part))) {
    return { ok: false, reason: 'leading-zero' };
  }

  const left = Number(l);
  const right = Number(r);
  const result = Number(res);
  if (op === '/' && right === 0) return { ok: false, reason: 'division-by-zero' };
  if (op === '/' && left % right !== 0) return { ok: false, reason: 'remainder' };
  if (evaluateExpression(left, op, right) !== result) {
    return { ok: false, reason: 'arithmetic' };
  }

  return { ok: true, equation: { left, operator: op, right, result } };
}

export function isValidEquation(text: string): boolean {
  return parseEquation(text).ok;
}

export function formatEquation(eq: ParsedEquation): string {
  return `${eq.left}${eq.operator}${eq.right}=${eq.result}`;
}

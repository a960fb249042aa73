// packages/game-core/src/generator.ts
//
// Random target equations.
//
// The 8 characters split into operator + "=" + three digit runs, so the
// widths of left, right and result always sum to 6. Only some width triples
// can hold a true equation for a given operator (nothing fits "N+N=NNNN"),
// so the generator first enumerates the satisfiable triples ("shapes") and
// then rejection-samples inside a randomly chosen one:
//
//   • "+" and "*" sample both operands and check the result width
//   • "-" samples subtrahend and difference; the minuend is their sum
//   • "/" samples a non-zero divisor and the quotient; the dividend is
//     their product, so division is always exact
//
// Every candidate is re-validated before it is returned. The enumeration
// yields:
//   +  N+NN=NNN   NN+N=NNN   NN+NN=NN
//   -  NN-NN=NN   NNN-N=NN   NNN-NN=N
//   *  N*NN=NNN   NN*N=NNN
//   /  NNN/N=NN   NNN/NN=N

import {
  EQUATION_LENGTH,
  OPERATORS,
  evaluateExpression,
  formatEquation,
  isValidEquation,
  type Operator,
  type ParsedEquation,
} from './equation.js';

export type Random = () => number;

export type Widths = [left: number, right: number, result: number];

export type EquationShape = {
  operator: Operator;
  widths: Widths;
};

export type GenerateOptions = {
  /** Source of randomness in [0, 1). Defaults to Math.random. */
  random?: Random;
  maxAttempts?: number;
};

export const MAX_GENERATION_ATTEMPTS = 10_000;

// Characters left for digits once the operator and "=" are placed.
const DIGIT_BUDGET = EQUATION_LENGTH - 2;

export class EquationGenerationError extends Error {
  constructor(
    readonly operator: Operator,
    readonly attempts: number,
  ) {
    super(`No ${operator} equation found after ${attempts} attempts`);
    this.name = 'EquationGenerationError';
  }
}

const digitWidth = (n: number) => String(n).length;

/** Smallest and largest number written with exactly `width` digits. */
function range(width: number): [min: number, max: number] {
  return [width === 1 ? 0 : 10 ** (width - 1), 10 ** width - 1];
}

function randInt(random: Random, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

function pick<T>(random: Random, list: readonly T[]): T {
  return list[Math.floor(random() * list.length) % list.length];
}

/**
 * Does a true equation with a non-zero left operand and result exist for
 * this operator and width triple? Shapes that only "0*1234=0" can fill are
 * left out of the targets, though the validator still accepts them.
 */
function satisfiable(operator: Operator, [wl, wr, wres]: Widths): boolean {
  const [lMin, lMax] = range(wl);
  const [rMin, rMax] = range(wr);
  for (let l = lMin; l <= lMax; l++) {
    for (let r = rMin; r <= rMax; r++) {
      const res = evaluateExpression(l, operator, r);
      if (l > 0 && res !== null && res > 0 && digitWidth(res) === wres) return true;
    }
  }
  return false;
}

const shapeCache = new Map<Operator, EquationShape[]>();

/**
 * All width triples that admit at least one equation for `operator`.
 * Computed once per operator by enumeration.
 */
export function equationShapes(operator: Operator): EquationShape[] {
  const cached = shapeCache.get(operator);
  if (cached) return cached;

  const shapes: EquationShape[] = [];
  for (let wl = 1; wl <= DIGIT_BUDGET - 2; wl++) {
    for (let wr = 1; wl + wr <= DIGIT_BUDGET - 1; wr++) {
      const widths: Widths = [wl, wr, DIGIT_BUDGET - wl - wr];
      if (satisfiable(operator, widths)) shapes.push({ operator, widths });
    }
  }
  shapeCache.set(operator, shapes);
  return shapes;
}

function drawCandidate(shape: EquationShape, random: Random): ParsedEquation {
  const [wl, wr, wres] = shape.widths;
  const draw = (width: number) => randInt(random, ...range(width));

  switch (shape.operator) {
    case '+': {
      const left = draw(wl);
      const right = draw(wr);
      return { left, operator: '+', right, result: left + right };
    }
    case '*': {
      const left = draw(wl);
      const right = draw(wr);
      return { left, operator: '*', right, result: left * right };
    }
    case '-': {
      const right = draw(wr);
      const result = draw(wres);
      return { left: right + result, operator: '-', right, result };
    }
    case '/': {
      const [rMin, rMax] = range(wr);
      const right = randInt(random, Math.max(rMin, 1), rMax);
      const result = draw(wres);
      return { left: right * result, operator: '/', right, result };
    }
  }
}

/**
 * One sampling attempt inside a shape. Returns null when the drawn numbers
 * do not fill the shape's widths.
 */
export function sampleEquation(
  shape: EquationShape,
  random: Random,
): ParsedEquation | null {
  const eq = drawCandidate(shape, random);
  const [wl, wr, wres] = shape.widths;
  const fits =
    digitWidth(eq.left) === wl &&
    digitWidth(eq.right) === wr &&
    digitWidth(eq.result) === wres;
  return fits ? eq : null;
}

/**
 * Produces a random valid equation, e.g. "12+34=46" or "252/36=7".
 *
 * @throws EquationGenerationError if no candidate fits within maxAttempts
 */
export function generateEquation(options: GenerateOptions = {}): string {
  const random = options.random ?? Math.random;
  const maxAttempts = options.maxAttempts ?? MAX_GENERATION_ATTEMPTS;

  const operator = pick(random, OPERATORS);
  const shapes = equationShapes(operator);

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    const eq = sampleEquation(pick(random, shapes), random);
    if (!eq) continue;
    const text = formatEquation(eq);
    if (isValidEquation(text)) return text;
  }
  throw new EquationGenerationError(operator, maxAttempts);
}

/**
 * Deterministic random source for a seed string (daily or shared puzzles).
 * FNV-1a hashes the seed into the state of a Park–Miller generator.
 */
export function seededRandom(seed: string): Random {
  let h = 2166136261;
  for (const ch of seed) {
    h ^= ch.charCodeAt(0);
    h = Math.imul(h, 16777619);
  }
  let state = Math.abs(h) % 2147483647;
  if (state <= 0) state += 2147483646;
  return () => {
    state = (state * 16807) % 2147483647;
    return (state - 1) / 2147483646;
  };
}

// packages/game-core/src/scoring.ts
//
// Guess evaluation: the standard two-pass Wordle algorithm applied to
// equation characters.
//
// Mark legend:
//   - "exact":   correct character, correct position
//   - "present": character is in the target, but elsewhere
//   - "absent":  no unclaimed occurrence left in the target
//
// Rules:
//   • Both equations must be exactly 8 characters. Format and arithmetic are
//     checked by the caller (see equation.ts); any 8 characters are scored.
//   • Operators and "=" are ordinary symbols here, scored like digits.
//   • Repeated characters are handled with a count pool over the target:
//     exact matches consume their occurrence first, then the remaining guess
//     positions claim what is left from left to right.

import { EQUATION_LENGTH } from './equation.js';

export type Mark = 'exact' | 'present' | 'absent';

export type Feedback = Mark[];

/**
 * scoreGuess compares a guess against the target and produces a per-character evaluation.
 *
 * @param target - the secret equation
 * @param guess  - the player's equation
 * @returns      - 8 marks, aligned with the guess
 *
 * Example:
 *   target = "12+34=46", guess = "15+35=50"
 *   → ["exact", "absent", "exact", "exact", "absent", "exact", "absent", "absent"]
 */
export function scoreGuess(target: string, guess: string): Feedback {
  if (target.length !== EQUATION_LENGTH || guess.length !== EQUATION_LENGTH) {
    throw new RangeError(`Equations must be ${EQUATION_LENGTH} characters`);
  }

  const marks: Feedback = Array<Mark>(EQUATION_LENGTH).fill('absent');
  const counts = new Map<string, number>();
  for (const c of target) counts.set(c, (counts.get(c) ?? 0) + 1);

  // Pass 1: exact matches consume their occurrence
  for (let i = 0; i < EQUATION_LENGTH; i++) {
    if (guess[i] === target[i]) {
      marks[i] = 'exact';
      counts.set(guess[i], (counts.get(guess[i]) ?? 0) - 1);
    }
  }

  // Pass 2: leftmost remaining guess positions claim what is left
  for (let i = 0; i < EQUATION_LENGTH; i++) {
    if (marks[i] === 'exact') continue;
    const c = guess[i];
    const left = counts.get(c) ?? 0;
    if (left > 0) {
      marks[i] = 'present';
      counts.set(c, left - 1);
    }
  }

  return marks;
}

/** True when every position is an exact match. */
export function isSolved(feedback: readonly Mark[]): boolean {
  return feedback.every((m) => m === 'exact');
}

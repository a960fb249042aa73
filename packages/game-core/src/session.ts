// packages/game-core/src/session.ts
//
// Game session state for a single puzzle.
//
// A session is a plain immutable value owned by whoever runs the game (the
// CLI keeps one per game). submitGuess never mutates its input; it returns
// the next session together with what happened to the guess:
//
//   • "rejected" → the guess is not a valid equation; no attempt is used
//   • "scored"   → feedback was computed and the attempt counted
//   • "finished" → the game was already won or lost

import { nanoid } from 'nanoid';
import {
  InvalidEquationError,
  parseEquation,
  type InvalidReason,
} from './equation.js';
import { isSolved, scoreGuess, type Feedback } from './scoring.js';

export const DEFAULT_MAX_ATTEMPTS = 6;

export type GameState = 'playing' | 'won' | 'lost';

export type GameSession = Readonly<{
  id: string;
  target: string;
  guesses: readonly string[];
  feedback: readonly Feedback[];
  attempts: number;
  maxAttempts: number;
  state: GameState;
}>;

export type GuessOutcome =
  | { kind: 'scored'; feedback: Feedback; session: GameSession }
  | { kind: 'rejected'; reason: InvalidReason; session: GameSession }
  | { kind: 'finished'; session: GameSession };

export type CreateGameOptions = {
  id?: string;
  maxAttempts?: number;
};

/**
 * Starts a session for `target`.
 *
 * @throws InvalidEquationError if the target itself is not a valid equation
 * @throws RangeError if maxAttempts is not a positive integer
 */
export function createGame(
  target: string,
  { id = nanoid(), maxAttempts = DEFAULT_MAX_ATTEMPTS }: CreateGameOptions = {},
): GameSession {
  const parsed = parseEquation(target);
  if (!parsed.ok) throw new InvalidEquationError(target, parsed.reason);
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }
  return {
    id,
    target,
    guesses: [],
    feedback: [],
    attempts: 0,
    maxAttempts,
    state: 'playing',
  };
}

export function submitGuess(session: GameSession, guess: string): GuessOutcome {
  if (session.state !== 'playing') return { kind: 'finished', session };

  const parsed = parseEquation(guess);
  if (!parsed.ok) return { kind: 'rejected', reason: parsed.reason, session };

  const feedback = scoreGuess(session.target, guess);
  const attempts = session.attempts + 1;
  let state: GameState = 'playing';
  if (isSolved(feedback)) state = 'won';
  else if (attempts >= session.maxAttempts) state = 'lost';

  return {
    kind: 'scored',
    feedback,
    session: {
      ...session,
      guesses: [...session.guesses, guess],
      feedback: [...session.feedback, feedback],
      attempts,
      state,
    },
  };
}

export function remainingAttempts(session: GameSession): number {
  return session.maxAttempts - session.attempts;
}

export function isGameOver(session: GameSession): boolean {
  return session.state !== 'playing';
}

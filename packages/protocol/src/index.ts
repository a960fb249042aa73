// packages/protocol/src/index.ts
//
// Shared data shapes for game front ends.
// Uses Zod schemas for runtime validation + TypeScript types for compile-time safety.
//
// Defines:
//   - Mark:        per-character evaluation ("exact", "present", "absent").
//   - GameOptions: attempt budget, optional seed, color output.
//   - GuessResult: one scored guess, as printed by the CLI in --json mode.
//   - GuessRejection: a guess refused before scoring, with the reason.
//   - GameSummary: the outcome of a finished game.

import { z } from 'zod';

/**
 * Mark schema:
 *  - "exact"   → correct character, correct position
 *  - "present" → correct character, wrong position
 *  - "absent"  → character not (or no longer) in the target
 */
export const markSchema = z.enum(['exact', 'present', 'absent']);
export type Mark = z.infer<typeof markSchema>;

export const gameStateSchema = z.enum(['playing', 'won', 'lost']);
export type GameState = z.infer<typeof gameStateSchema>;

/**
 * Why a guess was refused, in the order the checks run.
 */
export const invalidReasonSchema = z.enum([
  'length',
  'characters',
  'equals',
  'format',
  'leading-zero',
  'division-by-zero',
  'remainder',
  'arithmetic',
]);
export type InvalidReason = z.infer<typeof invalidReasonSchema>;

/* -------------------------------------------------------------------------- */
/*                                Game options                                */
/* -------------------------------------------------------------------------- */

/**
 * Options for a new game.
 *  - maxAttempts: number of allowed guesses (1–10), defaults to 6
 *  - seed:        optional string for a reproducible target
 *  - color:       ANSI colored feedback, defaults to true
 */
export const gameOptionsSchema = z.object({
  maxAttempts: z.coerce.number().int().min(1).max(10).default(6),
  seed: z.string().min(1).optional(),
  color: z.boolean().default(true),
});
export type GameOptions = z.infer<typeof gameOptionsSchema>;
export type GameOptionsInput = z.input<typeof gameOptionsSchema>;

/* -------------------------------------------------------------------------- */
/*                                  Results                                   */
/* -------------------------------------------------------------------------- */

/**
 * One scored guess:
 *  - marks: per-character results (length 8)
 *  - round: attempt number (1-based)
 *  - state: "playing" | "won" | "lost"
 */
export const guessResultSchema = z.object({
  guess: z.string().length(8),
  marks: z.array(markSchema).length(8),
  round: z.number().int().min(1),
  state: gameStateSchema,
});
export type GuessResult = z.infer<typeof guessResultSchema>;

export const guessRejectionSchema = z.object({
  guess: z.string(),
  reason: invalidReasonSchema,
});
export type GuessRejection = z.infer<typeof guessRejectionSchema>;

export const gameSummarySchema = z.object({
  gameId: z.string(),
  target: z.string().length(8),
  won: z.boolean(),
  attempts: z.number().int().min(0),
});
export type GameSummary = z.infer<typeof gameSummarySchema>;

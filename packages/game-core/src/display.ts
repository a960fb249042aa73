// packages/game-core/src/display.ts
//
// Text rendering of feedback and boards for terminal front ends.
//
//   • plain: "[1G][2B][+Y]..." (G = exact, Y = present, B = absent)
//   • color: each character on a green / yellow / gray ANSI background

import type { InvalidReason } from './equation.js';
import type { Feedback, Mark } from './scoring.js';
import { remainingAttempts, type GameSession } from './session.js';

const RESET = '\x1b[0m';
const BACKGROUND: Record<Mark, string> = {
  exact: '\x1b[42m\x1b[30m',
  present: '\x1b[43m\x1b[30m',
  absent: '\x1b[47m\x1b[30m',
};

const CODE: Record<Mark, string> = { exact: 'G', present: 'Y', absent: 'B' };

export function markCode(mark: Mark): string {
  return CODE[mark];
}

export function formatFeedbackPlain(guess: string, feedback: Feedback): string {
  return [...guess].map((c, i) => `[${c}${CODE[feedback[i]]}]`).join('');
}

export function formatFeedbackColor(guess: string, feedback: Feedback): string {
  return [...guess]
    .map((c, i) => `${BACKGROUND[feedback[i]]} ${c} ${RESET}`)
    .join('');
}

export type DescribeOptions = { color?: boolean };

/** Board with every guess so far and the attempts left. */
export function describeGameState(
  session: GameSession,
  { color = true }: DescribeOptions = {},
): string {
  if (session.guesses.length === 0) {
    return 'No guesses yet. Make your first guess!';
  }
  const render = color ? formatFeedbackColor : formatFeedbackPlain;
  const lines = ['Your guesses so far:', ''];
  session.guesses.forEach((g, i) => lines.push(`  ${render(g, session.feedback[i])}`));
  lines.push('', `Attempts remaining: ${remainingAttempts(session)}`);
  return lines.join('\n');
}

const REJECTIONS: Record<InvalidReason, string> = {
  length: 'Guess must be exactly 8 characters.',
  characters: 'Only the characters 0123456789+-*/= are allowed.',
  equals: 'Equation must have exactly one equals sign (=).',
  format: 'Use the form <number><operator><number>=<number>, e.g. 12+34=46.',
  'leading-zero': 'Numbers cannot start with 0.',
  'division-by-zero': 'Division by zero is not allowed.',
  remainder: 'Division must come out even.',
  arithmetic: 'Equation is not mathematically correct.',
};

export function describeRejection(reason: InvalidReason): string {
  return REJECTIONS[reason];
}

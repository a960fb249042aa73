// apps/cli/src/play.ts
//
// The game controller: owns the session value, reads guesses, prints the
// board and decides when a game (and the whole sitting) is over.
//
// I/O goes through a small GameIO interface so tests can script the player.
// In JSON mode only machine-readable lines are written: one GuessResult or
// GuessRejection per submitted guess and a GameSummary at the end.

import {
  createGame,
  describeGameState,
  describeRejection,
  generateEquation,
  isGameOver,
  remainingAttempts,
  seededRandom,
  submitGuess,
  type GameSession,
  type Random,
} from '@nerdle/game-core';
import {
  gameSummarySchema,
  guessRejectionSchema,
  guessResultSchema,
  type GameOptions,
  type GameSummary,
} from '@nerdle/protocol';
import type { Logger } from './logger.js';

export type GameIO = {
  /** Prompts and resolves with one line, or null once input has ended. */
  ask(prompt: string): Promise<string | null>;
  write(text: string): void;
};

export type PlayOptions = GameOptions & {
  json?: boolean;
  /** Overrides the seed; one source is shared by every game of a sitting. */
  random?: Random;
  log: Logger;
};

export class InputClosedError extends Error {
  constructor() {
    super('Input closed before the game finished');
    this.name = 'InputClosedError';
  }
}

const GUESS_PROMPT = 'Enter your guess (8 characters, e.g., 12+34=46):\n> ';

export const WELCOME = [
  '='.repeat(60),
  '             WELCOME TO NERDLE!',
  '         A Math Equation Guessing Game',
  '='.repeat(60),
  '',
  'GAME RULES:',
  '- Guess the 8-character math equation',
  '- Each equation has the format: NN+NN=NN (or -, *, /)',
  '- After each guess, you get feedback for every character:',
  '  * Green:  correct character in the correct position',
  '  * Yellow: correct character but wrong position',
  '  * Gray:   character not in the target equation',
  '',
  'Valid characters: 0123456789+-*/=',
  '='.repeat(60),
  '',
].join('\n');

async function ask(io: GameIO, prompt: string): Promise<string> {
  const line = await io.ask(prompt);
  if (line === null) throw new InputClosedError();
  return line.trim();
}

function resultMessage(session: GameSession): string {
  if (session.state === 'won') {
    return `Congratulations! You guessed it in ${session.attempts} attempts!`;
  }
  if (session.state === 'lost') {
    return `Game over! The equation was: ${session.target}`;
  }
  return `Try again! ${remainingAttempts(session)} attempts remaining.`;
}

/**
 * Plays one game to the end.
 *
 * @throws InputClosedError if input ends mid-game
 */
export async function playGame(io: GameIO, options: PlayOptions): Promise<GameSummary> {
  const { log, json = false, color } = options;
  const random = options.random ?? (options.seed ? seededRandom(options.seed) : Math.random);

  if (!json) io.write('Generating your equation...');
  let session = createGame(generateEquation({ random }), {
    maxAttempts: options.maxAttempts,
  });
  const gameLog = log.child({ gameId: session.id });
  gameLog.info({ maxAttempts: session.maxAttempts }, 'game started');
  gameLog.debug({ target: session.target }, 'target chosen');
  if (!json) io.write('Equation generated! Start guessing...\n');

  while (!isGameOver(session)) {
    if (!json) io.write(`${describeGameState(session, { color })}\n`);

    const guess = await ask(io, json ? '' : GUESS_PROMPT);
    const outcome = submitGuess(session, guess);

    if (outcome.kind === 'rejected') {
      gameLog.info({ guess, reason: outcome.reason }, 'guess rejected');
      io.write(
        json
          ? JSON.stringify(guessRejectionSchema.parse({ guess, reason: outcome.reason }))
          : `Error: ${describeRejection(outcome.reason)}\n`,
      );
      continue;
    }
    if (outcome.kind === 'finished') break;

    session = outcome.session;
    gameLog.info({ round: session.attempts, state: session.state }, 'guess scored');
    if (json) {
      io.write(
        JSON.stringify(
          guessResultSchema.parse({
            guess,
            marks: outcome.feedback,
            round: session.attempts,
            state: session.state,
          }),
        ),
      );
    } else {
      io.write(`\nRESULT: ${resultMessage(session)}\n`);
    }
  }

  const summary = gameSummarySchema.parse({
    gameId: session.id,
    target: session.target,
    won: session.state === 'won',
    attempts: session.attempts,
  });
  gameLog.info({ won: summary.won, attempts: summary.attempts }, 'game finished');

  if (json) {
    io.write(JSON.stringify(summary));
  } else {
    io.write(`${describeGameState(session, { color })}\n`);
    if (summary.won) {
      io.write('🎉 CONGRATULATIONS! You solved the equation! 🎉');
    } else {
      io.write('😞 Better luck next time!');
      io.write(`The correct equation was: ${session.target}`);
    }
  }
  return summary;
}

async function askPlayAgain(io: GameIO): Promise<boolean> {
  for (;;) {
    const answer = (await ask(io, 'Would you like to play again? (y/n): ')).toLowerCase();
    if (answer === 'y' || answer === 'yes') return true;
    if (answer === 'n' || answer === 'no') return false;
    io.write("Please enter 'y' for yes or 'n' for no.");
  }
}

export type SittingStats = { played: number; won: number };

/**
 * Plays games until the player declines another one (or input ends), then
 * prints the totals.
 */
export async function playSession(io: GameIO, options: PlayOptions): Promise<SittingStats> {
  const random = options.random ?? (options.seed ? seededRandom(options.seed) : Math.random);
  const stats: SittingStats = { played: 0, won: 0 };

  io.write(WELCOME);
  try {
    for (;;) {
      stats.played++;
      io.write(`\nGAME ${stats.played}\n${'-'.repeat(20)}`);
      const summary = await playGame(io, { ...options, random });
      if (summary.won) stats.won++;
      io.write('');
      if (!(await askPlayAgain(io))) break;
    }
  } catch (err) {
    if (!(err instanceof InputClosedError)) throw err;
    options.log.info({ played: stats.played }, 'input closed');
  }

  io.write(
    [
      '',
      '='.repeat(40),
      '           THANKS FOR PLAYING!',
      '='.repeat(40),
      `Games played: ${stats.played}`,
      `Games won: ${stats.won}`,
      'Come back anytime to exercise your math skills!',
      '='.repeat(40),
    ].join('\n'),
  );
  return stats;
}

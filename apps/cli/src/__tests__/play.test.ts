// apps/cli/src/__tests__/play.test.ts
//
// Drives the game controller with a scripted player.
//
// A constant random source of 0.999999 makes the generator pick "/" and the
// NNN/NN=N shape with divisor 99 and quotient 9, so every game here has the
// target "891/99=9".

import { pino } from 'pino';
import {
  InputClosedError,
  playGame,
  playSession,
  type GameIO,
  type PlayOptions,
} from '../play.js';

const TARGET = '891/99=9';

function scripted(answers: string[]) {
  const queue = [...answers];
  const writes: string[] = [];
  const io: GameIO = {
    ask: async () => queue.shift() ?? null,
    write: (text) => {
      writes.push(text);
    },
  };
  return { io, writes };
}

const options = (extra: Partial<PlayOptions> = {}): PlayOptions => ({
  maxAttempts: 6,
  color: false,
  random: () => 0.999999,
  log: pino({ level: 'silent' }),
  ...extra,
});

describe('playGame', () => {
  it('wins on a correct guess', async () => {
    const { io, writes } = scripted([TARGET]);
    const summary = await playGame(io, options());
    expect(summary).toEqual({
      gameId: expect.any(String),
      target: TARGET,
      won: true,
      attempts: 1,
    });
    expect(writes).toContain('\nRESULT: Congratulations! You guessed it in 1 attempts!\n');
    expect(writes.at(-1)).toBe('🎉 CONGRATULATIONS! You solved the equation! 🎉');
  });

  it('re-prompts on invalid guesses without using an attempt', async () => {
    const { io, writes } = scripted(['12+34=47', '12+34=46', '15+35=50']);
    const summary = await playGame(io, options({ maxAttempts: 2 }));
    expect(summary.won).toBe(false);
    expect(summary.attempts).toBe(2);
    expect(writes).toContain('Error: Equation is not mathematically correct.\n');
    expect(writes).toContain('\nRESULT: Try again! 1 attempts remaining.\n');
    expect(writes).toContain(`\nRESULT: Game over! The equation was: ${TARGET}\n`);
    expect(writes.slice(-2)).toEqual([
      '😞 Better luck next time!',
      `The correct equation was: ${TARGET}`,
    ]);
  });

  it('prints the board with plain feedback', async () => {
    const { io, writes } = scripted(['12+34=46', TARGET]);
    await playGame(io, options());
    expect(writes).toContain(
      [
        'Your guesses so far:',
        '',
        '  [1Y][2B][+B][3B][4B][=Y][4B][6B]',
        '',
        'Attempts remaining: 5',
        '',
      ].join('\n'),
    );
  });

  it('writes JSON lines in json mode', async () => {
    const { io, writes } = scripted(['1+1=2', TARGET]);
    await playGame(io, options({ json: true }));
    expect(writes).toHaveLength(3);
    expect(JSON.parse(writes[0])).toEqual({ guess: '1+1=2', reason: 'length' });
    expect(JSON.parse(writes[1])).toEqual({
      guess: TARGET,
      marks: Array(8).fill('exact'),
      round: 1,
      state: 'won',
    });
    expect(JSON.parse(writes[2])).toMatchObject({ target: TARGET, won: true, attempts: 1 });
  });

  it('fails when input ends mid-game', async () => {
    const { io } = scripted(['12+34=46']);
    await expect(playGame(io, options())).rejects.toBeInstanceOf(InputClosedError);
  });
});

describe('playSession', () => {
  it('keeps playing while the player says yes', async () => {
    const { io, writes } = scripted([TARGET, 'maybe', 'y', '12+34=46', TARGET, 'no']);
    const stats = await playSession(io, options());
    expect(stats).toEqual({ played: 2, won: 2 });
    expect(writes).toContain("Please enter 'y' for yes or 'n' for no.");
    expect(writes.at(-1)).toContain('Games played: 2\nGames won: 2\n');
  });

  it('stops cleanly when input ends', async () => {
    const { io, writes } = scripted([TARGET]);
    const stats = await playSession(io, options());
    expect(stats).toEqual({ played: 1, won: 1 });
    expect(writes.at(-1)).toContain('Games played: 1\n');
  });
});

// packages/game-core/src/__tests__/session.test.ts
//
// Unit tests for the per-game state machine: attempts, win/loss detection
// and rejected guesses that do not cost an attempt.

import {
  InvalidEquationError,
  createGame,
  isGameOver,
  remainingAttempts,
  submitGuess,
  type GameSession,
  type GuessOutcome,
} from '../index.js';

function scored(outcome: GuessOutcome): GameSession {
  if (outcome.kind !== 'scored') throw new Error(`expected scored, got ${outcome.kind}`);
  return outcome.session;
}

describe('createGame', () => {
  it('starts an empty session with six attempts', () => {
    const game = createGame('12+34=46', { id: 'test-game' });
    expect(game).toEqual({
      id: 'test-game',
      target: '12+34=46',
      guesses: [],
      feedback: [],
      attempts: 0,
      maxAttempts: 6,
      state: 'playing',
    });
    expect(remainingAttempts(game)).toBe(6);
    expect(isGameOver(game)).toBe(false);
  });

  it('generates an id when none is given', () => {
    expect(createGame('12+34=46').id).toMatch(/^[\w-]{21}$/);
  });

  it('refuses an invalid target', () => {
    expect(() => createGame('12+34=47')).toThrow(InvalidEquationError);
  });

  it('refuses a non-positive attempt budget', () => {
    expect(() => createGame('12+34=46', { maxAttempts: 0 })).toThrow(RangeError);
  });
});

describe('submitGuess', () => {
  const start = () => createGame('12+34=46', { id: 'test-game', maxAttempts: 2 });

  it('rejects an invalid guess without using an attempt', () => {
    const game = start();
    const outcome = submitGuess(game, '12+34=47');
    expect(outcome).toEqual({ kind: 'rejected', reason: 'arithmetic', session: game });
    expect(outcome.session).toBe(game);
  });

  it('scores a valid guess and keeps playing', () => {
    const game = start();
    const outcome = submitGuess(game, '15+35=50');
    expect(outcome.kind).toBe('scored');
    const next = scored(outcome);
    expect(next.attempts).toBe(1);
    expect(next.state).toBe('playing');
    expect(next.guesses).toEqual(['15+35=50']);
    expect(next.feedback).toEqual([
      ['exact', 'absent', 'exact', 'exact', 'absent', 'exact', 'absent', 'absent'],
    ]);
    expect(remainingAttempts(next)).toBe(1);
    // the previous session value is untouched
    expect(game.attempts).toBe(0);
    expect(game.guesses).toEqual([]);
  });

  it('wins on an exact match', () => {
    const next = scored(submitGuess(start(), '12+34=46'));
    expect(next.state).toBe('won');
    expect(next.attempts).toBe(1);
    expect(isGameOver(next)).toBe(true);
  });

  it('loses when the attempts run out', () => {
    const once = scored(submitGuess(start(), '15+35=50'));
    const twice = scored(submitGuess(once, '21+10=31'));
    expect(twice.state).toBe('lost');
    expect(remainingAttempts(twice)).toBe(0);
  });

  it('ignores guesses once the game is over', () => {
    const won = scored(submitGuess(start(), '12+34=46'));
    expect(submitGuess(won, '15+35=50')).toEqual({ kind: 'finished', session: won });
  });
});

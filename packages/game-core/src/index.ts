// packages/game-core/src/index.ts
//
// Entry point for the game-core package.
// Re-exports all core game logic so consumers can import from one place.
//
// Includes:
//   • equation.ts  → format/arithmetic validation (parseEquation, isValidEquation)
//   • generator.ts → random target equations (generateEquation, seededRandom)
//   • scoring.ts   → guess evaluation (scoreGuess, Mark type)
//   • session.ts   → per-game state (createGame, submitGuess)
//   • display.ts   → terminal rendering of feedback and boards
//
// Example usage:
//   import { generateEquation, scoreGuess } from '@nerdle/game-core';

export * from './equation.js';
export * from './generator.js';
export * from './scoring.js';
export * from './session.js';
export * from './display.js';

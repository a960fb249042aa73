#!/usr/bin/env tsx
// apps/cli/src/main.ts
//
// Command-line entry point.
//
//   nerdle [--seed <s>] [--max-attempts <n>] [--no-color] [--json] [--help]
//
// Flags override the environment (see config.ts). --json plays a single game
// and writes JSON lines instead of the board.

import 'dotenv/config';
import { createInterface } from 'node:readline';
import { parseArgs } from 'node:util';
import { ZodError } from 'zod';
import type { GameOptions } from '@nerdle/protocol';

import { loadConfig, resolveGameOptions } from './config.js';
import { createLogger } from './logger.js';
import { InputClosedError, playGame, playSession, type GameIO } from './play.js';

const USAGE = `Usage: nerdle [options]

Guess the hidden 8-character equation in a limited number of attempts.

Options:
  --seed <text>          reproducible targets (e.g. a date for a daily puzzle)
  --max-attempts <n>     guesses per game, 1-10 (default 6)
  --no-color             plain [1G][2Y][3B] feedback instead of colors
  --json                 play one game, reading guesses and writing JSON lines
  -h, --help             show this help`;

async function main(): Promise<number> {
  const { values } = parseArgs({
    options: {
      seed: { type: 'string' },
      'max-attempts': { type: 'string' },
      'no-color': { type: 'boolean' },
      json: { type: 'boolean' },
      help: { type: 'boolean', short: 'h' },
    },
  });
  if (values.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const config = loadConfig();
  const log = createLogger(config.logLevel);

  let options: GameOptions;
  try {
    options = resolveGameOptions(config, {
      seed: values.seed,
      maxAttempts: values['max-attempts'],
      color: values['no-color'] ? false : undefined,
    });
  } catch (err) {
    if (!(err instanceof ZodError)) throw err;
    for (const issue of err.issues) {
      process.stderr.write(`Invalid option ${issue.path.join('.')}: ${issue.message}\n`);
    }
    return 2;
  }

  const rl = createInterface({ input: process.stdin });
  const lines = rl[Symbol.asyncIterator]();
  const io: GameIO = {
    async ask(prompt) {
      process.stdout.write(prompt);
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    write: (text) => process.stdout.write(`${text}\n`),
  };

  try {
    if (values.json) {
      await playGame(io, { ...options, json: true, log });
    } else {
      await playSession(io, { ...options, log });
    }
    return 0;
  } catch (err) {
    if (err instanceof InputClosedError) {
      log.warn('input closed before the game finished');
      return 1;
    }
    log.fatal({ err }, 'unexpected error');
    return 1;
  } finally {
    rl.close();
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    process.stderr.write(`nerdle: ${err instanceof Error ? err.message : String(err)}\n`);
    process.exitCode = 1;
  },
);

// apps/cli/src/config.ts
//
// Environment configuration. `.env` is loaded by main.ts (dotenv/config);
// this module only validates what ended up in process.env.
//
//   LOG_LEVEL            pino level, default "info"
//   NERDLE_MAX_ATTEMPTS  guesses per game (1–10)
//   NERDLE_SEED          fixed seed for reproducible targets
//   NO_COLOR             any non-empty value disables ANSI colors

import { z } from 'zod';
import { gameOptionsSchema, type GameOptions } from '@nerdle/protocol';

const envSchema = z.object({
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  NERDLE_MAX_ATTEMPTS: z.string().optional(),
  NERDLE_SEED: z.string().optional(),
  NO_COLOR: z.string().optional(),
});

export type LogLevel = z.infer<typeof envSchema>['LOG_LEVEL'];

export type Config = {
  logLevel: LogLevel;
  maxAttempts?: string;
  seed?: string;
  color: boolean;
};

/** Options given on the command line; each one overrides the environment. */
export type CliFlags = {
  maxAttempts?: string;
  seed?: string;
  color?: boolean;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const e = envSchema.parse(env);
  return {
    logLevel: e.LOG_LEVEL,
    maxAttempts: e.NERDLE_MAX_ATTEMPTS || undefined,
    seed: e.NERDLE_SEED || undefined,
    color: !e.NO_COLOR,
  };
}

/**
 * Merges flags over the environment and validates the result.
 *
 * @throws ZodError when the merged options are out of range
 */
export function resolveGameOptions(config: Config, flags: CliFlags): GameOptions {
  return gameOptionsSchema.parse({
    maxAttempts: flags.maxAttempts ?? config.maxAttempts,
    seed: flags.seed ?? config.seed,
    color: flags.color ?? config.color,
  });
}

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';

import { type GameConfig, formatIssues, parseGameConfig } from './config.js';
import { ConfigError } from './errors.js';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PONG_LOG_LEVEL: z
    .enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'])
    .default('warn'),
  PONG_LOG_FILE: z.string().min(1).optional(),
  PONG_CONTROL: z.enum(['keys', 'pointer']).default('keys'),
  PONG_SERVE_AXIS: z.enum(['x', 'y']).default('y'),
  PONG_FPS: z.coerce.number().int().positive().optional(),
});

export type Env = z.infer<typeof envSchema>;

export type LogLevel = Env['PONG_LOG_LEVEL'];

export interface EnvConfig {
  nodeEnv: Env['NODE_ENV'];
  logging: {
    level: LogLevel;
    file: string | undefined;
  };
  game: GameConfig;
}

export const parseEnv = (source: NodeJS.ProcessEnv): EnvConfig => {
  const parsed = envSchema.safeParse(source);

  if (!parsed.success) {
    throw new ConfigError('INVALID_ENV', `Environment configuration invalid: ${formatIssues(parsed.error)}`);
  }

  const env = parsed.data;

  return {
    nodeEnv: env.NODE_ENV,
    logging: {
      level: env.PONG_LOG_LEVEL,
      file: env.PONG_LOG_FILE,
    },
    game: parseGameConfig({
      control: env.PONG_CONTROL,
      serveAxis: env.PONG_SERVE_AXIS,
      ...(env.PONG_FPS !== undefined ? { fps: env.PONG_FPS } : {}),
    }),
  };
};

// Reads .env from the working directory when present, then validates.
export const loadEnv = (): EnvConfig => {
  loadDotenv();
  return parseEnv(process.env);
};

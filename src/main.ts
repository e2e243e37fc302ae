#!/usr/bin/env node
/**
 * @file main.ts
 * @description Entry point for Terminal Pong.
 *
 * Responsibilities:
 *   1. Read and validate the environment (log level, control scheme...).
 *   2. Take over the terminal as the game surface.
 *   3. Build the Game with explicit configuration and run it.
 *   4. Give the terminal back and exit 0 on a clean quit.
 *
 * Any failure before the loop starts (bad configuration, no TTY) is fatal:
 * it is logged and the process exits with status 1.
 */

import type { Logger } from './logger.js';
import { createLogger } from './logger.js';
import type { EnvConfig } from './env.js';
import { loadEnv } from './env.js';
import type { TerminalSession } from './terminal.js';
import { createTerminalSurface } from './terminal.js';
import { IntervalClock } from './clock.js';
import { Game } from './game.js';

const describeError = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);

/** Validated environment, or null after reporting why it is invalid. */
function readEnv(): EnvConfig | null
{
  try
  {
    return loadEnv();
  }
  catch (err)
  {
    process.stderr.write(`${describeError(err)}\n`);
    return null;
  }
}

function openTerminal(env: EnvConfig, logger: Logger): TerminalSession | null
{
  try
  {
    return createTerminalSurface(
      env.game.arena,
      { input: process.stdin, output: process.stdout },
      env.game.keyHoldMs,
    );
  }
  catch (err)
  {
    logger.fatal({ err }, 'could not initialise the terminal');
    process.stderr.write(`${describeError(err)}\n`);
    return null;
  }
}

/**
 * @function main
 * @description Bootstraps and runs one session.  Resolves with the process
 *              exit code.
 */
async function main(): Promise<number>
{
  /* ── Step 1: Configuration ───────────────────────────────────────────
     A ConfigError here means nothing has touched the terminal yet, so a
     plain message on stderr is all that's needed.                       */
  const env = readEnv();
  if (!env) return 1;

  const logger: Logger = createLogger(env.logging, { env: env.nodeEnv });

  /* ── Step 2: Terminal ───────────────────────────────────────────────── */
  const session = openTerminal(env, logger);
  if (!session) return 1;

  /* ── Step 3: Run ──────────────────────────────────────────────────────
     SIGTERM / SIGHUP end the loop the same way the quit key does.        */
  const game = new Game({
    config:  env.game,
    surface: session.surface,
    events:  session.events,
    clock:   new IntervalClock(env.game.fps),
    logger,
  });

  const stop = (): void => game.stop();
  process.once('SIGTERM', stop);
  process.once('SIGHUP', stop);

  try
  {
    await game.run();
  }
  finally
  {
    session.surface.close();
    process.off('SIGTERM', stop);
    process.off('SIGHUP', stop);
  }

  return 0;
}

main().then(
  (code) => { process.exitCode = code; },
  (err: unknown) =>
  {
    process.stderr.write(`${err instanceof Error ? err.stack ?? err.message : String(err)}\n`);
    process.exitCode = 1;
  },
);

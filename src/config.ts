/**
 * @file config.ts
 * @description Validated game configuration.
 *
 * Every tunable the simulation reads (arena size, speeds, control scheme,
 * serve convention, frame rate) lives in one GameConfig object that main.ts
 * builds and passes into the Game constructor.  Nothing reads constants.ts
 * directly at run time except through the defaults below.
 *
 * Validation happens once, up front: a bad value (zero-width arena, ball
 * bigger than the arena, unknown control scheme) throws a ConfigError before
 * any game object exists.
 */

import { z } from 'zod';

import
{
  ARENA_WIDTH, ARENA_HEIGHT, TARGET_FPS,
  BALL_SIZE, BALL_SPEED_X, BALL_SPEED_Y,
  PADDLE_WIDTH, PADDLE_HEIGHT,
  PLAYER_MAX_SPEED, COMPUTER_MAX_SPEED, KEY_SPEED_STEP,
  KEY_HOLD_MS,
} from './constants.js';
import { ConfigError } from './errors.js';

const positiveInt = z.number().int().positive();

export const gameConfigSchema = z
  .object({
    arena: z
      .object({
        width:  positiveInt.default(ARENA_WIDTH),
        height: positiveInt.default(ARENA_HEIGHT),
      })
      .default({}),
    ball: z
      .object({
        size:   positiveInt.default(BALL_SIZE),
        speedX: z.number().int().default(BALL_SPEED_X),
        speedY: z.number().int().default(BALL_SPEED_Y),
      })
      .default({}),
    paddle: z
      .object({
        width:  positiveInt.default(PADDLE_WIDTH),
        height: positiveInt.default(PADDLE_HEIGHT),
      })
      .default({}),
    player: z
      .object({
        maxSpeed: z.number().nonnegative().default(PLAYER_MAX_SPEED),
      })
      .default({}),
    computer: z
      .object({
        maxSpeed: z.number().nonnegative().default(COMPUTER_MAX_SPEED),
      })
      .default({}),
    control:      z.enum(['keys', 'pointer']).default('keys'),
    keySpeedStep: z.number().positive().default(KEY_SPEED_STEP),
    serveAxis:    z.enum(['x', 'y']).default('y'),
    fps:          positiveInt.max(240).default(TARGET_FPS),
    keyHoldMs:    positiveInt.default(KEY_HOLD_MS),
  })
  .superRefine((cfg, ctx) =>
  {
    if (cfg.ball.size >= cfg.arena.width || cfg.ball.size >= cfg.arena.height)
    {
      ctx.addIssue({
        code:    z.ZodIssueCode.custom,
        path:    ['ball', 'size'],
        message: 'Ball must be smaller than the arena',
      });
    }
    if (cfg.paddle.height > cfg.arena.height)
    {
      ctx.addIssue({
        code:    z.ZodIssueCode.custom,
        path:    ['paddle', 'height'],
        message: 'Paddle must fit inside the arena height',
      });
    }
    if (cfg.paddle.width * 2 >= cfg.arena.width)
    {
      ctx.addIssue({
        code:    z.ZodIssueCode.custom,
        path:    ['paddle', 'width'],
        message: 'Paddles must leave room between them',
      });
    }
  });

export type GameConfig      = z.infer<typeof gameConfigSchema>;
export type GameConfigInput = z.input<typeof gameConfigSchema>;

/**
 * @function formatIssues
 * @description Renders zod issues as "path: message" lines.
 */
export function formatIssues(error: z.ZodError): string
{
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * @function parseGameConfig
 * @description Validates raw input and fills in defaults.
 *
 * @param input  Partial configuration; `{}` yields the stock 800 × 500 game.
 * @throws {ConfigError} INVALID_CONFIG when any field is out of range.
 */
export function parseGameConfig(input: unknown = {}): GameConfig
{
  const parsed = gameConfigSchema.safeParse(input);
  if (!parsed.success)
  {
    throw new ConfigError('INVALID_CONFIG', `Invalid game configuration: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * @file paddle.ts
 * @description Paddle construction, speed-capped movement and arena clamping.
 */

import type { Arena, Paddle, Side } from './types.js';
import { makeRect, top, bottom } from './entity.js';
import { COLOR_PADDLE, PADDLE_RIGHT_OFFSET } from './constants.js';
import type { GameConfig } from './config.js';

/**
 * @function makePaddle
 * @description Builds the paddle for one side.
 *
 *   player   — flush against the left edge (x = 0).
 *   computer — PADDLE_RIGHT_OFFSET px in from the right edge.
 *
 * Both start with their top edge at half the arena height.
 */
export function makePaddle(config: GameConfig, side: Side): Paddle
{
  const { arena, paddle } = config;
  const x = side === 'player'
    ? 0
    : arena.width - Math.max(PADDLE_RIGHT_OFFSET, paddle.width);

  return {
    rect:     makeRect(x, arena.height / 2, paddle.width, paddle.height),
    maxSpeed: side === 'player' ? config.player.maxSpeed : config.computer.maxSpeed,
    color:    COLOR_PADDLE,
    side,
  };
}

/**
 * @function stepToward
 * @description The Y a paddle would reach moving toward targetY this tick:
 *              the full distance if it is within maxSpeed, otherwise exactly
 *              maxSpeed in the target's direction.  Does not mutate.
 */
export function stepToward(paddle: Paddle, targetY: number): number
{
  let delta = targetY - paddle.rect.y;
  if (Math.abs(delta) > paddle.maxSpeed)
  {
    delta = delta > 0 ? paddle.maxSpeed : -paddle.maxSpeed;
  }
  return paddle.rect.y + delta;
}

/**
 * @function moveTo
 * @description Moves the paddle's top edge toward targetY by at most
 *              maxSpeed px.  Far-away targets (even outside the arena) give
 *              a constant-speed chase; close ones are matched exactly.
 */
export function moveTo(paddle: Paddle, targetY: number): void
{
  paddle.rect.y = stepToward(paddle, targetY);
}

/**
 * @function clampToArena
 * @description Pulls the paddle back inside the arena vertically.
 *              Called after every move, whoever moved it.
 */
export function clampToArena(paddle: Paddle, arena: Arena): void
{
  if (top(paddle.rect) < 0)
  {
    paddle.rect.y = 0;
  }
  if (bottom(paddle.rect) > arena.height)
  {
    paddle.rect.y = arena.height - paddle.rect.height;
  }
}

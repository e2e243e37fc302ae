/**
 * @file physics.ts
 * @description Ball motion and collision for Terminal Pong.
 *
 * DESIGN — PURE-ISH FUNCTIONS
 * ---------------------------
 * Like paddle.ts, this file owns no state.  Each function receives the Ball
 * record and mutates it in place; the Game decides when each one runs.
 *
 * FIXED STEP
 * ----------
 * Velocities are in px per tick.  advanceBall() adds them once per tick
 * with no delta-time scaling, so the simulation is exactly reproducible.
 *
 * ELASTIC, CONSTANT SPEED
 * -----------------------
 * The only velocity changes anywhere in this file are sign flips, so
 * |vx| and |vy| stay at their serve values for the whole session.
 */

import type { Arena, Ball, Paddle, ServeAxis, Side } from './types.js';
import { makeRect, left, right, top, bottom, overlaps } from './entity.js';
import { COLOR_BALL } from './constants.js';
import type { GameConfig } from './config.js';

/* ═══════════════════════════════════════════════════════════════════════════
   CONSTRUCTION
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @function makeBall
 * @description Creates the ball with its top-left corner at the arena
 *              centre, which is also where every serve starts.
 */
export function makeBall(config: GameConfig): Ball
{
  const startX = config.arena.width  / 2;
  const startY = config.arena.height / 2;

  return {
    rect:  makeRect(startX, startY, config.ball.size, config.ball.size),
    vx:    config.ball.speedX,
    vy:    config.ball.speedY,
    startX,
    startY,
    color: COLOR_BALL,
  };
}

/* ═══════════════════════════════════════════════════════════════════════════
   MOVEMENT
   ═══════════════════════════════════════════════════════════════════════════ */

/** Moves the ball by one tick of velocity.  Runs every tick, unconditionally. */
export function advanceBall(ball: Ball): void
{
  ball.rect.x += ball.vx;
  ball.rect.y += ball.vy;
}

export function bounceX(ball: Ball): void
{
  ball.vx *= -1;
}

export function bounceY(ball: Ball): void
{
  ball.vy *= -1;
}

/**
 * @function resetBall
 * @description Serves again: puts the ball back at its start position and
 *              negates one velocity component.
 *
 *              With axis 'y' (the default) the ball keeps travelling the way
 *              it was heading horizontally but alternates vertical direction
 *              every point.  With axis 'x' it reverses horizontally instead.
 *
 * @param ball  Ball to reset (mutated in place).
 * @param axis  Which component to negate.
 */
export function resetBall(ball: Ball, axis: ServeAxis): void
{
  ball.rect.x = ball.startX;
  ball.rect.y = ball.startY;

  if (axis === 'y') bounceY(ball);
  else              bounceX(ball);
}

/* ═══════════════════════════════════════════════════════════════════════════
   COLLISION
   ═══════════════════════════════════════════════════════════════════════════ */

export type WallHit = 'left' | 'right' | 'top' | 'bottom';

/**
 * @interface PhysicsResult
 * @description What collideBall() found this tick.  The Scorekeeper reads
 *              hitPaddle; the Game logs both.
 */
export interface PhysicsResult
{
  /** First wall the ball touched this tick, or null. */
  hitWall: WallHit | null;

  /** First paddle the ball overlapped this tick, or null. */
  hitPaddle: Side | null;
}

/**
 * @function collideBall
 * @description Reflects the ball off the arena walls and any paddle it
 *              overlaps.  Call once per tick, after advanceBall().
 *
 * Order of checks:
 *   1. Left / right walls  — left edge ≤ 0 or right edge ≥ width flips vx.
 *   2. Top / bottom walls  — top edge ≤ 0 or bottom edge ≥ height flips vy.
 *   3. Paddles             — an overlapping paddle flips vx when the ball
 *                            is still heading toward it.
 *
 * Comparisons are inclusive and nothing is pushed back inside the arena:
 * a ball sitting exactly on a wall flips again every tick until its
 * velocity carries it off.
 */
export function collideBall(ball: Ball, arena: Arena, paddles: readonly Paddle[]): PhysicsResult
{
  const result: PhysicsResult = { hitWall: null, hitPaddle: null };
  const r = ball.rect;

  /* ── 1. Side walls ── */
  if (left(r) <= 0 || right(r) >= arena.width)
  {
    bounceX(ball);
    result.hitWall = left(r) <= 0 ? 'left' : 'right';
  }

  /* ── 2. Top / bottom walls ── */
  if (top(r) <= 0 || bottom(r) >= arena.height)
  {
    bounceY(ball);
    result.hitWall ??= top(r) <= 0 ? 'top' : 'bottom';
  }

  /* ── 3. Paddles ──
     A ball already heading back into the arena (e.g. the side wall just
     flipped it) is left alone, so the paddle can't send it out again. */
  for (const paddle of paddles)
  {
    if (overlaps(r, paddle.rect))
    {
      const incoming = paddle.side === 'player' ? ball.vx < 0 : ball.vx > 0;
      if (incoming) bounceX(ball);
      result.hitPaddle ??= paddle.side;
    }
  }

  return result;
}

/**
 * @function updateBall
 * @description One full tick of ball physics: advance, then collide.
 */
export function updateBall(ball: Ball, arena: Arena, paddles: readonly Paddle[]): PhysicsResult
{
  advanceBall(ball);
  return collideBall(ball, arena, paddles);
}

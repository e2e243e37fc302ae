/**
 * @file ai.ts
 * @description AIController — drives the computer (right) paddle.
 *
 * ALGORITHM — BOUNDED PURSUIT
 * ---------------------------
 * Every tick the AI reads where the ball's centre is *right now* and asks
 * the paddle to move its top edge there with moveTo().  The move is capped
 * at the paddle's maxSpeed, so:
 *
 *   - far from the ball  → the paddle closes the gap by exactly maxSpeed
 *   - within maxSpeed    → the paddle lands exactly on the target
 *
 * There is no trajectory prediction and no reaction delay.  A ball that
 * changes vertical direction faster than the paddle can follow gets past.
 */

import type { Arena, Ball, Paddle } from './types.js';
import { centerY } from './entity.js';
import { moveTo, clampToArena } from './paddle.js';

/**
 * @class AIController
 * @description Holds references to the ball it watches and the paddle it
 *              moves.  It owns neither; the Game does.
 */
export class AIController
{
  constructor(
    private readonly paddle: Paddle,
    private readonly ball: Ball,
    private readonly arena: Arena,
  ) {}

  /**
   * @method update
   * @description One tick of pursuit followed by arena clamping.
   * @returns The Y the AI aimed for this tick.
   */
  update(): number
  {
    const target = centerY(this.ball.rect);

    moveTo(this.paddle, target);
    clampToArena(this.paddle, this.arena);

    return target;
  }
}

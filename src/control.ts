/**
 * @file control.ts
 * @description How the human paddle turns input into movement.
 *
 * Two strategies share one contract: given the paddle and this tick's
 * input, return the Y the paddle's top edge should move to.  The Game
 * applies that Y and then clamps the paddle to the arena, so strategies
 * never clamp themselves.
 *
 *   TargetFollowControl       — chase the pointer at up to maxSpeed px/tick.
 *   AcceleratingKeyHoldControl — a speed accumulator nudged by arrow keys.
 */

import type { ControlScheme, InputState, Paddle } from './types.js';
import { stepToward } from './paddle.js';
import type { GameConfig } from './config.js';

/** Key codes the terminal event source reports for the arrow keys. */
export const KEY_UP   = 'up';
export const KEY_DOWN = 'down';

export interface ControlStrategy
{
  readonly scheme: ControlScheme;
  computeNextY(paddle: Paddle, input: InputState): number;
}

/**
 * @class TargetFollowControl
 * @description Moves toward the last pointer Y with the same capped step
 *              the AI uses.  Stays put until the pointer has moved once.
 */
export class TargetFollowControl implements ControlStrategy
{
  readonly scheme = 'pointer' as const;

  computeNextY(paddle: Paddle, input: InputState): number
  {
    const target = input.pointerY();
    if (target === null) return paddle.rect.y;
    return stepToward(paddle, target);
  }
}

/**
 * @class AcceleratingKeyHoldControl
 * @description Stateful key control.
 *
 * `speed` starts at 0.  Pressing Down adds `step`, pressing Up subtracts it;
 * releasing either key undoes its own change.  Every tick the paddle moves
 * by the current speed, so holding Down glides the paddle at `step` px/tick
 * and holding both keys cancels out.
 *
 * Only press/release transitions change the speed; auto-repeat while held
 * does not stack.
 */
export class AcceleratingKeyHoldControl implements ControlStrategy
{
  readonly scheme = 'keys' as const;

  private speed = 0;

  constructor(private readonly step: number) {}

  computeNextY(paddle: Paddle, input: InputState): number
  {
    if (input.wasPressed(KEY_DOWN))  this.speed += this.step;
    if (input.wasPressed(KEY_UP))    this.speed -= this.step;
    if (input.wasReleased(KEY_DOWN)) this.speed -= this.step;
    if (input.wasReleased(KEY_UP))   this.speed += this.step;

    return paddle.rect.y + this.speed;
  }

  /** Current px/tick velocity; negative = moving up. */
  currentSpeed(): number
  {
    return this.speed;
  }
}

/**
 * @function createControl
 * @description Picks the strategy named by config.control.
 */
export function createControl(config: GameConfig): ControlStrategy
{
  switch (config.control)
  {
    case 'pointer': return new TargetFollowControl();
    case 'keys':    return new AcceleratingKeyHoldControl(config.keySpeedStep);
  }
}

/**
 * @file scorekeeper.ts
 * @description Awards points when the ball reaches a side boundary.
 *
 * SCORING RULE
 * ------------
 *   left edge  ≤ 0           → player   +1, serve again
 *   right edge ≥ arena width → computer +1, serve again
 *
 * Both checks use the full arena width.  A tick on which a paddle
 * intercepted the ball never scores: the paddle's bounce wins, and the
 * point is only given once the ball has moved clear of the paddle and
 * still reaches the boundary.
 *
 * Because the ball is reset on the same tick it scores, one crossing can
 * never be counted twice.
 */

import type { Arena, Ball, Score, ServeAxis, Side } from './types.js';
import { left, right } from './entity.js';
import { resetBall, type PhysicsResult } from './physics.js';

export class Scorekeeper
{
  private readonly points: Score = { player: 0, computer: 0 };

  constructor(
    private readonly ball: Ball,
    private readonly arena: Arena,
    private readonly serveAxis: ServeAxis,
  ) {}

  /**
   * @method update
   * @description Checks the boundaries after this tick's collisions.
   *
   * @param physics  The collision result for this tick.
   * @returns Which side scored, or null.
   */
  update(physics: PhysicsResult): Side | null
  {
    if (physics.hitPaddle !== null) return null;

    let scorer: Side | null = null;

    if (left(this.ball.rect) <= 0)
    {
      scorer = 'player';
    }
    else if (right(this.ball.rect) >= this.arena.width)
    {
      scorer = 'computer';
    }

    if (scorer !== null)
    {
      this.points[scorer] += 1;
      resetBall(this.ball, this.serveAxis);
    }

    return scorer;
  }

  /** A copy of the current score. */
  score(): Readonly<Score>
  {
    return { ...this.points };
  }
}

/**
 * @file entity.ts
 * @description Rect helpers shared by the ball, paddles and renderer.
 *
 * COORDINATE SYSTEM
 * -----------------
 *   (0, 0) is the top-left corner of the arena.
 *   X increases to the right, Y increases DOWNWARD.
 *   A rect's right edge is x + width, its bottom edge y + height.
 */

import type { Rect } from './types.js';

export function makeRect(x: number, y: number, width: number, height: number): Rect
{
  return { x, y, width, height };
}

export function left(rect: Rect):   number { return rect.x; }
export function right(rect: Rect):  number { return rect.x + rect.width; }
export function top(rect: Rect):    number { return rect.y; }
export function bottom(rect: Rect): number { return rect.y + rect.height; }

export function centerX(rect: Rect): number { return rect.x + rect.width  / 2; }
export function centerY(rect: Rect): number { return rect.y + rect.height / 2; }

/**
 * @function overlaps
 * @description Strict AABB overlap test.  Rects that only share an edge do
 *              NOT overlap, so a ball resting flush against a paddle face is
 *              not a hit.
 */
export function overlaps(a: Rect, b: Rect): boolean
{
  return (
    a.x < b.x + b.width  &&
    b.x < a.x + a.width  &&
    a.y < b.y + b.height &&
    b.y < a.y + a.height
  );
}

/**
 * @function centeredRect
 * @description A rect of the given size whose centre is (cx, cy).
 *              Used to position score text.
 */
export function centeredRect(cx: number, cy: number, width: number, height: number): Rect
{
  return makeRect(cx - width / 2, cy - height / 2, width, height);
}

/**
 * @file helpers.ts
 * @description Shared factories and in-process stand-ins for Terminal Pong tests.
 *
 * Every test starts from the stock configuration (800 × 500 arena, ball
 * 20 px at speed (5, 5), paddles 10 × 80).  Overrides let each test tweak
 * only the fields it cares about.
 *
 * Stand-ins for the collaborators:
 *   RecordingSurface  — keeps every frame instead of drawing it.
 *   ScriptedEvents    — hands out pre-queued event batches, one per poll().
 *   ManualClock       — resolves wait() immediately and counts the calls.
 */

import type { Ball, Drawable, EventSource, FrameClock, InputEvent, Paddle, Surface } from '../src/types.js';
import { parseGameConfig, type GameConfig, type GameConfigInput } from '../src/config.js';
import { makeBall as makeGameBall } from '../src/physics.js';
import { makePaddle } from '../src/paddle.js';
import { makeRect } from '../src/entity.js';

/* ═══════════════════════════════════════════════════════════════════════════
   CONFIG
   ═══════════════════════════════════════════════════════════════════════════ */

export function makeConfig(overrides: GameConfigInput = {}): GameConfig
{
  return parseGameConfig(overrides);
}

/* ═══════════════════════════════════════════════════════════════════════════
   BALL / PADDLE FACTORIES
   ═══════════════════════════════════════════════════════════════════════════ */

export interface BallOverrides
{
  x?:  number;
  y?:  number;
  vx?: number;
  vy?: number;
}

/**
 * @function makeBall
 * @description The stock ball (top-left at (400, 250), velocity (5, 5)),
 *              optionally moved or re-aimed.  Start position is unaffected
 *              by the overrides.
 */
export function makeBall(overrides: BallOverrides = {}, config: GameConfig = makeConfig()): Ball
{
  const ball = makeGameBall(config);
  ball.rect.x = overrides.x ?? ball.rect.x;
  ball.rect.y = overrides.y ?? ball.rect.y;
  ball.vx     = overrides.vx ?? ball.vx;
  ball.vy     = overrides.vy ?? ball.vy;
  return ball;
}

export interface PaddleOverrides
{
  x?:        number;
  y?:        number;
  height?:   number;
  maxSpeed?: number;
}

function withOverrides(paddle: Paddle, overrides: PaddleOverrides): Paddle
{
  return {
    ...paddle,
    rect: makeRect(
      overrides.x ?? paddle.rect.x,
      overrides.y ?? paddle.rect.y,
      paddle.rect.width,
      overrides.height ?? paddle.rect.height,
    ),
    maxSpeed: overrides.maxSpeed ?? paddle.maxSpeed,
  };
}

/** Left paddle: x = 0, top at y = 250. */
export function makePlayer(overrides: PaddleOverrides = {}, config: GameConfig = makeConfig()): Paddle
{
  return withOverrides(makePaddle(config, 'player'), overrides);
}

/** Right paddle: x = 780, top at y = 250, maxSpeed 10. */
export function makeComputer(overrides: PaddleOverrides = {}, config: GameConfig = makeConfig()): Paddle
{
  return withOverrides(makePaddle(config, 'computer'), overrides);
}

/* ═══════════════════════════════════════════════════════════════════════════
   COLLABORATOR STAND-INS
   ═══════════════════════════════════════════════════════════════════════════ */

export class RecordingSurface implements Surface
{
  readonly frames: Drawable[][] = [];
  closed = false;

  constructor(readonly width = 800, readonly height = 500) {}

  drawFrame(drawables: readonly Drawable[]): void
  {
    this.frames.push([...drawables]);
  }

  close(): void
  {
    this.closed = true;
  }

  lastFrame(): Drawable[]
  {
    const frame = this.frames.at(-1);
    if (!frame) throw new Error('no frame drawn yet');
    return frame;
  }
}

/**
 * @class ScriptedEvents
 * @description poll() #n returns batches[n]; after the script runs out,
 *              every poll() returns [].
 */
export class ScriptedEvents implements EventSource
{
  private polls = 0;

  constructor(private readonly batches: InputEvent[][] = []) {}

  poll(): InputEvent[]
  {
    const batch = this.batches[this.polls] ?? [];
    this.polls++;
    return batch;
  }

  pollCount(): number
  {
    return this.polls;
  }
}

export class ManualClock implements FrameClock
{
  waits = 0;

  async wait(): Promise<void>
  {
    this.waits++;
  }
}

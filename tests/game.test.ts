/**
 * @file game.test.ts
 * @description Integration tests for the Game orchestrator in game.ts.
 *
 * SCOPE
 * -----
 * The Game is built with in-process stand-ins from helpers.ts:
 *   RecordingSurface keeps every frame, ScriptedEvents feeds one batch of
 *   input per tick, ManualClock never sleeps.  Logging is silenced.
 *
 * ORGANISATION
 * ------------
 *   1. A single tick
 *   2. Frame contents
 *   3. Input
 *   4. Scoring
 *   5. Loop lifecycle (run / stop / quit)
 */

import { describe, test, expect } from 'vitest';
import { Game } from '../src/game.js';
import { silentLogger } from '../src/logger.js';
import { COLOR_BALL, COLOR_PADDLE, COLOR_TEXT } from '../src/constants.js';
import { KEY_DOWN } from '../src/control.js';
import type { InputEvent } from '../src/types.js';
import type { GameConfigInput } from '../src/config.js';
import { makeConfig, RecordingSurface, ScriptedEvents, ManualClock } from './helpers.js';

function makeGame(batches: InputEvent[][] = [], overrides: GameConfigInput = {})
{
  const surface = new RecordingSurface();
  const events  = new ScriptedEvents(batches);
  const clock   = new ManualClock();
  const game    = new Game({
    config: makeConfig(overrides),
    surface,
    events,
    clock,
    logger: silentLogger(),
  });
  return { game, surface, events, clock };
}

/* ═══════════════════════════════════════════════════════════════════════════
   1. A single tick
   ═══════════════════════════════════════════════════════════════════════════ */

describe('Game — one tick', () =>
{
  test('starts RUNNING with nothing moved', () =>
  {
    const { game } = makeGame();
    expect(game.getPhase()).toBe('RUNNING');
    expect(game.getTickCount()).toBe(0);
    expect(game.getBall().rect).toEqual({ x: 400, y: 250, width: 20, height: 20 });
    expect(game.getScore()).toEqual({ player: 0, computer: 0 });
  });

  test('moves the ball by its velocity', () =>
  {
    const { game } = makeGame();
    expect(game.tick()).toBe(true);
    expect(game.getBall().rect.x).toBe(405);
    expect(game.getBall().rect.y).toBe(255);
    expect(game.getTickCount()).toBe(1);
  });

  test('the computer paddle chases the ball after it moves', () =>
  {
    /* Ball centre after the move is 265; the paddle steps 250 → 260. */
    const { game } = makeGame();
    game.tick();
    expect(game.getPaddle('computer').rect.y).toBe(260);
  });

  test('the player paddle stays put without input', () =>
  {
    const { game } = makeGame();
    game.tick();
    expect(game.getPaddle('player').rect.y).toBe(250);
  });

  test('draws exactly one frame per tick', () =>
  {
    const { game, surface } = makeGame();
    game.tick();
    game.tick();
    expect(surface.frames).toHaveLength(2);
  });
});

/* ═══════════════════════════════════════════════════════════════════════════
   2. Frame contents
   ═══════════════════════════════════════════════════════════════════════════ */

describe('Game — frame', () =>
{
  test('ball, paddles, then both score lines', () =>
  {
    const { game, surface } = makeGame();
    game.tick();

    expect(surface.lastFrame()).toEqual([
      { rect: { x: 405, y: 255, width: 20, height: 20 }, color: COLOR_BALL },
      { rect: { x: 0,   y: 250, width: 10, height: 80 }, color: COLOR_PADDLE },
      { rect: { x: 780, y: 260, width: 10, height: 80 }, color: COLOR_PADDLE },
      { rect: { x: 0, y: 130, width: 800, height: 40 }, color: COLOR_TEXT, text: 'Player: 0' },
      { rect: { x: 0, y: 330, width: 800, height: 40 }, color: COLOR_TEXT, text: 'Computer: 0' },
    ]);
  });

  test('earlier frames are not changed by later ticks', () =>
  {
    const { game, surface } = makeGame();
    game.tick();
    game.tick();

    expect(surface.frames[0][0].rect.x).toBe(405);
    expect(surface.frames[1][0].rect.x).toBe(410);
  });
});

/* ═══════════════════════════════════════════════════════════════════════════
   3. Input
   ═══════════════════════════════════════════════════════════════════════════ */

describe('Game — input', () =>
{
  test('holding down glides the player paddle', () =>
  {
    const { game } = makeGame([[{ type: 'key_down', code: KEY_DOWN }]]);
    game.tick();
    expect(game.getPaddle('player').rect.y).toBe(257);
    game.tick();
    expect(game.getPaddle('player').rect.y).toBe(264);
  });

  test('the player paddle is clamped to the arena', () =>
  {
    const { game } = makeGame([[{ type: 'key_down', code: KEY_DOWN }]], { keySpeedStep: 100 });
    game.tick();
    game.tick();
    expect(game.getPaddle('player').rect.y).toBe(420);
  });

  test('pointer control follows the pointer', () =>
  {
    const { game } = makeGame([[{ type: 'pointer_move', x: 5, y: 100 }]], { control: 'pointer' });
    game.tick();
    expect(game.getPaddle('player').rect.y).toBe(240);
  });

  test('input is polled once per tick', () =>
  {
    const { game, events } = makeGame();
    game.tick();
    game.tick();
    game.tick();
    expect(events.pollCount()).toBe(3);
  });
});

/* ═══════════════════════════════════════════════════════════════════════════
   4. Scoring
   ═══════════════════════════════════════════════════════════════════════════ */

describe('Game — scoring', () =>
{
  test('a stationary computer paddle lets the ball through on tick 76', () =>
  {
    /* The ball bounces off the bottom on tick 46 and reaches the right
       edge at y = 330, just below the paddle's bottom edge. */
    const { game, surface } = makeGame([], { computer: { maxSpeed: 0 } });

    for (let i = 0; i < 75; i++) game.tick();
    expect(game.getScore()).toEqual({ player: 0, computer: 0 });

    game.tick();
    expect(game.getScore()).toEqual({ player: 0, computer: 1 });
    expect(game.getBall().rect.x).toBe(400);
    expect(game.getBall().rect.y).toBe(250);
    expect(game.getBall().vx).toBe(-5);

    const frame = surface.lastFrame();
    expect(frame[4].text).toBe('Computer: 1');
  });

  test('a player paddle covering the left wall stops the point', () =>
  {
    /* The paddle follows the pointer down to y = 420 by tick 17.  The ball
       reaches x = 0 on tick 40 at y = 450, inside the paddle's 420..500. */
    const { game } = makeGame(
      [[{ type: 'pointer_move', x: 5, y: 420 }]],
      { control: 'pointer', ball: { speedX: -10 } },
    );

    for (let i = 0; i < 40; i++) game.tick();
    expect(game.getPaddle('player').rect.y).toBe(420);
    expect(game.getBall().rect.x).toBe(0);
    expect(game.getBall().vx).toBe(10);
    expect(game.getScore()).toEqual({ player: 0, computer: 0 });

    for (let i = 0; i < 10; i++) game.tick();
    expect(game.getBall().rect.x).toBe(100);
    expect(game.getScore()).toEqual({ player: 0, computer: 0 });
  });
});

/* ═══════════════════════════════════════════════════════════════════════════
   5. Loop lifecycle
   ═══════════════════════════════════════════════════════════════════════════ */

describe('Game — lifecycle', () =>
{
  test('quit on the first poll ends the game before any tick', async () =>
  {
    const { game, surface, clock } = makeGame([[{ type: 'quit' }]]);
    await game.run();

    expect(game.getPhase()).toBe('TERMINATED');
    expect(game.getTickCount()).toBe(0);
    expect(surface.frames).toHaveLength(0);
    expect(clock.waits).toBe(0);
  });

  test('runs ticks and waits between them until quit', async () =>
  {
    const { game, surface, clock } = makeGame([[], [], [{ type: 'quit' }]]);
    await game.run();

    expect(game.getTickCount()).toBe(2);
    expect(surface.frames).toHaveLength(2);
    expect(clock.waits).toBe(2);
  });

  test('quit wins over other input in the same batch', () =>
  {
    const { game } = makeGame([[{ type: 'key_down', code: KEY_DOWN }, { type: 'quit' }]]);
    expect(game.tick()).toBe(false);
    expect(game.getPaddle('player').rect.y).toBe(250);
  });

  test('stop() ends the loop', () =>
  {
    const { game, surface } = makeGame();
    game.tick();
    game.stop();

    expect(game.tick()).toBe(false);
    expect(game.getPhase()).toBe('TERMINATED');
    expect(surface.frames).toHaveLength(1);
  });

  test('the game does not close the surface', async () =>
  {
    const { game, surface } = makeGame([[{ type: 'quit' }]]);
    await game.run();
    expect(surface.closed).toBe(false);
  });
});

/**
 * @file constants.ts
 * @description Default tuning values and colors for Terminal Pong.
 *
 * These are the *defaults* only.  config.ts copies them into a validated
 * GameConfig, and every system reads its numbers from that config, so a
 * test or an environment variable can change any of them without touching
 * this file.
 *
 * UNITS
 * -----
 *   - Distances / positions / sizes are in *arena pixels* (px).
 *   - Speeds are in *pixels per tick* (px/tick).  There is no delta-time:
 *     the loop runs at a fixed rate, so one tick is one step.
 *   - Durations are in milliseconds (ms).
 */

/* ═══════════════════════════════════════════════════════════════════════════
   ARENA
   ═══════════════════════════════════════════════════════════════════════════ */

export const ARENA_WIDTH  = 800;
export const ARENA_HEIGHT = 500;

/** Ticks per second.  One tick = 1/30 s. */
export const TARGET_FPS   = 30;

/* ═══════════════════════════════════════════════════════════════════════════
   COLORS
   ═══════════════════════════════════════════════════════════════════════════ */

export const COLOR_BG     = '#000000';
export const COLOR_BALL   = '#ff0000';
export const COLOR_PADDLE = '#00ff00';

/** Score text. */
export const COLOR_TEXT   = '#969696';

/* ═══════════════════════════════════════════════════════════════════════════
   BALL
   ═══════════════════════════════════════════════════════════════════════════ */

/** Ball is a square BALL_SIZE × BALL_SIZE box. */
export const BALL_SIZE    = 20;

/** Initial velocity.  Positive = right / down. */
export const BALL_SPEED_X = 5;
export const BALL_SPEED_Y = 5;

/* ═══════════════════════════════════════════════════════════════════════════
   PADDLES
   ═══════════════════════════════════════════════════════════════════════════ */

export const PADDLE_WIDTH  = 10;
export const PADDLE_HEIGHT = 80;

/**
 * Gap between the computer paddle's left edge and the right side of the
 * arena: the paddle sits at x = ARENA_WIDTH - PADDLE_RIGHT_OFFSET.
 */
export const PADDLE_RIGHT_OFFSET = 20;

/** Max px per tick for the human paddle under pointer control. */
export const PLAYER_MAX_SPEED   = 10;

/** Max px per tick for the AI paddle. */
export const COMPUTER_MAX_SPEED = 10;

/**
 * Speed change applied when an arrow key goes down (and reverted when it
 * comes back up) under key control.
 */
export const KEY_SPEED_STEP = 7;

/* ═══════════════════════════════════════════════════════════════════════════
   TERMINAL INPUT
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * Terminals only report key presses, never releases.  A held key is
 * considered released once no repeat has arrived for this long.  Must be
 * longer than the usual keyboard auto-repeat delay (~500 ms).
 */
export const KEY_HOLD_MS = 550;

/* ═══════════════════════════════════════════════════════════════════════════
   SCORE TEXT
   Vertical placement of the two score lines as a fraction of arena height.
   ═══════════════════════════════════════════════════════════════════════════ */

export const SCORE_PLAYER_Y_FRAC   = 0.3;
export const SCORE_COMPUTER_Y_FRAC = 0.7;

/** Box height (px) the score text is centred in. */
export const SCORE_TEXT_HEIGHT     = 40;

/** Window title set on startup. */
export const WINDOW_TITLE = 'Ping Pong';

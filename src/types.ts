/**
 * @file types.ts
 * @description Shared TypeScript interfaces and type aliases for Terminal Pong.
 *
 * Game objects are plain records.  Behaviour lives in free functions
 * (physics.ts, paddle.ts, entity.ts) that receive these records and mutate
 * them in place, so nothing here has methods.
 */

/* ═══════════════════════════════════════════════════════════════════════════
   GAME PHASE
   The loop is a two-state machine:

     RUNNING ──(quit event / stop())──→ TERMINATED

   There is no pause and no match end; TERMINATED is final.
   ═══════════════════════════════════════════════════════════════════════════ */

export type GamePhase = 'RUNNING' | 'TERMINATED';

/**
 * @typedef Side
 * @description Which paddle a value belongs to.
 *   - player    Left paddle, human-controlled.
 *   - computer  Right paddle, driven by the AIController.
 */
export type Side = 'player' | 'computer';

/**
 * @typedef ControlScheme
 * @description How the human paddle is driven.
 *   - keys     Accelerate while an arrow key is held (the default).
 *   - pointer  Follow the mouse pointer at a capped speed.
 */
export type ControlScheme = 'keys' | 'pointer';

/**
 * @typedef ServeAxis
 * @description Which velocity component is negated when the ball is served
 *              again after a point.
 */
export type ServeAxis = 'x' | 'y';

/* ═══════════════════════════════════════════════════════════════════════════
   GEOMETRY
   ═══════════════════════════════════════════════════════════════════════════ */

/** A point in arena pixels. */
export interface Vec2
{
  x: number;
  y: number;
}

/**
 * @interface Rect
 * @description Axis-aligned bounding box.  (x, y) is the top-left corner in
 *              arena pixels; width and height never change after creation.
 */
export interface Rect
{
  x: number;
  y: number;
  readonly width:  number;
  readonly height: number;
}

/**
 * @interface Arena
 * @description The playing field.  Fixed for the whole session.
 */
export interface Arena
{
  readonly width:  number;
  readonly height: number;
}

/* ═══════════════════════════════════════════════════════════════════════════
   ENTITIES
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @interface Ball
 * @description Complete state of the ball.
 *
 *   - rect       Position and size (px).
 *   - (vx, vy)   Velocity in px per tick.  Only the signs ever change.
 *   - startX/Y   Where reset puts the ball's top-left corner.
 */
export interface Ball
{
  rect: Rect;

  vx: number;
  vy: number;

  readonly startX: number;
  readonly startY: number;

  readonly color: string;
}

/**
 * @interface Paddle
 * @description One paddle.  Moves only along Y.
 */
export interface Paddle
{
  rect: Rect;

  /** Largest |Δy| a single moveTo() call may apply (px per tick). */
  maxSpeed: number;

  readonly color: string;
  readonly side:  Side;
}

/* ═══════════════════════════════════════════════════════════════════════════
   SCORE
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @interface Score
 * @description Points for each side.  Only the Scorekeeper writes these and
 *              they only ever go up.
 */
export interface Score
{
  player:   number;
  computer: number;
}

/* ═══════════════════════════════════════════════════════════════════════════
   COLLABORATOR CONTRACTS
   What the core needs from whatever draws frames and reads input.
   ═══════════════════════════════════════════════════════════════════════════ */

/**
 * @interface Drawable
 * @description One item of a frame.  Without `text` the rect is filled with
 *              `color`; with `text` the string is centred inside the rect.
 */
export interface Drawable
{
  rect:  Rect;
  color: string;
  text?: string;
}

/**
 * @interface Surface
 * @description A fixed-size drawing target.
 *
 * drawFrame() clears to the background, draws every drawable in order
 * (later items on top) and presents the result.
 */
export interface Surface
{
  readonly width:  number;
  readonly height: number;
  drawFrame(drawables: readonly Drawable[]): void;
  close(): void;
}

/**
 * @typedef InputEvent
 * @description Events produced by the input collaborator.
 *              Pointer coordinates are already in arena pixels.
 */
export type InputEvent =
  | { type: 'quit' }
  | { type: 'key_down'; code: string }
  | { type: 'key_up';   code: string }
  | { type: 'pointer_move'; x: number; y: number };

/**
 * @interface EventSource
 * @description Non-blocking input queue.  poll() returns every event that
 *              arrived since the previous call, oldest first.
 */
export interface EventSource
{
  poll(): InputEvent[];
}

/**
 * @interface InputState
 * @description The per-tick view of input that control strategies read.
 *              Implemented by InputManager.
 */
export interface InputState
{
  wasPressed(code: string): boolean;
  wasReleased(code: string): boolean;

  /** Last reported pointer Y (arena px), or null if the pointer never moved. */
  pointerY(): number | null;
}

/**
 * @interface FrameClock
 * @description Paces the loop.  wait() resolves at the next tick deadline.
 */
export interface FrameClock
{
  wait(): Promise<void>;
}

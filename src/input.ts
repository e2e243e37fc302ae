/**
 * @file input.ts
 * @description Per-tick input buffer for Terminal Pong.
 *
 * The input collaborator queues raw events between ticks; the Game drains
 * them once at the top of each tick with apply(poll()).  InputManager turns
 * that stream into queryable state using three independent Sets:
 *
 *   held         — keys currently down (key_down adds, key_up removes)
 *   justPressed  — keys that went down *this tick* (cleared by flush())
 *   justReleased — keys that came up  *this tick* (cleared by flush())
 *
 * Pointer position is last-writer-wins: only the newest pointer_move of the
 * tick is kept, and it persists until another one arrives.
 *
 * Call flush() exactly once per tick, AFTER everything has read the input.
 */

import type { InputEvent, InputState } from './types.js';

/**
 * @class InputManager
 * @description Centralised key and pointer state tracker.
 */
export class InputManager implements InputState
{
  /** Keys currently held down. */
  private held         = new Set<string>();

  /** Keys that transitioned down THIS tick. */
  private justPressed  = new Set<string>();

  /** Keys that transitioned up THIS tick. */
  private justReleased = new Set<string>();

  private pointer: number | null = null;

  private quitRequested = false;

  /**
   * @method apply
   * @description Folds a batch of events (oldest first) into the state.
   *
   *              A key_down for a key that is already held is a repeat and
   *              does not count as a new press.
   */
  apply(events: readonly InputEvent[]): void
  {
    for (const event of events)
    {
      switch (event.type)
      {
        case 'quit':
          this.quitRequested = true;
          break;

        case 'key_down':
          if (!this.held.has(event.code))
          {
            this.justPressed.add(event.code);
          }
          this.held.add(event.code);
          break;

        case 'key_up':
          /* A release without a matching press (e.g. pressed before the
             game started) is dropped. */
          if (this.held.delete(event.code))
          {
            this.justReleased.add(event.code);
          }
          break;

        case 'pointer_move':
          this.pointer = event.y;
          break;
      }
    }
  }

  isDown(code: string): boolean
  {
    return this.held.has(code);
  }

  wasPressed(code: string): boolean
  {
    return this.justPressed.has(code);
  }

  wasReleased(code: string): boolean
  {
    return this.justReleased.has(code);
  }

  pointerY(): number | null
  {
    return this.pointer;
  }

  /** True once any quit event has been seen.  Never resets. */
  quit(): boolean
  {
    return this.quitRequested;
  }

  /**
   * @method flush
   * @description Clears the single-tick sets.  Held keys, pointer position
   *              and the quit flag carry over.
   */
  flush(): void
  {
    this.justPressed.clear();
    this.justReleased.clear();
  }
}

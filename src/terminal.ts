/**
 * @file terminal.ts
 * @description The terminal as the game's window and keyboard/mouse.
 *
 * createTerminalSurface() puts the terminal into game mode (alternate
 * screen, hidden cursor, raw input, mouse reporting) and returns a Surface
 * plus an EventSource.  close() puts everything back.
 *
 * INPUT DECODING
 * --------------
 * stdin delivers raw byte chunks.  decodeInput() splits a chunk into:
 *
 *   arrow keys  ESC [ A / ESC [ B (and the ESC O A / ESC O B variants)
 *   letters     w / k = up,  s / j = down,  q = quit
 *   Ctrl+C      0x03 = quit
 *   Escape      a chunk holding only ESC = quit
 *   mouse       SGR reports  ESC [ < b ; col ; row (M|m)
 *
 * KEY RELEASE
 * -----------
 * Terminals never report a key going up.  TerminalEventSource treats a key
 * as held while its auto-repeats keep arriving and emits key_up once none
 * has arrived for keyHoldMs.
 */

import type { Arena, Drawable, EventSource, InputEvent, Surface } from './types.js';
import { type TerminalOutput, TerminalRenderer, type Viewport } from './renderer.js';
import { KEY_UP, KEY_DOWN } from './control.js';
import { SurfaceError } from './errors.js';
import { WINDOW_TITLE } from './constants.js';

/* ═══════════════════════════════════════════════════════════════════════════
   ESCAPE SEQUENCES
   ═══════════════════════════════════════════════════════════════════════════ */

const ESC = '\x1b';

export const ENTER_GAME_MODE =
  `${ESC}]0;${WINDOW_TITLE}\x07` +  // window title
  `${ESC}[?1049h` +                 // alternate screen
  `${ESC}[?25l` +                   // hide cursor
  `${ESC}[?1003h` +                 // report all mouse motion
  `${ESC}[?1006h` +                 // ... in SGR encoding
  `${ESC}[2J`;                      // clear

export const LEAVE_GAME_MODE =
  `${ESC}[?1006l` +
  `${ESC}[?1003l` +
  `${ESC}[0m` +
  `${ESC}[?25h` +
  `${ESC}[?1049l`;

/* ═══════════════════════════════════════════════════════════════════════════
   DECODING
   ═══════════════════════════════════════════════════════════════════════════ */

export type TerminalToken =
  | { kind: 'key'; code: string }
  | { kind: 'quit' }
  | { kind: 'mouse'; col: number; row: number };

const SGR_MOUSE = /^\x1b\[<(\d+);(\d+);(\d+)[Mm]/;

const LETTER_KEYS: Record<string, string> =
{
  w: KEY_UP,   W: KEY_UP,   k: KEY_UP,   K: KEY_UP,
  s: KEY_DOWN, S: KEY_DOWN, j: KEY_DOWN, J: KEY_DOWN,
};

/**
 * @function decodeInput
 * @description Splits one stdin chunk into tokens, oldest first.
 *              Bytes that mean nothing to the game are skipped.
 */
export function decodeInput(chunk: string): TerminalToken[]
{
  const tokens: TerminalToken[] = [];
  let i = 0;

  while (i < chunk.length)
  {
    const rest = chunk.slice(i);

    if (rest.startsWith(ESC))
    {
      const mouse = SGR_MOUSE.exec(rest);
      if (mouse)
      {
        tokens.push({ kind: 'mouse', col: Number(mouse[2]), row: Number(mouse[3]) });
        i += mouse[0].length;
        continue;
      }

      /* CSI (ESC [) or SS3 (ESC O) followed by a final byte.  A prefix cut
         off at the end of the chunk is dropped. */
      if (rest[1] === '[' || rest[1] === 'O')
      {
        const final = rest[2];
        if (final === 'A') tokens.push({ kind: 'key', code: KEY_UP });
        if (final === 'B') tokens.push({ kind: 'key', code: KEY_DOWN });
        i += Math.min(3, rest.length);
        continue;
      }

      /* Escape on its own is a key press.  ESC plus another byte is an
         Alt chord, and a trailing ESC is the start of a sequence split
         across chunks; both are skipped. */
      if (chunk === ESC) tokens.push({ kind: 'quit' });
      i += 2;
      continue;
    }

    const ch = rest[0];
    if (ch === '\x03' || ch === 'q' || ch === 'Q')
    {
      tokens.push({ kind: 'quit' });
    }
    else if (ch in LETTER_KEYS)
    {
      tokens.push({ kind: 'key', code: LETTER_KEYS[ch] });
    }
    i += 1;
  }

  return tokens;
}

/* ═══════════════════════════════════════════════════════════════════════════
   EVENT SOURCE
   ═══════════════════════════════════════════════════════════════════════════ */

export class TerminalEventSource implements EventSource
{
  private queue: InputEvent[] = [];

  /** When each currently-held key was last seen (ms). */
  private lastSeen = new Map<string, number>();

  constructor(
    private readonly viewport: () => Viewport,
    private readonly keyHoldMs: number,
    private readonly now: () => number = () => performance.now(),
  ) {}

  /** Feeds one raw stdin chunk.  Wired to the stream's 'data' event. */
  push(chunk: string): void
  {
    for (const token of decodeInput(chunk))
    {
      switch (token.kind)
      {
        case 'quit':
          this.queue.push({ type: 'quit' });
          break;

        case 'key':
          this.queue.push({ type: 'key_down', code: token.code });
          this.lastSeen.set(token.code, this.now());
          break;

        case 'mouse':
        {
          const { x, y } = this.viewport().cellToArena(token.col, token.row);
          this.queue.push({ type: 'pointer_move', x, y });
          break;
        }
      }
    }
  }

  poll(): InputEvent[]
  {
    const t = this.now();
    for (const [code, seen] of this.lastSeen)
    {
      if (t - seen >= this.keyHoldMs)
      {
        this.queue.push({ type: 'key_up', code });
        this.lastSeen.delete(code);
      }
    }

    const drained = this.queue;
    this.queue = [];
    return drained;
  }
}

/* ═══════════════════════════════════════════════════════════════════════════
   SURFACE
   ═══════════════════════════════════════════════════════════════════════════ */

/** The subset of a TTY read stream the game needs. */
export interface TerminalInput
{
  readonly isTTY?: boolean;
  setRawMode?(mode: boolean): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
  resume(): unknown;
  pause(): unknown;
  on(event: 'data', listener: (chunk: string) => void): unknown;
  off(event: 'data', listener: (chunk: string) => void): unknown;
}

export interface TerminalStreams
{
  input:  TerminalInput;
  output: TerminalOutput;
}

export interface TerminalSession
{
  surface: Surface;
  events:  TerminalEventSource;
}

/**
 * @function createTerminalSurface
 * @description Takes over the terminal for the game.
 *
 * @throws {SurfaceError} NO_TTY when either stream is not interactive.
 */
export function createTerminalSurface(
  arena: Arena,
  streams: TerminalStreams,
  keyHoldMs: number,
): TerminalSession
{
  const { input, output } = streams;

  if (!input.isTTY || !output.isTTY || !input.setRawMode)
  {
    throw new SurfaceError('NO_TTY', 'Terminal Pong needs an interactive terminal on stdin and stdout');
  }

  const renderer = new TerminalRenderer(arena, output);
  const events   = new TerminalEventSource(() => renderer.viewport(), keyHoldMs);
  const onData   = (chunk: string): void => events.push(chunk);

  input.setRawMode(true);
  input.setEncoding('utf8');
  input.on('data', onData);
  input.resume();
  output.write(ENTER_GAME_MODE);

  let closed = false;

  const surface: Surface =
  {
    width:  arena.width,
    height: arena.height,

    drawFrame(drawables: readonly Drawable[]): void
    {
      if (!closed) renderer.draw(drawables);
    },

    close(): void
    {
      if (closed) return;
      closed = true;
      input.off('data', onData);
      input.setRawMode?.(false);
      input.pause();
      output.write(LEAVE_GAME_MODE);
    },
  };

  return { surface, events };
}

/**
 * @file renderer.ts
 * @description Draws frames into a terminal as coloured character cells.
 *
 * PIPELINE
 * --------
 *   Drawable[]  ──rasterize()──→  Cell grid  ──encodeFrame()──→  ANSI string
 *
 * Both steps are pure so they can be tested without a terminal.  The
 * TerminalRenderer class only adds the output stream and re-reads the
 * terminal size every frame (so resizing the window just works).
 *
 * SCALING
 * -------
 * The arena keeps its pixel coordinates (800 × 500 by default).  The
 * Viewport maps those onto however many columns and rows the terminal has:
 * a cell covers (arena.width / cols) × (arena.height / rows) pixels.
 */

import type { Arena, Drawable, Rect, Vec2 } from './types.js';
import { COLOR_BG } from './constants.js';

/* ═══════════════════════════════════════════════════════════════════════════
   COLORS
   ═══════════════════════════════════════════════════════════════════════════ */

export type Rgb = readonly [number, number, number];

const HEX_COLOR = /^#([0-9a-f]{2})([0-9a-f]{2})([0-9a-f]{2})$/i;

/**
 * @function hexToRgb
 * @description Parses '#rrggbb'.  Anything else falls back to white so a
 *              typo in a color constant is visible rather than invisible.
 */
export function hexToRgb(hex: string): Rgb
{
  const m = HEX_COLOR.exec(hex);
  if (!m) return [255, 255, 255];
  return [parseInt(m[1], 16), parseInt(m[2], 16), parseInt(m[3], 16)];
}

const fgEscape = (hex: string): string =>
{
  const [r, g, b] = hexToRgb(hex);
  return `\x1b[38;2;${r};${g};${b}m`;
};

const bgEscape = (hex: string): string =>
{
  const [r, g, b] = hexToRgb(hex);
  return `\x1b[48;2;${r};${g};${b}m`;
};

/* ═══════════════════════════════════════════════════════════════════════════
   VIEWPORT
   ═══════════════════════════════════════════════════════════════════════════ */

/** Inclusive range of cells a rect covers. */
export interface CellSpan
{
  col0: number;
  col1: number;
  row0: number;
  row1: number;
}

/**
 * @class Viewport
 * @description Converts between arena pixels and terminal cells.
 */
export class Viewport
{
  readonly cellWidth:  number;
  readonly cellHeight: number;

  constructor(
    readonly arena: Arena,
    readonly cols: number,
    readonly rows: number,
  )
  {
    this.cellWidth  = arena.width  / cols;
    this.cellHeight = arena.height / rows;
  }

  /**
   * @method span
   * @description Every cell the rect touches, clipped to the grid.
   *              Returns null when the rect lies entirely off-screen.
   */
  span(rect: Rect): CellSpan | null
  {
    const col0 = Math.max(0, Math.floor(rect.x / this.cellWidth));
    const row0 = Math.max(0, Math.floor(rect.y / this.cellHeight));
    const col1 = Math.min(this.cols - 1, Math.ceil((rect.x + rect.width)  / this.cellWidth)  - 1);
    const row1 = Math.min(this.rows - 1, Math.ceil((rect.y + rect.height) / this.cellHeight) - 1);

    if (col0 > col1 || row0 > row1) return null;
    return { col0, col1, row0, row1 };
  }

  /**
   * @method cellToArena
   * @description Centre of a 1-based (col, row) cell in arena pixels, as
   *              reported by terminal mouse events.
   */
  cellToArena(col: number, row: number): Vec2
  {
    return {
      x: (col - 0.5) * this.cellWidth,
      y: (row - 0.5) * this.cellHeight,
    };
  }
}

/* ═══════════════════════════════════════════════════════════════════════════
   RASTERIZE
   ═══════════════════════════════════════════════════════════════════════════ */

export interface Cell
{
  ch:    string;
  color: string;
}

/** Glyph used for filled rects. */
export const BLOCK = '█';

/**
 * @function rasterize
 * @description Paints drawables onto a fresh grid in order; later drawables
 *              overwrite earlier ones.  Rects become BLOCK cells.  Text is
 *              centred on the rect's middle row and clipped at the edges.
 */
export function rasterize(drawables: readonly Drawable[], viewport: Viewport): Cell[][]
{
  const grid: Cell[][] = Array.from({ length: viewport.rows }, () =>
    Array.from({ length: viewport.cols }, () => ({ ch: ' ', color: COLOR_BG })));

  for (const d of drawables)
  {
    if (d.text !== undefined)
    {
      const row  = Math.floor((d.rect.y + d.rect.height / 2) / viewport.cellHeight);
      const mid  = Math.floor((d.rect.x + d.rect.width  / 2) / viewport.cellWidth);
      const col0 = mid - Math.floor(d.text.length / 2);

      if (row < 0 || row >= viewport.rows) continue;

      for (let i = 0; i < d.text.length; i++)
      {
        const col = col0 + i;
        if (col < 0 || col >= viewport.cols) continue;
        grid[row][col] = { ch: d.text[i], color: d.color };
      }
      continue;
    }

    const span = viewport.span(d.rect);
    if (!span) continue;

    for (let row = span.row0; row <= span.row1; row++)
    {
      for (let col = span.col0; col <= span.col1; col++)
      {
        grid[row][col] = { ch: BLOCK, color: d.color };
      }
    }
  }

  return grid;
}

/**
 * @function encodeFrame
 * @description Serialises a grid as one ANSI string: background colour,
 *              then each row addressed absolutely, emitting a foreground
 *              escape only when the colour changes.
 */
export function encodeFrame(grid: readonly (readonly Cell[])[]): string
{
  let out   = bgEscape(COLOR_BG);
  let color = '';

  grid.forEach((row, r) =>
  {
    out += `\x1b[${r + 1};1H`;
    for (const cell of row)
    {
      if (cell.color !== color)
      {
        out  += fgEscape(cell.color);
        color = cell.color;
      }
      out += cell.ch;
    }
  });

  return out + '\x1b[0m';
}

/* ═══════════════════════════════════════════════════════════════════════════
   RENDERER
   ═══════════════════════════════════════════════════════════════════════════ */

/** The subset of a TTY write stream the renderer needs. */
export interface TerminalOutput
{
  write(data: string): boolean;
  readonly columns?: number;
  readonly rows?:    number;
  readonly isTTY?:   boolean;
}

const FALLBACK_COLS = 80;
const FALLBACK_ROWS = 24;

export class TerminalRenderer
{
  constructor(
    private readonly arena: Arena,
    private readonly out: TerminalOutput,
  ) {}

  /** A viewport for the terminal's current size. */
  viewport(): Viewport
  {
    const cols = this.out.columns && this.out.columns > 0 ? this.out.columns : FALLBACK_COLS;
    const rows = this.out.rows    && this.out.rows    > 0 ? this.out.rows    : FALLBACK_ROWS;
    return new Viewport(this.arena, cols, rows);
  }

  draw(drawables: readonly Drawable[]): void
  {
    this.out.write(encodeFrame(rasterize(drawables, this.viewport())));
  }
}

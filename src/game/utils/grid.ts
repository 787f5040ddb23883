import { TILE_SIZE } from "../config";

// ── Types ───────────────────────────────────────────────────────

/** A cell on the arena grid. (0,0) is the top-left tile. */
export interface GridPos {
  col: number;
  row: number;
}

/** Pixel coordinate on the canvas. */
export interface PixelPos {
  x: number;
  y: number;
}

export interface GridBounds {
  cols: number;
  rows: number;
}

export type Direction = "up" | "down" | "left" | "right";

// ── Direction helpers ───────────────────────────────────────────

const DIRECTION_VECTORS: Readonly<Record<Direction, GridPos>> = {
  up: { col: 0, row: -1 },
  down: { col: 0, row: 1 },
  left: { col: -1, row: 0 },
  right: { col: 1, row: 0 },
};

const OPPOSITES: Readonly<Record<Direction, Direction>> = {
  up: "down",
  down: "up",
  left: "right",
  right: "left",
};

export function oppositeDirection(dir: Direction): Direction {
  return OPPOSITES[dir];
}

export function isOppositeDirection(current: Direction, next: Direction): boolean {
  return OPPOSITES[current] === next;
}

// ── Cell math ───────────────────────────────────────────────────

/** Neighbouring cell in the given direction. Does not clamp. */
export function stepInDirection(pos: GridPos, dir: Direction): GridPos {
  const v = DIRECTION_VECTORS[dir];
  return { col: pos.col + v.col, row: pos.row + v.row };
}

export function gridEquals(a: GridPos, b: GridPos): boolean {
  return a.col === b.col && a.row === b.row;
}

/** Stable string key for set/map lookups. */
export function gridKey(pos: GridPos): string {
  return `${pos.col}:${pos.row}`;
}

export function isInBounds(pos: GridPos, bounds: GridBounds): boolean {
  return (
    pos.col >= 0 &&
    pos.row >= 0 &&
    pos.col < bounds.cols &&
    pos.row < bounds.rows
  );
}

// ── Coordinate conversion ───────────────────────────────────────

/** Center of a tile in canvas pixels. */
export function gridToPixel(pos: GridPos, tileSize = TILE_SIZE): PixelPos {
  return {
    x: pos.col * tileSize + tileSize / 2,
    y: pos.row * tileSize + tileSize / 2,
  };
}

// ── MoveTicker ──────────────────────────────────────────────────

/**
 * Fixed-cadence step accumulator.
 *
 * Frame deltas are summed until a full interval has elapsed. At most one
 * step fires per `advance()` call, and leftover time is capped at one
 * interval so a long frame cannot queue a burst of steps.
 */
export class MoveTicker {
  private accumulated = 0;

  private readonly intervalMs: number;

  constructor(intervalMs: number) {
    this.intervalMs = Math.max(1, intervalMs);
  }

  /** Add `deltaMs` of elapsed time. Returns `true` when a step is due. */
  advance(deltaMs: number): boolean {
    if (Number.isFinite(deltaMs) && deltaMs > 0) {
      this.accumulated += deltaMs;
    }
    if (this.accumulated < this.intervalMs) {
      return false;
    }
    this.accumulated = Math.min(
      this.accumulated - this.intervalMs,
      this.intervalMs,
    );
    return true;
  }

  reset(): void {
    this.accumulated = 0;
  }
}

import {
  DEFAULT_START_DIRECTION,
  DEFAULT_START_LENGTH,
  MIN_GRID_SIZE,
} from "../config";
import { GameError } from "../errors";
import {
  type Direction,
  type GridBounds,
  type GridPos,
  gridEquals,
  gridKey,
  isInBounds,
  isOppositeDirection,
  oppositeDirection,
  stepInDirection,
} from "../utils/grid";
import { logger } from "../utils/logger";
import { type Rng, pickIndex } from "../utils/rng";

// ── Types ────────────────────────────────────────────────────────

/** `won` and `lost` are terminal: no later call changes the outcome. */
export type GameStatus = "running" | "won" | "lost";

/** Outcome of a single `tick()`. */
export type TickResult = "moved" | "ate" | "lost" | "terminal";

/** Read-only snapshot handed to renderers and overlays. */
export interface CoreState {
  readonly cols: number;
  readonly rows: number;
  /** Head first. */
  readonly snake: readonly GridPos[];
  /** `null` only once the snake fills the whole grid. */
  readonly food: GridPos | null;
  readonly direction: Direction;
  readonly status: GameStatus;
  /** Food eaten this run. */
  readonly score: number;
}

export interface GameCoreOptions {
  /** Random source for food placement. Defaults to `Math.random`. */
  rng?: Rng;
  startLength?: number;
  startDirection?: Direction;
}

export function isTerminalStatus(status: GameStatus): boolean {
  return status !== "running";
}

// ── Game loop core ───────────────────────────────────────────────

/**
 * Grid Snake rules engine.
 *
 * Holds the grid, snake, food and status, and advances one cell per
 * `tick()`. It owns no timer and reads no input: a driver calls
 * `setDirection()` between ticks and `tick()` at its own cadence, and
 * must serialize those calls.
 */
export class GameCore {
  private readonly bounds: GridBounds;
  private readonly rng: Rng;
  private readonly startLength: number;
  private readonly startDirection: Direction;

  /** Ordered cells: index 0 = head. */
  private segments: GridPos[] = [];

  /** Keys of every occupied cell, kept in sync with `segments`. */
  private occupied = new Set<string>();

  private direction: Direction;

  /** Direction to apply on the next tick, if any. */
  private bufferedDirection: Direction | null = null;

  private food: GridPos | null = null;
  private status: GameStatus = "running";
  private score = 0;

  constructor(cols: number, rows: number, options: GameCoreOptions = {}) {
    validateGrid(cols, rows);

    this.bounds = { cols, rows };
    this.rng = options.rng ?? Math.random;
    this.startLength = options.startLength ?? DEFAULT_START_LENGTH;
    this.startDirection = options.startDirection ?? DEFAULT_START_DIRECTION;
    this.direction = this.startDirection;

    if (!Number.isInteger(this.startLength) || this.startLength < 1) {
      throw new GameError(
        "INVALID_CONFIG",
        `Start length must be a positive integer, got ${this.startLength}.`,
        { startLength: this.startLength },
      );
    }

    this.reset();
  }

  // ── Lifecycle ──────────────────────────────────────────────────

  /**
   * Start a fresh run on the same grid: snake centered, trailing opposite
   * to the start direction, new food, status `running`, score 0.
   */
  reset(): void {
    const head: GridPos = {
      col: Math.floor(this.bounds.cols / 2),
      row: Math.floor(this.bounds.rows / 2),
    };
    const trailDir = oppositeDirection(this.startDirection);
    const segments: GridPos[] = [head];
    for (let i = 1; i < this.startLength; i++) {
      segments.push(stepInDirection(segments[i - 1], trailDir));
    }

    const outside = segments.find((cell) => !isInBounds(cell, this.bounds));
    if (outside) {
      throw new GameError(
        "INVALID_CONFIG",
        `A snake of length ${this.startLength} heading ${this.startDirection} does not fit a ${this.bounds.cols}x${this.bounds.rows} grid.`,
        { ...this.bounds, startLength: this.startLength, startDirection: this.startDirection },
      );
    }

    this.segments = segments;
    this.occupied = new Set(segments.map(gridKey));
    this.direction = this.startDirection;
    this.bufferedDirection = null;
    this.status = "running";
    this.score = 0;
    this.food = this.placeFood();
    if (!this.food) {
      this.status = "won";
    }
  }

  // ── Input ──────────────────────────────────────────────────────

  /**
   * Buffer the direction for the next tick.
   *
   * Ignored after a terminal status and when `dir` reverses the current
   * movement direction. A later call before the next tick overwrites an
   * earlier one.
   */
  setDirection(dir: Direction): void {
    if (isTerminalStatus(this.status)) return;
    if (isOppositeDirection(this.direction, dir)) {
      logger.debug("INPUT", `Ignored reversal ${this.direction} -> ${dir}`);
      return;
    }
    this.bufferedDirection = dir;
  }

  // ── Simulation ─────────────────────────────────────────────────

  /** Advance the snake by one cell. */
  tick(): TickResult {
    if (isTerminalStatus(this.status)) return "terminal";

    if (this.bufferedDirection !== null) {
      this.direction = this.bufferedDirection;
      this.bufferedDirection = null;
    }

    const head = this.segments[0];
    const nextHead = stepInDirection(head, this.direction);

    if (!isInBounds(nextHead, this.bounds)) {
      return this.lose(`Hit the wall at ${gridKey(nextHead)}`);
    }

    const eats = this.food !== null && gridEquals(nextHead, this.food);

    // The tail leaves its cell this tick unless the snake grows.
    const tail = this.segments[this.segments.length - 1];
    const nextKey = gridKey(nextHead);
    const hitsBody =
      this.occupied.has(nextKey) && (eats || !gridEquals(nextHead, tail));
    if (hitsBody) {
      return this.lose(`Ran into itself at ${nextKey}`);
    }

    if (!eats) {
      this.segments.pop();
      this.occupied.delete(gridKey(tail));
    }
    this.segments.unshift(nextHead);
    this.occupied.add(nextKey);

    if (!eats) return "moved";

    this.score += 1;
    this.food = this.placeFood();
    if (!this.food) {
      this.status = "won";
      logger.info("CORE", `Grid filled, won with score ${this.score}`);
    }
    return "ate";
  }

  // ── Queries ────────────────────────────────────────────────────

  getState(): CoreState {
    return {
      cols: this.bounds.cols,
      rows: this.bounds.rows,
      snake: this.segments.map((cell) => ({ ...cell })),
      food: this.food ? { ...this.food } : null,
      direction: this.direction,
      status: this.status,
      score: this.score,
    };
  }

  getStatus(): GameStatus {
    return this.status;
  }

  getScore(): number {
    return this.score;
  }

  getLength(): number {
    return this.segments.length;
  }

  getHeadPosition(): GridPos {
    return { ...this.segments[0] };
  }

  getDirection(): Direction {
    return this.direction;
  }

  isOnSnake(pos: GridPos): boolean {
    return this.occupied.has(gridKey(pos));
  }

  // ── Internals ──────────────────────────────────────────────────

  private lose(reason: string): TickResult {
    this.status = "lost";
    logger.debug("CORE", `${reason}, lost with score ${this.score}`);
    return "lost";
  }

  /** Uniformly random free cell, or `null` when the snake fills the grid. */
  private placeFood(): GridPos | null {
    const freeCells: GridPos[] = [];
    for (let row = 0; row < this.bounds.rows; row++) {
      for (let col = 0; col < this.bounds.cols; col++) {
        const pos: GridPos = { col, row };
        if (!this.occupied.has(gridKey(pos))) {
          freeCells.push(pos);
        }
      }
    }

    if (freeCells.length === 0) return null;
    return freeCells[pickIndex(this.rng, freeCells.length)];
  }
}

function validateGrid(cols: number, rows: number): void {
  const playable = (n: number) => Number.isInteger(n) && n >= MIN_GRID_SIZE;
  if (!playable(cols) || !playable(rows)) {
    throw new GameError(
      "INVALID_CONFIG",
      `Grid must be at least ${MIN_GRID_SIZE}x${MIN_GRID_SIZE} whole cells, got ${cols}x${rows}.`,
      { cols, rows, minSize: MIN_GRID_SIZE },
    );
  }
}

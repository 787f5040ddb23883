import type Phaser from "phaser";

// ── Grid & Arena Dimensions ──────────────────────────────────────
export const GRID_COLS = 20;
export const GRID_ROWS = 20;
export const TILE_SIZE = 20;
export const ARENA_WIDTH = GRID_COLS * TILE_SIZE;
export const ARENA_HEIGHT = GRID_ROWS * TILE_SIZE;

/** Smallest playable grid edge, in cells. */
export const MIN_GRID_SIZE = 4;

// ── Run Setup ────────────────────────────────────────────────────
export const TICK_INTERVAL_MS = 100;
export const DEFAULT_START_LENGTH = 3;
export const DEFAULT_START_DIRECTION = "right" as const;

// ── Neon Color Palette (mirrors CSS theme tokens in globals.css) ─
const NEON_PINK = 0xff2d78;
const NEON_CYAN = 0x00f0ff;

export const COLORS = {
  BACKGROUND: 0x0a0a0a,
  GRID_LINE: NEON_CYAN, // drawn at low alpha
  SNAKE_HEAD: NEON_CYAN,
  SNAKE_BODY: 0x00c8d4,
  FOOD: NEON_PINK,
} as const;

// ── Texture Keys (used by Boot preload and gameplay scenes) ──────
export const TEXTURE_KEYS = {
  SNAKE_HEAD: "snake-head",
  SNAKE_BODY: "snake-body",
  FOOD: "food",
} as const;

// ── Render Depth Layers ─────────────────────────────────────────
// Higher values render on top.
export const RENDER_DEPTH = {
  GRID: -1,
  FOOD: 5,
  SNAKE: 10,
} as const;

// ── Logging ─────────────────────────────────────────────────────
// Next.js inlines NEXT_PUBLIC_* variables into the client bundle.
export const LOG_LEVEL_SETTING =
  process.env.NEXT_PUBLIC_SNAKE_LOG_LEVEL ?? "warn";

// ── Phaser namespace shape ──────────────────────────────────────
// Declares only the subset of the Phaser namespace used here so
// config.ts never needs a runtime `import Phaser` (which would
// crash during Next.js SSR because Phaser requires browser globals).
export interface PhaserLike {
  AUTO: number;
  Scale: { FIT: number; CENTER_BOTH: number };
}

// ── Game Configuration Factory ───────────────────────────────────
export function createGameConfig(
  parent: HTMLElement,
  phaser: PhaserLike,
  scenes: Phaser.Types.Scenes.SceneType[],
): Phaser.Types.Core.GameConfig {
  return {
    type: phaser.AUTO,
    width: ARENA_WIDTH,
    height: ARENA_HEIGHT,
    parent,
    backgroundColor: COLORS.BACKGROUND,
    scale: {
      mode: phaser.Scale.FIT,
      autoCenter: phaser.Scale.CENTER_BOTH,
    },
    scene: scenes,
  };
}

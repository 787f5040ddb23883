import { describe, it, expect } from "vitest";
import {
  ARENA_WIDTH,
  ARENA_HEIGHT,
  TILE_SIZE,
  GRID_COLS,
  GRID_ROWS,
  MIN_GRID_SIZE,
  TICK_INTERVAL_MS,
  DEFAULT_START_LENGTH,
  DEFAULT_START_DIRECTION,
  COLORS,
  TEXTURE_KEYS,
  createGameConfig,
  type PhaserLike,
} from "@/game/config";

const phaserStub: PhaserLike = {
  AUTO: 0,
  Scale: { FIT: 3, CENTER_BOTH: 1 },
};

describe("Game config", () => {
  it("plays on a 20x20 grid stepped every 100ms", () => {
    expect(GRID_COLS).toBe(20);
    expect(GRID_ROWS).toBe(20);
    expect(TICK_INTERVAL_MS).toBe(100);
  });

  it("derives the arena size from grid and tile size", () => {
    expect(ARENA_WIDTH).toBe(GRID_COLS * TILE_SIZE);
    expect(ARENA_HEIGHT).toBe(GRID_ROWS * TILE_SIZE);
  });

  it("starts a length-3 snake heading right", () => {
    expect(DEFAULT_START_LENGTH).toBe(3);
    expect(DEFAULT_START_DIRECTION).toBe("right");
  });

  it("keeps the default grid at or above the minimum size", () => {
    expect(GRID_COLS).toBeGreaterThanOrEqual(MIN_GRID_SIZE);
    expect(GRID_ROWS).toBeGreaterThanOrEqual(MIN_GRID_SIZE);
  });
});

describe("COLORS palette", () => {
  it("COLORS.BACKGROUND matches dark theme (#0a0a0a)", () => {
    expect(COLORS.BACKGROUND).toBe(0x0a0a0a);
  });

  it("draws food in neon pink and the head in neon cyan", () => {
    expect(COLORS.FOOD).toBe(0xff2d78);
    expect(COLORS.SNAKE_HEAD).toBe(0x00f0ff);
  });
});

describe("TEXTURE_KEYS", () => {
  it("exports texture keys for the snake and food", () => {
    expect(TEXTURE_KEYS).toEqual({
      SNAKE_HEAD: "snake-head",
      SNAKE_BODY: "snake-body",
      FOOD: "food",
    });
  });
});

describe("createGameConfig", () => {
  it("returns a config object with arena dimensions and parent", () => {
    const parent = document.createElement("div");
    const config = createGameConfig(parent, phaserStub, []);
    expect(config.width).toBe(ARENA_WIDTH);
    expect(config.height).toBe(ARENA_HEIGHT);
    expect(config.parent).toBe(parent);
  });

  it("takes renderer and scale constants from the given Phaser namespace", () => {
    const config = createGameConfig(document.createElement("div"), phaserStub, []);
    expect(config.type).toBe(0);
    expect(config).toMatchObject({ scale: { mode: 3, autoCenter: 1 } });
  });

  it("passes the scene list through", () => {
    const scenes: [] = [];
    const config = createGameConfig(document.createElement("div"), phaserStub, scenes);
    expect(config.scene).toBe(scenes);
  });

  it("sets dark background color", () => {
    const config = createGameConfig(document.createElement("div"), phaserStub, []);
    expect(config.backgroundColor).toBe(COLORS.BACKGROUND);
  });
});

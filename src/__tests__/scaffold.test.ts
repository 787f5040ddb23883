import { describe, it, expect } from "vitest";
import fs from "fs";
import path from "path";

const ROOT = path.resolve(__dirname, "../..");

describe("Project scaffold", () => {
  const expectedFiles = [
    "src/app/layout.tsx",
    "src/app/page.tsx",
    "src/components/Game.tsx",
    "src/components/HUD.tsx",
    "src/components/StartScreen.tsx",
    "src/components/GameOver.tsx",
    "src/game/bridge.ts",
    "src/game/config.ts",
    "src/game/errors.ts",
    "src/game/core/GameCore.ts",
    "src/game/scenes/Boot.ts",
    "src/game/scenes/MainScene.ts",
    "src/game/utils/grid.ts",
    "src/game/utils/input.ts",
    "src/game/utils/logger.ts",
    "src/game/utils/rng.ts",
    "src/styles/globals.css",
  ];

  const expectedDirs = [
    "src/app",
    "src/components",
    "src/game",
    "src/game/core",
    "src/game/scenes",
    "src/game/utils",
    "src/styles",
  ];

  it.each(expectedFiles)("has file: %s", (file) => {
    expect(fs.existsSync(path.join(ROOT, file))).toBe(true);
  });

  it.each(expectedDirs)("has directory: %s", (dir) => {
    const stat = fs.statSync(path.join(ROOT, dir));
    expect(stat.isDirectory()).toBe(true);
  });

  it("keeps the rules core free of Phaser and React", () => {
    const source = fs.readFileSync(
      path.join(ROOT, "src/game/core/GameCore.ts"),
      "utf-8"
    );
    expect(source).not.toMatch(/from\s+["'](phaser|react)["']/);
  });
});

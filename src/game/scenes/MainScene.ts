import Phaser from "phaser";
import {
  ARENA_WIDTH,
  ARENA_HEIGHT,
  TILE_SIZE,
  GRID_COLS,
  GRID_ROWS,
  COLORS,
  RENDER_DEPTH,
  TEXTURE_KEYS,
  TICK_INTERVAL_MS,
} from "../config";
import { gameBridge, type GamePhase } from "../bridge";
import { GameCore, isTerminalStatus, type TickResult } from "../core/GameCore";
import { gridToPixel, MoveTicker } from "../utils/grid";
import { directionFromKey } from "../utils/input";
import { logger } from "../utils/logger";
import type { Rng } from "../utils/rng";

const LOSS_SHAKE_DURATION_MS = 150;
const LOSS_SHAKE_INTENSITY = 0.01;

/**
 * Primary gameplay scene: the driver around the game loop core.
 *
 * Manages the run phases (start → playing → gameOver), owns the tick
 * cadence, forwards keyboard directions to the core, and mirrors the
 * core snapshot onto sprites after every step. The core is never ticked
 * once it reports a terminal status.
 *
 * Score, session-best score, elapsed time and the run outcome are
 * published through the Phaser↔React bridge so overlay components stay
 * in sync.
 */
export class MainScene extends Phaser.Scene {
  /** Rules engine, kept across runs and reset for each one (null before the first run). */
  private core: GameCore | null = null;

  /** Fixed-cadence step timer. */
  private ticker = new MoveTicker(TICK_INTERVAL_MS);

  /** One sprite per snake cell, index 0 = head. */
  private segmentSprites: Phaser.GameObjects.Sprite[] = [];

  private foodSprite: Phaser.GameObjects.Sprite | null = null;

  /**
   * Injectable RNG function for deterministic replay sessions.
   * Returns a value in [0, 1). Defaults to Math.random.
   */
  private rng: Rng = Math.random;

  /** Set when the rng changes; the next run then needs a new core. */
  private rngChanged = false;

  /** Bound listener for bridge phase changes (stored for cleanup). */
  private onBridgePhaseChange: ((phase: GamePhase) => void) | null = null;

  /** Stored keyboard handler reference for cleanup. */
  private keydownHandler: ((event: KeyboardEvent) => void) | null = null;

  constructor() {
    super({ key: "MainScene" });
  }

  // ── Phaser lifecycle ────────────────────────────────────────

  create(): void {
    this.drawGrid();

    // Phase changes may come from React overlays (start screen, play again).
    this.onBridgePhaseChange = (phase: GamePhase) => {
      if (phase === "playing") {
        this.startRun();
      } else if (phase === "start") {
        this.destroySprites();
      }
    };
    gameBridge.on("phaseChange", this.onBridgePhaseChange);

    this.keydownHandler = (event: KeyboardEvent) => this.handleKey(event.code);
    this.input.keyboard?.on("keydown", this.keydownHandler);

    this.events.once("shutdown", () => this.shutdown());

    this.enterPhase("start");
  }

  /** Detach bridge and keyboard listeners and drop the current run. */
  shutdown(): void {
    if (this.onBridgePhaseChange) {
      gameBridge.off("phaseChange", this.onBridgePhaseChange);
      this.onBridgePhaseChange = null;
    }
    if (this.keydownHandler) {
      this.input.keyboard?.off("keydown", this.keydownHandler);
      this.keydownHandler = null;
    }
    this.destroySprites();
    this.core = null;
  }

  update(_time: number, delta: number): void {
    if (gameBridge.getState().phase !== "playing" || !this.core) return;

    gameBridge.setElapsedTime(gameBridge.getState().elapsedTime + delta);

    if (!this.ticker.advance(delta)) return;

    this.step(this.core);
  }

  // ── Phase management ────────────────────────────────────────

  /**
   * Transition to a new game phase and notify the bridge.
   *
   * Entering "playing" (from this scene or a React overlay) reaches
   * `startRun()` through the bridge listener, keeping a single code path.
   */
  enterPhase(next: GamePhase): void {
    gameBridge.setPhase(next);
  }

  getPhase(): GamePhase {
    return gameBridge.getState().phase;
  }

  // ── Run lifecycle ───────────────────────────────────────────

  /**
   * Start a run. The core of the previous run is reset in place; a new one
   * is built only for the first run or after `setRng()` swapped the rng.
   */
  private startRun(): void {
    gameBridge.resetRun();
    this.destroySprites();
    if (this.core && !this.rngChanged) {
      this.core.reset();
    } else {
      this.core = new GameCore(GRID_COLS, GRID_ROWS, { rng: this.rng });
      this.rngChanged = false;
    }
    this.ticker.reset();
    this.createSprites();
    logger.info("SCENE", "Run started");
  }

  /** End the current run: publish outcome and best score, enter gameOver. */
  endRun(): void {
    if (!this.core || this.getPhase() !== "playing") return;

    const status = this.core.getStatus();
    const outcome = status === "won" ? "won" : "lost";
    if (outcome === "lost") {
      this.cameras.main.shake(LOSS_SHAKE_DURATION_MS, LOSS_SHAKE_INTENSITY);
    }

    const { score, highScore } = gameBridge.getState();
    const beatBest = score > highScore;
    if (beatBest) {
      gameBridge.setHighScore(score);
    }
    gameBridge.setNewHighScore(beatBest);
    gameBridge.setOutcome(outcome);
    logger.info("SCENE", `Run ended (${outcome}) with score ${score}`);
    this.enterPhase("gameOver");
  }

  /** Run one core tick and reflect its result. */
  private step(core: GameCore): TickResult {
    const result = core.tick();

    if (result === "ate") {
      gameBridge.setScore(core.getScore());
    }

    this.syncSprites(core);

    if (isTerminalStatus(core.getStatus())) {
      this.endRun();
    }
    return result;
  }

  // ── Input ───────────────────────────────────────────────────

  /** Forward a keyboard code to the core while a run is active. */
  handleKey(code: string): void {
    if (!this.core || this.getPhase() !== "playing") return;
    const dir = directionFromKey(code);
    if (dir) {
      this.core.setDirection(dir);
    }
  }

  // ── Sprites ─────────────────────────────────────────────────

  private createSprites(): void {
    if (!this.core) return;
    const { snake, food } = this.core.getState();

    snake.forEach((cell, i) => {
      const pos = gridToPixel(cell);
      const key = i === 0 ? TEXTURE_KEYS.SNAKE_HEAD : TEXTURE_KEYS.SNAKE_BODY;
      const sprite = this.add.sprite(pos.x, pos.y, key);
      sprite.setDepth(RENDER_DEPTH.SNAKE);
      this.segmentSprites.push(sprite);
    });

    const foodPos = gridToPixel(food ?? { col: 0, row: 0 });
    this.foodSprite = this.add.sprite(foodPos.x, foodPos.y, TEXTURE_KEYS.FOOD);
    this.foodSprite.setDepth(RENDER_DEPTH.FOOD);
    this.foodSprite.setVisible(food !== null);
  }

  /** Mirror the core snapshot onto the sprites. The snake never shrinks mid-run. */
  private syncSprites(core: GameCore): void {
    const { snake, food } = core.getState();

    while (this.segmentSprites.length < snake.length) {
      const sprite = this.add.sprite(0, 0, TEXTURE_KEYS.SNAKE_BODY);
      sprite.setDepth(RENDER_DEPTH.SNAKE);
      this.segmentSprites.push(sprite);
    }

    snake.forEach((cell, i) => {
      const pos = gridToPixel(cell);
      this.segmentSprites[i].setPosition(pos.x, pos.y);
    });

    if (this.foodSprite) {
      if (food) {
        const pos = gridToPixel(food);
        this.foodSprite.setPosition(pos.x, pos.y);
      }
      this.foodSprite.setVisible(food !== null);
    }
  }

  private destroySprites(): void {
    for (const sprite of this.segmentSprites) {
      sprite.destroy();
    }
    this.segmentSprites = [];
    this.foodSprite?.destroy();
    this.foodSprite = null;
  }

  // ── RNG / Deterministic replay ────────────────────────────────

  /** Set the RNG used by the next run. */
  setRng(rng: Rng): void {
    if (rng !== this.rng) {
      this.rngChanged = true;
    }
    this.rng = rng;
  }

  getRng(): Rng {
    return this.rng;
  }

  // ── Accessors (for tests and external integration) ────────────

  getCore(): GameCore | null {
    return this.core;
  }

  getSegmentSprites(): readonly Phaser.GameObjects.Sprite[] {
    return this.segmentSprites;
  }

  getFoodSprite(): Phaser.GameObjects.Sprite | null {
    return this.foodSprite;
  }

  // ── Arena grid ──────────────────────────────────────────────

  private drawGrid(): void {
    const gfx = this.add.graphics();
    gfx.setDepth(RENDER_DEPTH.GRID);
    gfx.lineStyle(1, COLORS.GRID_LINE, 0.08);

    for (let col = 1; col < GRID_COLS; col++) {
      const x = col * TILE_SIZE;
      gfx.moveTo(x, 0);
      gfx.lineTo(x, ARENA_HEIGHT);
    }

    for (let row = 1; row < GRID_ROWS; row++) {
      const y = row * TILE_SIZE;
      gfx.moveTo(0, y);
      gfx.lineTo(ARENA_WIDTH, y);
    }

    gfx.strokePath();
  }
}

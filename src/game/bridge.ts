/**
 * Phaser ↔ React state bridge.
 *
 * A lightweight typed event emitter that Phaser scenes write to and React
 * overlays subscribe to.  Exported as a singleton so both sides import
 * the same instance.
 */

// ── Game phases ─────────────────────────────────────────────────
export type GamePhase = "start" | "playing" | "gameOver";

/** How the last run ended; `null` while no run has finished. */
export type RunOutcome = "won" | "lost";

// ── Bridge state shape ──────────────────────────────────────────
export interface GameState {
  phase: GamePhase;
  score: number;
  /** Best score of this browser session (kept in memory only). */
  highScore: number;
  /** Elapsed survival time in milliseconds. */
  elapsedTime: number;
  outcome: RunOutcome | null;
  /** Whether the last finished run beat the session best it started with. */
  newHighScore: boolean;
}

// ── Event map: event name → payload ─────────────────────────────
export interface GameBridgeEvents {
  phaseChange: GamePhase;
  scoreChange: number;
  highScoreChange: number;
  elapsedTimeChange: number;
  outcomeChange: RunOutcome | null;
  newHighScoreChange: boolean;
}

export type GameBridgeEventName = keyof GameBridgeEvents;

type Listener<T> = (value: T) => void;

type ListenerSets = {
  [K in GameBridgeEventName]: Set<Listener<GameBridgeEvents[K]>>;
};

/**
 * Typed event emitter that also holds the latest snapshot of game state
 * so late-subscribing React components can read the current value
 * without waiting for the next event.
 */
export class GameBridge {
  private state: GameState = {
    phase: "start",
    score: 0,
    highScore: 0,
    elapsedTime: 0,
    outcome: null,
    newHighScore: false,
  };

  private listeners: ListenerSets = {
    phaseChange: new Set(),
    scoreChange: new Set(),
    highScoreChange: new Set(),
    elapsedTimeChange: new Set(),
    outcomeChange: new Set(),
    newHighScoreChange: new Set(),
  };

  // ── Getters ─────────────────────────────────────────────────
  getState(): Readonly<GameState> {
    return this.state;
  }

  // ── Mutations (called by Phaser scenes) ─────────────────────
  setPhase(phase: GamePhase): void {
    this.state.phase = phase;
    this.emit("phaseChange", phase);
  }

  setScore(score: number): void {
    this.state.score = score;
    this.emit("scoreChange", score);
  }

  setHighScore(highScore: number): void {
    this.state.highScore = highScore;
    this.emit("highScoreChange", highScore);
  }

  setElapsedTime(elapsedTime: number): void {
    this.state.elapsedTime = elapsedTime;
    this.emit("elapsedTimeChange", elapsedTime);
  }

  setOutcome(outcome: RunOutcome | null): void {
    if (this.state.outcome === outcome) {
      return;
    }
    this.state.outcome = outcome;
    this.emit("outcomeChange", outcome);
  }

  setNewHighScore(newHighScore: boolean): void {
    if (this.state.newHighScore === newHighScore) {
      return;
    }
    this.state.newHighScore = newHighScore;
    this.emit("newHighScoreChange", newHighScore);
  }

  /** Reset all per-run state (called on new game). */
  resetRun(): void {
    this.state.score = 0;
    this.state.elapsedTime = 0;
    this.emit("scoreChange", 0);
    this.emit("elapsedTimeChange", 0);
    this.setOutcome(null);
    this.setNewHighScore(false);
  }

  // ── Pub / Sub ───────────────────────────────────────────────
  on<K extends GameBridgeEventName>(
    event: K,
    listener: Listener<GameBridgeEvents[K]>,
  ): void {
    this.listenersFor(event).add(listener);
  }

  off<K extends GameBridgeEventName>(
    event: K,
    listener: Listener<GameBridgeEvents[K]>,
  ): void {
    this.listenersFor(event).delete(listener);
  }

  private emit<K extends GameBridgeEventName>(
    event: K,
    value: GameBridgeEvents[K],
  ): void {
    this.listenersFor(event).forEach((fn) => fn(value));
  }

  private listenersFor<K extends GameBridgeEventName>(
    event: K,
  ): Set<Listener<GameBridgeEvents[K]>> {
    return this.listeners[event];
  }
}

/** Singleton bridge instance shared by Phaser and React. */
export const gameBridge = new GameBridge();

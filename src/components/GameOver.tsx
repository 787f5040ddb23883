"use client";

import { useEffect, useState, useCallback, useRef } from "react";
import { gameBridge, type GamePhase, type RunOutcome } from "@/game/bridge";

/**
 * Format milliseconds into a human-readable "Xm Ys" or "Xs" string.
 */
function formatTime(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  if (minutes > 0) {
    return `${minutes}m ${seconds}s`;
  }
  return `${seconds}s`;
}

/**
 * Post-game overlay displayed after the run ends.
 *
 * Shows the outcome, final score, session best and time survived, plus a
 * "Play Again" button that re-enters the playing phase.
 *
 * Only visible during the "gameOver" phase.
 */
export default function GameOver() {
  const [phase, setPhase] = useState<GamePhase>(
    () => gameBridge.getState().phase,
  );
  const [score, setScore] = useState<number>(
    () => gameBridge.getState().score,
  );
  const [highScore, setHighScore] = useState<number>(
    () => gameBridge.getState().highScore,
  );
  const [elapsedTime, setElapsedTime] = useState<number>(
    () => gameBridge.getState().elapsedTime,
  );
  const [outcome, setOutcome] = useState<RunOutcome | null>(
    () => gameBridge.getState().outcome,
  );
  const [isNewHighScore, setIsNewHighScore] = useState<boolean>(
    () => gameBridge.getState().newHighScore,
  );

  const playAgainRef = useRef<HTMLButtonElement | null>(null);

  useEffect(() => {
    const onPhase = (p: GamePhase) => setPhase(p);
    const onScore = (s: number) => setScore(s);
    const onHighScore = (hs: number) => setHighScore(hs);
    const onElapsedTime = (t: number) => setElapsedTime(t);
    const onOutcome = (o: RunOutcome | null) => setOutcome(o);
    const onNewHighScore = (isNew: boolean) => setIsNewHighScore(isNew);

    gameBridge.on("phaseChange", onPhase);
    gameBridge.on("scoreChange", onScore);
    gameBridge.on("highScoreChange", onHighScore);
    gameBridge.on("elapsedTimeChange", onElapsedTime);
    gameBridge.on("outcomeChange", onOutcome);
    gameBridge.on("newHighScoreChange", onNewHighScore);

    return () => {
      gameBridge.off("phaseChange", onPhase);
      gameBridge.off("scoreChange", onScore);
      gameBridge.off("highScoreChange", onHighScore);
      gameBridge.off("elapsedTimeChange", onElapsedTime);
      gameBridge.off("outcomeChange", onOutcome);
      gameBridge.off("newHighScoreChange", onNewHighScore);
    };
  }, []);

  // Auto-focus the Play Again button when entering gameOver phase
  useEffect(() => {
    if (phase === "gameOver") {
      const id = setTimeout(() => playAgainRef.current?.focus(), 50);
      return () => clearTimeout(id);
    }
  }, [phase]);

  const playAgain = useCallback(() => {
    if (gameBridge.getState().phase !== "gameOver") return;
    gameBridge.setPhase("playing");
  }, []);

  const returnToStart = useCallback(() => {
    if (gameBridge.getState().phase !== "gameOver") return;
    gameBridge.setPhase("start");
  }, []);

  // Keyboard shortcuts: Enter/Space → play again, Escape → start screen
  useEffect(() => {
    if (phase !== "gameOver") return;

    const onKeyDown = (e: KeyboardEvent) => {
      if (e.key === "Enter" || e.key === " ") {
        e.preventDefault();
        playAgain();
      } else if (e.key === "Escape") {
        e.preventDefault();
        returnToStart();
      }
    };

    window.addEventListener("keydown", onKeyDown);
    return () => window.removeEventListener("keydown", onKeyDown);
  }, [phase, playAgain, returnToStart]);

  if (phase !== "gameOver") return <div id="game-over" />;

  const won = outcome === "won";

  return (
    <div
      id="game-over"
      className="flex h-full w-full flex-col items-center justify-center"
      role="dialog"
      aria-label={won ? "You win" : "Game over"}
    >
      <h2
        className={`mb-6 font-mono text-4xl font-bold tracking-widest sm:text-5xl ${
          won ? "neon-glow-cyan text-neon-cyan" : "neon-glow-pink text-neon-pink"
        }`}
        data-testid="game-over-title"
      >
        {won ? "YOU WIN" : "GAME OVER"}
      </h2>

      <div className="surface-panel mb-8 flex flex-col items-center gap-3 px-8 py-6">
        <div className="text-center" data-testid="final-score">
          <span className="font-mono text-xs tracking-wide text-foreground/50">
            SCORE
          </span>
          <p className="neon-glow-cyan font-mono text-3xl font-bold tabular-nums text-neon-cyan">
            {score}
          </p>
        </div>

        <div className="text-center" data-testid="high-score">
          <span className="font-mono text-xs tracking-wide text-foreground/50">
            HIGH SCORE
          </span>
          <p className="font-mono text-lg tabular-nums text-neon-purple">
            {highScore}
          </p>
          {isNewHighScore && (
            <span
              className="neon-glow-pink font-mono text-xs font-bold tracking-wide text-neon-pink"
              data-testid="new-high-score"
            >
              NEW!
            </span>
          )}
        </div>

        <div className="text-center" data-testid="time-survived">
          <span className="font-mono text-xs tracking-wide text-foreground/50">
            TIME SURVIVED
          </span>
          <p className="font-mono text-lg tabular-nums text-foreground/80">
            {formatTime(elapsedTime)}
          </p>
        </div>
      </div>

      <div className="flex flex-col items-center gap-3">
        <button
          ref={playAgainRef}
          className="neon-border-cyan rounded border px-6 py-3 font-mono text-sm font-bold tracking-widest text-neon-cyan transition-all hover:bg-neon-cyan/10 focus-visible:bg-neon-cyan/10"
          data-testid="play-again"
          onClick={playAgain}
          type="button"
        >
          PLAY AGAIN
        </button>
        <button
          className="rounded border border-surface-bright px-4 py-2 font-mono text-xs tracking-wide text-foreground/50 transition-all hover:border-neon-pink/40 hover:text-foreground/80 focus-visible:border-neon-pink/40 focus-visible:text-foreground/80"
          data-testid="return-to-start"
          onClick={returnToStart}
          type="button"
        >
          MENU
        </button>
      </div>

      <p
        className="mt-4 font-mono text-[10px] tracking-wide text-foreground/30"
        data-testid="keyboard-hint"
        aria-hidden="true"
      >
        ENTER — PLAY &nbsp;&nbsp; ESC — MENU
      </p>
    </div>
  );
}

export { formatTime };

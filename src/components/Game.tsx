"use client";

import { useEffect, useRef } from "react";
import { logger } from "@/game/utils/logger";

type PhaserGameInstance = {
  destroy: (removeCanvas: boolean, noReturn?: boolean) => void;
  scale?: {
    refresh?: () => void;
  };
};

type ArenaFitSize = Readonly<{
  width: number;
  height: number;
  scale: number;
}>;

function clampDimension(value: number): number {
  if (!Number.isFinite(value)) {
    return 0;
  }

  return Math.max(0, Math.floor(value));
}

/**
 * Largest arena size that fits the container while keeping cells a whole
 * number of pixels wide. Falls back to a fractional fit when the container
 * is smaller than one pixel per cell.
 */
export function fitArenaToContainer(
  containerWidth: number,
  containerHeight: number,
  arenaWidth: number,
  arenaHeight: number,
  gridCols: number,
  gridRows: number,
): ArenaFitSize {
  const safeContainerWidth = clampDimension(containerWidth);
  const safeContainerHeight = clampDimension(containerHeight);
  const safeArenaWidth = Math.max(1, clampDimension(arenaWidth));
  const safeArenaHeight = Math.max(1, clampDimension(arenaHeight));
  const safeGridCols = Math.max(1, clampDimension(gridCols));
  const safeGridRows = Math.max(1, clampDimension(gridRows));

  if (safeContainerWidth === 0 || safeContainerHeight === 0) {
    return { width: 0, height: 0, scale: 0 };
  }

  const maxScale = Math.min(
    safeContainerWidth / safeArenaWidth,
    safeContainerHeight / safeArenaHeight,
  );

  const fittedWidth = Math.max(1, Math.floor(safeArenaWidth * maxScale));
  const fittedHeight = Math.max(1, Math.floor(safeArenaHeight * maxScale));
  const cellWidth = Math.floor(fittedWidth / safeGridCols);
  const cellHeight = Math.floor(fittedHeight / safeGridRows);
  const snappedCellSize = Math.min(cellWidth, cellHeight);

  if (snappedCellSize >= 1) {
    const width = snappedCellSize * safeGridCols;
    const height = snappedCellSize * safeGridRows;

    return {
      width,
      height,
      scale: width / safeArenaWidth,
    };
  }

  return {
    width: fittedWidth,
    height: fittedHeight,
    scale: Math.min(
      fittedWidth / safeArenaWidth,
      fittedHeight / safeArenaHeight,
    ),
  };
}

/**
 * Client-only Phaser mount. Phaser, the scenes and the game config are
 * imported lazily so nothing touches browser globals during SSR.
 */
export default function Game() {
  const frameRef = useRef<HTMLDivElement | null>(null);
  const mountRef = useRef<HTMLDivElement | null>(null);
  const gameRef = useRef<PhaserGameInstance | null>(null);

  useEffect(() => {
    let cancelled = false;
    let resizeObserver: ResizeObserver | null = null;
    let arenaSize = { width: 0, height: 0, cols: 0, rows: 0 };

    const frameNode = frameRef.current;
    const mountNode = mountRef.current;

    if (!frameNode || !mountNode || gameRef.current) {
      return;
    }

    const applyResponsiveSizing = () => {
      if (arenaSize.width <= 0 || arenaSize.height <= 0) {
        return;
      }

      const bounds = frameNode.getBoundingClientRect();
      const fit = fitArenaToContainer(
        bounds.width,
        bounds.height,
        arenaSize.width,
        arenaSize.height,
        arenaSize.cols,
        arenaSize.rows,
      );

      mountNode.style.width = `${fit.width}px`;
      mountNode.style.height = `${fit.height}px`;
      gameRef.current?.scale?.refresh?.();
    };

    const bootstrap = async () => {
      const [
        { default: Phaser },
        { ARENA_HEIGHT, ARENA_WIDTH, GRID_COLS, GRID_ROWS, createGameConfig },
        { Boot },
        { MainScene },
      ] = await Promise.all([
        import("phaser"),
        import("@/game/config"),
        import("@/game/scenes/Boot"),
        import("@/game/scenes/MainScene"),
      ]);

      if (cancelled || gameRef.current) {
        return;
      }

      arenaSize = {
        width: ARENA_WIDTH,
        height: ARENA_HEIGHT,
        cols: GRID_COLS,
        rows: GRID_ROWS,
      };
      applyResponsiveSizing();

      gameRef.current = new Phaser.Game(
        createGameConfig(mountNode, Phaser, [Boot, MainScene]),
      );

      if (typeof ResizeObserver !== "undefined") {
        resizeObserver = new ResizeObserver(() => applyResponsiveSizing());
        resizeObserver.observe(frameNode);
      }
    };

    bootstrap().catch((error: unknown) => {
      logger.error("UI", "Failed to start the game", error);
    });

    return () => {
      cancelled = true;
      resizeObserver?.disconnect();

      if (gameRef.current) {
        gameRef.current.destroy(true);
        gameRef.current = null;
      }

      mountNode.style.width = "";
      mountNode.style.height = "";
    };
  }, []);

  return (
    <div ref={frameRef} className="flex h-full w-full items-center justify-center">
      <div
        ref={mountRef}
        id="game-container"
        className="max-h-full max-w-full overflow-hidden"
      />
    </div>
  );
}

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { render, act, cleanup } from "@testing-library/react";
import { gameBridge } from "@/game/bridge";
import HUD from "@/components/HUD";

describe("HUD component", () => {
  afterEach(() => {
    cleanup();
    vi.restoreAllMocks();
  });

  beforeEach(() => {
    gameBridge.setPhase("start");
    gameBridge.resetRun();
    gameBridge.setHighScore(0);
  });

  it("renders an empty #hud outside the playing phase", () => {
    const { container, queryByTestId } = render(<HUD />);
    expect(container.querySelector("#hud")).toBeTruthy();
    expect(queryByTestId("hud-score")).toBeNull();
    expect(queryByTestId("hud-high-score")).toBeNull();
  });

  it("shows score and session best while playing", () => {
    gameBridge.setPhase("playing");
    gameBridge.setScore(3);
    gameBridge.setHighScore(11);
    const { getByTestId } = render(<HUD />);
    expect(getByTestId("hud-score").textContent).toBe("SCORE3");
    expect(getByTestId("hud-high-score").textContent).toBe("HI11");
  });

  it("appears when the phase changes to playing", () => {
    const { queryByTestId } = render(<HUD />);
    act(() => {
      gameBridge.setPhase("playing");
    });
    expect(queryByTestId("hud-score")).not.toBeNull();
  });

  it("updates on score and high score changes", () => {
    gameBridge.setPhase("playing");
    const { getByTestId } = render(<HUD />);
    act(() => {
      gameBridge.setScore(4);
      gameBridge.setHighScore(4);
    });
    expect(getByTestId("hud-score").textContent).toBe("SCORE4");
    expect(getByTestId("hud-high-score").textContent).toBe("HI4");
  });

  it("hides again when the run ends", () => {
    gameBridge.setPhase("playing");
    const { queryByTestId } = render(<HUD />);
    act(() => {
      gameBridge.setPhase("gameOver");
    });
    expect(queryByTestId("hud-score")).toBeNull();
  });

  it("unsubscribes from the bridge on unmount", () => {
    const offSpy = vi.spyOn(gameBridge, "off");
    const { unmount } = render(<HUD />);
    unmount();
    expect(offSpy).toHaveBeenCalledWith("phaseChange", expect.any(Function));
    expect(offSpy).toHaveBeenCalledWith("scoreChange", expect.any(Function));
    expect(offSpy).toHaveBeenCalledWith("highScoreChange", expect.any(Function));
  });
});

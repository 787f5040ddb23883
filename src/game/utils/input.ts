import type { Direction } from "./grid";

/** Key mapping from keyboard codes to Direction. */
export const KEY_DIRECTION_MAP: Readonly<Record<string, Direction>> = {
  ArrowUp: "up",
  ArrowDown: "down",
  ArrowLeft: "left",
  ArrowRight: "right",
  KeyW: "up",
  KeyS: "down",
  KeyA: "left",
  KeyD: "right",
};

/** Direction for a `KeyboardEvent.code`, or `null` for unmapped keys. */
export function directionFromKey(code: string): Direction | null {
  return Object.prototype.hasOwnProperty.call(KEY_DIRECTION_MAP, code)
    ? KEY_DIRECTION_MAP[code]
    : null;
}

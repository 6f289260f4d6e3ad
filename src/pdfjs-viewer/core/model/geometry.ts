import type { PointerPosition, Rectangle } from "./types";

export function rectangleFromDrag(anchor: PointerPosition, current: PointerPosition): Rectangle {
  return {
    x: anchor.x,
    y: anchor.y,
    width: current.x - anchor.x,
    height: current.y - anchor.y,
  };
}

export function isValidDimension(n: number): boolean {
  return Number.isFinite(n) && n >= 0;
}

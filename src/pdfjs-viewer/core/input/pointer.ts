import type { PointerPosition } from "../model/types";

export type PointerSample = {
  clientX: number;
  clientY: number;
};

export type ButtonSample = {
  button: number;
};

export function isPrimaryButton(evt: ButtonSample): boolean {
  return evt.button === 0;
}

// Offsets are taken against the element box rather than read from `offsetX`,
// which is relative to whichever child the pointer is over.
export function getSurfaceOffset(
  evt: PointerSample,
  element: { getBoundingClientRect(): { left: number; top: number } }
): PointerPosition {
  const box = element.getBoundingClientRect();
  return { x: evt.clientX - box.left, y: evt.clientY - box.top };
}

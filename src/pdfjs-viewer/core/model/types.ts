// Shared types for the page renderer and the annotation overlay.

/** Pixel size of the rendered page, and so of the overlay above it. */
export type CanvasDimensions = Readonly<{
  height: number;
  width: number;
}>;

/** Offset within the overlay element, not page or viewport coordinates. */
export type PointerPosition = Readonly<{
  x: number;
  y: number;
}>;

/**
 * Width/height are signed: dragging toward the top-left yields negative
 * extents, which the surface draws toward decreasing coordinates.
 */
export type Rectangle = Readonly<{
  x: number;
  y: number;
  width: number;
  height: number;
}>;

export type DragState =
  | { readonly kind: "idle" }
  | { readonly kind: "dragging"; readonly anchor: PointerPosition };

export type OverlayState = DragState["kind"];

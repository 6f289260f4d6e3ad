import type { CanvasDimensions, DragState, OverlayState, PointerPosition, Rectangle } from "../model/types";
import { isValidDimension, rectangleFromDrag } from "../model/geometry";
import { SurfaceOperationError, type SurfaceHandle, type SurfaceOperation } from "../surface/SurfaceHandle";
import { createLogger, type Logger } from "@/lib/logger";

export type RepaintAbort =
  | { reason: "no-surface" }
  | { reason: "no-dimensions" }
  | { reason: "operation-failed"; operation: SurfaceOperation; error: unknown };

type OverlayEvents = {
  stateChanged: OverlayState;
  repainted: Rectangle;
  repaintAborted: RepaintAbort;
};

type Listener<K extends keyof OverlayEvents> = (payload: OverlayEvents[K]) => void;
type ListenerMap = { [K in keyof OverlayEvents]: Set<Listener<K>> };

export type AnnotationOverlayOptions = {
  logger?: Logger;
  strokeStyle?: string;
  lineWidth?: number;
};

const IDLE: DragState = { kind: "idle" };

/**
 * Tracks one drag gesture at a time and repaints the dragged rectangle on the
 * overlay surface.
 *
 * Repaint sequences are serialized: each `pointerMove` queues one sequence
 * behind the previous one, so two sequences never interleave their surface
 * calls. A sequence stops at its first failing operation; the next move starts
 * over from the top.
 */
export class AnnotationOverlay {
  private readonly logger: Logger;
  private readonly strokeStyle: string;
  private readonly lineWidth: number;

  private surface: SurfaceHandle | null = null;
  private surfaceAttached = false;
  private dimensions: CanvasDimensions | null = null;
  private drag: DragState = IDLE;
  private repaintQueue: Promise<void> = Promise.resolve();
  private destroyed = false;

  private listeners: ListenerMap = {
    stateChanged: new Set(),
    repainted: new Set(),
    repaintAborted: new Set(),
  };

  constructor(options: AnnotationOverlayOptions = {}) {
    this.logger = options.logger ?? createLogger("AnnotationOverlay");
    this.strokeStyle = options.strokeStyle ?? "black";
    this.lineWidth = options.lineWidth ?? 2;
  }

  on<K extends keyof OverlayEvents>(event: K, handler: Listener<K>): () => void {
    const set: Set<Listener<K>> = this.listeners[event];
    set.add(handler);
    return () => this.off(event, handler);
  }

  off<K extends keyof OverlayEvents>(event: K, handler: Listener<K>) {
    const set: Set<Listener<K>> = this.listeners[event];
    set.delete(handler);
  }

  private emit<K extends keyof OverlayEvents>(event: K, payload: OverlayEvents[K]) {
    const set: Set<Listener<K>> = this.listeners[event];
    for (const fn of Array.from(set)) {
      try {
        fn(payload);
      } catch (e) {
        this.logger.error(`Listener for "${event}" threw`, e);
      }
    }
  }

  get state(): OverlayState {
    return this.drag.kind;
  }

  get hasSurface(): boolean {
    return this.surface !== null;
  }

  get canvasDimensions(): CanvasDimensions | null {
    return this.dimensions;
  }

  /**
   * Setup step, run once after the overlay element exists. Passing `null`
   * records that the drawing context could not be acquired; every later move
   * is then a logged no-op.
   */
  attachSurface(surface: SurfaceHandle | null) {
    if (this.surfaceAttached) {
      this.logger.warn("Overlay surface is already attached; ignoring");
      return;
    }
    this.surfaceAttached = true;
    this.surface = surface;
    if (surface) {
      this.logger.info("Attached overlay surface");
    } else {
      this.logger.error("Overlay drawing context is unavailable; rectangles will not be drawn");
    }
  }

  /** One-time handshake with the page renderer. */
  setCanvasDimensions(dimensions: CanvasDimensions) {
    if (this.dimensions) {
      this.logger.warn("Canvas dimensions are already set; ignoring", dimensions);
      return;
    }
    if (!isValidDimension(dimensions.width) || !isValidDimension(dimensions.height)) {
      this.logger.warn("Rejected invalid canvas dimensions", dimensions);
      return;
    }
    this.dimensions = { width: dimensions.width, height: dimensions.height };
    this.logger.info("Got canvas dimensions", this.dimensions);
  }

  pointerDown(position: PointerPosition) {
    if (this.destroyed) return;
    if (this.drag.kind === "dragging") {
      // A second down without an up restarts the drag from the new point.
      this.logger.debug("Pointer down while dragging; restarting drag", position);
    } else {
      this.logger.info("Pointer down", position);
    }
    this.drag = { kind: "dragging", anchor: { x: position.x, y: position.y } };
    this.emit("stateChanged", "dragging");
  }

  pointerUp() {
    if (this.destroyed) return;
    if (this.drag.kind === "idle") return;
    this.logger.info("Pointer up");
    this.drag = IDLE;
    this.emit("stateChanged", "idle");
  }

  /**
   * Queues a repaint for the rectangle from the drag anchor to `position`.
   * Resolves once that repaint has finished or aborted; never rejects.
   */
  pointerMove(position: PointerPosition): Promise<void> {
    if (this.destroyed || this.drag.kind !== "dragging") return Promise.resolve();
    const anchor = this.drag.anchor;
    const current = { x: position.x, y: position.y };
    const next = this.repaintQueue.then(() => this.repaint(anchor, current));
    this.repaintQueue = next;
    return next;
  }

  /** Settles once every repaint queued so far has finished. */
  whenIdle(): Promise<void> {
    return this.repaintQueue;
  }

  destroy() {
    this.destroyed = true;
    this.drag = IDLE;
    for (const set of Object.values(this.listeners)) set.clear();
  }

  private abort(detail: RepaintAbort) {
    this.emit("repaintAborted", detail);
  }

  private async repaint(anchor: PointerPosition, current: PointerPosition): Promise<void> {
    if (this.destroyed) return;
    const surface = this.surface;
    if (!surface) {
      this.logger.warn("Overlay drawing context is not assigned; cannot draw rectangle");
      this.abort({ reason: "no-surface" });
      return;
    }
    const dimensions = this.dimensions;
    if (!dimensions) {
      this.logger.warn("Canvas dimensions are not known yet; cannot clear overlay");
      this.abort({ reason: "no-dimensions" });
      return;
    }

    const rect = rectangleFromDrag(anchor, current);
    const steps: Array<[SurfaceOperation, () => Promise<void>]> = [
      ["beginPath", () => surface.beginPath()],
      ["addRectangle", () => surface.addRectangle(rect.x, rect.y, rect.width, rect.height)],
      ["setStrokeStyle", () => surface.setStrokeStyle(this.strokeStyle)],
      ["setLineWidth", () => surface.setLineWidth(this.lineWidth)],
      // clearRect must stay directly before stroke.
      ["clearRect", () => surface.clearRect(0, 0, dimensions.width, dimensions.height)],
      ["stroke", () => surface.stroke()],
    ];

    for (const [operation, run] of steps) {
      if (this.destroyed) return;
      this.logger.debug(`Running ${operation}`);
      try {
        await run();
      } catch (e) {
        const failed = e instanceof SurfaceOperationError ? e.operation : operation;
        this.logger.error(`Repaint aborted at ${failed}`, e);
        this.abort({ reason: "operation-failed", operation: failed, error: e });
        return;
      }
    }

    this.emit("repainted", rect);
  }
}

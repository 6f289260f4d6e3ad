import type { Context } from "konva/lib/Context";
import { runSurfaceOperation, type SurfaceHandle, type SurfaceOperation } from "./SurfaceHandle";

export type KonvaContextLike = Pick<Context, "beginPath" | "rect" | "setAttr" | "clearRect" | "stroke">;

/** The parts of a `Konva.Layer` the overlay draws through. */
export type KonvaLayerLike = {
  getContext(): KonvaContextLike;
  getStage(): unknown;
};

// Draws straight onto the layer's scene canvas. The layer must hold no shapes
// of its own, or the next layer.draw() would wipe the rectangle.
export class KonvaSurfaceHandle implements SurfaceHandle {
  constructor(private readonly layer: KonvaLayerLike) {}

  private run(operation: SurfaceOperation, draw: (ctx: KonvaContextLike) => void) {
    return runSurfaceOperation(operation, () => {
      if (!this.layer.getStage()) throw new Error("layer is not attached to a stage");
      draw(this.layer.getContext());
    });
  }

  beginPath() {
    return this.run("beginPath", (ctx) => ctx.beginPath());
  }

  addRectangle(x: number, y: number, width: number, height: number) {
    return this.run("addRectangle", (ctx) => ctx.rect(x, y, width, height));
  }

  setStrokeStyle(color: string) {
    return this.run("setStrokeStyle", (ctx) => ctx.setAttr("strokeStyle", color));
  }

  setLineWidth(width: number) {
    return this.run("setLineWidth", (ctx) => ctx.setAttr("lineWidth", width));
  }

  clearRect(x: number, y: number, width: number, height: number) {
    return this.run("clearRect", (ctx) => ctx.clearRect(x, y, width, height));
  }

  stroke() {
    return this.run("stroke", (ctx) => ctx.stroke());
  }
}

import { runSurfaceOperation, type SurfaceHandle, type SurfaceOperation } from "./SurfaceHandle";

export type Canvas2DContext = Pick<
  CanvasRenderingContext2D,
  "beginPath" | "rect" | "clearRect" | "stroke" | "strokeStyle" | "lineWidth"
> & {
  readonly canvas: { readonly isConnected: boolean };
};

/** SurfaceHandle over a plain `<canvas>` 2D context. */
export class CanvasSurfaceHandle implements SurfaceHandle {
  constructor(private readonly ctx: Canvas2DContext) {}

  private run(operation: SurfaceOperation, draw: (ctx: Canvas2DContext) => void) {
    return runSurfaceOperation(operation, () => {
      if (!this.ctx.canvas.isConnected) throw new Error("canvas is detached from the document");
      draw(this.ctx);
    });
  }

  beginPath() {
    return this.run("beginPath", (ctx) => ctx.beginPath());
  }

  addRectangle(x: number, y: number, width: number, height: number) {
    return this.run("addRectangle", (ctx) => ctx.rect(x, y, width, height));
  }

  setStrokeStyle(color: string) {
    return this.run("setStrokeStyle", (ctx) => {
      ctx.strokeStyle = color;
    });
  }

  setLineWidth(width: number) {
    return this.run("setLineWidth", (ctx) => {
      ctx.lineWidth = width;
    });
  }

  clearRect(x: number, y: number, width: number, height: number) {
    return this.run("clearRect", (ctx) => ctx.clearRect(x, y, width, height));
  }

  stroke() {
    return this.run("stroke", (ctx) => ctx.stroke());
  }
}

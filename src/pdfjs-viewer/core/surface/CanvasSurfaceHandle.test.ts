import { describe, expect, it, vi } from "vitest";
import { CanvasSurfaceHandle, type Canvas2DContext } from "./CanvasSurfaceHandle";
import { SurfaceOperationError } from "./SurfaceHandle";

function createContext(connected = true) {
  const canvas = { isConnected: connected };
  const ctx = {
    beginPath: vi.fn(),
    rect: vi.fn(),
    clearRect: vi.fn(),
    stroke: vi.fn(),
    strokeStyle: "#000000",
    lineWidth: 1,
    canvas,
  } satisfies Canvas2DContext;
  return { ctx, canvas };
}

describe("CanvasSurfaceHandle", () => {
  it("forwards path and clear calls to the 2D context", async () => {
    const { ctx } = createContext();
    const surface = new CanvasSurfaceHandle(ctx);

    await surface.beginPath();
    await surface.addRectangle(50, 30, -40, -20);
    await surface.clearRect(0, 0, 300, 200);
    await surface.stroke();

    expect(ctx.beginPath).toHaveBeenCalledTimes(1);
    expect(ctx.rect).toHaveBeenCalledWith(50, 30, -40, -20);
    expect(ctx.clearRect).toHaveBeenCalledWith(0, 0, 300, 200);
    expect(ctx.stroke).toHaveBeenCalledTimes(1);
  });

  it("keeps paint attributes on the context until changed", async () => {
    const { ctx } = createContext();
    const surface = new CanvasSurfaceHandle(ctx);

    await surface.setStrokeStyle("black");
    await surface.setLineWidth(2);
    await surface.stroke();

    expect(ctx.strokeStyle).toBe("black");
    expect(ctx.lineWidth).toBe(2);
  });

  it("fails every operation once the canvas is detached", async () => {
    const { ctx, canvas } = createContext();
    const surface = new CanvasSurfaceHandle(ctx);
    canvas.isConnected = false;

    await expect(surface.beginPath()).rejects.toMatchObject({ name: "SurfaceOperationError", operation: "beginPath" });
    await expect(surface.stroke()).rejects.toBeInstanceOf(SurfaceOperationError);
    expect(ctx.beginPath).not.toHaveBeenCalled();
    expect(ctx.stroke).not.toHaveBeenCalled();
  });

  it("reports a throwing context call with the failing operation", async () => {
    const { ctx } = createContext();
    const cause = new Error("InvalidStateError");
    ctx.clearRect.mockImplementation(() => {
      throw cause;
    });
    const surface = new CanvasSurfaceHandle(ctx);

    const err = await surface.clearRect(0, 0, 1, 1).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(SurfaceOperationError);
    expect(err).toMatchObject({
      operation: "clearRect",
      message: 'Surface operation "clearRect" failed: InvalidStateError',
      cause,
    });
  });
});

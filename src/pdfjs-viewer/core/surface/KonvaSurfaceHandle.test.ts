import { describe, expect, it, vi } from "vitest";
import { KonvaSurfaceHandle, type KonvaContextLike, type KonvaLayerLike } from "./KonvaSurfaceHandle";

function createLayer() {
  const ctx = {
    beginPath: vi.fn(),
    rect: vi.fn(),
    setAttr: vi.fn(),
    clearRect: vi.fn(),
    stroke: vi.fn(),
  } satisfies KonvaContextLike;
  const state: { stage: object | null } = { stage: {} };
  const layer: KonvaLayerLike = {
    getContext: () => ctx,
    getStage: () => state.stage,
  };
  return { ctx, layer, state };
}

describe("KonvaSurfaceHandle", () => {
  it("draws through the layer's scene context", async () => {
    const { ctx, layer } = createLayer();
    const surface = new KonvaSurfaceHandle(layer);

    await surface.beginPath();
    await surface.addRectangle(10, 10, 40, 20);
    await surface.setStrokeStyle("black");
    await surface.setLineWidth(2);
    await surface.clearRect(0, 0, 600, 800);
    await surface.stroke();

    expect(ctx.beginPath).toHaveBeenCalledTimes(1);
    expect(ctx.rect).toHaveBeenCalledWith(10, 10, 40, 20);
    expect(ctx.setAttr.mock.calls).toEqual([
      ["strokeStyle", "black"],
      ["lineWidth", 2],
    ]);
    expect(ctx.clearRect).toHaveBeenCalledWith(0, 0, 600, 800);
    expect(ctx.stroke).toHaveBeenCalledTimes(1);
  });

  it("fails when the layer is no longer on a stage", async () => {
    const { ctx, layer, state } = createLayer();
    const surface = new KonvaSurfaceHandle(layer);
    state.stage = null;

    await expect(surface.addRectangle(0, 0, 1, 1)).rejects.toMatchObject({
      name: "SurfaceOperationError",
      operation: "addRectangle",
      message: 'Surface operation "addRectangle" failed: layer is not attached to a stage',
    });
    expect(ctx.rect).not.toHaveBeenCalled();
  });
});

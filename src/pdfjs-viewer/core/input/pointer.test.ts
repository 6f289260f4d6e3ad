import { describe, expect, it } from "vitest";
import { getSurfaceOffset, isPrimaryButton } from "./pointer";

describe("pointer input", () => {
  it("treats only the main button as primary", () => {
    expect(isPrimaryButton({ button: 0 })).toBe(true);
    expect(isPrimaryButton({ button: 1 })).toBe(false);
    expect(isPrimaryButton({ button: 2 })).toBe(false);
  });

  it("measures the pointer against the element box", () => {
    const element = { getBoundingClientRect: () => ({ left: 100, top: 40 }) };
    expect(getSurfaceOffset({ clientX: 130, clientY: 90 }, element)).toEqual({ x: 30, y: 50 });
  });
});

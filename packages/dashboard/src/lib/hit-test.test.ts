import { describe, it, expect, vi } from "vitest";
import { handlePointerRelease, rectContains, toLogicalPoint } from "./hit-test";

describe("rectContains", () => {
  const rect = { x: 50, y: 35, width: 200, height: 117 };

  it("includes the top-left edge and excludes the bottom-right edge", () => {
    expect(rectContains(rect, { x: 50, y: 35 })).toBe(true);
    expect(rectContains(rect, { x: 249, y: 151 })).toBe(true);
    expect(rectContains(rect, { x: 250, y: 100 })).toBe(false);
    expect(rectContains(rect, { x: 100, y: 152 })).toBe(false);
  });

  it("rejects points left of or above the rect", () => {
    expect(rectContains(rect, { x: 49, y: 100 })).toBe(false);
    expect(rectContains(rect, { x: 100, y: 34 })).toBe(false);
  });
});

describe("toLogicalPoint", () => {
  it("offsets by the element position", () => {
    const bounds = { left: 10, top: 20, width: 300, height: 1080 };
    expect(toLogicalPoint(110, 80, bounds, 300, 1080)).toEqual({ x: 100, y: 60 });
  });

  it("scales when the element is drawn at a different size", () => {
    const bounds = { left: 0, top: 0, width: 150, height: 540 };
    expect(toLogicalPoint(50, 30, bounds, 300, 1080)).toEqual({ x: 100, y: 60 });
  });

  it("does not scale an element without layout", () => {
    const bounds = { left: 0, top: 0, width: 0, height: 0 };
    expect(toLogicalPoint(50, 30, bounds, 300, 1080)).toEqual({ x: 50, y: 30 });
  });
});

describe("handlePointerRelease", () => {
  it("opens settings for a release inside the settings button", () => {
    const onOpenSettings = vi.fn();
    expect(handlePointerRelease({ x: 150, y: 90 }, onOpenSettings)).toBe(true);
    expect(onOpenSettings).toHaveBeenCalledTimes(1);
  });

  it("ignores releases anywhere else, including the home button", () => {
    const onOpenSettings = vi.fn();
    expect(handlePointerRelease({ x: 150, y: 950 }, onOpenSettings)).toBe(false);
    expect(handlePointerRelease({ x: 100, y: 400 }, onOpenSettings)).toBe(false);
    expect(onOpenSettings).not.toHaveBeenCalled();
  });
});

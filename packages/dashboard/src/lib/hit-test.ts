import type { Point, Rect } from "@/types";
import { SETTINGS_BUTTON_RECT } from "./sidebar-config";

export function rectContains(rect: Rect, point: Point): boolean {
  return (
    point.x >= rect.x &&
    point.x < rect.x + rect.width &&
    point.y >= rect.y &&
    point.y < rect.y + rect.height
  );
}

export interface ElementBounds {
  left: number;
  top: number;
  width: number;
  height: number;
}

/**
 * Map client coordinates onto the panel's logical pixels. Elements without a
 * laid-out size are treated as unscaled.
 */
export function toLogicalPoint(
  clientX: number,
  clientY: number,
  bounds: ElementBounds,
  logicalWidth: number,
  logicalHeight: number
): Point {
  const scaleX = bounds.width > 0 ? logicalWidth / bounds.width : 1;
  const scaleY = bounds.height > 0 ? logicalHeight / bounds.height : 1;
  return {
    x: (clientX - bounds.left) * scaleX,
    y: (clientY - bounds.top) * scaleY,
  };
}

/**
 * Only the settings button reacts to a release. Returns whether it fired.
 */
export function handlePointerRelease(point: Point, onOpenSettings: () => void): boolean {
  if (!rectContains(SETTINGS_BUTTON_RECT, point)) return false;
  onOpenSettings();
  return true;
}

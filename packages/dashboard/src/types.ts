import type { BatteryIcon } from "@telltale/core";

/** Geometry in logical pixels of the 300px-wide panel */
export interface Rect {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface Point {
  x: number;
  y: number;
}

export type SidebarImageKey = "settings" | "home" | BatteryIcon;

export interface FontSpec {
  family: string;
  size: number;
  weight: "Regular" | "Medium" | "Bold";
}

export interface TextStyle {
  font: FontSpec;
  color: string;
  /** "center" centers both ways; "left" anchors to the top-left corner */
  align: "left" | "center";
  wrap?: boolean;
}

export interface StrokeStyle {
  color: string;
  width: number;
}

/**
 * Drawing primitives the sidebar needs. The renderer only talks to this,
 * so it can run against a real canvas or a recorder in tests.
 */
export interface Painter {
  fillRect(rect: Rect, color: string): void;
  fillEllipse(rect: Rect, color: string): void;
  fillRoundedRect(rect: Rect, radius: number, color: string, clip?: Rect): void;
  strokeRoundedRect(rect: Rect, radius: number, stroke: StrokeStyle): void;
  drawText(rect: Rect, text: string, style: TextStyle): void;
  drawImage(image: SidebarImageKey, rect: Rect, opacity: number): void;
}

/**
 * Sidebar layout configuration: single source of truth for geometry and colors.
 */
import type { Severity, StatusCategory } from "@telltale/core";
import type { FontSpec, Rect } from "@/types";

// ── Panel ──

export const PANEL_WIDTH = 300;
export const DEFAULT_PANEL_HEIGHT = 1080;

// ── Buttons ──

export const SETTINGS_BUTTON_RECT: Rect = { x: 50, y: 35, width: 200, height: 117 };
export const SETTINGS_OPACITY = 0.65;

export const HOME_BUTTON = { x: 60, size: 180, bottomMargin: 40 } as const;

// ── Network ──

export const SIGNAL_DOTS = { count: 5, x: 58, y: 196, size: 27, spacing: 37 } as const;
export const NETWORK_TEXT_RECT: Rect = { x: 20, y: 230, width: 250, height: 50 };

// ── Battery ──

export const BATTERY_ICON_RECT: Rect = { x: 45, y: 293, width: 96, height: 36 };
export const BATTERY_BAR = { x: 50, y: 298, maxWidth: 76, height: 25 } as const;
export const BATTERY_TEXT_RECT: Rect = { x: 170, y: 288, width: 130, height: 50 };

// ── Status cards ──

export const STATUS_CARD = {
  x: 30,
  width: 240,
  height: 140,
  accentInset: 6,
  accentWidth: 100,
  accentVisibleWidth: 18,
  accentRadius: 10,
  outlineRadius: 20,
  outlineWidth: 2,
  textLeft: 35,
  textRightPadding: 15,
} as const;

export const STATUS_CARD_ROWS: ReadonlyArray<{ category: StatusCategory; y: number }> = [
  { category: "tempStatus", y: 345 },
  { category: "vehicleStatus", y: 505 },
  { category: "connectStatus", y: 665 },
];

// ── Colors ──

export const SEVERITY_COLORS: Record<Severity, string> = {
  good: "#ffffff",
  warning: "#daca25",
  danger: "#c92231",
};

export const PALETTE = {
  background: "#393939",
  text: "#ffffff",
  dotActive: "#ffffff",
  dotInactive: "#545454",
  batteryFill: "#149948",
  cardOutline: "rgba(255, 255, 255, 0.333)",
} as const;

// ── Fonts ──

const OPEN_SANS = "Open Sans";

export const FONTS: Record<"network" | "battery" | "metric", FontSpec> = {
  network: { family: OPEN_SANS, size: 32, weight: "Regular" },
  battery: { family: OPEN_SANS, size: 30, weight: "Regular" },
  metric: { family: OPEN_SANS, size: 35, weight: "Regular" },
};

/**
 * Paints a SidebarState through a Painter. Pure with respect to its inputs:
 * the same state, options and painter always produce the same draw calls.
 */
import { batteryIconFor, clamp, type ItemStatus, type SidebarState } from "@telltale/core";
import type { Painter, Rect } from "@/types";
import {
  BATTERY_BAR,
  BATTERY_ICON_RECT,
  BATTERY_TEXT_RECT,
  FONTS,
  HOME_BUTTON,
  NETWORK_TEXT_RECT,
  PALETTE,
  PANEL_WIDTH,
  SETTINGS_BUTTON_RECT,
  SETTINGS_OPACITY,
  SEVERITY_COLORS,
  SIGNAL_DOTS,
  STATUS_CARD,
  STATUS_CARD_ROWS,
} from "./sidebar-config";

export interface RenderOptions {
  height: number;
  showWifiAddress: boolean;
}

export function batteryBarWidth(percent: number): number {
  return Math.floor((BATTERY_BAR.maxWidth * clamp(percent, 0, 100)) / 100);
}

export function networkText(state: SidebarState, showWifiAddress: boolean): string {
  return showWifiAddress && state.networkType === "wifi" ? state.wifiAddress : state.networkLabel;
}

export function signalDotRect(index: number): Rect {
  return {
    x: SIGNAL_DOTS.x + index * SIGNAL_DOTS.spacing,
    y: SIGNAL_DOTS.y,
    width: SIGNAL_DOTS.size,
    height: SIGNAL_DOTS.size,
  };
}

export function homeButtonRect(height: number): Rect {
  return {
    x: HOME_BUTTON.x,
    y: height - HOME_BUTTON.size - HOME_BUTTON.bottomMargin,
    width: HOME_BUTTON.size,
    height: HOME_BUTTON.size,
  };
}

function drawButtons(painter: Painter, height: number): void {
  painter.drawImage("settings", SETTINGS_BUTTON_RECT, SETTINGS_OPACITY);
  painter.drawImage("home", homeButtonRect(height), 1);
}

function drawNetwork(painter: Painter, state: SidebarState, showWifiAddress: boolean): void {
  for (let i = 0; i < SIGNAL_DOTS.count; i++) {
    painter.fillEllipse(signalDotRect(i), i < state.signalLevel ? PALETTE.dotActive : PALETTE.dotInactive);
  }
  painter.drawText(NETWORK_TEXT_RECT, networkText(state, showWifiAddress), {
    font: FONTS.network,
    color: PALETTE.text,
    align: "center",
  });
}

function drawBattery(painter: Painter, state: SidebarState): void {
  // Bar goes under the icon; the icon's frame is transparent in the middle
  painter.fillRect(
    { x: BATTERY_BAR.x, y: BATTERY_BAR.y, width: batteryBarWidth(state.batteryPercent), height: BATTERY_BAR.height },
    PALETTE.batteryFill
  );
  painter.drawImage(batteryIconFor(state.batteryCharging), BATTERY_ICON_RECT, 1);
  painter.drawText(BATTERY_TEXT_RECT, `${state.batteryPercent}%`, {
    font: FONTS.battery,
    color: PALETTE.text,
    align: "left",
  });
}

export function drawStatusCard(painter: Painter, status: ItemStatus, y: number): void {
  const card: Rect = { x: STATUS_CARD.x, y, width: STATUS_CARD.width, height: STATUS_CARD.height };
  const accentX = card.x + STATUS_CARD.accentInset;

  painter.fillRoundedRect(
    {
      x: accentX,
      y: y + STATUS_CARD.accentInset,
      width: STATUS_CARD.accentWidth,
      height: card.height - 2 * STATUS_CARD.accentInset,
    },
    STATUS_CARD.accentRadius,
    SEVERITY_COLORS[status.severity],
    { x: accentX, y, width: STATUS_CARD.accentVisibleWidth, height: card.height }
  );
  painter.strokeRoundedRect(card, STATUS_CARD.outlineRadius, {
    color: PALETTE.cardOutline,
    width: STATUS_CARD.outlineWidth,
  });
  painter.drawText(
    {
      x: card.x + STATUS_CARD.textLeft,
      y,
      width: card.width - STATUS_CARD.textLeft - STATUS_CARD.textRightPadding,
      height: card.height,
    },
    status.label,
    { font: FONTS.metric, color: PALETTE.text, align: "center", wrap: true }
  );
}

export function renderSidebar(painter: Painter, state: SidebarState, options: RenderOptions): void {
  painter.fillRect({ x: 0, y: 0, width: PANEL_WIDTH, height: options.height }, PALETTE.background);
  drawButtons(painter, options.height);
  drawNetwork(painter, state, options.showWifiAddress);
  drawBattery(painter, state);
  for (const { category, y } of STATUS_CARD_ROWS) {
    drawStatusCard(painter, state[category], y);
  }
}

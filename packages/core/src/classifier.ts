/**
 * Status classification: maps telemetry fields to display-ready sidebar items.
 * Everything here is pure; out-of-range input is clamped, unknown enum values
 * fall through to the most conservative branch.
 */

import type {
  BatteryDisplay,
  BatteryIcon,
  ItemStatus,
  NetworkDisplay,
  NetworkType,
  PandaType,
  ThermalStatus,
} from "./types.js";
import { clamp, maxReading, toFixedOneHalfEven } from "./utils.js";

// ============================================================================
// Constants
// ============================================================================

/** A ping older than this marks the connection as errored */
export const CONNECT_TIMEOUT_NS = 80e9;

export const MAX_SIGNAL_LEVEL = 5;

export const NETWORK_LABELS: Record<NetworkType, string> = {
  none: "--",
  wifi: "WiFi",
  ethernet: "ETH",
  cell2G: "2G",
  cell3G: "3G",
  cell4G: "LTE",
  cell5G: "5G",
};

export const FALLBACK_NETWORK_LABEL = NETWORK_LABELS.none;

// ============================================================================
// Connectivity
// ============================================================================

export function computeConnectStatus(
  lastPingNs: number,
  primeRedirected: boolean,
  nowNs: number
): ItemStatus {
  if (lastPingNs === 0) {
    return primeRedirected
      ? { label: "NO\nPRIME", severity: "danger" }
      : { label: "CONNECT\nOFFLINE", severity: "warning" };
  }
  return nowNs - lastPingNs < CONNECT_TIMEOUT_NS
    ? { label: "CONNECT\nONLINE", severity: "good" }
    : { label: "CONNECT\nERROR", severity: "danger" };
}

// ============================================================================
// Thermal
// ============================================================================

export function formatTemp(celsius: number): string {
  return `${toFixedOneHalfEven(celsius)}°C`;
}

export function computeTempStatus(
  ambientC: number,
  cpuTempsC: readonly number[],
  gpuTempsC: readonly number[],
  thermalStatus: ThermalStatus
): ItemStatus {
  const temp = formatTemp(maxReading(ambientC, cpuTempsC, gpuTempsC));

  switch (thermalStatus) {
    case "green":
      return { label: `${temp}\nGOOD\nCPU`, severity: "good" };
    case "yellow":
      return { label: `${temp}\nOK\nCPU`, severity: "warning" };
    default:
      // No trailing "CPU" line here, unlike the other two tiers
      return { label: `${temp}\nHIGH_TEMP`, severity: "danger" };
  }
}

// ============================================================================
// Vehicle interface
// ============================================================================

export function computeVehicleStatus(
  pandaType: PandaType,
  started: boolean,
  gpsOk: boolean
): ItemStatus {
  // Order matters: a missing panda outranks GPS state
  if (pandaType === "unknown") {
    return { label: "NO\nPANDA", severity: "danger" };
  }
  if (started && !gpsOk) {
    return { label: "GPS\nSEARCHING", severity: "warning" };
  }
  return { label: "VEHICLE\nONLINE", severity: "good" };
}

// ============================================================================
// Network & battery
// ============================================================================

export function networkLabel(networkType: NetworkType): string {
  return Object.hasOwn(NETWORK_LABELS, networkType)
    ? NETWORK_LABELS[networkType]
    : FALLBACK_NETWORK_LABEL;
}

export function computeNetworkDisplay(
  networkType: NetworkType,
  strengthRaw: number
): NetworkDisplay {
  const level = strengthRaw > 0 ? Math.trunc(strengthRaw) + 1 : 0;
  return {
    label: networkLabel(networkType),
    signalLevel: clamp(level, 0, MAX_SIGNAL_LEVEL),
  };
}

export function batteryIconFor(charging: boolean): BatteryIcon {
  return charging ? "batteryCharging" : "battery";
}

export function computeBatteryDisplay(percent: number, charging: boolean): BatteryDisplay {
  const normalized = Number.isFinite(percent) ? Math.round(percent) : 0;
  return {
    percent: clamp(normalized, 0, 100),
    charging,
    icon: batteryIconFor(charging),
  };
}

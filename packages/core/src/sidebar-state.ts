import type { ItemStatus, SidebarInput, SidebarState, StatusCategory } from "./types.js";
import {
  computeBatteryDisplay,
  computeConnectStatus,
  computeNetworkDisplay,
  computeTempStatus,
  computeVehicleStatus,
  formatTemp,
} from "./classifier.js";

export const STATUS_CATEGORIES: readonly StatusCategory[] = [
  "tempStatus",
  "vehicleStatus",
  "connectStatus",
];

function freezeStatus(status: ItemStatus): Readonly<ItemStatus> {
  return Object.freeze({ ...status });
}

/**
 * State shown before the first telemetry update arrives
 */
export const DEFAULT_SIDEBAR_STATE: SidebarState = Object.freeze({
  connectStatus: freezeStatus({ label: "CONNECT\nOFFLINE", severity: "warning" }),
  tempStatus: freezeStatus({ label: `${formatTemp(0)}\nGOOD\nCPU`, severity: "good" }),
  vehicleStatus: freezeStatus({ label: "NO\nPANDA", severity: "danger" }),
  networkType: "none",
  networkLabel: "--",
  wifiAddress: "",
  signalLevel: 0,
  batteryPercent: 0,
  batteryCharging: false,
});

/**
 * Classify a telemetry snapshot into a fresh, frozen sidebar state.
 * Never mutates or reuses a previous state.
 */
export function updateSidebarState(input: SidebarInput): SidebarState {
  const { device, vehicle } = input;
  const network = computeNetworkDisplay(device.networkType, device.networkStrength);
  const battery = computeBatteryDisplay(device.batteryPercent, device.batteryCharging);

  return Object.freeze({
    connectStatus: freezeStatus(
      computeConnectStatus(device.lastAthenaPingTime, input.primeRedirected, input.now)
    ),
    tempStatus: freezeStatus(
      computeTempStatus(device.ambientTempC, device.cpuTempC, device.gpuTempC, device.thermalStatus)
    ),
    vehicleStatus: freezeStatus(
      computeVehicleStatus(vehicle.pandaType, vehicle.started, vehicle.gpsOk)
    ),
    networkType: device.networkType,
    networkLabel: network.label,
    wifiAddress: device.wifiIpAddress,
    signalLevel: network.signalLevel,
    batteryPercent: battery.percent,
    batteryCharging: battery.charging,
  });
}

export interface StatusChange {
  category: StatusCategory;
  from: Readonly<ItemStatus>;
  to: Readonly<ItemStatus>;
}

/**
 * List the status categories whose label or severity differ between two states
 */
export function diffSidebarState(prev: SidebarState, next: SidebarState): StatusChange[] {
  const changes: StatusChange[] = [];
  for (const category of STATUS_CATEGORIES) {
    const from = prev[category];
    const to = next[category];
    if (from.label !== to.label || from.severity !== to.severity) {
      changes.push({ category, from, to });
    }
  }
  return changes;
}

/**
 * Core types for the Telltale status sidebar
 */

// ============================================================================
// Status Types
// ============================================================================

export type Severity = "good" | "warning" | "danger";

export interface ItemStatus {
  /** Display text, one line per `\n` */
  label: string;
  severity: Severity;
}

// ============================================================================
// Telemetry Types
// ============================================================================

export type NetworkType =
  | "none"
  | "wifi"
  | "cell2G"
  | "cell3G"
  | "cell4G"
  | "cell5G"
  | "ethernet";

/** Raw strength reported by the modem: 0 unknown, 1 poor, 2 moderate, 3 good, 4 great */
export type NetworkStrength = number;

export type ThermalStatus = "green" | "yellow" | "red" | "danger";

export type PandaType =
  | "unknown"
  | "whitePanda"
  | "greyPanda"
  | "blackPanda"
  | "pedal"
  | "uno"
  | "dos"
  | "redPanda";

export interface DeviceSnapshot {
  networkType: NetworkType;
  networkStrength: NetworkStrength;
  wifiIpAddress: string;
  /** Monotonic nanoseconds of the last athena ping, 0 when none was seen */
  lastAthenaPingTime: number;
  ambientTempC: number;
  cpuTempC: number[];
  gpuTempC: number[];
  thermalStatus: ThermalStatus;
  batteryPercent: number;
  batteryCharging: boolean;
}

export interface VehicleSnapshot {
  pandaType: PandaType;
  started: boolean;
  gpsOk: boolean;
}

export interface TelemetrySnapshot {
  device: DeviceSnapshot;
  vehicle: VehicleSnapshot;
}

// ============================================================================
// Sidebar Types
// ============================================================================

export type BatteryIcon = "battery" | "batteryCharging";

export interface NetworkDisplay {
  label: string;
  signalLevel: number;
}

export interface BatteryDisplay {
  percent: number;
  charging: boolean;
  icon: BatteryIcon;
}

export interface SidebarState {
  readonly connectStatus: Readonly<ItemStatus>;
  readonly tempStatus: Readonly<ItemStatus>;
  readonly vehicleStatus: Readonly<ItemStatus>;
  readonly networkType: NetworkType;
  readonly networkLabel: string;
  readonly wifiAddress: string;
  /** 0..5 */
  readonly signalLevel: number;
  /** 0..100 */
  readonly batteryPercent: number;
  readonly batteryCharging: boolean;
}

export type StatusCategory = "connectStatus" | "tempStatus" | "vehicleStatus";

export interface SidebarInput extends TelemetrySnapshot {
  primeRedirected: boolean;
  /** Monotonic nanoseconds, same clock as `lastAthenaPingTime` */
  now: number;
}

/**
 * Zod schemas for telemetry and sidebar configuration.
 * Telemetry parsing normalizes instead of rejecting wherever a safe default exists.
 */

import { z } from "zod";

// ============================================================================
// Enum Schemas
// ============================================================================

export const networkTypeSchema = z
  .enum(["none", "wifi", "cell2G", "cell3G", "cell4G", "cell5G", "ethernet"])
  .catch("none");

export const thermalStatusSchema = z.enum(["green", "yellow", "red", "danger"]).catch("red");

export const pandaTypeSchema = z
  .enum(["unknown", "whitePanda", "greyPanda", "blackPanda", "pedal", "uno", "dos", "redPanda"])
  .catch("unknown");

// ============================================================================
// Telemetry Schemas
// ============================================================================

const temperatureListSchema = z.array(z.coerce.number()).default([]);

export const deviceSnapshotSchema = z.object({
  networkType: networkTypeSchema.default("none"),
  networkStrength: z.coerce.number().int().catch(0).default(0),
  wifiIpAddress: z.string().default(""),
  lastAthenaPingTime: z.coerce.number().nonnegative().catch(0).default(0),
  ambientTempC: z.coerce.number().default(0),
  cpuTempC: temperatureListSchema,
  gpuTempC: temperatureListSchema,
  thermalStatus: thermalStatusSchema.default("red"),
  batteryPercent: z.coerce.number().catch(0).default(0),
  batteryCharging: z.boolean().default(false),
});

export const vehicleSnapshotSchema = z.object({
  pandaType: pandaTypeSchema.default("unknown"),
  started: z.boolean().default(false),
  gpsOk: z.boolean().default(false),
});

export const telemetrySnapshotSchema = z.object({
  device: deviceSnapshotSchema,
  vehicle: vehicleSnapshotSchema,
});

// ============================================================================
// Config Schemas
// ============================================================================

export const sidebarConfigSchema = z.object({
  /** Show the Wi-Fi address instead of "WiFi" on platforms that support it */
  showWifiAddress: z.boolean().default(false),
  debug: z.boolean().default(false),
});

export type SidebarConfig = z.infer<typeof sidebarConfigSchema>;
export type SidebarConfigInput = z.input<typeof sidebarConfigSchema>;

/**
 * Apply defaults to a partial sidebar config; throws a ZodError on malformed input
 */
export function loadSidebarConfig(input: unknown = {}): SidebarConfig {
  return sidebarConfigSchema.parse(input);
}

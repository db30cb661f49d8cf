import { describe, it, expect } from "vitest";
import {
  CONNECT_TIMEOUT_NS,
  computeBatteryDisplay,
  computeConnectStatus,
  computeNetworkDisplay,
  computeTempStatus,
  computeVehicleStatus,
  formatTemp,
  networkLabel,
} from "./classifier.js";
import { networkTypeSchema, thermalStatusSchema } from "./schema.js";

const SECOND_NS = 1e9;

describe("computeConnectStatus", () => {
  it("reports offline when no ping was ever seen", () => {
    expect(computeConnectStatus(0, false, 500 * SECOND_NS)).toEqual({
      label: "CONNECT\nOFFLINE",
      severity: "warning",
    });
  });

  it("reports missing prime when never pinged and prime redirected", () => {
    expect(computeConnectStatus(0, true, 500 * SECOND_NS)).toEqual({
      label: "NO\nPRIME",
      severity: "danger",
    });
  });

  it("is online while the last ping is under 80 seconds old", () => {
    const last = 10 * SECOND_NS;
    expect(computeConnectStatus(last, false, last)).toEqual({
      label: "CONNECT\nONLINE",
      severity: "good",
    });
    expect(computeConnectStatus(last, true, last + 79 * SECOND_NS).severity).toBe("good");
  });

  it("errors once the ping is exactly 80 seconds old", () => {
    const last = 10 * SECOND_NS;
    expect(computeConnectStatus(last, false, last + CONNECT_TIMEOUT_NS)).toEqual({
      label: "CONNECT\nERROR",
      severity: "danger",
    });
  });

  it("ignores prime redirection once a ping exists", () => {
    const last = 10 * SECOND_NS;
    expect(computeConnectStatus(last, true, last + 200 * SECOND_NS).label).toBe("CONNECT\nERROR");
  });
});

describe("formatTemp", () => {
  it("prints one decimal and a celsius suffix", () => {
    expect(formatTemp(45)).toBe("45.0°C");
    expect(formatTemp(61.04)).toBe("61.0°C");
    expect(formatTemp(-5)).toBe("-5.0°C");
  });

  it("rounds exact ties half to even", () => {
    expect(formatTemp(45.25)).toBe("45.2°C");
    expect(formatTemp(61.75)).toBe("61.8°C");
    expect(formatTemp(-45.25)).toBe("-45.2°C");
  });
});

describe("computeTempStatus", () => {
  it("uses the hottest of ambient, cpu and gpu readings", () => {
    expect(computeTempStatus(40, [45, 38], [30], "yellow")).toEqual({
      label: "45.0°C\nOK\nCPU",
      severity: "warning",
    });
    expect(computeTempStatus(40, [35], [52.5], "green").label).toBe("52.5°C\nGOOD\nCPU");
    expect(computeTempStatus(40, [45.25], [], "yellow").label).toBe("45.2°C\nOK\nCPU");
  });

  it("falls back to ambient when no cpu or gpu readings exist", () => {
    expect(computeTempStatus(31, [], [], "green")).toEqual({
      label: "31.0°C\nGOOD\nCPU",
      severity: "good",
    });
  });

  it("keeps ambient when every reading is cooler", () => {
    expect(computeTempStatus(-5, [-10, -7], [], "green").label).toBe("-5.0°C\nGOOD\nCPU");
  });

  it("drops the CPU line on the danger tier", () => {
    expect(computeTempStatus(70, [88], [], "red")).toEqual({
      label: "88.0°C\nHIGH_TEMP",
      severity: "danger",
    });
    expect(computeTempStatus(70, [], [], "danger").label).toBe("70.0°C\nHIGH_TEMP");
  });

  it("treats an unrecognized thermal status as danger", () => {
    const status = thermalStatusSchema.parse("critical");
    expect(computeTempStatus(50, [], [], status).severity).toBe("danger");
  });
});

describe("computeVehicleStatus", () => {
  it("reports a missing panda before anything else", () => {
    expect(computeVehicleStatus("unknown", true, false)).toEqual({
      label: "NO\nPANDA",
      severity: "danger",
    });
    expect(computeVehicleStatus("unknown", false, true).label).toBe("NO\nPANDA");
  });

  it("searches for GPS when started without a fix", () => {
    expect(computeVehicleStatus("dos", true, false)).toEqual({
      label: "GPS\nSEARCHING",
      severity: "warning",
    });
  });

  it("is online when not started or GPS is ok", () => {
    const online = { label: "VEHICLE\nONLINE", severity: "good" };
    expect(computeVehicleStatus("uno", false, false)).toEqual(online);
    expect(computeVehicleStatus("blackPanda", true, true)).toEqual(online);
    expect(computeVehicleStatus("redPanda", false, true)).toEqual(online);
  });
});

describe("computeNetworkDisplay", () => {
  it("maps raw strength to a 0..5 signal level", () => {
    const levels = [0, 1, 2, 3, 4].map((raw) => computeNetworkDisplay("cell4G", raw).signalLevel);
    expect(levels).toEqual([0, 2, 3, 4, 5]);
  });

  it("clamps out-of-range strength", () => {
    expect(computeNetworkDisplay("wifi", 9).signalLevel).toBe(5);
    expect(computeNetworkDisplay("wifi", -2).signalLevel).toBe(0);
  });

  it("labels each network type", () => {
    expect(computeNetworkDisplay("cell4G", 3)).toEqual({ label: "LTE", signalLevel: 4 });
    expect(networkLabel("wifi")).toBe("WiFi");
    expect(networkLabel("ethernet")).toBe("ETH");
    expect(networkLabel("cell5G")).toBe("5G");
    expect(networkLabel("none")).toBe("--");
  });

  it("uses the fallback label for an unrecognized type", () => {
    expect(networkLabel(networkTypeSchema.parse("satellite"))).toBe("--");
  });
});

describe("computeBatteryDisplay", () => {
  it("passes through in-range values", () => {
    expect(computeBatteryDisplay(50, false)).toEqual({
      percent: 50,
      charging: false,
      icon: "battery",
    });
  });

  it("selects the charging icon", () => {
    expect(computeBatteryDisplay(80, true).icon).toBe("batteryCharging");
  });

  it("clamps percent to 0..100", () => {
    expect(computeBatteryDisplay(150, false).percent).toBe(100);
    expect(computeBatteryDisplay(-3, false).percent).toBe(0);
    expect(computeBatteryDisplay(Number.NaN, false).percent).toBe(0);
    expect(computeBatteryDisplay(49.6, true).percent).toBe(50);
  });
});

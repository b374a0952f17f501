import type { ChargerActivity, MeterSample, RawReading } from "./types";

/**
 * Readings beyond this are almost certainly a unit mismatch (kW or kWh sensor
 * wired in as W) and are never balanced on.
 */
export const SAFETY_MAX_POWER_METER_W = 200_000;

/**
 * The one status value that means the EV is drawing current.
 */
export const CHARGING_STATE_VALUE = "Charging";

const UNAVAILABLE_STATES = ["unavailable", "unknown"];

const isUnavailable = (raw: RawReading): boolean =>
  raw === null ||
  raw === undefined ||
  (typeof raw === "string" && UNAVAILABLE_STATES.includes(raw.trim()));

const toNumber = (raw: string | number): number | null => {
  if (typeof raw === "number") {
    return Number.isFinite(raw) ? raw : null;
  }
  const trimmed = raw.trim();
  if (trimmed === "") return null;
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
};

export function classifyMeterReading(raw: RawReading): MeterSample {
  if (raw === null || raw === undefined || isUnavailable(raw)) {
    return { kind: "unavailable", rawValue: raw };
  }

  const powerW = toNumber(raw);
  if (powerW === null) {
    return { kind: "invalid", rawValue: raw };
  }

  if (Math.abs(powerW) > SAFETY_MAX_POWER_METER_W) {
    return { kind: "out_of_range", rawValue: raw, powerW };
  }

  return { kind: "valid", rawValue: raw, powerW };
}

export function parseChargerActivity(raw: RawReading): ChargerActivity {
  if (isUnavailable(raw)) {
    return "unknown";
  }
  return String(raw).trim() === CHARGING_STATE_VALUE
    ? "charging"
    : "not_charging";
}

/**
 * What the EV is assumed to draw right now.
 *
 * Only an explicit "not charging" zeroes the estimate. Without a status
 * signal we keep assuming the last commanded current.
 */
export function estimateEvDrawA(
  lastCommandedA: number,
  activity: ChargerActivity
): number {
  return activity === "not_charging" ? 0 : lastCommandedA;
}

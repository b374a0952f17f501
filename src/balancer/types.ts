import type { Debugger } from "debug";
import type { Observable } from "rxjs";

export type ChargerId = string;

/**
 * Amps. `null` means the charger should be stopped.
 */
export type Allocation = number | null;

export interface ChargerLimits {
  minCurrentA: number;
  maxCurrentA: number;
  /**
   * Resolution of current adjustments. Every commanded current is a multiple of it.
   */
  stepA: number;
}

export type UnavailableBehavior = "stop" | "ignore" | "set_current";

export const UNAVAILABLE_BEHAVIORS: readonly UnavailableBehavior[] = [
  "stop",
  "ignore",
  "set_current",
];

export type BalancerState =
  | "stopped"
  | "adjusting"
  | "active"
  | "ramp_up_hold"
  | "disabled";

export type UpdateReason =
  | "power_meter_update"
  | "parameter_change"
  | "manual_override"
  | "fallback_unavailable";

/**
 * What the optional charger status sensor tells us about the EV.
 */
export type ChargerActivity = "charging" | "not_charging" | "unknown";

/**
 * Raw value as it comes off the meter. Strings are what most transports deliver.
 */
export type RawReading = string | number | null | undefined;

export type MeterSample =
  | { kind: "valid"; rawValue: RawReading; powerW: number }
  | { kind: "unavailable"; rawValue: RawReading }
  | { kind: "invalid"; rawValue: RawReading }
  | { kind: "out_of_range"; rawValue: RawReading; powerW: number };

export type ChargerCommand =
  | { type: "start_charging" }
  | { type: "stop_charging" }
  | { type: "set_current"; currentA: number; currentW: number };

export type ActionName = ChargerCommand["type"];

/**
 * Hardware seam. Every call may fail or hang; the ActionExecutor retries it.
 * Completion (with or without a value) counts as success.
 */
export interface ChargerActuator {
  startCharging$(): Observable<unknown>;
  stopCharging$(): Observable<unknown>;
  setCurrent$(currentA: number, currentW: number): Observable<unknown>;
}

export interface ActionDiagnostics {
  lastActionError: string | null;
  /**
   * Epoch milliseconds of the last completed command, successful or not.
   */
  lastActionTimestamp: number | null;
  lastActionStatus: "success" | "failure" | null;
  retryCount: number;
  actionLatencyMs: number | null;
  /**
   * `set_current` commands dropped unfinished because a newer value replaced them.
   */
  supersededCount: number;
}

export interface ChargerSnapshot {
  id: ChargerId;
  name: string;
  limits: ChargerLimits;
  currentSetA: number;
  currentSetW: number;
  active: boolean;
  balancerState: BalancerState;
  lastActionReason: UpdateReason | null;
  diagnostics: ActionDiagnostics;
}

export interface BalancerSnapshot {
  id: string;
  enabled: boolean;
  meterHealthy: boolean;
  fallbackActive: boolean;
  configuredFallback: UnavailableBehavior;
  availableCurrentA: number;
  chargers: Record<ChargerId, ChargerSnapshot>;
}

export type BalancerEvent =
  | { type: "meter_unavailable"; entryId: string; chargerId: ChargerId }
  | {
      type: "fallback_activated";
      entryId: string;
      chargerId: ChargerId;
      fallbackCurrentA: number;
    }
  | {
      type: "overload_stop";
      entryId: string;
      chargerId: ChargerId;
      previousCurrentA: number;
      availableCurrentA: number;
    }
  | {
      type: "charging_resumed";
      entryId: string;
      chargerId: ChargerId;
      currentA: number;
    }
  | {
      type: "action_failed";
      entryId: string;
      chargerId: ChargerId;
      action: ActionName;
      error: string;
    };

/**
 * Debug function signature (from debug package)
 */
export type DebugFn = Debugger;

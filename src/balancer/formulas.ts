/**
 * Pure balancing math.
 * These functions are stateless and easily testable.
 */
import type {
  Allocation,
  BalancerState,
  ChargerLimits,
  UnavailableBehavior,
} from "./types";

/**
 * Floor a current to the charger's step size.
 * A non-positive step means continuous modulation (no rounding).
 */
export function floorToStep(currentA: number, stepA: number): number {
  if (stepA <= 0) {
    return currentA;
  }
  return Math.floor(currentA / stepA) * stepA;
}

/**
 * Current left under the service limit once the non-EV load is accounted for.
 *
 * Negative means the house alone already exceeds the service limit.
 * Exceeds `maxServiceA` when the non-EV load is negative (solar export).
 */
export function availableCurrent(
  nonEvPowerW: number,
  maxServiceA: number,
  voltageV: number
): number {
  return maxServiceA - nonEvPowerW / voltageV;
}

/**
 * Strip the charger's own draw from a whole-house meter reading.
 *
 * Clamped at 0 so a meter that has not caught up with a just-issued increase
 * can never make the non-EV load look negative.
 *
 * @param totalMeterW - Whole-house reading, including the EV
 * @param lastCommandedA - What we believe the EV(s) draw right now
 */
export function isolateEvDraw(
  totalMeterW: number,
  lastCommandedA: number,
  voltageV: number
): number {
  return Math.max(0, totalMeterW - lastCommandedA * voltageV);
}

/**
 * Clamp an available current to a single charger's limits.
 *
 * @returns The target in amps, or `null` when the charger should stop
 */
export function clampToCharger(
  availableA: number,
  limits: ChargerLimits
): Allocation {
  if (limits.maxCurrentA < limits.minCurrentA) {
    return null;
  }

  const target = floorToStep(
    Math.min(availableA, limits.maxCurrentA),
    limits.stepA
  );

  return target < limits.minCurrentA ? null : target;
}

/**
 * Fairly distribute `availableA` across chargers (water-filling).
 *
 * 1. Split what remains equally over the chargers still in the pool.
 * 2. Chargers whose share reaches their max are settled at their max and their
 *    allocation leaves the pool.
 * 3. Chargers whose share falls below their min are stopped. They take nothing.
 * 4. Repeat until a round settles nobody, then hand out the final share.
 *
 * @returns Allocations aligned with `chargers`. `null` means stop.
 */
export function distributeWaterFilling(
  availableA: number,
  chargers: ChargerLimits[]
): Allocation[] {
  const allocations: Allocation[] = chargers.map(() => null);
  let pool = chargers.map((_, index) => index);
  let remaining = availableA;

  while (pool.length > 0) {
    const fairShare = remaining / pool.length;

    const capped: number[] = [];
    const belowMin: number[] = [];

    for (const index of pool) {
      const { minCurrentA, maxCurrentA, stepA } = chargers[index];
      const maxFloored = floorToStep(maxCurrentA, stepA);
      const target = floorToStep(Math.min(fairShare, maxCurrentA), stepA);

      if (target >= maxFloored) {
        capped.push(index);
      } else if (target < minCurrentA) {
        belowMin.push(index);
      }
    }

    if (capped.length === 0 && belowMin.length === 0) {
      for (const index of pool) {
        const { minCurrentA, stepA } = chargers[index];
        const target = floorToStep(fairShare, stepA);
        allocations[index] = target >= minCurrentA ? target : null;
      }
      break;
    }

    for (const index of capped) {
      const { minCurrentA, maxCurrentA, stepA } = chargers[index];
      const maxFloored = floorToStep(maxCurrentA, stepA);

      // max < min: no valid operating point
      if (maxFloored >= minCurrentA) {
        allocations[index] = maxFloored;
        remaining -= maxFloored;
      }
    }

    pool = pool.filter(
      (index) => !capped.includes(index) && !belowMin.includes(index)
    );
  }

  return allocations;
}

/**
 * Hold an increase until `cooldownMs` has passed since the last reduction.
 *
 * Decreases and holds are never delayed. The boundary is inclusive: exactly
 * `cooldownMs` after the reduction the increase goes through.
 */
export function rampUpLimit(
  prevA: number,
  targetA: number,
  lastReductionAt: number | null,
  now: number,
  cooldownMs: number
): number {
  if (
    targetA > prevA &&
    lastReductionAt !== null &&
    now - lastReductionAt < cooldownMs
  ) {
    return prevA;
  }
  return targetA;
}

/**
 * Last line of defence before a value reaches the charger or is reported as set.
 */
export function safetyClamp(
  currentA: number,
  maxChargerA: number,
  maxServiceA: number
): number {
  return Math.max(0, Math.min(currentA, maxChargerA, maxServiceA));
}

/**
 * Current to apply when the meter goes away.
 *
 * @returns `null` for `ignore` (leave everything as it is), otherwise amps.
 *          Anything unrecognised is treated as `stop`.
 */
export function resolveFallbackCurrent(
  mode: UnavailableBehavior | string,
  fallbackA: number,
  maxChargerA: number
): number | null {
  switch (mode) {
    case "ignore":
      return null;
    case "set_current":
      return Math.min(fallbackA, maxChargerA);
    default:
      return 0;
  }
}

/**
 * Fallback current after a parameter edit while the meter is still gone.
 *
 * Unlike {@link resolveFallbackCurrent} this always returns amps: `ignore`
 * re-clamps the held value to the new limits and stops below the new min.
 */
export function recomputeFallbackUnderLiveParameterChange(
  mode: UnavailableBehavior | string,
  fallbackA: number,
  maxChargerA: number,
  currentA: number,
  minChargerA: number,
  stepA = 1
): number {
  switch (mode) {
    case "set_current":
      return Math.min(fallbackA, maxChargerA);
    case "ignore":
      return (
        clampToCharger(currentA, {
          minCurrentA: minChargerA,
          maxCurrentA: maxChargerA,
          stepA,
        }) ?? 0
      );
    default:
      return 0;
  }
}

export interface BalancerStateInput {
  enabled: boolean;
  active: boolean;
  prevActive: boolean;
  prevCurrentA: number;
  currentSetA: number;
  rampUpHeld: boolean;
}

/**
 * Observational only. Never feeds back into the algorithm.
 */
export function resolveBalancerState({
  enabled,
  active,
  prevActive,
  prevCurrentA,
  currentSetA,
  rampUpHeld,
}: BalancerStateInput): BalancerState {
  if (!enabled) return "disabled";
  if (!active) return "stopped";
  if (rampUpHeld) return "ramp_up_hold";
  if (currentSetA !== prevCurrentA || !prevActive) return "adjusting";
  return "active";
}

export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}

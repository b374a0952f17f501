import DEBUG from "debug";
import type { BalancerConfig, ChargerConfig } from "./config";
import {
  recomputeFallbackUnderLiveParameterChange,
  resolveFallbackCurrent,
  safetyClamp,
} from "./formulas";
import type { DebugFn } from "./types";

/**
 * Meter health state machine.
 *
 * Tracks whether the meter is usable and whether a fallback current is in
 * force. An explicit unavailable reading enters fallback at once. Only the
 * "nothing heard from the meter yet" case waits for
 * {@link FallbackController.markReady}.
 */
export class FallbackController {
  meterHealthy = true;
  fallbackActive = false;

  private ready: boolean;
  private seenValidReading = false;
  private readonly debug: DebugFn;

  constructor({ ready = false, debug }: { ready?: boolean; debug?: DebugFn } = {}) {
    this.ready = ready;
    this.debug = debug ?? DEBUG("ev-lb.fallback");
  }

  get isReady(): boolean {
    return this.ready;
  }

  meterLost(): void {
    if (!this.ready) {
      this.debug("meter unavailable before ready");
    }
    this.meterHealthy = false;
    this.fallbackActive = true;
  }

  meterRecovered(): void {
    if (this.fallbackActive) {
      this.debug("meter recovered, leaving fallback");
    }
    this.meterHealthy = true;
    this.fallbackActive = false;
    this.seenValidReading = true;
  }

  /**
   * Flip to ready. Returns true when the meter has produced neither a valid
   * nor an unavailable reading, so the fallback must be applied now. An
   * unavailable reading has already applied it.
   */
  markReady(): boolean {
    if (this.ready) {
      return false;
    }
    this.ready = true;

    if (this.fallbackActive) {
      this.debug("ready, already in fallback");
      return false;
    }
    if (this.seenValidReading) {
      this.debug("ready, meter healthy");
      return false;
    }

    this.debug("ready, no meter reading yet");
    this.meterHealthy = false;
    this.fallbackActive = true;
    return true;
  }

  /**
   * @returns amps to command, or `null` to leave the charger untouched
   */
  resolveFor(charger: ChargerConfig, config: BalancerConfig): number | null {
    const fallback = resolveFallbackCurrent(
      config.unavailableBehavior,
      config.unavailableFallbackCurrentA,
      charger.maxCurrentA
    );
    return fallback === null
      ? null
      : safetyClamp(fallback, charger.maxCurrentA, config.maxServiceCurrentA);
  }

  reapplyFor(
    charger: ChargerConfig,
    currentA: number,
    config: BalancerConfig
  ): number {
    return safetyClamp(
      recomputeFallbackUnderLiveParameterChange(
        config.unavailableBehavior,
        config.unavailableFallbackCurrentA,
        charger.maxCurrentA,
        currentA,
        charger.minCurrentA,
        charger.stepA
      ),
      charger.maxCurrentA,
      config.maxServiceCurrentA
    );
  }
}

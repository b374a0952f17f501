import DEBUG from "debug";
import ms from "ms";
import { asyncScheduler, type SchedulerLike } from "rxjs";
import { Timer } from "../helpers/Timer";
import type { DebugFn } from "./types";

export interface OverloadWatchdogOptions {
  /**
   * Read on every arm so live edits take effect on the next overload.
   */
  timing: () => { triggerDelayMs: number; loopIntervalMs: number };
  /**
   * Force a recompute and report the available current it produced.
   */
  correct: () => number;
  scheduler?: SchedulerLike;
  debug?: DebugFn;
}

/**
 * Keeps correcting while the house stays in deficit, even when the meter
 * has nothing new to say.
 */
export class OverloadWatchdog {
  private readonly trigger: Timer;
  private readonly loop: Timer;
  private readonly debug: DebugFn;

  constructor(private readonly options: OverloadWatchdogOptions) {
    const scheduler = options.scheduler ?? asyncScheduler;
    this.trigger = new Timer(scheduler);
    this.loop = new Timer(scheduler);
    this.debug = options.debug ?? DEBUG("ev-lb.watchdog");
  }

  get isArmed(): boolean {
    return this.trigger.isPending || this.loop.isPending;
  }

  update(availableA: number): void {
    if (availableA >= 0) {
      this.cancel();
      return;
    }
    if (this.isArmed) {
      return;
    }

    const { triggerDelayMs } = this.options.timing();
    this.debug(
      "overload (%d A), correcting in %s",
      availableA,
      ms(triggerDelayMs)
    );
    this.trigger.arm(triggerDelayMs, () => this.onTrigger());
  }

  cancel(): void {
    if (this.isArmed) {
      this.debug("overload cleared");
    }
    this.trigger.cancel();
    this.loop.cancel();
  }

  private onTrigger(): void {
    const availableA = this.options.correct();
    if (availableA >= 0 || this.loop.isPending) {
      return;
    }

    const { loopIntervalMs } = this.options.timing();
    this.debug("overload persists, correcting every %s", ms(loopIntervalMs));
    this.loop.armInterval(loopIntervalMs, () => this.onTick());
  }

  private onTick(): void {
    if (this.options.correct() >= 0) {
      this.cancel();
    }
  }
}

import DEBUG from "debug";
import {
  asyncScheduler,
  BehaviorSubject,
  merge,
  Observable,
  of,
  type SchedulerLike,
  Subject,
  Subscription,
} from "rxjs";
import { finalize, ignoreElements, take, tap } from "rxjs/operators";
import { ActionExecutor, type ActionOutcome } from "./actionExecutor";
import {
  type BalancerConfig,
  type BalancerParameters,
  type ChargerConfig,
  type ChargerParameters,
  limitsOf,
  withChargerParameters,
  withParameters,
} from "./config";
import { ConfigError } from "./errors";
import { FallbackController } from "./fallbackController";
import {
  availableCurrent,
  clampToCharger,
  distributeWaterFilling,
  isolateEvDraw,
  rampUpLimit,
  resolveBalancerState,
  roundTo,
  safetyClamp,
} from "./formulas";
import {
  classifyMeterReading,
  estimateEvDrawA,
  parseChargerActivity,
} from "./meterSampler";
import {
  type Notification,
  NotificationCenter,
  notificationId,
} from "./notifications";
import { OverloadWatchdog } from "./overloadWatchdog";
import type {
  Allocation,
  BalancerEvent,
  BalancerSnapshot,
  BalancerState,
  ChargerActivity,
  ChargerActuator,
  ChargerCommand,
  ChargerId,
  ChargerSnapshot,
  DebugFn,
  MeterSample,
  RawReading,
  UpdateReason,
} from "./types";

export interface CoordinatorOptions {
  config: BalancerConfig;
  actuators: Record<ChargerId, ChargerActuator>;
  /**
   * Last commanded currents from a previous run.
   */
  restored?: Partial<Record<ChargerId, number>>;
  scheduler?: SchedulerLike;
  debug?: DebugFn;
}

export interface ActivityReading {
  chargerId: ChargerId;
  raw: RawReading;
}

export interface CoordinatorInputs {
  meter$: Observable<RawReading>;
  activity$?: Observable<ActivityReading>;
  /**
   * Emits once the host is up. Until then a missing meter is not acted on.
   * Without it the coordinator is ready straight away.
   */
  ready$?: Observable<unknown>;
}

interface ChargerRuntime {
  currentSetA: number;
  active: boolean;
  lastReductionAt: number | null;
  balancerState: BalancerState;
  lastActionReason: UpdateReason | null;
  activity: ChargerActivity;
  executor: ActionExecutor;
}

/**
 * Owns all run-time state of one balancer and is the only thing that commands
 * its chargers.
 *
 * Every trigger (meter reading, parameter change, manual override, watchdog
 * tick) runs to completion synchronously. Only the actuator calls themselves
 * are asynchronous, and they live in the per-charger {@link ActionExecutor}.
 */
export class Coordinator {
  readonly state$: Observable<BalancerSnapshot>;
  readonly events$: Observable<BalancerEvent>;

  private config: BalancerConfig;
  private availableCurrentA = 0;
  private lastSample: MeterSample | null = null;

  private readonly runtime = new Map<ChargerId, ChargerRuntime>();
  private readonly fallback: FallbackController;
  private readonly watchdog: OverloadWatchdog;
  private readonly notifications = new NotificationCenter();
  private readonly stateSubject: BehaviorSubject<BalancerSnapshot>;
  private readonly eventSubject = new Subject<BalancerEvent>();
  private readonly subscriptions = new Subscription();
  private readonly scheduler: SchedulerLike;
  private readonly debug: DebugFn;
  private readonly info: DebugFn;
  private readonly warn: DebugFn;

  constructor({
    config,
    actuators,
    restored = {},
    scheduler = asyncScheduler,
    debug,
  }: CoordinatorOptions) {
    this.config = config;
    this.scheduler = scheduler;
    this.debug = debug ?? DEBUG("ev-lb.coordinator");
    this.info = this.debug.extend("info");
    this.warn = this.debug.extend("warn");

    this.fallback = new FallbackController();
    this.watchdog = new OverloadWatchdog({
      scheduler,
      timing: () => ({
        triggerDelayMs: this.config.overloadTriggerDelayMs,
        loopIntervalMs: this.config.overloadLoopIntervalMs,
      }),
      correct: () => this.forceRecompute(),
    });

    for (const charger of config.chargers) {
      const actuator = actuators[charger.id];
      if (!actuator) {
        throw new ConfigError(`no actuator for charger "${charger.id}"`);
      }

      const executor = new ActionExecutor({
        chargerId: charger.id,
        actuator,
        scheduler,
        retryPolicy: () => ({
          maxRetries: this.config.actionMaxRetries,
          baseDelayMs: this.config.actionRetryBaseDelayMs,
          timeoutMs: this.config.actionTimeoutMs,
        }),
      });
      this.subscriptions.add(
        executor.outcome$.subscribe((outcome) => this.actionCompleted(outcome))
      );

      const currentSetA = Math.max(0, restored[charger.id] ?? 0);
      this.runtime.set(charger.id, {
        currentSetA,
        active: currentSetA > 0,
        lastReductionAt: null,
        balancerState: !config.enabled
          ? "disabled"
          : currentSetA > 0
          ? "active"
          : "stopped",
        lastActionReason: null,
        activity: "unknown",
        executor,
      });
    }

    this.stateSubject = new BehaviorSubject(this.snapshot());
    this.state$ = this.stateSubject.asObservable();
    this.events$ = this.eventSubject.asObservable();
  }

  get notifications$(): Observable<ReadonlyMap<string, Notification>> {
    return this.notifications.notifications$;
  }

  get currentConfig(): BalancerConfig {
    return this.config;
  }

  /**
   * Wire the inputs. Unsubscribing tears the coordinator down.
   */
  run$({ meter$, activity$, ready$ }: CoordinatorInputs): Observable<never> {
    return merge(
      activity$
        ? activity$.pipe(
            tap(({ chargerId, raw }) => this.activityChanged(chargerId, raw))
          )
        : of(),
      meter$.pipe(tap((raw) => this.meterChanged(raw))),
      (ready$ ?? of(true)).pipe(
        take(1),
        tap(() => this.markReady())
      )
    ).pipe(
      ignoreElements(),
      finalize(() => this.dispose())
    );
  }

  dispose(): void {
    this.debug("stopping");
    this.watchdog.cancel();
    for (const runtime of this.runtime.values()) {
      runtime.executor.dispose();
    }
    this.subscriptions.unsubscribe();
    this.eventSubject.complete();
    this.stateSubject.complete();
    this.notifications.complete();
  }

  meterChanged(raw: RawReading): void {
    const sample = classifyMeterReading(raw);
    this.lastSample = sample;

    if (sample.kind === "unavailable") {
      this.fallback.meterLost();
    } else if (sample.kind === "valid") {
      this.fallback.meterRecovered();
    }

    if (!this.config.enabled) {
      this.debug("meter changed while disabled, skipping");
      this.publishDisabled();
      return;
    }

    switch (sample.kind) {
      case "unavailable":
        this.watchdog.cancel();
        this.applyFallback();
        return;
      case "invalid":
        this.warn("could not parse power meter value %o", sample.rawValue);
        return;
      case "out_of_range":
        this.warn(
          "power meter value %d W is beyond the safety limit, ignoring",
          sample.powerW
        );
        return;
      case "valid":
        this.recompute(sample.powerW, "power_meter_update");
        this.watchdog.update(this.availableCurrentA);
        return;
    }
  }

  activityChanged(chargerId: ChargerId, raw: RawReading): void {
    const runtime = this.runtime.get(chargerId);
    if (!runtime) {
      this.warn("activity for unknown charger %s", chargerId);
      return;
    }
    runtime.activity = parseChargerActivity(raw);
    this.debug("charger %s activity %s", chargerId, runtime.activity);
  }

  markReady(): void {
    const applyFallbackNow = this.fallback.markReady();
    if (!applyFallbackNow || !this.config.enabled) {
      this.publish();
      return;
    }
    this.warn("power meter missing or unavailable once ready");
    this.applyFallback();
  }

  setEnabled(enabled: boolean): void {
    this.config = withParameters(this.config, { enabled });
    this.info("load balancing %s", enabled ? "enabled" : "disabled");
    if (!enabled) {
      this.watchdog.cancel();
    }
    this.recomputeFromCurrentState();
  }

  updateParameters(parameters: BalancerParameters): void {
    this.config = withParameters(this.config, parameters);
    this.recomputeFromCurrentState();
  }

  updateCharger(chargerId: ChargerId, parameters: ChargerParameters): void {
    this.config = withChargerParameters(this.config, chargerId, parameters);
    this.recomputeFromCurrentState();
  }

  /**
   * Command a charger directly. The next meter reading resumes balancing.
   */
  setLimit(chargerId: ChargerId, currentA: number): void {
    const charger = this.chargerOf(chargerId);
    const target = clampToCharger(currentA, limitsOf(charger)) ?? 0;
    this.debug(
      "manual override %s: requested %d A, clamped %d A",
      chargerId,
      currentA,
      target
    );
    this.applyUpdate(charger, target, "manual_override", false);
    this.publish();
  }

  /**
   * Re-run balancing on the last reading after a runtime edit.
   */
  recomputeFromCurrentState(): void {
    if (!this.config.enabled) {
      this.publishDisabled();
      return;
    }

    const sample = this.lastSample;
    if (sample === null && !this.fallback.isReady) {
      this.publish();
      return;
    }
    if (sample === null || sample.kind === "unavailable") {
      this.fallback.meterLost();
      this.reapplyFallback();
      return;
    }

    if (sample.kind !== "valid") {
      return;
    }
    this.recompute(sample.powerW, "parameter_change");
    this.watchdog.update(this.availableCurrentA);
  }

  private forceRecompute(): number {
    const sample = this.lastSample;
    if (this.config.enabled && sample?.kind === "valid") {
      this.recompute(sample.powerW, "power_meter_update");
    }
    return this.availableCurrentA;
  }

  private recompute(totalPowerW: number, reason: UpdateReason): void {
    const { chargers, voltageV, maxServiceCurrentA, rampUpTimeMs } =
      this.config;
    const now = this.scheduler.now();

    const evDrawA = chargers.reduce((sum, charger) => {
      const runtime = this.runtimeOf(charger.id);
      return sum + estimateEvDrawA(runtime.currentSetA, runtime.activity);
    }, 0);
    const available = availableCurrent(
      isolateEvDraw(totalPowerW, evDrawA, voltageV),
      maxServiceCurrentA,
      voltageV
    );

    const allocations: Allocation[] =
      chargers.length === 1
        ? [clampToCharger(available, limitsOf(chargers[0]))]
        : distributeWaterFilling(available, chargers.map(limitsOf));

    this.availableCurrentA = roundTo(available, 2);

    chargers.forEach((charger, index) => {
      const runtime = this.runtimeOf(charger.id);
      const target = allocations[index] ?? 0;
      const final = rampUpLimit(
        runtime.currentSetA,
        target,
        runtime.lastReductionAt,
        now,
        rampUpTimeMs
      );

      if (final < runtime.currentSetA) {
        runtime.lastReductionAt = now;
      }

      this.debug(
        "recompute %s (%s): meter %d W, available %d A, target %d A, final %d A",
        charger.id,
        reason,
        totalPowerW,
        this.availableCurrentA,
        target,
        final
      );
      if (final !== target) {
        this.debug(
          "ramp-up cooldown holding %s at %d A (target %d A)",
          charger.id,
          final,
          target
        );
      }

      this.applyUpdate(charger, final, reason, final < target);
    });

    this.publish();
  }

  private applyFallback(): void {
    if (this.config.unavailableBehavior === "ignore") {
      this.debug("power meter unavailable, keeping the last currents");
      this.publish();
      return;
    }

    this.availableCurrentA = 0;
    for (const charger of this.config.chargers) {
      const target = this.fallback.resolveFor(charger, this.config) ?? 0;
      this.warn(
        "power meter unavailable, %s for %s",
        target === 0 ? "stopping charging" : `applying ${target} A`,
        charger.id
      );
      this.applyUpdate(charger, target, "fallback_unavailable", false);
    }
    this.publish();
  }

  private reapplyFallback(): void {
    for (const charger of this.config.chargers) {
      const runtime = this.runtimeOf(charger.id);
      const target = this.fallback.reapplyFor(
        charger,
        runtime.currentSetA,
        this.config
      );
      if (target !== runtime.currentSetA) {
        this.debug(
          "fallback for %s updated after parameter change: %d A -> %d A",
          charger.id,
          runtime.currentSetA,
          target
        );
        this.applyUpdate(charger, target, "parameter_change", false);
      }
    }
    this.publish();
  }

  private applyUpdate(
    charger: ChargerConfig,
    requestedA: number,
    reason: UpdateReason,
    rampUpHeld: boolean
  ): void {
    const runtime = this.runtimeOf(charger.id);
    const { maxServiceCurrentA, voltageV, enabled } = this.config;

    const currentA = safetyClamp(
      requestedA,
      charger.maxCurrentA,
      maxServiceCurrentA
    );
    if (currentA !== requestedA) {
      this.warn(
        "safety clamp: %d A for %s exceeds charger max %d A / service max %d A, clamping to %d A",
        requestedA,
        charger.id,
        charger.maxCurrentA,
        maxServiceCurrentA,
        currentA
      );
    }

    const prevActive = runtime.active;
    const prevCurrentA = runtime.currentSetA;

    runtime.currentSetA = currentA;
    runtime.active = currentA > 0;
    runtime.lastActionReason = reason;
    runtime.balancerState = resolveBalancerState({
      enabled,
      active: runtime.active,
      prevActive,
      prevCurrentA,
      currentSetA: currentA,
      rampUpHeld,
    });

    if (!prevActive && runtime.active) {
      this.info("%s: charging started at %d A", charger.id, currentA);
    } else if (prevActive && !runtime.active) {
      this.info(
        "%s: charging stopped (was %d A, reason %s)",
        charger.id,
        prevCurrentA,
        reason
      );
    }

    this.raiseFaults(charger, prevActive, prevCurrentA, reason);
    this.resolveFaults(charger, prevActive, reason);

    const currentW = roundTo(currentA * voltageV, 1);
    const plan: ChargerCommand[] = [];
    if (runtime.active && !prevActive) {
      plan.push(
        { type: "start_charging" },
        { type: "set_current", currentA, currentW }
      );
    } else if (!runtime.active && prevActive) {
      plan.push({ type: "stop_charging" });
    } else if (runtime.active && currentA !== prevCurrentA) {
      plan.push({ type: "set_current", currentA, currentW });
    }
    runtime.executor.execute(plan);
  }

  private raiseFaults(
    charger: ChargerConfig,
    prevActive: boolean,
    prevCurrentA: number,
    reason: UpdateReason
  ): void {
    const { id: entryId } = this.config;
    const runtime = this.runtimeOf(charger.id);
    const now = this.scheduler.now();

    if (reason === "fallback_unavailable" && runtime.currentSetA === 0) {
      this.eventSubject.next({
        type: "meter_unavailable",
        entryId,
        chargerId: charger.id,
      });
      this.notifications.create({
        id: notificationId("meter_unavailable", entryId),
        kind: "meter_unavailable",
        title: "EV Load Balancer: Meter Unavailable",
        message: "The power meter is unavailable. Charging has been stopped for safety.",
        createdAt: now,
      });
    } else if (reason === "fallback_unavailable" && runtime.currentSetA > 0) {
      this.eventSubject.next({
        type: "fallback_activated",
        entryId,
        chargerId: charger.id,
        fallbackCurrentA: runtime.currentSetA,
      });
      this.notifications.create({
        id: notificationId("fallback_activated", entryId),
        kind: "fallback_activated",
        title: "EV Load Balancer: Fallback Activated",
        message: `The power meter is unavailable. Fallback current of ${runtime.currentSetA} A applied.`,
        createdAt: now,
      });
    } else if (
      reason === "power_meter_update" &&
      prevActive &&
      !runtime.active
    ) {
      this.eventSubject.next({
        type: "overload_stop",
        entryId,
        chargerId: charger.id,
        previousCurrentA: prevCurrentA,
        availableCurrentA: this.availableCurrentA,
      });
      this.notifications.create({
        id: notificationId("overload_stop", entryId, charger.id),
        kind: "overload_stop",
        title: "EV Load Balancer: Overload",
        message: `Household load exceeds the service limit. Charging of ${charger.name} stopped (was ${prevCurrentA} A, available headroom: ${this.availableCurrentA} A).`,
        createdAt: now,
      });
    }
  }

  private resolveFaults(
    charger: ChargerConfig,
    prevActive: boolean,
    reason: UpdateReason
  ): void {
    const { id: entryId } = this.config;
    const runtime = this.runtimeOf(charger.id);

    if (!prevActive && runtime.active) {
      this.eventSubject.next({
        type: "charging_resumed",
        entryId,
        chargerId: charger.id,
        currentA: runtime.currentSetA,
      });
      this.notifications.dismiss(
        notificationId("overload_stop", entryId, charger.id)
      );
    }
    if (reason === "power_meter_update") {
      this.notifications.dismiss(notificationId("meter_unavailable", entryId));
      this.notifications.dismiss(notificationId("fallback_activated", entryId));
    }
  }

  private actionCompleted({ chargerId, action, status, error }: ActionOutcome) {
    const { id: entryId } = this.config;
    const id = notificationId("action_failed", entryId, chargerId);

    if (status === "success") {
      this.notifications.dismiss(id);
    } else {
      const message = error ?? "unknown error";
      this.eventSubject.next({
        type: "action_failed",
        entryId,
        chargerId,
        action,
        error: message,
      });
      this.notifications.create({
        id,
        kind: "action_failed",
        title: "EV Load Balancer: Action Failed",
        message: `Action ${action} failed for charger ${chargerId}: ${message}. Check the charger connection.`,
        createdAt: this.scheduler.now(),
      });
    }
    this.publish();
  }

  private publishDisabled(): void {
    for (const runtime of this.runtime.values()) {
      runtime.balancerState = "disabled";
    }
    this.publish();
  }

  private publish(): void {
    this.stateSubject.next(this.snapshot());
  }

  private snapshot(): BalancerSnapshot {
    const { id, enabled, unavailableBehavior, voltageV } = this.config;
    const chargers: Record<ChargerId, ChargerSnapshot> = {};

    for (const charger of this.config.chargers) {
      const runtime = this.runtimeOf(charger.id);
      chargers[charger.id] = {
        id: charger.id,
        name: charger.name,
        limits: limitsOf(charger),
        currentSetA: runtime.currentSetA,
        currentSetW: roundTo(runtime.currentSetA * voltageV, 1),
        active: runtime.active,
        balancerState: runtime.balancerState,
        lastActionReason: runtime.lastActionReason,
        diagnostics: runtime.executor.diagnostics,
      };
    }

    return {
      id,
      enabled,
      meterHealthy: this.fallback.meterHealthy,
      fallbackActive: this.fallback.fallbackActive,
      configuredFallback: unavailableBehavior,
      availableCurrentA: this.availableCurrentA,
      chargers,
    };
  }

  private chargerOf(chargerId: ChargerId): ChargerConfig {
    const charger = this.config.chargers.find(({ id }) => id === chargerId);
    if (!charger) {
      throw new ConfigError(`unknown charger "${chargerId}"`);
    }
    return charger;
  }

  private runtimeOf(chargerId: ChargerId): ChargerRuntime {
    const runtime = this.runtime.get(chargerId);
    if (!runtime) {
      throw new ConfigError(`unknown charger "${chargerId}"`);
    }
    return runtime;
  }
}

import DEBUG from "debug";
import ms from "ms";
import {
  asyncScheduler,
  concat,
  defer,
  EMPTY,
  Observable,
  type SchedulerLike,
  Subject,
  Subscription,
  throwError,
  timer,
} from "rxjs";
import {
  catchError,
  ignoreElements,
  retry,
  switchMap,
  take,
  tap,
  timeout,
} from "rxjs/operators";
import { ActionError, ActionTimeoutError, errorMessage } from "./errors";
import type {
  ActionDiagnostics,
  ActionName,
  ChargerActuator,
  ChargerCommand,
  ChargerId,
  DebugFn,
} from "./types";

export interface RetryPolicy {
  maxRetries: number;
  baseDelayMs: number;
  timeoutMs: number;
}

export interface ActionOutcome {
  chargerId: ChargerId;
  action: ActionName;
  status: "success" | "failure";
  error: string | null;
}

export interface ActionExecutorOptions {
  chargerId: ChargerId;
  actuator: ChargerActuator;
  /**
   * Read per command so live edits apply to the next one.
   */
  retryPolicy: () => RetryPolicy;
  scheduler?: SchedulerLike;
  debug?: DebugFn;
}

export const initialDiagnostics = (): ActionDiagnostics => ({
  lastActionError: null,
  lastActionTimestamp: null,
  lastActionStatus: null,
  retryCount: 0,
  actionLatencyMs: null,
  supersededCount: 0,
});

/**
 * Sends commands to one charger.
 *
 * Each command is retried with exponential backoff and every attempt is bounded
 * by a timeout. A newer plan cancels whatever is still in flight, including a
 * pending backoff wait, but unfinished `start_charging`/`stop_charging`
 * commands are carried over ahead of it; only stale `set_current` values are
 * dropped. Failures end up in {@link diagnostics} and {@link outcome$}, never
 * as an error on a stream.
 */
export class ActionExecutor {
  readonly outcome$: Observable<ActionOutcome>;

  private diagnosticsState: ActionDiagnostics = initialDiagnostics();
  private pending: ChargerCommand[] = [];
  private readonly plan$ = new Subject<ChargerCommand[]>();
  private readonly outcomeSubject = new Subject<ActionOutcome>();
  private readonly subscription: Subscription;
  private readonly scheduler: SchedulerLike;
  private readonly debug: DebugFn;
  private readonly warn: DebugFn;

  constructor(private readonly options: ActionExecutorOptions) {
    this.scheduler = options.scheduler ?? asyncScheduler;
    this.debug = options.debug ?? DEBUG(`ev-lb.actions.${options.chargerId}`);
    this.warn = this.debug.extend("warn");
    this.outcome$ = this.outcomeSubject.asObservable();

    this.subscription = this.plan$
      .pipe(
        switchMap((commands) =>
          concat(...commands.map((command) => this.run$(command)))
        )
      )
      .subscribe();
  }

  get diagnostics(): ActionDiagnostics {
    return { ...this.diagnosticsState };
  }

  /**
   * Run the commands in order. Replaces any plan still in flight, keeping its
   * unfinished start and stop commands in front.
   */
  execute(commands: ChargerCommand[]): void {
    if (commands.length === 0) {
      return;
    }

    const carried = this.pending.filter(
      (command) => command.type !== "set_current"
    );
    const superseded = this.pending.length - carried.length;
    if (superseded > 0) {
      this.debug("dropping %d stale set_current command(s)", superseded);
      this.diagnosticsState = {
        ...this.diagnosticsState,
        supersededCount: this.diagnosticsState.supersededCount + superseded,
      };
    }

    this.pending = [...carried, ...commands];
    this.debug("plan %o", this.pending.map((command) => command.type));
    this.plan$.next([...this.pending]);
  }

  dispose(): void {
    this.subscription.unsubscribe();
    this.plan$.complete();
    this.outcomeSubject.complete();
  }

  private invoke$(command: ChargerCommand): Observable<unknown> {
    const { actuator } = this.options;
    switch (command.type) {
      case "start_charging":
        return actuator.startCharging$();
      case "stop_charging":
        return actuator.stopCharging$();
      case "set_current":
        return actuator.setCurrent$(command.currentA, command.currentW);
    }
  }

  private run$(command: ChargerCommand): Observable<never> {
    const { chargerId } = this.options;

    return defer(() => {
      const { maxRetries, baseDelayMs, timeoutMs } = this.options.retryPolicy();
      const startedAt = this.scheduler.now();
      let retries = 0;

      return defer(() => this.invoke$(command)).pipe(
        take(1),
        timeout({
          first: timeoutMs,
          scheduler: this.scheduler,
          with: () =>
            throwError(
              () => new ActionTimeoutError(chargerId, command.type, timeoutMs)
            ),
        }),
        retry({
          count: maxRetries,
          delay: (error: unknown, retryCount: number) => {
            retries = retryCount;
            const delayMs = baseDelayMs * Math.pow(2, retryCount - 1);
            this.debug(
              "%s failed (%s), retry %d/%d in %s",
              command.type,
              errorMessage(error),
              retryCount,
              maxRetries,
              ms(delayMs)
            );
            return timer(delayMs, this.scheduler);
          },
        }),
        ignoreElements(),
        tap({
          complete: () => {
            this.debug("%s done after %d retries", command.type, retries);
            this.record(command, null, retries, startedAt);
          },
        }),
        catchError((error: unknown) => {
          const failure =
            error instanceof ActionError
              ? error
              : new ActionError(chargerId, command.type, errorMessage(error));
          this.warn(
            "%s failed after %d retries: %s",
            command.type,
            retries,
            failure.message
          );
          this.record(command, failure.message, retries, startedAt);
          return EMPTY;
        })
      );
    });
  }

  private record(
    command: ChargerCommand,
    error: string | null,
    retryCount: number,
    startedAt: number
  ): void {
    const now = this.scheduler.now();
    const index = this.pending.indexOf(command);
    if (index >= 0) {
      this.pending.splice(index, 1);
    }

    this.diagnosticsState = {
      ...this.diagnosticsState,
      lastActionError: error,
      lastActionTimestamp: now,
      lastActionStatus: error === null ? "success" : "failure",
      retryCount,
      actionLatencyMs: now - startedAt,
    };
    this.outcomeSubject.next({
      chargerId: this.options.chargerId,
      action: command.type,
      status: error === null ? "success" : "failure",
      error,
    });
  }
}

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { defer, NEVER, Observable, of, throwError } from "rxjs";
import {
  ActionExecutor,
  type ActionOutcome,
  initialDiagnostics,
  type RetryPolicy,
} from "./actionExecutor";
import type { ChargerActuator } from "./types";

type Call = { action: string; at: number; currentA?: number };

/**
 * Actuator that records every attempt and answers from `behaviour`.
 */
const createActuator = (
  behaviour: (call: Call, attempt: number) => Observable<unknown>
) => {
  const calls: Call[] = [];
  const attempt$ = (call: Omit<Call, "at">) =>
    defer(() => {
      const recorded = { ...call, at: Date.now() };
      calls.push(recorded);
      return behaviour(recorded, calls.length);
    });

  const actuator: ChargerActuator = {
    startCharging$: () => attempt$({ action: "start_charging" }),
    stopCharging$: () => attempt$({ action: "stop_charging" }),
    setCurrent$: (currentA) => attempt$({ action: "set_current", currentA }),
  };
  return { actuator, calls };
};

const policy: RetryPolicy = { maxRetries: 3, baseDelayMs: 1000, timeoutMs: 15000 };

describe("ActionExecutor", () => {
  let outcomes: ActionOutcome[];

  const createExecutor = (
    actuator: ChargerActuator,
    retryPolicy: RetryPolicy = policy
  ) => {
    const executor = new ActionExecutor({
      chargerId: "garage",
      actuator,
      retryPolicy: () => retryPolicy,
    });
    executor.outcome$.subscribe((outcome) => outcomes.push(outcome));
    return executor;
  };

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(0);
    outcomes = [];
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("should start with empty diagnostics", () => {
    const { actuator } = createActuator(() => of(undefined));
    const executor = createExecutor(actuator);

    expect(executor.diagnostics).toEqual(initialDiagnostics());
  });

  it("should record a first-attempt success", () => {
    const { actuator, calls } = createActuator(() => of(undefined));
    const executor = createExecutor(actuator);

    executor.execute([{ type: "set_current", currentA: 16, currentW: 3680 }]);

    expect(calls).toEqual([{ action: "set_current", currentA: 16, at: 0 }]);
    expect(executor.diagnostics).toEqual({
      lastActionError: null,
      lastActionTimestamp: 0,
      lastActionStatus: "success",
      retryCount: 0,
      actionLatencyMs: 0,
      supersededCount: 0,
    });
    expect(outcomes).toEqual([
      { chargerId: "garage", action: "set_current", status: "success", error: null },
    ]);
  });

  it("should back off 1 s then 2 s before succeeding", () => {
    const { actuator, calls } = createActuator((_, attempt) =>
      attempt < 3 ? throwError(() => new Error("busy")) : of(undefined)
    );
    const executor = createExecutor(actuator);

    executor.execute([{ type: "stop_charging" }]);
    vi.advanceTimersByTime(10000);

    expect(calls.map((call) => call.at)).toEqual([0, 1000, 3000]);
    expect(executor.diagnostics).toEqual({
      lastActionError: null,
      lastActionTimestamp: 3000,
      lastActionStatus: "success",
      retryCount: 2,
      actionLatencyMs: 3000,
      supersededCount: 0,
    });
  });

  it("should give up after three retries and report the failure", () => {
    const { actuator, calls } = createActuator(() =>
      throwError(() => new Error("charger offline"))
    );
    const executor = createExecutor(actuator);

    executor.execute([{ type: "start_charging" }]);
    vi.advanceTimersByTime(60000);

    // Waits of 1 s, 2 s and 4 s between four attempts
    expect(calls.map((call) => call.at)).toEqual([0, 1000, 3000, 7000]);
    expect(executor.diagnostics).toEqual({
      lastActionError: "charger offline",
      lastActionTimestamp: 7000,
      lastActionStatus: "failure",
      retryCount: 3,
      actionLatencyMs: 7000,
      supersededCount: 0,
    });
    expect(outcomes).toEqual([
      {
        chargerId: "garage",
        action: "start_charging",
        status: "failure",
        error: "charger offline",
      },
    ]);
  });

  it("should treat an actuator that never answers as a timeout", () => {
    const { actuator } = createActuator(() => NEVER);
    const executor = createExecutor(actuator, { ...policy, maxRetries: 0 });

    executor.execute([{ type: "set_current", currentA: 10, currentW: 2300 }]);
    vi.advanceTimersByTime(14999);
    expect(executor.diagnostics.lastActionStatus).toBeNull();

    vi.advanceTimersByTime(1);
    expect(executor.diagnostics.lastActionError).toBe(
      "set_current timed out after 15000 ms"
    );
    expect(executor.diagnostics.lastActionStatus).toBe("failure");
  });

  it("should retry after a timeout like any other failure", () => {
    const { actuator, calls } = createActuator((_, attempt) =>
      attempt === 1 ? NEVER : of(undefined)
    );
    const executor = createExecutor(actuator);

    executor.execute([{ type: "stop_charging" }]);
    vi.advanceTimersByTime(20000);

    // Timed out at 15 s, retried 1 s later
    expect(calls.map((call) => call.at)).toEqual([0, 16000]);
    expect(executor.diagnostics.lastActionStatus).toBe("success");
    expect(executor.diagnostics.retryCount).toBe(1);
  });

  it("should clear the last error on the next success", () => {
    let healthy = false;
    const { actuator } = createActuator(() =>
      healthy ? of(undefined) : throwError(() => new Error("nope"))
    );
    const executor = createExecutor(actuator, { ...policy, maxRetries: 0 });

    executor.execute([{ type: "stop_charging" }]);
    expect(executor.diagnostics.lastActionError).toBe("nope");

    healthy = true;
    executor.execute([{ type: "start_charging" }]);
    expect(executor.diagnostics.lastActionError).toBeNull();
    expect(executor.diagnostics.lastActionStatus).toBe("success");
  });

  it("should run a plan in order and carry on after a failed step", () => {
    const { actuator, calls } = createActuator((call) =>
      call.action === "start_charging"
        ? throwError(() => new Error("no start"))
        : of(undefined)
    );
    const executor = createExecutor(actuator, { ...policy, maxRetries: 0 });

    executor.execute([
      { type: "start_charging" },
      { type: "set_current", currentA: 16, currentW: 3680 },
    ]);

    expect(calls.map((call) => call.action)).toEqual([
      "start_charging",
      "set_current",
    ]);
    expect(outcomes.map((outcome) => outcome.status)).toEqual([
      "failure",
      "success",
    ]);
  });

  it("should replace a stale set_current still waiting to retry", () => {
    const { actuator, calls } = createActuator((call) =>
      call.currentA === 10 ? throwError(() => new Error("busy")) : of(undefined)
    );
    const executor = createExecutor(actuator);

    executor.execute([{ type: "set_current", currentA: 10, currentW: 2300 }]);
    vi.advanceTimersByTime(500);
    executor.execute([{ type: "set_current", currentA: 12, currentW: 2760 }]);
    vi.advanceTimersByTime(30000);

    expect(calls).toEqual([
      { action: "set_current", currentA: 10, at: 0 },
      { action: "set_current", currentA: 12, at: 500 },
    ]);
    expect(outcomes).toEqual([
      { chargerId: "garage", action: "set_current", status: "success", error: null },
    ]);
    expect(executor.diagnostics.supersededCount).toBe(1);
  });

  it("should carry an unfinished start in front of a newer plan", () => {
    const { actuator, calls } = createActuator((call, attempt) =>
      call.action === "start_charging" && attempt === 1
        ? throwError(() => new Error("busy"))
        : of(undefined)
    );
    const executor = createExecutor(actuator);

    executor.execute([
      { type: "start_charging" },
      { type: "set_current", currentA: 16, currentW: 3680 },
    ]);
    vi.advanceTimersByTime(500);
    executor.execute([{ type: "set_current", currentA: 12, currentW: 2760 }]);
    vi.advanceTimersByTime(30000);

    // the start is retried with the new plan, the 16 A value never goes out
    expect(calls).toEqual([
      { action: "start_charging", at: 0 },
      { action: "start_charging", at: 500 },
      { action: "set_current", currentA: 12, at: 500 },
    ]);
    expect(outcomes.map(({ action, status }) => `${action} ${status}`)).toEqual([
      "start_charging success",
      "set_current success",
    ]);
    expect(executor.diagnostics.supersededCount).toBe(1);
  });

  it("should keep a failing stop ahead of a later start", () => {
    const { actuator, calls } = createActuator((call, attempt) =>
      call.action === "stop_charging" && attempt === 1
        ? throwError(() => new Error("busy"))
        : of(undefined)
    );
    const executor = createExecutor(actuator);

    executor.execute([{ type: "stop_charging" }]);
    vi.advanceTimersByTime(200);
    executor.execute([
      { type: "start_charging" },
      { type: "set_current", currentA: 8, currentW: 1840 },
    ]);
    vi.advanceTimersByTime(30000);

    expect(calls.map(({ action, at }) => `${action}@${at}`)).toEqual([
      "stop_charging@0",
      "stop_charging@200",
      "start_charging@200",
      "set_current@200",
    ]);
    expect(executor.diagnostics.supersededCount).toBe(0);
  });

  it("should stop everything on dispose", () => {
    const { actuator, calls } = createActuator(() =>
      throwError(() => new Error("busy"))
    );
    const executor = createExecutor(actuator);

    executor.execute([{ type: "stop_charging" }]);
    executor.dispose();
    vi.advanceTimersByTime(30000);

    expect(calls).toHaveLength(1);
  });
});

import { ConfigError } from "./errors";
import {
  type ChargerId,
  type ChargerLimits,
  UNAVAILABLE_BEHAVIORS,
  type UnavailableBehavior,
} from "./types";

export const DEFAULTS = {
  voltageV: 230,
  minCurrentA: 6,
  maxCurrentA: 32,
  stepA: 1,
  rampUpTimeS: 30,
  unavailableBehavior: "stop",
  unavailableFallbackCurrentA: 6,
  overloadTriggerDelayS: 2,
  overloadLoopIntervalS: 5,
  actionMaxRetries: 3,
  actionRetryBaseDelayS: 1,
  actionTimeoutS: 15,
  enabled: true,
} as const;

export interface ChargerOptions {
  id: ChargerId;
  name?: string;
  minCurrentA?: number;
  maxCurrentA?: number;
  stepA?: number;
}

/**
 * Balancer options as a user writes them. Durations are in seconds.
 */
export interface BalancerOptions {
  id?: string;
  voltageV?: number;
  maxServiceCurrentA: number;
  chargers: ChargerOptions[];
  rampUpTimeS?: number;
  unavailableBehavior?: UnavailableBehavior;
  unavailableFallbackCurrentA?: number;
  overloadTriggerDelayS?: number;
  overloadLoopIntervalS?: number;
  actionMaxRetries?: number;
  actionRetryBaseDelayS?: number;
  actionTimeoutS?: number;
  enabled?: boolean;
}

export interface ChargerConfig extends ChargerLimits {
  readonly id: ChargerId;
  readonly name: string;
}

/**
 * Every recognised option, defaulted. Durations are in milliseconds.
 */
export interface BalancerConfig {
  readonly id: string;
  readonly voltageV: number;
  readonly maxServiceCurrentA: number;
  readonly chargers: readonly ChargerConfig[];
  readonly rampUpTimeMs: number;
  readonly unavailableBehavior: UnavailableBehavior;
  readonly unavailableFallbackCurrentA: number;
  readonly overloadTriggerDelayMs: number;
  readonly overloadLoopIntervalMs: number;
  readonly actionMaxRetries: number;
  readonly actionRetryBaseDelayMs: number;
  readonly actionTimeoutMs: number;
  readonly enabled: boolean;
}

/**
 * Service-level values that may change at runtime.
 */
export type BalancerParameters = Partial<
  Pick<
    BalancerConfig,
    | "voltageV"
    | "maxServiceCurrentA"
    | "rampUpTimeMs"
    | "unavailableBehavior"
    | "unavailableFallbackCurrentA"
    | "overloadTriggerDelayMs"
    | "overloadLoopIntervalMs"
    | "enabled"
  >
>;

export type ChargerParameters = Partial<ChargerLimits>;

const requireNumber = (
  name: string,
  value: number,
  check: (v: number) => boolean,
  expectation: string
) => {
  if (!Number.isFinite(value) || !check(value)) {
    throw new ConfigError(`${name} must be ${expectation}, got ${value}`);
  }
};

const positive = (v: number) => v > 0;
const nonNegative = (v: number) => v >= 0;

function validateCharger(charger: ChargerConfig): void {
  if (charger.id.trim() === "") {
    throw new ConfigError("charger id must not be empty");
  }
  const prefix = `chargers.${charger.id}`;
  requireNumber(`${prefix}.minCurrentA`, charger.minCurrentA, nonNegative, ">= 0");
  requireNumber(`${prefix}.maxCurrentA`, charger.maxCurrentA, nonNegative, ">= 0");
  requireNumber(`${prefix}.stepA`, charger.stepA, positive, "> 0");
  // max < min is allowed: such a charger simply never runs.
}

function validate(config: BalancerConfig): BalancerConfig {
  requireNumber("voltageV", config.voltageV, positive, "> 0");
  requireNumber(
    "maxServiceCurrentA",
    config.maxServiceCurrentA,
    positive,
    "> 0"
  );
  requireNumber("rampUpTimeMs", config.rampUpTimeMs, nonNegative, ">= 0");
  requireNumber(
    "unavailableFallbackCurrentA",
    config.unavailableFallbackCurrentA,
    nonNegative,
    ">= 0"
  );
  requireNumber(
    "overloadTriggerDelayMs",
    config.overloadTriggerDelayMs,
    nonNegative,
    ">= 0"
  );
  requireNumber(
    "overloadLoopIntervalMs",
    config.overloadLoopIntervalMs,
    positive,
    "> 0"
  );
  requireNumber(
    "actionMaxRetries",
    config.actionMaxRetries,
    (v) => Number.isInteger(v) && v >= 0,
    "a whole number >= 0"
  );
  requireNumber(
    "actionRetryBaseDelayMs",
    config.actionRetryBaseDelayMs,
    nonNegative,
    ">= 0"
  );
  requireNumber("actionTimeoutMs", config.actionTimeoutMs, positive, "> 0");

  if (!UNAVAILABLE_BEHAVIORS.includes(config.unavailableBehavior)) {
    throw new ConfigError(
      `unavailableBehavior must be one of ${UNAVAILABLE_BEHAVIORS.join(
        ", "
      )}, got ${config.unavailableBehavior}`
    );
  }

  if (config.chargers.length === 0) {
    throw new ConfigError("at least one charger must be configured");
  }

  const seen = new Set<ChargerId>();
  for (const charger of config.chargers) {
    validateCharger(charger);
    if (seen.has(charger.id)) {
      throw new ConfigError(`duplicate charger id "${charger.id}"`);
    }
    seen.add(charger.id);
  }

  return config;
}

function freeze(config: BalancerConfig): BalancerConfig {
  return Object.freeze({
    ...config,
    chargers: Object.freeze(
      config.chargers.map((charger) => Object.freeze({ ...charger }))
    ),
  });
}

const seconds = (s: number) => Math.round(s * 1000);

/**
 * Build the immutable configuration struct, filling in defaults.
 *
 * @throws ConfigError when a value is out of range
 */
export function createBalancerConfig(options: BalancerOptions): BalancerConfig {
  const chargers = options.chargers.map(
    (charger): ChargerConfig => ({
      id: charger.id,
      name: charger.name ?? charger.id,
      minCurrentA: charger.minCurrentA ?? DEFAULTS.minCurrentA,
      maxCurrentA: charger.maxCurrentA ?? DEFAULTS.maxCurrentA,
      stepA: charger.stepA ?? DEFAULTS.stepA,
    })
  );

  return freeze(
    validate({
      id: options.id ?? "ev-lb",
      voltageV: options.voltageV ?? DEFAULTS.voltageV,
      maxServiceCurrentA: options.maxServiceCurrentA,
      chargers,
      rampUpTimeMs: seconds(options.rampUpTimeS ?? DEFAULTS.rampUpTimeS),
      unavailableBehavior:
        options.unavailableBehavior ?? DEFAULTS.unavailableBehavior,
      unavailableFallbackCurrentA:
        options.unavailableFallbackCurrentA ??
        DEFAULTS.unavailableFallbackCurrentA,
      overloadTriggerDelayMs: seconds(
        options.overloadTriggerDelayS ?? DEFAULTS.overloadTriggerDelayS
      ),
      overloadLoopIntervalMs: seconds(
        options.overloadLoopIntervalS ?? DEFAULTS.overloadLoopIntervalS
      ),
      actionMaxRetries: options.actionMaxRetries ?? DEFAULTS.actionMaxRetries,
      actionRetryBaseDelayMs: seconds(
        options.actionRetryBaseDelayS ?? DEFAULTS.actionRetryBaseDelayS
      ),
      actionTimeoutMs: seconds(options.actionTimeoutS ?? DEFAULTS.actionTimeoutS),
      enabled: options.enabled ?? DEFAULTS.enabled,
    })
  );
}

export function withParameters(
  config: BalancerConfig,
  parameters: BalancerParameters
): BalancerConfig {
  return freeze(validate({ ...config, ...parameters }));
}

export function withChargerParameters(
  config: BalancerConfig,
  chargerId: ChargerId,
  parameters: ChargerParameters
): BalancerConfig {
  if (!config.chargers.some((charger) => charger.id === chargerId)) {
    throw new ConfigError(`unknown charger "${chargerId}"`);
  }
  return freeze(
    validate({
      ...config,
      chargers: config.chargers.map((charger) =>
        charger.id === chargerId ? { ...charger, ...parameters } : charger
      ),
    })
  );
}

export function limitsOf({
  minCurrentA,
  maxCurrentA,
  stepA,
}: ChargerLimits): ChargerLimits {
  return { minCurrentA, maxCurrentA, stepA };
}

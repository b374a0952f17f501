import { defer, Observable, of } from "rxjs";

import convict from "convict";

import { load } from "js-yaml";

import { shareReplay } from "rxjs/operators";
import DEBUG from "debug";

import {
  type BalancerConfig,
  type ChargerOptions,
  createBalancerConfig,
  DEFAULTS,
} from "../balancer/config";
import { ConfigError, errorMessage } from "../balancer/errors";
import { UNAVAILABLE_BEHAVIORS } from "../balancer/types";

const debug = DEBUG("ev-lb.config");

convict.addParser({ extension: ["yml", "yaml"], parse: load });

const BROKER_PROTOCOLS = ["mqtt:", "mqtts:", "ws:", "wss:", "tcp:", "ssl:"];

convict.addFormat({
  name: "broker-url",
  validate(value: unknown) {
    if (typeof value !== "string") {
      throw new Error("must be a URL");
    }
    let protocol: string;
    try {
      protocol = new URL(value).protocol;
    } catch (e) {
      throw new Error(`must be a URL: ${errorMessage(e)}`);
    }
    if (!BROKER_PROTOCOLS.includes(protocol)) {
      throw new Error(`must use one of ${BROKER_PROTOCOLS.join(", ")}`);
    }
  },
});

const CONVICT_SCHEMA = {
  id: {
    default: "ev-lb",
    doc: "Identifies this balancer in events, notifications and topics.",
    env: "EV_LB_ID",
    format: String,
  },
  mqttUrl: {
    default: "mqtt://localhost:1883",
    doc: "The URL of the MQTT broker.",
    env: "EV_LB_MQTT_URL",
    format: "broker-url",
  },
  topicPrefix: {
    default: "ev-lb",
    doc: "Everything the balancer publishes or listens to lives under this prefix.",
    env: "EV_LB_TOPIC_PREFIX",
    format: String,
  },
  meterTopic: {
    default: "home/power_meter/power",
    doc: "Topic carrying the whole-house power in W. Negative means export.",
    env: "EV_LB_METER_TOPIC",
    format: String,
  },
  voltage: {
    default: DEFAULTS.voltageV,
    doc: "Supply voltage in V.",
    env: "EV_LB_VOLTAGE",
    format: Number,
  },
  maxServiceCurrent: {
    default: 0,
    doc: "Rating of the main breaker in A. Must be set.",
    env: "EV_LB_MAX_SERVICE_CURRENT",
    format: Number,
  },
  rampUpTime: {
    default: DEFAULTS.rampUpTimeS,
    doc: "Seconds to wait after a reduction before the current may go up again.",
    env: "EV_LB_RAMP_UP_TIME",
    format: Number,
  },
  unavailableBehavior: {
    default: DEFAULTS.unavailableBehavior,
    doc: "What to do when the meter is unavailable: stop, ignore or set_current.",
    env: "EV_LB_UNAVAILABLE_BEHAVIOR",
    format: [...UNAVAILABLE_BEHAVIORS],
  },
  unavailableFallbackCurrent: {
    default: DEFAULTS.unavailableFallbackCurrentA,
    doc: "Current in A applied in set_current mode while the meter is unavailable.",
    env: "EV_LB_UNAVAILABLE_FALLBACK_CURRENT",
    format: Number,
  },
  overloadTriggerDelay: {
    default: DEFAULTS.overloadTriggerDelayS,
    doc: "Seconds of deficit before the overload correction kicks in.",
    env: "EV_LB_OVERLOAD_TRIGGER_DELAY",
    format: Number,
  },
  overloadLoopInterval: {
    default: DEFAULTS.overloadLoopIntervalS,
    doc: "Seconds between corrections while the deficit lasts.",
    env: "EV_LB_OVERLOAD_LOOP_INTERVAL",
    format: Number,
  },
  actionMaxRetries: {
    default: DEFAULTS.actionMaxRetries,
    doc: "Retries of a failed charger command.",
    env: "EV_LB_ACTION_MAX_RETRIES",
    format: "nat",
  },
  actionRetryBaseDelay: {
    default: DEFAULTS.actionRetryBaseDelayS,
    doc: "First backoff delay in seconds. Doubles on every retry.",
    env: "EV_LB_ACTION_RETRY_BASE_DELAY",
    format: Number,
  },
  actionTimeout: {
    default: DEFAULTS.actionTimeoutS,
    doc: "Seconds a single charger command may take.",
    env: "EV_LB_ACTION_TIMEOUT",
    format: Number,
  },
  startupGrace: {
    default: 10,
    doc: "Seconds after startup before a missing meter triggers the fallback.",
    env: "EV_LB_STARTUP_GRACE",
    format: Number,
  },
  enabled: {
    default: DEFAULTS.enabled,
    doc: "Whether balancing starts enabled.",
    env: "EV_LB_ENABLED",
    format: Boolean,
  },
  chargers: {
    default: [],
    doc: "Chargers on this service: { id, name?, minCurrent?, maxCurrent?, step?, statusTopic? }.",
    format: Array,
  },
};

export interface ChargerTopics {
  id: string;
  /**
   * Optional topic reporting whether the EV is drawing current.
   */
  statusTopic?: string;
}

export interface IRootConfig {
  mqttUrl: string;
  topicPrefix: string;
  meterTopic: string;
  startupGraceMs: number;
  chargers: ChargerTopics[];
  balancer: BalancerConfig;
}

const field = (entry: object, key: string): unknown =>
  key in entry ? Reflect.get(entry, key) : undefined;

function optionalNumber(entry: object, key: string, path: string) {
  const value = field(entry, key);
  if (value === undefined) return undefined;
  if (typeof value !== "number") {
    throw new ConfigError(`${path}.${key} must be a number`);
  }
  return value;
}

function optionalString(entry: object, key: string, path: string) {
  const value = field(entry, key);
  if (value === undefined) return undefined;
  if (typeof value !== "string") {
    throw new ConfigError(`${path}.${key} must be a string`);
  }
  return value;
}

type ChargerEntry = ChargerOptions & ChargerTopics;

/**
 * Validate the `chargers` list as it comes out of the YAML file.
 */
export function parseChargers(raw: unknown): ChargerEntry[] {
  if (!Array.isArray(raw)) {
    throw new ConfigError("chargers must be a list");
  }

  return raw.map((entry: unknown, index): ChargerEntry => {
    const path = `chargers[${index}]`;
    if (typeof entry !== "object" || entry === null) {
      throw new ConfigError(`${path} must be an object`);
    }

    const id = field(entry, "id");
    if (typeof id !== "string" && typeof id !== "number") {
      throw new ConfigError(`${path}.id is required`);
    }

    return {
      id: String(id),
      name: optionalString(entry, "name", path),
      minCurrentA: optionalNumber(entry, "minCurrent", path),
      maxCurrentA: optionalNumber(entry, "maxCurrent", path),
      stepA: optionalNumber(entry, "step", path),
      statusTopic: optionalString(entry, "statusTopic", path),
    };
  });
}

export default class Config {
  root$(): Observable<IRootConfig> {
    return defer(() => of(this.load())).pipe(shareReplay(1));
  }

  load(): IRootConfig {
    const path = process.env.CONFIG_PATH || "./config.yaml";
    const config = convict(CONVICT_SCHEMA);

    try {
      config.loadFile(path);
      config.validate({ allowed: "strict" });
    } catch (e) {
      throw new ConfigError(`invalid configuration in ${path}: ${errorMessage(e)}`);
    }

    const unavailableBehavior = UNAVAILABLE_BEHAVIORS.find(
      (behavior) => behavior === config.get("unavailableBehavior")
    );
    const chargers = parseChargers(config.get("chargers"));

    const root: IRootConfig = {
      mqttUrl: config.get("mqttUrl"),
      topicPrefix: config.get("topicPrefix"),
      meterTopic: config.get("meterTopic"),
      startupGraceMs: config.get("startupGrace") * 1000,
      chargers: chargers.map(({ id, statusTopic }) => ({ id, statusTopic })),
      balancer: createBalancerConfig({
        id: config.get("id"),
        voltageV: config.get("voltage"),
        maxServiceCurrentA: config.get("maxServiceCurrent"),
        chargers: chargers.map(({ id, name, minCurrentA, maxCurrentA, stepA }) => ({
          id,
          name,
          minCurrentA,
          maxCurrentA,
          stepA,
        })),
        rampUpTimeS: config.get("rampUpTime"),
        unavailableBehavior,
        unavailableFallbackCurrentA: config.get("unavailableFallbackCurrent"),
        overloadTriggerDelayS: config.get("overloadTriggerDelay"),
        overloadLoopIntervalS: config.get("overloadLoopInterval"),
        actionMaxRetries: config.get("actionMaxRetries"),
        actionRetryBaseDelayS: config.get("actionRetryBaseDelay"),
        actionTimeoutS: config.get("actionTimeout"),
        enabled: config.get("enabled"),
      }),
    };
    debug("root:", root);

    return root;
  }
}

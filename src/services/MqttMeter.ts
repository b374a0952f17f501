import DEBUG from "debug";
import { EMPTY, merge, Observable } from "rxjs";
import { map, tap } from "rxjs/operators";
import type { ActivityReading } from "../balancer/coordinator";
import { errorMessage } from "../balancer/errors";
import type { RawReading } from "../balancer/types";
import type { ChargerTopics } from "./Config";
import type { IServicesCradle } from "./cradle";

const debug = DEBUG("ev-lb.meter");

/**
 * Turns an MQTT payload into something the sampler can classify.
 *
 * Plain values ("3220", "unavailable") pass through. JSON objects are read
 * from their `power` or `state` field, whichever is present.
 */
export function decodeReading(payload: string): RawReading {
  const trimmed = payload.trim();
  if (!trimmed.startsWith("{")) {
    return trimmed;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (e) {
    debug("payload %s is not valid JSON: %s", trimmed, errorMessage(e));
    return trimmed;
  }

  if (typeof parsed !== "object" || parsed === null) {
    return trimmed;
  }
  for (const key of ["power", "state"]) {
    const value: unknown = key in parsed ? Reflect.get(parsed, key) : undefined;
    if (typeof value === "number" || typeof value === "string") {
      return value;
    }
    if (value === null) {
      return null;
    }
  }
  return trimmed;
}

export default class MqttMeter {
  private mqtt: IServicesCradle["mqtt"];

  constructor({ mqtt }: Pick<IServicesCradle, "mqtt">) {
    this.mqtt = mqtt;
  }

  power$(topic: string): Observable<RawReading> {
    debug("following power on %s", topic);
    return this.mqtt.subscribe$(topic).pipe(map(decodeReading));
  }

  /**
   * Activity of every charger that has a status topic.
   */
  activity$(chargers: readonly ChargerTopics[]): Observable<ActivityReading> {
    const streams = chargers.flatMap(({ id, statusTopic }) =>
      statusTopic
        ? [
            this.mqtt.subscribe$(statusTopic).pipe(
              map((payload) => ({ chargerId: id, raw: decodeReading(payload) })),
              tap(({ raw }) => debug("charger %s status %o", id, raw))
            ),
          ]
        : []
    );

    return streams.length > 0 ? merge(...streams) : EMPTY;
  }
}

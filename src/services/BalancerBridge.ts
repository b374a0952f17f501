import DEBUG from "debug";
import { merge, Observable } from "rxjs";
import {
  distinctUntilChanged,
  ignoreElements,
  map,
  mergeMap,
  switchMap,
  tap,
} from "rxjs/operators";
import type { Coordinator } from "../balancer/coordinator";
import { errorMessage } from "../balancer/errors";
import type { IServicesCradle } from "./cradle";

const debug = DEBUG("ev-lb.bridge");
const warn = debug.extend("warn");

const RETAINED = { qos: 1, retain: true } as const;

export const bridgeTopics = (prefix: string) => ({
  state: `${prefix}/state`,
  notifications: `${prefix}/notifications`,
  event: (type: string) => `${prefix}/event/${type}`,
  enabledSet: `${prefix}/enabled/set`,
  setLimit: (chargerId: string) => `${prefix}/charger/${chargerId}/set_limit`,
});

/**
 * `ON`/`OFF` like a switch, plus the usual boolean spellings.
 */
export function parseSwitch(payload: string): boolean | null {
  switch (payload.trim().toLowerCase()) {
    case "on":
    case "true":
    case "1":
      return true;
    case "off":
    case "false":
    case "0":
      return false;
    default:
      return null;
  }
}

/**
 * Publishes what a coordinator knows and feeds control topics back into it.
 */
export default class BalancerBridge {
  private mqtt: IServicesCradle["mqtt"];

  constructor({ mqtt }: Pick<IServicesCradle, "mqtt">) {
    this.mqtt = mqtt;
  }

  run$(coordinator: Coordinator, prefix: string): Observable<never> {
    return merge(
      this.state$(coordinator, prefix),
      this.events$(coordinator, prefix),
      this.notifications$(coordinator, prefix),
      this.enabledControl$(coordinator, prefix),
      this.limitControls$(coordinator, prefix)
    );
  }

  private state$(coordinator: Coordinator, prefix: string): Observable<never> {
    const topic = bridgeTopics(prefix).state;
    return coordinator.state$.pipe(
      map((snapshot) => JSON.stringify(snapshot)),
      distinctUntilChanged(),
      switchMap((payload) => this.mqtt.publish$(topic, payload, RETAINED))
    );
  }

  private events$(coordinator: Coordinator, prefix: string): Observable<never> {
    const topics = bridgeTopics(prefix);
    return coordinator.events$.pipe(
      mergeMap((event) => this.mqtt.publish$(topics.event(event.type), event))
    );
  }

  private notifications$(
    coordinator: Coordinator,
    prefix: string
  ): Observable<never> {
    const topic = bridgeTopics(prefix).notifications;
    return coordinator.notifications$.pipe(
      map((notifications) => JSON.stringify([...notifications.values()])),
      distinctUntilChanged(),
      switchMap((payload) => this.mqtt.publish$(topic, payload, RETAINED))
    );
  }

  private enabledControl$(
    coordinator: Coordinator,
    prefix: string
  ): Observable<never> {
    const topic = bridgeTopics(prefix).enabledSet;
    return this.mqtt.subscribe$(topic).pipe(
      tap((payload) => {
        const enabled = parseSwitch(payload);
        if (enabled === null) {
          warn("ignoring %o on %s", payload, topic);
          return;
        }
        coordinator.setEnabled(enabled);
      }),
      ignoreElements()
    );
  }

  private limitControls$(
    coordinator: Coordinator,
    prefix: string
  ): Observable<never> {
    const topics = bridgeTopics(prefix);
    return merge(
      ...coordinator.currentConfig.chargers.map(({ id }) =>
        this.mqtt.subscribe$(topics.setLimit(id)).pipe(
          tap((payload) => {
            const currentA = Number(payload.trim());
            if (payload.trim() === "" || !Number.isFinite(currentA)) {
              warn("ignoring limit %o for %s", payload, id);
              return;
            }
            try {
              coordinator.setLimit(id, currentA);
            } catch (e) {
              warn("could not set limit for %s: %s", id, errorMessage(e));
            }
          })
        )
      )
    ).pipe(ignoreElements());
  }
}

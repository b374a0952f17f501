import DEBUG from "debug";
import { merge, Observable, type SchedulerLike, asyncScheduler, timer } from "rxjs";
import { switchMap } from "rxjs/operators";

import { Coordinator } from "./balancer/coordinator";
import type { ChargerActuator, ChargerId } from "./balancer/types";
import MqttCharger from "./services/MqttCharger";
import type { IServicesCradle } from "./services/cradle";

const debug = DEBUG("ev-lb.app");

export type AppOptions = {
  scheduler?: SchedulerLike;
};

/**
 * Loads the configuration, builds one coordinator and wires it to MQTT.
 * Unsubscribing tears the whole thing down.
 */
export default function balancer$(
  { config, mqtt, meter, bridge }: IServicesCradle,
  { scheduler = asyncScheduler }: AppOptions = {}
): Observable<never> {
  return config.root$().pipe(
    switchMap((root) => {
      debug(
        "balancing %d charger(s) on a %d A service",
        root.balancer.chargers.length,
        root.balancer.maxServiceCurrentA
      );

      const actuators: Record<ChargerId, ChargerActuator> = {};
      for (const { id } of root.balancer.chargers) {
        actuators[id] = new MqttCharger(mqtt, root.topicPrefix, id);
      }

      const coordinator = new Coordinator({
        config: root.balancer,
        actuators,
        scheduler,
      });

      return merge(
        bridge.run$(coordinator, root.topicPrefix),
        coordinator.run$({
          meter$: meter.power$(root.meterTopic),
          activity$: meter.activity$(root.chargers),
          ready$: timer(root.startupGraceMs, scheduler),
        })
      );
    })
  );
}

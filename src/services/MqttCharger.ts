import DEBUG from "debug";
import { defer, Observable } from "rxjs";
import type { ChargerActuator, ChargerCommand, ChargerId } from "../balancer/types";
import type { MqttLike } from "./Mqtt";

const debug = DEBUG("ev-lb.charger");

export const commandTopic = (prefix: string, chargerId: ChargerId) =>
  `${prefix}/charger/${chargerId}/command`;

/**
 * Sends charger commands as JSON to `<prefix>/charger/<id>/command`.
 *
 * Whatever listens there owns the vendor protocol. The publish completes on
 * broker acknowledgement, which is what the executor waits for.
 */
export default class MqttCharger implements ChargerActuator {
  private readonly topic: string;

  constructor(
    private readonly mqtt: MqttLike,
    prefix: string,
    private readonly chargerId: ChargerId
  ) {
    this.topic = commandTopic(prefix, chargerId);
  }

  startCharging$(): Observable<never> {
    return this.send$({ type: "start_charging" });
  }

  stopCharging$(): Observable<never> {
    return this.send$({ type: "stop_charging" });
  }

  setCurrent$(currentA: number, currentW: number): Observable<never> {
    return this.send$({ type: "set_current", currentA, currentW });
  }

  private send$(command: ChargerCommand): Observable<never> {
    return defer(() => {
      debug("%s <- %o", this.chargerId, command);
      const { type, ...args } = command;
      return this.mqtt.publish$(this.topic, { action: type, ...args });
    });
  }
}

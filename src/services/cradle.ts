import { createContainer, InjectionMode, asClass } from "awilix";

import Config from "./Config";
import Mqtt, { type MqttLike } from "./Mqtt";
import MqttMeter from "./MqttMeter";
import BalancerBridge from "./BalancerBridge";

export interface IServicesCradle {
  config: Config;
  mqtt: MqttLike;
  meter: MqttMeter;
  bridge: BalancerBridge;
}

// sets up awilix ... .
const container = createContainer<IServicesCradle>({
  injectionMode: InjectionMode.PROXY,
});

// just register the services.
container.register({
  config: asClass(Config, { lifetime: "SINGLETON" }),
  mqtt: asClass(Mqtt, { lifetime: "SINGLETON" }),
  meter: asClass(MqttMeter, { lifetime: "SINGLETON" }),
  bridge: asClass(BalancerBridge, { lifetime: "SINGLETON" }),
});

export default container.cradle;

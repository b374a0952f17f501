import { describe, it, expect } from "vitest";
import type { ActivityReading } from "../balancer/coordinator";
import type { RawReading } from "../balancer/types";
import MqttMeter, { decodeReading } from "./MqttMeter";
import { FakeMqtt } from "./fixtures/FakeMqtt";

describe("decodeReading", () => {
  it("should pass plain payloads through trimmed", () => {
    expect(decodeReading(" 3220 ")).toBe("3220");
    expect(decodeReading("unavailable")).toBe("unavailable");
    expect(decodeReading("")).toBe("");
  });

  it("should read the power or state field of a JSON object", () => {
    expect(decodeReading('{"power": -1200.5}')).toBe(-1200.5);
    expect(decodeReading('{"state": "Charging"}')).toBe("Charging");
    expect(decodeReading('{"power": null}')).toBeNull();
  });

  it("should keep JSON it cannot read as the raw text", () => {
    expect(decodeReading('{"voltage": 230}')).toBe('{"voltage": 230}');
    expect(decodeReading("{broken")).toBe("{broken");
  });
});

describe("MqttMeter", () => {
  it("should follow the power topic", () => {
    const mqtt = new FakeMqtt();
    const readings: RawReading[] = [];
    const subscription = new MqttMeter({ mqtt })
      .power$("home/meter/power")
      .subscribe((reading) => readings.push(reading));

    mqtt.emit("home/meter/power", "2300");
    mqtt.emit("home/other", "9999");
    mqtt.emit("home/meter/power", '{"power": 4600}');
    subscription.unsubscribe();

    expect(readings).toEqual(["2300", 4600]);
    expect(mqtt.subscribed.size).toBe(0);
  });

  it("should only follow chargers that have a status topic", () => {
    const mqtt = new FakeMqtt();
    const readings: ActivityReading[] = [];
    const subscription = new MqttMeter({ mqtt })
      .activity$([
        { id: "garage", statusTopic: "home/garage/status" },
        { id: "driveway" },
      ])
      .subscribe((reading) => readings.push(reading));

    expect([...mqtt.subscribed]).toEqual(["home/garage/status"]);
    mqtt.emit("home/garage/status", "Charging");
    subscription.unsubscribe();

    expect(readings).toEqual([{ chargerId: "garage", raw: "Charging" }]);
  });

  it("should complete straight away without any status topic", () => {
    const mqtt = new FakeMqtt();
    let completed = false;

    new MqttMeter({ mqtt })
      .activity$([{ id: "garage" }])
      .subscribe({ complete: () => (completed = true) });

    expect(completed).toBe(true);
  });
});

import DEBUG from "debug";

import { connect, IClientPublishOptions } from "mqtt";

import { merge, Observable } from "rxjs";
import { filter, map, shareReplay, switchMap, take, tap } from "rxjs/operators";
import type { IServicesCradle } from "./cradle";

export type MqttPayload = string | Buffer | object;

/**
 * What the rest of the app needs from a broker connection.
 */
export interface MqttLike {
  subscribe$(topic: string): Observable<string>;
  publish$(
    topic: string,
    payload: MqttPayload,
    options?: IClientPublishOptions
  ): Observable<never>;
}

interface ISimplifiedMqttClient {
  message$: Observable<[string, Buffer]>;
  subscribe$: (topic: string) => Observable<never>;
  publish$: (
    topic: string,
    payload: string | Buffer,
    options: IClientPublishOptions
  ) => Observable<never>;
}

const debug = DEBUG("ev-lb.mqtt");

function mqttClient(url: string): Observable<ISimplifiedMqttClient> {
  return new Observable<ISimplifiedMqttClient>((subscriber) => {
    debug("going to connect to %s", url);

    const client = connect(url);

    const message$ = new Observable<[string, Buffer]>((messageSubscriber) => {
      const onMessage = (topic: string, payload: Buffer) =>
        messageSubscriber.next([topic, payload]);
      client.on("message", onMessage);
      return () => {
        client.removeListener("message", onMessage);
      };
    });

    client.on("close", () => {
      debug("close");
    });

    client.on("error", (err) => {
      debug("error %s", err.message);
    });

    client.on("connect", () => {
      debug("connect");

      subscriber.next({
        message$,
        publish$: (topic, payload, options) => {
          debug("publishing to topic %s -> %s", topic, payload);

          return new Observable<never>((publishSubscriber) => {
            client.publish(topic, payload, options, (err) => {
              if (err) {
                publishSubscriber.error(err);
                return;
              }

              publishSubscriber.complete();
            });
          });
        },
        subscribe$: (topic) => {
          return new Observable<never>((subscribeSubscriber) => {
            client.subscribe(topic, (err) => {
              if (err) {
                subscribeSubscriber.error(err);
                return;
              }

              subscribeSubscriber.complete();
            });
          });
        },
      });
    });

    if (process.env.DEBUG_MQTT_EVENTS) {
      client.on("reconnect", () => {
        debug("reconnect");
      });

      client.on("offline", () => {
        debug("offline");
      });
    }

    client.on("end", () => {
      subscriber.complete();
    });

    return () => {
      debug("request for socket termination");
      client.end();
    };
  }).pipe(
    // Without this every subscriber opens its own socket.
    shareReplay(1)
  );
}

export default class Mqtt implements MqttLike {
  private client$: Observable<ISimplifiedMqttClient>;

  constructor({ config }: Pick<IServicesCradle, "config">) {
    debug("constructing mqtt instance");
    this.client$ = config.root$().pipe(
      switchMap((root) => mqttClient(root.mqttUrl)),
      shareReplay(1)
    );
  }

  public subscribe$(topic: string): Observable<string> {
    return this.client$.pipe(
      switchMap((client) => {
        const replies$ = client.message$.pipe(
          filter(([incomingTopic]) => incomingTopic === topic),
          map(([, payload]) => payload.toString()),
          tap((msg) => {
            debug("got message for topic %s -> %s", topic, msg);
          })
        );

        return merge(client.subscribe$(topic), replies$);
      })
    );
  }

  public publish$(
    topic: string,
    payload: MqttPayload,
    options: IClientPublishOptions = { qos: 1 }
  ): Observable<never> {
    const body =
      typeof payload === "string" || Buffer.isBuffer(payload)
        ? payload
        : JSON.stringify(payload);

    return this.client$.pipe(
      take(1),
      switchMap((client) => client.publish$(topic, body, options))
    );
  }
}

import { defer, EMPTY, Observable, Subject, throwError } from "rxjs";
import { filter, finalize, map } from "rxjs/operators";
import type { IClientPublishOptions } from "mqtt";
import type { MqttLike, MqttPayload } from "../Mqtt";

export type Published = { topic: string; payload: string; retain: boolean };

/**
 * In-process broker stand-in. `emit` delivers to current subscribers only.
 */
export class FakeMqtt implements MqttLike {
  readonly published: Published[] = [];
  readonly subscribed = new Set<string>();
  failPublish = false;

  private readonly incoming$ = new Subject<[string, string]>();

  subscribe$(topic: string): Observable<string> {
    return defer(() => {
      this.subscribed.add(topic);
      return this.incoming$.pipe(
        filter(([incoming]) => incoming === topic),
        map(([, payload]) => payload),
        finalize(() => this.subscribed.delete(topic))
      );
    });
  }

  publish$(
    topic: string,
    payload: MqttPayload,
    options?: IClientPublishOptions
  ): Observable<never> {
    return defer(() => {
      if (this.failPublish) {
        return throwError(() => new Error("broker unreachable"));
      }
      this.published.push({
        topic,
        payload:
          typeof payload === "string"
            ? payload
            : Buffer.isBuffer(payload)
            ? payload.toString()
            : JSON.stringify(payload),
        retain: options?.retain ?? false,
      });
      return EMPTY;
    });
  }

  emit(topic: string, payload: string): void {
    this.incoming$.next([topic, payload]);
  }

  on(topic: string): string[] {
    return this.published
      .filter((message) => message.topic === topic)
      .map((message) => message.payload);
  }
}

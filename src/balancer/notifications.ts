import DEBUG from "debug";
import { BehaviorSubject, Observable } from "rxjs";
import type { DebugFn } from "./types";

export type NotificationKind =
  | "meter_unavailable"
  | "fallback_activated"
  | "overload_stop"
  | "action_failed";

export interface Notification {
  /**
   * `<kind>_<entry id>[_<charger id>]`. Creating with an existing id replaces it.
   */
  id: string;
  kind: NotificationKind;
  title: string;
  message: string;
  createdAt: number;
}

export const notificationId = (kind: NotificationKind, ...scope: string[]) =>
  [kind, ...scope].join("_");

/**
 * Persistent, keyed notifications that stay up until the condition clears.
 */
export class NotificationCenter {
  private readonly state$ = new BehaviorSubject<ReadonlyMap<string, Notification>>(
    new Map()
  );
  private readonly debug: DebugFn;

  constructor(debug?: DebugFn) {
    this.debug = debug ?? DEBUG("ev-lb.notifications");
  }

  get notifications$(): Observable<ReadonlyMap<string, Notification>> {
    return this.state$.asObservable();
  }

  get active(): Notification[] {
    return [...this.state$.value.values()];
  }

  has(id: string): boolean {
    return this.state$.value.has(id);
  }

  create(notification: Notification): void {
    this.debug("create %s: %s", notification.id, notification.message);
    const next = new Map(this.state$.value);
    next.set(notification.id, notification);
    this.state$.next(next);
  }

  dismiss(id: string): void {
    if (!this.state$.value.has(id)) {
      return;
    }
    this.debug("dismiss %s", id);
    const next = new Map(this.state$.value);
    next.delete(id);
    this.state$.next(next);
  }

  complete(): void {
    this.state$.complete();
  }
}

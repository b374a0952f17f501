import { asyncScheduler, interval, type SchedulerLike, Subscription, timer } from "rxjs";

/**
 * A single cancellable timer slot.
 *
 * Arming an already pending timer replaces it. Cancelling is idempotent and a
 * one-shot that has fired is no longer pending by the time its callback runs.
 */
export class Timer {
  private subscription: Subscription | null = null;

  constructor(private readonly scheduler: SchedulerLike = asyncScheduler) {}

  get isPending(): boolean {
    return this.subscription !== null;
  }

  arm(delayMs: number, callback: () => void): void {
    this.cancel();
    this.subscription = timer(delayMs, this.scheduler).subscribe(() => {
      this.subscription = null;
      callback();
    });
  }

  armInterval(periodMs: number, callback: () => void): void {
    this.cancel();
    this.subscription = interval(periodMs, this.scheduler).subscribe(() =>
      callback()
    );
  }

  cancel(): void {
    if (this.subscription) {
      this.subscription.unsubscribe();
      this.subscription = null;
    }
  }
}

import DEBUG from "debug";
import { fromEvent, merge, throwError, timer } from "rxjs";

import { catchError, switchMap, take, takeUntil } from "rxjs/operators";

import balancer$ from "./app";
import { ConfigError } from "./balancer/errors";
import servicesCradle from "./services/cradle";

if (!process.env.DEBUG) {
  DEBUG.enable("ev-lb*:warn,ev-lb*:info");
}

const debug = DEBUG("ev-lb.index");

const shutdown$ = merge(
  fromEvent(process, "SIGINT"),
  fromEvent(process, "SIGTERM")
).pipe(take(1));

debug("starting up");

balancer$(servicesCradle)
  .pipe(
    catchError((e: unknown, obs$) => {
      if (e instanceof ConfigError) {
        return throwError(() => e);
      }

      console.error("process errored", e);

      return timer(5000).pipe(switchMap(() => obs$));
    }),
    takeUntil(shutdown$)
  )
  .subscribe({
    error(e: unknown) {
      console.error(e instanceof Error ? e.message : e);
      process.exit(1);
    },
    complete() {
      debug("completed process");
      process.exit(0);
    },
  });

import type { ActionName, ChargerId } from "./types";

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * A charger command that failed on every attempt.
 */
export class ActionError extends Error {
  constructor(
    readonly chargerId: ChargerId,
    readonly action: ActionName,
    message: string
  ) {
    super(message);
    this.name = "ActionError";
  }
}

export class ActionTimeoutError extends ActionError {
  constructor(chargerId: ChargerId, action: ActionName, timeoutMs: number) {
    super(chargerId, action, `${action} timed out after ${timeoutMs} ms`);
    this.name = "ActionTimeoutError";
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

/* eslint-disable no-console */

export type TelemetryEventData = Readonly<Record<string, unknown>>;

export interface TelemetryFacade {
  recordError(event: string, data?: TelemetryEventData): void;
  recordWarning(event: string, data?: TelemetryEventData): void;
  recordProgress(event: string, data?: TelemetryEventData): void;
  recordCounters(group: string, counters: Readonly<Record<string, number>>): void;
}

const consoleTelemetry: TelemetryFacade = {
  recordError(event, data) {
    console.error(`[telemetry:error] ${event}`, data);
  },
  recordWarning(event, data) {
    console.warn(`[telemetry:warning] ${event}`, data);
  },
  recordProgress(event, data) {
    console.info(`[telemetry:progress] ${event}`, data);
  },
  recordCounters(group, counters) {
    console.info(`[telemetry:counters] ${group}`, counters);
  },
};

/**
 * Discards every event. Installed until a caller opts into something else.
 */
export const silentTelemetry: TelemetryFacade = {
  recordError() {},
  recordWarning() {},
  recordProgress() {},
  recordCounters() {},
};

/**
 * Logs every event to the console. The CLI installs it under `--verbose`.
 *
 * @example
 * import { setTelemetry, createConsoleTelemetry } from '@gear-upgrade/core';
 * setTelemetry(createConsoleTelemetry());
 */
export function createConsoleTelemetry(): TelemetryFacade {
  return consoleTelemetry;
}

let activeTelemetry: TelemetryFacade = silentTelemetry;

export const telemetry: TelemetryFacade = {
  recordError(event, data) {
    invokeSafely(() => activeTelemetry.recordError(event, data));
  },
  recordWarning(event, data) {
    invokeSafely(() => activeTelemetry.recordWarning(event, data));
  },
  recordProgress(event, data) {
    invokeSafely(() => activeTelemetry.recordProgress(event, data));
  },
  recordCounters(group, counters) {
    invokeSafely(() => activeTelemetry.recordCounters(group, counters));
  },
};

export function setTelemetry(facade: TelemetryFacade): void {
  activeTelemetry = facade;
}

export function resetTelemetry(): void {
  activeTelemetry = silentTelemetry;
}

function invokeSafely(invoke: () => void): void {
  try {
    invoke();
  } catch (error) {
    console.error('[telemetry] invocation failed', error);
  }
}

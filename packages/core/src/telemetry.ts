/* eslint-disable no-console */

/** Counter group emitted by the dimming engine after each frame. */
export const FRAME_COUNTER_GROUP = 'dimmer.frame';

export type TelemetryEventData = Readonly<Record<string, unknown>>;

export interface TelemetryFacade {
  recordError(event: string, data?: TelemetryEventData): void;
  recordWarning(event: string, data?: TelemetryEventData): void;
  recordProgress(event: string, data?: TelemetryEventData): void;
  recordCounters(group: string, counters: Readonly<Record<string, number>>): void;
  recordFrame(): void;
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
  recordFrame() {
    console.debug('[telemetry:frame]');
  },
};

/**
 * A no-op telemetry implementation that silently discards all events.
 * This is the default telemetry facade.
 */
export const silentTelemetry: TelemetryFacade = {
  recordError() {},
  recordWarning() {},
  recordProgress() {},
  recordCounters() {},
  recordFrame() {},
};

/**
 * Creates a telemetry facade that logs all events to the console.
 *
 * @example
 * import { setTelemetry, createConsoleTelemetry } from '@icon-dimmer/core';
 * setTelemetry(createConsoleTelemetry());
 */
export function createConsoleTelemetry(): TelemetryFacade {
  return consoleTelemetry;
}

let activeTelemetry: TelemetryFacade = silentTelemetry;

export const telemetry: TelemetryFacade = {
  recordError(event, data) {
    invokeSafely(activeTelemetry, 'recordError', event, data);
  },
  recordWarning(event, data) {
    invokeSafely(activeTelemetry, 'recordWarning', event, data);
  },
  recordProgress(event, data) {
    invokeSafely(activeTelemetry, 'recordProgress', event, data);
  },
  recordCounters(group, counters) {
    invokeSafely(activeTelemetry, 'recordCounters', group, counters);
  },
  recordFrame() {
    invokeSafely(activeTelemetry, 'recordFrame');
  },
};

export function setTelemetry(facade: TelemetryFacade): void {
  activeTelemetry = facade;
}

export function resetTelemetry(): void {
  activeTelemetry = silentTelemetry;
}

function invokeSafely<TMethod extends keyof TelemetryFacade>(
  facade: TelemetryFacade,
  method: TMethod,
  ...args: Parameters<TelemetryFacade[TMethod]>
): void {
  try {
    (
      facade[method] as (
        ...fnArgs: Parameters<TelemetryFacade[TMethod]>
      ) => ReturnType<TelemetryFacade[TMethod]>
    ).call(facade, ...args);
  } catch (error) {
    console.error('[telemetry] invocation failed', error);
  }
}

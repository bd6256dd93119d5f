/* eslint-disable no-console */

import { Counter, Gauge, Registry, collectDefaultMetrics } from 'prom-client';

import {
  FRAME_COUNTER_GROUP,
  type TelemetryEventData,
  type TelemetryFacade,
} from './telemetry.js';

export interface PrometheusTelemetryOptions {
  readonly registry?: Registry;
  readonly prefix?: string;
  readonly collectDefaultMetrics?: boolean;
}

interface FrameCounters {
  readonly opacityWrites: Counter<string>;
  readonly verdictsComputed: Counter<string>;
  readonly lookupFailures: Counter<string>;
  readonly nodesVisited: Gauge<string>;
}

const DEFAULT_PREFIX = 'icon_dimmer_';

const FAILURE_KINDS = [
  ['resolutionFailures', 'resolution'],
  ['oracleFailures', 'oracle'],
  ['nodeFailures', 'node'],
] as const;

export interface PrometheusTelemetryFacade extends TelemetryFacade {
  readonly registry: Registry;
}

export function createPrometheusTelemetry(
  options: PrometheusTelemetryOptions = {},
): PrometheusTelemetryFacade {
  const registry = options.registry ?? new Registry();
  const prefix = options.prefix ?? DEFAULT_PREFIX;

  if (options.collectDefaultMetrics ?? true) {
    collectDefaultMetrics({ register: registry, prefix });
  }

  const errors = new Counter({
    name: `${prefix}telemetry_errors_total`,
    help: 'Total number of telemetry errors emitted by the dimmer.',
    registers: [registry],
    labelNames: ['event'],
  });

  const warnings = new Counter({
    name: `${prefix}telemetry_warnings_total`,
    help: 'Total number of telemetry warnings emitted by the dimmer.',
    registers: [registry],
    labelNames: ['event'],
  });

  const frames = new Counter({
    name: `${prefix}frames_total`,
    help: 'Total number of frames processed by the dimming engine.',
    registers: [registry],
  });

  const frameCounters: FrameCounters = {
    opacityWrites: new Counter({
      name: `${prefix}opacity_writes_total`,
      help: 'Total number of icon opacity writes.',
      registers: [registry],
    }),
    verdictsComputed: new Counter({
      name: `${prefix}verdicts_computed_total`,
      help: 'Total number of dim verdicts computed (per-frame cache misses).',
      registers: [registry],
    }),
    lookupFailures: new Counter({
      name: `${prefix}lookup_failures_total`,
      help: 'Total number of failed collaborator lookups, by kind.',
      registers: [registry],
      labelNames: ['kind'],
    }),
    nodesVisited: new Gauge({
      name: `${prefix}nodes_visited`,
      help: 'Number of scene nodes visited during the last frame.',
      registers: [registry],
    }),
  };

  const logError = createConsoleLogger('error');
  const logWarning = createConsoleLogger('warn');
  const logInfo = createConsoleLogger('info');

  const facade: PrometheusTelemetryFacade = {
    recordError(event: string, data?: TelemetryEventData) {
      errors.inc({ event });
      logError(`[telemetry:error] ${event}`, data);
    },
    recordWarning(event: string, data?: TelemetryEventData) {
      warnings.inc({ event });
      logWarning(`[telemetry:warning] ${event}`, data);
    },
    recordProgress(event: string, data?: TelemetryEventData) {
      logInfo(`[telemetry:progress] ${event}`, data);
    },
    recordCounters(group: string, counters: Readonly<Record<string, number>>) {
      if (group === FRAME_COUNTER_GROUP) {
        updateFrameCounters(frameCounters, counters);
      }
    },
    recordFrame() {
      frames.inc();
    },
    registry,
  };

  return facade;
}

function updateFrameCounters(
  counters: FrameCounters,
  values: Readonly<Record<string, number>>,
): void {
  // Values are per-frame totals; the engine resets them at the start of every frame.
  incrementBy(counters.opacityWrites, values.opacityWrites);
  incrementBy(counters.verdictsComputed, values.verdictsComputed);

  for (const [key, kind] of FAILURE_KINDS) {
    const value = values[key];
    if (isPositive(value)) {
      counters.lookupFailures.inc({ kind }, value);
    }
  }

  const { nodesVisited } = values;
  if (typeof nodesVisited === 'number' && Number.isFinite(nodesVisited)) {
    counters.nodesVisited.set(nodesVisited);
  }
}

function incrementBy(counter: Counter<string>, value: number | undefined): void {
  if (isPositive(value)) {
    counter.inc(value);
  }
}

function isPositive(value: number | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value) && value > 0;
}

type ConsoleMethod = (message?: unknown, ...optionalParams: unknown[]) => void;

function createConsoleLogger<
  TMethod extends 'error' | 'warn' | 'info',
>(method: TMethod): ConsoleMethod {
  if (typeof console?.[method] === 'function') {
    return console[method].bind(console);
  }
  return () => {};
}

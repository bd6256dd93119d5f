import { afterEach, describe, expect, it, vi } from 'vitest';

import type { TelemetryEventData, TelemetryFacade } from './telemetry.js';
import {
  createConsoleTelemetry,
  resetTelemetry,
  setTelemetry,
  silentTelemetry,
  telemetry,
} from './telemetry.js';

describe('telemetry facade', () => {
  afterEach(() => {
    resetTelemetry();
  });

  it('preserves facade context when invoking delegated methods', () => {
    class StatefulTelemetryFacade implements TelemetryFacade {
      history: string[] = [];
      lastCounters?: Readonly<Record<string, number>>;

      constructor(private readonly label: string) {}

      private note(kind: string, event?: string) {
        this.history.push(
          event ? `${this.label}:${kind}:${event}` : `${this.label}:${kind}`,
        );
      }

      recordError(event: string): void {
        this.note('error', event);
      }

      recordWarning(event: string, _data?: TelemetryEventData): void {
        this.note('warning', event);
      }

      recordProgress(event: string, _data?: TelemetryEventData): void {
        this.note('progress', event);
      }

      recordCounters(group: string, counters: Readonly<Record<string, number>>): void {
        this.note('counters', group);
        this.lastCounters = counters;
      }

      recordFrame(): void {
        this.note('frame');
      }
    }

    const facade = new StatefulTelemetryFacade('custom');
    setTelemetry(facade);

    telemetry.recordError('failure');
    telemetry.recordWarning('unstable');
    telemetry.recordProgress('attached');
    telemetry.recordCounters('dimmer.frame', { opacityWrites: 3 });
    telemetry.recordFrame();

    expect(facade.history).toEqual([
      'custom:error:failure',
      'custom:warning:unstable',
      'custom:progress:attached',
      'custom:counters:dimmer.frame',
      'custom:frame',
    ]);
    expect(facade.lastCounters).toEqual({ opacityWrites: 3 });
  });

  it('logs a console error when delegated invocation fails', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const thrown = new Error('telemetry facade failed');

    const faultyFacade: TelemetryFacade = {
      recordError: vi.fn(() => {
        throw thrown;
      }),
      recordWarning: vi.fn(),
      recordProgress: vi.fn(),
      recordCounters: vi.fn(),
      recordFrame: vi.fn(),
    };

    setTelemetry(faultyFacade);

    try {
      telemetry.recordError('failure');
      expect(errorSpy).toHaveBeenCalledWith('[telemetry] invocation failed', thrown);
    } finally {
      errorSpy.mockRestore();
    }
  });

  it('is silent by default', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    try {
      telemetry.recordError('error');
      telemetry.recordWarning('warning');
      telemetry.recordProgress('progress');
      telemetry.recordCounters('counters', { count: 1 });
      telemetry.recordFrame();

      expect(errorSpy).not.toHaveBeenCalled();
      expect(warnSpy).not.toHaveBeenCalled();
      expect(infoSpy).not.toHaveBeenCalled();
      expect(debugSpy).not.toHaveBeenCalled();
    } finally {
      errorSpy.mockRestore();
      warnSpy.mockRestore();
      infoSpy.mockRestore();
      debugSpy.mockRestore();
    }
  });

  it('createConsoleTelemetry returns a facade that logs to console', () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const infoSpy = vi.spyOn(console, 'info').mockImplementation(() => {});
    const debugSpy = vi.spyOn(console, 'debug').mockImplementation(() => {});

    try {
      setTelemetry(createConsoleTelemetry());

      telemetry.recordError('error');
      telemetry.recordWarning('warning');
      telemetry.recordProgress('progress');
      telemetry.recordCounters('counters', { count: 1 });
      telemetry.recordFrame();

      expect(errorSpy).toHaveBeenCalledWith('[telemetry:error] error', undefined);
      expect(warnSpy).toHaveBeenCalledWith('[telemetry:warning] warning', undefined);
      expect(infoSpy).toHaveBeenCalledWith('[telemetry:progress] progress', undefined);
      expect(infoSpy).toHaveBeenCalledWith('[telemetry:counters] counters', { count: 1 });
      expect(debugSpy).toHaveBeenCalledWith('[telemetry:frame]');
    } finally {
      errorSpy.mockRestore();
      warnSpy.mockRestore();
      infoSpy.mockRestore();
      debugSpy.mockRestore();
    }
  });

  it('silentTelemetry discards everything', () => {
    expect(() => {
      silentTelemetry.recordError('error');
      silentTelemetry.recordFrame();
    }).not.toThrow();
  });
});

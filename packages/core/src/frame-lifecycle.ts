import { telemetry } from './telemetry.js';

export type FrameHandler = () => void;

export interface FrameSubscription {
  unsubscribe(): void;
}

export interface FrameSubscriptionOptions {
  readonly label?: string;
}

/**
 * Host signal delivered once per frame, immediately before compositing.
 * Handlers must finish their work synchronously.
 */
export interface FrameLifecycle {
  onBeforeRender(
    handler: FrameHandler,
    options?: FrameSubscriptionOptions,
  ): FrameSubscription;
}

export interface FrameLifecycleController extends FrameLifecycle {
  /** Runs every current handler in subscription order; returns how many ran. */
  emitBeforeRender(): number;
  readonly subscriberCount: number;
}

interface FrameHandlerEntry {
  readonly handler: FrameHandler;
  readonly label?: string;
}

export function createFrameLifecycle(): FrameLifecycleController {
  const entries: FrameHandlerEntry[] = [];

  return {
    onBeforeRender(handler, options = {}) {
      if (typeof handler !== 'function') {
        throw new Error('onBeforeRender requires a handler function.');
      }

      const entry: FrameHandlerEntry = { handler, label: options.label };
      entries.push(entry);

      return {
        unsubscribe() {
          const index = entries.indexOf(entry);
          if (index !== -1) {
            entries.splice(index, 1);
          }
        },
      };
    },
    emitBeforeRender() {
      // Snapshot so handlers may unsubscribe while the frame is dispatched.
      const snapshot = entries.slice();
      for (const entry of snapshot) {
        try {
          entry.handler();
        } catch (error) {
          telemetry.recordError('FrameHandlerFailed', {
            label: entry.label,
            message: error instanceof Error ? error.message : String(error),
          });
        }
      }
      return snapshot.length;
    },
    get subscriberCount() {
      return entries.length;
    },
  };
}

export const DIMMING_ENGINE_LABEL = 'icon-dimmer';

export function attachDimmingEngine(
  engine: { onFrame(): void },
  lifecycle: FrameLifecycle,
): FrameSubscription {
  const subscription = lifecycle.onBeforeRender(() => engine.onFrame(), {
    label: DIMMING_ENGINE_LABEL,
  });
  telemetry.recordProgress('DimmerAttached', { label: DIMMING_ENGINE_LABEL });
  return subscription;
}

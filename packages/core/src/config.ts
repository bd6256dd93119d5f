import { OPACITY_MAX, OPACITY_MIN } from '@icon-dimmer/item-schema';

export interface DimmerConfig {
  /**
   * Whether the engine walks the scene at all. A disabled engine performs no
   * traversal and leaves every opacity untouched.
   *
   * @defaultValue `true`
   */
  readonly enabled: boolean;
  /**
   * Opacity written to icons of tradable items that are still locked.
   * Clamped to [0, 255]; `0` renders the icon undimmed.
   *
   * @defaultValue `150`
   */
  readonly dimOpacity: number;
}

export type DimmerConfigOverrides = Readonly<{
  readonly enabled?: unknown;
  readonly dimOpacity?: unknown;
}>;

export const DEFAULT_DIMMER_CONFIG: DimmerConfig = Object.freeze({
  enabled: true,
  dimOpacity: 150,
});

function toFiniteNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function clampOpacity(value: number): number {
  return Math.max(OPACITY_MIN, Math.min(OPACITY_MAX, Math.trunc(value)));
}

/**
 * Normalizes an opacity from settings storage. Returns `undefined` for
 * anything that is not a finite number.
 */
export function toOpacity(value: unknown): number | undefined {
  const numeric = toFiniteNumber(value);
  return numeric === undefined ? undefined : clampOpacity(numeric);
}

export function resolveDimmerConfig(
  overrides?: DimmerConfigOverrides,
): DimmerConfig {
  const source = overrides ?? {};
  return Object.freeze({
    enabled:
      typeof source.enabled === 'boolean'
        ? source.enabled
        : DEFAULT_DIMMER_CONFIG.enabled,
    dimOpacity: toOpacity(source.dimOpacity) ?? DEFAULT_DIMMER_CONFIG.dimOpacity,
  });
}

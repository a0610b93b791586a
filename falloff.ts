import { clamp01 } from './utils';

/** Exponent value that switches propagation from a chain end off. */
export const FALLOFF_DISABLED = -10;

/** Largest exponent taken into account; the curve is a step well before it. */
export const FALLOFF_MAX = 10;

export interface FalloffSpec {
  /** 0 is linear; higher values widen the influence. */
  exponent: number;
  /** Circular profile at exponent 1 instead of a parabola. */
  spherical: boolean;
}

/**
 * Maps a normalized distance from the influencing end to a weight.
 * `null` means the end does not propagate at all.
 */
export type FalloffFn = (t: number, exponent: number, spherical: boolean) => number | null;

export const isFalloffEnabled = (exponent: number): boolean =>
  Number.isFinite(exponent) && exponent > FALLOFF_DISABLED;

export const falloffWeight: FalloffFn = (t, exponent, spherical) => {
  if (!isFalloffEnabled(exponent)) {
    return null;
  }

  const x = clamp01(t);
  const p = 2 ** Math.min(exponent, FALLOFF_MAX);
  const power = 1 - x ** p;

  if (!spherical) {
    return clamp01(power);
  }
  return clamp01(power ** (1 / p));
};

export const falloffSpecWeight = (t: number, spec: FalloffSpec, fn: FalloffFn = falloffWeight): number | null =>
  fn(t, spec.exponent, spec.spherical);

import type { FalloffConfig, FalloffShape } from '../config.js';
import type { DimensionValue, MinimumAcceptable } from '../types.js';
import { clamp } from '../utils.js';

export interface Satisfaction {
  satisfaction: number;
  /** Strictly past minimum_acceptable on the unfavorable side (or a non-acceptable category). */
  beyond_minimum: boolean;
}

/**
 * Share of satisfaction left after moving `d` away from the ideal, with `span`
 * the distance from ideal to minimum. 1 at the ideal, 0 at the minimum.
 *
 * logarithmic: ln(span - d + 1) / ln(span + 1), concave like the price curve
 * quadratic:   1 - (d / span)^2
 * linear:      1 - d / span
 */
export function remainingShare(shape: FalloffShape, d: number, span: number): number {
  const t = clamp(d / span, 0, 1);
  switch (shape) {
    case 'linear':
      return 1 - t;
    case 'quadratic':
      return 1 - t * t;
    case 'logarithmic':
      return clamp(Math.log(span - clamp(d, 0, span) + 1) / Math.log(span + 1), 0, 1);
  }
}

/**
 * Satisfaction on a continuous dimension.
 *
 * The side of `minimum` relative to `ideal` is the unfavorable direction.
 * At or beyond the ideal on the favorable side → 1.
 * Between ideal and minimum → floor_at_minimum + (1 - floor_at_minimum) * remainingShare.
 * Strictly past the minimum → 0.
 * When ideal === minimum any deviation counts as past the minimum.
 */
export function continuousSatisfaction(
  value: number,
  ideal: number,
  minimum: number,
  falloff: FalloffConfig,
): Satisfaction {
  const direction = Math.sign(ideal - minimum);

  if (direction === 0) {
    return value === ideal
      ? { satisfaction: 1, beyond_minimum: false }
      : { satisfaction: 0, beyond_minimum: true };
  }
  if ((value - ideal) * direction >= 0) {
    return { satisfaction: 1, beyond_minimum: false };
  }
  if ((minimum - value) * direction > 0) {
    return { satisfaction: 0, beyond_minimum: true };
  }

  const span = Math.abs(ideal - minimum);
  const d = Math.abs(ideal - value);
  const floor = falloff.floor_at_minimum;
  return {
    satisfaction: clamp(floor + (1 - floor) * remainingShare(falloff.shape, d, span), 0, 1),
    beyond_minimum: false,
  };
}

/**
 * Satisfaction on a categorical or boolean dimension.
 * Ideal → 1, acceptable → categorical_partial, otherwise 0 and past the minimum.
 * For booleans a minimum equal to the ideal means only the ideal is acceptable.
 */
export function discreteSatisfaction(
  value: DimensionValue,
  ideal: DimensionValue,
  minimum: MinimumAcceptable,
  falloff: FalloffConfig,
): Satisfaction {
  if (value === ideal) {
    return { satisfaction: 1, beyond_minimum: false };
  }
  const acceptable = Array.isArray(minimum)
    ? typeof value === 'string' && minimum.includes(value)
    : minimum === value;
  return acceptable
    ? { satisfaction: falloff.categorical_partial, beyond_minimum: false }
    : { satisfaction: 0, beyond_minimum: true };
}

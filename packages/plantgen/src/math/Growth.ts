/**
 * Growth curves
 *
 * Maps elapsed minutes to a normalized growth coefficient and shapes
 * progress values so growth eases in and out instead of moving linearly.
 */

import type { GrowthCurveConfig, GrowthState } from "../types.js";

/**
 * Default curve: half size after 15 minutes, quadratic approach.
 */
export const DEFAULT_GROWTH_CURVE: Readonly<GrowthCurveConfig> = {
  scale: 15,
  exponent: 2,
};

/**
 * Fill a partial growth curve from the defaults.
 */
export function mergeGrowthCurve(
  partial: Partial<GrowthCurveConfig> = {},
): GrowthCurveConfig {
  return {
    scale: partial.scale ?? DEFAULT_GROWTH_CURVE.scale,
    exponent: partial.exponent ?? DEFAULT_GROWTH_CURVE.exponent,
  };
}

/**
 * Ease-in/ease-out of a progress value in [0, 1].
 *
 * f(0) = 0, f(0.5) = 0.5, f(1) = 1, f(x) = 1 - f(1 - x), zero slope at the ends.
 */
export function smoothenCurve(x: number): number {
  return (Math.sin((x - 0.5) * Math.PI) + 1) / 2;
}

/**
 * Normalized growth in [0, 1) for an age in minutes.
 *
 * Strictly increasing for non-negative ages, exactly 0 at age 0 and
 * approaching (never reaching) 1. Negative ages give NaN unless the
 * exponent is an integer.
 */
export function ageCoefficient(
  age: number,
  curve: GrowthCurveConfig = DEFAULT_GROWTH_CURVE,
): number {
  return 1 - 1 / ((age / curve.scale) ** curve.exponent + 1);
}

/**
 * Age in minutes at which the plant reaches the given growth coefficient.
 *
 * @returns `Infinity` for a coefficient of exactly 1
 * @throws RangeError when the coefficient lies outside [0, 1]
 */
export function inverseAgeCoefficient(
  coefficient: number,
  curve: GrowthCurveConfig = DEFAULT_GROWTH_CURVE,
): number {
  if (!(coefficient >= 0 && coefficient <= 1)) {
    throw new RangeError(
      `Growth coefficient must lie in [0, 1], got ${coefficient}`,
    );
  }
  if (coefficient === 1) {
    return Number.POSITIVE_INFINITY;
  }

  return (
    curve.scale * (coefficient / (1 - coefficient)) ** (1 / curve.exponent)
  );
}

/**
 * Growth coefficient for parts that visibly lag behind (branches, fruit).
 */
export function slowGrowthCoefficient(growth: number): number {
  return growth ** 3;
}

/**
 * All coefficients a draw needs for the given age.
 */
export function computeGrowthState(
  age: number,
  curve: GrowthCurveConfig = DEFAULT_GROWTH_CURVE,
): GrowthState {
  const growth = ageCoefficient(age, curve);
  const slowGrowth = slowGrowthCoefficient(growth);

  return {
    growth,
    slowGrowth,
    smooth: smoothenCurve(growth),
    slowSmooth: smoothenCurve(slowGrowth),
  };
}

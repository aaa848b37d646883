/**
 * Math utilities for plant generation.
 */

export { SeededRandom } from "./Random.js";
export {
  DEFAULT_GROWTH_CURVE,
  mergeGrowthCurve,
  smoothenCurve,
  ageCoefficient,
  inverseAgeCoefficient,
  slowGrowthCoefficient,
  computeGrowthState,
} from "./Growth.js";
export { DEG_TO_RAD, RAD_TO_DEG, radians, degrees } from "./Polar.js";
export { StemCurve, createStemCurve } from "./Curve.js";

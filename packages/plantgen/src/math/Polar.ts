/**
 * Angle utilities
 */

/** Degrees to radians conversion factor */
export const DEG_TO_RAD = Math.PI / 180;

/** Radians to degrees conversion factor */
export const RAD_TO_DEG = 180 / Math.PI;

/**
 * Convert degrees to radians
 */
export function radians(degrees: number): number {
  return degrees * DEG_TO_RAD;
}

/**
 * Convert radians to degrees
 */
export function degrees(radians: number): number {
  return radians * RAD_TO_DEG;
}

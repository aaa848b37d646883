/**
 * Petal outlines
 *
 * Each function returns a closed path for one petal of the given size,
 * drawn from the flower centre (the origin) outwards along +y.
 */

import type { PetalShape } from "../types.js";
import { PlantPath } from "../surface/PlantPath.js";

/** Control point distance for a quarter circle made of one cubic segment */
const CIRCLE_KAPPA = 0.5522847498307936;

/**
 * Pointy, slightly lopsided petal.
 */
export function triangularPetal(size: number): PlantPath {
  const s = size * 1.5;
  return new PlantPath()
    .quadTo(0.9 * s, 0.5 * s, 0, s)
    .quadTo(-0.5 * s, 0.4 * s, 0, 0);
}

/**
 * Circle inscribed in the square from (0, 0) to (size, size).
 */
export function circularPetal(size: number): PlantPath {
  const r = size / 2;
  const cx = r;
  const cy = r;
  const k = r * CIRCLE_KAPPA;

  return new PlantPath()
    .moveTo(cx + r, cy)
    .cubicTo(cx + r, cy + k, cx + k, cy + r, cx, cy + r)
    .cubicTo(cx - k, cy + r, cx - r, cy + k, cx - r, cy)
    .cubicTo(cx - r, cy - k, cx - k, cy - r, cx, cy - r)
    .cubicTo(cx + k, cy - r, cx + r, cy - k, cx + r, cy);
}

/**
 * Round petal made of two mirrored quadratics.
 */
export function roundPetal(size: number): PlantPath {
  const s = size * 1.3;
  return new PlantPath()
    .quadTo(0.8 * s, 0.9 * s, 0, s)
    .quadTo(-0.8 * s, 0.9 * s, 0, 0);
}

/**
 * Petal with a notch at its tip: the control points reach past the end point.
 */
export function dipPetal(size: number): PlantPath {
  const s = size * 1.2;
  return new PlantPath()
    .quadTo(s, 1.4 * s, 0, s)
    .quadTo(-s, 1.4 * s, 0, 0);
}

export const PETAL_PATHS: Readonly<Record<PetalShape, (size: number) => PlantPath>> =
  {
    circular: circularPetal,
    triangular: triangularPetal,
    dip: dipPetal,
    round: roundPetal,
  };

/**
 * Shapes that only look right with exactly five petals.
 */
export const FIVE_PETAL_SHAPES: readonly PetalShape[] = ["dip", "round"];

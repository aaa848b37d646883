/**
 * Stem curve
 *
 * Flower stems are a single quadratic Bezier segment starting at the origin.
 * Leaves are anchored on it by curve parameter.
 */

import { QuadraticBezierCurve, Vector2 } from "three";

import type { Point2D } from "../types.js";
import { FLOWER_PROPORTIONS } from "../params/proportions.js";

/**
 * Quadratic stem from the origin to `end`, bending through `control`.
 */
export class StemCurve {
  private readonly curve: QuadraticBezierCurve;

  constructor(
    readonly control: Point2D,
    readonly end: Point2D,
  ) {
    this.curve = new QuadraticBezierCurve(
      new Vector2(0, 0),
      new Vector2(control.x, control.y),
      new Vector2(end.x, end.y),
    );
  }

  /**
   * Point at curve parameter `t` in [0, 1].
   */
  pointAtPercent(t: number): Point2D {
    const point = this.curve.getPoint(Math.min(1, Math.max(0, t)));
    return { x: point.x, y: point.y };
  }
}

/**
 * Stem of a flower whose top sits at (x, y); the control point keeps the
 * lower part upright and bends the top towards x.
 */
export function createStemCurve(x: number, y: number): StemCurve {
  return new StemCurve(
    { x: 0, y: FLOWER_PROPORTIONS.stemControl * y },
    { x, y },
  );
}

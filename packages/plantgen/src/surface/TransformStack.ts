/**
 * Transform and style state shared by the bundled surfaces.
 *
 * Keeps the current transform as a `Matrix3` and a stack of saved states,
 * composing each translate/rotate/scale on the right like a canvas context.
 */

import { Matrix3, Vector2 } from "three";

import type { Point2D, RgbColor } from "../types.js";
import { radians } from "../math/Polar.js";
import type { PlantPath } from "./PlantPath.js";
import {
  DEFAULT_SHAPE_STYLE,
  type AffineMatrix,
  type DrawableSurface,
  type ShapeStyle,
} from "./types.js";

interface SavedState {
  transform: Matrix3;
  style: ShapeStyle;
}

/**
 * Apply an affine matrix to a point.
 */
export function applyAffine(matrix: AffineMatrix, point: Point2D): Point2D {
  const [a, b, c, d, e, f] = matrix;
  return {
    x: a * point.x + c * point.y + e,
    y: b * point.x + d * point.y + f,
  };
}

export abstract class TransformStack implements DrawableSurface {
  private readonly saved: SavedState[] = [];
  private transform = new Matrix3();
  private style: ShapeStyle = { ...DEFAULT_SHAPE_STYLE };

  save(): void {
    this.saved.push({
      transform: this.transform.clone(),
      style: { ...this.style },
    });
  }

  restore(): void {
    const state = this.saved.pop();
    if (!state) {
      throw new Error("restore() called without a matching save()");
    }
    this.transform = state.transform;
    this.style = state.style;
  }

  translate(x: number, y: number): void {
    this.transform.multiply(new Matrix3().makeTranslation(x, y));
  }

  rotate(degrees: number): void {
    this.transform.multiply(new Matrix3().makeRotation(radians(degrees)));
  }

  scale(sx: number, sy: number): void {
    this.transform.multiply(new Matrix3().makeScale(sx, sy));
  }

  setFill(color: RgbColor | null): void {
    this.style = { ...this.style, fill: color ? { ...color } : null };
  }

  setStroke(color: RgbColor | null, width: number = 1): void {
    this.style = {
      ...this.style,
      stroke: color ? { ...color } : null,
      strokeWidth: width,
    };
  }

  /** Number of states currently saved */
  get depth(): number {
    return this.saved.length;
  }

  /** Current transform as `[a, b, c, d, e, f]` */
  getTransform(): AffineMatrix {
    const m = this.transform.elements;
    return [m[0], m[1], m[3], m[4], m[6], m[7]];
  }

  getStyle(): ShapeStyle {
    return {
      fill: this.style.fill ? { ...this.style.fill } : null,
      stroke: this.style.stroke ? { ...this.style.stroke } : null,
      strokeWidth: this.style.strokeWidth,
    };
  }

  /** Map a point from the current coordinate system to surface pixels */
  toDevice(point: Point2D): Point2D {
    const v = new Vector2(point.x, point.y).applyMatrix3(this.transform);
    return { x: v.x, y: v.y };
  }

  abstract drawPolygon(points: readonly Point2D[]): void;
  abstract drawEllipse(center: Point2D, radiusX: number, radiusY: number): void;
  abstract drawPath(path: PlantPath): void;
}

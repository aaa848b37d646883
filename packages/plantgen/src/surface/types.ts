/**
 * Drawable surface contract
 *
 * The minimal set of drawing operations plant geometry needs. Raster
 * canvases, SVG writers and GUI painters can all sit behind it.
 */

import type { Point2D, RgbColor } from "../types.js";
import type { PlantPath } from "./PlantPath.js";

/**
 * Fill and outline used for the next shapes.
 */
export interface ShapeStyle {
  /** Fill colour, or null for no fill */
  fill: RgbColor | null;
  /** Outline colour, or null for no outline */
  stroke: RgbColor | null;
  /** Outline width in user units */
  strokeWidth: number;
}

export const DEFAULT_SHAPE_STYLE: Readonly<ShapeStyle> = {
  fill: null,
  stroke: null,
  strokeWidth: 1,
};

/**
 * Affine transform `[a, b, c, d, e, f]` mapping (x, y) to
 * (a·x + c·y + e, b·x + d·y + f).
 */
export type AffineMatrix = readonly [
  number,
  number,
  number,
  number,
  number,
  number,
];

/**
 * Anything plants can be drawn onto.
 *
 * Transforms compose like a 2D canvas context: each call applies to the
 * shapes drawn after it, in the current coordinate system. `save` and
 * `restore` bracket both the transform and the style.
 */
export interface DrawableSurface {
  save(): void;
  restore(): void;
  translate(x: number, y: number): void;
  /** Rotate the coordinate system by an angle in degrees */
  rotate(degrees: number): void;
  scale(sx: number, sy: number): void;

  setFill(color: RgbColor | null): void;
  setStroke(color: RgbColor | null, width?: number): void;

  /** Closed polygon through the points in order */
  drawPolygon(points: readonly Point2D[]): void;
  drawEllipse(center: Point2D, radiusX: number, radiusY: number): void;
  drawPath(path: PlantPath): void;
}

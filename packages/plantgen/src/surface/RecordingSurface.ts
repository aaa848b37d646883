/**
 * Surface that records every call instead of rasterizing.
 *
 * Useful for hit-testing, for replaying a drawing onto another surface and
 * for checking geometry without a graphics backend.
 */

import type { Point2D, RgbColor } from "../types.js";
import type { PathSegment, PlantPath } from "./PlantPath.js";
import { TransformStack, applyAffine } from "./TransformStack.js";
import type { AffineMatrix, ShapeStyle } from "./types.js";

interface RecordedShapeBase {
  style: ShapeStyle;
  /** Transform in effect when the shape was drawn */
  transform: AffineMatrix;
}

export interface RecordedPolygon extends RecordedShapeBase {
  type: "polygon";
  points: Point2D[];
}

export interface RecordedEllipse extends RecordedShapeBase {
  type: "ellipse";
  center: Point2D;
  radiusX: number;
  radiusY: number;
}

export interface RecordedPath extends RecordedShapeBase {
  type: "path";
  segments: PathSegment[];
  /** SVG path data of the path in local coordinates */
  data: string;
}

export type RecordedShape = RecordedPolygon | RecordedEllipse | RecordedPath;

export type SurfaceCall =
  | { op: "save" }
  | { op: "restore" }
  | { op: "translate"; x: number; y: number }
  | { op: "rotate"; degrees: number }
  | { op: "scale"; x: number; y: number }
  | { op: "fill"; color: RgbColor | null }
  | { op: "stroke"; color: RgbColor | null; width: number }
  | { op: "draw"; shape: RecordedShape };

export class RecordingSurface extends TransformStack {
  readonly calls: SurfaceCall[] = [];
  readonly shapes: RecordedShape[] = [];

  override save(): void {
    super.save();
    this.calls.push({ op: "save" });
  }

  override restore(): void {
    super.restore();
    this.calls.push({ op: "restore" });
  }

  override translate(x: number, y: number): void {
    super.translate(x, y);
    this.calls.push({ op: "translate", x, y });
  }

  override rotate(degrees: number): void {
    super.rotate(degrees);
    this.calls.push({ op: "rotate", degrees });
  }

  override scale(sx: number, sy: number): void {
    super.scale(sx, sy);
    this.calls.push({ op: "scale", x: sx, y: sy });
  }

  override setFill(color: RgbColor | null): void {
    super.setFill(color);
    this.calls.push({ op: "fill", color: color ? { ...color } : null });
  }

  override setStroke(color: RgbColor | null, width: number = 1): void {
    super.setStroke(color, width);
    this.calls.push({
      op: "stroke",
      color: color ? { ...color } : null,
      width,
    });
  }

  drawPolygon(points: readonly Point2D[]): void {
    this.record({
      type: "polygon",
      points: points.map((p) => ({ x: p.x, y: p.y })),
      style: this.getStyle(),
      transform: this.getTransform(),
    });
  }

  drawEllipse(center: Point2D, radiusX: number, radiusY: number): void {
    this.record({
      type: "ellipse",
      center: { x: center.x, y: center.y },
      radiusX,
      radiusY,
      style: this.getStyle(),
      transform: this.getTransform(),
    });
  }

  drawPath(path: PlantPath): void {
    this.record({
      type: "path",
      segments: path.segments.map((segment) => ({ ...segment })),
      data: path.toSvgPathData(),
      style: this.getStyle(),
      transform: this.getTransform(),
    });
  }

  /**
   * Shapes of one type, in drawing order.
   */
  shapesOfType<T extends RecordedShape["type"]>(
    type: T,
  ): Extract<RecordedShape, { type: T }>[] {
    return this.shapes.filter(
      (shape): shape is Extract<RecordedShape, { type: T }> =>
        shape.type === type,
    );
  }

  /** Forget everything recorded so far; the transform state is kept. */
  clear(): void {
    this.calls.length = 0;
    this.shapes.length = 0;
  }

  private record(shape: RecordedShape): void {
    this.shapes.push(shape);
    this.calls.push({ op: "draw", shape });
  }
}

/**
 * Polygon vertices in surface pixels.
 */
export function devicePoints(polygon: RecordedPolygon): Point2D[] {
  return polygon.points.map((p) => applyAffine(polygon.transform, p));
}

/**
 * Centre of an ellipse in surface pixels.
 */
export function deviceCenter(ellipse: RecordedEllipse): Point2D {
  return applyAffine(ellipse.transform, ellipse.center);
}

/**
 * Path builder for leaves, stems and petals.
 *
 * Paths start at the origin of the current coordinate system, are filled
 * with the non-zero winding rule and are implicitly closed when filled.
 */

import type { Point2D } from "../types.js";

export type PathSegment =
  | { type: "move"; to: Point2D }
  | { type: "line"; to: Point2D }
  | { type: "quad"; control: Point2D; to: Point2D }
  | { type: "cubic"; control1: Point2D; control2: Point2D; to: Point2D };

export class PlantPath {
  private readonly segmentList: PathSegment[] = [];
  private cursor: Point2D = { x: 0, y: 0 };

  get segments(): readonly PathSegment[] {
    return this.segmentList;
  }

  /** End point of the last segment */
  get currentPoint(): Point2D {
    return { ...this.cursor };
  }

  moveTo(x: number, y: number): this {
    this.cursor = { x, y };
    this.segmentList.push({ type: "move", to: { x, y } });
    return this;
  }

  lineTo(x: number, y: number): this {
    this.cursor = { x, y };
    this.segmentList.push({ type: "line", to: { x, y } });
    return this;
  }

  quadTo(cx: number, cy: number, x: number, y: number): this {
    this.cursor = { x, y };
    this.segmentList.push({
      type: "quad",
      control: { x: cx, y: cy },
      to: { x, y },
    });
    return this;
  }

  cubicTo(
    c1x: number,
    c1y: number,
    c2x: number,
    c2y: number,
    x: number,
    y: number,
  ): this {
    this.cursor = { x, y };
    this.segmentList.push({
      type: "cubic",
      control1: { x: c1x, y: c1y },
      control2: { x: c2x, y: c2y },
      to: { x, y },
    });
    return this;
  }

  /**
   * Every point the path references (end and control points), starting
   * with the implicit origin.
   */
  getPoints(): Point2D[] {
    const points: Point2D[] = [{ x: 0, y: 0 }];
    for (const segment of this.segmentList) {
      switch (segment.type) {
        case "move":
        case "line":
          points.push(segment.to);
          break;
        case "quad":
          points.push(segment.control, segment.to);
          break;
        case "cubic":
          points.push(segment.control1, segment.control2, segment.to);
          break;
      }
    }
    return points;
  }

  /**
   * SVG path data (`d` attribute).
   */
  toSvgPathData(format: (value: number) => string = String): string {
    const pt = (p: Point2D): string => `${format(p.x)} ${format(p.y)}`;
    const parts: string[] = [];

    if (this.segmentList[0]?.type !== "move") {
      parts.push("M0 0");
    }

    for (const segment of this.segmentList) {
      switch (segment.type) {
        case "move":
          parts.push(`M${pt(segment.to)}`);
          break;
        case "line":
          parts.push(`L${pt(segment.to)}`);
          break;
        case "quad":
          parts.push(`Q${pt(segment.control)} ${pt(segment.to)}`);
          break;
        case "cubic":
          parts.push(
            `C${pt(segment.control1)} ${pt(segment.control2)} ${pt(segment.to)}`,
          );
          break;
      }
    }

    return parts.join(" ");
  }
}

/**
 * Surface that writes an SVG document.
 *
 * Each shape becomes one element carrying its own `transform`, so the
 * output is a flat list in drawing order.
 */

import type { Point2D } from "../types.js";
import { colorToHex } from "../params/palette.js";
import type { PlantPath } from "./PlantPath.js";
import { TransformStack } from "./TransformStack.js";
import type { AffineMatrix, ShapeStyle } from "./types.js";

export interface SvgSurfaceOptions {
  /** Decimal places kept for coordinates */
  precision?: number;
  /** Optional background colour drawn behind everything */
  background?: string | null;
}

export class SvgSurface extends TransformStack {
  private readonly elements: string[] = [];
  private readonly precision: number;
  private readonly background: string | null;

  constructor(
    readonly width: number,
    readonly height: number,
    options: SvgSurfaceOptions = {},
  ) {
    super();
    this.precision = options.precision ?? 3;
    this.background = options.background ?? null;
  }

  /** Number of shape elements written so far */
  get elementCount(): number {
    return this.elements.length;
  }

  drawPolygon(points: readonly Point2D[]): void {
    const list = points
      .map((p) => `${this.num(p.x)},${this.num(p.y)}`)
      .join(" ");
    this.push(`<polygon points="${list}"`);
  }

  drawEllipse(center: Point2D, radiusX: number, radiusY: number): void {
    this.push(
      `<ellipse cx="${this.num(center.x)}" cy="${this.num(center.y)}" rx="${this.num(Math.abs(radiusX))}" ry="${this.num(Math.abs(radiusY))}"`,
    );
  }

  drawPath(path: PlantPath): void {
    const data = path.toSvgPathData((value) => this.num(value));
    this.push(`<path d="${data}" fill-rule="nonzero"`);
  }

  /**
   * The complete SVG document.
   */
  override toString(): string {
    const w = this.num(this.width);
    const h = this.num(this.height);
    const lines = [
      `<svg xmlns="http://www.w3.org/2000/svg" width="${w}" height="${h}" viewBox="0 0 ${w} ${h}">`,
    ];
    if (this.background) {
      lines.push(
        `<rect x="0" y="0" width="${w}" height="${h}" fill="${this.background}"/>`,
      );
    }
    lines.push(...this.elements, "</svg>");
    return lines.join("\n");
  }

  private push(open: string): void {
    this.elements.push(
      `${open}${this.styleAttributes(this.getStyle())} transform="${this.matrix(this.getTransform())}"/>`,
    );
  }

  private styleAttributes(style: ShapeStyle): string {
    const fill = style.fill ? colorToHex(style.fill) : "none";
    if (!style.stroke) {
      return ` fill="${fill}" stroke="none"`;
    }
    return ` fill="${fill}" stroke="${colorToHex(style.stroke)}" stroke-width="${this.num(style.strokeWidth)}"`;
  }

  private matrix(m: AffineMatrix): string {
    return `matrix(${m.map((value) => this.num(value)).join(" ")})`;
  }

  private num(value: number): string {
    const rounded = Number(value.toFixed(this.precision));
    // Avoids "-0" in the output
    return String(rounded === 0 ? 0 : rounded);
  }
}

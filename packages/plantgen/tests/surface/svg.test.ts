/**
 * SvgSurface tests
 */

import { describe, it, expect } from "vitest";
import { SvgSurface } from "../../src/surface/SvgSurface.js";
import { PlantPath } from "../../src/surface/PlantPath.js";

const HEADER =
  '<svg xmlns="http://www.w3.org/2000/svg" width="100" height="50" viewBox="0 0 100 50">';

describe("SvgSurface", () => {
  it("writes an empty document", () => {
    const surface = new SvgSurface(100, 50);

    expect(surface.elementCount).toBe(0);
    expect(surface.toString()).toBe(`${HEADER}\n</svg>`);
  });

  it("writes a filled polygon with rounded coordinates", () => {
    const surface = new SvgSurface(100, 50);
    surface.setFill({ r: 255, g: 0, b: 0 });
    surface.drawPolygon([
      { x: 0, y: 0 },
      { x: 10, y: 0 },
      { x: 5, y: 8.12345 },
    ]);

    expect(surface.toString()).toBe(
      [
        HEADER,
        '<polygon points="0,0 10,0 5,8.123" fill="#ff0000" stroke="none" transform="matrix(1 0 0 1 0 0)"/>',
        "</svg>",
      ].join("\n"),
    );
  });

  it("writes an outlined ellipse with its transform", () => {
    const surface = new SvgSurface(100, 50);
    surface.setFill(null);
    surface.setStroke({ r: 0, g: 0, b: 255 }, 2.5);
    surface.translate(3, 4);
    surface.drawEllipse({ x: 1, y: 2 }, -5, 6);

    expect(surface.toString().split("\n")[1]).toBe(
      '<ellipse cx="1" cy="2" rx="5" ry="6" fill="none" stroke="#0000ff" stroke-width="2.5" transform="matrix(1 0 0 1 3 4)"/>',
    );
  });

  it("writes paths with the non-zero fill rule", () => {
    const surface = new SvgSurface(100, 50);
    surface.setFill({ r: 0, g: 119, b: 0 });
    surface.drawPath(new PlantPath().quadTo(1, 2, 3, 4));

    expect(surface.toString().split("\n")[1]).toBe(
      '<path d="M0 0 Q1 2 3 4" fill-rule="nonzero" fill="#007700" stroke="none" transform="matrix(1 0 0 1 0 0)"/>',
    );
  });

  it("never writes negative zero", () => {
    const surface = new SvgSurface(100, 50);
    surface.translate(-0.0001, 0);
    surface.drawEllipse({ x: -0.0002, y: 0 }, 1, 1);

    expect(surface.toString().split("\n")[1]).toBe(
      '<ellipse cx="0" cy="0" rx="1" ry="1" fill="none" stroke="none" transform="matrix(1 0 0 1 0 0)"/>',
    );
  });

  it("draws a background behind every shape", () => {
    const surface = new SvgSurface(10, 10, { background: "#fff" });
    surface.drawEllipse({ x: 5, y: 5 }, 1, 1);

    const lines = surface.toString().split("\n");
    expect(lines[1]).toBe('<rect x="0" y="0" width="10" height="10" fill="#fff"/>');
    expect(lines).toHaveLength(4);
    expect(surface.elementCount).toBe(1);
  });

  it("keeps the requested precision", () => {
    const surface = new SvgSurface(100, 50, { precision: 1 });
    surface.drawEllipse({ x: 1.26, y: 0 }, 1, 1);

    expect(surface.toString().split("\n")[1]).toContain('cx="1.3"');
  });
});

/**
 * Flower family tests
 */

import { describe, it, expect } from "vitest";
import { SeededRandom } from "../../src/math/Random.js";
import { computeGrowthState } from "../../src/math/Growth.js";
import { degrees } from "../../src/math/Polar.js";
import { DEFAULT_PLANT_PALETTE, PETAL_COLORS } from "../../src/params/palette.js";
import { renderPlant } from "../../src/rendering/PlantRenderer.js";
import {
  RecordingSurface,
  type SurfaceCall,
} from "../../src/surface/RecordingSurface.js";
import {
  PETAL_PATHS,
  generateCircularFlowerParams,
  generateFlowerParams,
} from "../../src/variants/index.js";
import type {
  CircularFlowerParams,
  FlowerParams,
  PlantParams,
} from "../../src/types.js";

function record(params: PlantParams, age: number): RecordingSurface {
  const surface = new RecordingSurface();
  renderPlant(surface, params, computeGrowthState(age), 300, 300);
  return surface;
}

function rotations(calls: SurfaceCall[]): number[] {
  return calls.flatMap((call) => (call.op === "rotate" ? [call.degrees] : []));
}

const flower: FlowerParams = {
  kind: "flower",
  deficit: 1,
  xLean: 0.5,
  leaves: [
    { position: 0.3, size: 1, side: -1 },
    { position: 0.35, size: 1, side: 1 },
  ],
  stemWidth: 4,
};

const dipFlower: CircularFlowerParams = {
  ...flower,
  kind: "circular-flower",
  petalColor: { r: 255, g: 85, b: 85 },
  petalCount: 5,
  centerRatio: 0.8,
  petalShape: "dip",
};

describe("flower parameters", () => {
  it("keeps stem and leaves within their ranges", () => {
    for (let seed = 1; seed <= 50; seed++) {
      const params = generateFlowerParams(new SeededRandom(seed));

      expect(Math.abs(params.xLean)).toBeGreaterThanOrEqual(0.4);
      expect(Math.abs(params.xLean)).toBeLessThan(1);
      expect(params.stemWidth).toBeGreaterThanOrEqual(3.5);
      expect(params.stemWidth).toBeLessThan(4);
      expect(params.leaves.map((leaf) => leaf.side)).toEqual([-1, 1]);

      for (const leaf of params.leaves) {
        expect(leaf.position).toBeGreaterThanOrEqual(0.25 * params.deficit);
        expect(leaf.position).toBeLessThan(0.4 * params.deficit);
        expect(leaf.size).toBeGreaterThanOrEqual(0.9);
        expect(leaf.size).toBeLessThan(1.1);
      }
    }
  });

  it("picks petal colour, count and shape", () => {
    for (let seed = 1; seed <= 100; seed++) {
      const params = generateCircularFlowerParams(new SeededRandom(seed));

      expect(PETAL_COLORS).toContainEqual(params.petalColor);
      expect([5, 6, 7]).toContain(params.petalCount);
      expect(params.centerRatio).toBeGreaterThanOrEqual(0.75);
      expect(params.centerRatio).toBeLessThan(0.85);

      if (params.petalShape === "dip" || params.petalShape === "round") {
        expect(params.petalCount).toBe(5);
      }
    }
  });

  it("does not share the palette colour object", () => {
    const params = generateCircularFlowerParams(new SeededRandom(3));
    params.petalColor.r = -1;

    expect(PETAL_COLORS.every((color) => color.r >= 0)).toBe(true);
  });
});

describe("flower", () => {
  it("strokes the stem to the leaning top", () => {
    const surface = record(flower, 15);
    const [stem] = surface.shapesOfType("path");

    // smooth = 0.5: top at (300 / 9 * 0.5 * 0.5, 300 / 2.5 * 0.5)
    const x = (300 / 9) * 0.25;
    expect(stem?.style.fill).toBeNull();
    expect(stem?.style.stroke).toEqual(DEFAULT_PLANT_PALETTE.foliage);
    expect(stem?.style.strokeWidth).toBe(2);
    expect(stem?.segments).toEqual([
      { type: "quad", control: { x: 0, y: 36 }, to: { x, y: 60 } },
    ]);
  });

  it("tilts leaves to follow the stem", () => {
    const surface = record(flower, 15);
    const x = (300 / 9) * 0.25;
    const tilt = -degrees(Math.sin(x / 60));

    expect(rotations(surface.calls)).toEqual([
      degrees(-1),
      tilt,
      degrees(1),
      tilt,
    ]);
  });

  it("mirrors only the left leaf", () => {
    const surface = record(flower, 15);
    const mirrors = surface.calls.filter(
      (call) => call.op === "scale" && call.x === -1,
    );

    expect(mirrors).toHaveLength(1);
  });

  it("skips the leaf tilt when the stem has no height", () => {
    const surface = record(flower, 0);

    expect(rotations(surface.calls)).toEqual([degrees(-1), degrees(1)]);
  });
});

describe("circular flower", () => {
  it("turns 72 degrees between five dip petals", () => {
    const surface = record(dipFlower, 15);
    const petalTurns = rotations(surface.calls).slice(-5);

    expect(petalTurns).toEqual([72, 72, 72, 72, 72]);
  });

  it("draws stem, leaves, petals, then the centre disk", () => {
    const surface = record(dipFlower, 15);

    expect(surface.shapes.map((s) => s.type)).toEqual([
      "path",
      "path",
      "path",
      "path",
      "path",
      "path",
      "path",
      "path",
      "ellipse",
    ]);

    const petals = surface.shapesOfType("path").slice(3);
    for (const petal of petals) {
      expect(petal.style.fill).toEqual(dipFlower.petalColor);
    }
  });

  it("uses the petal shape at the current size", () => {
    const surface = record(dipFlower, 15);
    const [, , , petal] = surface.shapesOfType("path");
    const size = (300 / 9) * 0.5;

    expect(petal?.data).toBe(PETAL_PATHS.dip(size).toSvgPathData());
  });

  it("sizes the centre disk from the petal size", () => {
    const [disk] = record(dipFlower, 15).shapesOfType("ellipse");
    const size = (300 / 9) * 0.5;

    expect(disk?.style.fill).toEqual(DEFAULT_PLANT_PALETTE.flowerCenter);
    expect(disk?.radiusX).toBeCloseTo((size * 0.8) / 2, 9);
    expect(disk?.center).toEqual({ x: 0, y: 0 });
  });

  it("centres the petals on the stem top", () => {
    const surface = record(dipFlower, 15);
    const [disk] = surface.shapesOfType("ellipse");

    // the y axis is flipped, so the top sits 60 units above the bottom edge
    const x = (300 / 9) * 0.25;
    expect(disk?.transform[4]).toBeCloseTo(150 + x, 9);
    expect(disk?.transform[5]).toBeCloseTo(300 - 60, 9);
  });
});

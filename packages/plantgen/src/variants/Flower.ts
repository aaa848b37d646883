/**
 * Flower
 *
 * A curved stem with two teardrop leaves. The stem top leans left or right.
 */

import type {
  FlowerLikeParams,
  FlowerParams,
  Leaf,
  Point2D,
} from "../types.js";
import type { SeededRandom } from "../math/Random.js";
import { createStemCurve } from "../math/Curve.js";
import { degrees } from "../math/Polar.js";
import { FLOWER_PROPORTIONS, PARAMETER_RANGES } from "../params/proportions.js";
import { PlantPath } from "../surface/PlantPath.js";
import { generateDeficit, type DrawContext } from "./context.js";

/**
 * Stem and leaf parameters shared by every flower.
 */
export function generateFlowerFields(
  rng: SeededRandom,
  deficit: number,
): Pick<FlowerParams, "xLean" | "leaves" | "stemWidth"> {
  const xLean = rng.uniform(...PARAMETER_RANGES.xLean) * rng.sign();

  const [minPosition, maxPosition] = PARAMETER_RANGES.leafPosition;
  const leaves: Leaf[] = [];
  for (let i = 0; i < 2; i++) {
    leaves.push({
      position: rng.uniform(deficit * minPosition, deficit * maxPosition),
      size: rng.uniform(...PARAMETER_RANGES.leafSize),
      side: i === 0 ? -1 : 1,
    });
  }

  const stemWidth = rng.uniform(...PARAMETER_RANGES.stemWidth);

  return { xLean, leaves, stemWidth };
}

export function generateFlowerParams(rng: SeededRandom): FlowerParams {
  const deficit = generateDeficit(rng);
  return { kind: "flower", deficit, ...generateFlowerFields(rng, deficit) };
}

/**
 * Position of the top of the stem, where the flower head sits.
 */
export function flowerTop(params: FlowerLikeParams, ctx: DrawContext): Point2D {
  const { growth, width, height } = ctx;
  return {
    x: (width / FLOWER_PROPORTIONS.centerX) * params.xLean * growth.smooth,
    y: (height / FLOWER_PROPORTIONS.centerY) * params.deficit * growth.smooth,
  };
}

/**
 * Teardrop leaf pointing along +y.
 */
export function leafPath(size: number): PlantPath {
  return new PlantPath()
    .quadTo(0.4 * size, 0.5 * size, 0, size)
    .cubicTo(0, 0.5 * size, -0.4 * size, 0.4 * size, 0, 0);
}

/**
 * Draw the stem and leaves.
 *
 * @returns the top of the stem
 */
export function drawFlower(params: FlowerLikeParams, ctx: DrawContext): Point2D {
  const { surface, growth, width } = ctx;
  const { x, y } = flowerTop(params, ctx);
  const stem = createStemCurve(x, y);

  surface.setFill(null);
  surface.setStroke(ctx.palette.foliage, params.stemWidth * growth.smooth);
  surface.drawPath(
    new PlantPath().quadTo(stem.control.x, stem.control.y, x, y),
  );

  const leafSize =
    (width / FLOWER_PROPORTIONS.leafSize) * params.deficit * growth.smooth ** 2;

  for (const leaf of params.leaves) {
    surface.save();

    const anchor = stem.pointAtPercent(leaf.position);
    surface.translate(anchor.x, anchor.y);
    surface.rotate(degrees(leaf.side));

    // follow the lean of the stem
    if (y !== 0) {
      surface.rotate(-degrees(Math.sin(x / y)));
    }

    // mirror the left leaf so both face the same way
    if (leaf.side < 0) {
      surface.scale(-1, 1);
    }

    surface.setStroke(null);
    surface.setFill(ctx.palette.foliage);
    surface.drawPath(leafPath(leafSize * leaf.size));

    surface.restore();
  }

  return { x, y };
}

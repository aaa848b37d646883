/**
 * Circular Flower
 *
 * A flower with petals arranged evenly around its head and a disk covering
 * the point where they meet.
 */

import type { CircularFlowerParams } from "../types.js";
import { PETAL_SHAPES } from "../types.js";
import type { SeededRandom } from "../math/Random.js";
import { FLOWER_PROPORTIONS, PARAMETER_RANGES } from "../params/proportions.js";
import { PETAL_COLORS } from "../params/palette.js";
import { generateDeficit, type DrawContext } from "./context.js";
import { drawFlower, generateFlowerFields } from "./Flower.js";
import { FIVE_PETAL_SHAPES, PETAL_PATHS } from "./petals.js";

export function generateCircularFlowerParams(
  rng: SeededRandom,
): CircularFlowerParams {
  const deficit = generateDeficit(rng);
  const flower = generateFlowerFields(rng, deficit);

  const petalColor = { ...rng.choice(PETAL_COLORS) };
  let petalCount = rng.randint(...PARAMETER_RANGES.petalCount);
  const centerRatio = rng.uniform(...PARAMETER_RANGES.centerRatio);
  const petalShape = rng.choice(PETAL_SHAPES);

  if (FIVE_PETAL_SHAPES.includes(petalShape)) {
    petalCount = 5;
  }

  return {
    kind: "circular-flower",
    deficit,
    ...flower,
    petalColor,
    petalCount,
    centerRatio,
    petalShape,
  };
}

/**
 * Petal size at the current growth.
 */
export function petalSize(params: CircularFlowerParams, ctx: DrawContext): number {
  return (
    (ctx.width / FLOWER_PROPORTIONS.petalSize) *
    params.deficit *
    ctx.growth.smooth
  );
}

export function drawCircularFlower(
  params: CircularFlowerParams,
  ctx: DrawContext,
): void {
  const { surface } = ctx;
  const top = drawFlower(params, ctx);

  surface.save();
  surface.translate(top.x, top.y);

  surface.setStroke(null);
  surface.setFill(params.petalColor);

  const size = petalSize(params, ctx);
  const petal = PETAL_PATHS[params.petalShape];
  const step = 360 / params.petalCount;

  for (let i = 0; i < params.petalCount; i++) {
    surface.drawPath(petal(size));
    surface.rotate(step);
  }

  // centerRatio scales the disk's diameter
  const centerSize = size * params.centerRatio;
  surface.setFill(ctx.palette.flowerCenter);
  surface.drawEllipse({ x: 0, y: 0 }, centerSize / 2, centerSize / 2);

  surface.restore();
}

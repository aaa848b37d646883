/**
 * Orange Tree
 *
 * Always two branches, each carrying a round fruit, plus a larger fruit on
 * the trunk. The fruit sits behind the trunk and branches.
 */

import type { FruitPlacement, OrangeTreeParams } from "../types.js";
import type { SeededRandom } from "../math/Random.js";
import { degrees } from "../math/Polar.js";
import { FRUIT_PROPORTIONS, PARAMETER_RANGES } from "../params/proportions.js";
import { generateDeficit, type DrawContext } from "./context.js";
import {
  branchHeight,
  branchOrigin,
  drawTree,
  generateBranches,
  trunkHeight,
} from "./Tree.js";

export function generateOrangeTreeParams(rng: SeededRandom): OrangeTreeParams {
  const deficit = generateDeficit(rng);
  const branches = generateBranches(rng, deficit, 2);

  const [minSize, maxSize] = PARAMETER_RANGES.fruitSize;
  const [minPosition, maxPosition] = PARAMETER_RANGES.fruitPosition;
  const fruits: FruitPlacement[] = [];

  // one per branch, the last one for the trunk
  for (let i = 0; i <= branches.length; i++) {
    fruits.push({
      size: rng.uniform(deficit * minSize, deficit * maxSize),
      position: rng.uniform(deficit * minPosition, deficit * maxPosition),
    });
  }

  return { kind: "orange-tree", deficit, branches, fruits };
}

/**
 * Radius of the fruit on a branch.
 */
export function branchFruitRadius(
  fruit: FruitPlacement,
  branchHeightFraction: number,
  ctx: DrawContext,
): number {
  const { growth, width, height } = ctx;
  return (
    ((width + height) / 2) *
    fruit.size *
    growth.slowGrowth *
    (1 - branchHeightFraction) *
    growth.growth
  );
}

/**
 * Radius of the main fruit on the trunk, sized by the topmost branch.
 */
export function mainFruitRadius(
  fruit: FruitPlacement,
  lastBranchHeight: number,
  ctx: DrawContext,
): number {
  const { growth, width, height } = ctx;
  return (
    ((width + height) / 2) *
    fruit.size *
    growth.growth *
    (1 - lastBranchHeight) *
    FRUIT_PROPORTIONS.mainEnlargement
  );
}

function drawFruit(params: OrangeTreeParams, ctx: DrawContext): void {
  const { surface, growth, height } = ctx;
  const { deficit, branches, fruits } = params;

  surface.setStroke(null);
  surface.setFill(ctx.palette.fruit);

  branches.forEach((branch, i) => {
    const fruit = fruits[i];
    if (!fruit) return;

    surface.save();

    surface.translate(0, branchOrigin(branch, deficit, ctx));
    surface.rotate(degrees(branch.rotation));

    const topOfBranch =
      branchHeight(height, deficit) * growth.slowSmooth * (1 - branch.height);
    const radius = branchFruitRadius(fruit, branch.height, ctx);

    surface.drawEllipse({ x: 0, y: topOfBranch * fruit.position }, radius, radius);

    surface.restore();
  });

  const main = fruits[fruits.length - 1];
  const lastBranch = branches[branches.length - 1];
  if (!main || !lastBranch) return;

  const topOfTrunk = trunkHeight(height, deficit) * growth.smooth;
  const radius = mainFruitRadius(main, lastBranch.height, ctx);

  surface.drawEllipse({ x: 0, y: topOfTrunk * main.position }, radius, radius);
}

export function drawOrangeTree(
  params: OrangeTreeParams,
  ctx: DrawContext,
): void {
  drawFruit(params, ctx);
  drawTree(params, ctx);
}

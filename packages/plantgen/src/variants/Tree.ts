/**
 * Tree
 *
 * A triangular trunk with one or two triangular branches. Branch size
 * follows the slow growth coefficient so branches trail the trunk.
 */

import type { Branch, TreeLikeParams, TreeParams } from "../types.js";
import type { SeededRandom } from "../math/Random.js";
import { degrees } from "../math/Polar.js";
import { PARAMETER_RANGES, TREE_PROPORTIONS } from "../params/proportions.js";
import { generateDeficit, type DrawContext } from "./context.js";

/**
 * Branches along the trunk. With two branches one goes left and one right;
 * a single branch picks its side at random.
 */
export function generateBranches(
  rng: SeededRandom,
  deficit: number,
  count: number,
): Branch[] {
  const [minHeight, maxHeight] = PARAMETER_RANGES.branchHeight;
  const branches: Branch[] = [];

  for (let i = 0; i < count; i++) {
    const height = rng.uniform(deficit * minHeight, deficit * maxHeight);
    const side = count === 2 ? (i === 0 ? -1 : 1) : rng.sign();
    const rotation =
      side * Math.acos(rng.uniform(...PARAMETER_RANGES.branchCosine));

    branches.push({ height, rotation });
  }

  return branches;
}

/**
 * Deficit plus one or two branches.
 */
export function generateTreeBase(rng: SeededRandom): {
  deficit: number;
  branches: Branch[];
} {
  const deficit = generateDeficit(rng);
  const count = Math.round(rng.uniform(...PARAMETER_RANGES.branchCount));
  return { deficit, branches: generateBranches(rng, deficit, count) };
}

export function generateTreeParams(rng: SeededRandom): TreeParams {
  return { kind: "tree", ...generateTreeBase(rng) };
}

/** Trunk half-width at full growth */
export function trunkWidth(width: number, deficit: number): number {
  return (width / TREE_PROPORTIONS.trunkWidth) * deficit;
}

/** Trunk height for a (possibly partial) canvas height */
export function trunkHeight(height: number, deficit: number): number {
  return (height / TREE_PROPORTIONS.trunkHeight) * deficit;
}

export function branchWidth(width: number, deficit: number): number {
  return (width / TREE_PROPORTIONS.branchWidth) * deficit;
}

export function branchHeight(height: number, deficit: number): number {
  return (height / TREE_PROPORTIONS.branchHeight) * deficit;
}

/**
 * Height on the trunk where a branch grows from.
 */
export function branchOrigin(
  branch: Branch,
  deficit: number,
  ctx: DrawContext,
): number {
  return trunkHeight(ctx.height * branch.height * ctx.growth.smooth, deficit);
}

/**
 * Draw the trunk and branches of any tree variant.
 */
export function drawTree(params: TreeLikeParams, ctx: DrawContext): void {
  const { surface, growth, width, height } = ctx;
  const { deficit } = params;

  surface.setStroke(null);
  surface.setFill(ctx.palette.bark);

  const halfWidth = trunkWidth(width, deficit) * growth.smooth;
  surface.drawPolygon([
    { x: -halfWidth, y: 0 },
    { x: halfWidth, y: 0 },
    { x: 0, y: trunkHeight(height, deficit) * growth.smooth },
  ]);

  for (const branch of params.branches) {
    surface.save();

    surface.translate(0, branchOrigin(branch, deficit, ctx));
    surface.rotate(degrees(branch.rotation));

    // higher branches are smaller
    const size = growth.slowSmooth * (1 - branch.height);
    const branchHalfWidth = branchWidth(width, deficit) * size;

    surface.drawPolygon([
      { x: -branchHalfWidth, y: 0 },
      { x: branchHalfWidth, y: 0 },
      { x: 0, y: branchHeight(height, deficit) * size },
    ]);

    surface.restore();
  }
}

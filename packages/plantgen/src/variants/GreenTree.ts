/**
 * Green Trees
 *
 * Spruce-like trees: a triangular canopy behind the trunk, optionally with
 * a second, narrower triangle stacked above it.
 */

import type {
  DoubleGreenTreeParams,
  GreenTreeParams,
} from "../types.js";
import type { SeededRandom } from "../math/Random.js";
import { CANOPY_PROPORTIONS } from "../params/proportions.js";
import type { DrawContext } from "./context.js";
import { drawTree, generateTreeBase, trunkHeight } from "./Tree.js";

export function generateGreenTreeParams(rng: SeededRandom): GreenTreeParams {
  return { kind: "green-tree", ...generateTreeBase(rng) };
}

export function generateDoubleGreenTreeParams(
  rng: SeededRandom,
): DoubleGreenTreeParams {
  return { kind: "double-green-tree", ...generateTreeBase(rng) };
}

function canopyWidth(width: number, deficit: number): number {
  return (width / CANOPY_PROPORTIONS.outerWidth) * deficit;
}

function canopyHeight(height: number, deficit: number): number {
  return (height / CANOPY_PROPORTIONS.outerHeight) * deficit;
}

function innerCanopyWidth(width: number, deficit: number): number {
  return (width / CANOPY_PROPORTIONS.innerWidth) * deficit;
}

function innerCanopyHeight(height: number, deficit: number): number {
  return (height / CANOPY_PROPORTIONS.innerHeight) * deficit;
}

/**
 * Height of the canopy base above the ground, never above the ceiling.
 */
export function canopyOffset(deficit: number, ctx: DrawContext): number {
  const { height, growth } = ctx;
  return Math.min(
    height * CANOPY_PROPORTIONS.ceiling,
    trunkHeight(height * CANOPY_PROPORTIONS.baseOffset * growth.smooth, deficit),
  );
}

function drawCanopy(
  params: GreenTreeParams | DoubleGreenTreeParams,
  ctx: DrawContext,
): void {
  const { surface, growth, width, height } = ctx;
  const { deficit } = params;
  const offset = canopyOffset(deficit, ctx);
  const halfWidth = canopyWidth(width, deficit) * growth.smooth;

  surface.setStroke(null);
  surface.setFill(ctx.palette.foliage);
  surface.drawPolygon([
    { x: -halfWidth, y: offset },
    { x: halfWidth, y: offset },
    { x: 0, y: canopyHeight(height, deficit) * growth.smooth + offset },
  ]);
}

function drawInnerCanopy(
  params: DoubleGreenTreeParams,
  ctx: DrawContext,
): void {
  const { surface, growth, width, height } = ctx;
  const { deficit } = params;

  // sits on top of the outer canopy's lower part, so it starts higher up
  const base =
    trunkHeight(height * CANOPY_PROPORTIONS.baseOffset * growth.smooth, deficit) +
    (canopyHeight(height, deficit) - innerCanopyHeight(height, deficit)) *
      growth.smooth;
  const halfWidth = innerCanopyWidth(width, deficit) * growth.smooth ** 2;
  const apex = Math.min(
    innerCanopyHeight(height, deficit) * growth.smooth + base,
    height * CANOPY_PROPORTIONS.ceiling,
  );

  surface.setStroke(null);
  surface.setFill(ctx.palette.foliage);
  surface.drawPolygon([
    { x: -halfWidth, y: base },
    { x: halfWidth, y: base },
    { x: 0, y: apex },
  ]);
}

export function drawGreenTree(
  params: GreenTreeParams | DoubleGreenTreeParams,
  ctx: DrawContext,
): void {
  drawCanopy(params, ctx);
  drawTree(params, ctx);
}

export function drawDoubleGreenTree(
  params: DoubleGreenTreeParams,
  ctx: DrawContext,
): void {
  drawInnerCanopy(params, ctx);
  drawGreenTree(params, ctx);
}

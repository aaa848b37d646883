/**
 * Plant variants
 *
 * Parameter generation and geometry for every plant kind, dispatched on the
 * `kind` tag of the parameter record.
 */

import type { PlantKind, PlantParams, PlantParamsOf } from "../types.js";
import type { SeededRandom } from "../math/Random.js";
import type { DrawContext } from "./context.js";
import { drawTree, generateTreeParams } from "./Tree.js";
import { drawOrangeTree, generateOrangeTreeParams } from "./OrangeTree.js";
import {
  drawDoubleGreenTree,
  drawGreenTree,
  generateDoubleGreenTreeParams,
  generateGreenTreeParams,
} from "./GreenTree.js";
import { drawFlower, generateFlowerParams } from "./Flower.js";
import {
  drawCircularFlower,
  generateCircularFlowerParams,
} from "./CircularFlower.js";

/**
 * Draw every random parameter of a plant of the given kind.
 */
export function generatePlantParams<K extends PlantKind>(
  kind: K,
  rng: SeededRandom,
): PlantParamsOf<K>;
export function generatePlantParams(
  kind: PlantKind,
  rng: SeededRandom,
): PlantParams {
  switch (kind) {
    case "tree":
      return generateTreeParams(rng);
    case "orange-tree":
      return generateOrangeTreeParams(rng);
    case "green-tree":
      return generateGreenTreeParams(rng);
    case "double-green-tree":
      return generateDoubleGreenTreeParams(rng);
    case "flower":
      return generateFlowerParams(rng);
    case "circular-flower":
      return generateCircularFlowerParams(rng);
  }
}

/**
 * Emit the shapes of a plant in plant-local coordinates.
 */
export function drawPlantGeometry(params: PlantParams, ctx: DrawContext): void {
  switch (params.kind) {
    case "tree":
      drawTree(params, ctx);
      return;
    case "orange-tree":
      drawOrangeTree(params, ctx);
      return;
    case "green-tree":
      drawGreenTree(params, ctx);
      return;
    case "double-green-tree":
      drawDoubleGreenTree(params, ctx);
      return;
    case "flower":
      drawFlower(params, ctx);
      return;
    case "circular-flower":
      drawCircularFlower(params, ctx);
      return;
  }
}

export { generateDeficit, type DrawContext } from "./context.js";
export {
  generateTreeParams,
  generateTreeBase,
  generateBranches,
  drawTree,
  trunkWidth,
  trunkHeight,
  branchWidth,
  branchHeight,
  branchOrigin,
} from "./Tree.js";
export {
  generateOrangeTreeParams,
  drawOrangeTree,
  branchFruitRadius,
  mainFruitRadius,
} from "./OrangeTree.js";
export {
  generateGreenTreeParams,
  generateDoubleGreenTreeParams,
  drawGreenTree,
  drawDoubleGreenTree,
  canopyOffset,
} from "./GreenTree.js";
export {
  generateFlowerParams,
  generateFlowerFields,
  drawFlower,
  flowerTop,
  leafPath,
} from "./Flower.js";
export {
  generateCircularFlowerParams,
  drawCircularFlower,
  petalSize,
} from "./CircularFlower.js";
export {
  PETAL_PATHS,
  FIVE_PETAL_SHAPES,
  triangularPetal,
  circularPetal,
  roundPetal,
  dipPetal,
} from "./petals.js";

/**
 * @studygarden/plantgen
 *
 * Procedural plants for a study timer: a seed picks a plant, an age in
 * minutes decides how grown it is, and a surface receives the vector shapes.
 *
 * @example
 * ```typescript
 * import { createPlant, exportToSVG } from "@studygarden/plantgen";
 *
 * const plant = createPlant("orange-tree", { seed: 7 });
 * plant.setAge(45);
 * const { data } = exportToSVG(plant, { width: 400, height: 400 });
 * ```
 *
 * @packageDocumentation
 */

export * from "./types.js";
export * from "./math/index.js";
export * from "./params/index.js";
export * from "./surface/index.js";
export * from "./variants/index.js";
export * from "./rendering/index.js";
export * from "./record/index.js";
export * from "./export/index.js";
export {
  Plant,
  createPlant,
  scrubAge,
  type CreatePlantOptions,
  type PlantOptions,
} from "./Plant.js";

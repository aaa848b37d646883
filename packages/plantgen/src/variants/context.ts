import type { GrowthState } from "../types.js";
import type { SeededRandom } from "../math/Random.js";
import type { PlantPalette } from "../params/palette.js";
import { PARAMETER_RANGES } from "../params/proportions.js";
import type { DrawableSurface } from "../surface/types.js";

/**
 * Everything a variant needs to draw itself.
 *
 * Coordinates are plant-local: origin at the bottom centre, y pointing up.
 */
export interface DrawContext {
  surface: DrawableSurface;
  growth: GrowthState;
  /** Effective width (the smaller canvas dimension) */
  width: number;
  /** Effective height (the smaller canvas dimension) */
  height: number;
  palette: PlantPalette;
}

/**
 * Per-plant size jitter. Always the first draw of a plant.
 */
export function generateDeficit(rng: SeededRandom): number {
  return rng.uniform(...PARAMETER_RANGES.deficit);
}

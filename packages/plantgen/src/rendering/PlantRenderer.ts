/**
 * Plant Renderer
 *
 * Places the plant on a canvas: origin at the bottom centre, y pointing up,
 * sized by the smaller canvas dimension so it is never stretched.
 */

import type { GrowthState, PlantParams } from "../types.js";
import { DEFAULT_PLANT_PALETTE, type PlantPalette } from "../params/palette.js";
import type { DrawableSurface } from "../surface/types.js";
import { drawPlantGeometry } from "../variants/index.js";

/**
 * Draw a plant onto a `width` x `height` surface.
 *
 * The surface's transform and style are restored afterwards.
 */
export function renderPlant(
  surface: DrawableSurface,
  params: PlantParams,
  growth: GrowthState,
  width: number,
  height: number,
  palette: PlantPalette = DEFAULT_PLANT_PALETTE,
): void {
  if (!(width > 0 && height > 0)) {
    console.warn(
      `[PlantRenderer] Skipping ${params.kind} on a ${width}x${height} canvas`,
    );
    return;
  }

  const size = Math.min(width, height);

  surface.save();
  surface.translate(width / 2, height);
  surface.scale(1, -1);

  drawPlantGeometry(params, {
    surface,
    growth,
    width: size,
    height: size,
    palette,
  });

  surface.restore();
}

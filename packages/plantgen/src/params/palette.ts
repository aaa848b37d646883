/**
 * Plant colours
 */

import type { RgbColor } from "../types.js";

/**
 * Colours of the non-random plant parts.
 */
export interface PlantPalette {
  /** Trunk and branches */
  bark: RgbColor;
  /** Canopies, stems and leaves */
  foliage: RgbColor;
  /** Orange tree fruit */
  fruit: RgbColor;
  /** Disk in the middle of a circular flower */
  flowerCenter: RgbColor;
}

export const DEFAULT_PLANT_PALETTE: Readonly<PlantPalette> = {
  bark: { r: 77, g: 51, b: 0 },
  foliage: { r: 0, g: 119, b: 0 },
  fruit: { r: 243, g: 148, b: 30 },
  flowerCenter: { r: 255, g: 255, b: 255 },
};

/**
 * Petal colours a circular flower picks from.
 */
export const PETAL_COLORS: readonly RgbColor[] = [
  { r: 139, g: 139, b: 255 }, // blue-ish
  { r: 72, g: 178, b: 173 }, // green-ish
  { r: 255, g: 85, b: 85 }, // red-ish
  { r: 238, g: 168, b: 43 }, // orange-ish
  { r: 226, g: 104, b: 155 }, // pink-ish
];

/**
 * Merge a partial palette with defaults
 */
export function mergePlantPalette(
  partial: Partial<PlantPalette> = {},
): PlantPalette {
  return { ...DEFAULT_PLANT_PALETTE, ...partial };
}

/**
 * `#rrggbb` form of a colour, channels clamped to [0, 255].
 */
export function colorToHex(color: RgbColor): string {
  const channel = (value: number): string =>
    Math.max(0, Math.min(255, Math.round(value)))
      .toString(16)
      .padStart(2, "0");

  return `#${channel(color.r)}${channel(color.g)}${channel(color.b)}`;
}

/**
 * Plant catalog
 *
 * The names a study timer shows to its users, and the variant each one grows.
 */

import type { SeededRandom } from "../math/Random.js";
import type { PlantKind } from "../types.js";

export interface PlantCatalogEntry {
  /** Display name */
  name: string;
  kind: PlantKind;
}

export const PLANT_CATALOG: readonly PlantCatalogEntry[] = [
  { name: "Spruce", kind: "green-tree" },
  { name: "Double spruce", kind: "double-green-tree" },
  { name: "Maple", kind: "orange-tree" },
  { name: "Flower", kind: "circular-flower" },
];

/**
 * Look up a catalog entry by display name (case-insensitive).
 *
 * Unknown names fall back to the first entry.
 */
export function getPlantCatalogEntry(name: string): PlantCatalogEntry {
  const wanted = name.trim().toLowerCase();
  const entry = PLANT_CATALOG.find(
    (candidate) => candidate.name.toLowerCase() === wanted,
  );
  if (entry) {
    return entry;
  }

  const [fallback] = PLANT_CATALOG;
  if (!fallback) {
    throw new Error("Plant catalog is empty");
  }
  console.warn(
    `[PlantCatalog] Unknown plant "${name}", using ${fallback.name}`,
  );
  return fallback;
}

/**
 * Pick the variant to grow next from the enabled catalog names.
 *
 * @returns null when nothing is enabled
 */
export function pickPlantKind(
  rng: SeededRandom,
  enabled: readonly string[],
): PlantKind | null {
  if (enabled.length === 0) {
    return null;
  }
  return getPlantCatalogEntry(rng.choice(enabled)).kind;
}

export {
  DEFAULT_PLANT_PALETTE,
  PETAL_COLORS,
  colorToHex,
  mergePlantPalette,
} from "./palette.js";
export type { PlantPalette } from "./palette.js";
export {
  CANOPY_PROPORTIONS,
  FLOWER_PROPORTIONS,
  FRUIT_PROPORTIONS,
  PARAMETER_RANGES,
  TREE_PROPORTIONS,
} from "./proportions.js";
export {
  PLANT_CATALOG,
  getPlantCatalogEntry,
  pickPlantKind,
} from "./catalog.js";
export type { PlantCatalogEntry } from "./catalog.js";

/**
 * Plant Proportions
 *
 * Fixed size ratios and random parameter ranges. Sizes are given as the
 * divisor of the effective canvas size (smaller of width and height), so
 * `trunkWidth: 15` means a half-width of size / 15 at full growth.
 */

/**
 * Trunk and branch ratios shared by all trees.
 */
export const TREE_PROPORTIONS = {
  trunkWidth: 15,
  trunkHeight: 1.7,
  branchWidth: 18,
  branchHeight: 2.7,
} as const;

/**
 * Triangular canopy ratios for green trees.
 */
export const CANOPY_PROPORTIONS = {
  outerWidth: 3.2,
  outerHeight: 1.5,
  innerWidth: 3.5,
  innerHeight: 2.4,
  /** Fraction of the canvas the canopy base starts from, as trunk height */
  baseOffset: 0.3,
  /** Nothing is drawn above this fraction of the canvas height */
  ceiling: 0.95,
} as const;

/**
 * Fruit ratios for orange trees.
 */
export const FRUIT_PROPORTIONS = {
  /** Enlargement of the main ellipse on the trunk */
  mainEnlargement: 1.3,
} as const;

/**
 * Stem, leaf and petal ratios for flowers.
 */
export const FLOWER_PROPORTIONS = {
  centerX: 9,
  centerY: 2.5,
  leafSize: 7,
  petalSize: 9,
  /** Height of the stem control point relative to the stem height */
  stemControl: 0.6,
} as const;

/**
 * Ranges of the random parameters, scaled by the deficit where noted.
 */
export const PARAMETER_RANGES = {
  deficit: [0.9, 1] as const,
  /** × deficit */
  branchHeight: [0.45, 0.55] as const,
  /** Cosine of the branch angle */
  branchCosine: [0.4, 0.6] as const,
  branchCount: [1, 2] as const,
  /** × deficit */
  fruitSize: [0.3, 0.37] as const,
  /** × deficit */
  fruitPosition: [0.9, 1] as const,
  xLean: [0.4, 1] as const,
  /** × deficit */
  leafPosition: [0.25, 0.4] as const,
  leafSize: [0.9, 1.1] as const,
  stemWidth: [3.5, 4] as const,
  petalCount: [5, 7] as const,
  centerRatio: [0.75, 0.85] as const,
} as const;

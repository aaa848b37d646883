/**
 * @studygarden/plantgen - Type Definitions
 *
 * Parameter records for every plant variant, plus the small geometry and
 * colour types shared by the generators, surfaces and records.
 *
 * @packageDocumentation
 */

// =============================================================================
// BASIC TYPES
// =============================================================================

/**
 * 2D point representation
 */
export interface Point2D {
  x: number;
  y: number;
}

/**
 * 8-bit RGB colour
 */
export interface RgbColor {
  r: number;
  g: number;
  b: number;
}

/**
 * Shape of the growth curve mapping minutes to a growth coefficient.
 */
export interface GrowthCurveConfig {
  /** Age (minutes) at which the plant reaches half of its full size */
  scale: number;
  /** Steepness of the curve around `scale` */
  exponent: number;
}

/**
 * Growth coefficients for a single draw, derived from the plant's age.
 */
export interface GrowthState {
  /** Normalized growth in [0, 1) */
  growth: number;
  /** growth^3, for parts that lag behind the trunk or stem */
  slowGrowth: number;
  /** smoothenCurve(growth) */
  smooth: number;
  /** smoothenCurve(slowGrowth) */
  slowSmooth: number;
}

// =============================================================================
// PLANT KINDS
// =============================================================================

/**
 * Every plant variant the generator knows how to grow.
 */
export const PLANT_KINDS = [
  "tree",
  "orange-tree",
  "green-tree",
  "double-green-tree",
  "flower",
  "circular-flower",
] as const;

export type PlantKind = (typeof PLANT_KINDS)[number];

/**
 * Petal outlines available to circular flowers.
 */
export const PETAL_SHAPES = ["circular", "triangular", "dip", "round"] as const;

export type PetalShape = (typeof PETAL_SHAPES)[number];

// =============================================================================
// PARAMETER RECORDS
// =============================================================================

/**
 * Fields every plant carries.
 */
export interface BasePlantParams {
  kind: PlantKind;
  /** Size jitter in [0.9, 1], applied to every size formula */
  deficit: number;
}

/**
 * A branch growing out of the trunk.
 */
export interface Branch {
  /** Fraction of the trunk height the branch grows from */
  height: number;
  /** Signed rotation in radians; the sign picks the side */
  rotation: number;
}

/**
 * Position and size of a fruit ellipse on an orange tree.
 */
export interface FruitPlacement {
  /** Radius as a fraction of the canvas size */
  size: number;
  /** Position along the branch (or trunk) as a fraction of its length */
  position: number;
}

/**
 * A leaf on a flower stem.
 */
export interface Leaf {
  /** Position along the stem, as a curve parameter */
  position: number;
  /** Size jitter in [0.9, 1.1] */
  size: number;
  /** -1 for the left leaf, +1 for the right one */
  side: -1 | 1;
}

export interface TreeParams extends BasePlantParams {
  kind: "tree";
  branches: Branch[];
}

export interface OrangeTreeParams extends BasePlantParams {
  kind: "orange-tree";
  branches: Branch[];
  /** One entry per branch, then one for the main ellipse on the trunk */
  fruits: FruitPlacement[];
}

export interface GreenTreeParams extends BasePlantParams {
  kind: "green-tree";
  branches: Branch[];
}

export interface DoubleGreenTreeParams extends BasePlantParams {
  kind: "double-green-tree";
  branches: Branch[];
}

export interface FlowerParams extends BasePlantParams {
  kind: "flower";
  /** Signed lean of the stem top, magnitude in [0.4, 1] */
  xLean: number;
  leaves: Leaf[];
  stemWidth: number;
}

export interface CircularFlowerParams extends BasePlantParams {
  kind: "circular-flower";
  xLean: number;
  leaves: Leaf[];
  stemWidth: number;
  petalColor: RgbColor;
  petalCount: number;
  /** Centre disk size relative to the petal size */
  centerRatio: number;
  petalShape: PetalShape;
}

/**
 * Parameters of any plant, tagged by `kind`.
 */
export type PlantParams =
  | TreeParams
  | OrangeTreeParams
  | GreenTreeParams
  | DoubleGreenTreeParams
  | FlowerParams
  | CircularFlowerParams;

/**
 * Parameters of the plant with the given kind.
 */
export type PlantParamsOf<K extends PlantKind> = Extract<PlantParams, { kind: K }>;

/**
 * Tree-shaped variants (everything with a trunk and branches).
 */
export type TreeLikeParams =
  | TreeParams
  | OrangeTreeParams
  | GreenTreeParams
  | DoubleGreenTreeParams;

/**
 * Flower-shaped variants (everything with a stem and leaves).
 */
export type FlowerLikeParams = FlowerParams | CircularFlowerParams;

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Check whether a string names a plant kind.
 */
export function isPlantKind(value: unknown): value is PlantKind {
  return PLANT_KINDS.some((kind) => kind === value);
}

/**
 * Check whether a string names a petal shape.
 */
export function isPetalShape(value: unknown): value is PetalShape {
  return PETAL_SHAPES.some((shape) => shape === value);
}

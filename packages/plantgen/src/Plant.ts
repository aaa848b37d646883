/**
 * Plant
 *
 * Host-facing plant: parameters drawn once at creation, a growth curve and a
 * mutable age in minutes. Drawing is a pure function of those three.
 *
 * @example
 * ```typescript
 * const plant = createPlant("circular-flower", { seed: 42 });
 * plant.setAge(20);
 * plant.draw(new SvgSurface(300, 300), 300, 300);
 * ```
 */

import type {
  GrowthCurveConfig,
  PlantKind,
  PlantParams,
} from "./types.js";
import { SeededRandom } from "./math/Random.js";
import {
  ageCoefficient,
  computeGrowthState,
  inverseAgeCoefficient,
  mergeGrowthCurve,
  slowGrowthCoefficient,
} from "./math/Growth.js";
import { mergePlantPalette, type PlantPalette } from "./params/palette.js";
import type { DrawableSurface } from "./surface/types.js";
import { renderPlant } from "./rendering/PlantRenderer.js";
import { generatePlantParams } from "./variants/index.js";
import { PLANT_RECORD_VERSION, type PlantRecord } from "./record/PlantRecord.js";

export interface PlantOptions {
  growthCurve?: Partial<GrowthCurveConfig>;
  palette?: Partial<PlantPalette>;
}

export interface CreatePlantOptions extends PlantOptions {
  /** Seed for a fresh generator; ignored when `rng` is given */
  seed?: number;
  /** Generator to draw parameters from; advanced by the draw */
  rng?: SeededRandom;
}

export class Plant {
  readonly params: PlantParams;
  readonly growthCurve: GrowthCurveConfig;
  readonly palette: PlantPalette;
  private age = 0;

  constructor(params: PlantParams, options: PlantOptions = {}) {
    this.params = structuredClone(params);
    this.growthCurve = mergeGrowthCurve(options.growthCurve);
    this.palette = mergePlantPalette(options.palette);
  }

  get kind(): PlantKind {
    return this.params.kind;
  }

  /**
   * Set the age in minutes. Any number is accepted except NaN.
   *
   * Negative ages only give a defined growth when the curve exponent is an
   * integer; with `exponent: 2.5` the coefficients are NaN.
   */
  setAge(minutes: number): void {
    if (Number.isNaN(minutes)) {
      throw new RangeError("Plant age must be a number, got NaN");
    }
    this.age = minutes;
  }

  getAge(): number {
    return this.age;
  }

  getGrowthCoefficient(): number {
    return this.ageCoefficient(this.age);
  }

  getSlowGrowthCoefficient(): number {
    return slowGrowthCoefficient(this.getGrowthCoefficient());
  }

  ageCoefficient(age: number): number {
    return ageCoefficient(age, this.growthCurve);
  }

  inverseAgeCoefficient(coefficient: number): number {
    return inverseAgeCoefficient(coefficient, this.growthCurve);
  }

  /**
   * Draw the plant at its current age, filling a `width` x `height` canvas.
   */
  draw(surface: DrawableSurface, width: number, height: number): void {
    renderPlant(
      surface,
      this.params,
      computeGrowthState(this.age, this.growthCurve),
      width,
      height,
      this.palette,
    );
  }

  /**
   * Snapshot of everything needed to rebuild this plant. The age is not part
   * of it; replays set their own.
   */
  toRecord(): PlantRecord {
    return {
      version: PLANT_RECORD_VERSION,
      growthCurve: { ...this.growthCurve },
      params: structuredClone(this.params),
    };
  }

  static fromRecord(record: PlantRecord, options: PlantOptions = {}): Plant {
    return new Plant(record.params, {
      ...options,
      growthCurve: record.growthCurve,
    });
  }
}

/**
 * Create a plant of the given kind, drawing all of its random parameters.
 */
export function createPlant(
  kind: PlantKind,
  options: CreatePlantOptions = {},
): Plant {
  const rng = options.rng ?? new SeededRandom(options.seed);
  return new Plant(generatePlantParams(kind, rng), options);
}

/**
 * Age to show for a slider at `position` (0 to 1) over a session of
 * `durationMinutes`, spacing the slider evenly in growth rather than time.
 */
export function scrubAge(
  plant: Plant,
  position: number,
  durationMinutes: number,
): number {
  const clamped = Math.max(0, Math.min(1, position));
  return plant.inverseAgeCoefficient(
    clamped * plant.ageCoefficient(durationMinutes),
  );
}

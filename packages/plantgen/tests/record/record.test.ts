/**
 * PlantRecord tests
 */

import { describe, it, expect } from "vitest";
import { Packr } from "msgpackr";
import { Plant, createPlant } from "../../src/Plant.js";
import {
  decodePlantRecord,
  encodePlantRecord,
  isPlantRecord,
  packPlantRecord,
  unpackPlantRecord,
  validatePlantRecord,
  type PlantRecord,
} from "../../src/record/index.js";
import { RecordingSurface } from "../../src/surface/RecordingSurface.js";
import { PLANT_KINDS } from "../../src/types.js";

function drawAt(plant: Plant, age: number): RecordingSurface {
  const surface = new RecordingSurface();
  plant.setAge(age);
  plant.draw(surface, 300, 300);
  return surface;
}

const validRecord: PlantRecord = {
  version: 1,
  growthCurve: { scale: 15, exponent: 2 },
  params: {
    kind: "circular-flower",
    deficit: 0.95,
    xLean: -0.6,
    leaves: [
      { position: 0.3, size: 1, side: -1 },
      { position: 0.32, size: 1.05, side: 1 },
    ],
    stemWidth: 3.8,
    petalColor: { r: 72, g: 178, b: 173 },
    petalCount: 6,
    centerRatio: 0.8,
    petalShape: "circular",
  },
};

describe("PlantRecord", () => {
  describe("JSON", () => {
    it.each(PLANT_KINDS)("round-trips a %s", (kind) => {
      const plant = createPlant(kind, { seed: 31 });
      const record = plant.toRecord();

      const decoded = decodePlantRecord(encodePlantRecord(record));

      expect(decoded).toEqual(record);
      expect(drawAt(Plant.fromRecord(decoded), 40).calls).toEqual(
        drawAt(plant, 40).calls,
      );
    });

    it("rejects text that is not JSON", () => {
      expect(() => decodePlantRecord("not json")).toThrow(
        /^Plant record is not valid JSON: /,
      );
    });

    it("lists every validation failure", () => {
      const text = JSON.stringify({
        version: 1,
        growthCurve: { scale: 0, exponent: 2 },
        params: { kind: "flower", deficit: 1, xLean: 0.5, leaves: [] },
      });

      expect(() => decodePlantRecord(text)).toThrow(
        "Invalid plant record: growthCurve.scale must be a positive number; params.stemWidth must be a finite number",
      );
    });
  });

  describe("MessagePack", () => {
    it.each(PLANT_KINDS)("round-trips a %s", (kind) => {
      const plant = createPlant(kind, { seed: 77, growthCurve: { scale: 25 } });
      const record = plant.toRecord();

      const decoded = unpackPlantRecord(packPlantRecord(record));

      expect(decoded).toEqual(record);
      expect(drawAt(Plant.fromRecord(decoded), 12).calls).toEqual(
        drawAt(plant, 12).calls,
      );
    });

    it("rejects records of another version", () => {
      const bytes = new Packr({ useRecords: false }).pack({
        ...validRecord,
        version: 2,
      });

      expect(() => unpackPlantRecord(bytes)).toThrow(
        "Unsupported plant record version: 2 (expected 1)",
      );
    });

    it("writes a plain three-entry map", () => {
      expect(packPlantRecord(validRecord)[0]).toBe(0x83);
    });
  });

  describe("validatePlantRecord", () => {
    it("accepts a complete record", () => {
      expect(validatePlantRecord(validRecord)).toEqual({
        valid: true,
        errors: [],
      });
      expect(isPlantRecord(validRecord)).toBe(true);
    });

    it("rejects non-objects", () => {
      expect(validatePlantRecord(null)).toEqual({
        valid: false,
        errors: ["record must be an object"],
      });
      expect(isPlantRecord([validRecord])).toBe(false);
    });

    it("rejects unknown kinds", () => {
      const result = validatePlantRecord({
        ...validRecord,
        params: { kind: "cactus", deficit: 1 },
      });

      expect(result.errors).toEqual([
        "params.kind is not a known plant kind: cactus",
      ]);
    });

    it("checks flower fields", () => {
      const result = validatePlantRecord({
        ...validRecord,
        params: {
          ...validRecord.params,
          petalShape: "star",
          petalCount: 2.5,
          petalColor: { r: 300, g: 0, b: 0 },
          leaves: [{ position: 0.3, size: 1, side: 0 }],
        },
      });

      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        "params.leaves[0].side must be -1 or 1",
        "params.petalColor.r must be an integer in [0, 255]",
        "params.petalCount must be a positive integer",
        "params.petalShape is not a known shape: star",
      ]);
    });

    it("checks that orange trees carry one fruit per branch plus one", () => {
      const result = validatePlantRecord({
        version: 1,
        growthCurve: { scale: 15, exponent: 2 },
        params: {
          kind: "orange-tree",
          deficit: 1,
          branches: [
            { height: 0.5, rotation: -1 },
            { height: 0.5, rotation: 1 },
          ],
          fruits: [{ size: 0.3, position: 0.9 }],
        },
      });

      expect(result.errors).toEqual([
        "params.fruits must have one entry per branch plus one",
      ]);
    });

    it("requires at least one branch", () => {
      const result = validatePlantRecord({
        version: 1,
        growthCurve: { scale: 15, exponent: 2 },
        params: { kind: "green-tree", deficit: 1, branches: [] },
      });

      expect(result.errors).toEqual(["params.branches must not be empty"]);
    });
  });
});

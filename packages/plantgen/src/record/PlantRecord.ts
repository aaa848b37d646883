/**
 * Plant records
 *
 * Versioned, variant-tagged data a stored plant is rebuilt from. Text
 * records are JSON; binary records are MessagePack.
 */

import { Packr } from "msgpackr";
import type { GrowthCurveConfig, PlantParams } from "../types.js";
import {
  validateRecordBody,
  type PlantRecordValidationResult,
} from "./validation.js";

export const PLANT_RECORD_VERSION = 1;

export interface PlantRecord {
  version: typeof PLANT_RECORD_VERSION;
  growthCurve: GrowthCurveConfig;
  params: PlantParams;
}

// Plain maps, so the bytes decode with any MessagePack reader.
const packr = new Packr({ useRecords: false, variableMapSize: true });

export function validatePlantRecord(
  value: unknown,
): PlantRecordValidationResult {
  return validateRecordBody(value, PLANT_RECORD_VERSION);
}

export function isPlantRecord(value: unknown): value is PlantRecord {
  return validatePlantRecord(value).valid;
}

function assertPlantRecord(value: unknown): PlantRecord {
  if (!isPlantRecord(value)) {
    const { errors } = validatePlantRecord(value);
    throw new Error(`Invalid plant record: ${errors.join("; ")}`);
  }
  return value;
}

/**
 * Serialize a record to JSON text.
 */
export function encodePlantRecord(record: PlantRecord): string {
  return JSON.stringify(record);
}

/**
 * Parse and validate a JSON plant record.
 *
 * @throws Error when the text is not JSON or the record is malformed
 */
export function decodePlantRecord(text: string): PlantRecord {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Plant record is not valid JSON: ${message}`);
  }
  return assertPlantRecord(value);
}

export function packPlantRecord(record: PlantRecord): Uint8Array {
  return packr.pack(record);
}

/**
 * Decode and validate a MessagePack plant record.
 */
export function unpackPlantRecord(data: Uint8Array): PlantRecord {
  const value: unknown = packr.unpack(data);
  return assertPlantRecord(value);
}

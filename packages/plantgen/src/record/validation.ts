/**
 * Runtime validation of plant records read from storage.
 */

import { isPetalShape, isPlantKind } from "../types.js";

/** Result of plant record validation */
export interface PlantRecordValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Check if value is a non-null object
 */
function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

function checkNumber(
  owner: Record<string, unknown>,
  key: string,
  path: string,
  errors: string[],
): void {
  if (!isFiniteNumber(owner[key])) {
    errors.push(`${path}.${key} must be a finite number`);
  }
}

function checkList(
  owner: Record<string, unknown>,
  key: string,
  path: string,
  errors: string[],
  checkItem: (item: Record<string, unknown>, itemPath: string) => void,
): unknown[] | null {
  const list = owner[key];
  if (!Array.isArray(list)) {
    errors.push(`${path}.${key} must be an array`);
    return null;
  }

  list.forEach((item: unknown, i) => {
    const itemPath = `${path}.${key}[${i}]`;
    if (!isObject(item)) {
      errors.push(`${itemPath} must be an object`);
      return;
    }
    checkItem(item, itemPath);
  });

  return list;
}

function checkBranches(
  params: Record<string, unknown>,
  errors: string[],
): unknown[] | null {
  const branches = checkList(params, "branches", "params", errors, (b, p) => {
    checkNumber(b, "height", p, errors);
    checkNumber(b, "rotation", p, errors);
  });
  if (branches && branches.length === 0) {
    errors.push("params.branches must not be empty");
  }
  return branches;
}

function checkFlower(params: Record<string, unknown>, errors: string[]): void {
  checkNumber(params, "xLean", "params", errors);
  checkNumber(params, "stemWidth", "params", errors);
  checkList(params, "leaves", "params", errors, (leaf, p) => {
    checkNumber(leaf, "position", p, errors);
    checkNumber(leaf, "size", p, errors);
    if (leaf.side !== -1 && leaf.side !== 1) {
      errors.push(`${p}.side must be -1 or 1`);
    }
  });
}

function checkColor(value: unknown, path: string, errors: string[]): void {
  if (!isObject(value)) {
    errors.push(`${path} must be an object`);
    return;
  }
  for (const channel of ["r", "g", "b"]) {
    const v = value[channel];
    if (!(Number.isInteger(v) && isFiniteNumber(v) && v >= 0 && v <= 255)) {
      errors.push(`${path}.${channel} must be an integer in [0, 255]`);
    }
  }
}

function checkParams(params: unknown, errors: string[]): void {
  if (!isObject(params)) {
    errors.push("params must be an object");
    return;
  }

  const kind = params.kind;
  if (!isPlantKind(kind)) {
    errors.push(`params.kind is not a known plant kind: ${String(kind)}`);
    return;
  }

  checkNumber(params, "deficit", "params", errors);

  switch (kind) {
    case "tree":
    case "green-tree":
    case "double-green-tree":
      checkBranches(params, errors);
      return;
    case "orange-tree": {
      const branches = checkBranches(params, errors);
      const fruits = checkList(params, "fruits", "params", errors, (f, p) => {
        checkNumber(f, "size", p, errors);
        checkNumber(f, "position", p, errors);
      });
      if (branches && fruits && fruits.length !== branches.length + 1) {
        errors.push("params.fruits must have one entry per branch plus one");
      }
      return;
    }
    case "flower":
      checkFlower(params, errors);
      return;
    case "circular-flower": {
      checkFlower(params, errors);
      checkColor(params.petalColor, "params.petalColor", errors);
      checkNumber(params, "centerRatio", "params", errors);
      const count = params.petalCount;
      if (!(Number.isInteger(count) && isFiniteNumber(count) && count > 0)) {
        errors.push("params.petalCount must be a positive integer");
      }
      if (!isPetalShape(params.petalShape)) {
        errors.push(
          `params.petalShape is not a known shape: ${String(params.petalShape)}`,
        );
      }
      return;
    }
  }
}

/**
 * Validate a decoded plant record of the given version.
 */
export function validateRecordBody(
  value: unknown,
  version: number,
): PlantRecordValidationResult {
  const errors: string[] = [];

  if (!isObject(value)) {
    return { valid: false, errors: ["record must be an object"] };
  }

  if (value.version !== version) {
    errors.push(
      `Unsupported plant record version: ${String(value.version)} (expected ${version})`,
    );
  }

  const curve = value.growthCurve;
  if (!isObject(curve)) {
    errors.push("growthCurve must be an object");
  } else {
    for (const key of ["scale", "exponent"]) {
      const v = curve[key];
      if (!(isFiniteNumber(v) && v > 0)) {
        errors.push(`growthCurve.${key} must be a positive number`);
      }
    }
  }

  checkParams(value.params, errors);

  return { valid: errors.length === 0, errors };
}

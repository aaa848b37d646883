/**
 * Growth curve tests
 */

import { describe, it, expect } from "vitest";
import {
  DEFAULT_GROWTH_CURVE,
  ageCoefficient,
  computeGrowthState,
  inverseAgeCoefficient,
  mergeGrowthCurve,
  slowGrowthCoefficient,
  smoothenCurve,
} from "../../src/math/Growth.js";

describe("smoothenCurve", () => {
  it("maps the endpoints and midpoint to themselves", () => {
    expect(smoothenCurve(0)).toBe(0);
    expect(smoothenCurve(0.5)).toBe(0.5);
    expect(smoothenCurve(1)).toBe(1);
  });

  it("is point-symmetric around the midpoint", () => {
    for (let i = 0; i <= 20; i++) {
      const x = i / 20;
      expect(smoothenCurve(x)).toBeCloseTo(1 - smoothenCurve(1 - x), 12);
    }
  });
});

describe("ageCoefficient", () => {
  it("is zero at age zero", () => {
    expect(ageCoefficient(0)).toBe(0);
  });

  it("reaches half growth at the curve scale", () => {
    expect(ageCoefficient(15)).toBe(0.5);
    expect(ageCoefficient(30)).toBeCloseTo(0.8, 12);
  });

  it("is strictly increasing and stays below 1", () => {
    let previous = ageCoefficient(0);
    for (let age = 1; age <= 600; age++) {
      const value = ageCoefficient(age);
      expect(value).toBeGreaterThan(previous);
      expect(value).toBeLessThan(1);
      previous = value;
    }
  });

  it("is only defined for negative ages with an integer exponent", () => {
    expect(ageCoefficient(-15)).toBe(0.5);
    expect(ageCoefficient(-15, { scale: 15, exponent: 2.5 })).toBeNaN();
  });

  it("uses a custom curve", () => {
    const curve = { scale: 30, exponent: 3 };
    expect(ageCoefficient(30, curve)).toBe(0.5);
    expect(ageCoefficient(60, curve)).toBeCloseTo(8 / 9, 12);
  });
});

describe("inverseAgeCoefficient", () => {
  it("inverts known values", () => {
    expect(inverseAgeCoefficient(0)).toBe(0);
    expect(inverseAgeCoefficient(0.5)).toBe(15);
    expect(inverseAgeCoefficient(0.8)).toBeCloseTo(30, 9);
  });

  it("round-trips through ageCoefficient on a dense grid", () => {
    for (let i = 0; i < 1000; i++) {
      const y = i / 1000;
      expect(ageCoefficient(inverseAgeCoefficient(y))).toBeCloseTo(y, 9);
    }
  });

  it("returns Infinity for a coefficient of 1", () => {
    expect(inverseAgeCoefficient(1)).toBe(Number.POSITIVE_INFINITY);
  });

  it("rejects coefficients outside [0, 1]", () => {
    expect(() => inverseAgeCoefficient(1.2)).toThrow(RangeError);
    expect(() => inverseAgeCoefficient(-0.1)).toThrow(
      "Growth coefficient must lie in [0, 1], got -0.1",
    );
    expect(() => inverseAgeCoefficient(Number.NaN)).toThrow(RangeError);
  });
});

describe("growth state", () => {
  it("cubes the growth for slow parts", () => {
    expect(slowGrowthCoefficient(0.5)).toBe(0.125);
  });

  it("derives every coefficient from the age", () => {
    const state = computeGrowthState(15);

    expect(state.growth).toBe(0.5);
    expect(state.slowGrowth).toBe(0.125);
    expect(state.smooth).toBe(0.5);
    expect(state.slowSmooth).toBeCloseTo(
      (Math.sin(-0.375 * Math.PI) + 1) / 2,
      12,
    );
  });

  it("is all zeros at age zero", () => {
    expect(computeGrowthState(0)).toEqual({
      growth: 0,
      slowGrowth: 0,
      smooth: 0,
      slowSmooth: 0,
    });
  });
});

describe("mergeGrowthCurve", () => {
  it("fills missing fields from the defaults", () => {
    expect(mergeGrowthCurve()).toEqual(DEFAULT_GROWTH_CURVE);
    expect(mergeGrowthCurve({ scale: 30 })).toEqual({ scale: 30, exponent: 2 });
  });
});

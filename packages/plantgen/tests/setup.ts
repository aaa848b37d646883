/**
 * Test setup for plantgen
 */

import { expect } from "vitest";

// Point comparison for plant geometry
expect.extend({
  toBeCloseToPoint(
    received: { x: number; y: number },
    expected: { x: number; y: number },
    precision = 6,
  ) {
    const epsilon = Math.pow(10, -precision);
    const pass =
      Math.abs(received.x - expected.x) < epsilon &&
      Math.abs(received.y - expected.y) < epsilon;

    return {
      message: () =>
        pass
          ? `expected (${received.x}, ${received.y}) not to be close to (${expected.x}, ${expected.y})`
          : `expected (${received.x}, ${received.y}) to be close to (${expected.x}, ${expected.y})`,
      pass,
    };
  },
});

declare module "vitest" {
  interface Assertion<T> {
    toBeCloseToPoint(
      expected: { x: number; y: number },
      precision?: number,
    ): T;
  }
  interface AsymmetricMatchersContaining {
    toBeCloseToPoint(
      expected: { x: number; y: number },
      precision?: number,
    ): void;
  }
}

import { describe, expect, it } from "vitest";
import { evalPoly, polynomial } from "../src/math/poly";
import { createRng } from "./helpers";

function evalPolyNaive(coeffs: readonly number[], x: number): number {
  return coeffs.reduce((sum, c, i) => sum + c * x ** i, 0);
}

describe("evalPoly", () => {
  it("treats an empty coefficient list as the zero polynomial", () => {
    expect(evalPoly([], 3)).toBe(0);
  });

  it("evaluates x^3 - x - 2 on both sides of its root", () => {
    const cubic = [-2, -1, 0, 1];
    expect(evalPoly(cubic, -1)).toBe(-2);
    expect(evalPoly(cubic, 0)).toBe(-2);
    expect(evalPoly(cubic, 1)).toBe(-2);
    expect(evalPoly(cubic, 2)).toBe(4);
    expect(evalPoly(cubic, 1.5213797068)).toBeCloseTo(0, 9);
  });

  it("evaluates x^2 - 4 and its derivative 2x at the root", () => {
    expect(evalPoly([-4, 0, 1], 2)).toBe(0);
    expect(evalPoly([-4, 0, 1], -2)).toBe(0);
    expect(evalPoly([0, 2], 2)).toBe(4);
  });

  it("matches term-by-term evaluation for seeded random polynomials", () => {
    const rand = createRng(0x1f2e3d4c);

    for (let n = 0; n < 100; n++) {
      const coeffs = Array.from({ length: 1 + Math.floor(rand() * 5) }, () => rand() * 10 - 5);
      const x = rand() * 4 - 2;
      expect(evalPoly(coeffs, x)).toBeCloseTo(evalPolyNaive(coeffs, x), 10);
    }
  });
});

describe("polynomial", () => {
  it("builds a function equivalent to evalPoly", () => {
    const p = polynomial([-4, 0, 1]);
    expect(p(0)).toBe(-4);
    expect(p(2)).toBe(0);
    expect(p(-3)).toBe(5);
  });

  it("is not affected by later changes to the coefficient array", () => {
    const coeffs = [1, 1];
    const p = polynomial(coeffs);
    coeffs[1] = 100;
    expect(p(2)).toBe(3);
  });
});

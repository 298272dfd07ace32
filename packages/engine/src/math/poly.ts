import type { RealFunction } from "@scalar-roots/shared";

/**
 * Evaluate polynomial c0 + c1*x + c2*x^2 + ...
 */
export function evalPoly(coeffs: readonly number[], x: number): number {
  // Horner's method
  let acc = 0;
  for (let i = coeffs.length - 1; i >= 0; i--) {
    acc = acc * x + (coeffs[i] ?? 0);
  }
  return acc;
}

export function polynomial(coeffs: readonly number[]): RealFunction {
  const own = [...coeffs];
  return (x) => evalPoly(own, x);
}

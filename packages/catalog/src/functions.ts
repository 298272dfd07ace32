import { polynomial } from "@scalar-roots/engine";
import type { RealFunction } from "@scalar-roots/shared";

export type CatalogFunction = {
  f: RealFunction;
  df?: RealFunction; // written out by hand, needed by Newton-Raphson cases
};

export const catalogFunctions: Record<string, CatalogFunction> = {
  // x^2 - 4
  square_minus_4: { f: polynomial([-4, 0, 1]), df: polynomial([0, 2]) },
  // x^2 - 2
  square_minus_2: { f: polynomial([-2, 0, 1]), df: polynomial([0, 2]) },
  // x^2 + 1, no real root
  square_plus_1: { f: polynomial([1, 0, 1]), df: polynomial([0, 2]) },
  // x - 2
  linear_minus_2: { f: polynomial([-2, 1]), df: () => 1 },
  // x - 5
  linear_minus_5: { f: polynomial([-5, 1]), df: () => 1 },
  // x^3, flat at the origin
  cube: { f: polynomial([0, 0, 0, 1]), df: polynomial([0, 0, 3]) },
  // x^3 - x - 2
  cubic_shifted: { f: polynomial([-2, -1, 0, 1]), df: polynomial([-1, 0, 3]) },
  cos_minus_x: { f: (x) => Math.cos(x) - x, df: (x) => -Math.sin(x) - 1 },
  exp_minus_3: { f: (x) => Math.exp(x) - 3, df: (x) => Math.exp(x) },
  constant_5: { f: () => 5, df: () => 0 },
  reciprocal: { f: (x) => 1 / x },
  // NaN for x < 0
  sqrt: { f: Math.sqrt, df: (x) => 0.5 / Math.sqrt(x) },
};

export function getCatalogFunction(name: string): CatalogFunction | undefined {
  return Object.prototype.hasOwnProperty.call(catalogFunctions, name) ? catalogFunctions[name] : undefined;
}

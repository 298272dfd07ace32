import type { RealFunction, RootResult, SolverOptions } from "@scalar-roots/shared";
import { fail, resolveOptions } from "./options";

export function secant(
  f: RealFunction,
  a: number,
  b: number,
  options?: SolverOptions
): RootResult {
  const { tol, maxIter } = resolveOptions(options);

  // a and b are both the two starting points and the domain bounds
  let prev = a;
  let xn = b;

  for (let i = 0; i < maxIter; i++) {
    const fxn = f(xn);
    const fprev = f(prev);
    if (Number.isNaN(fxn) || Number.isNaN(fprev)) return fail("nonFinite", i + 1);

    if (Math.abs(fxn - fprev) < tol) return fail("nearZeroDenominator", i + 1);

    const next = xn - (fxn * (xn - prev)) / (fxn - fprev);
    // infinite f values give Infinity / Infinity
    if (Number.isNaN(next)) return fail("nonFinite", i + 1);
    if (next < a || next > b) return fail("outOfDomain", i + 1);

    if (Math.abs(next - xn) < tol) {
      return { ok: true, root: next, iterations: i + 1 };
    }

    prev = xn;
    xn = next;
  }

  return fail("noConvergence", maxIter);
}

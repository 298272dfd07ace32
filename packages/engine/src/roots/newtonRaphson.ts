import type { RealFunction, RootResult, SolverOptions } from "@scalar-roots/shared";
import { fail, resolveOptions } from "./options";

/**
 * Newton-Raphson from the guess `c`, with `g` the caller's derivative of `f`.
 * Every iterate must stay inside [a, b]; convergence is judged on step size.
 */
export function newtonRaphson(
  f: RealFunction,
  g: RealFunction,
  a: number,
  b: number,
  c: number,
  options?: SolverOptions
): RootResult {
  const { tol, maxIter } = resolveOptions(options);

  let xn = c;

  for (let i = 0; i < maxIter; i++) {
    const fx = f(xn);
    const dfx = g(xn);
    if (Number.isNaN(fx) || Number.isNaN(dfx)) return fail("nonFinite", i + 1);

    if (Math.abs(dfx) < tol) return fail("zeroDerivative", i + 1);

    const next = xn - fx / dfx;
    if (Number.isNaN(next)) return fail("nonFinite", i + 1);
    if (next < a || next > b) return fail("outOfDomain", i + 1);

    if (Math.abs(next - xn) < tol) {
      return { ok: true, root: next, iterations: i + 1 };
    }

    xn = next;
  }

  return fail("noConvergence", maxIter);
}

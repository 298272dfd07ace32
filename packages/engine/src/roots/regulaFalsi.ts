import type { RealFunction, RootResult, SolverOptions } from "@scalar-roots/shared";
import { fail, resolveOptions } from "./options";

/**
 * False position: like bisection, but the interior point is where the chord
 * through (a, f(a)) and (b, f(b)) crosses zero.
 *
 * Requires a strict sign change, so an exact root sitting on an endpoint is
 * reported as `noBracket`.
 */
export function regulaFalsi(
  f: RealFunction,
  a: number,
  b: number,
  options?: SolverOptions
): RootResult {
  const { tol, maxIter } = resolveOptions(options);

  let fa = f(a);
  let fb = f(b);
  if (Number.isNaN(fa) || Number.isNaN(fb)) return fail("nonFinite", 0);
  if (fa * fb >= 0) return fail("noBracket", 0);

  let lo = a;
  let hi = b;

  for (let i = 0; i < maxIter; i++) {
    // fa and fb keep opposite signs, so the chord is never flat
    const c = lo - (fa * (hi - lo)) / (fb - fa);
    const fc = f(c);
    if (Number.isNaN(fc)) return fail("nonFinite", i + 1);

    if (Math.abs(fc) < tol || Math.abs(hi - lo) < tol) {
      return { ok: true, root: c, iterations: i + 1 };
    }

    if (fa * fc > 0) {
      lo = c;
      fa = fc;
    } else {
      hi = c;
      fb = fc;
    }
  }

  return fail("noConvergence", maxIter);
}

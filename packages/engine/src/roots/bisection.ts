import type { RealFunction, RootResult, SolverOptions } from "@scalar-roots/shared";
import { fail, resolveOptions } from "./options";

/**
 * Halve [a, b] until f at the midpoint is within tol of zero or the
 * bracket itself is narrower than tol.
 *
 * An endpoint where f is exactly zero is returned before any bracket check.
 * Infinite endpoint values still count as a sign; only NaN is rejected.
 */
export function bisection(
  f: RealFunction,
  a: number,
  b: number,
  options?: SolverOptions
): RootResult {
  const { tol, maxIter } = resolveOptions(options);

  let fa = f(a);
  const fb = f(b);
  if (fa === 0) return { ok: true, root: a, iterations: 0 };
  if (fb === 0) return { ok: true, root: b, iterations: 0 };
  if (Number.isNaN(fa) || Number.isNaN(fb)) return fail("nonFinite", 0);
  if (fa * fb > 0) return fail("noBracket", 0);

  let lo = a;
  let hi = b;

  for (let i = 0; i < maxIter; i++) {
    const mid = (lo + hi) / 2;
    const fmid = f(mid);
    if (Number.isNaN(fmid)) return fail("nonFinite", i + 1);

    if (Math.abs(fmid) < tol || Math.abs(hi - lo) < tol) {
      return { ok: true, root: mid, iterations: i + 1 };
    }

    if (fa * fmid > 0) {
      lo = mid;
      fa = fmid;
    } else {
      hi = mid;
    }
  }

  return fail("noConvergence", maxIter);
}

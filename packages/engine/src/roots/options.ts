import type { RootFailure, RootFailureReason, SolverOptions } from "@scalar-roots/shared";

export const DEFAULT_TOLERANCE = 1e-6;
export const DEFAULT_MAX_ITERATIONS = 1_000_000;

export type ResolvedOptions = {
  tol: number;
  maxIter: number;
};

export function resolveOptions(options: SolverOptions = {}): ResolvedOptions {
  const tol = options.tol ?? DEFAULT_TOLERANCE;
  const maxIter = options.maxIter ?? DEFAULT_MAX_ITERATIONS;

  if (!Number.isFinite(tol) || tol <= 0) {
    throw new RangeError(`tol must be a finite number > 0 (got ${tol})`);
  }
  if (!Number.isInteger(maxIter) || maxIter < 1) {
    throw new RangeError(`maxIter must be an integer >= 1 (got ${maxIter})`);
  }

  return { tol, maxIter };
}

export function fail(reason: RootFailureReason, iterations: number): RootFailure {
  return { ok: false, reason, iterations };
}

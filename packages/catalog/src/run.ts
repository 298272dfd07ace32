import { bisection, newtonRaphson, regulaFalsi, secant } from "@scalar-roots/engine";
import type { RootResult, SolverOptions } from "@scalar-roots/shared";
import { getCatalogFunction } from "./functions";
import type { SolveCase } from "./index";

const ROOT_MATCH_TOL = 1e-5;

export function runCase(c: SolveCase, options?: SolverOptions): RootResult {
  const entry = getCatalogFunction(c.fn);
  if (!entry) throw new Error(`case ${c.id}: unknown function "${c.fn}"`);

  switch (c.method) {
    case "bisection":
      return bisection(entry.f, c.a, c.b, options);
    case "regulaFalsi":
      return regulaFalsi(entry.f, c.a, c.b, options);
    case "newtonRaphson": {
      if (!entry.df) throw new Error(`case ${c.id}: function "${c.fn}" has no derivative`);
      if (c.c === undefined) throw new Error(`case ${c.id}: missing starting guess`);
      return newtonRaphson(entry.f, entry.df, c.a, c.b, c.c, options);
    }
    case "secant":
      return secant(entry.f, c.a, c.b, options);
  }
}

export function checkCase(c: SolveCase, result: RootResult): boolean {
  if (!result.ok) return c.expect === result.reason;
  if (c.expect !== "ok" || c.root === undefined) return false;
  return Math.abs(result.root - c.root) <= ROOT_MATCH_TOL;
}

export function formatOutcome(c: SolveCase, result: RootResult): string {
  const status = checkCase(c, result) ? "PASS" : "FAIL";
  const outcome = result.ok ? `root=${result.root.toFixed(8)}` : result.reason;
  return `${status} ${c.id} [${c.method}] ${outcome} (${result.iterations} iter)`;
}

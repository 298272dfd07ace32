import { DEFAULT_MAX_ITERATIONS, DEFAULT_TOLERANCE } from "@scalar-roots/engine";
import { checkCase, formatOutcome, loadCases, runCase } from "../src/index";

const toNum = (v: string | undefined, fallback: number) => {
  const n = Number(v);
  return v != null && v !== "" && Number.isFinite(n) ? n : fallback;
};
const clamp = (n: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, n));

const TOL = clamp(toNum(process.env.ROOTS_TOL, DEFAULT_TOLERANCE), 1e-15, 1);
const MAX_ITER = Math.round(clamp(toNum(process.env.ROOTS_MAX_ITER, DEFAULT_MAX_ITERATIONS), 1, 1e7));

const cases = loadCases(process.argv[2]);
let failures = 0;

for (const c of cases) {
  const result = runCase(c, { tol: TOL, maxIter: MAX_ITER });
  if (!checkCase(c, result)) failures++;
  console.log(formatOutcome(c, result));
}

console.log(`\n${cases.length - failures}/${cases.length} cases matched (tol=${TOL}, maxIter=${MAX_ITER})`);
if (failures > 0) {
  console.error(`${failures} case(s) did not match their expectation`);
  process.exitCode = 1;
}

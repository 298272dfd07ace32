import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { parse } from "csv-parse/sync";
import type { RootFailureReason, RootMethod } from "@scalar-roots/shared";

export { catalogFunctions, getCatalogFunction } from "./functions";
export type { CatalogFunction } from "./functions";
export { checkCase, formatOutcome, runCase } from "./run";

type CsvRow = Record<string, string>;

export type CaseExpectation = "ok" | RootFailureReason;

export type SolveCase = {
  id: string;
  method: RootMethod;
  fn: string;
  a: number;
  b: number;
  c?: number; // Newton-Raphson starting guess
  expect: CaseExpectation;
  root?: number; // expected root when expect is "ok"
};

const METHODS: readonly RootMethod[] = ["bisection", "regulaFalsi", "newtonRaphson", "secant"];
const EXPECTATIONS: readonly CaseExpectation[] = [
  "ok",
  "noBracket",
  "zeroDerivative",
  "nearZeroDenominator",
  "outOfDomain",
  "noConvergence",
  "nonFinite",
];

export const defaultCasesPath = fileURLToPath(new URL("../data/cases.csv", import.meta.url));

const toNum = (v: string | undefined) => {
  if (v == null || v === "") return NaN;
  const n = Number(v);
  return Number.isFinite(n) ? n : NaN;
};

function isMethod(v: string): v is RootMethod {
  return METHODS.some((m) => m === v);
}

function isExpectation(v: string): v is CaseExpectation {
  return EXPECTATIONS.some((e) => e === v);
}

function requireNum(row: CsvRow, id: string, field: string): number {
  const n = toNum(row[field]);
  if (!Number.isFinite(n)) throw new Error(`case ${id}: ${field} must be a number (got "${row[field] ?? ""}")`);
  return n;
}

function optionalNum(row: CsvRow, id: string, field: string): number | undefined {
  if ((row[field] ?? "") === "") return undefined;
  return requireNum(row, id, field);
}

function toCase(row: CsvRow, index: number): SolveCase {
  const id = row.id || `row ${index + 2}`;

  const method = row.method ?? "";
  if (!isMethod(method)) throw new Error(`case ${id}: unknown method "${method}"`);

  const expect = row.expect ?? "";
  if (!isExpectation(expect)) throw new Error(`case ${id}: unknown expectation "${expect}"`);

  const fn = row.fn ?? "";
  if (fn === "") throw new Error(`case ${id}: fn is required`);

  const c = optionalNum(row, id, "c");
  if (method === "newtonRaphson" && c === undefined) {
    throw new Error(`case ${id}: c is required for newtonRaphson`);
  }

  const root = optionalNum(row, id, "root");
  if (expect === "ok" && root === undefined) {
    throw new Error(`case ${id}: root is required when expect is ok`);
  }

  return {
    id,
    method,
    fn,
    a: requireNum(row, id, "a"),
    b: requireNum(row, id, "b"),
    ...(c !== undefined ? { c } : {}),
    expect,
    ...(root !== undefined ? { root } : {}),
  };
}

export function parseCases(text: string): SolveCase[] {
  const rows = parse(text, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  }) as CsvRow[];
  return rows.map(toCase);
}

export function loadCases(pathname: string = defaultCasesPath): SolveCase[] {
  return parseCases(fs.readFileSync(pathname, "utf8"));
}

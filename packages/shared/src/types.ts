export type RealFunction = (x: number) => number;

export type RootMethod = "bisection" | "regulaFalsi" | "newtonRaphson" | "secant";

export type RootFailureReason =
  | "noBracket" // f(a) and f(b) do not change sign
  | "zeroDerivative"
  | "nearZeroDenominator"
  | "outOfDomain" // next iterate left [a, b]
  | "noConvergence"
  | "nonFinite";

export type SolverOptions = {
  tol?: number; // default 1e-6
  maxIter?: number; // default 1_000_000
};

export type RootSuccess = {
  ok: true;
  root: number;
  iterations: number;
};

export type RootFailure = {
  ok: false;
  reason: RootFailureReason;
  iterations: number;
};

export type RootResult = RootSuccess | RootFailure;

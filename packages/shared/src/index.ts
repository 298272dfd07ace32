export type {
  RealFunction,
  RootFailure,
  RootFailureReason,
  RootMethod,
  RootResult,
  RootSuccess,
  SolverOptions,
} from "./types";

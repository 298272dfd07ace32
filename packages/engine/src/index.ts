export { evalPoly, polynomial } from "./math/poly";
export { bisection } from "./roots/bisection";
export { newtonRaphson } from "./roots/newtonRaphson";
export { DEFAULT_MAX_ITERATIONS, DEFAULT_TOLERANCE, resolveOptions } from "./roots/options";
export type { ResolvedOptions } from "./roots/options";
export { regulaFalsi } from "./roots/regulaFalsi";
export { secant } from "./roots/secant";

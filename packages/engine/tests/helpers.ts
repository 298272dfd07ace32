import { expect } from "vitest";
import type { RootResult } from "@scalar-roots/shared";

export function createRng(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (1664525 * state + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}

export function expectRoot(result: RootResult): number {
  expect(result.ok).toBe(true);
  if (!result.ok) throw new Error(`expected a root, got ${result.reason}`);
  return result.root;
}

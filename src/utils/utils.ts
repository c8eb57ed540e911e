import isEqual from "lodash/isEqual";
import type { SearchOutcome, SearchState } from "../interfaces/interfaces";
import type { Cell } from "../types/types";

/**
 * Last index holding the minimum of `costs`, or -1 when empty.
 * Later entries win ties, which fixes the expansion order of equal-cost nodes.
 */
export function selectLastMinimum(costs: readonly number[]): number {
  let best = -1;
  for (let i = 0; i < costs.length; i++) {
    if (best === -1 || costs[i] <= costs[best]) best = i;
  }
  return best;
}

// Deep value equality; pass an explicit predicate for identity or keyed comparison.
export function defaultEquals<N>(a: N, b: N): boolean {
  return isEqual(a, b);
}

export function containsEqual<N>(
  seen: readonly N[],
  node: N,
  areEqual: (a: N, b: N) => boolean
) {
  for (const v of seen) {
    if (areEqual(v, node)) return true;
  }
  return false;
}

// Drive a step trace to its end and hand back the final outcome.
export function runToCompletion<N, R>(
  gen: Generator<SearchState<N>, SearchOutcome<N, R>, void>
): SearchOutcome<N, R> {
  let step = gen.next();
  while (!step.done) step = gen.next();
  return step.value;
}

// ---------- Grid helpers ----------
export const idOf = (N: number, r: number, c: number) => r * N + c;
export const rcOf = (N: number, id: number): Cell => ({
  r: Math.floor(id / N),
  c: id % N,
});

// Deterministic RNG, 32-bit LCG
export function createLCG(seed: number) {
  let s = seed >>> 0 || 1;
  return () => {
    s = (1664525 * s + 1013904223) >>> 0;
    return s / 2 ** 32;
  };
}

const STRAIGHT: [number, number][] = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1],
];
const DIAGONAL: [number, number][] = [
  [1, 1],
  [1, -1],
  [-1, 1],
  [-1, -1],
];

export function neighbors(N: number, id: number, diag: boolean): number[] {
  const { r, c } = rcOf(N, id);
  const out: number[] = [];
  for (const [dr, dc] of diag ? STRAIGHT.concat(DIAGONAL) : STRAIGHT) {
    const nr = r + dr,
      nc = c + dc;
    if (nr >= 0 && nr < N && nc >= 0 && nc < N) out.push(idOf(N, nr, nc));
  }
  return out;
}

/** Step counts from `start` through free cells; -1 marks unreachable cells. */
export function bfsDistances(
  N: number,
  blocks: Uint8Array,
  start: number,
  diag: boolean
): Int32Array {
  const dist = new Int32Array(N * N).fill(-1);
  const q: number[] = [start];
  dist[start] = 0;
  for (let head = 0; head < q.length; head++) {
    const v = q[head];
    for (const nb of neighbors(N, v, diag)) {
      if (blocks[nb] === 1 || dist[nb] !== -1) continue;
      dist[nb] = dist[v] + 1;
      q.push(nb);
    }
  }
  return dist;
}

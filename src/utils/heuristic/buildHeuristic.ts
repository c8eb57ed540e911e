import type { HeuristicType } from "../../types/types";
import { rcOf } from "../utils";

export const manhattan = (N: number, a: number, b: number) => {
  const A = rcOf(N, a),
    B = rcOf(N, b);
  return Math.abs(A.r - B.r) + Math.abs(A.c - B.c);
};
export const chebyshev = (N: number, a: number, b: number) => {
  const A = rcOf(N, a),
    B = rcOf(N, b);
  return Math.max(Math.abs(A.r - B.r), Math.abs(A.c - B.c));
};
export const euclidean = (N: number, a: number, b: number) => {
  const A = rcOf(N, a),
    B = rcOf(N, b);
  return Math.hypot(A.r - B.r, A.c - B.c);
};

// Distance-to-goal estimate in steps. Manhattan overestimates once diagonal
// moves are allowed, so it falls back to Chebyshev there.
export function buildHeuristic(
  N: number,
  goal: number,
  diag: boolean,
  type: HeuristicType
): (id: number) => number {
  switch (type) {
    case "Chebyshev":
      return (id) => chebyshev(N, id, goal);
    case "Euclidean":
      return (id) => euclidean(N, id, goal);
    default:
      return diag
        ? (id) => chebyshev(N, id, goal)
        : (id) => manhattan(N, id, goal);
  }
}

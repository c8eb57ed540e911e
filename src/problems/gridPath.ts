import type { CostBounds } from "../types/types";
import type { GridMap } from "../utils/mapGen/mapGen";
import { neighbors } from "../utils/utils";

// A path prefix from the start; every move costs one step.
export interface GridPathNode {
  id: number;
  g: number;
  parent: GridPathNode | null;
}

export interface GridPathProblem {
  root: GridPathNode;
  getChildren(node: GridPathNode): GridPathNode[];
  isGoal(node: GridPathNode): boolean;
  getCostBounds(node: GridPathNode): CostBounds;
  getHeuristicCost(node: GridPathNode): number;
  getScore(node: GridPathNode): number;
  sameCell(a: GridPathNode, b: GridPathNode): boolean;
}

export function gridPathProblem(
  map: GridMap,
  heuristic: (id: number) => number
): GridPathProblem {
  const { N, blocks, start, goal, diag } = map;
  const isGoal = (node: GridPathNode) => node.id === goal;

  return {
    root: { id: start, g: 0, parent: null },
    getChildren(node) {
      const out: GridPathNode[] = [];
      for (const m of neighbors(N, node.id, diag)) {
        if (blocks[m] === 1) continue;
        if (node.parent && node.parent.id === m) continue; // no immediate backtrack
        out.push({ id: m, g: node.g + 1, parent: node });
      }
      return out;
    },
    isGoal,
    getCostBounds(node) {
      return {
        lower: node.g + heuristic(node.id),
        upper: isGoal(node) ? node.g : Infinity,
      };
    },
    getHeuristicCost: (node) => node.g + heuristic(node.id),
    getScore: (node) => heuristic(node.id),
    sameCell: (a, b) => a.id === b.id,
  };
}

// Cell ids from the start to `node`, inclusive.
export function pathOf(node: GridPathNode): number[] {
  const path: number[] = [];
  for (let cur: GridPathNode | null = node; cur; cur = cur.parent) {
    path.push(cur.id);
  }
  return path.reverse();
}

import { SearchError } from "../errors";
import type { CostBounds } from "../types/types";

export interface TreeNode {
  depth: number;
  index: number; // position within its level, left to right
}

export interface LeafTreeProblem {
  root: TreeNode;
  height: number;
  /** Cheapest leaf below `node`; exact, so it serves as both bounds. */
  subtreeMin(node: TreeNode): number;
  getCostBounds(node: TreeNode): CostBounds;
  getChildren(node: TreeNode): TreeNode[];
  isGoal(node: TreeNode): boolean;
}

/**
 * Complete binary tree whose leaves carry `leafCosts`, left to right.
 * The number of leaves must be a power of two.
 */
export function leafTreeProblem(leafCosts: readonly number[]): LeafTreeProblem {
  const height = Math.log2(leafCosts.length);
  if (!Number.isInteger(height)) {
    throw new SearchError(
      "INVALID_PROBLEM",
      `a complete binary tree needs a power-of-two leaf count, got ${leafCosts.length}`,
      { leaves: leafCosts.length }
    );
  }

  const subtreeMin = ({ depth, index }: TreeNode) => {
    const span = 2 ** (height - depth);
    return Math.min(...leafCosts.slice(index * span, (index + 1) * span));
  };

  return {
    root: { depth: 0, index: 0 },
    height,
    subtreeMin,
    getCostBounds(node) {
      const m = subtreeMin(node);
      return { lower: m, upper: m };
    },
    getChildren({ depth, index }) {
      if (depth === height) return [];
      return [
        { depth: depth + 1, index: 2 * index },
        { depth: depth + 1, index: 2 * index + 1 },
      ];
    },
    isGoal: (node) => node.depth === height,
  };
}

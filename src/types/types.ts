export type Cell = { r: number; c: number };

export type AlgoKey = "TreeBB" | "GraphBB" | "HeuristicBB" | "Greedy";

export type CostBounds = { lower: number; upper: number };

export type GetCostBounds<N> = (node: N) => CostBounds;
export type GetCost<N> = (node: N) => number;
export type GetChildren<N> = (node: N) => Iterable<N>;
export type NodeTest<N> = (node: N) => boolean;
export type AreEqual<N> = (a: N, b: N) => boolean;
export type SelectNext = (costs: readonly number[]) => number;

export type MapType = "Empty" | "Random" | "Maze";

export type HeuristicType = "Manhattan" | "Chebyshev" | "Euclidean";

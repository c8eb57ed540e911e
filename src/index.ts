export { algoTreeBranchBound, branchBoundOnTree } from "./algorithms/TreeBranchBound";
export { algoGraphBranchBound, branchBoundOnGraph } from "./algorithms/GraphBranchBound";
export {
  algoHeuristicBranchBound,
  heuristicBranchBound,
} from "./algorithms/HeuristicBranchBound";
export { algoGreedy, greedySearch } from "./algorithms/Greedy";
export { SearchError } from "./errors";
export type { SearchErrorCode } from "./errors";
export type {
  FrontierEntry,
  GridConfig,
  SearchOptions,
  SearchOutcome,
  SearchState,
} from "./interfaces/interfaces";
export type {
  AlgoKey,
  AreEqual,
  CostBounds,
  GetChildren,
  GetCost,
  GetCostBounds,
  NodeTest,
  SelectNext,
} from "./types/types";
export { logger } from "./utils/logger";
export { defaultEquals, runToCompletion, selectLastMinimum } from "./utils/utils";

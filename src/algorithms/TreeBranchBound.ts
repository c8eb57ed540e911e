import type {
  SearchOptions,
  SearchOutcome,
  SearchState,
} from "../interfaces/interfaces";
import type { GetChildren, GetCostBounds, NodeTest } from "../types/types";
import { Frontier } from "../utils/Frontier/Frontier";
import { logger } from "../utils/logger";
import { runToCompletion } from "../utils/utils";

/**
 * Step trace of branch-and-bound over a search tree. Yields once per expanded
 * node and returns the goal reached, or the last expanded node if the frontier
 * runs dry first.
 *
 * Nodes reachable along several paths are expanded once per path, so the
 * search space must really be a tree.
 */
export function* algoTreeBranchBound<N>(
  initNode: N,
  getCostBounds: GetCostBounds<N>,
  getChildren: GetChildren<N>,
  isGoal: NodeTest<N>,
  options: SearchOptions = {}
): Generator<SearchState<N>, SearchOutcome<N, N>, void> {
  const log = (options.logger ?? logger).child({ algo: "TreeBB" });
  const frontier = new Frontier<N>();
  const snapshots = options.snapshots ?? true;
  const begin = performance.now();
  const meta = { nodesExpanded: 0, peakFrontier: 0 };
  let highestCost = Infinity;
  let current = initNode;

  const state = (found: boolean, finished: boolean): SearchState<N> => ({
    key: "TreeBB",
    current,
    frontier: snapshots || finished ? frontier.snapshot() : [],
    visitedCount: 0,
    bound: highestCost,
    found,
    finished,
    nodesExpanded: meta.nodesExpanded,
    peakFrontier: meta.peakFrontier,
    lastRuntimeMs: performance.now() - begin,
  });

  while (!isGoal(current)) {
    meta.nodesExpanded++;
    for (const child of getChildren(current)) {
      const bounds = getCostBounds(child);
      if (bounds.lower <= highestCost) {
        highestCost = Math.min(highestCost, bounds.upper);
        frontier.push(child, bounds.lower);
      }
    }
    meta.peakFrontier = Math.max(meta.peakFrontier, frontier.size());
    log.trace(
      { expanded: meta.nodesExpanded, frontier: frontier.size(), highestCost },
      "expanded node"
    );
    yield state(false, false);

    const next = frontier.popLastMinimum();
    if (!next) {
      log.debug({ nodesExpanded: meta.nodesExpanded }, "frontier exhausted");
      return { ...state(false, true), finished: true, result: current };
    }
    current = next.node;
  }

  log.debug(
    { nodesExpanded: meta.nodesExpanded, peakFrontier: meta.peakFrontier },
    "goal reached"
  );
  return { ...state(true, true), finished: true, result: current };
}

export function branchBoundOnTree<N>(
  initNode: N,
  getCostBounds: GetCostBounds<N>,
  getChildren: GetChildren<N>,
  isGoal: NodeTest<N>,
  options: SearchOptions = {}
): N {
  return runToCompletion(
    algoTreeBranchBound(initNode, getCostBounds, getChildren, isGoal, {
      ...options,
      snapshots: false,
    })
  ).result;
}

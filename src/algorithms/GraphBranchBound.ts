import type {
  SearchOptions,
  SearchOutcome,
  SearchState,
} from "../interfaces/interfaces";
import type {
  AreEqual,
  GetChildren,
  GetCostBounds,
  NodeTest,
} from "../types/types";
import { Frontier } from "../utils/Frontier/Frontier";
import { logger } from "../utils/logger";
import { containsEqual, defaultEquals, runToCompletion } from "../utils/utils";

/**
 * Branch-and-bound over a graph. Every generated child is checked against all
 * nodes seen so far; duplicates are dropped before their bounds are computed.
 */
export function* algoGraphBranchBound<N>(
  initNode: N,
  getCostBounds: GetCostBounds<N>,
  getChildren: GetChildren<N>,
  isGoal: NodeTest<N>,
  areEqual: AreEqual<N> = defaultEquals,
  options: SearchOptions = {}
): Generator<SearchState<N>, SearchOutcome<N, N>, void> {
  const log = (options.logger ?? logger).child({ algo: "GraphBB" });
  const frontier = new Frontier<N>();
  const snapshots = options.snapshots ?? true;
  const visited: N[] = [initNode];
  const begin = performance.now();
  const meta = { nodesExpanded: 0, peakFrontier: 0, duplicates: 0 };
  let highestCost = Infinity;
  let current = initNode;

  const state = (found: boolean, finished: boolean): SearchState<N> => ({
    key: "GraphBB",
    current,
    frontier: snapshots || finished ? frontier.snapshot() : [],
    visitedCount: visited.length,
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
      if (containsEqual(visited, child, areEqual)) {
        meta.duplicates++;
        continue;
      }
      // marked even if the bound check below prunes it
      visited.push(child);
      const bounds = getCostBounds(child);
      if (bounds.lower <= highestCost) {
        highestCost = Math.min(highestCost, bounds.upper);
        frontier.push(child, bounds.lower);
      }
    }
    meta.peakFrontier = Math.max(meta.peakFrontier, frontier.size());
    log.trace(
      {
        expanded: meta.nodesExpanded,
        frontier: frontier.size(),
        visited: visited.length,
        highestCost,
      },
      "expanded node"
    );
    yield state(false, false);

    const next = frontier.popLastMinimum();
    if (!next) {
      log.debug(
        { nodesExpanded: meta.nodesExpanded, duplicates: meta.duplicates },
        "frontier exhausted"
      );
      return { ...state(false, true), finished: true, result: current };
    }
    current = next.node;
  }

  log.debug(
    {
      nodesExpanded: meta.nodesExpanded,
      peakFrontier: meta.peakFrontier,
      duplicates: meta.duplicates,
    },
    "goal reached"
  );
  return { ...state(true, true), finished: true, result: current };
}

export function branchBoundOnGraph<N>(
  initNode: N,
  getCostBounds: GetCostBounds<N>,
  getChildren: GetChildren<N>,
  isGoal: NodeTest<N>,
  areEqual: AreEqual<N> = defaultEquals,
  options: SearchOptions = {}
): N {
  return runToCompletion(
    algoGraphBranchBound(
      initNode,
      getCostBounds,
      getChildren,
      isGoal,
      areEqual,
      { ...options, snapshots: false }
    )
  ).result;
}

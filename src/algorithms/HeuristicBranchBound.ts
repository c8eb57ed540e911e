import { SearchError } from "../errors";
import type {
  SearchOptions,
  SearchOutcome,
  SearchState,
} from "../interfaces/interfaces";
import type {
  AreEqual,
  GetChildren,
  GetCost,
  NodeTest,
  SelectNext,
} from "../types/types";
import { Frontier } from "../utils/Frontier/Frontier";
import { logger } from "../utils/logger";
import {
  containsEqual,
  defaultEquals,
  runToCompletion,
  selectLastMinimum,
} from "../utils/utils";

/**
 * Branch-and-bound driven by one lower-bound heuristic per node.
 *
 * Solutions are leaves: a dequeued solution either becomes the new optimum
 * (and prunes the frontier down to its cost) or is dropped. It is never
 * expanded. Yields once per dequeued node; returns `result: null` when no
 * solution beat `initialUpperBound`.
 */
export function* algoHeuristicBranchBound<N>(
  initNode: N,
  getHeuristicCost: GetCost<N>,
  getChildren: GetChildren<N>,
  isSolution: NodeTest<N>,
  areEqual: AreEqual<N> = defaultEquals,
  initialUpperBound = Infinity,
  selectNext: SelectNext = selectLastMinimum,
  options: SearchOptions = {}
): Generator<SearchState<N>, SearchOutcome<N, N | null>, void> {
  const log = (options.logger ?? logger).child({ algo: "HeuristicBB" });
  const frontier = new Frontier<N>();
  const snapshots = options.snapshots ?? true;
  const visited: N[] = [initNode];
  const begin = performance.now();
  const meta = { nodesExpanded: 0, peakFrontier: 1, solutions: 0 };
  let lowestCost = initialUpperBound;
  let optimum: N | null = null;
  let current: N | null = null;

  frontier.push(initNode, getHeuristicCost(initNode));

  const state = (finished: boolean): SearchState<N> => ({
    key: "HeuristicBB",
    current,
    frontier: snapshots || finished ? frontier.snapshot() : [],
    visitedCount: visited.length,
    bound: lowestCost,
    found: optimum !== null,
    finished,
    nodesExpanded: meta.nodesExpanded,
    peakFrontier: meta.peakFrontier,
    lastRuntimeMs: performance.now() - begin,
  });

  while (frontier.size()) {
    const i = selectNext(frontier.costs());
    const entry = frontier.takeAt(i);
    if (!entry) {
      throw new SearchError(
        "INVALID_SELECTION",
        `selectNext returned index ${i} for a frontier of ${frontier.size()} entries`,
        { index: i, frontierSize: frontier.size() }
      );
    }
    const { node, cost } = entry;
    current = node;

    if (isSolution(node)) {
      if (cost < lowestCost) {
        lowestCost = cost;
        optimum = node;
        meta.solutions++;
        const pruned = frontier.pruneAbove(lowestCost);
        log.trace({ lowestCost, pruned }, "accepted solution");
      }
    } else {
      meta.nodesExpanded++;
      for (const child of getChildren(node)) {
        if (containsEqual(visited, child, areEqual)) continue;
        visited.push(child);
        const childCost = getHeuristicCost(child);
        if (childCost <= lowestCost) frontier.push(child, childCost);
      }
      meta.peakFrontier = Math.max(meta.peakFrontier, frontier.size());
      log.trace(
        { expanded: meta.nodesExpanded, frontier: frontier.size(), lowestCost },
        "expanded node"
      );
    }
    yield state(false);
  }

  log.debug(
    {
      nodesExpanded: meta.nodesExpanded,
      peakFrontier: meta.peakFrontier,
      solutions: meta.solutions,
      lowestCost,
    },
    optimum === null ? "no solution found" : "search finished"
  );
  return { ...state(true), finished: true, result: optimum };
}

export function heuristicBranchBound<N>(
  initNode: N,
  getHeuristicCost: GetCost<N>,
  getChildren: GetChildren<N>,
  isSolution: NodeTest<N>,
  areEqual: AreEqual<N> = defaultEquals,
  initialUpperBound = Infinity,
  selectNext: SelectNext = selectLastMinimum,
  options: SearchOptions = {}
): N | null {
  return runToCompletion(
    algoHeuristicBranchBound(
      initNode,
      getHeuristicCost,
      getChildren,
      isSolution,
      areEqual,
      initialUpperBound,
      selectNext,
      { ...options, snapshots: false }
    )
  ).result;
}

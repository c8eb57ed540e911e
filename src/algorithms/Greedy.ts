import type {
  SearchOptions,
  SearchOutcome,
  SearchState,
} from "../interfaces/interfaces";
import type { GetChildren, GetCost } from "../types/types";
import { logger } from "../utils/logger";
import { runToCompletion } from "../utils/utils";

// Hill descent: always step to the lowest-scoring child that beats the running
// best. The start node is never scored, so any child beats it.
export function* algoGreedy<N>(
  initNode: N,
  getChildren: GetChildren<N>,
  getScore: GetCost<N>,
  options: SearchOptions = {}
): Generator<SearchState<N>, SearchOutcome<N, N>, void> {
  const log = (options.logger ?? logger).child({ algo: "Greedy" });
  const begin = performance.now();
  const meta = { nodesExpanded: 0 };
  let bestScore = Infinity;
  let current = initNode;

  const state = (finished: boolean): SearchState<N> => ({
    key: "Greedy",
    current,
    frontier: [],
    visitedCount: 0,
    bound: bestScore,
    found: finished,
    finished,
    nodesExpanded: meta.nodesExpanded,
    peakFrontier: 0,
    lastRuntimeMs: performance.now() - begin,
  });

  while (true) {
    meta.nodesExpanded++;
    let moved = false;
    let next = current;
    for (const child of getChildren(current)) {
      const score = getScore(child);
      if (score < bestScore) {
        bestScore = score;
        next = child;
        moved = true;
      }
    }
    if (!moved) break;
    current = next;
    log.trace({ step: meta.nodesExpanded, bestScore }, "moved");
    yield state(false);
  }

  log.debug(
    { nodesExpanded: meta.nodesExpanded, bestScore },
    "reached local optimum"
  );
  return { ...state(true), finished: true, result: current };
}

export function greedySearch<N>(
  initNode: N,
  getChildren: GetChildren<N>,
  getScore: GetCost<N>,
  options: SearchOptions = {}
): N {
  return runToCompletion(algoGreedy(initNode, getChildren, getScore, options))
    .result;
}

// experiments/experiment-runner.ts
//
// Runs tree, graph and heuristic branch-and-bound plus greedy descent on
// seeded grid maps and writes a CSV with timings, expansions, frontier size,
// path length and optimality against the BFS distance.
//
// Run with:
//   npm run experiment
// Tune through EXP_* variables, see experiments/config.ts.

import { writeFileSync } from "fs";
import pino from "pino";
import { algoGraphBranchBound } from "../src/algorithms/GraphBranchBound";
import { algoGreedy } from "../src/algorithms/Greedy";
import { algoHeuristicBranchBound } from "../src/algorithms/HeuristicBranchBound";
import { algoTreeBranchBound } from "../src/algorithms/TreeBranchBound";
import type { GridConfig, SearchOutcome } from "../src/interfaces/interfaces";
import { gridPathProblem, pathOf } from "../src/problems/gridPath";
import type { GridPathNode } from "../src/problems/gridPath";
import type { AlgoKey, HeuristicType } from "../src/types/types";
import { buildHeuristic } from "../src/utils/heuristic/buildHeuristic";
import { buildMap } from "../src/utils/mapGen/mapGen";
import { bfsDistances, runToCompletion } from "../src/utils/utils";
import { loadExperimentConfig } from "./config";

interface AlgoResult {
  algo: AlgoKey;
  runtimeMs: number;
  nodesExpanded: number;
  peakFrontier: number;
  pathLength: number | null;
  found: boolean;
  optimal: boolean | null; // null if the goal is unreachable
}

function runAllAlgorithms(
  grid: GridConfig,
  heuristicType: HeuristicType
): AlgoResult[] {
  const map = buildMap(grid);
  const h = buildHeuristic(map.N, map.goal, map.diag, heuristicType);
  const p = gridPathProblem(map, h);
  const shortest = bfsDistances(map.N, map.blocks, map.start, map.diag)[map.goal];

  const summarize = (
    algo: AlgoKey,
    outcome: SearchOutcome<GridPathNode, GridPathNode | null>
  ): AlgoResult => {
    const found = outcome.result !== null && p.isGoal(outcome.result);
    const pathLength =
      found && outcome.result ? pathOf(outcome.result).length - 1 : null;
    return {
      algo,
      runtimeMs: outcome.lastRuntimeMs,
      nodesExpanded: outcome.nodesExpanded,
      peakFrontier: outcome.peakFrontier,
      pathLength,
      found,
      optimal: shortest < 0 ? null : pathLength === shortest,
    };
  };

  const results: AlgoResult[] = [];
  const reachable = shortest >= 0;

  // Only perfect mazes are trees; elsewhere the tree search revisits cells forever.
  if (grid.mapType === "Maze" && reachable) {
    results.push(
      summarize(
        "TreeBB",
        runToCompletion(
          algoTreeBranchBound(p.root, p.getCostBounds, p.getChildren, p.isGoal)
        )
      )
    );
  }
  results.push(
    summarize(
      "GraphBB",
      runToCompletion(
        algoGraphBranchBound(
          p.root,
          p.getCostBounds,
          p.getChildren,
          p.isGoal,
          p.sameCell
        )
      )
    )
  );
  results.push(
    summarize(
      "HeuristicBB",
      runToCompletion(
        algoHeuristicBranchBound(
          p.root,
          p.getHeuristicCost,
          p.getChildren,
          p.isGoal,
          p.sameCell
        )
      )
    )
  );
  results.push(
    summarize("Greedy", runToCompletion(algoGreedy(p.root, p.getChildren, p.getScore)))
  );
  return results;
}

// ---------- Main experiment loop ----------
function main() {
  const config = loadExperimentConfig();
  const log = pino({ name: "experiments", level: config.EXP_LOG_LEVEL });
  const rows: string[] = [
    [
      "trial",
      "N",
      "mapType",
      "density",
      "seed",
      "diag",
      "heuristic",
      "algo",
      "runtimeMs",
      "nodesExpanded",
      "peakFrontier",
      "pathLength",
      "found",
      "optimal",
    ].join(","),
  ];

  let trialIndex = 0;
  for (const N of config.EXP_SIZES) {
    for (const mapType of config.EXP_MAP_TYPES) {
      const densities: number[] = mapType === "Random" ? config.EXP_DENSITIES : [0];
      for (const density of densities) {
        for (const heuristicType of config.EXP_HEURISTICS) {
          for (let t = 0; t < config.EXP_TRIALS; t++) {
            const grid: GridConfig = {
              N,
              mapType,
              density,
              seed: 1000 * trialIndex + t,
              diag: config.EXP_DIAG,
            };
            for (const r of runAllAlgorithms(grid, heuristicType)) {
              rows.push(
                [
                  trialIndex,
                  N,
                  mapType,
                  density,
                  grid.seed,
                  grid.diag ? "1" : "0",
                  heuristicType,
                  r.algo,
                  r.runtimeMs.toFixed(4),
                  r.nodesExpanded,
                  r.peakFrontier,
                  r.pathLength ?? "",
                  r.found ? "1" : "0",
                  r.optimal == null ? "" : r.optimal ? "1" : "0",
                ].join(",")
              );
            }
            trialIndex++;
            log.info({ trial: trialIndex, N, mapType, density, heuristicType }, "trial done");
          }
        }
      }
    }
  }

  writeFileSync(config.EXP_OUTPUT, rows.join("\n"), "utf8");
  log.info({ rows: rows.length - 1, output: config.EXP_OUTPUT }, "wrote results");
}

main();

import type { Logger } from "pino";
import type { AlgoKey, MapType } from "../types/types";

export interface FrontierEntry<N> {
  node: N;
  cost: number;
}

export interface SearchState<N> {
  key: AlgoKey;
  current: N | null; // node processed this tick
  frontier: FrontierEntry<N>[]; // copy, safe to keep
  visitedCount: number;
  bound: number; // highest/lowest cost, or greedy's running score
  found: boolean;
  finished: boolean;
  nodesExpanded: number;
  peakFrontier: number;
  lastRuntimeMs: number;
}

export interface SearchOutcome<N, R> extends SearchState<N> {
  finished: true;
  result: R;
}

export interface SearchOptions {
  /** Defaults to the package logger, silent unless SEARCH_LOG_LEVEL is set. */
  logger?: Logger;
  /**
   * Copy the frontier into every yielded state. Defaults to true for the step
   * traces; the plain search functions turn it off and only the final outcome
   * carries a frontier copy.
   */
  snapshots?: boolean;
}

export interface GridConfig {
  N: number;
  mapType: MapType;
  density: number; // for Random
  seed: number;
  diag: boolean; // allow 8-neighbors
}

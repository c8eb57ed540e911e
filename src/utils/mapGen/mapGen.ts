import type { GridConfig } from "../../interfaces/interfaces";
import type { Cell } from "../../types/types";
import { bfsDistances, createLCG, idOf } from "../utils";

export interface GridMap {
  N: number;
  blocks: Uint8Array; // 0 free, 1 wall
  start: number;
  goal: number;
  diag: boolean;
}

export function generateRandom(N: number, density: number, seed: number) {
  const blocks = new Uint8Array(N * N);
  const next = createLCG(seed);
  for (let i = 0; i < N * N; i++) blocks[i] = next() < density ? 1 : 0;
  return blocks;
}

// Perfect maze from a DFS backtracker; passages sit on odd coordinates.
export function generateMaze(N: number, seed: number) {
  const blocks = new Uint8Array(N * N).fill(1);
  const next = createLCG(seed);
  const isRoom = (r: number, c: number) =>
    r > 0 && r < N - 1 && c > 0 && c < N - 1 && r % 2 === 1 && c % 2 === 1;

  const origin: Cell = N <= 2 ? { r: 0, c: 0 } : { r: 1, c: 1 };
  const stack: Cell[] = [origin];
  blocks[idOf(N, origin.r, origin.c)] = 0;
  const steps: [number, number][] = [
    [2, 0],
    [-2, 0],
    [0, 2],
    [0, -2],
  ];

  while (stack.length) {
    const cur = stack[stack.length - 1];
    for (let i = steps.length - 1; i > 0; i--) {
      const j = Math.floor(next() * (i + 1));
      [steps[i], steps[j]] = [steps[j], steps[i]];
    }
    const open = steps.find(
      ([dr, dc]) =>
        isRoom(cur.r + dr, cur.c + dc) &&
        blocks[idOf(N, cur.r + dr, cur.c + dc)] === 1
    );
    if (!open) {
      stack.pop();
      continue;
    }
    const [dr, dc] = open;
    blocks[idOf(N, cur.r + dr / 2, cur.c + dc / 2)] = 0;
    blocks[idOf(N, cur.r + dr, cur.c + dc)] = 0;
    stack.push({ r: cur.r + dr, c: cur.c + dc });
  }
  return blocks;
}

/**
 * Builds the map for `config` and places the goal on the reachable cell
 * farthest (in steps) from the start, the first free cell in row order.
 */
export function buildMap(config: GridConfig): GridMap {
  const { N, mapType, density, seed, diag } = config;
  const blocks =
    mapType === "Maze"
      ? generateMaze(N, seed)
      : mapType === "Random"
        ? generateRandom(N, density, seed)
        : new Uint8Array(N * N);

  let start = blocks.indexOf(0);
  if (start === -1) {
    start = 0;
    blocks[0] = 0;
  }
  const dist = bfsDistances(N, blocks, start, diag);
  let goal = start;
  for (let i = 0; i < dist.length; i++) {
    if (dist[i] > dist[goal]) goal = i;
  }
  return { N, blocks, start, goal, diag };
}

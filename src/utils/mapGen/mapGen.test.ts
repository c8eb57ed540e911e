import { describe, expect, it } from "vitest";
import { bfsDistances, idOf } from "../utils";
import { buildMap, generateMaze, generateRandom } from "./mapGen";

describe("generateMaze", () => {
  it("carves a perfect maze over the odd cells", () => {
    const N = 9;
    const blocks = generateMaze(N, 5);
    const free = blocks.reduce((n, b) => n + (b === 0 ? 1 : 0), 0);
    // 16 rooms joined by a spanning tree of 15 passages
    expect(free).toBe(31);

    const dist = bfsDistances(N, blocks, idOf(N, 1, 1), false);
    for (let r = 1; r < N; r += 2) {
      for (let c = 1; c < N; c += 2) {
        expect(dist[idOf(N, r, c)]).toBeGreaterThanOrEqual(0);
      }
    }
    for (let i = 0; i < N; i++) {
      expect(blocks[idOf(N, 0, i)]).toBe(1);
      expect(blocks[idOf(N, N - 1, i)]).toBe(1);
    }
  });

  it("is reproducible per seed", () => {
    expect(generateMaze(11, 42)).toEqual(generateMaze(11, 42));
  });
});

describe("buildMap", () => {
  it("keeps the start free on a fully walled random map", () => {
    const map = buildMap({ N: 4, mapType: "Random", density: 1, seed: 3, diag: false });
    expect(map.start).toBe(0);
    expect(map.goal).toBe(0);
    expect(map.blocks[0]).toBe(0);
  });

  it("fills random maps according to density", () => {
    expect(generateRandom(5, 0, 9).every((b) => b === 0)).toBe(true);
    expect(generateRandom(5, 1, 9).every((b) => b === 1)).toBe(true);
  });
});

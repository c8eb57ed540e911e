import { describe, expect, it, vi } from "vitest";
import { SearchError } from "../errors";
import type { SearchState } from "../interfaces/interfaces";
import { leafTreeProblem } from "../problems/leafTree";
import {
  algoHeuristicBranchBound,
  heuristicBranchBound,
} from "./HeuristicBranchBound";

// S expands to C, B, D, A (in that order). A and G are solutions;
// G is reached through C and only ties the best cost.
const EDGES: Record<string, string[]> = { S: ["C", "B", "D", "A"], C: ["G", "F"] };
const COST: Record<string, number> = { S: 0, C: 3, B: 6, D: 4, A: 3, G: 3, F: 5 };
const SOLUTIONS = new Set(["A", "G"]);

function setup() {
  return {
    getChildren: vi.fn((n: string) => EDGES[n] ?? []),
    getCost: vi.fn((n: string) => COST[n]),
    isSolution: (n: string) => SOLUTIONS.has(n),
  };
}

describe("heuristicBranchBound", () => {
  it("returns the cheapest solution", () => {
    const s = setup();
    expect(heuristicBranchBound("S", s.getCost, s.getChildren, s.isSolution)).toBe("A");
  });

  it("never expands a solution, improving or not", () => {
    const s = setup();
    heuristicBranchBound("S", s.getCost, s.getChildren, s.isSolution);
    expect(s.getChildren.mock.calls.map(([n]) => n)).toEqual(["S", "C"]);
  });

  it("prunes the frontier down to the accepted cost, keeping ties", () => {
    const s = setup();
    const gen = algoHeuristicBranchBound("S", s.getCost, s.getChildren, s.isSolution);
    const states: SearchState<string>[] = [];
    let step = gen.next();
    while (!step.done) {
      states.push(step.value);
      step = gen.next();
    }

    expect(states.map((st) => st.current)).toEqual(["S", "A", "C", "G"]);
    const afterAccept = states[1];
    expect(afterAccept.bound).toBe(3);
    expect(afterAccept.found).toBe(true);
    expect(afterAccept.frontier).toEqual([{ node: "C", cost: 3 }]);
    for (const st of states.slice(1)) {
      expect(st.frontier.every((e) => e.cost <= st.bound)).toBe(true);
    }
    expect(step.value).toMatchObject({ result: "A", finished: true, nodesExpanded: 2 });
  });

  it("does not enqueue children costing more than the best solution", () => {
    const s = setup();
    heuristicBranchBound("S", s.getCost, s.getChildren, s.isSolution);
    // F (cost 5) is generated after A was accepted at 3, so it is costed but never dequeued
    expect(s.getCost.mock.calls.map(([n]) => n)).toEqual(["S", "C", "B", "D", "A", "G", "F"]);
  });

  it("returns null when no solution is ever accepted", () => {
    const s = setup();
    expect(heuristicBranchBound("S", s.getCost, s.getChildren, () => false)).toBeNull();
  });

  it("starts pruning from the initial upper bound", () => {
    const s = setup();
    const result = heuristicBranchBound("S", s.getCost, s.getChildren, s.isSolution, undefined, 2);
    expect(result).toBeNull();
    expect(s.getChildren.mock.calls.map(([n]) => n)).toEqual(["S"]);
  });

  it("asks the selection policy with the current frontier costs", () => {
    const s = setup();
    const selectNext = vi.fn((costs: readonly number[]) => costs.length - 1);
    heuristicBranchBound("S", s.getCost, s.getChildren, s.isSolution, undefined, Infinity, selectNext);
    expect(selectNext.mock.calls[0][0]).toEqual([0]);
    expect(selectNext.mock.calls[1][0]).toEqual([3, 6, 4, 3]);
  });

  it("rejects a selection outside the frontier", () => {
    const s = setup();
    const run = () =>
      heuristicBranchBound("S", s.getCost, s.getChildren, s.isSolution, undefined, Infinity, () => 7);
    expect(run).toThrow(SearchError);
    expect(run).toThrow("selectNext returned index 7 for a frontier of 1 entries");
  });

  it("solves the leaf tree with subtree minima as the heuristic", () => {
    const p = leafTreeProblem([5, 3, 8, 1, 9, 2, 7, 4]);
    const first = heuristicBranchBound(p.root, p.subtreeMin, p.getChildren, p.isGoal);
    const second = heuristicBranchBound(p.root, p.subtreeMin, p.getChildren, p.isGoal);
    expect(first).toEqual({ depth: 3, index: 3 });
    expect(second).toEqual(first);
  });

  it("costs a node reached along two paths only once", () => {
    const edges: Record<string, string[]> = { S: ["A", "B"], A: ["D"], B: ["D"], D: ["G"] };
    const cost: Record<string, number> = { S: 0, A: 1, B: 1, D: 2, G: 3 };
    const getChildren = vi.fn((n: string) => edges[n] ?? []);
    const getCost = vi.fn((n: string) => cost[n]);

    expect(heuristicBranchBound("S", getCost, getChildren, (n) => n === "G")).toBe("G");
    expect(getCost.mock.calls.map(([n]) => n)).toEqual(["S", "A", "B", "D", "G"]);
    expect(getChildren.mock.calls.map(([n]) => n)).toEqual(["S", "B", "A", "D"]);
  });

  it("drops a child equal to the initial node under the given equality", () => {
    type Step = { id: string; via: string };
    const root: Step = { id: "S", via: "" };
    const getChildren = (n: Step): Step[] =>
      n.id === "S" ? [{ id: "X", via: "S" }, { id: "S", via: "S" }] : [];
    const getCost = vi.fn((n: Step) => (n.id === "S" ? 0 : 1));

    const result = heuristicBranchBound(
      root,
      getCost,
      getChildren,
      (n) => n.id === "X",
      (a, b) => a.id === b.id
    );
    expect(result).toEqual({ id: "X", via: "S" });
    expect(getCost.mock.calls.map(([n]) => n.id)).toEqual(["S", "X"]);
  });
});

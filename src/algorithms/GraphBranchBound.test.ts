import { describe, expect, it, vi } from "vitest";
import type { CostBounds } from "../types/types";
import { algoGraphBranchBound, branchBoundOnGraph } from "./GraphBranchBound";
import { runToCompletion } from "../utils/utils";

function graph(
  edges: Record<string, string[]>,
  bounds: Record<string, CostBounds>
) {
  return {
    getChildren: vi.fn((n: string) => edges[n] ?? []),
    getCostBounds: vi.fn((n: string) => bounds[n]),
  };
}

describe("branchBoundOnGraph", () => {
  // S -> A -> D -> G
  //  \-> B -/
  const diamond = () =>
    graph(
      { S: ["A", "B"], A: ["D"], B: ["D"], D: ["G"] },
      {
        A: { lower: 1, upper: 10 },
        B: { lower: 1, upper: 10 },
        D: { lower: 3, upper: 3 },
        G: { lower: 3, upper: 3 },
      }
    );

  it("bounds and expands a shared node only once", () => {
    const g = diamond();
    const result = branchBoundOnGraph("S", g.getCostBounds, g.getChildren, (n) => n === "G");

    expect(result).toBe("G");
    expect(g.getCostBounds.mock.calls.filter(([n]) => n === "D")).toHaveLength(1);
    expect(g.getChildren.mock.calls.map(([n]) => n)).toEqual(["S", "B", "A", "D"]);
  });

  it("gives the same answer on repeated calls", () => {
    const g = diamond();
    const first = branchBoundOnGraph("S", g.getCostBounds, g.getChildren, (n) => n === "G");
    const second = branchBoundOnGraph("S", g.getCostBounds, g.getChildren, (n) => n === "G");
    expect(first).toBe("G");
    expect(second).toBe(first);
    expect(g.getChildren.mock.calls.map(([n]) => n)).toEqual(["S", "B", "A", "D", "S", "B", "A", "D"]);
  });

  it("marks a child visited even when its bound prunes it", () => {
    const g = graph(
      { S: ["A", "P"], A: ["P", "G"] },
      {
        A: { lower: 1, upper: 2 },
        P: { lower: 3, upper: 3 },
        G: { lower: 2, upper: 2 },
      }
    );
    const result = branchBoundOnGraph("S", g.getCostBounds, g.getChildren, (n) => n === "G");

    expect(result).toBe("G");
    expect(g.getCostBounds.mock.calls.map(([n]) => n)).toEqual(["A", "P", "G"]);
  });

  it("does not loop on cycles back to the start", () => {
    const g = graph({ A: ["B"], B: ["A"] }, { B: { lower: 1, upper: 1 } });
    expect(branchBoundOnGraph("A", g.getCostBounds, g.getChildren, () => false)).toBe("B");
    expect(g.getChildren).toHaveBeenCalledTimes(2);
  });

  it("compares nodes by value unless told otherwise", () => {
    type Cell = { id: number; tag: string };
    const children = (n: Cell): Cell[] =>
      n.id === 0 ? [{ id: 1, tag: "first" }, { id: 1, tag: "second" }] : [];
    const bounds = (n: Cell) =>
      n.tag === "second" ? { lower: 0, upper: 0 } : { lower: 5, upper: 5 };
    const root: Cell = { id: 0, tag: "root" };
    const isGoal = (n: Cell) => n.id === 1;

    // by value the two children differ, so the cheaper second one wins
    expect(branchBoundOnGraph(root, bounds, children, isGoal)).toEqual({
      id: 1,
      tag: "second",
    });
    // keyed on id the second is a duplicate and never enqueued
    expect(
      branchBoundOnGraph(root, bounds, children, isGoal, (a, b) => a.id === b.id)
    ).toEqual({ id: 1, tag: "first" });
  });

  it("records every generated node in its final state", () => {
    const g = diamond();
    const outcome = runToCompletion(
      algoGraphBranchBound("S", g.getCostBounds, g.getChildren, (n) => n === "G")
    );
    expect(outcome).toMatchObject({
      key: "GraphBB",
      found: true,
      result: "G",
      visitedCount: 5,
      nodesExpanded: 4,
      bound: 3,
    });
  });
});

import type { FrontierEntry } from "../../interfaces/interfaces";
import { selectLastMinimum } from "../utils";

// Insertion-ordered on purpose: a heap would lose "last inserted wins" on ties.
export class Frontier<N> {
  private a: FrontierEntry<N>[] = [];
  size() {
    return this.a.length;
  }
  push(node: N, cost: number) {
    this.a.push({ node, cost });
  }
  costs(): number[] {
    return this.a.map((e) => e.cost);
  }
  takeAt(i: number): FrontierEntry<N> | undefined {
    if (!Number.isInteger(i) || i < 0 || i >= this.a.length) return undefined;
    return this.a.splice(i, 1)[0];
  }
  popLastMinimum(): FrontierEntry<N> | undefined {
    return this.takeAt(selectLastMinimum(this.costs()));
  }
  /** Drops every entry costing strictly more than `limit`; returns how many went. */
  pruneAbove(limit: number) {
    const before = this.a.length;
    this.a = this.a.filter((e) => !(e.cost > limit));
    return before - this.a.length;
  }
  snapshot(): FrontierEntry<N>[] {
    return this.a.map((e) => ({ ...e }));
  }
}

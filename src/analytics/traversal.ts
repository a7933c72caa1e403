import { AnalyticsAbortedError } from "../errors.js";
import { compareIds } from "../graph/graph-index.js";
import type { GraphSnapshot } from "../graph/snapshot.js";
import type { AnalyticsCallOptions } from "./types.js";

/**
 * Throw between node computations once the caller's signal has fired or
 * its deadline has passed.
 */
export function checkAborted(cancel: AnalyticsCallOptions = {}): void {
  const { signal, deadline } = cancel;
  if (signal?.aborted) {
    throw new AnalyticsAbortedError("Analytics call aborted", { reason: String(signal.reason) }, { cause: signal.reason });
  }
  if (deadline !== undefined && Date.now() > deadline) {
    throw new AnalyticsAbortedError("Analytics call exceeded its deadline", { deadline });
  }
}

function sortedNeighbors(snapshot: GraphSnapshot, id: string): string[] {
  return [...snapshot.blocks(id)].sort(compareIds);
}

/**
 * Strongly connected components of the `blocks` graph (iterative Tarjan).
 * Components come out in reverse topological order: every component is
 * emitted after all components reachable from it. Members are sorted.
 */
export function stronglyConnectedComponents(
  snapshot: GraphSnapshot,
  cancel: AnalyticsCallOptions = {},
): string[][] {
  const marks = new Map<string, { index: number; low: number }>();
  const onStack = new Set<string>();
  const stack: string[] = [];
  const components: string[][] = [];
  let counter = 0;

  for (const root of snapshot.ids) {
    if (marks.has(root)) continue;
    checkAborted(cancel);

    const frames: Array<{ id: string; next: string[]; mark: { index: number; low: number } }> = [];
    const enter = (id: string): void => {
      const mark = { index: counter, low: counter };
      counter++;
      marks.set(id, mark);
      stack.push(id);
      onStack.add(id);
      frames.push({ id, next: sortedNeighbors(snapshot, id).reverse(), mark });
    };
    enter(root);

    while (frames.length > 0) {
      const frame = frames[frames.length - 1];
      const neighbor = frame.next.pop();
      if (neighbor !== undefined) {
        const seen = marks.get(neighbor);
        if (!seen) {
          enter(neighbor);
        } else if (onStack.has(neighbor)) {
          frame.mark.low = Math.min(frame.mark.low, seen.index);
        }
        continue;
      }

      frames.pop();
      const parent = frames[frames.length - 1];
      if (parent) parent.mark.low = Math.min(parent.mark.low, frame.mark.low);

      if (frame.mark.low === frame.mark.index) {
        const component: string[] = [];
        let member: string | undefined;
        do {
          member = stack.pop();
          if (member === undefined) break;
          onStack.delete(member);
          component.push(member);
        } while (member !== frame.id);
        components.push(component.sort(compareIds));
      }
    }
  }

  return components;
}

/**
 * Memoized transitive closure over `blocks` edges. Reachability is computed
 * once per component of the condensation, so a whole analytics call costs
 * one pass instead of one traversal per node.
 */
export class Reachability {
  private readonly componentOf = new Map<string, number>();
  private readonly components: string[][];
  private readonly reach: Array<Set<string>> = [];

  constructor(private readonly snapshot: GraphSnapshot, cancel: AnalyticsCallOptions = {}) {
    this.components = stronglyConnectedComponents(snapshot, cancel);
    this.components.forEach((members, i) => {
      for (const id of members) this.componentOf.set(id, i);
    });

    // Reverse topological emission order: successors are always ready first.
    this.components.forEach((members, i) => {
      checkAborted(cancel);
      const reached = new Set<string>();
      for (const id of members) {
        for (const next of snapshot.blocks(id)) {
          const j = this.componentOf.get(next);
          if (j === undefined || j === i) continue;
          if (reached.has(next)) continue;
          for (const other of this.components[j]) reached.add(other);
          for (const further of this.reach[j]) reached.add(further);
        }
      }
      this.reach[i] = reached;
    });
  }

  /** Every node reachable from id through `blocks`, excluding id itself. Done nodes included. */
  reachable(id: string): Set<string> {
    const i = this.componentOf.get(id);
    if (i === undefined) return new Set();
    const result = new Set(this.reach[i]);
    for (const member of this.components[i]) {
      if (member !== id) result.add(member);
    }
    return result;
  }

  /**
   * Nodes transitively waiting on id: reachable through `blocks`, with done
   * nodes passed through but not counted. Sorted by id.
   */
  transitiveBlocked(id: string): string[] {
    return [...this.reachable(id)].filter((other) => !this.snapshot.isDone(other)).sort(compareIds);
  }

  /** Members of every component that contains a cycle. */
  cycleMembers(): Set<string> {
    const members = new Set<string>();
    for (const component of this.components) {
      if (component.length > 1) for (const id of component) members.add(id);
    }
    return members;
  }
}

/**
 * Every elementary cycle over `blocks` edges, each reported once. Cycles only
 * live inside a strongly connected component, so each component with more
 * than one member is searched on its own. A search from `start` only visits
 * members that sort after it, which makes `start` the smallest id of every
 * cycle it closes: the canonical rotation falls out of the search order.
 * Neighbors are taken in id order and the list is sorted.
 */
export function findCycles(snapshot: GraphSnapshot, cancel: AnalyticsCallOptions = {}): string[][] {
  const cycles: string[][] = [];

  for (const component of stronglyConnectedComponents(snapshot, cancel)) {
    if (component.length < 2) continue;
    const members = new Set(component);

    for (const start of component) {
      checkAborted(cancel);
      const candidates = (id: string): string[] =>
        sortedNeighbors(snapshot, id).filter(
          (next) => members.has(next) && (next === start || compareIds(next, start) > 0),
        );

      const path: string[] = [start];
      const onPath = new Set<string>([start]);
      const pending: string[][] = [candidates(start).reverse()];

      while (path.length > 0) {
        const next = pending[pending.length - 1].pop();
        if (next === undefined) {
          const left = path.pop();
          pending.pop();
          if (left !== undefined) onPath.delete(left);
          continue;
        }
        if (next === start) {
          cycles.push([...path]);
        } else if (!onPath.has(next)) {
          checkAborted(cancel);
          path.push(next);
          onPath.add(next);
          pending.push(candidates(next).reverse());
        }
      }
    }
  }

  return cycles.sort((a, b) => compareIds(a.join("\u0000"), b.join("\u0000")));
}

/**
 * Unfinished nodes reachable from one start node through `blocks` edges,
 * done nodes passed through. Sorted. A single BFS, for one-off lookups.
 */
export function transitiveBlockedFrom(snapshot: GraphSnapshot, start: string, cancel: AnalyticsCallOptions = {}): string[] {
  const visited = new Set<string>([start]);
  const queue = [start];
  const found: string[] = [];

  while (queue.length > 0) {
    checkAborted(cancel);
    const id = queue.shift();
    if (id === undefined) break;
    for (const next of snapshot.blocks(id)) {
      if (visited.has(next)) continue;
      visited.add(next);
      queue.push(next);
      if (!snapshot.isDone(next)) found.push(next);
    }
  }

  return found.sort(compareIds);
}

import type { Step } from "../schemas/flow.js";
import type { DependencyGraph } from "./types.js";

/**
 * Group topologically ordered steps into levels that can run in parallel.
 * No step depends on another step of its own level.
 *
 * PRECONDITION: `order` comes from topoOrder(graph), so every dependency's
 * level is known before its dependents are visited.
 *
 * - Level 0: steps without edges into them (unknown deps add no edge)
 * - Level N: max(levels of deps) + 1
 *
 * Example: `a → b, a → c, b → d, c → d` produces `[[a], [b, c], [d]]`.
 * Within a level, steps keep their relative order from `order`.
 */
export function groupIntoBatches(
  graph: DependencyGraph,
  order: readonly Step[],
): Step[][] {
  if (order.length === 0) return [];

  const incoming: number[][] = graph.nodes.map(() => []);
  for (const edge of graph.edges) {
    incoming[edge.to].push(edge.from);
  }

  const levels = new Map<number, number>();
  const batches: Step[][] = [];

  for (const step of order) {
    const node = graph.index.get(step.id);
    if (node === undefined) {
      throw new Error(`Step '${step.id}' is not part of the graph`);
    }
    let level = 0;
    for (const dep of incoming[node]) {
      const depLevel = levels.get(dep);
      if (depLevel === undefined) {
        throw new Error(
          `Step '${step.id}' visited before its dependency '${graph.nodes[dep].id}'`,
        );
      }
      level = Math.max(level, depLevel + 1);
    }
    levels.set(node, level);
    while (batches.length <= level) batches.push([]);
    batches[level].push(step);
  }

  return batches;
}

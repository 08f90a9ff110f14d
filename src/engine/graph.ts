import { defaultLogger } from "../logger.js";
import type { Flow, Step } from "../schemas/flow.js";
import { FlowError } from "./errors.js";
import type { DependencyGraph, Edge, GraphOptions } from "./types.js";

interface KahnResult {
  sorted: number[];
  /** Remaining in-degree per node; non-zero only for nodes left unsorted */
  inDegree: number[];
}

/**
 * Kahn's algorithm over node indexes.
 *
 * Determinism: the queue is seeded in declaration order and dependents are
 * enqueued in edge order, so the same graph always yields the same order.
 */
function kahn(nodeCount: number, edges: readonly Edge[]): KahnResult {
  const inDegree = new Array<number>(nodeCount).fill(0);
  const dependents: number[][] = Array.from({ length: nodeCount }, () => []);

  for (const edge of edges) {
    inDegree[edge.to]++;
    dependents[edge.from].push(edge.to);
  }

  const queue: number[] = [];
  for (let i = 0; i < nodeCount; i++) {
    if (inDegree[i] === 0) queue.push(i);
  }

  const sorted: number[] = [];
  while (queue.length > 0) {
    const node = queue.shift();
    if (node === undefined) break;
    sorted.push(node);
    for (const dependent of dependents[node]) {
      inDegree[dependent]--;
      if (inDegree[dependent] === 0) queue.push(dependent);
    }
  }

  return { sorted, inDegree };
}

/**
 * Find one cycle among the nodes Kahn could not sort.
 *
 * Every unsorted node still has an unsorted predecessor, so walking
 * predecessors from any of them must revisit a node. Returns the cycle in
 * dependency order, starting at the first unsorted node of the walk that
 * lies on it.
 */
function findCycle(
  nodeCount: number,
  edges: readonly Edge[],
  inDegree: number[],
): number[] {
  const predecessors: number[][] = Array.from({ length: nodeCount }, () => []);
  for (const edge of edges) {
    if (inDegree[edge.from] > 0 && inDegree[edge.to] > 0) {
      predecessors[edge.to].push(edge.from);
    }
  }

  const start = inDegree.findIndex((d) => d > 0);
  const walk: number[] = [];
  const seenAt = new Map<number, number>();
  let current = start;
  while (!seenAt.has(current)) {
    seenAt.set(current, walk.length);
    walk.push(current);
    current = predecessors[current][0];
  }

  // walk runs against edge direction; flip it back to dependency order
  const loop = walk.slice(seenAt.get(current));
  return [loop[0], ...loop.slice(1).reverse()];
}

function cycleError(
  flowId: string,
  nodes: readonly Step[],
  edges: readonly Edge[],
  inDegree: number[],
): FlowError {
  const cycle = findCycle(nodes.length, edges, inDegree).map(
    (i) => nodes[i].id,
  );
  const path = [...cycle, cycle[0]].join(" -> ");
  return new FlowError(
    "CYCLE_DETECTED",
    `Flow '${flowId}' contains a cycle at step '${cycle[0]}' (${path})`,
    { flow_id: flowId, step_id: cycle[0], cycle },
  );
}

/**
 * Build the dependency graph for a flow.
 *
 * - One node per step, in declaration order
 * - One edge per dependency that names a declared step
 * - Unknown dependencies are logged and skipped; the dependent will be
 *   blocked at run time because the dependency never produces a result
 *
 * @throws FlowError DUPLICATE_STEP_ID, CYCLE_DETECTED
 */
export function buildGraph(
  flow: Flow,
  opts: GraphOptions = {},
): DependencyGraph {
  const logger = opts.logger ?? defaultLogger;
  const index = new Map<string, number>();
  const nodes: Step[] = [];

  for (const step of flow.nodes) {
    if (index.has(step.id)) {
      throw new FlowError(
        "DUPLICATE_STEP_ID",
        `Flow '${flow.id}' declares step '${step.id}' more than once`,
        { flow_id: flow.id, step_id: step.id },
      );
    }
    index.set(step.id, nodes.length);
    nodes.push({ ...step, depends_on: [...step.depends_on] });
  }

  const edges: Edge[] = [];
  nodes.forEach((step, to) => {
    for (const dep of step.depends_on) {
      const from = index.get(dep);
      if (from === undefined) {
        logger.warn(
          { flow_id: flow.id, step_id: step.id, missing_dep: dep },
          `Step '${step.id}' depends on unknown step '${dep}'`,
        );
        continue;
      }
      edges.push({ from, to });
    }
  });

  const { sorted, inDegree } = kahn(nodes.length, edges);
  if (sorted.length !== nodes.length) {
    throw cycleError(flow.id, nodes, edges, inDegree);
  }

  logger.debug(
    { flow_id: flow.id, steps: nodes.length, edges: edges.length },
    `Loaded flow '${flow.id}' with ${nodes.length} steps`,
  );

  return {
    flow_id: flow.id,
    nodes: Object.freeze(nodes),
    edges: Object.freeze(edges),
    index,
  };
}

/**
 * Steps in an order where every dependency precedes its dependents.
 *
 * @throws FlowError CYCLE_DETECTED if the graph did not come from buildGraph()
 */
export function topoOrder(graph: DependencyGraph): Step[] {
  const { sorted, inDegree } = kahn(graph.nodes.length, graph.edges);
  if (sorted.length !== graph.nodes.length) {
    throw cycleError(graph.flow_id, graph.nodes, graph.edges, inDegree);
  }
  return sorted.map((i) => graph.nodes[i]);
}


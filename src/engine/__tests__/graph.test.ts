import pino from "pino";
import { describe, expect, test } from "vitest";
import type { Flow, Step } from "../../schemas/flow.js";
import { FlowError, buildGraph, topoOrder } from "../index.js";
import type { DependencyGraph } from "../index.js";

// Mock factories

function step(id: string, overrides: Partial<Step> = {}): Step {
  return { id, kind: "noop", depends_on: [], config: null, ...overrides };
}

function flow(nodes: Step[], id = "test-flow"): Flow {
  return { id, nodes };
}

function captureLogger() {
  const lines: Array<Record<string, unknown>> = [];
  const logger = pino(
    { level: "debug" },
    {
      write(msg: string) {
        lines.push(JSON.parse(msg));
      },
    },
  );
  return { logger, lines };
}

const silent = pino({ level: "silent" });

function catchFlowError(fn: () => unknown): FlowError {
  try {
    fn();
  } catch (e) {
    expect(e).toBeInstanceOf(FlowError);
    if (e instanceof FlowError) return e;
  }
  throw new Error("expected FlowError");
}

describe("buildGraph", () => {
  test("empty flow builds an empty graph", () => {
    const graph = buildGraph(flow([]), { logger: silent });
    expect(graph.nodes).toEqual([]);
    expect(graph.edges).toEqual([]);
  });

  test("one node per step in declaration order", () => {
    const graph = buildGraph(
      flow([step("c"), step("a"), step("b")]),
      { logger: silent },
    );
    expect(graph.nodes.map((s) => s.id)).toEqual(["c", "a", "b"]);
    expect(graph.index.get("c")).toBe(0);
    expect(graph.index.get("b")).toBe(2);
  });

  test("linear chain (a→b→c) has dependency → dependent edges", () => {
    const graph = buildGraph(
      flow([
        step("a"),
        step("b", { depends_on: ["a"] }),
        step("c", { depends_on: ["b"] }),
      ]),
      { logger: silent },
    );
    expect(graph.flow_id).toBe("test-flow");
    expect(graph.edges).toEqual([
      { from: 0, to: 1 },
      { from: 1, to: 2 },
    ]);
  });

  test("unknown dependency warns and adds no edge", () => {
    const { logger, lines } = captureLogger();
    const graph = buildGraph(
      flow([step("x", { depends_on: ["nonexistent_step"] })], "warn-flow"),
      { logger },
    );

    expect(graph.nodes).toHaveLength(1);
    expect(graph.edges).toEqual([]);

    const warnings = lines.filter((l) => l.level === 40);
    expect(warnings).toHaveLength(1);
    expect(warnings[0].msg).toBe(
      "Step 'x' depends on unknown step 'nonexistent_step'",
    );
    expect(warnings[0].missing_dep).toBe("nonexistent_step");
  });

  test("logs a debug line on success", () => {
    const { logger, lines } = captureLogger();
    buildGraph(flow([step("a"), step("b")]), { logger });
    const debug = lines.filter((l) => l.level === 20);
    expect(debug.map((l) => l.msg)).toEqual([
      "Loaded flow 'test-flow' with 2 steps",
    ]);
  });

  test("duplicate step id throws DUPLICATE_STEP_ID", () => {
    const err = catchFlowError(() =>
      buildGraph(flow([step("a"), step("b"), step("a")]), { logger: silent }),
    );
    expect(err.code).toBe("DUPLICATE_STEP_ID");
    expect(err.message).toBe(
      "Flow 'test-flow' declares step 'a' more than once",
    );
    expect(err.details?.step_id).toBe("a");
  });

  test("three-step cycle names a step on the cycle", () => {
    const err = catchFlowError(() =>
      buildGraph(
        flow(
          [
            step("a", { depends_on: ["c"] }),
            step("b", { depends_on: ["a"] }),
            step("c", { depends_on: ["b"] }),
          ],
          "bad-flow",
        ),
        { logger: silent },
      ),
    );
    expect(err.code).toBe("CYCLE_DETECTED");
    expect(err.message).toBe(
      "Flow 'bad-flow' contains a cycle at step 'a' (a -> b -> c -> a)",
    );
    expect(err.details?.cycle).toEqual(["a", "b", "c"]);
  });

  test("two-step cycle (a↔b)", () => {
    const err = catchFlowError(() =>
      buildGraph(
        flow([
          step("a", { depends_on: ["b"] }),
          step("b", { depends_on: ["a"] }),
        ]),
        { logger: silent },
      ),
    );
    expect(err.code).toBe("CYCLE_DETECTED");
    expect(err.details?.cycle).toEqual(["a", "b"]);
  });

  test("self-reference is a cycle", () => {
    const err = catchFlowError(() =>
      buildGraph(flow([step("a", { depends_on: ["a"] })]), { logger: silent }),
    );
    expect(err.code).toBe("CYCLE_DETECTED");
    expect(err.message).toBe(
      "Flow 'test-flow' contains a cycle at step 'a' (a -> a)",
    );
  });

  test("a step downstream of a cycle is not reported as on it", () => {
    const err = catchFlowError(() =>
      buildGraph(
        flow([
          step("x", { depends_on: ["a"] }),
          step("a", { depends_on: ["b"] }),
          step("b", { depends_on: ["a"] }),
        ]),
        { logger: silent },
      ),
    );
    expect(err.details?.step_id).toBe("a");
    expect(err.details?.cycle).toEqual(["a", "b"]);
  });

  test("does not mutate the input flow", () => {
    const input = flow([
      step("a"),
      step("b", { depends_on: ["a", "ghost"], config: { n: 1 } }),
    ]);
    const before = structuredClone(input);
    const graph = buildGraph(input, { logger: silent });

    expect(input).toEqual(before);
    expect(graph.nodes[1]).not.toBe(input.nodes[1]);
    expect(Object.isFrozen(graph.nodes)).toBe(true);
    expect(Object.isFrozen(graph.edges)).toBe(true);
  });
});

describe("topoOrder", () => {
  test("reverse-declared chain is sorted dependencies first", () => {
    const graph = buildGraph(
      flow([
        step("c", { depends_on: ["b"] }),
        step("b", { depends_on: ["a"] }),
        step("a"),
      ]),
      { logger: silent },
    );
    expect(topoOrder(graph).map((s) => s.id)).toEqual(["a", "b", "c"]);
  });

  test("diamond dependency produces a valid, deterministic order", () => {
    //   a
    //  / \
    // b1  b2
    //  \ /
    //   c
    const graph = buildGraph(
      flow([
        step("a"),
        step("b1", { depends_on: ["a"] }),
        step("b2", { depends_on: ["a"] }),
        step("c", { depends_on: ["b1", "b2"] }),
      ]),
      { logger: silent },
    );
    const first = topoOrder(graph).map((s) => s.id);
    expect(first).toEqual(["a", "b1", "b2", "c"]);
    expect(topoOrder(graph).map((s) => s.id)).toEqual(first);
  });

  test("independent steps keep declaration order", () => {
    const graph = buildGraph(flow([step("x"), step("y"), step("z")]), {
      logger: silent,
    });
    expect(topoOrder(graph).map((s) => s.id)).toEqual(["x", "y", "z"]);
  });

  test("roots are visited before later-unlocked dependents", () => {
    const graph = buildGraph(
      flow([step("a"), step("b", { depends_on: ["a"] }), step("x")]),
      { logger: silent },
    );
    expect(topoOrder(graph).map((s) => s.id)).toEqual(["a", "x", "b"]);
  });

  test("hand-built cyclic graph throws CYCLE_DETECTED", () => {
    const graph: DependencyGraph = {
      flow_id: "manual",
      nodes: [step("a"), step("b")],
      edges: [
        { from: 0, to: 1 },
        { from: 1, to: 0 },
      ],
      index: new Map([
        ["a", 0],
        ["b", 1],
      ]),
    };
    const err = catchFlowError(() => topoOrder(graph));
    expect(err.code).toBe("CYCLE_DETECTED");
    expect(err.details?.flow_id).toBe("manual");
  });
});

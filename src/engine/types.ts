import type { Logger } from "../logger.js";
import type { Step } from "../schemas/flow.js";
import type { RunStatus, StepResult } from "../schemas/run-history.js";

/** Dependency → dependent, as indexes into DependencyGraph.nodes */
export interface Edge {
  readonly from: number;
  readonly to: number;
}

/**
 * Arena + index representation of a flow's steps.
 * Built once by buildGraph(); never mutated afterwards.
 */
export interface DependencyGraph {
  readonly flow_id: string;
  readonly nodes: readonly Step[]; // declaration order
  readonly edges: readonly Edge[];
  readonly index: ReadonlyMap<string, number>; // step id -> node index
}

export interface RunHistory {
  run_id: string;
  flow_id: string;
  status: RunStatus;
  /** Insertion order is visit order */
  step_results: ReadonlyMap<string, StepResult>;
  started_at: string;
  finished_at: string;
}

/** What the executor hands to the step capability */
export interface StepRequest {
  id: string;
  kind: string;
  config: unknown;
}

export type StepOutcome =
  | { ok: true; output: string }
  | { ok: false; reason: string };

/**
 * Performs the actual work of a step. May suspend (I/O, timers, remote calls).
 * Timeouts, if any, are enforced here; the executor has none.
 */
export interface StepCapability {
  execute(req: StepRequest): Promise<StepOutcome>;
}

export interface RunOptions {
  capability: StepCapability;
  /** Fresh, unique id per run. Default: ulid */
  newRunId?: () => string;
  /** Default: () => new Date() */
  now?: () => Date;
  /**
   * Max steps in flight. 1 (default) walks the topological order strictly
   * one at a time
   */
  concurrency?: number;
  logger?: Logger;
}

export interface GraphOptions {
  logger?: Logger;
}

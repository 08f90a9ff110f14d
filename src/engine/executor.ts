import { ulid } from "ulid";
import { defaultLogger, type Logger } from "../logger.js";
import type { Flow, Step } from "../schemas/flow.js";
import {
  BLOCKED_REASON,
  RUN_FAILED_REASON,
  type RunStatus,
  type StepResult,
} from "../schemas/run-history.js";
import { groupIntoBatches } from "./batch.js";
import { FlowError } from "./errors.js";
import { topoOrder } from "./graph.js";
import { Semaphore } from "./semaphore.js";
import type {
  DependencyGraph,
  RunHistory,
  RunOptions,
  StepCapability,
} from "./types.js";

/**
 * Dependencies of `step` that did not succeed: either never recorded
 * (unknown step, or not yet terminal) or recorded as FAILED.
 * An empty list means the step may run.
 */
export function findBlockers(
  step: Step,
  results: ReadonlyMap<string, StepResult>,
): string[] {
  return step.depends_on.filter(
    (dep) => results.get(dep)?.status !== "SUCCESS",
  );
}

/** SUCCESS iff no recorded result is FAILED */
export function aggregateStatus(
  results: ReadonlyMap<string, StepResult>,
): RunStatus {
  for (const result of results.values()) {
    if (result.status === "FAILED") {
      return { status: "FAILED", reason: RUN_FAILED_REASON };
    }
  }
  return { status: "SUCCESS" };
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Gate, then execute, a single step. Never rejects: blocked steps and
 * capability failures (returned or thrown) become FAILED results.
 */
async function visitStep(
  step: Step,
  results: ReadonlyMap<string, StepResult>,
  capability: StepCapability,
  logger: Logger,
): Promise<StepResult> {
  const blockers = findBlockers(step, results);
  if (blockers.length > 0) {
    for (const dep of blockers) {
      if (results.has(dep)) {
        logger.warn(
          { step_id: step.id, dep },
          `Step '${step.id}' blocked by failed dependency '${dep}'`,
        );
      } else {
        logger.warn(
          { step_id: step.id, dep },
          `Step '${step.id}' blocked: no result for dependency '${dep}'`,
        );
      }
    }
    return { status: "FAILED", reason: BLOCKED_REASON, blocked: true };
  }

  logger.info(
    { step_id: step.id, kind: step.kind },
    `Running step '${step.id}': ${step.kind}`,
  );

  try {
    const outcome = await capability.execute({
      id: step.id,
      kind: step.kind,
      config: step.config,
    });
    if (outcome.ok) {
      logger.info({ step_id: step.id }, `Step '${step.id}' succeeded`);
      return { status: "SUCCESS", output: outcome.output };
    }
    logger.warn(
      { step_id: step.id, reason: outcome.reason },
      `Step '${step.id}' failed: ${outcome.reason}`,
    );
    return { status: "FAILED", reason: outcome.reason, blocked: false };
  } catch (err) {
    const reason = errorMessage(err);
    logger.warn(
      { step_id: step.id, err },
      `Step '${step.id}' threw: ${reason}`,
    );
    return { status: "FAILED", reason, blocked: false };
  }
}

/**
 * Execute a flow's steps in dependency order.
 *
 * - Every step is visited exactly once; a failure never stops the run
 * - A step runs only if every declared dependency succeeded, otherwise it is
 *   recorded as blocked and the capability is not called
 * - Blocking cascades: a blocked step is FAILED for its own dependents
 *
 * concurrency 1 (default) walks the topological order one step at a time.
 * Higher values run dependency levels one after another, at most
 * `concurrency` steps of a level in flight; every dependency lives in an
 * earlier level, so gating only ever sees terminal results.
 *
 * Rejects only on invariant violations: a graph built for another flow, a
 * cyclic graph that bypassed buildGraph(), or a bad concurrency value.
 */
export async function runFlow(
  flow: Flow,
  graph: DependencyGraph,
  opts: RunOptions,
): Promise<RunHistory> {
  const {
    capability,
    newRunId = ulid,
    now = () => new Date(),
    concurrency = 1,
  } = opts;

  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new FlowError(
      "INVALID_OPTIONS",
      `concurrency must be an integer >= 1 (got ${concurrency})`,
    );
  }
  if (graph.flow_id !== flow.id) {
    throw new FlowError(
      "INVALID_OPTIONS",
      `Graph was built for flow '${graph.flow_id}', not '${flow.id}'`,
      { flow_id: flow.id },
    );
  }

  const run_id = newRunId();
  const started_at = now().toISOString();
  const logger = (opts.logger ?? defaultLogger).child({
    run_id,
    flow_id: flow.id,
  });

  const order = topoOrder(graph);
  logger.info(
    { steps: order.length, concurrency },
    `Starting run ${run_id} for flow '${flow.id}'`,
  );

  const results = new Map<string, StepResult>();

  if (concurrency === 1) {
    for (const step of order) {
      results.set(step.id, await visitStep(step, results, capability, logger));
    }
  } else {
    const sem = new Semaphore(concurrency);
    for (const batch of groupIntoBatches(graph, order)) {
      // Results of a level are recorded only once the whole level is done
      const settled = await Promise.all(
        batch.map((step) =>
          sem.withPermit(() => visitStep(step, results, capability, logger)),
        ),
      );
      batch.forEach((step, i) => results.set(step.id, settled[i]));
    }
  }

  const status = aggregateStatus(results);
  const finished_at = now().toISOString();
  logger.info(
    { status: status.status, steps: results.size },
    `Run ${run_id} finished: ${status.status}`,
  );

  return {
    run_id,
    flow_id: flow.id,
    status,
    step_results: results,
    started_at,
    finished_at,
  };
}

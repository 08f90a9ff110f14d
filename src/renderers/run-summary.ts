import chalk, { type ChalkInstance } from "chalk";
import type { RunHistory } from "../engine/types.js";
import type { RunHistoryJson, StepResult } from "../schemas/index.js";

export interface RenderOpts {
  /** Defaults to the shared chalk instance (auto-detected colour support) */
  chalk?: ChalkInstance;
}

/**
 * Renders a RunHistory as human-readable text for the terminal.
 *
 * Succeeded, failed and blocked steps get distinct marks so a reader can tell
 * "this step broke" from "this step never ran".
 */
export function renderRunSummary(
  history: RunHistory,
  opts: RenderOpts = {},
): string {
  const c = opts.chalk ?? chalk;
  const lines: string[] = [];

  lines.push(`Run ${history.run_id} for flow '${history.flow_id}'`);
  lines.push(
    history.status.status === "SUCCESS"
      ? `Final status: ${c.green("Success")}`
      : `Final status: ${c.red("Failed")} (${history.status.reason})`,
  );

  lines.push("", "Step results:");
  for (const [stepId, result] of history.step_results) {
    lines.push(renderStepLine(stepId, result, c));
  }

  const counts = countResults(history.step_results.values());
  lines.push(
    "",
    `${history.step_results.size} steps: ${counts.succeeded} succeeded, ${counts.failed} failed, ${counts.blocked} blocked`,
  );

  return lines.join("\n");
}

function renderStepLine(
  stepId: string,
  result: StepResult,
  c: ChalkInstance,
): string {
  if (result.status === "SUCCESS") {
    return `${c.green("✔")} ${stepId} → ${result.output}`;
  }
  if (result.blocked) {
    return `${c.yellow("⊘")} ${stepId} → ${result.reason}`;
  }
  return `${c.red("✖")} ${stepId} → Failed: ${result.reason}`;
}

export function countResults(results: Iterable<StepResult>): {
  succeeded: number;
  failed: number;
  blocked: number;
} {
  const counts = { succeeded: 0, failed: 0, blocked: 0 };
  for (const r of results) {
    if (r.status === "SUCCESS") counts.succeeded++;
    else if (r.blocked) counts.blocked++;
    else counts.failed++;
  }
  return counts;
}

/** Plain-object form of a RunHistory for `--json` output */
export function toRunHistoryJson(history: RunHistory): RunHistoryJson {
  return {
    run_id: history.run_id,
    flow_id: history.flow_id,
    status: history.status,
    step_results: Object.fromEntries(history.step_results),
    started_at: history.started_at,
    finished_at: history.finished_at,
  };
}

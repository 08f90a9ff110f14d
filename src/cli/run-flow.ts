import chalk, { type ChalkInstance } from "chalk";
import { type AppConfig, loadConfig } from "../config.js";
import { createSimulatedCapability } from "../engine/capability.js";
import { FlowError } from "../engine/errors.js";
import { runFlow } from "../engine/executor.js";
import { type LoadedFlow, loadFlow } from "../engine/load.js";
import type { StepCapability } from "../engine/types.js";
import { createLogger, type Logger } from "../logger.js";
import {
  renderRunSummary,
  toRunHistoryJson,
} from "../renderers/run-summary.js";

export interface RunFlowCommandOptions {
  json?: boolean;
  concurrency?: number;
}

/** Injectable for testing; every field falls back to the real thing */
export interface RunFlowCommandDeps {
  config?: AppConfig;
  logger?: Logger;
  capability?: StepCapability;
  newRunId?: () => string;
  now?: () => Date;
  chalk?: ChalkInstance;
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
}

/**
 * `flowgraph run-flow <path>`
 *
 * Returns the process exit code: 1 when the flow cannot be loaded (unreadable,
 * invalid, duplicate ids, cycle), 0 otherwise, even if steps failed.
 */
export async function runFlowCommand(
  path: string,
  options: RunFlowCommandOptions,
  deps: RunFlowCommandDeps = {},
): Promise<number> {
  const config = deps.config ?? loadConfig();
  const logger = deps.logger ?? createLogger(config);
  const c = deps.chalk ?? chalk;
  const stdout =
    deps.stdout ?? ((line: string) => process.stdout.write(`${line}\n`));
  const stderr =
    deps.stderr ?? ((line: string) => process.stderr.write(`${line}\n`));

  let loaded: LoadedFlow;
  try {
    loaded = await loadFlow(path, { logger });
  } catch (err) {
    if (err instanceof FlowError) {
      logger.error({ code: err.code, details: err.details }, err.message);
      stderr(`${c.red("✖ Failed to load flow:")} ${err.message}`);
      return 1;
    }
    throw err;
  }

  const { flow, graph } = loaded;
  if (!options.json) {
    stdout(`${c.green("✔")} Loaded flow '${flow.id}'`);
    stdout(`Total steps: ${graph.nodes.length}`);
    stdout("");
  }

  const history = await runFlow(flow, graph, {
    capability:
      deps.capability ?? createSimulatedCapability(config.simulation),
    concurrency: options.concurrency ?? config.concurrency,
    newRunId: deps.newRunId,
    now: deps.now,
    logger,
  });

  if (options.json) {
    stdout(JSON.stringify(toRunHistoryJson(history), null, 2));
  } else {
    stdout(renderRunSummary(history, { chalk: c }));
  }

  // Step failures are part of the report, not a process failure
  return 0;
}

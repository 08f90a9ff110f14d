import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { defaultLogger } from "../logger.js";
import { type Flow, FlowSchema } from "../schemas/flow.js";
import { FlowError } from "./errors.js";
import { buildGraph } from "./graph.js";
import type { DependencyGraph, GraphOptions } from "./types.js";

export interface LoadedFlow {
  flow: Flow;
  graph: DependencyGraph;
}

/**
 * Parse a YAML flow definition and validate it against FlowSchema.
 * Defaults (`depends_on: []`, `config: null`, `backoff_seconds: 5`) are
 * applied here.
 *
 * @throws FlowError PARSE_ERROR
 */
export function parseFlow(text: string, source = "<inline>"): Flow {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new FlowError(
      "PARSE_ERROR",
      `Invalid YAML in ${source}: ${message}`,
      { source },
      { cause: err },
    );
  }

  const parsed = FlowSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`,
    );
    throw new FlowError(
      "PARSE_ERROR",
      `Invalid flow definition in ${source}: ${issues.join("; ")}`,
      { source, issues },
    );
  }
  return parsed.data;
}

/**
 * Read, parse and build a flow from disk.
 *
 * @throws FlowError IO_ERROR, PARSE_ERROR, DUPLICATE_STEP_ID, CYCLE_DETECTED
 */
export async function loadFlow(
  path: string,
  opts: GraphOptions = {},
): Promise<LoadedFlow> {
  const logger = opts.logger ?? defaultLogger;
  logger.info({ path }, `Loading flow from ${path}`);

  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new FlowError(
      "IO_ERROR",
      `Cannot read ${path}: ${message}`,
      { source: path },
      { cause: err },
    );
  }

  const flow = parseFlow(text, path);
  const graph = buildGraph(flow, { logger });
  return { flow, graph };
}

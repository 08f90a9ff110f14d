// Graph
export { buildGraph, topoOrder } from "./graph.js";
// Batch grouping
export { groupIntoBatches } from "./batch.js";
// Executor
export { aggregateStatus, findBlockers, runFlow } from "./executor.js";
// Step capability
export type { SimulatedCapabilityOpts, StepHandler } from "./capability.js";
export {
  createHandlerCapability,
  createSimulatedCapability,
  sleep,
} from "./capability.js";
// Loading
export type { LoadedFlow } from "./load.js";
export { loadFlow, parseFlow } from "./load.js";
// Errors
export type { FlowErrorCode } from "./errors.js";
export { FlowError } from "./errors.js";
// Semaphore
export { Semaphore } from "./semaphore.js";

// Types
export type {
  DependencyGraph,
  Edge,
  GraphOptions,
  RunHistory,
  RunOptions,
  StepCapability,
  StepOutcome,
  StepRequest,
} from "./types.js";

export type FlowErrorCode =
  | "IO_ERROR" // flow definition could not be read
  | "PARSE_ERROR" // definition is not YAML or violates the flow schema
  | "DUPLICATE_STEP_ID" // multiple steps share the same id
  | "CYCLE_DETECTED" // dependency graph has cycle
  | "INVALID_OPTIONS"; // engine called with unusable options

export class FlowError extends Error {
  constructor(
    public readonly code: FlowErrorCode,
    message: string,
    public readonly details?: {
      flow_id?: string;
      step_id?: string;
      source?: string;
      cycle?: string[];
      issues?: string[];
    },
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "FlowError";
  }
}

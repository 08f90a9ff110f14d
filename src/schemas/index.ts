export {
  type Compensation,
  CompensationSchema,
  type Flow,
  FlowSchema,
  type RetryPolicy,
  RetryPolicySchema,
  type Step,
  StepSchema,
} from "./flow.js";
export {
  BLOCKED_REASON,
  RUN_FAILED_REASON,
  type RunHistoryJson,
  RunHistoryJsonSchema,
  type RunStatus,
  RunStatusSchema,
  type StepResult,
  StepResultSchema,
} from "./run-history.js";

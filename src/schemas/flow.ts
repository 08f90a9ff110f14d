import { z } from "zod";

/** Optional field that may also be written as `~`/`null`; both mean absent */
function absentable<T extends z.ZodTypeAny>(schema: T) {
  return schema
    .nullish()
    .transform((value): z.output<T> | undefined => value ?? undefined);
}

/**
 * Retry policy declared on a step.
 * Parsed and validated only: the executor never retries.
 */
export const RetryPolicySchema = z.object({
  max_attempts: z.number().int().nonnegative(),
  backoff_seconds: z.number().int().nonnegative().default(5),
});

/**
 * Rollback handler declared on a step.
 * Parsed and validated only: no rollback pass exists.
 */
export const CompensationSchema = z.object({
  kind: z.string().min(1),
  config: z.unknown().default(null),
});

// Unknown keys are stripped rather than rejected
export const StepSchema = z.object({
  id: z.string().min(1),
  /** Handler selector, opaque to the engine */
  kind: z.string().min(1),
  /** Names that match no step are warned about by buildGraph() */
  depends_on: z.array(z.string()).default([]),
  /** Passed through to the step capability unexamined */
  config: z.unknown().default(null),
  retry: absentable(RetryPolicySchema),
  idempotency_key: absentable(z.string()),
  compensation: absentable(CompensationSchema),
});

export const FlowSchema = z.object({
  id: z.string().min(1),
  description: absentable(z.string()),
  nodes: z.array(StepSchema),
});

export type RetryPolicy = z.infer<typeof RetryPolicySchema>;
export type Compensation = z.infer<typeof CompensationSchema>;
export type Step = z.infer<typeof StepSchema>;
export type Flow = z.infer<typeof FlowSchema>;

import { z } from "zod";

/** Reason recorded for a step whose dependencies did not all succeed */
export const BLOCKED_REASON = "Blocked by failed dependencies";

/** Reason recorded on a run with at least one failed or blocked step */
export const RUN_FAILED_REASON = "At least one step failed";

export const StepResultSchema = z.discriminatedUnion("status", [
  z
    .object({
      status: z.literal("SUCCESS"),
      output: z.string(),
    })
    .strict(),
  z
    .object({
      status: z.literal("FAILED"),
      reason: z.string(),
      // true only for the dependency-blocked failure; the step never ran
      blocked: z.boolean(),
    })
    .strict(),
]);

export const RunStatusSchema = z.discriminatedUnion("status", [
  z.object({ status: z.literal("SUCCESS") }).strict(),
  z.object({ status: z.literal("FAILED"), reason: z.string() }).strict(),
]);

/**
 * Serialized run history (`flowgraph run-flow --json`).
 */
export const RunHistoryJsonSchema = z
  .object({
    run_id: z.string(),
    flow_id: z.string(),
    status: RunStatusSchema,
    step_results: z.record(z.string(), StepResultSchema),
    started_at: z.string(),
    finished_at: z.string(),
  })
  .strict();

export type StepResult = z.infer<typeof StepResultSchema>;
export type RunStatus = z.infer<typeof RunStatusSchema>;
export type RunHistoryJson = z.infer<typeof RunHistoryJsonSchema>;

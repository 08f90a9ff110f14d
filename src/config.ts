import { z } from "zod";

const intWithDefault = (defaultValue: number) =>
  z.preprocess((value) => {
    if (value === undefined || value === "") {
      return defaultValue;
    }
    if (typeof value === "string") {
      return Number(value.trim());
    }
    return value;
  }, z.number().int());

const envSchema = z
  .object({
    FLOWGRAPH_LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
    FLOWGRAPH_CONCURRENCY: intWithDefault(1).refine(
      (value) => value >= 1,
      "FLOWGRAPH_CONCURRENCY must be >= 1",
    ),
    FLOWGRAPH_SIM_MIN_DELAY_MS: intWithDefault(100).refine(
      (value) => value >= 0,
      "FLOWGRAPH_SIM_MIN_DELAY_MS must be >= 0",
    ),
    FLOWGRAPH_SIM_MAX_DELAY_MS: intWithDefault(300),
    FLOWGRAPH_FAIL_KIND: z.string().min(1).default("fail_test"),
  })
  .superRefine((env, ctx) => {
    if (env.FLOWGRAPH_SIM_MAX_DELAY_MS < env.FLOWGRAPH_SIM_MIN_DELAY_MS) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["FLOWGRAPH_SIM_MAX_DELAY_MS"],
        message:
          "FLOWGRAPH_SIM_MAX_DELAY_MS must be >= FLOWGRAPH_SIM_MIN_DELAY_MS",
      });
    }
  });

export type LogLevel = z.infer<typeof envSchema>["FLOWGRAPH_LOG_LEVEL"];

export interface AppConfig {
  logLevel: LogLevel;
  concurrency: number;
  simulation: {
    minDelayMs: number;
    maxDelayMs: number;
    failKind: string;
  };
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${details}`);
  }

  const e = parsed.data;
  return {
    logLevel: e.FLOWGRAPH_LOG_LEVEL,
    concurrency: e.FLOWGRAPH_CONCURRENCY,
    simulation: {
      minDelayMs: e.FLOWGRAPH_SIM_MIN_DELAY_MS,
      maxDelayMs: e.FLOWGRAPH_SIM_MAX_DELAY_MS,
      failKind: e.FLOWGRAPH_FAIL_KIND,
    },
  };
}

import type { StepCapability, StepOutcome, StepRequest } from "./types.js";

export type StepHandler = (req: StepRequest) => Promise<StepOutcome>;

export interface SimulatedCapabilityOpts {
  minDelayMs?: number; // default 100
  maxDelayMs?: number; // default 300 (exclusive)
  /** Steps of this kind always fail. Default "fail_test" */
  failKind?: string;
  /** Entropy source in [0, 1). Default Math.random */
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Stand-in for real step work: waits a random short interval, then fails
 * for the reserved kind and succeeds with a canned output otherwise.
 */
export function createSimulatedCapability(
  opts: SimulatedCapabilityOpts = {},
): StepCapability {
  const {
    minDelayMs = 100,
    maxDelayMs = 300,
    failKind = "fail_test",
    random = Math.random,
    sleep: wait = sleep,
  } = opts;

  if (minDelayMs < 0 || maxDelayMs < minDelayMs) {
    throw new RangeError(
      `Invalid simulated delay range [${minDelayMs}, ${maxDelayMs})`,
    );
  }

  return {
    async execute(req) {
      const delay =
        minDelayMs + Math.floor(random() * (maxDelayMs - minDelayMs));
      await wait(delay);

      if (req.kind === failKind) {
        return { ok: false, reason: "Simulated failure" };
      }
      return { ok: true, output: `Simulated output of '${req.id}'` };
    },
  };
}

/**
 * Dispatch on step kind. Kinds without a handler go to `fallback`, or fail
 * when there is none.
 */
export function createHandlerCapability(
  handlers: Readonly<Record<string, StepHandler>>,
  fallback?: StepCapability,
): StepCapability {
  const registry = new Map(Object.entries(handlers));

  return {
    async execute(req) {
      const handler = registry.get(req.kind);
      if (handler) return handler(req);
      if (fallback) return fallback.execute(req);
      return {
        ok: false,
        reason: `No handler registered for kind '${req.kind}'`,
      };
    },
  };
}

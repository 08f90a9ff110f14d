import pino, { type Logger } from "pino";

import type { AppConfig } from "./config.js";

export type { Logger };

/**
 * JSON logs go to stderr so stdout stays reserved for the run summary.
 */
export function createLogger(config: Pick<AppConfig, "logLevel">): Logger {
  return pino(
    { name: "flowgraph", level: config.logLevel },
    pino.destination(2),
  );
}

/** Fallback for engine calls that don't pass a logger: warnings and up */
export const defaultLogger: Logger = createLogger({ logLevel: "warn" });

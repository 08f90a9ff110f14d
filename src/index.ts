export * from "./engine/index.js";
export * from "./schemas/index.js";
export { type AppConfig, type LogLevel, loadConfig } from "./config.js";
export { createLogger, type Logger } from "./logger.js";
export {
  countResults,
  type RenderOpts,
  renderRunSummary,
  toRunHistoryJson,
} from "./renderers/run-summary.js";

/**
 * command-scheduler
 *
 * In-process scheduler that runs textual commands at set times or intervals.
 */

export * from "./core/types/scheduler.js";
export * from "./core/errors.js";
export * from "./core/interfaces/index.js";
export * from "./application/index.js";
export * from "./infrastructure/index.js";
export {
  default as logger,
  configureLogger,
  LOG_LEVELS,
  type LogLevel,
} from "./utils/logger.js";

/**
 * Config infrastructure exports.
 */

export {
  ConfigSchema,
  SchedulerConfigSchema,
  LoggingConfigSchema,
  type AppConfig,
  type SchedulerConfig,
  type LoggingConfig,
} from "./schema.js";

export {
  loadConfig,
  getConfigPath,
  getDataDir,
  applyEnvOverrides,
} from "./loader.js";

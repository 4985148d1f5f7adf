/**
 * Configuration loading: JSON file, then environment overrides, then
 * validation.
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";
import { ConfigSchema, type AppConfig } from "./schema.js";
import { ConfigurationError, describeError } from "../../core/errors.js";
import logger from "../../utils/logger.js";

type RawSection = Record<string, unknown>;
type SectionName = "scheduler" | "logging";

interface EnvOverride {
  env: string;
  section: SectionName;
  key: string;
}

/**
 * Environment variable to config key mapping.
 */
const ENV_OVERRIDES: EnvOverride[] = [
  {
    env: "SCHEDULER_TICK_INTERVAL_MS",
    section: "scheduler",
    key: "tickIntervalMs",
  },
  { env: "SCHEDULER_WORKERS", section: "scheduler", key: "workers" },
  {
    env: "SCHEDULER_COMMAND_TIMEOUT_MS",
    section: "scheduler",
    key: "commandTimeoutMs",
  },
  {
    env: "SCHEDULER_CRON_SEARCH_YEARS",
    section: "scheduler",
    key: "cronSearchYears",
  },
  { env: "SCHEDULER_TIMEZONE", section: "scheduler", key: "timezone" },
  { env: "LOG_LEVEL", section: "logging", key: "level" },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Get the data directory path.
 */
export function getDataDir(): string {
  return join(homedir(), ".command-scheduler");
}

/**
 * Get the config file path.
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.SCHEDULER_CONFIG || join(getDataDir(), "config.json");
}

/**
 * Overlay environment variables onto raw config data.
 */
export function applyEnvOverrides(
  data: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const sections: Record<SectionName, RawSection> = {
    scheduler: isRecord(data.scheduler) ? { ...data.scheduler } : {},
    logging: isRecord(data.logging) ? { ...data.logging } : {},
  };

  for (const { env: name, section, key } of ENV_OVERRIDES) {
    const value = env[name];
    if (value === undefined || value.trim() === "") continue;

    const trimmed = value.trim();
    sections[section][key] =
      section === "logging" ? trimmed.toLowerCase() : trimmed;
  }

  return { ...data, ...sections };
}

/**
 * Load configuration from file (if present) and environment.
 *
 * @throws ConfigurationError on unreadable JSON or invalid values
 */
export function loadConfig(
  configPath: string = getConfigPath(),
  env: NodeJS.ProcessEnv = process.env,
): AppConfig {
  let data: Record<string, unknown> = {};

  if (existsSync(configPath)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(readFileSync(configPath, "utf-8"));
    } catch (error) {
      throw new ConfigurationError(
        `Failed to read config ${configPath}: ${describeError(error)}`,
        { configPath },
      );
    }
    if (!isRecord(parsed)) {
      throw new ConfigurationError(
        `Config ${configPath} must contain a JSON object`,
        { configPath },
      );
    }
    data = parsed;
  } else {
    logger.debug({ configPath }, "No config file, using defaults");
  }

  const result = ConfigSchema.safeParse(applyEnvOverrides(data, env));
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigurationError(
      `Invalid configuration: ${issues.join("; ")}`,
      { issues },
    );
  }
  return result.data;
}

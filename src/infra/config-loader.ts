/**
 * ConfigLoader: load settings from YAML files with env var support.
 *
 * - keystone.yml|yaml (base) + keystone.local.yml|yaml (override)
 * - ${ENV_VAR} interpolation in strings
 * - Environment variables override all file settings
 * - Custom config path via KEYSTONE_CONFIG
 */
import { existsSync, readFileSync } from "node:fs";
import yaml from "js-yaml";
import { ConfigError, errorToString } from "./errors.ts";
import { getLogger } from "./logger.ts";
import { SettingsSchema, type Settings } from "./config-schema.ts";

const logger = getLogger("config_loader");

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Interpolate ${VAR_NAME} placeholders with environment variables.
 * Supports bash-style operators:
 * - ${VAR:-default}   Use default if VAR is unset or empty
 * - ${VAR:?error}     Error if VAR is unset or empty
 * - ${VAR:+alternate} Use alternate if VAR is set
 */
export function interpolateEnvVars(value: unknown, env: NodeJS.ProcessEnv = process.env): unknown {
  if (typeof value === "string") {
    const replaced = value.replace(/\$\{([^}]+)\}/g, (_match, content: string) => {
      const operatorMatch = /^([^:]+)(:-|:\?|:\+)(.*)$/.exec(content);
      if (!operatorMatch) {
        return env[content] ?? "";
      }

      const [, varName = "", operator, operand = ""] = operatorMatch;
      const envValue = env[varName];
      const isEmpty = envValue === undefined || envValue === "";

      switch (operator) {
        case ":-":
          return isEmpty ? operand : envValue;
        case ":?":
          if (isEmpty) {
            throw new ConfigError(
              `Environment variable ${varName} is required but not set: ${operand || "missing value"}`,
            );
          }
          return envValue;
        case ":+":
          return isEmpty ? "" : operand;
        default:
          return envValue ?? "";
      }
    });
    // Empty string becomes undefined so schema defaults apply
    return replaced === "" ? undefined : replaced;
  }
  if (Array.isArray(value)) {
    return value.map((item) => interpolateEnvVars(item, env));
  }
  if (isRecord(value)) {
    const result: RawConfig = {};
    for (const [key, val] of Object.entries(value)) {
      result[key] = interpolateEnvVars(val, env);
    }
    return result;
  }
  return value;
}

/**
 * Load and parse a config file (JSON or YAML), returning the raw structure.
 */
function loadConfigFile(path: string, env: NodeJS.ProcessEnv): RawConfig {
  let parsed: unknown;
  try {
    const content = readFileSync(path, "utf-8");
    const isYaml = path.endsWith(".yaml") || path.endsWith(".yml");
    parsed = isYaml ? yaml.load(content) : JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Failed to load config file ${path}: ${errorToString(err)}`);
  }

  if (parsed === undefined || parsed === null) {
    return {};
  }
  const interpolated = interpolateEnvVars(parsed, env);
  if (!isRecord(interpolated)) {
    throw new ConfigError(`Config file ${path} must contain a mapping at the top level`);
  }
  return interpolated;
}

/**
 * Deep merge two objects, with source overriding target.
 */
export function deepMerge(target: RawConfig, source: RawConfig): RawConfig {
  const result: RawConfig = { ...target };

  for (const [key, value] of Object.entries(source)) {
    if (value === undefined) continue;

    const existing = result[key];
    if (isRecord(value) && isRecord(existing)) {
      result[key] = deepMerge(existing, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}

function findSingle(paths: string[], kind: string): string | null {
  const found = paths.filter((p) => existsSync(p));
  if (found.length > 1) {
    throw new ConfigError(
      `Multiple ${kind} config files found: ${found.join(", ")}. Please keep only one.`,
    );
  }
  return found[0] ?? null;
}

/**
 * Find and load config files with layered merging.
 * Priority: keystone.local.yml/yaml overrides keystone.yml/yaml.
 */
function findAndMergeConfigs(env: NodeJS.ProcessEnv): RawConfig | null {
  const customPath = env["KEYSTONE_CONFIG"];
  if (customPath) {
    if (!existsSync(customPath)) {
      throw new ConfigError(`Config file not found: ${customPath}`);
    }
    logger.info({ path: customPath }, "loading_config_from_custom_path");
    return loadConfigFile(customPath, env);
  }

  const basePath = findSingle(["keystone.yaml", "keystone.yml"], "base");
  const localPath = findSingle(["keystone.local.yaml", "keystone.local.yml"], "local");

  let config: RawConfig | null = null;
  if (basePath) {
    logger.info({ path: basePath }, "loading_base_config");
    config = loadConfigFile(basePath, env);
  }
  if (localPath) {
    logger.info({ path: localPath }, "loading_local_config_override");
    const local = loadConfigFile(localPath, env);
    config = config ? deepMerge(config, local) : local;
  }
  return config;
}

/**
 * Convert a raw config structure to Settings, with env var overrides.
 */
export function configToSettings(config: RawConfig, env: NodeJS.ProcessEnv = process.env): Settings {
  const management = isRecord(config["management"]) ? config["management"] : {};
  const system = isRecord(config["system"]) ? config["system"] : {};

  const result = SettingsSchema.safeParse({
    management: {
      mode: env["KEYSTONE_MANAGEMENT_MODE"] || management["mode"],
      initialLocations: env["KEYSTONE_INITIAL_LOCATIONS"] ?? management["initialLocations"],
    },
    logLevel: env["KEYSTONE_LOG_LEVEL"] || system["logLevel"],
    logFile: env["KEYSTONE_LOG_FILE"] || system["logFile"],
    logConsoleEnabled: env["KEYSTONE_LOG_CONSOLE_ENABLED"] ?? system["logConsoleEnabled"],
    logFormat: env["KEYSTONE_LOG_FORMAT"] || system["logFormat"],
    nodeEnv: env["NODE_ENV"] || system["nodeEnv"],
  });

  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid settings: ${issues}`);
  }
  return result.data;
}

/**
 * Load settings from config files and env vars.
 *
 * Priority:
 * 1. Environment variables (highest)
 * 2. keystone.local.yml/yaml
 * 3. keystone.yml/yaml
 * 4. Schema defaults
 */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  const merged = findAndMergeConfigs(env);
  if (!merged) {
    logger.info("loading_config_from_env");
  }
  return configToSettings(merged ?? {}, env);
}

/**
 * Configuration schemas and types.
 * Separated to avoid circular dependencies between config.ts and config-loader.ts.
 */
import { z } from "zod";

/**
 * Preprocess stringified arrays from env var interpolation.
 * YAML ${VAR:-[]} produces the string "[]" instead of an actual array, and
 * KEYSTONE_INITIAL_LOCATIONS may be a comma-separated list.
 */
export function coerceStringArray(val: unknown): unknown {
  if (typeof val !== "string") return val;

  const trimmed = val.trim();
  if (trimmed === "[]" || trimmed === "") return [];
  if (trimmed.startsWith("[")) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (Array.isArray(parsed)) return parsed;
    } catch {
      // Not valid JSON, return as-is for Zod to reject
      return val;
    }
  }
  return trimmed
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0);
}

export const ManagementModeSchema = z.enum(["single", "multiple"]);

export const ManagementConfigSchema = z.object({
  mode: ManagementModeSchema.default("multiple"),
  initialLocations: z.preprocess(coerceStringArray, z.array(z.string()).default([])),
});

export const LogFormatSchema = z.enum(["json", "pretty"]);

export const SettingsSchema = z.object({
  management: ManagementConfigSchema.default({}),
  logLevel: z.string().default("info"),
  // File logging is enabled only when a path is configured
  logFile: z.string().optional(),
  logConsoleEnabled: z.preprocess(
    (val) => {
      if (typeof val === "string") {
        if (val === "true") return true;
        if (val === "false" || val === "") return false;
      }
      return val;
    },
    z.boolean().default(true),
  ),
  logFormat: LogFormatSchema.default("json"),
  nodeEnv: z.string().default("development"), // development | production | test
});

export type ManagementConfig = z.infer<typeof ManagementConfigSchema>;
export type Settings = z.infer<typeof SettingsSchema>;

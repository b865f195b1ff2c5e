/**
 * Settings singleton: Zod-validated settings loaded from files and env vars.
 */
import { loadSettings } from "./config-loader.ts";
import type { Settings } from "./config-schema.ts";
import { reinitLogger } from "./logger.ts";

export {
  SettingsSchema,
  ManagementConfigSchema,
  ManagementModeSchema,
  LogFormatSchema,
} from "./config-schema.ts";
export type { Settings, ManagementConfig } from "./config-schema.ts";

let _settings: Settings | null = null;

export function getSettings(): Settings {
  if (!_settings) {
    _settings = loadSettings();
    reinitLogger(
      _settings.logFile,
      _settings.logConsoleEnabled,
      _settings.logFormat,
      _settings.logLevel,
    );
  }
  return _settings;
}

/** Override settings (for testing) */
export function setSettings(s: Settings): void {
  _settings = s;
}

/** Reset settings singleton so next getSettings() reloads (for testing) */
export function resetSettings(): void {
  _settings = null;
}

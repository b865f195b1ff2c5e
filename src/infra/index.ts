export {
  KeystoneError,
  ConfigError,
  ArgumentError,
  ProjectError,
  ProjectValidationError,
  SingleDocumentModeError,
  ProjectIOError,
  errorToString,
  toError,
} from "./errors.ts";
export { getLogger, reinitLogger, resolveTransports } from "./logger.ts";
export type { LogFormat } from "./logger.ts";
export { getSettings, setSettings, resetSettings, SettingsSchema } from "./config.ts";
export type { Settings, ManagementConfig } from "./config.ts";
export { loadSettings } from "./config-loader.ts";
export { AsyncLock } from "./async-lock.ts";

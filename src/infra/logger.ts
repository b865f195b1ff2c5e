/**
 * Structured logger: thin pino wrapper with optional file output.
 *
 * Log format: JSON with human-readable `level` (label) and `time` (ISO 8601),
 * unless the console target uses pino-pretty.
 */
import pino from "pino";
import type {
  TransportMultiOptions,
  TransportPipelineOptions,
  TransportSingleOptions,
} from "pino";
import { existsSync, mkdirSync, readdirSync, statSync, unlinkSync } from "node:fs";
import { basename, dirname, join } from "node:path";

export type LogFormat = "json" | "pretty";

export type ResolvedTransport =
  | TransportSingleOptions
  | TransportPipelineOptions
  | TransportMultiOptions;

// Bootstrap phase: read from env before settings are available.
// Overridden when reinitLogger() is called with loaded settings.
const level = process.env["KEYSTONE_LOG_LEVEL"] ?? "info";

/**
 * pino disallows `formatters.level` with multi-target transports,
 * so it is only applied when there is at most one target.
 */
function createLoggerOptions(
  logLevel: string,
  transport: ResolvedTransport | null,
  isMultiTarget: boolean,
): pino.LoggerOptions {
  const opts: pino.LoggerOptions = {
    level: logLevel,
    base: undefined, // Remove pid and hostname from log output
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  if (transport) {
    opts.transport = transport;
  }
  if (!isMultiTarget) {
    opts.formatters = {
      level(label) {
        return { level: label };
      },
    };
  }
  return opts;
}

/**
 * Remove rotated log files (e.g. keystone.log.1) older than the retention period.
 */
function cleanupOldLogs(logFile: string, retentionDays = 30): void {
  const logDir = dirname(logFile);
  if (!existsSync(logDir)) {
    return;
  }

  const logFileName = basename(logFile);
  const rotatedLogPattern = new RegExp(`^${logFileName.replace(/[.*+?^${}()|[\]\\]/g, "\\$&")}\\.`);
  const retentionMs = retentionDays * 24 * 60 * 60 * 1000;
  const now = Date.now();

  for (const file of readdirSync(logDir)) {
    if (!rotatedLogPattern.test(file)) {
      continue;
    }
    const filePath = join(logDir, file);
    try {
      if (now - statSync(filePath).mtimeMs > retentionMs) {
        unlinkSync(filePath);
      }
    } catch (err) {
      // The logger is not ready yet; report on stderr and keep going
      process.stderr.write(`keystone: failed to remove old log ${filePath}: ${String(err)}\n`);
    }
  }
}

/**
 * Resolve pino transports from the log settings.
 *
 * - console + pretty → pino-pretty (colorized)
 * - console + json   → pino/file to stdout
 * - file + json      → pino-roll
 * - file + pretty    → pipeline: pino-pretty (no color) → pino-roll
 *
 * Returns `transport: null` when nothing but the default stdout stream is needed.
 */
export function resolveTransports(
  logFile: string | undefined,
  logConsoleEnabled: boolean,
  logFormat: LogFormat = "json",
): { transport: ResolvedTransport | null; isMultiTarget: boolean } {
  const targets: Array<TransportSingleOptions | TransportPipelineOptions> = [];

  if (logConsoleEnabled) {
    if (logFormat === "pretty") {
      targets.push({ target: "pino-pretty", options: { colorize: true } });
    } else {
      targets.push({ target: "pino/file", options: { destination: 1 } });
    }
  }

  if (logFile) {
    const logDir = dirname(logFile);
    if (!existsSync(logDir)) {
      mkdirSync(logDir, { recursive: true });
    }
    cleanupOldLogs(logFile, 30);

    const roll: TransportSingleOptions = {
      target: "pino-roll",
      options: {
        file: logFile,
        frequency: "daily",
        size: "10m",
        mkdir: true,
      },
    };

    if (logFormat === "pretty") {
      targets.push({
        pipeline: [
          { target: "pino-pretty", options: { colorize: false } },
          roll,
        ],
      });
    } else {
      targets.push(roll);
    }
  }

  const [first, ...rest] = targets;
  if (!first) {
    return { transport: null, isMultiTarget: false };
  }
  if (rest.length === 0) {
    return { transport: first, isMultiTarget: false };
  }
  return { transport: { targets }, isMultiTarget: true };
}

function createRootLogger(
  logLevel: string,
  logFile: string | undefined,
  logConsoleEnabled: boolean,
  logFormat: LogFormat,
): pino.Logger {
  const { transport, isMultiTarget } = resolveTransports(logFile, logConsoleEnabled, logFormat);
  return pino(createLoggerOptions(logLevel, transport, isMultiTarget));
}

function parseLogFormat(value: string | undefined): LogFormat {
  return value === "pretty" ? "pretty" : "json";
}

const rootLogger = createRootLogger(
  level,
  process.env["KEYSTONE_LOG_FILE"] || undefined,
  process.env["KEYSTONE_LOG_CONSOLE_ENABLED"] === "true",
  parseLogFormat(process.env["KEYSTONE_LOG_FORMAT"]),
);

/**
 * Get a child logger with a module name.
 */
export function getLogger(name: string): pino.Logger {
  return rootLogger.child({ module: name });
}

/**
 * Reinitialize the root logger from loaded settings.
 * All parameters come from settings: no direct env var reads.
 */
export function reinitLogger(
  logFile: string | undefined,
  logConsoleEnabled: boolean,
  logFormat: LogFormat = "json",
  logLevel: string = level,
): void {
  const next = createRootLogger(logLevel, logFile, logConsoleEnabled, logFormat);

  // Replace the root logger's bindings and streams
  Object.assign(rootLogger, next);
  rootLogger.level = logLevel;
}

export { rootLogger };

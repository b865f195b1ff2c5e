/**
 * Error hierarchy for Keystone.
 *
 * KeystoneError (base)
 * ├── ConfigError
 * ├── ArgumentError
 * └── ProjectError
 *     ├── ProjectValidationError
 *     ├── SingleDocumentModeError
 *     └── ProjectIOError
 *
 * ConfigError and ArgumentError escape public manager operations.
 * ProjectError subclasses are caught at the manager boundary and reported
 * through the matching `…Failed` event.
 */
import type { ValidationContext } from "../projects/validation.ts";

export class KeystoneError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "KeystoneError";
  }
}

/** Missing wiring (no reader/writer for a location) or invalid settings. */
export class ConfigError extends KeystoneError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export class ArgumentError extends KeystoneError {
  readonly argument: string;

  constructor(argument: string, message: string) {
    super(message);
    this.name = "ArgumentError";
    this.argument = argument;
  }
}

// ── Project ──────────────────────────────────────

export class ProjectError extends KeystoneError {
  readonly location: string;

  constructor(location: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ProjectError";
    this.location = location;
  }
}

export class ProjectValidationError extends ProjectError {
  readonly validation: ValidationContext;

  constructor(location: string, message: string, validation: ValidationContext) {
    super(location, message);
    this.name = "ProjectValidationError";
    this.validation = validation;
  }
}

export class SingleDocumentModeError extends ProjectError {
  constructor(location: string) {
    super(location, `Cannot load project '${location}', currently in single-document mode`);
    this.name = "SingleDocumentModeError";
  }
}

/** A reader or writer threw; the original error is kept as `cause`. */
export class ProjectIOError extends ProjectError {
  constructor(location: string, message: string, cause: unknown) {
    super(location, message, { cause });
    this.name = "ProjectIOError";
  }
}

// ── Utilities ───────────────────────────────────

/**
 * Extract a loggable string from an unknown caught value.
 *
 * Error objects have non-enumerable `message` and `stack` properties,
 * so `JSON.stringify(err)` returns `"{}"`. Use this helper everywhere an
 * error is passed to logger fields:
 *   `logger.warn({ error: errorToString(err) }, "something_failed")`
 */
export function errorToString(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Normalize a caught value into an Error instance. */
export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

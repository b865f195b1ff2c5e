/** Location helpers: locations are compared case-insensitively. */
import { ArgumentError } from "../infra/errors.ts";

/** Registry key for a location. */
export function normalizeLocation(location: string): string {
  return location.toLowerCase();
}

export function locationsEqual(a: string | null | undefined, b: string | null | undefined): boolean {
  if (a == null || b == null) return a == null && b == null;
  return normalizeLocation(a) === normalizeLocation(b);
}

export function isBlankLocation(location: string | null | undefined): boolean {
  return location == null || location.trim().length === 0;
}

/** Throw ArgumentError for a missing or whitespace-only location. */
export function assertLocation(location: string | null | undefined, argument = "location"): asserts location is string {
  if (isBlankLocation(location)) {
    throw new ArgumentError(argument, `Argument '${argument}' cannot be empty`);
  }
}

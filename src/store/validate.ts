// ---------------------------------------------------------------------------
// Input validation helpers – throw ValidationError on bad caller input
// ---------------------------------------------------------------------------

import { ValidationError } from "./errors.js";

export function isBlank(value: string | null | undefined): boolean {
  return value === null || value === undefined || value.trim() === "";
}

/** Returns the value untouched; throws if it is missing or whitespace only. */
export function requireText(value: string | null | undefined, field: string): string {
  if (value === null || value === undefined || value.trim() === "") {
    throw new ValidationError(`${field} cannot be empty`);
  }
  return value;
}

export function requireId(value: string | null | undefined, entityType: string): string {
  return requireText(value, `${entityType} id`);
}

export function requireOneOf<T extends string>(
  value: string | null | undefined,
  allowed: readonly T[],
  field: string,
): T {
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ValidationError(
      `${field} must be one of ${allowed.join(", ")} (got ${String(value)})`,
    );
  }
  return match;
}

/** Normalises a Date or date-time string to ISO-8601 (`Date#toISOString`). */
export function requireTimestamp(value: Date | string | null | undefined, field: string): string {
  if (value === null || value === undefined) {
    throw new ValidationError(`${field} cannot be empty`);
  }
  const ms = value instanceof Date ? value.getTime() : Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new ValidationError(`${field} is not a valid date-time: ${String(value)}`);
  }
  return new Date(ms).toISOString();
}

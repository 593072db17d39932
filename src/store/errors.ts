// ---------------------------------------------------------------------------
// Tracker Errors
// ---------------------------------------------------------------------------
// Every failure the core raises is one of these. None are retried.
// ---------------------------------------------------------------------------

export class TrackerError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TrackerError";
  }
}

/** Malformed caller input: empty id, empty required text, unknown enum value. */
export class ValidationError extends TrackerError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** An identifier did not resolve in the store it was looked up in. */
export class NotFoundError extends TrackerError {
  readonly entityType: string;
  readonly entityId: string;

  constructor(entityType: string, entityId: string) {
    super(`${entityType} not found: ${entityId}`);
    this.name = "NotFoundError";
    this.entityType = entityType;
    this.entityId = entityId;
  }
}

/** Attempted to remove a relationship that does not exist. */
export class AssociationError extends TrackerError {
  constructor(message: string) {
    super(message);
    this.name = "AssociationError";
  }
}

/** The snapshot file could not be read or written. */
export class PersistenceError extends TrackerError {
  readonly filePath: string;

  constructor(message: string, filePath: string, cause?: unknown) {
    super(message, { cause });
    this.name = "PersistenceError";
    this.filePath = filePath;
  }
}

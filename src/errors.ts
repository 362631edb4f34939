/**
 * All domain error classes for geo-area-analysis.
 *
 * Each class:
 * - Extends Error
 * - Sets `this.name` to the class name for reliable instanceof checks
 * - Restores the prototype chain for correct instanceof in transpiled output
 */

/** Thrown when ring or coordinate data cannot form a polygon. */
export class InvalidGeometryError extends Error {
  override name = "InvalidGeometryError" as const;
  constructor(message: string) {
    super(message);
    this.name = "InvalidGeometryError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown when a referenced slug does not exist. */
export class AreaNotFoundError extends Error {
  override name = "AreaNotFoundError" as const;
  constructor(message: string) {
    super(message);
    this.name = "AreaNotFoundError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown when a rename targets a slug that is already taken. */
export class AreaConflictError extends Error {
  override name = "AreaConflictError" as const;
  constructor(message: string) {
    super(message);
    this.name = "AreaConflictError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown when a payload or query is rejected before any work is done. */
export class InvalidRequestError extends Error {
  override name = "InvalidRequestError" as const;
  constructor(message: string) {
    super(message);
    this.name = "InvalidRequestError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown when stored content is unreadable or has the wrong shape. */
export class StorageError extends Error {
  override name = "StorageError" as const;
  constructor(message: string) {
    super(message);
    this.name = "StorageError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Thrown when the first load from storage fails; the repository stays unhydrated. */
export class HydrationError extends Error {
  override name = "HydrationError" as const;
  constructor(message: string) {
    super(message);
    this.name = "HydrationError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Raised when `save()` fails during a mutation. Logged, never thrown to callers. */
export class PersistenceError extends Error {
  override name = "PersistenceError" as const;
  constructor(message: string) {
    super(message);
    this.name = "PersistenceError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

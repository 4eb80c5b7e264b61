import type { EntityKind, ID } from "@/models";
import type { ValidationIssue } from "@/engine/validation";

export type PersistenceErrorCode = "OPTIMISTIC_LOCK_CONFLICT" | "NOT_FOUND" | "DUPLICATE" | "INVALID" | "UNEXPECTED";

export class PersistenceError extends Error {
  constructor(
    readonly code: PersistenceErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "PersistenceError";
  }
}

/** The stored version moved on since the entity was loaded. */
export class OptimisticLockConflictError extends PersistenceError {
  constructor(
    readonly kind: EntityKind,
    readonly id: ID,
    readonly expectedVersion: number,
    readonly actualVersion: number,
  ) {
    super("OPTIMISTIC_LOCK_CONFLICT", `${kind} '${id}' was modified concurrently (version ${expectedVersion}, stored ${actualVersion})`);
    this.name = "OptimisticLockConflictError";
  }
}

export class EntityNotFoundError extends PersistenceError {
  constructor(
    readonly kind: EntityKind,
    readonly id: ID,
  ) {
    super("NOT_FOUND", `${kind} '${id}' not found`);
    this.name = "EntityNotFoundError";
  }
}

export class DuplicateEntityError extends PersistenceError {
  constructor(
    readonly kind: EntityKind,
    readonly id: ID,
  ) {
    super("DUPLICATE", `${kind} '${id}' already exists`);
    this.name = "DuplicateEntityError";
  }
}

export class InvalidTournamentError extends PersistenceError {
  constructor(readonly issues: ValidationIssue[]) {
    super("INVALID", `Tournament has ${issues.length} validation issue(s)`);
    this.name = "InvalidTournamentError";
  }
}

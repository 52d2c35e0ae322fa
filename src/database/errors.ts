/**
 * Store error taxonomy. Each error carries the entity kind and, where known,
 * the field or id that caused it, so a front end can report it precisely.
 */

import Database from 'better-sqlite3';
import { EntityKind } from './models';

export type StoreErrorCode =
  | 'STORAGE_UNAVAILABLE'
  | 'UNIQUE_CONSTRAINT_VIOLATION'
  | 'FOREIGN_KEY_VIOLATION'
  | 'INVALID_ENUM'
  | 'NOT_FOUND'
  | 'LOCK_CONTENTION'
  | 'MISSING_FIELD'
  | 'CORRUPT_VALUE';

export interface StoreErrorContext {
  entity?: EntityKind;
  field?: string;
  id?: number;
  cause?: unknown;
}

export class StoreError extends Error {
  readonly entity?: EntityKind;
  readonly field?: string;
  readonly id?: number;

  constructor(
    message: string,
    public readonly code: StoreErrorCode,
    context: StoreErrorContext = {},
    public readonly retryable = false,
  ) {
    super(message, { cause: context.cause });
    this.name = 'StoreError';
    this.entity = context.entity;
    this.field = context.field;
    this.id = context.id;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class StorageUnavailableError extends StoreError {
  constructor(
    public readonly filename: string,
    cause?: unknown,
  ) {
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`Storage unavailable at ${filename}${reason}`, 'STORAGE_UNAVAILABLE', {
      cause,
    });
    this.name = 'StorageUnavailableError';
  }
}

export class UniqueConstraintViolationError extends StoreError {
  constructor(entity: EntityKind, field?: string, cause?: unknown) {
    super(
      field
        ? `${entity} with this ${field} already exists`
        : `${entity} already exists`,
      'UNIQUE_CONSTRAINT_VIOLATION',
      { entity, field, cause },
    );
    this.name = 'UniqueConstraintViolationError';
  }
}

export class ForeignKeyViolationError extends StoreError {
  constructor(entity: EntityKind, field?: string, id?: number, cause?: unknown) {
    super(
      field && id !== undefined
        ? `${entity}.${field} references missing parent ${id}`
        : `${entity} references a missing parent`,
      'FOREIGN_KEY_VIOLATION',
      { entity, field, id, cause },
    );
    this.name = 'ForeignKeyViolationError';
  }
}

export class InvalidEnumError extends StoreError {
  constructor(
    entity: EntityKind,
    field: string,
    public readonly value: string | undefined,
    public readonly allowed: readonly string[],
    cause?: unknown,
  ) {
    super(
      `${entity}.${field} must be one of ${allowed.join(', ')}` +
        (value === undefined ? '' : `, got "${value}"`),
      'INVALID_ENUM',
      { entity, field, cause },
    );
    this.name = 'InvalidEnumError';
  }
}

export class EntityNotFoundError extends StoreError {
  constructor(entity: EntityKind, id: number) {
    super(`${entity} ${id} not found`, 'NOT_FOUND', { entity, id });
    this.name = 'EntityNotFoundError';
  }
}

export class LockContentionError extends StoreError {
  constructor(entity?: EntityKind, cause?: unknown) {
    super('Database is locked by another writer', 'LOCK_CONTENTION', { entity, cause }, true);
    this.name = 'LockContentionError';
  }
}

export class MissingFieldError extends StoreError {
  constructor(entity: EntityKind, field: string, cause?: unknown) {
    super(`${entity}.${field} is required`, 'MISSING_FIELD', { entity, field, cause });
    this.name = 'MissingFieldError';
  }
}

export class CorruptValueError extends StoreError {
  constructor(
    field: string,
    public readonly raw: string,
    cause?: unknown,
  ) {
    super(`Stored value of ${field} cannot be decoded`, 'CORRUPT_VALUE', {
      field,
      cause,
    });
    this.name = 'CorruptValueError';
  }
}

const columnPattern = /constraint failed: (?:\w+\.)?(\w+)/;

const failedColumn = (message: string): string | undefined =>
  columnPattern.exec(message)?.[1];

/**
 * Maps a better-sqlite3 error onto the store taxonomy. Anything that is not
 * an engine error comes back unchanged.
 */
export const translateSqliteError = (
  error: unknown,
  entity: EntityKind,
  allowedValues: readonly string[] = [],
): unknown => {
  if (!(error instanceof Database.SqliteError)) {
    return error;
  }

  switch (error.code) {
    case 'SQLITE_CONSTRAINT_UNIQUE':
    case 'SQLITE_CONSTRAINT_PRIMARYKEY':
      return new UniqueConstraintViolationError(entity, failedColumn(error.message), error);
    case 'SQLITE_CONSTRAINT_FOREIGNKEY':
      return new ForeignKeyViolationError(entity, undefined, undefined, error);
    case 'SQLITE_CONSTRAINT_CHECK':
      return new InvalidEnumError(
        entity,
        failedColumn(error.message) ?? 'unknown',
        undefined,
        allowedValues,
        error,
      );
    case 'SQLITE_CONSTRAINT_NOTNULL':
      return new MissingFieldError(entity, failedColumn(error.message) ?? 'unknown', error);
  }

  if (error.code.startsWith('SQLITE_BUSY') || error.code.startsWith('SQLITE_LOCKED')) {
    return new LockContentionError(entity, error);
  }

  return error;
};

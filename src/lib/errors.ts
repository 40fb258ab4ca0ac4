/**
 * Error classes for relgen
 *
 * Generation-time failures, runtime outcomes such as "not found", and the
 * PostgreSQL error mapping all share the {@link DALError} base.
 */

/**
 * Base error class
 */
export class DALError extends Error {
  code: string | null;

  constructor(message: string, code: string | null = null) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    if (typeof Error.captureStackTrace === 'function') {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/**
 * Declarations that cannot be compiled into entity metadata.
 */
export class SchemaError extends DALError {
  entity: string | null;

  constructor(message: string, entity: string | null = null) {
    super(message, 'SCHEMA_ERROR');
    this.name = 'SchemaError';
    this.entity = entity;
  }
}

/**
 * No row matched the selector of an update, delete or lookup.
 */
export class RecordNotFoundError extends DALError {
  entity: string | null;

  constructor(message = 'Record not found', entity: string | null = null, code = 'RECORD_NOT_FOUND') {
    super(message, code);
    this.name = 'RecordNotFoundError';
    this.entity = entity;
  }
}

/**
 * A queued connect lookup found no target row before the write.
 */
export class DeferredLookupError extends RecordNotFoundError {
  relation: string;

  constructor(message: string, entity: string | null, relation: string) {
    super(message, entity, 'DEFERRED_LOOKUP_FAILED');
    this.name = 'DeferredLookupError';
    this.relation = relation;
  }
}

export class RelationNotFoundError extends DALError {
  entity: string;
  relation: string;

  constructor(entity: string, relation: string) {
    super(`Relation '${relation}' is not defined on ${entity}`, 'RELATION_NOT_FOUND');
    this.name = 'RelationNotFoundError';
    this.entity = entity;
    this.relation = relation;
  }
}

export class FetcherMissingError extends DALError {
  entity: string;

  constructor(entity: string) {
    super(`No relation fetcher registered for entity '${entity}'`, 'FETCHER_MISSING');
    this.name = 'FetcherMissingError';
    this.entity = entity;
  }
}

/**
 * A request that is well-typed but cannot be executed as asked.
 */
export class QueryValidationError extends DALError {
  constructor(message: string) {
    super(message, 'QUERY_VALIDATION');
    this.name = 'QueryValidationError';
  }
}

export class InvalidFieldTypeError extends DALError {
  field: string;

  constructor(message: string, field: string) {
    super(message, 'INVALID_FIELD_TYPE');
    this.name = 'InvalidFieldTypeError';
    this.field = field;
  }
}

export class TypeConversionError extends DALError {
  constructor(message: string) {
    super(message, 'TYPE_CONVERSION');
    this.name = 'TypeConversionError';
  }
}

/**
 * Raised when the runtime receives a node it does not know how to handle.
 * Correctly generated surfaces never produce one.
 */
export class InternalContractError extends DALError {
  constructor(message: string) {
    super(message, 'INTERNAL_CONTRACT');
    this.name = 'InternalContractError';
  }
}

/**
 * Invalid UUID error - for malformed UUID strings
 */
export class InvalidUUIDError extends DALError {
  constructor(message = 'Invalid UUID format') {
    super(message, 'INVALID_UUID');
    this.name = 'InvalidUUIDError';
  }
}

/**
 * Validation error
 */
export class ValidationError extends DALError {
  field: string | null;

  constructor(message: string, field: string | null = null) {
    super(message, 'VALIDATION_ERROR');
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * Connection error
 */
export class ConnectionError extends DALError {
  constructor(message = 'Database connection error') {
    super(message, 'CONNECTION_ERROR');
    this.name = 'ConnectionError';
  }
}

/**
 * Query error
 */
export class QueryError extends DALError {
  originalError: unknown;

  constructor(message: string, originalError: unknown = null) {
    super(message, 'QUERY_ERROR');
    this.name = 'QueryError';
    this.originalError = originalError;
  }
}

/**
 * Constraint violation error
 */
export class ConstraintError extends DALError {
  constraint: string | null;
  originalError: unknown;

  constructor(message: string, constraint: string | null = null, originalError: unknown = null) {
    super(message, 'CONSTRAINT_ERROR');
    this.name = 'ConstraintError';
    this.constraint = constraint;
    this.originalError = originalError;
  }
}

const readString = (source: object, key: string): string | undefined => {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
};

/**
 * Convert PostgreSQL errors to DAL errors. Errors that are already DAL errors
 * pass through untouched.
 * @param pgError - PostgreSQL error
 * @returns Converted DAL error
 */
export function convertPostgreSQLError(pgError: unknown): DALError {
  if (pgError instanceof DALError) {
    return pgError;
  }

  if (!pgError || typeof pgError !== 'object') {
    return new DALError('Unknown error');
  }

  const message = readString(pgError, 'message') ?? 'Unknown error';
  const code = readString(pgError, 'code');
  const detail = readString(pgError, 'detail');
  const constraint = readString(pgError, 'constraint') ?? null;
  const column = readString(pgError, 'column');

  // PostgreSQL error codes: https://www.postgresql.org/docs/current/errcodes-appendix.html
  switch (code) {
    case '23505': // unique_violation
      return new ConstraintError(
        `Unique constraint violation: ${detail ?? message}`,
        constraint,
        pgError
      );

    case '23503': // foreign_key_violation
      return new ConstraintError(
        `Foreign key constraint violation: ${detail ?? message}`,
        constraint,
        pgError
      );

    case '23502': // not_null_violation
      return new ValidationError(`Not null constraint violation: ${column ?? message}`, column ?? null);

    case '23514': // check_violation
      return new ValidationError(`Check constraint violation: ${detail ?? message}`, constraint);

    case '08000': // connection_exception
    case '08003': // connection_does_not_exist
    case '08006': // connection_failure
      return new ConnectionError(message);

    case '42P01': // undefined_table
      return new QueryError(`Table does not exist: ${message}`, pgError);

    case '42703': // undefined_column
      return new QueryError(`Column does not exist: ${message}`, pgError);

    default:
      return new QueryError(message, pgError);
  }
}

const errors = {
  DALError,
  SchemaError,
  RecordNotFoundError,
  DeferredLookupError,
  RelationNotFoundError,
  FetcherMissingError,
  QueryValidationError,
  InvalidFieldTypeError,
  TypeConversionError,
  InternalContractError,
  InvalidUUIDError,
  ValidationError,
  ConnectionError,
  QueryError,
  ConstraintError,
  convertPostgreSQLError,
} as const;

export default errors;

/**
 * Connector Error Classes
 *
 * Every failure the catalog raises on its own extends {@link ConnectorError}.
 * Failures from the messaging directory or the schema registry are never
 * wrapped: they reach the caller exactly as the collaborator threw them.
 *
 * @example
 * ```ts
 * import { TableNotFoundError, isConnectorError } from '@topicsql/core';
 *
 * try {
 *   await metadata.getTableMetadata(session, handle);
 * } catch (error) {
 *   if (isConnectorError(error)) {
 *     console.log(`Catalog error (${error.code}): ${error.message}`);
 *   }
 * }
 * ```
 */

// ============================================================================
// Base Error
// ============================================================================

/**
 * Error codes raised by the connector itself.
 */
export type ConnectorErrorCode =
  | 'SCHEMA_NOT_FOUND'
  | 'TABLE_NOT_FOUND'
  | 'INVALID_SCHEMA'
  | 'INVALID_HANDLE'
  | 'INVALID_CONFIG';

/**
 * Base error class for all connector errors.
 */
export class ConnectorError extends Error {
  /** Error code for programmatic handling */
  readonly code: ConnectorErrorCode;

  constructor(message: string, code: ConnectorErrorCode) {
    super(message);
    this.name = 'ConnectorError';
    this.code = code;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ============================================================================
// Lookup Errors
// ============================================================================

/**
 * Thrown when a namespace is not known to the messaging directory.
 */
export class SchemaNotFoundError extends ConnectorError {
  readonly code: 'SCHEMA_NOT_FOUND' = 'SCHEMA_NOT_FOUND';

  constructor(public readonly schemaName: string) {
    super(`Schema ${schemaName} does not exist`, 'SCHEMA_NOT_FOUND');
    this.name = 'SchemaNotFoundError';
  }
}

/**
 * Thrown when a topic does not exist in an existing namespace.
 */
export class TableNotFoundError extends ConnectorError {
  readonly code: 'TABLE_NOT_FOUND' = 'TABLE_NOT_FOUND';

  constructor(
    public readonly schemaName: string,
    public readonly tableName: string
  ) {
    super(`Table '${schemaName}.${tableName}' not found`, 'TABLE_NOT_FOUND');
    this.name = 'TableNotFoundError';
  }
}

// ============================================================================
// Schema Errors
// ============================================================================

/**
 * Thrown when a topic's registered schema is empty, cannot be parsed, or uses
 * a layout that has no relational mapping.
 */
export class InvalidSchemaError extends ConnectorError {
  readonly code: 'INVALID_SCHEMA' = 'INVALID_SCHEMA';

  constructor(
    /** Fully qualified topic name */
    public readonly topic: string,
    /** What was wrong with the schema */
    public readonly reason: string
  ) {
    super(`Topic ${topic} does not have a valid schema`, 'INVALID_SCHEMA');
    this.name = 'InvalidSchemaError';
  }
}

// ============================================================================
// Handle and Configuration Errors
// ============================================================================

/**
 * Thrown when a serialized table or column handle does not have the expected shape.
 */
export class InvalidHandleError extends ConnectorError {
  readonly code: 'INVALID_HANDLE' = 'INVALID_HANDLE';

  constructor(message: string) {
    super(message, 'INVALID_HANDLE');
    this.name = 'InvalidHandleError';
  }
}

/**
 * Thrown when connector configuration fails validation.
 */
export class ConfigError extends ConnectorError {
  readonly code: 'INVALID_CONFIG' = 'INVALID_CONFIG';

  constructor(
    message: string,
    /** Individual validation problems, one per offending option */
    public readonly issues: readonly string[] = []
  ) {
    super(message, 'INVALID_CONFIG');
    this.name = 'ConfigError';
  }
}

// ============================================================================
// Collaborator Not-Found Signalling
// ============================================================================

/**
 * Error a collaborator throws when the tenant, topic or schema it was asked
 * for does not exist. Collaborators that surface HTTP errors can instead throw
 * any error carrying a 404 `statusCode` or `status`.
 */
export class ResourceNotFoundError extends Error {
  readonly statusCode = 404;

  constructor(public readonly resource: string) {
    super(`Resource not found: ${resource}`);
    this.name = 'ResourceNotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

function hasStatus(error: object, key: 'statusCode' | 'status'): boolean {
  return key in error && Reflect.get(error, key) === 404;
}

/**
 * Check whether a collaborator error means "does not exist".
 */
export function isNotFoundError(error: unknown): boolean {
  if (error instanceof ResourceNotFoundError) {
    return true;
  }
  if (typeof error !== 'object' || error === null) {
    return false;
  }
  return hasStatus(error, 'statusCode') || hasStatus(error, 'status');
}

// ============================================================================
// Type Guards
// ============================================================================

export function isConnectorError(error: unknown): error is ConnectorError {
  return error instanceof ConnectorError;
}

export function isSchemaNotFoundError(error: unknown): error is SchemaNotFoundError {
  return error instanceof SchemaNotFoundError;
}

export function isTableNotFoundError(error: unknown): error is TableNotFoundError {
  return error instanceof TableNotFoundError;
}

export function isInvalidSchemaError(error: unknown): error is InvalidSchemaError {
  return error instanceof InvalidSchemaError;
}

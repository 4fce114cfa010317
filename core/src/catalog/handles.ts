/**
 * Table and Column Handles
 *
 * Opaque values the engine keeps between calls and hands back later. Handles
 * are frozen plain objects, so two handles built from the same inputs are
 * deep-equal and serialize to the same JSON.
 */

import { z } from 'zod';
import { InvalidHandleError } from '../errors.js';
import { sqlTypesEqual } from '../metadata/sql-type.js';
import type { ColumnMetadata, SqlType } from '../metadata/types.js';

// ============================================================================
// Types
// ============================================================================

export interface TableHandle {
  readonly connectorId: string;
  /** Canonical `tenant/namespace`, never rewritten */
  readonly schemaName: string;
  readonly tableName: string;
  /** Local name of the logical topic backing the table */
  readonly topicName: string;
}

export interface ColumnHandle {
  readonly connectorId: string;
  readonly name: string;
  readonly type: SqlType;
  readonly positionIndices: readonly number[];
  readonly fieldNames: readonly string[];
  readonly hidden: boolean;
  readonly internal: boolean;
}

// ============================================================================
// Construction
// ============================================================================

export function createTableHandle(
  connectorId: string,
  schemaName: string,
  tableName: string,
  topicName: string = tableName
): TableHandle {
  return Object.freeze({ connectorId, schemaName, tableName, topicName });
}

export function createColumnHandle(fields: ColumnHandle): ColumnHandle {
  return Object.freeze({
    connectorId: fields.connectorId,
    name: fields.name,
    type: fields.type,
    positionIndices: Object.freeze([...fields.positionIndices]),
    fieldNames: Object.freeze([...fields.fieldNames]),
    hidden: fields.hidden,
    internal: fields.internal,
  });
}

/**
 * Handle for a column as the reader will need it.
 */
export function columnHandleFromMetadata(connectorId: string, column: ColumnMetadata): ColumnHandle {
  return createColumnHandle({
    connectorId,
    name: column.name,
    type: column.type,
    positionIndices: column.positionIndices,
    fieldNames: column.fieldNames,
    hidden: column.hidden,
    internal: column.internal,
  });
}

/**
 * Inverse of {@link columnHandleFromMetadata}; internal columns get their
 * comment from the caller.
 */
export function columnMetadataFromHandle(handle: ColumnHandle, comment?: string): ColumnMetadata {
  return {
    name: handle.name,
    type: handle.type,
    positionIndices: handle.positionIndices,
    fieldNames: handle.fieldNames,
    hidden: handle.hidden,
    comment,
    internal: handle.internal,
  };
}

// ============================================================================
// Equality
// ============================================================================

export function tableHandlesEqual(a: TableHandle, b: TableHandle): boolean {
  return (
    a.connectorId === b.connectorId &&
    a.schemaName === b.schemaName &&
    a.tableName === b.tableName &&
    a.topicName === b.topicName
  );
}

export function columnHandlesEqual(a: ColumnHandle, b: ColumnHandle): boolean {
  return (
    a.connectorId === b.connectorId &&
    a.name === b.name &&
    sqlTypesEqual(a.type, b.type) &&
    arraysEqual(a.positionIndices, b.positionIndices) &&
    arraysEqual(a.fieldNames, b.fieldNames) &&
    a.hidden === b.hidden &&
    a.internal === b.internal
  );
}

function arraysEqual<T>(a: readonly T[], b: readonly T[]): boolean {
  return a.length === b.length && a.every((value, i) => value === b[i]);
}

// ============================================================================
// Serialization
// ============================================================================

const sqlTypeSchema: z.ZodType<SqlType> = z.lazy(() =>
  z.union([
    z.enum([
      'boolean',
      'tinyint',
      'smallint',
      'integer',
      'bigint',
      'real',
      'double',
      'varchar',
      'varbinary',
      'date',
      'time',
      'timestamp',
    ]),
    z.object({
      type: z.literal('decimal'),
      precision: z.number().int().positive(),
      scale: z.number().int().nonnegative(),
    }),
    z.object({ type: z.literal('array'), element: sqlTypeSchema }),
    z.object({ type: z.literal('map'), key: sqlTypeSchema, value: sqlTypeSchema }),
  ])
);

const tableHandleSchema = z.object({
  connectorId: z.string().min(1),
  schemaName: z.string().min(1),
  tableName: z.string().min(1),
  topicName: z.string().min(1),
});

const columnHandleSchema = z.object({
  connectorId: z.string().min(1),
  name: z.string().min(1),
  type: sqlTypeSchema,
  positionIndices: z.array(z.number().int().nonnegative()),
  fieldNames: z.array(z.string()),
  hidden: z.boolean(),
  internal: z.boolean(),
});

function parseJson(serialized: string, kind: string): unknown {
  try {
    return JSON.parse(serialized);
  } catch {
    throw new InvalidHandleError(`Serialized ${kind} handle is not JSON`);
  }
}

/**
 * Rebuild a table handle from `JSON.stringify(handle)`.
 *
 * @throws InvalidHandleError if the value is not a table handle
 */
export function parseTableHandle(serialized: string): TableHandle {
  const result = tableHandleSchema.safeParse(parseJson(serialized, 'table'));
  if (!result.success) {
    throw new InvalidHandleError(`Invalid table handle: ${result.error.issues[0]?.message ?? 'unknown shape'}`);
  }
  const { connectorId, schemaName, tableName, topicName } = result.data;
  return createTableHandle(connectorId, schemaName, tableName, topicName);
}

/**
 * Rebuild a column handle from `JSON.stringify(handle)`.
 *
 * @throws InvalidHandleError if the value is not a column handle
 */
export function parseColumnHandle(serialized: string): ColumnHandle {
  const result = columnHandleSchema.safeParse(parseJson(serialized, 'column'));
  if (!result.success) {
    throw new InvalidHandleError(`Invalid column handle: ${result.error.issues[0]?.message ?? 'unknown shape'}`);
  }
  return createColumnHandle(result.data);
}

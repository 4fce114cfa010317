/**
 * Relational Type Definitions
 *
 * The shapes the query engine sees: schema/table names, column types and
 * column metadata.
 */

// ============================================================================
// SQL Types
// ============================================================================

/** SQL primitive column types */
export type SqlPrimitiveType =
  | 'boolean'
  | 'tinyint'
  | 'smallint'
  | 'integer'
  | 'bigint'
  | 'real'
  | 'double'
  | 'varchar'
  | 'varbinary'
  | 'date'
  | 'time'
  | 'timestamp';

/** Fixed-precision decimal */
export interface SqlDecimalType {
  readonly type: 'decimal';
  readonly precision: number;
  readonly scale: number;
}

/** Array of a non-row element type */
export interface SqlArrayType {
  readonly type: 'array';
  readonly element: SqlType;
}

/** Map from varchar keys to a non-row value type */
export interface SqlMapType {
  readonly type: 'map';
  readonly key: SqlType;
  readonly value: SqlType;
}

/** Combined SQL type */
export type SqlType = SqlPrimitiveType | SqlDecimalType | SqlArrayType | SqlMapType;

// ============================================================================
// Names
// ============================================================================

/**
 * A table addressed by schema and table name, as the engine sees it.
 */
export interface SchemaTableName {
  readonly schemaName: string;
  readonly tableName: string;
}

/**
 * Format a table name as `schema.table`.
 */
export function schemaTableNameToString(name: SchemaTableName): string {
  return `${name.schemaName}.${name.tableName}`;
}

/**
 * Filter used by column listing: a schema, optionally narrowed to one table.
 */
export interface SchemaTablePrefix {
  readonly schema: string;
  readonly table?: string;
}

// ============================================================================
// Columns and Tables
// ============================================================================

/**
 * One column of a table.
 *
 * Data columns are the leaves of the topic's schema; `name` is the dotted
 * path and `positionIndices` holds one offset per nesting level. Internal
 * columns expose message envelope fields and have no position.
 */
export interface ColumnMetadata {
  readonly name: string;
  readonly type: SqlType;
  /** Offset of the field in each enclosing record, outermost first */
  readonly positionIndices: readonly number[];
  /** Path segments; `fieldNames.join('.') === name` for data columns */
  readonly fieldNames: readonly string[];
  readonly hidden: boolean;
  readonly comment?: string;
  /** True for message envelope columns */
  readonly internal: boolean;
}

/**
 * Columns of one table together with its name.
 */
export interface ConnectorTableMetadata {
  readonly table: SchemaTableName;
  readonly columns: readonly ColumnMetadata[];
  readonly comment?: string;
}

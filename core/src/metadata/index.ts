/**
 * Relational Metadata Module
 *
 * SQL types, column metadata, the internal columns every table carries, and
 * the translator from topic schemas to columns.
 */

// ============================================================================
// Types
// ============================================================================

export type {
  SqlPrimitiveType,
  SqlDecimalType,
  SqlArrayType,
  SqlMapType,
  SqlType,
  SchemaTableName,
  SchemaTablePrefix,
  ColumnMetadata,
  ConnectorTableMetadata,
} from './types.js';
export { schemaTableNameToString } from './types.js';

export { formatSqlType, sqlTypesEqual } from './sql-type.js';

// ============================================================================
// Internal Columns
// ============================================================================

export {
  type InternalColumn,
  PARTITION_COLUMN_NAME,
  EVENT_TIME_COLUMN_NAME,
  PUBLISH_TIME_COLUMN_NAME,
  MESSAGE_ID_COLUMN_NAME,
  SEQUENCE_ID_COLUMN_NAME,
  PRODUCER_NAME_COLUMN_NAME,
  KEY_COLUMN_NAME,
  PROPERTIES_COLUMN_NAME,
  getInternalColumns,
  getInternalColumn,
  isInternalColumnName,
  internalColumnMetadata,
  internalColumnsMetadata,
} from './internal-columns.js';

// ============================================================================
// Schema Translation
// ============================================================================

export { SchemaTranslator, VALUE_COLUMN_NAME } from './translator.js';

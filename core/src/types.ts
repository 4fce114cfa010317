/**
 * Core Types for @topicsql/core
 *
 * Re-exports the data model types for convenience.
 */

export type {
  // SQL types
  SqlPrimitiveType,
  SqlDecimalType,
  SqlArrayType,
  SqlMapType,
  SqlType,
  // Tables and columns
  SchemaTableName,
  SchemaTablePrefix,
  ColumnMetadata,
  ConnectorTableMetadata,
} from './metadata/types.js';

export type {
  // Topic schemas
  SchemaType,
  SchemaSnapshot,
  // Collaborators
  NamespaceDirectory,
  TopicDirectory,
  SchemaRegistry,
  MessagingCatalogSource,
  ConnectorSession,
} from './catalog/types.js';

export type { TableHandle, ColumnHandle } from './catalog/handles.js';

/**
 * @topicsql/core
 *
 * Exposes a multi-tenant messaging system's topics as SQL tables: tenants and
 * namespaces become schemas, topics become tables, and each topic's registered
 * schema becomes its columns.
 *
 * @example
 * ```ts
 * import {
 *   InMemoryMessagingDirectory,
 *   TopicMetadata,
 *   avroSnapshot,
 * } from '@topicsql/core';
 *
 * const directory = new InMemoryMessagingDirectory();
 * directory.createNamespace('public/default');
 * directory.createTopic('persistent://public/default/orders');
 * directory.setSchema('persistent://public/default/orders', avroSnapshot({
 *   type: 'record',
 *   name: 'Order',
 *   fields: [{ name: 'id', type: 'long' }],
 * }));
 *
 * const metadata = new TopicMetadata(directory, { connectorId: 'events' });
 * const handle = metadata.getTableHandle(null, { schemaName: 'public/default', tableName: 'orders' });
 * const { columns } = await metadata.getTableMetadata(null, handle);
 * // columns[0] -> { name: 'id', type: 'bigint', positionIndices: [0], ... }
 * ```
 */

// ============================================================================
// Naming
// ============================================================================

export {
  type TopicDomain,
  NAMESPACE_SEPARATOR,
  PARTITIONED_TOPIC_SUFFIX,
  NamespaceName,
  TopicName,
} from './naming/names.js';

export { rewriteNamespaceDelimiter, restoreNamespaceDelimiter } from './naming/delimiter.js';

// ============================================================================
// Relational Metadata
// ============================================================================

export * from './metadata/index.js';

// ============================================================================
// Avro Schemas
// ============================================================================

export {
  type AvroPrimitive,
  type AvroAnnotatedPrimitive,
  type AvroArray,
  type AvroMap,
  type AvroFixed,
  type AvroEnum,
  type AvroRecordField,
  type AvroRecord,
  type AvroUnion,
  type AvroType,
  type AvroNamedType,
  AVRO_PRIMITIVES,
  AvroSchemaError,
  parseAvroRecordSchema,
  isAvroPrimitive,
  avroFullName,
} from './avro/index.js';

// ============================================================================
// Catalog
// ============================================================================

export * from './catalog/index.js';

// ============================================================================
// Errors
// ============================================================================

export {
  type ConnectorErrorCode,
  ConnectorError,
  SchemaNotFoundError,
  TableNotFoundError,
  InvalidSchemaError,
  InvalidHandleError,
  ConfigError,
  ResourceNotFoundError,
  isNotFoundError,
  isConnectorError,
  isSchemaNotFoundError,
  isTableNotFoundError,
  isInvalidSchemaError,
} from './errors.js';

// ============================================================================
// Configuration and Logging
// ============================================================================

export {
  type ConnectorConfigInput,
  type ConnectorConfig,
  connectorConfigSchema,
  parseConnectorConfig,
  loadConfigFromEnv,
  effectiveNamespaceDelimiter,
} from './config.js';

export {
  type LogLevel,
  type Logger,
  type LoggerOptions,
  ConsoleLogger,
  createLogger,
  noopLogger,
} from './logger.js';

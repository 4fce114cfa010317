/**
 * Catalog Module
 *
 * The engine-facing read surface over a messaging directory, the contracts
 * its collaborators implement, and two ready-made collaborators.
 */

// ============================================================================
// Collaborator Contracts (types.ts)
// ============================================================================

export {
  type SchemaType,
  type SchemaSnapshot,
  type NamespaceDirectory,
  type TopicDirectory,
  type SchemaRegistry,
  type MessagingCatalogSource,
  type ConnectorSession,
  SCHEMA_TYPES,
  isSchemaType,
} from './types.js';

// ============================================================================
// Handles
// ============================================================================

export {
  type TableHandle,
  type ColumnHandle,
  createTableHandle,
  createColumnHandle,
  columnHandleFromMetadata,
  columnMetadataFromHandle,
  tableHandlesEqual,
  columnHandlesEqual,
  parseTableHandle,
  parseColumnHandle,
} from './handles.js';

// ============================================================================
// Catalog Read Surface
// ============================================================================

export { NamespaceCatalog } from './namespace-catalog.js';
export { TopicCatalog } from './topic-catalog.js';
export { type TopicMetadataOptions, TopicMetadata } from './metadata.js';

// ============================================================================
// Collaborator Implementations
// ============================================================================

export { InMemoryMessagingDirectory, avroSnapshot } from './memory.js';

export {
  type AdminApiConfig,
  AdminApiClient,
  AdminApiError,
  createAdminApiClient,
} from './admin-client.js';

/**
 * Collaborator Contracts
 *
 * The catalog reads everything it knows from two collaborators: a messaging
 * directory listing tenants, namespaces and topics, and a schema registry
 * returning the latest schema of a topic. Implementations signal a missing
 * tenant, topic or schema with {@link ResourceNotFoundError} (or any error
 * carrying a 404 status); every other error is passed to the caller unchanged.
 *
 * @see InMemoryMessagingDirectory for an in-process implementation
 * @see AdminApiClient for an implementation over the broker admin REST API
 */

import type { TopicName } from '../naming/names.js';

// ============================================================================
// Schema Snapshots
// ============================================================================

/** Schema kinds a topic can be registered with */
export type SchemaType =
  | 'NONE'
  | 'STRING'
  | 'JSON'
  | 'PROTOBUF'
  | 'AVRO'
  | 'BOOLEAN'
  | 'INT8'
  | 'INT16'
  | 'INT32'
  | 'INT64'
  | 'FLOAT'
  | 'DOUBLE'
  | 'DATE'
  | 'TIME'
  | 'TIMESTAMP'
  | 'BYTES'
  | 'KEY_VALUE';

export const SCHEMA_TYPES: readonly SchemaType[] = [
  'NONE',
  'STRING',
  'JSON',
  'PROTOBUF',
  'AVRO',
  'BOOLEAN',
  'INT8',
  'INT16',
  'INT32',
  'INT64',
  'FLOAT',
  'DOUBLE',
  'DATE',
  'TIME',
  'TIMESTAMP',
  'BYTES',
  'KEY_VALUE',
];

export function isSchemaType(value: string): value is SchemaType {
  return SCHEMA_TYPES.some((type) => type === value);
}

/**
 * Latest registered schema of a topic.
 *
 * For `AVRO` and `JSON` topics `schema` holds the UTF-8 encoded Avro schema
 * document. For primitive types it is usually empty.
 */
export interface SchemaSnapshot {
  readonly type: SchemaType;
  readonly schema: Uint8Array;
  readonly name?: string;
  readonly properties?: Readonly<Record<string, string>>;
}

// ============================================================================
// Collaborators
// ============================================================================

/**
 * Enumerates tenants and their namespaces.
 */
export interface NamespaceDirectory {
  listTenants(): Promise<string[]>;

  /**
   * List namespaces of a tenant in canonical `tenant/namespace` form.
   *
   * @throws ResourceNotFoundError if the tenant does not exist
   */
  listNamespaces(tenant: string): Promise<string[]>;
}

/**
 * Enumerates topics of a namespace.
 */
export interface TopicDirectory {
  /**
   * Fully qualified names of all topics, including each partition of a
   * partitioned topic.
   */
  listTopics(namespace: string): Promise<string[]>;

  /**
   * Fully qualified base names of partitioned topics.
   */
  listPartitionedTopics(namespace: string): Promise<string[]>;
}

/**
 * Looks up the latest schema of a topic.
 */
export interface SchemaRegistry {
  /**
   * @throws ResourceNotFoundError if the topic has no registered schema
   */
  getSchemaInfo(topic: TopicName): Promise<SchemaSnapshot>;
}

/**
 * Everything the catalog needs to read.
 */
export interface MessagingCatalogSource {
  readonly namespaces: NamespaceDirectory;
  readonly topics: TopicDirectory;
  readonly schemas: SchemaRegistry;
}

// ============================================================================
// Sessions
// ============================================================================

/**
 * Engine session passed through every catalog call. The catalog never
 * inspects it.
 */
export type ConnectorSession = unknown;

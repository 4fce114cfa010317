/**
 * In-memory messaging directory and schema registry.
 *
 * Keeps tenants, namespaces, topics and schemas in insertion-ordered maps.
 * Useful for tests and for embedding the catalog without a broker.
 *
 * @example
 * ```ts
 * const directory = new InMemoryMessagingDirectory();
 * directory.createNamespace('public/default');
 * directory.createPartitionedTopic('persistent://public/default/orders', 4);
 * directory.setSchema('persistent://public/default/orders', avroSnapshot(schema));
 *
 * const metadata = new TopicMetadata(directory, { connectorId: 'events' });
 * ```
 */

import { ResourceNotFoundError } from '../errors.js';
import { NamespaceName, TopicName } from '../naming/names.js';
import type {
  MessagingCatalogSource,
  NamespaceDirectory,
  SchemaRegistry,
  SchemaSnapshot,
  TopicDirectory,
} from './types.js';

interface NamespaceEntry {
  /** Fully qualified topic names, partitions included */
  readonly topics: string[];
  /** Fully qualified base names of partitioned topics */
  readonly partitionedTopics: string[];
}

export class InMemoryMessagingDirectory
  implements NamespaceDirectory, TopicDirectory, SchemaRegistry, MessagingCatalogSource
{
  readonly namespaces: NamespaceDirectory = this;
  readonly topics: TopicDirectory = this;
  readonly schemas: SchemaRegistry = this;

  private readonly tenants = new Map<string, Map<string, NamespaceEntry>>();
  private readonly schemaInfos = new Map<string, SchemaSnapshot>();

  // ==========================================================================
  // Setup
  // ==========================================================================

  createTenant(tenant: string): void {
    if (!this.tenants.has(tenant)) {
      this.tenants.set(tenant, new Map());
    }
  }

  /**
   * Create a namespace (and its tenant) from its `tenant/namespace` name.
   */
  createNamespace(namespace: string): void {
    const name = NamespaceName.parse(namespace);
    this.createTenant(name.tenant);
    const namespaces = this.tenantNamespaces(name.tenant);
    if (!namespaces.has(name.toString())) {
      namespaces.set(name.toString(), { topics: [], partitionedTopics: [] });
    }
  }

  /**
   * Create a non-partitioned topic. The namespace must exist.
   */
  createTopic(topic: string): TopicName {
    const name = TopicName.parse(topic);
    const entry = this.namespaceEntry(name.namespace);
    if (!entry.topics.includes(name.toString())) {
      entry.topics.push(name.toString());
    }
    return name;
  }

  /**
   * Create a partitioned topic with `partitions` partitions.
   */
  createPartitionedTopic(topic: string, partitions: number): TopicName {
    const name = TopicName.parse(topic);
    const entry = this.namespaceEntry(name.namespace);
    if (!entry.partitionedTopics.includes(name.toString())) {
      entry.partitionedTopics.push(name.toString());
    }
    for (let i = 0; i < partitions; i++) {
      const partition = name.partition(i).toString();
      if (!entry.topics.includes(partition)) {
        entry.topics.push(partition);
      }
    }
    return name;
  }

  /**
   * Register the schema of a topic (or of all partitions of a partitioned topic).
   */
  setSchema(topic: string, snapshot: SchemaSnapshot): void {
    this.schemaInfos.set(TopicName.parse(topic).schemaName, snapshot);
  }

  deleteSchema(topic: string): void {
    this.schemaInfos.delete(TopicName.parse(topic).schemaName);
  }

  // ==========================================================================
  // NamespaceDirectory
  // ==========================================================================

  async listTenants(): Promise<string[]> {
    return [...this.tenants.keys()];
  }

  async listNamespaces(tenant: string): Promise<string[]> {
    return [...this.tenantNamespaces(tenant).keys()];
  }

  // ==========================================================================
  // TopicDirectory
  // ==========================================================================

  async listTopics(namespace: string): Promise<string[]> {
    return [...this.namespaceEntry(NamespaceName.parse(namespace)).topics];
  }

  async listPartitionedTopics(namespace: string): Promise<string[]> {
    return [...this.namespaceEntry(NamespaceName.parse(namespace)).partitionedTopics];
  }

  // ==========================================================================
  // SchemaRegistry
  // ==========================================================================

  async getSchemaInfo(topic: TopicName): Promise<SchemaSnapshot> {
    const snapshot = this.schemaInfos.get(topic.schemaName);
    if (!snapshot) {
      throw new ResourceNotFoundError(`schema of ${topic.toString()}`);
    }
    return snapshot;
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private tenantNamespaces(tenant: string): Map<string, NamespaceEntry> {
    const namespaces = this.tenants.get(tenant);
    if (!namespaces) {
      throw new ResourceNotFoundError(`tenant ${tenant}`);
    }
    return namespaces;
  }

  private namespaceEntry(namespace: NamespaceName): NamespaceEntry {
    const entry = this.tenantNamespaces(namespace.tenant).get(namespace.toString());
    if (!entry) {
      throw new ResourceNotFoundError(`namespace ${namespace.toString()}`);
    }
    return entry;
  }
}

// ============================================================================
// Snapshot Helpers
// ============================================================================

const textEncoder = new TextEncoder();

/**
 * Snapshot for an Avro schema given as a JSON-serializable document or text.
 */
export function avroSnapshot(schema: unknown): SchemaSnapshot {
  const text = typeof schema === 'string' ? schema : JSON.stringify(schema);
  return { type: 'AVRO', schema: textEncoder.encode(text) };
}

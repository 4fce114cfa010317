/**
 * Catalog Read Surface
 *
 * {@link TopicMetadata} answers the engine's metadata calls: which schemas
 * exist, which tables a schema has, and what columns a table has. Each call
 * reads the messaging directory and schema registry afresh and keeps nothing
 * once it returns.
 *
 * @example
 * ```ts
 * const metadata = new TopicMetadata(source, { connectorId: 'events' });
 *
 * await metadata.listSchemaNames(session);          // ['public/default', ...]
 * await metadata.listTables(session, 'public/default');
 *
 * const handle = metadata.getTableHandle(session, {
 *   schemaName: 'public/default',
 *   tableName: 'orders',
 * });
 * const table = await metadata.getTableMetadata(session, handle);
 * ```
 */

import type { ConnectorConfig } from '../config.js';
import { effectiveNamespaceDelimiter } from '../config.js';
import {
  InvalidSchemaError,
  SchemaNotFoundError,
  TableNotFoundError,
  isNotFoundError,
} from '../errors.js';
import { noopLogger, type Logger } from '../logger.js';
import type { NamespaceName, TopicName } from '../naming/names.js';
import { getInternalColumn } from '../metadata/internal-columns.js';
import { SchemaTranslator } from '../metadata/translator.js';
import type {
  ColumnMetadata,
  ConnectorTableMetadata,
  SchemaTableName,
  SchemaTablePrefix,
} from '../metadata/types.js';
import {
  type ColumnHandle,
  type TableHandle,
  columnHandleFromMetadata,
  columnMetadataFromHandle,
  createTableHandle,
} from './handles.js';
import { NamespaceCatalog } from './namespace-catalog.js';
import { TopicCatalog } from './topic-catalog.js';
import type { ConnectorSession, MessagingCatalogSource, SchemaSnapshot } from './types.js';

// ============================================================================
// Options
// ============================================================================

export interface TopicMetadataOptions {
  /** Identifier stamped on every handle */
  connectorId: string;
  /** Replaces `/` in listed schema names; '' or omitted disables rewriting */
  namespaceDelimiter?: string;
  logger?: Logger;
}

// ============================================================================
// TopicMetadata
// ============================================================================

export class TopicMetadata {
  private readonly connectorId: string;
  private readonly namespaces: NamespaceCatalog;
  private readonly topics: TopicCatalog;
  private readonly translator = new SchemaTranslator();
  private readonly logger: Logger;

  constructor(
    private readonly source: MessagingCatalogSource,
    options: TopicMetadataOptions
  ) {
    this.connectorId = options.connectorId;
    this.logger = options.logger ?? noopLogger;
    this.namespaces = new NamespaceCatalog(source.namespaces, options.namespaceDelimiter ?? '', this.logger);
    this.topics = new TopicCatalog(source.topics, this.logger);
  }

  static fromConfig(source: MessagingCatalogSource, config: ConnectorConfig, logger?: Logger): TopicMetadata {
    return new TopicMetadata(source, {
      connectorId: config.connectorId,
      namespaceDelimiter: effectiveNamespaceDelimiter(config),
      logger,
    });
  }

  // ==========================================================================
  // Schemas and Tables
  // ==========================================================================

  async listSchemaNames(_session: ConnectorSession): Promise<string[]> {
    return this.namespaces.listSchemaNames();
  }

  /**
   * Whether a schema, given in either the rewritten or the canonical form,
   * names a known namespace.
   */
  async schemaExists(_session: ConnectorSession, schemaName: string): Promise<boolean> {
    return this.namespaces.namespaceExists(this.namespaces.restoreSchemaName(schemaName));
  }

  /**
   * Tables of one schema. Returns an empty list for a missing or unknown
   * schema; enumerating every schema is the caller's job.
   */
  async listTables(_session: ConnectorSession, schemaName?: string | null): Promise<SchemaTableName[]> {
    if (schemaName === undefined || schemaName === null) {
      return [];
    }
    const namespace = await this.namespaces.findNamespace(this.namespaces.restoreSchemaName(schemaName));
    if (!namespace) {
      return [];
    }
    return this.topics.listTables(schemaName, namespace);
  }

  /**
   * Handle for a table. Does not check that the table exists; later calls
   * with the handle do.
   */
  getTableHandle(_session: ConnectorSession, table: SchemaTableName): TableHandle {
    return createTableHandle(
      this.connectorId,
      this.namespaces.restoreSchemaName(table.schemaName),
      table.tableName,
      table.tableName
    );
  }

  // ==========================================================================
  // Columns
  // ==========================================================================

  /**
   * @throws SchemaNotFoundError if the handle's namespace does not exist
   * @throws TableNotFoundError if the topic does not exist in the namespace
   * @throws InvalidSchemaError if the topic's schema is empty or unparsable
   */
  async getTableMetadata(_session: ConnectorSession, handle: TableHandle): Promise<ConnectorTableMetadata> {
    const columns = await this.resolveColumns(handle);
    return {
      table: { schemaName: handle.schemaName, tableName: handle.tableName },
      columns,
    };
  }

  /**
   * Column handles keyed by column name, in column order. Fails exactly like
   * {@link getTableMetadata}.
   */
  async getColumnHandles(_session: ConnectorSession, handle: TableHandle): Promise<Map<string, ColumnHandle>> {
    const columns = await this.resolveColumns(handle);
    return new Map(
      columns.map((column) => [column.name, columnHandleFromMetadata(this.connectorId, column)])
    );
  }

  /**
   * Column metadata rebuilt from a handle alone. Handles carry no comment, so
   * only internal columns get one back; field docs are reported by
   * {@link getTableMetadata}.
   */
  getColumnMetadata(
    _session: ConnectorSession,
    _table: TableHandle,
    column: ColumnHandle
  ): ColumnMetadata {
    return columnMetadataFromHandle(column, getInternalColumn(column.name)?.comment);
  }

  /**
   * Columns of every table matching `prefix`, keyed by table name.
   *
   * A table whose schema is invalid is listed with the columns of a topic
   * without schema; a table whose lookup fails is left out. Either way the
   * scan carries on.
   */
  async listTableColumns(
    _session: ConnectorSession,
    prefix: SchemaTablePrefix
  ): Promise<Map<string, ColumnMetadata[]>> {
    const result = new Map<string, ColumnMetadata[]>();

    const namespace = await this.namespaces.findNamespace(this.namespaces.restoreSchemaName(prefix.schema));
    if (!namespace) {
      return result;
    }

    let topics: TopicName[];
    if (prefix.table === undefined) {
      topics = await this.topics.listTopics(namespace);
    } else {
      const topic = await this.topics.findTopic(namespace, prefix.table);
      topics = topic ? [topic] : [];
    }

    for (const topic of topics) {
      try {
        result.set(topic.localName, await this.translateTopic(topic));
      } catch (error) {
        if (error instanceof InvalidSchemaError) {
          this.logger.warn('Listing table with default columns', {
            topic: topic.toString(),
            reason: error.reason,
          });
          result.set(topic.localName, this.translator.buildDefaultColumns());
          continue;
        }
        this.logger.warn('Skipping table', {
          topic: topic.toString(),
          reason: error instanceof Error ? error.message : String(error),
        });
      }
    }

    return result;
  }

  // ==========================================================================
  // Resolution
  // ==========================================================================

  private async resolveColumns(handle: TableHandle): Promise<ColumnMetadata[]> {
    const namespace = await this.resolveNamespace(handle.schemaName);

    const topic = await this.topics.findTopic(namespace, handle.topicName);
    if (!topic) {
      throw new TableNotFoundError(handle.schemaName, handle.topicName);
    }

    const columns = await this.translateTopic(topic);
    this.logger.debug('Resolved table', { topic: topic.toString(), columns: columns.length });
    return columns;
  }

  private async resolveNamespace(schemaName: string): Promise<NamespaceName> {
    const namespace = await this.namespaces.findNamespace(schemaName);
    if (!namespace) {
      throw new SchemaNotFoundError(schemaName);
    }
    return namespace;
  }

  private async translateTopic(topic: TopicName): Promise<ColumnMetadata[]> {
    let snapshot: SchemaSnapshot;
    try {
      snapshot = await this.source.schemas.getSchemaInfo(topic);
    } catch (error) {
      if (isNotFoundError(error)) {
        return this.translator.buildDefaultColumns();
      }
      throw error;
    }
    return this.translator.translate(topic, snapshot);
  }
}

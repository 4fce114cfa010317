/**
 * Tests for the catalog read routes.
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Hono } from 'hono';
import {
  InMemoryMessagingDirectory,
  TopicMetadata,
  avroSnapshot,
  getInternalColumns,
  type ColumnHandle,
  type Logger,
  type MessagingCatalogSource,
  type SchemaTableName,
  type TableHandle,
} from '@topicsql/core';
import { createApp, type ColumnView } from '../src/index.js';

interface TableResponse {
  table: SchemaTableName;
  columns: ColumnView[];
}

interface HandlesResponse {
  tableHandle: TableHandle;
  columnHandles: ColumnHandle[];
}

interface ColumnsResponse {
  tables: Record<string, ColumnView[]>;
}

// ============================================================================
// Test Setup
// ============================================================================

const INTERNAL_NAMES = getInternalColumns().map((column) => column.name);

function createDirectory(): InMemoryMessagingDirectory {
  const directory = new InMemoryMessagingDirectory();
  directory.createNamespace('tenant-1/ns-1');
  directory.createNamespace('tenant-2/ns-2');

  directory.createTopic('tenant-1/ns-1/topic-1');
  directory.setSchema(
    'tenant-1/ns-1/topic-1',
    avroSnapshot({
      type: 'record',
      name: 'Foo',
      fields: [
        { name: 'a', type: 'int', doc: 'First field' },
        { name: 'b', type: { type: 'record', name: 'Bar', fields: [{ name: 'c', type: 'string' }] } },
      ],
    })
  );
  directory.createPartitionedTopic('tenant-1/ns-1/orders', 2);
  directory.createTopic('tenant-1/ns-1/broken');
  directory.setSchema('tenant-1/ns-1/broken', { type: 'AVRO', schema: new Uint8Array() });

  return directory;
}

function createMockLogger(): Logger & {
  info: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
} {
  return {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

const schemaPath = (schema: string) => `/v1/schemas/${encodeURIComponent(schema)}`;

describe('Catalog Routes', () => {
  let app: Hono;
  let logger: ReturnType<typeof createMockLogger>;

  beforeEach(() => {
    logger = createMockLogger();
    const metadata = new TopicMetadata(createDirectory(), { connectorId: 'test-connector' });
    app = createApp({ metadata, logger });
  });

  // ==========================================================================
  // Health
  // ==========================================================================

  describe('GET /health', () => {
    it('should report the service as healthy', async () => {
      const res = await app.request('/health');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ status: 'ok', service: 'topicsql' });
    });

    it('should log requests through the service logger', async () => {
      await app.request('/health');

      expect(logger.info).toHaveBeenCalledWith('<-- GET /health');
    });
  });

  // ==========================================================================
  // Schemas and Tables
  // ==========================================================================

  describe('GET /v1/schemas', () => {
    it('should list schema names', async () => {
      const res = await app.request('/v1/schemas');

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ schemas: ['tenant-1/ns-1', 'tenant-2/ns-2'] });
    });
  });

  describe('GET /v1/schemas/{schema}', () => {
    it('should return a known schema', async () => {
      const res = await app.request(schemaPath('tenant-2/ns-2'));

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ schema: 'tenant-2/ns-2' });
    });

    it('should return 404 for an unknown schema', async () => {
      const res = await app.request(schemaPath('wrong-tenant/wrong-ns'));

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: {
          message: 'Schema wrong-tenant/wrong-ns does not exist',
          type: 'NoSuchSchema',
          code: 404,
        },
      });
      expect(logger.error).not.toHaveBeenCalled();
    });
  });

  describe('GET /v1/schemas/{schema}/tables', () => {
    it('should list tables with partitions coalesced', async () => {
      const res = await app.request(`${schemaPath('tenant-1/ns-1')}/tables`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({
        tables: [
          { schemaName: 'tenant-1/ns-1', tableName: 'topic-1' },
          { schemaName: 'tenant-1/ns-1', tableName: 'orders' },
          { schemaName: 'tenant-1/ns-1', tableName: 'broken' },
        ],
      });
    });

    it('should return an empty list for an unknown schema', async () => {
      const res = await app.request(`${schemaPath('wrong-tenant/wrong-ns')}/tables`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ tables: [] });
    });
  });

  // ==========================================================================
  // Table Metadata
  // ==========================================================================

  describe('GET /v1/schemas/{schema}/tables/{table}', () => {
    it('should return columns with SQL type names', async () => {
      const res = await app.request(`${schemaPath('tenant-1/ns-1')}/tables/topic-1`);

      expect(res.status).toBe(200);
      const body = (await res.json()) as TableResponse;
      expect(body.table).toEqual({ schemaName: 'tenant-1/ns-1', tableName: 'topic-1' });
      expect(body.columns[0]).toEqual({
        name: 'a',
        type: 'INTEGER',
        positionIndices: [0],
        fieldNames: ['a'],
        hidden: false,
        internal: false,
        comment: 'First field',
      });
      expect(body.columns[1]).toEqual({
        name: 'b.c',
        type: 'VARCHAR',
        positionIndices: [1, 0],
        fieldNames: ['b', 'c'],
        hidden: false,
        internal: false,
      });
      expect(body.columns).toHaveLength(2 + INTERNAL_NAMES.length);
    });

    it('should return 404 for an unknown schema', async () => {
      const res = await app.request(`${schemaPath('wrong-tenant/wrong-ns')}/tables/topic-1`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: {
          message: 'Schema wrong-tenant/wrong-ns does not exist',
          type: 'NoSuchSchema',
          code: 404,
        },
      });
    });

    it('should return 404 for an unknown table', async () => {
      const res = await app.request(`${schemaPath('tenant-1/ns-1')}/tables/wrong-topic`);

      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        error: {
          message: "Table 'tenant-1/ns-1.wrong-topic' not found",
          type: 'NoSuchTable',
          code: 404,
        },
      });
    });

    it('should return 422 for an invalid schema', async () => {
      const res = await app.request(`${schemaPath('tenant-1/ns-1')}/tables/broken`);

      expect(res.status).toBe(422);
      expect(await res.json()).toEqual({
        error: {
          message: 'Topic persistent://tenant-1/ns-1/broken does not have a valid schema',
          type: 'InvalidSchema',
          code: 422,
        },
      });
      expect(logger.error).not.toHaveBeenCalled();
    });

    it('should return 500 and log unexpected failures', async () => {
      const directory = createDirectory();
      const source: MessagingCatalogSource = {
        namespaces: directory,
        topics: directory,
        schemas: {
          getSchemaInfo: async () => {
            throw new Error('registry unavailable');
          },
        },
      };
      const failing = createApp({
        metadata: new TopicMetadata(source, { connectorId: 'test-connector' }),
        logger,
      });

      const res = await failing.request(`${schemaPath('tenant-1/ns-1')}/tables/topic-1`);

      expect(res.status).toBe(500);
      expect(await res.json()).toEqual({
        error: { message: 'registry unavailable', type: 'InternalServerError', code: 500 },
      });
      expect(logger.error).toHaveBeenCalledWith('Catalog request failed', {
        path: '/v1/schemas/tenant-1%2Fns-1/tables/topic-1',
        error: 'registry unavailable',
      });
    });
  });

  // ==========================================================================
  // Handles
  // ==========================================================================

  describe('GET /v1/schemas/{schema}/tables/{table}/handles', () => {
    it('should return the table handle and one column handle per column', async () => {
      const res = await app.request(`${schemaPath('tenant-1/ns-1')}/tables/topic-1/handles`);

      expect(res.status).toBe(200);
      const body = (await res.json()) as HandlesResponse;
      expect(body.tableHandle).toEqual({
        connectorId: 'test-connector',
        schemaName: 'tenant-1/ns-1',
        tableName: 'topic-1',
        topicName: 'topic-1',
      });
      expect(body.columnHandles.map((handle) => handle.name)).toEqual([
        'a',
        'b.c',
        ...INTERNAL_NAMES,
      ]);
      expect(body.columnHandles[1]).toEqual({
        connectorId: 'test-connector',
        name: 'b.c',
        type: 'varchar',
        positionIndices: [1, 0],
        fieldNames: ['b', 'c'],
        hidden: false,
        internal: false,
      });
    });

    it('should return 404 for an unknown table', async () => {
      const res = await app.request(`${schemaPath('tenant-1/ns-1')}/tables/wrong-topic/handles`);

      expect(res.status).toBe(404);
    });
  });

  // ==========================================================================
  // Columns
  // ==========================================================================

  describe('GET /v1/schemas/{schema}/columns', () => {
    it('should list columns of every table, degrading invalid schemas', async () => {
      const res = await app.request(`${schemaPath('tenant-1/ns-1')}/columns`);

      expect(res.status).toBe(200);
      const body = (await res.json()) as ColumnsResponse;
      expect(Object.keys(body.tables)).toEqual(['topic-1', 'orders', 'broken']);
      expect(body.tables.broken.map((column) => column.name)).toEqual([
        '__value__',
        ...INTERNAL_NAMES,
      ]);
      expect(body.tables.orders[0]).toEqual({
        name: '__value__',
        type: 'VARBINARY',
        positionIndices: [0],
        fieldNames: ['__value__'],
        hidden: false,
        internal: false,
      });
    });

    it('should narrow to one table with the table query parameter', async () => {
      const res = await app.request(`${schemaPath('tenant-1/ns-1')}/columns?table=topic-1`);

      const body = (await res.json()) as ColumnsResponse;
      expect(Object.keys(body.tables)).toEqual(['topic-1']);
    });

    it('should return no tables for an unknown schema', async () => {
      const res = await app.request(`${schemaPath('wrong-tenant/wrong-ns')}/columns`);

      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ tables: {} });
    });
  });
});

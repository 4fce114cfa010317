import { describe, it, expect } from 'vitest';
import { SchemaTranslator, VALUE_COLUMN_NAME } from '../src/metadata/translator.js';
import { getInternalColumns } from '../src/metadata/internal-columns.js';
import { InvalidSchemaError } from '../src/errors.js';
import { TopicName } from '../src/naming/names.js';
import { avroSnapshot } from '../src/catalog/memory.js';
import type { SchemaSnapshot } from '../src/catalog/types.js';
import type { ColumnMetadata } from '../src/metadata/types.js';

// ============================================================================
// Helpers
// ============================================================================

const topic = TopicName.parse('persistent://tenant-1/ns-1/topic-1');
const translator = new SchemaTranslator();

function record(fields: unknown[], extra: Record<string, unknown> = {}): Record<string, unknown> {
  return { type: 'record', name: 'Root', fields, ...extra };
}

function translateFields(fields: unknown[]): ColumnMetadata[] {
  return translator.translate(topic, avroSnapshot(record(fields)));
}

function dataColumns(columns: ColumnMetadata[]): ColumnMetadata[] {
  return columns.filter((column) => !column.internal);
}

function invalidSchemaReason(snapshot: SchemaSnapshot): string {
  try {
    translator.translate(topic, snapshot);
  } catch (error) {
    if (error instanceof InvalidSchemaError) {
      return error.reason;
    }
    throw error;
  }
  throw new Error('expected InvalidSchemaError');
}

const INTERNAL_COUNT = getInternalColumns().length;

// ============================================================================
// Flattening
// ============================================================================

describe('SchemaTranslator', () => {
  describe('record flattening', () => {
    it('should flatten nested records into dotted columns with position indices', () => {
      const columns = translateFields([
        { name: 'a', type: 'int' },
        { name: 'b', type: { type: 'record', name: 'B', fields: [{ name: 'c', type: 'string' }] } },
      ]);

      expect(columns).toHaveLength(2 + INTERNAL_COUNT);
      expect(columns[0]).toEqual({
        name: 'a',
        type: 'integer',
        positionIndices: [0],
        fieldNames: ['a'],
        hidden: false,
        internal: false,
      });
      expect(columns[1]).toEqual({
        name: 'b.c',
        type: 'varchar',
        positionIndices: [1, 0],
        fieldNames: ['b', 'c'],
        hidden: false,
        internal: false,
      });
    });

    it('should append the internal columns after the data columns', () => {
      const columns = translateFields([{ name: 'id', type: 'long' }]);

      expect(columns.slice(1).map((column) => column.name)).toEqual(
        getInternalColumns().map((column) => column.name)
      );
      expect(columns.slice(1).every((column) => column.internal && column.positionIndices.length === 0)).toBe(true);
    });

    it('should track positions through several nesting levels', () => {
      const columns = translateFields([
        { name: 'x', type: 'boolean' },
        {
          name: 'outer',
          type: {
            type: 'record',
            name: 'Outer',
            fields: [
              { name: 'skip', type: 'double' },
              {
                name: 'inner',
                type: { type: 'record', name: 'Inner', fields: [{ name: 'a', type: 'float' }, { name: 'b', type: 'bytes' }] },
              },
            ],
          },
        },
      ]);

      expect(dataColumns(columns).map((column) => [column.name, column.positionIndices])).toEqual([
        ['x', [0]],
        ['outer.skip', [1, 0]],
        ['outer.inner.a', [1, 1, 0]],
        ['outer.inner.b', [1, 1, 1]],
      ]);
    });

    it('should reuse a named record referenced twice', () => {
      const address = {
        type: 'record',
        name: 'Address',
        fields: [{ name: 'street', type: 'string' }],
      };
      const columns = translateFields([
        { name: 'home', type: address },
        { name: 'work', type: 'Address' },
      ]);

      expect(dataColumns(columns).map((column) => [column.name, column.positionIndices])).toEqual([
        ['home.street', [0, 0]],
        ['work.street', [1, 0]],
      ]);
    });

    it('should resolve references relative to the enclosing namespace', () => {
      const columns = translator.translate(
        topic,
        avroSnapshot(
          record(
            [
              { name: 'first', type: { type: 'enum', name: 'Kind', symbols: ['A', 'B'] } },
              { name: 'second', type: 'Kind' },
              { name: 'third', type: 'com.example.Kind' },
            ],
            { namespace: 'com.example' }
          )
        )
      );

      expect(dataColumns(columns).map((column) => column.type)).toEqual(['varchar', 'varchar', 'varchar']);
    });

    it('should accept namespaces generated for nested classes', () => {
      const columns = translator.translate(
        topic,
        avroSnapshot({
          type: 'record',
          name: 'Foo',
          namespace: 'org.example.Outer$',
          fields: [
            { name: 'a', type: 'int' },
            { name: 'b', type: { type: 'record', name: 'Bar', fields: [{ name: 'c', type: 'string' }] } },
            { name: 'd', type: 'org.example.Outer$.Bar' },
          ],
        })
      );

      expect(dataColumns(columns).map((column) => [column.name, column.type])).toEqual([
        ['a', 'integer'],
        ['b.c', 'varchar'],
        ['d.c', 'varchar'],
      ]);
    });

    it('should treat a null namespace as inherited', () => {
      const columns = translateFields([
        { name: 'kind', type: { type: 'enum', name: 'Kind', namespace: null, symbols: ['A'] } },
        { name: 'again', type: 'Kind' },
      ]);

      expect(dataColumns(columns).map((column) => column.type)).toEqual(['varchar', 'varchar']);
    });

    it('should carry field docs as column comments', () => {
      const columns = translateFields([{ name: 'id', type: 'long', doc: 'Order identifier' }]);

      expect(columns[0].comment).toBe('Order identifier');
    });

    it('should translate JSON schemas like Avro schemas', () => {
      const snapshot = avroSnapshot(record([{ name: 'id', type: 'long' }]));
      const columns = translator.translate(topic, { ...snapshot, type: 'JSON' });

      expect(columns[0].name).toBe('id');
      expect(columns[0].type).toBe('bigint');
    });
  });

  // ==========================================================================
  // Type Mapping
  // ==========================================================================

  describe('type mapping', () => {
    it('should map Avro primitives', () => {
      const columns = translateFields([
        { name: 'b', type: 'boolean' },
        { name: 'i', type: 'int' },
        { name: 'l', type: 'long' },
        { name: 'f', type: 'float' },
        { name: 'd', type: 'double' },
        { name: 'y', type: 'bytes' },
        { name: 's', type: 'string' },
      ]);

      expect(dataColumns(columns).map((column) => column.type)).toEqual([
        'boolean',
        'integer',
        'bigint',
        'real',
        'double',
        'varbinary',
        'varchar',
      ]);
    });

    it('should unwrap nullable unions', () => {
      const columns = translateFields([
        { name: 'a', type: ['null', 'long'] },
        { name: 'b', type: ['string', 'null'] },
      ]);

      expect(dataColumns(columns).map((column) => column.type)).toEqual(['bigint', 'varchar']);
    });

    it('should flatten a nullable nested record', () => {
      const columns = translateFields([
        {
          name: 'meta',
          type: ['null', { type: 'record', name: 'Meta', fields: [{ name: 'source', type: 'string' }] }],
        },
      ]);

      expect(columns[0].name).toBe('meta.source');
      expect(columns[0].positionIndices).toEqual([0, 0]);
    });

    it('should map logical types', () => {
      const columns = translateFields([
        { name: 'day', type: { type: 'int', logicalType: 'date' } },
        { name: 'at', type: { type: 'long', logicalType: 'timestamp-millis' } },
        { name: 'tod', type: { type: 'int', logicalType: 'time-millis' } },
        { name: 'id', type: { type: 'string', logicalType: 'uuid' } },
        { name: 'price', type: { type: 'bytes', logicalType: 'decimal', precision: 10, scale: 2 } },
        { name: 'other', type: { type: 'int', logicalType: 'not-a-logical-type' } },
      ]);

      expect(dataColumns(columns).map((column) => column.type)).toEqual([
        'date',
        'timestamp',
        'time',
        'varchar',
        { type: 'decimal', precision: 10, scale: 2 },
        'integer',
      ]);
    });

    it('should map enums, fixed, arrays and maps', () => {
      const columns = translateFields([
        { name: 'color', type: { type: 'enum', name: 'Color', symbols: ['RED', 'GREEN'] } },
        { name: 'hash', type: { type: 'fixed', name: 'Hash', size: 16 } },
        { name: 'tags', type: { type: 'array', items: 'string' } },
        { name: 'counts', type: { type: 'map', values: ['null', 'long'] } },
        { name: 'matrix', type: { type: 'array', items: { type: 'array', items: 'double' } } },
      ]);

      expect(dataColumns(columns).map((column) => column.type)).toEqual([
        'varchar',
        'varbinary',
        { type: 'array', element: 'varchar' },
        { type: 'map', key: 'varchar', value: 'bigint' },
        { type: 'array', element: { type: 'array', element: 'double' } },
      ]);
    });
  });

  // ==========================================================================
  // Primitive and Missing Schemas
  // ==========================================================================

  describe('primitive schemas', () => {
    it('should expose the payload as a single value column', () => {
      const columns = translator.translate(topic, { type: 'INT64', schema: new Uint8Array() });

      expect(columns).toHaveLength(1 + INTERNAL_COUNT);
      expect(columns[0]).toEqual({
        name: VALUE_COLUMN_NAME,
        type: 'bigint',
        positionIndices: [0],
        fieldNames: [VALUE_COLUMN_NAME],
        hidden: false,
        internal: false,
      });
    });

    it('should map each primitive schema type', () => {
      const typeOf = (type: SchemaSnapshot['type']) =>
        translator.translate(topic, { type, schema: new Uint8Array() })[0].type;

      expect(typeOf('STRING')).toBe('varchar');
      expect(typeOf('BOOLEAN')).toBe('boolean');
      expect(typeOf('INT8')).toBe('tinyint');
      expect(typeOf('INT16')).toBe('smallint');
      expect(typeOf('INT32')).toBe('integer');
      expect(typeOf('FLOAT')).toBe('real');
      expect(typeOf('DOUBLE')).toBe('double');
      expect(typeOf('DATE')).toBe('date');
      expect(typeOf('TIME')).toBe('time');
      expect(typeOf('TIMESTAMP')).toBe('timestamp');
      expect(typeOf('BYTES')).toBe('varbinary');
      expect(typeOf('NONE')).toBe('varbinary');
    });

    it('should build default columns for topics without a schema', () => {
      const columns = translator.buildDefaultColumns();

      expect(columns).toHaveLength(1 + INTERNAL_COUNT);
      expect(columns[0].name).toBe(VALUE_COLUMN_NAME);
      expect(columns[0].type).toBe('varbinary');
      expect(columns.slice(1).every((column) => column.internal)).toBe(true);
    });
  });

  // ==========================================================================
  // Invalid Schemas
  // ==========================================================================

  describe('invalid schemas', () => {
    it('should report the topic in the error message', () => {
      expect(() => translator.translate(topic, { type: 'AVRO', schema: new Uint8Array() })).toThrow(
        'Topic persistent://tenant-1/ns-1/topic-1 does not have a valid schema'
      );
    });

    it('should reject an empty schema', () => {
      expect(invalidSchemaReason({ type: 'AVRO', schema: new Uint8Array() })).toBe('schema is empty');
    });

    it('should reject a schema that is not JSON', () => {
      expect(invalidSchemaReason(avroSnapshot('{not json'))).toMatch(/^schema is not JSON: /);
    });

    it('should reject a top-level type that is not a record', () => {
      expect(invalidSchemaReason(avroSnapshot('"string"'))).toMatch(/^schema is not an Avro record/);
    });

    it('should reject unsupported schema types', () => {
      expect(invalidSchemaReason({ type: 'PROTOBUF', schema: new Uint8Array([1]) })).toBe(
        'schema type PROTOBUF is not supported'
      );
      expect(invalidSchemaReason({ type: 'KEY_VALUE', schema: new Uint8Array([1]) })).toBe(
        'schema type KEY_VALUE is not supported'
      );
    });

    it('should reject fields that collide with internal columns', () => {
      expect(invalidSchemaReason(avroSnapshot(record([{ name: '__key__', type: 'string' }])))).toBe(
        'field __key__ collides with an internal column'
      );
    });

    it('should reject recursive records', () => {
      const snapshot = avroSnapshot({
        type: 'record',
        name: 'Node',
        fields: [{ name: 'next', type: ['null', 'Node'] }],
      });

      expect(invalidSchemaReason(snapshot)).toBe('record Node refers to itself');
    });

    it('should reject unions with several non-null branches', () => {
      expect(invalidSchemaReason(avroSnapshot(record([{ name: 'v', type: ['int', 'string'] }])))).toBe(
        'union ["int","string"] has no single non-null branch'
      );
    });

    it('should reject records inside collections', () => {
      const snapshot = avroSnapshot(
        record([
          {
            name: 'items',
            type: { type: 'array', items: { type: 'record', name: 'Item', fields: [{ name: 'sku', type: 'string' }] } },
          },
        ])
      );

      expect(invalidSchemaReason(snapshot)).toBe('record Item inside a collection at items cannot be flattened');
    });

    it('should reject invalid type and field names', () => {
      expect(invalidSchemaReason(avroSnapshot({ type: 'record', name: 'Bad$', fields: [] }))).toBe(
        'schema is not an Avro record at name: invalid Avro name'
      );
      expect(invalidSchemaReason(avroSnapshot(record([{ name: 'a-b', type: 'int' }])))).toBe(
        'schema is not an Avro record at fields.0.name: invalid Avro name'
      );
    });

    it('should reject a named type defined twice', () => {
      const snapshot = avroSnapshot(
        record([
          { name: 'first', type: { type: 'enum', name: 'Kind', symbols: ['A'] } },
          { name: 'second', type: { type: 'enum', name: 'Kind', symbols: ['B'] } },
        ])
      );

      expect(invalidSchemaReason(snapshot)).toBe('type Kind is defined more than once');
    });

    it('should reject references to unknown types', () => {
      expect(invalidSchemaReason(avroSnapshot(record([{ name: 'x', type: 'Missing' }])))).toBe(
        'unknown type Missing'
      );
    });
  });
});

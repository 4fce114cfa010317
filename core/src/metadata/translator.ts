/**
 * Schema Translation
 *
 * Turns a topic's registered schema into table columns. Record schemas are
 * flattened: every primitive leaf becomes one column named by its dotted path,
 * and records themselves never become columns. Each column remembers the
 * field's offset at every nesting level so a reader can project it without
 * looking names up again.
 *
 * @example
 * ```ts
 * // { a: int, b: { c: string } }
 * translator.translate(topic, snapshot).map((c) => [c.name, c.positionIndices]);
 * // [['a', [0]], ['b.c', [1, 0]], ['__partition__', []], ...]
 * ```
 */

import {
  type AvroNamedType,
  type AvroPrimitive,
  type AvroRecord,
  type AvroType,
  AvroSchemaError,
  avroFullName,
  isAvroPrimitive,
  parseAvroRecordSchema,
} from '../avro/index.js';
import type { SchemaSnapshot, SchemaType } from '../catalog/types.js';
import { InvalidSchemaError } from '../errors.js';
import type { TopicName } from '../naming/names.js';
import { internalColumnsMetadata, isInternalColumnName } from './internal-columns.js';
import type { ColumnMetadata, SqlPrimitiveType, SqlType } from './types.js';

// ============================================================================
// Constants
// ============================================================================

/** Column holding the whole payload of a topic with a primitive schema */
export const VALUE_COLUMN_NAME = '__value__';

const AVRO_PRIMITIVE_TYPES: Record<Exclude<AvroPrimitive, 'null'>, SqlPrimitiveType> = {
  boolean: 'boolean',
  int: 'integer',
  long: 'bigint',
  float: 'real',
  double: 'double',
  bytes: 'varbinary',
  string: 'varchar',
};

const PRIMITIVE_SCHEMA_TYPES: Partial<Record<SchemaType, SqlPrimitiveType>> = {
  NONE: 'varbinary',
  BYTES: 'varbinary',
  STRING: 'varchar',
  BOOLEAN: 'boolean',
  INT8: 'tinyint',
  INT16: 'smallint',
  INT32: 'integer',
  INT64: 'bigint',
  FLOAT: 'real',
  DOUBLE: 'double',
  DATE: 'date',
  TIME: 'time',
  TIMESTAMP: 'timestamp',
};

/** Avro types after union unwrapping and reference resolution */
type ResolvedAvroType = Exclude<AvroType, string | AvroType[]> | AvroPrimitive;

interface WalkState {
  readonly topic: string;
  readonly named: Map<string, AvroNamedType>;
  readonly fullNames: Map<AvroNamedType, string>;
  readonly inProgress: Set<string>;
  readonly columns: ColumnMetadata[];
}

// ============================================================================
// Translator
// ============================================================================

/**
 * Maps schema snapshots to columns. Holds no state between calls.
 */
export class SchemaTranslator {
  /**
   * Columns for a topic: data columns in schema order followed by the
   * internal columns.
   *
   * @throws InvalidSchemaError if the schema is empty, unparsable, or has no relational mapping
   */
  translate(topic: TopicName, snapshot: SchemaSnapshot): ColumnMetadata[] {
    const dataColumns = this.translateDataColumns(topic.toString(), snapshot);
    checkColumnNames(topic.toString(), dataColumns);
    return [...dataColumns, ...internalColumnsMetadata()];
  }

  /**
   * Columns for a topic with no registered schema: the raw payload as a
   * single varbinary column, then the internal columns.
   */
  buildDefaultColumns(): ColumnMetadata[] {
    return [valueColumn('varbinary'), ...internalColumnsMetadata()];
  }

  private translateDataColumns(topic: string, snapshot: SchemaSnapshot): ColumnMetadata[] {
    const primitive = PRIMITIVE_SCHEMA_TYPES[snapshot.type];
    if (primitive) {
      return [valueColumn(primitive)];
    }

    if (snapshot.type !== 'AVRO' && snapshot.type !== 'JSON') {
      throw new InvalidSchemaError(topic, `schema type ${snapshot.type} is not supported`);
    }

    let record: AvroRecord;
    try {
      record = parseAvroRecordSchema(snapshot.schema);
    } catch (error) {
      if (error instanceof AvroSchemaError) {
        throw new InvalidSchemaError(topic, error.message);
      }
      throw error;
    }

    const state: WalkState = {
      topic,
      named: new Map(),
      fullNames: new Map(),
      inProgress: new Set(),
      columns: [],
    };
    walkRecord(state, record, undefined, [], []);
    return state.columns;
  }
}

// ============================================================================
// Flattening
// ============================================================================

function walkRecord(
  state: WalkState,
  record: AvroRecord,
  enclosingNamespace: string | undefined,
  path: readonly string[],
  positions: readonly number[]
): void {
  const fullName = state.fullNames.get(record) ?? avroFullName(record, enclosingNamespace);
  if (state.inProgress.has(fullName)) {
    throw new InvalidSchemaError(state.topic, `record ${fullName} refers to itself`);
  }
  defineNamedType(state, record, fullName);
  state.inProgress.add(fullName);

  const namespace = namespaceOf(fullName);

  record.fields.forEach((field, index) => {
    const fieldPath = [...path, field.name];
    const fieldPositions = [...positions, index];
    const type = resolveType(state, field.type, namespace);

    if (typeof type === 'object' && (type.type === 'record' || type.type === 'error')) {
      walkRecord(state, type, namespace, fieldPath, fieldPositions);
      return;
    }

    state.columns.push({
      name: fieldPath.join('.'),
      type: mapLeafType(state, type, namespace, fieldPath),
      positionIndices: fieldPositions,
      fieldNames: fieldPath,
      hidden: false,
      comment: field.doc,
      internal: false,
    });
  });

  state.inProgress.delete(fullName);
}

/**
 * Unwrap nullable unions and resolve named-type references.
 */
function resolveType(state: WalkState, type: AvroType, namespace: string | undefined): ResolvedAvroType {
  if (typeof type === 'string') {
    if (isAvroPrimitive(type)) {
      return type;
    }
    const named =
      state.named.get(type) ?? (namespace ? state.named.get(`${namespace}.${type}`) : undefined);
    if (!named) {
      throw new InvalidSchemaError(state.topic, `unknown type ${type}`);
    }
    return named;
  }

  if (Array.isArray(type)) {
    const branches = type.filter((branch) => branch !== 'null');
    if (branches.length !== 1) {
      throw new InvalidSchemaError(
        state.topic,
        `union ${JSON.stringify(type)} has no single non-null branch`
      );
    }
    return resolveType(state, branches[0], namespace);
  }

  return type;
}

function mapLeafType(
  state: WalkState,
  type: ResolvedAvroType,
  namespace: string | undefined,
  path: readonly string[]
): SqlType {
  if (typeof type === 'string') {
    if (type === 'null') {
      throw new InvalidSchemaError(state.topic, `field ${path.join('.')} is always null`);
    }
    return AVRO_PRIMITIVE_TYPES[type];
  }

  switch (type.type) {
    case 'record':
    case 'error':
      throw new InvalidSchemaError(
        state.topic,
        `record ${type.name} inside a collection at ${path.join('.')} cannot be flattened`
      );
    case 'enum':
      defineNamedType(state, type, state.fullNames.get(type) ?? avroFullName(type, namespace));
      return 'varchar';
    case 'fixed':
      defineNamedType(state, type, state.fullNames.get(type) ?? avroFullName(type, namespace));
      return mapLogicalType(type.logicalType, type.precision, type.scale) ?? 'varbinary';
    case 'array': {
      const element = resolveType(state, type.items, namespace);
      return { type: 'array', element: mapLeafType(state, element, namespace, path) };
    }
    case 'map': {
      const value = resolveType(state, type.values, namespace);
      return { type: 'map', key: 'varchar', value: mapLeafType(state, value, namespace, path) };
    }
    default: {
      const logical = mapLogicalType(type.logicalType, type.precision, type.scale);
      return logical ?? mapLeafType(state, type.type, namespace, path);
    }
  }
}

/**
 * Map an Avro logical type. Unknown or incomplete logical types fall back to
 * the underlying type.
 */
function mapLogicalType(
  logicalType: string | undefined,
  precision: number | undefined,
  scale: number | undefined
): SqlType | undefined {
  switch (logicalType) {
    case 'date':
      return 'date';
    case 'time-millis':
    case 'time-micros':
      return 'time';
    case 'timestamp-millis':
    case 'timestamp-micros':
    case 'local-timestamp-millis':
    case 'local-timestamp-micros':
      return 'timestamp';
    case 'uuid':
      return 'varchar';
    case 'decimal':
      if (precision === undefined) {
        return undefined;
      }
      return { type: 'decimal', precision, scale: scale ?? 0 };
    default:
      return undefined;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function valueColumn(type: SqlType): ColumnMetadata {
  return {
    name: VALUE_COLUMN_NAME,
    type,
    positionIndices: [0],
    fieldNames: [VALUE_COLUMN_NAME],
    hidden: false,
    internal: false,
  };
}

function defineNamedType(state: WalkState, type: AvroNamedType, fullName: string): void {
  const existing = state.named.get(fullName);
  if (existing !== undefined && existing !== type) {
    throw new InvalidSchemaError(state.topic, `type ${fullName} is defined more than once`);
  }
  state.named.set(fullName, type);
  state.fullNames.set(type, fullName);
}

function namespaceOf(fullName: string): string | undefined {
  const lastDot = fullName.lastIndexOf('.');
  return lastDot > 0 ? fullName.slice(0, lastDot) : undefined;
}

/**
 * Data columns must not shadow an internal column or each other.
 */
function checkColumnNames(topic: string, columns: readonly ColumnMetadata[]): void {
  const seen = new Set<string>();
  for (const column of columns) {
    if (isInternalColumnName(column.name)) {
      throw new InvalidSchemaError(topic, `field ${column.name} collides with an internal column`);
    }
    if (seen.has(column.name)) {
      throw new InvalidSchemaError(topic, `field ${column.name} is defined more than once`);
    }
    seen.add(column.name);
  }
}

/**
 * Internal Columns
 *
 * Columns exposing message envelope fields. Every table ends with these, in
 * this order, whatever the topic's schema.
 */

import type { ColumnMetadata, SqlPrimitiveType } from './types.js';

export interface InternalColumn {
  readonly name: string;
  readonly type: SqlPrimitiveType;
  readonly comment: string;
}

export const PARTITION_COLUMN_NAME = '__partition__';
export const EVENT_TIME_COLUMN_NAME = '__event_time__';
export const PUBLISH_TIME_COLUMN_NAME = '__publish_time__';
export const MESSAGE_ID_COLUMN_NAME = '__message_id__';
export const SEQUENCE_ID_COLUMN_NAME = '__sequence_id__';
export const PRODUCER_NAME_COLUMN_NAME = '__producer_name__';
export const KEY_COLUMN_NAME = '__key__';
export const PROPERTIES_COLUMN_NAME = '__properties__';

const INTERNAL_COLUMN_DEFINITIONS: InternalColumn[] = [
  {
    name: PARTITION_COLUMN_NAME,
    type: 'integer',
    comment: 'The partition number which the message belongs to',
  },
  {
    name: EVENT_TIME_COLUMN_NAME,
    type: 'timestamp',
    comment: 'Application defined timestamp in milliseconds of when the event occurred',
  },
  {
    name: PUBLISH_TIME_COLUMN_NAME,
    type: 'timestamp',
    comment: 'The timestamp in milliseconds of when event as published',
  },
  {
    name: MESSAGE_ID_COLUMN_NAME,
    type: 'varchar',
    comment: 'The message ID of the message used to generate this row',
  },
  {
    name: SEQUENCE_ID_COLUMN_NAME,
    type: 'bigint',
    comment: 'The sequence ID of the message used to generate this row',
  },
  {
    name: PRODUCER_NAME_COLUMN_NAME,
    type: 'varchar',
    comment: 'The name of the producer that publish the message used to generate this row',
  },
  {
    name: KEY_COLUMN_NAME,
    type: 'varchar',
    comment: 'The partition key for the topic',
  },
  {
    name: PROPERTIES_COLUMN_NAME,
    type: 'varchar',
    comment: 'User defined properties',
  },
];

const INTERNAL_COLUMNS: readonly InternalColumn[] = Object.freeze(
  INTERNAL_COLUMN_DEFINITIONS.map((column) => Object.freeze(column))
);

const INTERNAL_COLUMNS_BY_NAME: ReadonlyMap<string, InternalColumn> = new Map(
  INTERNAL_COLUMNS.map((column) => [column.name, column])
);

/**
 * All internal columns in table order.
 */
export function getInternalColumns(): readonly InternalColumn[] {
  return INTERNAL_COLUMNS;
}

export function getInternalColumn(name: string): InternalColumn | undefined {
  return INTERNAL_COLUMNS_BY_NAME.get(name);
}

export function isInternalColumnName(name: string): boolean {
  return INTERNAL_COLUMNS_BY_NAME.has(name);
}

/**
 * Column metadata for one internal column.
 */
export function internalColumnMetadata(column: InternalColumn, hidden: boolean = false): ColumnMetadata {
  return {
    name: column.name,
    type: column.type,
    positionIndices: [],
    fieldNames: [],
    hidden,
    comment: column.comment,
    internal: true,
  };
}

/**
 * Column metadata for every internal column, in table order.
 */
export function internalColumnsMetadata(hidden: boolean = false): ColumnMetadata[] {
  return INTERNAL_COLUMNS.map((column) => internalColumnMetadata(column, hidden));
}

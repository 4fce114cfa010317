/**
 * Avro Schema Documents
 *
 * Topics registered with an `AVRO` or `JSON` schema carry an Avro schema
 * document. This module defines its shape and parses it from the registry's
 * raw bytes.
 *
 * @see https://avro.apache.org/docs/current/specification/
 */

import { z } from 'zod';

// ============================================================================
// Avro Schema Types
// ============================================================================

export const AVRO_PRIMITIVES = [
  'null',
  'boolean',
  'int',
  'long',
  'float',
  'double',
  'bytes',
  'string',
] as const;

export type AvroPrimitive = (typeof AVRO_PRIMITIVES)[number];

/**
 * A primitive written in object form, usually to attach a logical type,
 * e.g. `{ "type": "long", "logicalType": "timestamp-millis" }`.
 */
export interface AvroAnnotatedPrimitive {
  type: AvroPrimitive;
  logicalType?: string;
  precision?: number;
  scale?: number;
}

export interface AvroArray {
  type: 'array';
  items: AvroType;
}

export interface AvroMap {
  type: 'map';
  values: AvroType;
}

export interface AvroFixed {
  type: 'fixed';
  name: string;
  namespace?: string | null;
  size: number;
  logicalType?: string;
  precision?: number;
  scale?: number;
}

export interface AvroEnum {
  type: 'enum';
  name: string;
  namespace?: string | null;
  symbols: string[];
}

export interface AvroRecordField {
  name: string;
  type: AvroType;
  default?: unknown;
  doc?: string;
}

export interface AvroRecord {
  type: 'record' | 'error';
  name: string;
  namespace?: string | null;
  doc?: string;
  fields: AvroRecordField[];
}

export type AvroUnion = AvroType[];

/**
 * Any Avro type. A bare string is either a primitive name or a reference to
 * a named type defined earlier in the document.
 */
export type AvroType =
  | string
  | AvroAnnotatedPrimitive
  | AvroArray
  | AvroMap
  | AvroFixed
  | AvroEnum
  | AvroRecord
  | AvroUnion;

export type AvroNamedType = AvroRecord | AvroEnum | AvroFixed;

// ============================================================================
// Validation
// ============================================================================

const AVRO_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

const nameSchema = z.string().regex(AVRO_NAME, 'invalid Avro name');

// Only the last segment of a full name is checked: registries accept
// namespaces such as `com.example.Outer$` generated for nested classes.
const fullNameSchema = z
  .string()
  .refine((name) => AVRO_NAME.test(name.slice(name.lastIndexOf('.') + 1)), 'invalid Avro name');

// `null` means the enclosing namespace, `''` means none.
const namespaceSchema = z.string().nullable();

const avroTypeSchema: z.ZodType<AvroType> = z.lazy(() =>
  z.union([
    z.string().min(1),
    z.array(avroTypeSchema),
    z.object({
      type: z.enum(AVRO_PRIMITIVES),
      logicalType: z.string().optional(),
      precision: z.number().int().positive().optional(),
      scale: z.number().int().nonnegative().optional(),
    }),
    z.object({ type: z.literal('array'), items: avroTypeSchema }),
    z.object({ type: z.literal('map'), values: avroTypeSchema }),
    z.object({
      type: z.literal('fixed'),
      name: fullNameSchema,
      namespace: namespaceSchema.optional(),
      size: z.number().int().nonnegative(),
      logicalType: z.string().optional(),
      precision: z.number().int().positive().optional(),
      scale: z.number().int().nonnegative().optional(),
    }),
    z.object({
      type: z.literal('enum'),
      name: fullNameSchema,
      namespace: namespaceSchema.optional(),
      symbols: z.array(z.string()),
    }),
    avroRecordSchema,
  ])
);

const avroRecordSchema: z.ZodType<AvroRecord> = z.lazy(() =>
  z.object({
    type: z.enum(['record', 'error']),
    name: fullNameSchema,
    namespace: namespaceSchema.optional(),
    doc: z.string().optional(),
    fields: z.array(
      z.object({
        name: nameSchema,
        type: avroTypeSchema,
        default: z.unknown(),
        doc: z.string().optional(),
      })
    ),
  })
);

/**
 * Error thrown when a schema document is not valid Avro.
 */
export class AvroSchemaError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AvroSchemaError';
  }
}

// ============================================================================
// Parsing
// ============================================================================

const textDecoder = new TextDecoder('utf-8', { fatal: true });

/**
 * Parse a schema document whose top level is a record.
 *
 * @throws AvroSchemaError if the bytes are empty, not UTF-8 JSON, or not an Avro record
 */
export function parseAvroRecordSchema(bytes: Uint8Array): AvroRecord {
  if (bytes.length === 0) {
    throw new AvroSchemaError('schema is empty');
  }

  let document: unknown;
  try {
    document = JSON.parse(textDecoder.decode(bytes));
  } catch (error) {
    throw new AvroSchemaError(
      `schema is not JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const result = avroRecordSchema.safeParse(document);
  if (!result.success) {
    const issue = result.error.issues[0];
    const path = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
    throw new AvroSchemaError(`schema is not an Avro record${path}: ${issue?.message ?? 'invalid'}`);
  }
  return result.data;
}

// ============================================================================
// Helpers
// ============================================================================

export function isAvroPrimitive(name: string): name is AvroPrimitive {
  return AVRO_PRIMITIVES.some((primitive) => primitive === name);
}

/**
 * Full name of a named type: `namespace.name`, where the namespace is the
 * type's own or the one inherited from its enclosing definition.
 */
export function avroFullName(type: AvroNamedType, enclosingNamespace?: string): string {
  if (type.name.includes('.')) {
    return type.name;
  }
  const namespace = type.namespace ?? enclosingNamespace;
  return namespace ? `${namespace}.${type.name}` : type.name;
}

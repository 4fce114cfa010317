/**
 * SQL type helpers.
 */

import type { SqlType } from './types.js';

/**
 * Render a type the way the engine spells it, e.g. `ARRAY(BIGINT)`.
 */
export function formatSqlType(type: SqlType): string {
  if (typeof type === 'string') {
    return type.toUpperCase();
  }
  switch (type.type) {
    case 'decimal':
      return `DECIMAL(${type.precision}, ${type.scale})`;
    case 'array':
      return `ARRAY(${formatSqlType(type.element)})`;
    case 'map':
      return `MAP(${formatSqlType(type.key)}, ${formatSqlType(type.value)})`;
  }
}

/**
 * Structural equality of two types.
 */
export function sqlTypesEqual(a: SqlType, b: SqlType): boolean {
  if (typeof a === 'string' || typeof b === 'string') {
    return a === b;
  }
  if (a.type === 'decimal' && b.type === 'decimal') {
    return a.precision === b.precision && a.scale === b.scale;
  }
  if (a.type === 'array' && b.type === 'array') {
    return sqlTypesEqual(a.element, b.element);
  }
  if (a.type === 'map' && b.type === 'map') {
    return sqlTypesEqual(a.key, b.key) && sqlTypesEqual(a.value, b.value);
  }
  return false;
}

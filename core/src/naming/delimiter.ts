/**
 * Namespace delimiter rewriting.
 *
 * Some engines treat `/` in a schema name awkwardly, so the connector can
 * expose `tenant/namespace` as e.g. `tenant__namespace`. Rewriting is purely
 * cosmetic: handles and collaborator calls always use the canonical form.
 */

import { NAMESPACE_SEPARATOR } from './names.js';

/**
 * Replace the namespace separator with `delimiter`. An empty delimiter
 * disables rewriting.
 */
export function rewriteNamespaceDelimiter(namespace: string, delimiter: string): string {
  if (!delimiter) {
    return namespace;
  }
  return namespace.split(NAMESPACE_SEPARATOR).join(delimiter);
}

/**
 * Map a possibly rewritten schema name back to `tenant/namespace`. Names
 * that already contain `/` are canonical and returned as is.
 */
export function restoreNamespaceDelimiter(schemaName: string, delimiter: string): string {
  if (!delimiter || schemaName.includes(NAMESPACE_SEPARATOR) || !schemaName.includes(delimiter)) {
    return schemaName;
  }
  return schemaName.split(delimiter).join(NAMESPACE_SEPARATOR);
}

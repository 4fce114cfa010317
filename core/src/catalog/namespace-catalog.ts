/**
 * Namespace listing and schema-name resolution.
 */

import { isNotFoundError } from '../errors.js';
import { noopLogger, type Logger } from '../logger.js';
import { restoreNamespaceDelimiter, rewriteNamespaceDelimiter } from '../naming/delimiter.js';
import { NamespaceName } from '../naming/names.js';
import type { NamespaceDirectory } from './types.js';

/**
 * Exposes tenant/namespace pairs as SQL schema names.
 */
export class NamespaceCatalog {
  constructor(
    private readonly directory: NamespaceDirectory,
    /** Replaces `/` in listed names; '' leaves names canonical */
    private readonly delimiter: string = '',
    private readonly logger: Logger = noopLogger
  ) {}

  /**
   * One schema name per namespace, tenants in directory order.
   */
  async listSchemaNames(): Promise<string[]> {
    const namespaces = await this.listNamespaces();
    return namespaces.map((namespace) => rewriteNamespaceDelimiter(namespace.toString(), this.delimiter));
  }

  /**
   * All namespaces known to the directory, without duplicates.
   */
  async listNamespaces(): Promise<NamespaceName[]> {
    const seen = new Set<string>();
    const result: NamespaceName[] = [];

    for (const tenant of await this.directory.listTenants()) {
      let namespaces: string[];
      try {
        namespaces = await this.directory.listNamespaces(tenant);
      } catch (error) {
        if (isNotFoundError(error)) {
          this.logger.debug('Tenant disappeared while listing namespaces', { tenant });
          continue;
        }
        throw error;
      }

      for (const value of namespaces) {
        const namespace = NamespaceName.tryParse(value);
        if (!namespace) {
          this.logger.warn('Ignoring malformed namespace name', { tenant, namespace: value });
          continue;
        }
        if (!seen.has(namespace.toString())) {
          seen.add(namespace.toString());
          result.push(namespace);
        }
      }
    }

    return result;
  }

  /**
   * Canonical `tenant/namespace` for a schema name the engine supplied.
   */
  restoreSchemaName(schemaName: string): string {
    return restoreNamespaceDelimiter(schemaName, this.delimiter);
  }

  /**
   * Resolve a canonical schema name to a namespace the directory knows, or
   * undefined.
   */
  async findNamespace(schemaName: string): Promise<NamespaceName | undefined> {
    const wanted = NamespaceName.tryParse(schemaName);
    if (!wanted) {
      return undefined;
    }

    let namespaces: string[];
    try {
      namespaces = await this.directory.listNamespaces(wanted.tenant);
    } catch (error) {
      if (isNotFoundError(error)) {
        return undefined;
      }
      throw error;
    }

    return namespaces.includes(wanted.toString()) ? wanted : undefined;
  }

  async namespaceExists(schemaName: string): Promise<boolean> {
    return (await this.findNamespace(schemaName)) !== undefined;
  }
}

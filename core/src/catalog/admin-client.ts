/**
 * Broker Admin API Client
 *
 * Reads tenants, namespaces, topics and schemas from the broker's admin REST
 * API. Implements every collaborator {@link TopicMetadata} needs, so one
 * client instance is a complete {@link MessagingCatalogSource}.
 */

import { z } from 'zod';
import type { ConnectorConfig } from '../config.js';
import { InvalidSchemaError } from '../errors.js';
import type { TopicName } from '../naming/names.js';
import {
  type MessagingCatalogSource,
  type NamespaceDirectory,
  type SchemaRegistry,
  type SchemaSnapshot,
  type TopicDirectory,
  isSchemaType,
} from './types.js';

// ============================================================================
// Type Definitions
// ============================================================================

/** Admin API client configuration */
export interface AdminApiConfig {
  /** Base URL of the admin API, e.g. `http://localhost:8080` */
  baseUrl: string;
  /** Bearer token sent with every request */
  token?: string;
}

const stringListSchema = z.array(z.string());

const schemaInfoResponseSchema = z.object({
  type: z.string(),
  data: z.string().default(''),
  properties: z.record(z.string()).default({}),
});

/** Body of an admin API error response */
const errorResponseSchema = z.object({
  reason: z.string(),
});

const TOPIC_DOMAINS = ['persistent', 'non-persistent'] as const;

// ============================================================================
// Admin API Client
// ============================================================================

/**
 * @example
 * ```ts
 * const client = new AdminApiClient({ baseUrl: 'http://localhost:8080' });
 * const metadata = new TopicMetadata(client, { connectorId: 'events' });
 *
 * await client.listTenants();                  // ['public', ...]
 * await client.listNamespaces('public');       // ['public/default']
 * ```
 */
export class AdminApiClient
  implements NamespaceDirectory, TopicDirectory, SchemaRegistry, MessagingCatalogSource
{
  readonly namespaces: NamespaceDirectory = this;
  readonly topics: TopicDirectory = this;
  readonly schemas: SchemaRegistry = this;

  private readonly baseUrl: string;

  constructor(private readonly config: AdminApiConfig) {
    this.baseUrl = config.baseUrl.replace(/\/+$/, '');
  }

  // ==========================================================================
  // Private Helpers
  // ==========================================================================

  /**
   * GET a JSON document and validate it.
   */
  private async request<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.output<S>> {
    const url = `${this.baseUrl}/admin/v2${path}`;

    const headers: Record<string, string> = {
      Accept: 'application/json',
    };
    if (this.config.token) {
      headers['Authorization'] = `Bearer ${this.config.token}`;
    }

    const response = await fetch(url, { method: 'GET', headers });

    if (!response.ok) {
      let errorMessage = `HTTP ${response.status}: ${response.statusText}`;
      const errorBody = errorResponseSchema.safeParse(parseJson(await response.text()));
      if (errorBody.success) {
        errorMessage = `HTTP ${response.status}: ${errorBody.data.reason}`;
      }
      throw new AdminApiError(errorMessage, response.status);
    }

    const result = schema.safeParse(parseJson(await response.text()));
    if (!result.success) {
      throw new AdminApiError(`Unexpected response from ${path}: ${result.error.issues[0]?.message}`, response.status);
    }
    return result.data;
  }

  /**
   * Encode `tenant/namespace` as two URL path segments.
   */
  private encodeNamespace(namespace: string): string {
    return namespace.split('/').map(encodeURIComponent).join('/');
  }

  // ==========================================================================
  // Tenants and Namespaces
  // ==========================================================================

  async listTenants(): Promise<string[]> {
    return this.request('/tenants', stringListSchema);
  }

  /**
   * @throws AdminApiError with status 404 if the tenant does not exist
   */
  async listNamespaces(tenant: string): Promise<string[]> {
    return this.request(`/namespaces/${encodeURIComponent(tenant)}`, stringListSchema);
  }

  // ==========================================================================
  // Topics
  // ==========================================================================

  /**
   * Persistent and non-persistent topics of a namespace, partitions included.
   */
  async listTopics(namespace: string): Promise<string[]> {
    const topics: string[] = [];
    for (const domain of TOPIC_DOMAINS) {
      topics.push(...(await this.request(`/${domain}/${this.encodeNamespace(namespace)}`, stringListSchema)));
    }
    return topics;
  }

  async listPartitionedTopics(namespace: string): Promise<string[]> {
    return this.request(`/persistent/${this.encodeNamespace(namespace)}/partitioned`, stringListSchema);
  }

  // ==========================================================================
  // Schemas
  // ==========================================================================

  /**
   * Latest schema of a topic. Partitions share the schema of their
   * partitioned topic.
   *
   * @throws AdminApiError with status 404 if no schema is registered
   */
  async getSchemaInfo(topic: TopicName): Promise<SchemaSnapshot> {
    const base = topic.partitionedTopicName;
    const path = `/schemas/${this.encodeNamespace(base.namespace.toString())}/${encodeURIComponent(base.localName)}/schema`;
    const info = await this.request(path, schemaInfoResponseSchema);

    if (!isSchemaType(info.type)) {
      throw new InvalidSchemaError(topic.toString(), `unsupported schema type ${info.type}`);
    }

    return {
      type: info.type,
      schema: textEncoder.encode(info.data),
      name: base.localName,
      properties: info.properties,
    };
  }
}

const textEncoder = new TextEncoder();

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

// ============================================================================
// Error Class
// ============================================================================

/**
 * Error thrown by admin API requests. A `statusCode` of 404 means the tenant,
 * namespace or schema does not exist.
 */
export class AdminApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number
  ) {
    super(message);
    this.name = 'AdminApiError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create an admin API client from connector configuration.
 */
export function createAdminApiClient(config: ConnectorConfig): AdminApiClient {
  return new AdminApiClient({
    baseUrl: config.adminUrl,
    token: config.authToken,
  });
}

/**
 * Connector Configuration
 *
 * Validated once at startup and frozen; catalog components only ever read it.
 *
 * @example
 * ```ts
 * const config = parseConnectorConfig({
 *   connectorId: 'events',
 *   namespaceDelimiterRewriteEnabled: true,
 *   rewriteNamespaceDelimiter: '__',
 * });
 * effectiveNamespaceDelimiter(config); // '__'
 * ```
 */

import { z } from 'zod';
import { ConfigError } from './errors.js';

// ============================================================================
// Schema
// ============================================================================

export const connectorConfigSchema = z
  .object({
    /** Identifier stamped on every table and column handle */
    connectorId: z.string().min(1).default('topicsql'),
    namespaceDelimiterRewriteEnabled: z.boolean().default(false),
    /** Replaces `/` in schema names when rewriting is enabled */
    rewriteNamespaceDelimiter: z.string().min(1).default('/'),
    /** Base URL of the broker admin REST API */
    adminUrl: z.string().url().default('http://localhost:8080'),
    authToken: z.string().min(1).optional(),
    logLevel: z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'),
    /** HTTP port of the read service */
    port: z.number().int().min(0).max(65535).default(8081),
  })
  .superRefine((config, ctx) => {
    if (!config.namespaceDelimiterRewriteEnabled) {
      return;
    }
    if (config.rewriteNamespaceDelimiter.includes('/') || config.rewriteNamespaceDelimiter.includes('.')) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['rewriteNamespaceDelimiter'],
        message: "must not contain '/' or '.' when rewriting is enabled",
      });
    }
  });

export type ConnectorConfigInput = z.input<typeof connectorConfigSchema>;
export type ConnectorConfig = Readonly<z.output<typeof connectorConfigSchema>>;

// ============================================================================
// Loading
// ============================================================================

/**
 * Validate configuration, filling in defaults.
 *
 * @throws ConfigError listing every invalid option
 */
export function parseConnectorConfig(input: ConnectorConfigInput = {}): ConnectorConfig {
  return validateConfig(input);
}

/**
 * Build configuration from `TOPICSQL_*` environment variables. A non-empty
 * `TOPICSQL_REWRITE_DELIMITER` turns delimiter rewriting on.
 */
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): ConnectorConfig {
  const input: Record<string, unknown> = {};

  if (env.TOPICSQL_CONNECTOR_ID) {
    input.connectorId = env.TOPICSQL_CONNECTOR_ID;
  }
  if (env.TOPICSQL_REWRITE_DELIMITER) {
    input.namespaceDelimiterRewriteEnabled = true;
    input.rewriteNamespaceDelimiter = env.TOPICSQL_REWRITE_DELIMITER;
  }
  if (env.TOPICSQL_ADMIN_URL) {
    input.adminUrl = env.TOPICSQL_ADMIN_URL;
  }
  if (env.TOPICSQL_AUTH_TOKEN) {
    input.authToken = env.TOPICSQL_AUTH_TOKEN;
  }
  if (env.TOPICSQL_LOG_LEVEL) {
    input.logLevel = env.TOPICSQL_LOG_LEVEL;
  }
  if (env.TOPICSQL_PORT) {
    input.port = Number(env.TOPICSQL_PORT);
  }

  return validateConfig(input);
}

function validateConfig(input: unknown): ConnectorConfig {
  const result = connectorConfigSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new ConfigError(`Invalid connector configuration: ${issues.join('; ')}`, issues);
  }
  return Object.freeze(result.data);
}

/**
 * Delimiter schema names are rewritten with, or '' when rewriting is off.
 */
export function effectiveNamespaceDelimiter(config: ConnectorConfig): string {
  return config.namespaceDelimiterRewriteEnabled ? config.rewriteNamespaceDelimiter : '';
}

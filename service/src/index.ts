/**
 * @topicsql/service - Catalog Read Service
 *
 * HTTP surface over the topic catalog: lists schemas, tables and columns as
 * JSON so tools without an engine connector can browse the catalog.
 *
 * @example
 * ```ts
 * import { InMemoryMessagingDirectory, TopicMetadata } from '@topicsql/core';
 * import { createApp } from '@topicsql/service';
 *
 * const metadata = new TopicMetadata(new InMemoryMessagingDirectory(), { connectorId: 'events' });
 * const app = createApp({ metadata });
 * const response = await app.request('/v1/schemas');
 * ```
 */

import { Hono } from 'hono';
import { logger as requestLogger } from 'hono/logger';
import { type Logger, type TopicMetadata, noopLogger } from '@topicsql/core';
import { createCatalogRoutes } from './routes.js';

export { createCatalogRoutes, type CatalogErrorResponse, type ColumnView } from './routes.js';

export interface AppOptions {
  metadata: TopicMetadata;
  logger?: Logger;
  /** Service name reported by `/health` */
  serviceName?: string;
}

/**
 * Build the service application.
 */
export function createApp(options: AppOptions): Hono {
  const logger = options.logger ?? noopLogger;
  const serviceName = options.serviceName ?? 'topicsql';

  const app = new Hono();

  // Request log lines go through the service logger
  app.use('/*', requestLogger((message) => logger.info(message)));

  // Health check endpoint
  app.get('/health', (c) => {
    return c.json({ status: 'ok', service: serviceName });
  });

  // Mount catalog routes at /v1
  app.route('/v1', createCatalogRoutes(options.metadata, logger));

  return app;
}

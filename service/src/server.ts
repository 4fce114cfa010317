/**
 * Node entry point: reads `TOPICSQL_*` configuration, connects the catalog to
 * the broker admin API and serves it over HTTP.
 */

import { serve } from '@hono/node-server';
import {
  TopicMetadata,
  createAdminApiClient,
  createLogger,
  loadConfigFromEnv,
} from '@topicsql/core';
import { createApp } from './index.js';

const config = loadConfigFromEnv();
const logger = createLogger({ level: config.logLevel, context: config.connectorId });

const metadata = TopicMetadata.fromConfig(createAdminApiClient(config), config, logger.child('catalog'));
const app = createApp({ metadata, logger: logger.child('http'), serviceName: config.connectorId });

serve({ fetch: app.fetch, port: config.port }, (info) => {
  logger.info('Catalog service listening', { port: info.port, adminUrl: config.adminUrl });
});

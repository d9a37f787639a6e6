import Fastify from 'fastify';
import type { Logger } from 'pino';
import type { BrokerConnection } from '../../infrastructure/broker/index.js';
import { createLogger } from '../../infrastructure/logger.js';
import type { EventMetrics } from '../../infrastructure/metrics/index.js';
import metricsRoutes from './metrics-routes.js';

export interface MetricsServerOptions {
  metrics: EventMetrics;
  connection: BrokerConnection;
  log?: Logger;
}

/**
 * Builds the scrape server with `/metrics` and `/health`.
 * The caller owns `listen()` and `close()`.
 */
export async function createMetricsServer(options: MetricsServerOptions) {
  const fastify = Fastify({
    loggerInstance: options.log ?? createLogger('metrics-server'),
  });

  await fastify.register(metricsRoutes, {
    metrics: options.metrics,
    connection: options.connection,
  });
  return fastify;
}

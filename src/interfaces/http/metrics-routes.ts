import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyReply } from 'fastify';
import type { BrokerConnection } from '../../infrastructure/broker/index.js';
import type { EventMetrics } from '../../infrastructure/metrics/index.js';

export interface MetricsRoutesOptions {
  metrics: EventMetrics;
  connection: BrokerConnection;
}

/**
 * Scrape and health routes.
 *
 * GET /metrics  Prometheus exposition of the metrics registry.
 * GET /health   200 while the broker is connected, 503 otherwise.
 */
async function metricsRoutes(
  fastify: FastifyInstance,
  options: MetricsRoutesOptions,
): Promise<void> {
  const { metrics, connection } = options;

  fastify.get('/metrics', async (_request, reply: FastifyReply) => {
    const body = await metrics.expose();
    return reply.status(200).header('content-type', metrics.contentType).send(body);
  });

  fastify.get('/health', async (_request, reply: FastifyReply) => {
    if (connection.isConnected()) {
      return reply.status(200).send({ status: 'ok', broker: 'connected' });
    }
    fastify.log.warn({ client_name: connection.clientName }, 'Health check: broker disconnected');
    return reply.status(503).send({ status: 'degraded', broker: 'disconnected' });
  });
}

export default fp(metricsRoutes, {
  name: 'metrics-routes',
  fastify: '5.x',
});

/**
 * HTTP surface of the sidecar
 */

import Fastify, { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { Logger } from '@tradewire/utils';
import { IngestionService } from './IngestionService';

export function registerMetricsRoutes(fastify: FastifyInstance, ingestion: IngestionService): void {
  /**
   * GET /metrics
   * Prometheus text exposition
   */
  fastify.get('/metrics', async (_request: FastifyRequest, reply: FastifyReply) => {
    const body = await ingestion.exposition();
    return reply.code(200).header('Content-Type', ingestion.store.contentType).send(body);
  });

  /**
   * GET /health
   * 200 while the receive loop runs, 503 otherwise
   */
  fastify.get('/health', async (_request: FastifyRequest, reply: FastifyReply) => {
    const health = ingestion.health();
    return reply.code(health.running ? 200 : 503).send(health);
  });

  /**
   * GET /analysis
   * Statistics over the most recent trades
   */
  fastify.get('/analysis', async (_request: FastifyRequest, reply: FastifyReply) => {
    return reply.code(200).send(ingestion.analysis());
  });
}

export function buildMetricsServer(ingestion: IngestionService, logger: Logger = new Logger('MetricsServer')): FastifyInstance {
  const fastify = Fastify({ logger: false });

  fastify.addHook('onResponse', async (request, reply) => {
    logger.debug('HTTP request', {
      method: request.method,
      url: request.url,
      statusCode: reply.statusCode
    });
  });

  fastify.setErrorHandler(async (error, request, reply) => {
    logger.error('Request failed', error, { url: request.url });
    return reply.code(500).send({
      error: 'Internal server error',
      message: error.message
    });
  });

  registerMetricsRoutes(fastify, ingestion);
  return fastify;
}

/**
 * Metrics endpoint - Prometheus format
 * GET /metrics
 */
import type { FastifyInstance } from 'fastify';
import { getMetrics, getContentType } from '../../observability/metrics.js';
import type { ServerDeps } from '../types.js';

export async function metricsRoutes(fastify: FastifyInstance, deps: ServerDeps): Promise<void> {
    fastify.get('/metrics', async (_request, reply) => {
        // Update queue depth metrics before returning
        await deps.refreshQueueMetrics();

        const metrics = await getMetrics();

        return reply
            .header('Content-Type', getContentType())
            .send(metrics);
    });
}

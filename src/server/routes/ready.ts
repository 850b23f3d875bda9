/**
 * Ready endpoint - readiness check with dependency status
 * GET /ready
 */
import type { FastifyInstance } from 'fastify';
import type { ServerDeps } from '../types.js';

type DependencyStatus = 'connected' | 'disconnected';

interface ReadyResponse {
    status: 'ready' | 'not_ready';
    dependencies: {
        redis: DependencyStatus;
        database: DependencyStatus;
    };
}

export async function readyRoutes(fastify: FastifyInstance, deps: ServerDeps): Promise<void> {
    fastify.get<{ Reply: ReadyResponse }>('/ready', async (_request, reply) => {
        const [redisUp, databaseUp] = await Promise.all([deps.pingRedis(), deps.pingDatabase()]);
        const isReady = redisUp && databaseUp;

        return reply.status(isReady ? 200 : 503).send({
            status: isReady ? 'ready' : 'not_ready',
            dependencies: {
                redis: redisUp ? 'connected' : 'disconnected',
                database: databaseUp ? 'connected' : 'disconnected',
            },
        });
    });
}

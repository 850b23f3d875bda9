/**
 * Fastify server setup
 */
import Fastify, { type FastifyInstance } from 'fastify';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config/index.js';
import { logger } from '../observability/logger.js';
import { healthRoutes } from './routes/health.js';
import { readyRoutes } from './routes/ready.js';
import { metricsRoutes } from './routes/metrics.js';
import { adminRoutes } from './routes/admin.js';
import type { ServerDeps } from './types.js';

let server: FastifyInstance | null = null;

/**
 * Create and configure Fastify server
 */
export function createServer(): FastifyInstance {
    return Fastify({
        logger: {
            level: config.logLevel,
        },
        genReqId: () => uuidv4(),
    });
}

/**
 * Register all routes
 */
export async function registerRoutes(fastify: FastifyInstance, deps: ServerDeps): Promise<void> {
    await fastify.register(healthRoutes);
    await fastify.register(readyRoutes, deps);
    await fastify.register(metricsRoutes, deps);
    await fastify.register(adminRoutes, deps);

    logger.info('Routes registered: /health, /ready, /metrics, /admin/*');
}

/**
 * Start the server
 */
export async function startServer(deps: ServerDeps): Promise<FastifyInstance> {
    server = createServer();
    await registerRoutes(server, deps);

    const port = config.metricsPort;
    const host = '0.0.0.0';

    await server.listen({ port, host });
    logger.info(`Server listening on http://${host}:${port}`);

    return server;
}

/**
 * Stop the server
 */
export async function stopServer(): Promise<void> {
    if (server) {
        await server.close();
        server = null;
        logger.info('Server stopped');
    }
}

export type { ServerDeps } from './types.js';

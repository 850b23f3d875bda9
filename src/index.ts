/**
 * Social Ingest Service - Main entry point
 *
 * Worker-first service that:
 * - Runs BullMQ workers for per-user ingestion and the periodic sweep
 * - Exposes internal Fastify endpoints for health/ready/metrics/admin
 * - Never serves user-facing API traffic
 */
import { createAppContext } from './app.js';
import { config, getRedactedConfig } from './config/index.js';
import { logger } from './observability/logger.js';
import { getRedisConnection, closeRedisConnection, isRedisConnected } from './queues/redis.js';
import { initializeQueues, closeQueues, getQueueCounts, updateQueueMetrics } from './queues/index.js';
import { SchedulerService, scheduleSweep } from './services/scheduler.service.js';
import { startWorkers, closeWorkers } from './workers/index.js';
import { startServer, stopServer } from './server/index.js';

const { store, ingestService } = createAppContext(config);

async function main(): Promise<void> {
    logger.info('Starting Social Ingest Service...');
    logger.info('Configuration loaded', getRedactedConfig(config));

    try {
        // Storage schema
        await store.ensureSchema();

        // Initialize Redis connection
        logger.info('Connecting to Redis...');
        getRedisConnection();

        // Initialize queues
        logger.info('Initializing queues...');
        const queues = initializeQueues();
        const scheduler = new SchedulerService(store, queues.ingest);

        // Start workers and the periodic sweep
        logger.info('Starting workers...');
        startWorkers(ingestService, scheduler);
        await scheduleSweep(queues.sweep, config.sweepIntervalMinutes);

        // Start HTTP server
        logger.info('Starting HTTP server...');
        await startServer({
            scheduler,
            pingRedis: isRedisConnected,
            pingDatabase: () => store.ping(),
            queueCounts: getQueueCounts,
            refreshQueueMetrics: updateQueueMetrics,
            adminToken: config.adminApiToken,
        });

        logger.info('Social Ingest Service started successfully');
    } catch (error) {
        logger.error('Failed to start Social Ingest Service', error);
        process.exit(1);
    }
}

// Graceful shutdown handler
async function shutdown(signal: string): Promise<void> {
    logger.info(`Received ${signal}, shutting down gracefully...`);

    try {
        // Stop accepting new work
        await stopServer();

        // Wait for workers to finish current jobs
        await closeWorkers();

        // Close queues
        await closeQueues();

        // Close Redis and database connections
        await closeRedisConnection();
        await store.close();

        logger.info('Social Ingest Service stopped gracefully');
        process.exit(0);
    } catch (error) {
        logger.error('Error during shutdown', error);
        process.exit(1);
    }
}

// Register shutdown handlers
process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));

// Handle uncaught errors
process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception', error);
    process.exit(1);
});

process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection', reason);
    process.exit(1);
});

// Start the service
void main();

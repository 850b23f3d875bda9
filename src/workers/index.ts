/**
 * Worker registration and management
 */
import type { Worker } from 'bullmq';
import { logger } from '../observability/logger.js';
import type { IngestService } from '../services/ingest.service.js';
import type { SchedulerService } from '../services/scheduler.service.js';
import { createIngestWorker } from './ingest.worker.js';
import { createSweepWorker } from './sweep.worker.js';

let workers: Worker[] = [];

/**
 * Start all workers; BullMQ workers begin consuming on creation
 */
export function startWorkers(ingestService: IngestService, scheduler: SchedulerService): Worker[] {
    if (workers.length === 0) {
        workers = [createIngestWorker(ingestService), createSweepWorker(scheduler)];
        logger.info('Workers started', { queues: workers.map((w) => w.name) });
    }
    return workers;
}

/**
 * Close all workers gracefully, letting active jobs finish
 */
export async function closeWorkers(): Promise<void> {
    logger.info('Closing all workers...');

    await Promise.all(
        workers.map(async (worker) => {
            try {
                await worker.close();
                logger.info(`Worker closed for queue: ${worker.name}`);
            } catch (error) {
                logger.error(`Error closing worker for queue: ${worker.name}`, error);
            }
        })
    );

    workers = [];
    logger.info('All workers closed');
}

export { createWorker } from './base-worker.js';

/**
 * BullMQ queue initialization
 */
import { Queue } from 'bullmq';
import { getRedisConnection } from './redis.js';
import { QUEUE_NAMES, type IngestJob, type QueueName, type SweepJob } from './schemas.js';
import { logger } from '../observability/logger.js';
import { queueDepth } from '../observability/metrics.js';

let ingestQueue: Queue<IngestJob> | null = null;
let sweepQueue: Queue<SweepJob> | null = null;

/**
 * Initialize all queues.
 * Jobs are attempted once; finished jobs are removed so the per-user job id frees up.
 */
export function initializeQueues(): { ingest: Queue<IngestJob>; sweep: Queue<SweepJob> } {
    const connection = getRedisConnection();
    const defaultJobOptions = {
        attempts: 1,
        removeOnComplete: true,
        removeOnFail: true,
    };

    ingestQueue ??= new Queue<IngestJob>(QUEUE_NAMES.INGEST, { connection, defaultJobOptions });
    sweepQueue ??= new Queue<SweepJob>(QUEUE_NAMES.SWEEP, { connection, defaultJobOptions });

    logger.info('Queues initialized', { queues: Object.values(QUEUE_NAMES) });
    return { ingest: ingestQueue, sweep: sweepQueue };
}

function activeQueues(): Array<[QueueName, Queue]> {
    const entries: Array<[QueueName, Queue]> = [];
    if (ingestQueue) entries.push([QUEUE_NAMES.INGEST, ingestQueue]);
    if (sweepQueue) entries.push([QUEUE_NAMES.SWEEP, sweepQueue]);
    return entries;
}

export interface QueueCounts {
    waiting: number;
    active: number;
    delayed: number;
    failed: number;
}

/**
 * Job counts per initialized queue
 */
export async function getQueueCounts(): Promise<Record<string, QueueCounts>> {
    const counts: Record<string, QueueCounts> = {};
    for (const [name, queue] of activeQueues()) {
        const [waiting, active, delayed, failed] = await Promise.all([
            queue.getWaitingCount(),
            queue.getActiveCount(),
            queue.getDelayedCount(),
            queue.getFailedCount(),
        ]);
        counts[name] = { waiting, active, delayed, failed };
    }
    return counts;
}

/**
 * Update queue depth metrics for all queues
 */
export async function updateQueueMetrics(): Promise<void> {
    for (const [queueName, queue] of activeQueues()) {
        try {
            const waiting = await queue.getWaitingCount();
            const active = await queue.getActiveCount();
            const delayed = await queue.getDelayedCount();

            queueDepth.labels(queueName).set(waiting + active + delayed);
        } catch (error) {
            logger.error(`Failed to get queue metrics for ${queueName}`, error);
        }
    }
}

/**
 * Close all queues
 */
export async function closeQueues(): Promise<void> {
    for (const [name, queue] of activeQueues()) {
        await queue.close();
        logger.info(`Queue closed: ${name}`);
    }
    ingestQueue = null;
    sweepQueue = null;
}

// Re-export schemas
export * from './schemas.js';

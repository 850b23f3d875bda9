/**
 * Base worker factory with event handlers and metrics
 */
import { Worker, type Job } from 'bullmq';
import { getRedisConnection } from '../queues/redis.js';
import { config } from '../config/index.js';
import { logger, createLogger, type Logger } from '../observability/logger.js';
import { jobsTotal, jobDuration } from '../observability/metrics.js';
import type { QueueName } from '../queues/schemas.js';

export interface WorkerConfig<T> {
    queueName: QueueName;
    concurrency?: number;
    processor: (job: Job<T>, jobLogger: Logger) => Promise<void>;
}

/**
 * Create a worker with standard event handlers and metrics.
 * Jobs are not retried; a failure is logged and counted.
 */
export function createWorker<T>(workerConfig: WorkerConfig<T>): Worker<T> {
    const { queueName, concurrency = config.workerConcurrency, processor } = workerConfig;

    const worker = new Worker<T>(
        queueName,
        async (job: Job<T>) => {
            const jobLogger = createLogger({
                jobId: job.id,
                queue: queueName,
            });

            const endTimer = jobDuration.startTimer({ queue: queueName });
            jobLogger.info('Job started', { name: job.name });

            try {
                await processor(job, jobLogger);
                jobLogger.info('Job completed', { durationSec: endTimer() });
            } catch (error) {
                endTimer();
                jobLogger.error('Job failed', error);
                throw error;
            }
        },
        {
            connection: getRedisConnection(),
            concurrency,
        }
    );

    worker.on('completed', (job: Job<T>) => {
        jobsTotal.labels(queueName, 'completed').inc();
        logger.debug(`Job ${job.id} completed in queue ${queueName}`);
    });

    worker.on('failed', (job: Job<T> | undefined, error: Error) => {
        jobsTotal.labels(queueName, 'failed').inc();
        logger.warn(`Job ${job?.id ?? 'unknown'} failed in queue ${queueName}`, {
            error: error.message,
        });
    });

    worker.on('stalled', (jobId: string) => {
        jobsTotal.labels(queueName, 'stalled').inc();
        logger.warn(`Job ${jobId} stalled in queue ${queueName}`);
    });

    worker.on('error', (error: Error) => {
        logger.error(`Worker error in queue ${queueName}`, error);
    });

    worker.on('ready', () => {
        logger.info(`Worker ready for queue: ${queueName}`);
    });

    return worker;
}

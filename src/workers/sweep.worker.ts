/**
 * Sweep Worker - enqueues ingest jobs for users that are due
 */
import { QUEUE_NAMES, type SweepJob } from '../queues/schemas.js';
import { updateQueueMetrics } from '../queues/index.js';
import type { SchedulerService } from '../services/scheduler.service.js';
import { createWorker } from './base-worker.js';

export function createSweepWorker(scheduler: SchedulerService) {
    return createWorker<SweepJob>({
        queueName: QUEUE_NAMES.SWEEP,
        concurrency: 1,
        processor: async (_job, jobLogger) => {
            const result = await scheduler.sweep();
            jobLogger.info('Sweep job finished', { ...result });
            await updateQueueMetrics();
        },
    });
}

/**
 * Ingest Worker - runs every source for one user
 */
import type { Job } from 'bullmq';
import type { Logger } from '../observability/logger.js';
import { QUEUE_NAMES, type IngestJob } from '../queues/schemas.js';
import type { IngestService } from '../services/ingest.service.js';
import { createWorker } from './base-worker.js';

export function processIngestJob(ingestService: IngestService) {
    return async (job: Job<IngestJob>, jobLogger: Logger): Promise<void> => {
        const { userId, triggeredBy, triggeredAt } = job.data;
        jobLogger.info('Processing ingest job', { userId, triggeredBy, triggeredAt });

        const outcome = await ingestService.ingest(userId);

        jobLogger.info('Ingest job finished', {
            userId,
            ...outcome.totals,
            sources: outcome.sources.map((s) => ({
                source: s.source,
                state: s.state,
                abortReason: s.abortReason,
            })),
        });
    };
}

export function createIngestWorker(ingestService: IngestService) {
    return createWorker<IngestJob>({
        queueName: QUEUE_NAMES.INGEST,
        processor: processIngestJob(ingestService),
    });
}

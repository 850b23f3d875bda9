import type { QueueCounts } from '../queues/index.js';
import type { SchedulerService } from '../services/scheduler.service.js';

/**
 * What the HTTP surface needs from the rest of the process
 */
export type ServerDeps = {
    scheduler: Pick<SchedulerService, 'enqueueIngest' | 'sweep'>;
    pingRedis: () => Promise<boolean>;
    pingDatabase: () => Promise<boolean>;
    queueCounts: () => Promise<Record<string, QueueCounts>>;
    refreshQueueMetrics: () => Promise<void>;
    adminToken: string | null;
};

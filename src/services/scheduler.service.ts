/**
 * Scheduler Service
 * Decides which users are due and feeds the ingest queue.
 */
import { logger } from '../observability/logger.js';
import { ingestJobId, type IngestJob, type SweepJob, type TriggeredBy } from '../queues/schemas.js';
import type { ContentStore, UserSchedule } from '../storage/types.js';

const MINUTE_MS = 60_000;
export const SWEEP_JOB_NAME = 'sweep-due-users';

/**
 * Due when never scraped, or when the user's interval has fully elapsed
 */
export function isUserDue(user: UserSchedule, now: Date): boolean {
    if (!user.lastScrapedAt) return true;
    const elapsed = now.getTime() - user.lastScrapedAt.getTime();
    return elapsed >= user.scrapeIntervalMinutes * MINUTE_MS;
}

export interface EnqueueResult {
    jobId: string;
    /** False when a job for the user was already waiting or running */
    enqueued: boolean;
}

export interface SweepResult {
    checked: number;
    due: number;
    enqueued: number;
}

/**
 * The slice of the BullMQ ingest queue the scheduler uses
 */
export interface IngestQueue {
    add(name: string, data: IngestJob, opts: { jobId: string; priority: number }): Promise<unknown>;
    getJob(jobId: string): Promise<unknown>;
}

export interface SweepQueue {
    upsertJobScheduler(
        schedulerId: string,
        repeat: { every: number },
        template: { name: string; data: SweepJob }
    ): Promise<unknown>;
}

export class SchedulerService {
    constructor(
        private readonly store: ContentStore,
        private readonly ingestQueue: IngestQueue,
        private readonly now: () => Date = () => new Date()
    ) { }

    async enqueueIngest(userId: number, triggeredBy: TriggeredBy): Promise<EnqueueResult> {
        const jobId = ingestJobId(userId);

        const existing = await this.ingestQueue.getJob(jobId);
        if (existing) {
            logger.debug('Ingest job already queued', { userId, jobId });
            return { jobId, enqueued: false };
        }

        await this.ingestQueue.add(
            jobId,
            { userId, triggeredBy, triggeredAt: this.now().toISOString() },
            { jobId, priority: triggeredBy === 'manual' ? 1 : 2 }
        );

        logger.info('Ingest job enqueued', { userId, jobId, triggeredBy });
        return { jobId, enqueued: true };
    }

    /**
     * Enqueue every due user (batch mode)
     */
    async sweep(): Promise<SweepResult> {
        const now = this.now();
        const users = await this.store.listUsers();
        const due = users.filter((user) => isUserDue(user, now));

        let enqueued = 0;
        for (const user of due) {
            const result = await this.enqueueIngest(user.id, 'schedule');
            if (result.enqueued) enqueued++;
        }

        const result = { checked: users.length, due: due.length, enqueued };
        logger.info('Sweep completed', { stage: 'sweep', ...result });
        return result;
    }
}

/**
 * Register (or re-time) the repeatable sweep
 */
export async function scheduleSweep(sweepQueue: SweepQueue, intervalMinutes: number): Promise<void> {
    await sweepQueue.upsertJobScheduler(
        SWEEP_JOB_NAME,
        { every: intervalMinutes * MINUTE_MS },
        { name: SWEEP_JOB_NAME, data: { triggeredBy: 'schedule', triggeredAt: new Date().toISOString() } }
    );

    logger.info('Sweep scheduled', { intervalMinutes });
}

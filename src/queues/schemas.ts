/**
 * Queue job type definitions
 */

export type TriggeredBy = 'schedule' | 'manual';

/**
 * Ingest Job - runs every source for one user
 */
export interface IngestJob {
    userId: number;
    triggeredBy: TriggeredBy;
    triggeredAt: string;
}

/**
 * Sweep Job - enqueues an ingest job for every user that is due
 */
export interface SweepJob {
    triggeredBy: TriggeredBy;
    triggeredAt: string;
}

// Queue names
export const QUEUE_NAMES = {
    INGEST: 'ingest-queue',
    SWEEP: 'sweep-queue',
} as const;

export type QueueName = typeof QUEUE_NAMES[keyof typeof QUEUE_NAMES];

/**
 * One job per user at a time: a user already waiting or running is not enqueued twice
 */
export function ingestJobId(userId: number): string {
    return `ingest-${userId}`;
}

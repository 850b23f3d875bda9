/**
 * Prometheus metrics for the ingestion service
 */
import client from 'prom-client';

// Create a Registry
export const registry = new client.Registry();

// Add default metrics (process CPU, memory, etc.)
client.collectDefaultMetrics({ register: registry });

// ============================================================================
// JOB METRICS
// ============================================================================

export const jobsTotal = new client.Counter({
    name: 'social_ingest_jobs_total',
    help: 'Total number of queue jobs processed',
    labelNames: ['queue', 'status'] as const,
    registers: [registry],
});

export const queueDepth = new client.Gauge({
    name: 'social_ingest_queue_depth',
    help: 'Current number of jobs in queue',
    labelNames: ['queue'] as const,
    registers: [registry],
});

export const jobDuration = new client.Histogram({
    name: 'social_ingest_job_duration_seconds',
    help: 'Job processing duration in seconds',
    labelNames: ['queue'] as const,
    buckets: [0.5, 1, 5, 15, 30, 60, 120, 300, 600, 1200],
    registers: [registry],
});

// ============================================================================
// PIPELINE METRICS
// ============================================================================

/**
 * Counter: per (user, source) pipeline invocations by terminal state
 */
export const ingestRunsTotal = new client.Counter({
    name: 'social_ingest_runs_total',
    help: 'Pipeline invocations by source and terminal state',
    labelNames: ['source', 'state', 'reason'] as const,
    registers: [registry],
});

export const itemsDiscardedTotal = new client.Counter({
    name: 'social_ingest_items_discarded_total',
    help: 'Raw items discarded by the window and dedup filter',
    labelNames: ['source', 'reason'] as const,
    registers: [registry],
});

export const recordsInsertedTotal = new client.Counter({
    name: 'social_ingest_records_inserted_total',
    help: 'Records inserted into storage',
    labelNames: ['source'] as const,
    registers: [registry],
});

export const recordsEnrichedTotal = new client.Counter({
    name: 'social_ingest_records_enriched_total',
    help: 'Enrichment attempts by result',
    labelNames: ['source', 'result'] as const,
    registers: [registry],
});

export const actorRunDuration = new client.Histogram({
    name: 'social_ingest_actor_run_duration_seconds',
    help: 'Wall time of actor runs including dataset reads',
    labelNames: ['source'] as const,
    buckets: [5, 15, 30, 60, 120, 300, 600, 1800],
    registers: [registry],
});

// ============================================================================
// HELPERS
// ============================================================================

export async function getMetrics(): Promise<string> {
    return registry.metrics();
}

export function getContentType(): string {
    return registry.contentType;
}

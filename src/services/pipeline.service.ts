/**
 * Pipeline Orchestrator
 *
 * One invocation per (user, source):
 *   Idle → Fetching → Filtering → Inserting → Enriching → Done
 * with Aborted reachable from Idle (nothing to query) and Fetching (actor failure).
 *
 * Commit points: one insert of all mapped records, then one update of all
 * enrichment results. Last-scraped time belongs to the caller.
 */
import { DEFAULT_LANGUAGE_CODE } from '../ai/languages.js';
import type { EnrichmentClient } from '../ai/enrichment.js';
import type { ActorRunner, RawItem } from '../fetchers/types.js';
import { createLogger, type Logger } from '../observability/logger.js';
import {
    actorRunDuration,
    ingestRunsTotal,
    itemsDiscardedTotal,
    recordsEnrichedTotal,
    recordsInsertedTotal,
} from '../observability/metrics.js';
import type { SourceDefinition } from '../sources/types.js';
import type { ContentStore, EnrichmentUpdate, NormalizedRecord, SourceType, UserProfile } from '../storage/types.js';
import { ActorInvocationError, AppError, EmptyDatasetError } from '../utils/errors.js';
import { emptyDiscards, filterItems, type DiscardCounts } from './dedup.service.js';
import { computeWindow, type IngestWindow } from './window.js';

export type PipelineState = 'Idle' | 'Fetching' | 'Filtering' | 'Inserting' | 'Enriching' | 'Done' | 'Aborted';

export type AbortReason = 'no_references' | 'actor_error' | 'empty_dataset';

const TRANSITIONS: Record<PipelineState, readonly PipelineState[]> = {
    Idle: ['Fetching', 'Aborted'],
    Fetching: ['Filtering', 'Aborted'],
    Filtering: ['Inserting', 'Done'],
    Inserting: ['Enriching', 'Done'],
    Enriching: ['Done'],
    Done: [],
    Aborted: [],
};

export interface SourceOutcome {
    source: SourceType;
    state: 'Done' | 'Aborted';
    abortReason: AbortReason | null;
    /** Message of the error behind an abort */
    error: string | null;
    /** States visited, starting with Idle */
    path: PipelineState[];
    window: IngestWindow | null;
    fetched: number;
    accepted: number;
    inserted: number;
    enriched: number;
    enrichmentFailed: number;
    /** True when no enrichment client is configured */
    enrichmentSkipped: boolean;
    /** Records stored with at least one malformed field */
    degraded: number;
    discards: DiscardCounts;
}

export interface PipelineDeps {
    store: ContentStore;
    actor: ActorRunner;
    enrichment: EnrichmentClient | null;
    now?: () => Date;
}

/**
 * Tracks the state of one invocation and rejects transitions the table does not allow
 */
class RunTracker {
    readonly outcome: SourceOutcome;
    private state: PipelineState = 'Idle';

    constructor(source: SourceType, enrichmentSkipped: boolean) {
        this.outcome = {
            source,
            state: 'Done',
            abortReason: null,
            error: null,
            path: ['Idle'],
            window: null,
            fetched: 0,
            accepted: 0,
            inserted: 0,
            enriched: 0,
            enrichmentFailed: 0,
            enrichmentSkipped,
            degraded: 0,
            discards: emptyDiscards(),
        };
    }

    moveTo(next: PipelineState): void {
        if (!TRANSITIONS[this.state].includes(next)) {
            throw new AppError(`Illegal pipeline transition ${this.state} -> ${next}`, 'ILLEGAL_TRANSITION', {
                from: this.state,
                to: next,
            });
        }
        this.state = next;
        this.outcome.path.push(next);
    }

    finish(): SourceOutcome {
        this.moveTo('Done');
        this.outcome.state = 'Done';
        return this.outcome;
    }

    abort(reason: AbortReason, error: string | null = null): SourceOutcome {
        this.moveTo('Aborted');
        this.outcome.state = 'Aborted';
        this.outcome.abortReason = reason;
        this.outcome.error = error;
        return this.outcome;
    }
}

export class SourcePipeline {
    private readonly store: ContentStore;
    private readonly actor: ActorRunner;
    private readonly enrichment: EnrichmentClient | null;
    private readonly now: () => Date;

    constructor(deps: PipelineDeps) {
        this.store = deps.store;
        this.actor = deps.actor;
        this.enrichment = deps.enrichment;
        this.now = deps.now ?? (() => new Date());
    }

    /**
     * Actor failures end in Aborted; storage failures propagate.
     */
    async run(user: UserProfile, definition: SourceDefinition): Promise<SourceOutcome> {
        const log = createLogger({ userId: user.id, source: definition.source });
        const run = new RunTracker(definition.source, this.enrichment === null);
        const outcome = await this.execute(user, definition, run, log);

        ingestRunsTotal.labels(definition.source, outcome.state, outcome.abortReason ?? 'none').inc();
        log.info('Source ingestion finished', {
            state: outcome.state,
            abortReason: outcome.abortReason,
            fetched: outcome.fetched,
            accepted: outcome.accepted,
            inserted: outcome.inserted,
            enriched: outcome.enriched,
            discards: outcome.discards,
        });

        return outcome;
    }

    private async execute(
        user: UserProfile,
        definition: SourceDefinition,
        run: RunTracker,
        log: Logger
    ): Promise<SourceOutcome> {
        const targets = collectTargets(user, definition);
        if (targets.length === 0) {
            log.info('No usable profile references, skipping source');
            return run.abort('no_references');
        }

        // Fetching
        run.moveTo('Fetching');
        const window = computeWindow(this.now(), definition.lookbackDays);
        run.outcome.window = window;

        let items: RawItem[];
        try {
            items = await this.fetchItems(definition, targets, window, log.child({ stage: 'fetch' }));
        } catch (error) {
            if (error instanceof EmptyDatasetError) {
                log.error('Actor run exposed no dataset', error);
                return run.abort('empty_dataset', error.message);
            }
            if (error instanceof ActorInvocationError) {
                log.error('Actor run failed', error);
                return run.abort('actor_error', error.message);
            }
            throw error;
        }

        // Filtering
        run.moveTo('Filtering');
        const filtered = await filterItems(items, window, definition.mapper, (nativeId) =>
            this.store.hasRecord(user.id, definition.source, nativeId)
        );
        run.outcome.fetched = filtered.fetched;
        run.outcome.accepted = filtered.accepted.length;
        run.outcome.discards = filtered.discards;
        recordDiscards(definition.source, filtered.discards);

        log.child({ stage: 'filter' }).info('Filtered dataset', {
            fetched: filtered.fetched,
            accepted: filtered.accepted.length,
            discards: filtered.discards,
        });

        if (filtered.accepted.length === 0) {
            return run.finish();
        }

        // Inserting
        run.moveTo('Inserting');
        const records: NormalizedRecord[] = [];
        for (const accepted of filtered.accepted) {
            const { record, degradedFields } = definition.mapper.mapRecord(accepted, user.id);
            if (degradedFields.length > 0) {
                run.outcome.degraded++;
                log.debug('Record mapped with degraded fields', {
                    nativeId: record.nativeId,
                    degradedFields,
                });
            }
            records.push(record);
        }

        const stored = await this.store.insertRecords(records);
        run.outcome.inserted = stored.length;
        recordsInsertedTotal.labels(definition.source).inc(stored.length);
        log.child({ stage: 'insert' }).info('Inserted records', {
            mapped: records.length,
            inserted: stored.length,
        });

        if (stored.length === 0 || !this.enrichment) {
            return run.finish();
        }

        // Enriching
        run.moveTo('Enriching');
        const enrichLog = log.child({ stage: 'enrich' });
        const languageCode = user.preferences.languageOverrides[definition.source]
            || user.preferences.preferredLanguage
            || DEFAULT_LANGUAGE_CODE;
        const fallbackAuthor = user.name || user.email;

        const updates: EnrichmentUpdate[] = [];
        for (const record of stored) {
            const result = await this.enrichment.enrich({
                record,
                template: definition.prompt,
                languageCode,
                fallbackAuthor,
            });

            if (result.status === 'enriched') {
                updates.push({ id: record.id, title: result.title, summary: result.summary });
            } else {
                run.outcome.enrichmentFailed++;
            }
            recordsEnrichedTotal.labels(definition.source, result.status).inc();
        }

        if (updates.length > 0) {
            await this.store.updateEnrichment(updates);
        }
        run.outcome.enriched = updates.length;

        enrichLog.info('Enrichment finished', {
            languageCode,
            enriched: updates.length,
            failed: run.outcome.enrichmentFailed,
        });

        return run.finish();
    }

    /**
     * Runs the actor and reads its whole dataset. Dataset read errors are actor failures too.
     */
    private async fetchItems(
        definition: SourceDefinition,
        targets: string[],
        window: IngestWindow,
        log: Logger
    ): Promise<RawItem[]> {
        const input = definition.buildInput(targets, window);
        const endTimer = actorRunDuration.startTimer({ source: definition.source });

        log.info('Starting actor run', {
            actorId: definition.actorId,
            targets: targets.length,
            start: window.start.toISOString(),
            until: window.until.toISOString(),
        });

        try {
            const run = await this.actor.call(definition.actorId, input, { maxItems: definition.maxItems });
            const items: RawItem[] = [];
            for await (const item of this.actor.iterateItems(run.datasetId)) {
                items.push(item);
            }
            log.info('Dataset read', { runId: run.runId, items: items.length });
            return items;
        } finally {
            endTimer();
        }
    }
}

/**
 * Normalized, de-duplicated query targets for one source
 */
export function collectTargets(user: UserProfile, definition: SourceDefinition): string[] {
    const targets = new Set<string>();
    for (const reference of user.references) {
        if (reference.source !== definition.source || reference.kind !== definition.referenceKind) continue;
        const target = definition.normalizeReference(reference.value);
        if (target) targets.add(target);
    }
    return [...targets];
}

function recordDiscards(source: SourceType, discards: DiscardCounts): void {
    for (const [reason, count] of Object.entries(discards)) {
        if (count > 0) {
            itemsDiscardedTotal.labels(source, reason).inc(count);
        }
    }
}

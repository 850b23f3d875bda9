/**
 * Ingest entry point: every source for one user, then one last-scraped update
 */
import { createLogger } from '../observability/logger.js';
import type { SourceDefinition } from '../sources/types.js';
import type { ContentStore } from '../storage/types.js';
import { UserNotFoundError } from '../utils/errors.js';
import type { SourceOutcome, SourcePipeline } from './pipeline.service.js';

export interface IngestTotals {
    fetched: number;
    accepted: number;
    inserted: number;
    enriched: number;
}

export interface IngestOutcome {
    userId: number;
    startedAt: Date;
    finishedAt: Date;
    sources: SourceOutcome[];
    totals: IngestTotals;
}

export class IngestService {
    constructor(
        private readonly store: ContentStore,
        private readonly pipeline: SourcePipeline,
        private readonly sources: SourceDefinition[],
        private readonly now: () => Date = () => new Date()
    ) { }

    /**
     * Sources run in registration order. An aborted source does not stop the
     * next one; a storage error stops the run before last-scraped is advanced.
     * @throws UserNotFoundError
     */
    async ingest(userId: number): Promise<IngestOutcome> {
        const log = createLogger({ userId });
        const startedAt = this.now();

        const user = await this.store.getUser(userId);
        if (!user) {
            throw new UserNotFoundError(userId);
        }

        const outcomes: SourceOutcome[] = [];
        for (const definition of this.sources) {
            outcomes.push(await this.pipeline.run(user, definition));
        }

        const finishedAt = this.now();
        await this.store.markScraped(userId, finishedAt);

        const totals = sumTotals(outcomes);
        log.info('Ingestion finished', {
            ...totals,
            durationMs: finishedAt.getTime() - startedAt.getTime(),
            aborted: outcomes.filter((o) => o.state === 'Aborted').map((o) => o.source),
        });

        return { userId, startedAt, finishedAt, sources: outcomes, totals };
    }
}

function sumTotals(outcomes: SourceOutcome[]): IngestTotals {
    return outcomes.reduce<IngestTotals>(
        (totals, o) => ({
            fetched: totals.fetched + o.fetched,
            accepted: totals.accepted + o.accepted,
            inserted: totals.inserted + o.inserted,
            enriched: totals.enriched + o.enriched,
        }),
        { fetched: 0, accepted: 0, inserted: 0, enriched: 0 }
    );
}

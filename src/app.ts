/**
 * Composition root: one set of clients per process, built from an explicit config
 */
import { createEnrichmentClient } from './ai/index.js';
import type { Config } from './config/index.js';
import { createActorRunner } from './fetchers/index.js';
import { IngestService } from './services/ingest.service.js';
import { SourcePipeline } from './services/pipeline.service.js';
import { createSources } from './sources/index.js';
import { PostgresContentStore } from './storage/index.js';

export interface AppContext {
    store: PostgresContentStore;
    ingestService: IngestService;
}

export function createAppContext(cfg: Config): AppContext {
    const store = new PostgresContentStore(cfg.databaseUrl);
    const pipeline = new SourcePipeline({
        store,
        actor: createActorRunner(cfg),
        enrichment: createEnrichmentClient(cfg),
    });

    return {
        store,
        ingestService: new IngestService(store, pipeline, createSources(cfg)),
    };
}

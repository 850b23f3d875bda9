import { describe, it, expect } from 'vitest';
import { parseConfig } from '../../src/config/index.js';
import { IngestService } from '../../src/services/ingest.service.js';
import { SourcePipeline } from '../../src/services/pipeline.service.js';
import { createSources } from '../../src/sources/index.js';
import type { NormalizedRecord, StoredRecord } from '../../src/storage/types.js';
import { ActorInvocationError, UserNotFoundError } from '../../src/utils/errors.js';
import { FakeActorRunner, InMemoryContentStore, facebookRef, makeUser, twitterRef } from '../helpers/fixtures.js';

const cfg = parseConfig({
    APIFY_TOKEN: 'test-token',
    DATABASE_URL: 'postgres://localhost/test',
    REDIS_URL: 'redis://localhost:6379',
});
const TWITTER_ACTOR = 'apidojo/tweet-scraper';
const FACEBOOK_ACTOR = 'apify/facebook-posts-scraper';
const clock = () => new Date('2024-01-10T12:00:00Z');

const tweetRow = { type: 'tweet', id: 'A', createdAt: '2024-01-10T09:00:00Z', text: 'hello' };
const postRow = { postId: 'p1', time: '2024-01-10T10:00:00Z', text: 'Opening day', pageName: 'Acme' };

function build(store: InMemoryContentStore, actor: FakeActorRunner): IngestService {
    const pipeline = new SourcePipeline({ store, actor, enrichment: null, now: clock });
    return new IngestService(store, pipeline, createSources(cfg), clock);
}

describe('IngestService.ingest', () => {
    it('runs every source in order and marks the user scraped once', async () => {
        const store = new InMemoryContentStore([makeUser([twitterRef('jo'), facebookRef('acme')])]);
        const actor = new FakeActorRunner()
            .withDataset(TWITTER_ACTOR, [tweetRow])
            .withDataset(FACEBOOK_ACTOR, [postRow]);

        const outcome = await build(store, actor).ingest(1);

        expect(actor.calls.map((c) => c.actorId)).toEqual([TWITTER_ACTOR, FACEBOOK_ACTOR]);
        expect(outcome.sources.map((s) => [s.source, s.state])).toEqual([['TWITTER', 'Done'], ['FACEBOOK', 'Done']]);
        expect(outcome.totals).toEqual({ fetched: 2, accepted: 2, inserted: 2, enriched: 0 });
        expect(store.scraped).toEqual([{ userId: 1, at: new Date('2024-01-10T12:00:00Z') }]);
        expect(outcome.finishedAt).toEqual(new Date('2024-01-10T12:00:00Z'));
    });

    it('continues with the next source after an aborted one', async () => {
        const store = new InMemoryContentStore([makeUser([twitterRef('jo'), facebookRef('acme')])]);
        const actor = new FakeActorRunner()
            .failing(TWITTER_ACTOR, new ActorInvocationError('Actor run r1 finished with status FAILED'))
            .withDataset(FACEBOOK_ACTOR, [postRow]);

        const outcome = await build(store, actor).ingest(1);

        expect(outcome.sources.map((s) => s.abortReason)).toEqual(['actor_error', null]);
        expect(outcome.totals.inserted).toBe(1);
        expect(store.scraped).toHaveLength(1);
    });

    it('marks the user scraped even when no source had references', async () => {
        const store = new InMemoryContentStore([makeUser([])]);
        const actor = new FakeActorRunner();

        const outcome = await build(store, actor).ingest(1);

        expect(outcome.sources.map((s) => s.abortReason)).toEqual(['no_references', 'no_references']);
        expect(actor.calls).toEqual([]);
        expect(store.scraped).toHaveLength(1);
    });

    it('throws for an unknown user', async () => {
        const store = new InMemoryContentStore();

        await expect(build(store, new FakeActorRunner()).ingest(42)).rejects.toBeInstanceOf(UserNotFoundError);
        expect(store.scraped).toEqual([]);
    });

    it('does not advance last-scraped when storage fails', async () => {
        class BrokenStore extends InMemoryContentStore {
            override async insertRecords(_records: NormalizedRecord[]): Promise<StoredRecord[]> {
                throw new Error('disk full');
            }
        }
        const store = new BrokenStore([makeUser([twitterRef('jo')])]);
        const actor = new FakeActorRunner().withDataset(TWITTER_ACTOR, [tweetRow]);

        await expect(build(store, actor).ingest(1)).rejects.toThrow('disk full');
        expect(store.scraped).toEqual([]);
    });
});

/**
 * In-process stand-ins for storage and the actor service
 */
import type { ActorCallOptions, ActorInput, ActorRun, ActorRunner, RawItem } from '../../src/fetchers/types.js';
import type {
    ContentStore,
    EnrichmentUpdate,
    NormalizedRecord,
    ProfileReference,
    SourceType,
    StoredRecord,
    UserProfile,
    UserSchedule,
} from '../../src/storage/types.js';

export function makeRecord(overrides: Partial<NormalizedRecord> = {}): NormalizedRecord {
    return {
        userId: 1,
        source: 'TWITTER',
        nativeId: '100',
        url: 'https://x.com/jo/status/100',
        text: 'Hello world',
        fullText: 'Hello world',
        lang: 'en',
        authorName: 'Jo Example',
        authorHandle: 'jo',
        authorAvatarUrl: '',
        mediaUrl: '',
        likeCount: 0,
        shareCount: 0,
        replyCount: 0,
        quoteCount: 0,
        publishedAt: new Date('2024-01-10T09:00:00Z'),
        rawTimestamp: '2024-01-10T09:00:00Z',
        generatedTitle: null,
        generatedSummary: null,
        ...overrides,
    };
}

export function makeUser(
    references: ProfileReference[],
    overrides: Partial<Omit<UserProfile, 'references'>> = {}
): UserProfile {
    return {
        id: 1,
        email: 'jo@example.com',
        name: 'Jo',
        preferences: {
            preferredLanguage: 'en',
            languageOverrides: {},
            scrapeIntervalMinutes: 60,
            lastScrapedAt: null,
        },
        references,
        ...overrides,
    };
}

export const twitterRef = (value: string): ProfileReference => ({ source: 'TWITTER', kind: 'profile-handle', value });
export const facebookRef = (value: string): ProfileReference => ({ source: 'FACEBOOK', kind: 'page-url', value });

export class InMemoryContentStore implements ContentStore {
    readonly users = new Map<number, UserProfile>();
    readonly records: StoredRecord[] = [];
    readonly scraped: Array<{ userId: number; at: Date }> = [];
    insertCalls = 0;
    updateCalls = 0;
    private nextId = 1;

    constructor(users: UserProfile[] = []) {
        for (const user of users) this.users.set(user.id, user);
    }

    async getUser(userId: number): Promise<UserProfile | null> {
        return this.users.get(userId) ?? null;
    }

    async listUsers(): Promise<UserSchedule[]> {
        return [...this.users.values()].map((user) => ({
            id: user.id,
            scrapeIntervalMinutes: user.preferences.scrapeIntervalMinutes,
            lastScrapedAt: user.preferences.lastScrapedAt,
        }));
    }

    async hasRecord(userId: number, source: SourceType, nativeId: string): Promise<boolean> {
        return this.records.some((r) => r.userId === userId && r.source === source && r.nativeId === nativeId);
    }

    async insertRecords(records: NormalizedRecord[]): Promise<StoredRecord[]> {
        this.insertCalls++;
        const inserted: StoredRecord[] = [];
        for (const record of records) {
            if (await this.hasRecord(record.userId, record.source, record.nativeId)) continue;
            const stored = { ...record, id: this.nextId++ };
            this.records.push(stored);
            inserted.push(stored);
        }
        return inserted;
    }

    async updateEnrichment(updates: EnrichmentUpdate[]): Promise<void> {
        this.updateCalls++;
        for (const update of updates) {
            const record = this.records.find((r) => r.id === update.id);
            if (record) {
                record.generatedTitle = update.title;
                record.generatedSummary = update.summary;
            }
        }
    }

    async markScraped(userId: number, at: Date): Promise<void> {
        this.scraped.push({ userId, at });
    }

    async ping(): Promise<boolean> {
        return true;
    }

    async close(): Promise<void> { }
}

export interface ActorCall {
    actorId: string;
    input: ActorInput;
    options?: ActorCallOptions;
}

/**
 * Returns a fixed dataset per actor id, or throws the configured error
 */
export class FakeActorRunner implements ActorRunner {
    readonly calls: ActorCall[] = [];
    private readonly datasets = new Map<string, RawItem[]>();
    private readonly failures = new Map<string, Error>();

    withDataset(actorId: string, items: RawItem[]): this {
        this.datasets.set(actorId, items);
        return this;
    }

    failing(actorId: string, error: Error): this {
        this.failures.set(actorId, error);
        return this;
    }

    async call(actorId: string, input: ActorInput, options?: ActorCallOptions): Promise<ActorRun> {
        this.calls.push({ actorId, input, options });
        const failure = this.failures.get(actorId);
        if (failure) throw failure;
        return { runId: `run-${this.calls.length}`, datasetId: actorId, status: 'SUCCEEDED' };
    }

    async *iterateItems(datasetId: string): AsyncIterable<RawItem> {
        yield* this.datasets.get(datasetId) ?? [];
    }
}

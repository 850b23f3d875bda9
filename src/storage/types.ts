/**
 * Persistence contract and the data model it carries
 */

export type SourceType = 'TWITTER' | 'FACEBOOK';

export const SOURCE_TYPES: readonly SourceType[] = ['TWITTER', 'FACEBOOK'];

export function isSourceType(value: string): value is SourceType {
    return SOURCE_TYPES.some((source) => source === value);
}

export type ReferenceKind = 'profile-handle' | 'page-url';

/**
 * A user-declared source, e.g. a Twitter handle or a Facebook page URL
 */
export interface ProfileReference {
    source: SourceType;
    kind: ReferenceKind;
    value: string;
}

export interface UserPreferences {
    preferredLanguage: string;
    languageOverrides: Partial<Record<SourceType, string>>;
    scrapeIntervalMinutes: number;
    lastScrapedAt: Date | null;
}

export interface UserProfile {
    id: number;
    email: string;
    name: string | null;
    preferences: UserPreferences;
    references: ProfileReference[];
}

/**
 * What the scheduler needs to decide whether a user is due
 */
export interface UserSchedule {
    id: number;
    scrapeIntervalMinutes: number;
    lastScrapedAt: Date | null;
}

/**
 * The persisted unit. Natural key: (userId, source, nativeId).
 */
export interface NormalizedRecord {
    userId: number;
    source: SourceType;
    nativeId: string;

    // Immutable ingestion fields
    url: string;
    text: string;
    fullText: string;
    lang: string;
    authorName: string;
    authorHandle: string;
    authorAvatarUrl: string;
    mediaUrl: string;
    likeCount: number;
    shareCount: number;
    replyCount: number;
    quoteCount: number;
    publishedAt: Date;
    rawTimestamp: string;

    // Enrichment fields, empty until the enrichment phase fills them
    generatedTitle: string | null;
    generatedSummary: string | null;
}

export interface StoredRecord extends NormalizedRecord {
    id: number;
}

export interface EnrichmentUpdate {
    id: number;
    title: string;
    summary: string;
}

/**
 * Read/write operations the pipeline needs from storage.
 * Each call is its own transaction.
 */
export interface ContentStore {
    getUser(userId: number): Promise<UserProfile | null>;
    listUsers(): Promise<UserSchedule[]>;
    hasRecord(userId: number, source: SourceType, nativeId: string): Promise<boolean>;
    /** Inserts all records atomically; rows whose key already exists are skipped. */
    insertRecords(records: NormalizedRecord[]): Promise<StoredRecord[]>;
    updateEnrichment(updates: EnrichmentUpdate[]): Promise<void>;
    markScraped(userId: number, at: Date): Promise<void>;
    ping(): Promise<boolean>;
    close(): Promise<void>;
}

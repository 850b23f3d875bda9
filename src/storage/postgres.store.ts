/**
 * PostgreSQL implementation of the content store
 */
import { readFile } from 'fs/promises';
import { resolve } from 'path';
import pg, { type Pool, type PoolClient } from 'pg';
import { logger } from '../observability/logger.js';
import { errorMessage } from '../utils/errors.js';
import {
    isSourceType,
    type ContentStore,
    type EnrichmentUpdate,
    type NormalizedRecord,
    type ProfileReference,
    type ReferenceKind,
    type SourceType,
    type StoredRecord,
    type UserProfile,
    type UserSchedule,
} from './types.js';

const SCHEMA_FILE = 'sql/schema.sql';

interface UserRow {
    id: number;
    email: string;
    name: string | null;
    preferred_language: string;
    twitter_language: string | null;
    facebook_language: string | null;
    scrape_interval_minutes: number;
    last_scraped_at: Date | null;
}

interface ReferenceRow {
    source: string;
    kind: string;
    value: string;
}

interface IdRow {
    id: number;
}

function isReferenceKind(value: string): value is ReferenceKind {
    return value === 'profile-handle' || value === 'page-url';
}

function toReference(row: ReferenceRow): ProfileReference | null {
    const { source, kind, value } = row;
    if (!isSourceType(source) || !isReferenceKind(kind)) {
        return null;
    }
    return { source, kind, value };
}

function toUserProfile(row: UserRow, references: ProfileReference[]): UserProfile {
    const languageOverrides: Partial<Record<SourceType, string>> = {};
    if (row.twitter_language) languageOverrides.TWITTER = row.twitter_language;
    if (row.facebook_language) languageOverrides.FACEBOOK = row.facebook_language;

    return {
        id: row.id,
        email: row.email,
        name: row.name,
        preferences: {
            preferredLanguage: row.preferred_language,
            languageOverrides,
            scrapeIntervalMinutes: row.scrape_interval_minutes,
            lastScrapedAt: row.last_scraped_at,
        },
        references,
    };
}

const INSERT_RECORD_SQL = `
    INSERT INTO ingested_record (
        user_id, source, native_id, url, text, full_text, lang,
        author_name, author_handle, author_avatar_url, media_url,
        like_count, share_count, reply_count, quote_count,
        published_at, raw_timestamp, generated_title, generated_summary
    ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12, $13, $14, $15, $16, $17, $18, $19)
    ON CONFLICT (user_id, source, native_id) DO NOTHING
    RETURNING id`;

function insertParams(record: NormalizedRecord): unknown[] {
    return [
        record.userId,
        record.source,
        record.nativeId,
        record.url,
        record.text,
        record.fullText,
        record.lang,
        record.authorName,
        record.authorHandle,
        record.authorAvatarUrl,
        record.mediaUrl,
        record.likeCount,
        record.shareCount,
        record.replyCount,
        record.quoteCount,
        record.publishedAt,
        record.rawTimestamp,
        record.generatedTitle,
        record.generatedSummary,
    ];
}

export class PostgresContentStore implements ContentStore {
    private readonly pool: Pool;

    constructor(connectionString: string) {
        this.pool = new pg.Pool({ connectionString });
        this.pool.on('error', (error) => {
            logger.error('Idle database client error', error);
        });
    }

    /**
     * Apply sql/schema.sql (idempotent)
     */
    async ensureSchema(): Promise<void> {
        const sql = await readFile(resolve(process.cwd(), SCHEMA_FILE), 'utf8');
        await this.pool.query(sql);
        logger.info('Database schema ensured');
    }

    async getUser(userId: number): Promise<UserProfile | null> {
        const users = await this.pool.query<UserRow>(
            `SELECT id, email, name, preferred_language, twitter_language, facebook_language,
                    scrape_interval_minutes, last_scraped_at
             FROM app_user WHERE id = $1`,
            [userId]
        );
        const row = users.rows[0];
        if (!row) return null;

        const refs = await this.pool.query<ReferenceRow>(
            'SELECT source, kind, value FROM profile_reference WHERE user_id = $1 ORDER BY id',
            [userId]
        );
        const references: ProfileReference[] = [];
        for (const refRow of refs.rows) {
            const reference = toReference(refRow);
            if (reference) {
                references.push(reference);
            } else {
                logger.warn('Ignoring profile reference with unknown source or kind', { userId, ...refRow });
            }
        }

        return toUserProfile(row, references);
    }

    async listUsers(): Promise<UserSchedule[]> {
        const result = await this.pool.query<Pick<UserRow, 'id' | 'scrape_interval_minutes' | 'last_scraped_at'>>(
            'SELECT id, scrape_interval_minutes, last_scraped_at FROM app_user ORDER BY id'
        );
        return result.rows.map((row) => ({
            id: row.id,
            scrapeIntervalMinutes: row.scrape_interval_minutes,
            lastScrapedAt: row.last_scraped_at,
        }));
    }

    async hasRecord(userId: number, source: SourceType, nativeId: string): Promise<boolean> {
        const result = await this.pool.query(
            'SELECT 1 FROM ingested_record WHERE user_id = $1 AND source = $2 AND native_id = $3 LIMIT 1',
            [userId, source, nativeId]
        );
        return (result.rowCount ?? 0) > 0;
    }

    async insertRecords(records: NormalizedRecord[]): Promise<StoredRecord[]> {
        if (records.length === 0) return [];

        return this.transaction(async (client) => {
            const stored: StoredRecord[] = [];
            for (const record of records) {
                const result = await client.query<IdRow>(INSERT_RECORD_SQL, insertParams(record));
                const row = result.rows[0];
                if (row) {
                    stored.push({ ...record, id: row.id });
                }
            }
            return stored;
        });
    }

    async updateEnrichment(updates: EnrichmentUpdate[]): Promise<void> {
        if (updates.length === 0) return;

        await this.transaction(async (client) => {
            for (const update of updates) {
                await client.query(
                    'UPDATE ingested_record SET generated_title = $2, generated_summary = $3 WHERE id = $1',
                    [update.id, update.title, update.summary]
                );
            }
        });
    }

    async markScraped(userId: number, at: Date): Promise<void> {
        await this.pool.query('UPDATE app_user SET last_scraped_at = $2 WHERE id = $1', [userId, at]);
    }

    async ping(): Promise<boolean> {
        try {
            await this.pool.query('SELECT 1');
            return true;
        } catch (error) {
            logger.warn('Database ping failed', { error: errorMessage(error) });
            return false;
        }
    }

    async close(): Promise<void> {
        await this.pool.end();
    }

    private async transaction<T>(fn: (client: PoolClient) => Promise<T>): Promise<T> {
        const client = await this.pool.connect();
        try {
            await client.query('BEGIN');
            const result = await fn(client);
            await client.query('COMMIT');
            return result;
        } catch (error) {
            await client.query('ROLLBACK');
            throw error;
        } finally {
            client.release();
        }
    }
}

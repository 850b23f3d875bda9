/**
 * Enrichment Client
 *
 * Builds a localized prompt for one stored record, sends it to the chat
 * service exactly once and splits the reply into a title and a summary.
 * Failures never throw: the caller gets a `failed` result and the record's
 * enrichment fields stay empty. The client holds no state between calls, so
 * one record's failure has no bearing on any other record or run.
 */
import type { Config } from '../config/index.js';
import { logger } from '../observability/logger.js';
import type { NormalizedRecord } from '../storage/types.js';
import { errorMessage } from '../utils/errors.js';
import { createChatClient, type ChatClient } from './chat.js';
import { languageName } from './languages.js';
import type { PromptTemplate } from './prompts/types.js';

export type EnrichmentResult =
    | { status: 'enriched'; title: string; summary: string }
    | { status: 'failed'; error: string };

export interface EnrichmentRequest {
    record: NormalizedRecord;
    template: PromptTemplate;
    /** ISO code of the output language */
    languageCode: string;
    fallbackAuthor: string;
}

export class EnrichmentClient {
    constructor(private readonly chat: ChatClient) { }

    async enrich({ record, template, languageCode, fallbackAuthor }: EnrichmentRequest): Promise<EnrichmentResult> {
        const prompt = template.buildPrompt(record, {
            languageName: languageName(languageCode),
            fallbackAuthor,
        });

        try {
            const reply = await this.chat.complete({ prompt, temperature: template.temperature });
            const { title, summary } = template.parseReply(reply);
            return { status: 'enriched', title, summary };
        } catch (error) {
            logger.error('Enrichment failed', error, {
                source: record.source,
                nativeId: record.nativeId,
            });
            return { status: 'failed', error: errorMessage(error) };
        }
    }
}

/**
 * Null when no API key is configured; the enrichment phase is then skipped.
 */
export function createEnrichmentClient(cfg: Config): EnrichmentClient | null {
    if (!cfg.openaiApiKey) {
        return null;
    }

    return new EnrichmentClient(createChatClient(cfg.openaiApiKey, cfg.chatgptModel));
}

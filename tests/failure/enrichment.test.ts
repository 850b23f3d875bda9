/**
 * Failure Scenario Tests
 * How enrichment degrades when the chat service misbehaves
 */
import { describe, it, expect, vi } from 'vitest';
import { EnrichmentClient } from '../../src/ai/enrichment.js';
import { twitterPrompt } from '../../src/ai/prompts/twitter.prompt.js';
import type { ChatClient } from '../../src/ai/chat.js';
import { EnrichmentTransportError } from '../../src/utils/errors.js';
import { makeRecord } from '../helpers/fixtures.js';

describe('Enrichment failures', () => {
    function setup(complete: ChatClient['complete']) {
        const chat: ChatClient = { complete: vi.fn(complete) };
        return { chat, client: new EnrichmentClient(chat) };
    }

    const request = {
        record: makeRecord({ nativeId: '1' }),
        template: twitterPrompt,
        languageCode: 'en',
        fallbackAuthor: 'Jo',
    };

    it('reports a transport error as a failed result instead of throwing', async () => {
        const { client } = setup(async () => {
            throw new EnrichmentTransportError('Chat completion failed: 503');
        });

        const result = await client.enrich(request);

        expect(result).toEqual({ status: 'failed', error: 'Chat completion failed: 503' });
    });

    it('reports a non-Error rejection by its string form', async () => {
        const { client } = setup(() => Promise.reject('socket hang up'));

        expect(await client.enrich(request)).toEqual({ status: 'failed', error: 'socket hang up' });
    });

    it('calls the chat service once per request, however many failed before', async () => {
        const { chat, client } = setup(async () => {
            throw new EnrichmentTransportError('down');
        });

        for (let i = 0; i < 8; i++) {
            await client.enrich(request);
        }

        expect(chat.complete).toHaveBeenCalledTimes(8);
    });

    it('recovers on the next call once the service answers again', async () => {
        let healthy = false;
        const { client } = setup(async () => {
            if (!healthy) throw new EnrichmentTransportError('down');
            return 'Summary\nPost Title: [Back]';
        });

        const first = await client.enrich(request);
        healthy = true;
        const second = await client.enrich(request);

        expect(first.status).toBe('failed');
        expect(second).toEqual({ status: 'enriched', title: 'Back', summary: 'Summary' });
    });
});

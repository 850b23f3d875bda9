import { describe, it, expect } from 'vitest';
import { languageName } from '../../src/ai/languages.js';
import { facebookPrompt } from '../../src/ai/prompts/facebook.prompt.js';
import { twitterPrompt } from '../../src/ai/prompts/twitter.prompt.js';
import { makeRecord } from '../helpers/fixtures.js';

const context = { languageName: 'German', fallbackAuthor: 'Jo' };

describe('languageName', () => {
    it('resolves known codes and falls back to English', () => {
        expect(languageName('de')).toBe('German');
        expect(languageName('DE')).toBe('German');
        expect(languageName('zh-CN')).toBe('Chinese (Simplified)');
        expect(languageName('xx')).toBe('English');
        expect(languageName(null)).toBe('English');
        expect(languageName('')).toBe('English');
    });
});

describe('twitterPrompt', () => {
    it('names the author and ends with the original text', () => {
        const prompt = twitterPrompt.buildPrompt(makeRecord(), context);

        expect(prompt).toContain("Start by saying: 'In the latest tweet from (Jo Example)...'.");
        expect(prompt).toContain('readable in German');
        expect(prompt.endsWith('\n\nOriginal Tweet: Hello world')).toBe(true);
    });

    it('falls back to the handle, then to the user', () => {
        const byHandle = twitterPrompt.buildPrompt(makeRecord({ authorName: '' }), context);
        const byUser = twitterPrompt.buildPrompt(makeRecord({ authorName: '', authorHandle: '' }), context);

        expect(byHandle).toContain('(jo)');
        expect(byUser).toContain('(Jo)');
    });

    it('splits the reply at the title marker', () => {
        const reply = 'In the latest tweet from (Jo)...\nIt matters.\nPost Title: [Big News]\ntrailing';

        expect(twitterPrompt.parseReply(reply)).toEqual({
            title: 'Big News',
            summary: 'In the latest tweet from (Jo)...\nIt matters.',
        });
    });

    it('returns Untitled when the marker is missing or empty', () => {
        expect(twitterPrompt.parseReply('  just a summary  ')).toEqual({ title: 'Untitled', summary: 'just a summary' });
        expect(twitterPrompt.parseReply('Body\nPost Title:   ')).toEqual({ title: 'Untitled', summary: 'Body' });
    });

    it('keeps a title written without brackets', () => {
        expect(twitterPrompt.parseReply('Body\nPost Title: Plain title').title).toBe('Plain title');
    });
});

describe('facebookPrompt', () => {
    it('uses the page name and quotes the original post', () => {
        const record = makeRecord({ source: 'FACEBOOK', authorName: 'Acme', text: 'Opening day' });
        const prompt = facebookPrompt.buildPrompt(record, context);

        expect(prompt).toContain('\nLatest Facebook post from "Acme"\n');
        expect(prompt).toContain('Create an expanded article in German');
        expect(prompt.endsWith('Original Post:\n"Opening day"')).toBe(true);
    });

    it('falls back to the user when the page has no name', () => {
        const prompt = facebookPrompt.buildPrompt(makeRecord({ authorName: '' }), context);

        expect(prompt).toContain('Latest Facebook post from "Jo"');
    });

    it('takes the title line and the article body', () => {
        const reply = [
            'Latest Facebook post from "Acme"',
            '',
            'Title: Acme: Opening day',
            '',
            'Article:',
            'Acme opened its doors.',
            '',
            'Original Post:',
            '"Opening day"',
        ].join('\n');

        expect(facebookPrompt.parseReply(reply)).toEqual({
            title: 'Acme: Opening day',
            summary: 'Acme opened its doors.',
        });
    });

    it('returns Untitled when the title line is missing or unterminated', () => {
        expect(facebookPrompt.parseReply('A plain reply')).toEqual({ title: 'Untitled', summary: 'A plain reply' });
        expect(facebookPrompt.parseReply('Title: cut off')).toEqual({ title: 'Untitled', summary: 'Title: cut off' });
    });

    it('keeps everything after the title when there is no original section', () => {
        expect(facebookPrompt.parseReply('Title: T\nArticle: Body text')).toEqual({ title: 'T', summary: 'Body text' });
    });
});

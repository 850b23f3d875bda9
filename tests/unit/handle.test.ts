import { describe, it, expect } from 'vitest';
import { normalizeHandle, normalizePageUrl } from '../../src/normalizers/handle.js';

describe('normalizeHandle', () => {
    it('gives the same identifier for bare, @-prefixed and URL forms', () => {
        expect(normalizeHandle('@user')).toBe('user');
        expect(normalizeHandle('https://service/user')).toBe('user');
        expect(normalizeHandle('user')).toBe('user');
    });

    it('takes the first path segment of a status URL', () => {
        expect(normalizeHandle('https://x.com/SomeUser/status/1729')).toBe('SomeUser');
    });

    it('drops an @ inside the URL path', () => {
        expect(normalizeHandle('https://twitter.com/@jo')).toBe('jo');
    });

    it('strips only one leading @', () => {
        expect(normalizeHandle('@@jo')).toBe('@jo');
    });

    it('passes case through', () => {
        expect(normalizeHandle('@NASA')).toBe('NASA');
    });

    it.each(['', '   ', '@', 'https://x.com/'])('rejects %j', (raw) => {
        expect(normalizeHandle(raw)).toBeNull();
    });
});

describe('normalizePageUrl', () => {
    it('passes URLs through', () => {
        expect(normalizePageUrl(' https://www.facebook.com/acme ')).toBe('https://www.facebook.com/acme');
    });

    it('resolves bare and @ names against the page host', () => {
        expect(normalizePageUrl('acme')).toBe('https://www.facebook.com/acme');
        expect(normalizePageUrl('@acme')).toBe('https://www.facebook.com/acme');
    });

    it('encodes names with spaces', () => {
        expect(normalizePageUrl('Acme Corp')).toBe('https://www.facebook.com/Acme%20Corp');
    });

    it('rejects empty input', () => {
        expect(normalizePageUrl('  ')).toBeNull();
        expect(normalizePageUrl(null)).toBeNull();
    });
});

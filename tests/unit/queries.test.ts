import { describe, it, expect } from 'vitest';
import {
    buildDirectHandlesInput,
    buildSearchTerms,
    buildSearchTermsInput,
    buildStartUrlsInput,
} from '../../src/fetchers/queries.js';

const window = {
    start: new Date('2024-01-04T00:00:00Z'),
    until: new Date('2024-01-11T00:00:00Z'),
};

describe('buildSearchTerms', () => {
    it('encodes the window as since/until dates, until exclusive', () => {
        expect(buildSearchTerms(['jo', 'sam'], window)).toEqual([
            'from:jo since:2024-01-04 until:2024-01-11',
            'from:sam since:2024-01-04 until:2024-01-11',
        ]);
    });

    it('appends the extra query when set', () => {
        expect(buildSearchTerms(['jo'], window, ' -filter:replies ')).toEqual([
            'from:jo since:2024-01-04 until:2024-01-11 -filter:replies',
        ]);
    });
});

describe('actor inputs', () => {
    it('builds search-term input', () => {
        expect(buildSearchTermsInput(['jo'], window, { maxItems: 50 })).toEqual({
            searchTerms: ['from:jo since:2024-01-04 until:2024-01-11'],
            sort: 'Latest',
            maxItems: 50,
        });
    });

    it('builds direct-handle input', () => {
        expect(buildDirectHandlesInput(['jo'], window, 50)).toEqual({
            twitterHandles: ['jo'],
            start: '2024-01-04',
            end: '2024-01-11',
            sort: 'Latest',
            maxItems: 50,
        });
    });

    it('builds start-URL input with the lower bound only', () => {
        expect(buildStartUrlsInput(['https://www.facebook.com/acme'], window, 3)).toEqual({
            startUrls: [{ url: 'https://www.facebook.com/acme' }],
            resultsLimit: 3,
            onlyPostsNewerThan: '2024-01-04',
            proxy: { useApifyProxy: true, apifyProxyGroups: ['RESIDENTIAL'] },
        });
    });
});

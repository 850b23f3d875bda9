/**
 * Actor input builders
 *
 * Search-term mode encodes the window into one query string per profile.
 * Direct-target mode passes the targets and the window as structured fields.
 */
import { formatWindowDate, type IngestWindow } from '../services/window.js';
import type { ActorInput } from './types.js';

export interface SearchTermsOptions {
    maxItems: number;
    extraQuery?: string;
}

/**
 * One "from:<id> since:<start> until:<until>" term per handle; `until` is exclusive.
 */
export function buildSearchTerms(handles: string[], window: IngestWindow, extraQuery = ''): string[] {
    const since = formatWindowDate(window.start);
    const until = formatWindowDate(window.until);
    const extra = extraQuery.trim();

    return handles.map((handle) => {
        const term = `from:${handle} since:${since} until:${until}`;
        return extra ? `${term} ${extra}` : term;
    });
}

export function buildSearchTermsInput(
    handles: string[],
    window: IngestWindow,
    options: SearchTermsOptions
): ActorInput {
    return {
        searchTerms: buildSearchTerms(handles, window, options.extraQuery),
        sort: 'Latest',
        maxItems: options.maxItems,
    };
}

export function buildDirectHandlesInput(
    handles: string[],
    window: IngestWindow,
    maxItems: number
): ActorInput {
    return {
        twitterHandles: handles,
        start: formatWindowDate(window.start),
        end: formatWindowDate(window.until),
        sort: 'Latest',
        maxItems,
    };
}

export function buildStartUrlsInput(
    urls: string[],
    window: IngestWindow,
    resultsLimit: number
): ActorInput {
    return {
        startUrls: urls.map((url) => ({ url })),
        resultsLimit,
        onlyPostsNewerThan: formatWindowDate(window.start),
        proxy: {
            useApifyProxy: true,
            apifyProxyGroups: ['RESIDENTIAL'],
        },
    };
}

/**
 * Ingest window: a half-open UTC interval [start, until) of whole days
 */

const DAY_MS = 24 * 60 * 60 * 1000;

export interface IngestWindow {
    start: Date;
    until: Date;
}

/**
 * `until` is the UTC midnight after `now`, so today's posts are inside;
 * `start` is `lookbackDays` whole days earlier.
 */
export function computeWindow(now: Date, lookbackDays: number): IngestWindow {
    const until = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate() + 1);
    return {
        start: new Date(until - lookbackDays * DAY_MS),
        until: new Date(until),
    };
}

export function isWithinWindow(window: IngestWindow, instant: Date): boolean {
    const time = instant.getTime();
    return window.start.getTime() <= time && time < window.until.getTime();
}

/**
 * Calendar date (YYYY-MM-DD, UTC) for actor queries
 */
export function formatWindowDate(date: Date): string {
    return date.toISOString().slice(0, 10);
}

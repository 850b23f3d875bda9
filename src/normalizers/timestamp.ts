/**
 * Timestamp Normalizer
 * Turns whatever timestamp shape an actor returns into a UTC instant.
 */
import { isValid, parse, parseISO } from 'date-fns';

const ISO_SHAPE = /^\d{4}-\d{2}-\d{2}(?:[T ]\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)?(?:Z|[+-]\d{2}(?::?\d{2})?)?$/i;
const HAS_TIME = /[T ]\d{2}:\d{2}/;
const HAS_OFFSET = /(?:Z|[+-]\d{2}(?::?\d{2})?)$/i;
const EPOCH_DIGITS = /^\d{9,13}$/;

// Layouts carrying their own numeric offset
const OFFSET_LAYOUTS = [
    'EEE MMM d HH:mm:ss xx yyyy',     // Fri Nov 24 17:49:36 +0000 2023
    'EEE, d MMM yyyy HH:mm:ss xx',    // Fri, 24 Nov 2023 17:49:36 +0000
    'd MMM yyyy HH:mm:ss xx',
    'MMMM d, yyyy HH:mm:ss xx',
    'EEEE, MMMM d, yyyy HH:mm:ss xx',
    'yyyy-MM-dd HH:mm:ss xx',
];

// Layouts without an offset; read as UTC
const NAIVE_LAYOUTS = [
    'EEE MMM d HH:mm:ss yyyy',
    'EEE, d MMM yyyy HH:mm:ss',
    'd MMM yyyy HH:mm:ss',
    'MMMM d, yyyy HH:mm:ss',          // Nov 24, 2023 17:49:36 (MMMM also takes short names)
    'EEEE, MMMM d, yyyy HH:mm:ss',    // Friday, November 24, 2023 17:49:36
    'EEEE, MMMM d, yyyy',
    'yyyy/MM/dd HH:mm:ss',
    'yyyy/MM/dd',
    'MM/dd/yyyy HH:mm:ss',
    'MM/dd/yyyy',
    'MMMM d, yyyy h:mm a',
    'MMMM d, yyyy',
    'd MMMM yyyy',
];

const REFERENCE_DATE = new Date(0);

function fromEpoch(value: number): Date | null {
    if (!Number.isFinite(value) || value <= 0) return null;
    const date = new Date(value >= 1e12 ? value : value * 1000);
    return isValid(date) ? date : null;
}

function parseIsoUtc(raw: string): Date | null {
    if (!ISO_SHAPE.test(raw)) return null;

    let value = raw.replace(/Z$/i, '+00:00');
    if (!HAS_TIME.test(value)) {
        value = `${value.slice(0, 10)}T00:00:00${value.slice(10)}`;
    }
    if (!HAS_OFFSET.test(value)) {
        value = `${value}+00:00`;
    }

    const date = parseISO(value);
    return isValid(date) ? date : null;
}

function parseLayouts(raw: string): Date | null {
    const value = raw.replace(/\s+(?:GMT|UTC)$/i, ' +0000');

    for (const layout of OFFSET_LAYOUTS) {
        const date = parse(value, layout, REFERENCE_DATE);
        if (isValid(date)) return date;
    }

    for (const layout of NAIVE_LAYOUTS) {
        const date = parse(`${value} +0000`, `${layout} xx`, REFERENCE_DATE);
        if (isValid(date)) return date;
    }

    return null;
}

/**
 * Normalize a raw timestamp to a UTC instant.
 * Order: ISO-8601 (Z read as +00:00), then the known layouts above.
 * A value without an offset is taken to be UTC. Returns null when nothing parses.
 */
export function normalizeTimestamp(raw: unknown): Date | null {
    if (typeof raw === 'number') return fromEpoch(raw);
    if (typeof raw !== 'string') return null;

    const value = raw.trim();
    if (!value) return null;

    if (EPOCH_DIGITS.test(value)) return fromEpoch(Number(value));

    return parseIsoUtc(value) ?? parseLayouts(value);
}

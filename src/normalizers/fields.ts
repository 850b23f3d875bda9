/**
 * Lenient readers for actor rows. Malformed values collapse to '' or 0,
 * and each collapse of a present-but-malformed structure is noted on the trail.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function asString(value: unknown): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' && Number.isFinite(value)) return String(value);
    return '';
}

/**
 * Numeric ids above 2^53 have already lost digits in JSON.parse, so they read as missing
 */
export function asId(value: unknown): string {
    if (typeof value === 'number' && !Number.isSafeInteger(value)) return '';
    return asString(value);
}

/** Upper bound of the INTEGER count columns */
export const MAX_COUNT = 2_147_483_647;

export function asCount(value: unknown): number {
    const n = typeof value === 'string' && value.trim() !== '' ? Number(value) : value;
    if (typeof n !== 'number' || !Number.isFinite(n) || n < 0) return 0;
    return Math.min(Math.trunc(n), MAX_COUNT);
}

/**
 * First non-empty string among the candidates
 */
export function firstString(...values: unknown[]): string {
    for (const value of values) {
        const s = asString(value);
        if (s) return s;
    }
    return '';
}

export class FieldTrail {
    readonly degraded: string[] = [];

    /**
     * Nested object under `field`, or an empty object if absent or malformed
     */
    object(value: unknown, field: string): Record<string, unknown> {
        if (value === undefined || value === null) return {};
        if (isRecord(value)) return value;
        this.degraded.push(field);
        return {};
    }

    /**
     * First element of the list under `field` when it is an object
     */
    firstOf(value: unknown, field: string): Record<string, unknown> {
        if (value === undefined || value === null) return {};
        if (!Array.isArray(value)) {
            this.degraded.push(field);
            return {};
        }
        if (value.length === 0) return {};
        return this.object(value[0], `${field}[0]`);
    }
}

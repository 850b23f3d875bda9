/**
 * Window & Dedup Filter
 * Decides which raw actor rows become new records, in arrival order.
 */
import type { RawItem } from '../fetchers/types.js';
import { normalizeTimestamp } from '../normalizers/timestamp.js';
import type { AcceptedItem, RecordMapper } from '../normalizers/types.js';
import { isWithinWindow, type IngestWindow } from './window.js';

export type DiscardReason = 'demo' | 'wrong_type' | 'missing' | 'out_of_window' | 'duplicate';

export type DiscardCounts = Record<DiscardReason, number>;

export interface FilterResult {
    fetched: number;
    accepted: AcceptedItem[];
    discards: DiscardCounts;
}

/**
 * Resolves whether a native id is already stored for the current user and source
 */
export type KeyExistsOracle = (nativeId: string) => Promise<boolean>;

const DEMO_MARKER = 'demo';
const TYPE_TAG = 'type';

export function emptyDiscards(): DiscardCounts {
    return { demo: 0, wrong_type: 0, missing: 0, out_of_window: 0, duplicate: 0 };
}

/**
 * Restricted-plan stub rows carry only the marker, optionally with a type tag
 */
export function isDemoItem(item: RawItem): boolean {
    const keys = Object.keys(item);
    if (!keys.includes(DEMO_MARKER)) return false;
    return keys.length === 1 || (keys.length === 2 && keys.includes(TYPE_TAG));
}

function timestampText(raw: unknown): string {
    if (typeof raw === 'string') return raw.trim();
    if (typeof raw === 'number' && Number.isFinite(raw)) return String(raw);
    return '';
}

/**
 * Keep rows that are real content of the expected type, carry an id and a
 * parseable timestamp inside [start, until), and are not already stored.
 * A repeated id within the same dataset counts as a duplicate.
 */
export async function filterItems(
    items: AsyncIterable<RawItem> | Iterable<RawItem>,
    window: IngestWindow,
    mapper: Pick<RecordMapper, 'expectedItemType' | 'extractKey'>,
    exists: KeyExistsOracle
): Promise<FilterResult> {
    const discards = emptyDiscards();
    const accepted: AcceptedItem[] = [];
    const seen = new Set<string>();
    let fetched = 0;

    for await (const item of items) {
        fetched++;

        if (isDemoItem(item)) {
            discards.demo++;
            continue;
        }

        const type = item[TYPE_TAG];
        if (mapper.expectedItemType !== null && type && type !== mapper.expectedItemType) {
            discards.wrong_type++;
            continue;
        }

        const { nativeId, rawTimestamp } = mapper.extractKey(item);
        const rawText = timestampText(rawTimestamp);
        if (!nativeId || !rawText) {
            discards.missing++;
            continue;
        }

        const publishedAt = normalizeTimestamp(rawTimestamp);
        if (!publishedAt) {
            discards.missing++;
            continue;
        }

        if (!isWithinWindow(window, publishedAt)) {
            discards.out_of_window++;
            continue;
        }

        if (seen.has(nativeId) || await exists(nativeId)) {
            discards.duplicate++;
            continue;
        }

        seen.add(nativeId);
        accepted.push({ item, nativeId, publishedAt, rawTimestamp: rawText });
    }

    return { fetched, accepted, discards };
}

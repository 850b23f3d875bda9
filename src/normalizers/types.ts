/**
 * Normalizer types and interfaces
 */
import type { RawItem } from '../fetchers/types.js';
import type { NormalizedRecord } from '../storage/types.js';

/**
 * Native id and timestamp as found on a raw row, before validation
 */
export interface ExtractedKey {
    nativeId: string;
    rawTimestamp: unknown;
}

/**
 * A raw row that passed the window and dedup filter
 */
export interface AcceptedItem {
    item: RawItem;
    nativeId: string;
    publishedAt: Date;
    rawTimestamp: string;
}

export interface MappedRecord {
    record: NormalizedRecord;
    /** Fields whose source structure was present but malformed */
    degradedFields: string[];
}

/**
 * Source-specific field extraction
 */
export interface RecordMapper {
    /** Type tag real content rows carry; rows tagged otherwise are dropped. Null disables the check. */
    expectedItemType: string | null;
    extractKey(item: RawItem): ExtractedKey;
    mapRecord(accepted: AcceptedItem, userId: number): MappedRecord;
}

/**
 * Record mapper registry
 */
import type { SourceType } from '../storage/types.js';
import type { RecordMapper } from './types.js';

import { twitterNormalizer } from './twitter.normalizer.js';
import { facebookNormalizer } from './facebook.normalizer.js';

const mappersBySource: ReadonlyMap<SourceType, RecordMapper> = new Map<SourceType, RecordMapper>([
    ['TWITTER', twitterNormalizer],
    ['FACEBOOK', facebookNormalizer],
]);

export function getRecordMapper(source: SourceType): RecordMapper {
    const mapper = mappersBySource.get(source);
    if (!mapper) {
        throw new Error(`No record mapper registered for source ${source}`);
    }
    return mapper;
}

export { normalizeTimestamp } from './timestamp.js';
export { normalizeHandle, normalizePageUrl } from './handle.js';
export * from './types.js';

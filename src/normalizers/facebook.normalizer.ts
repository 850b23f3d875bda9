/**
 * Facebook Record Mapper
 * Maps facebook-posts-scraper rows to NormalizedRecord
 */
import type { RawItem } from '../fetchers/types.js';
import { asCount, asString, FieldTrail, firstString, isRecord } from './fields.js';
import type { AcceptedItem, ExtractedKey, MappedRecord, RecordMapper } from './types.js';

function extractPageName(item: RawItem, trail: FieldTrail): string {
    const value = item.pageName;
    if (typeof value === 'string') return value;
    if (value === undefined || value === null) return '';
    if (isRecord(value)) return asString(value.name);
    trail.degraded.push('pageName');
    return '';
}

function extractThumbnail(item: RawItem, trail: FieldTrail): string {
    const media = trail.firstOf(item.media, 'media');
    const photo = trail.object(media.photo_image, 'media[0].photo_image');
    return firstString(media.thumbnail, photo.uri);
}

export const facebookNormalizer: RecordMapper = {
    expectedItemType: null,

    extractKey(item: RawItem): ExtractedKey {
        return {
            nativeId: firstString(item.postId, item.id),
            rawTimestamp: item.time || item.timestamp || '',
        };
    },

    mapRecord(accepted: AcceptedItem, userId: number): MappedRecord {
        const { item, nativeId } = accepted;
        const trail = new FieldTrail();
        const user = trail.object(item.user, 'user');
        const text = asString(item.text);

        return {
            record: {
                userId,
                source: 'FACEBOOK',
                nativeId,

                url: firstString(item.url, item.facebookUrl, item.topLevelUrl),
                text,
                fullText: text,
                lang: '',
                authorName: extractPageName(item, trail),
                authorHandle: asString(user.id),
                authorAvatarUrl: asString(user.profilePic),
                mediaUrl: extractThumbnail(item, trail),
                likeCount: asCount(item.likes),
                shareCount: asCount(item.shares),
                replyCount: asCount(item.comments),
                quoteCount: 0,
                publishedAt: accepted.publishedAt,
                rawTimestamp: accepted.rawTimestamp,

                generatedTitle: null,
                generatedSummary: null,
            },
            degradedFields: trail.degraded,
        };
    },
};

/**
 * Twitter Record Mapper
 * Maps tweet-scraper rows to NormalizedRecord
 */
import type { RawItem } from '../fetchers/types.js';
import { asCount, asId, asString, FieldTrail, firstString } from './fields.js';
import type { AcceptedItem, ExtractedKey, MappedRecord, RecordMapper } from './types.js';

function extractKey(item: RawItem): ExtractedKey {
    const trail = new FieldTrail();
    const legacy = trail.object(item.legacy, 'legacy');
    const tweet = trail.object(item.tweet, 'tweet');

    return {
        nativeId: firstString(item.id_str, asId(item.id)),
        rawTimestamp: item.createdAt || item.created_at || legacy.created_at || tweet.createdAt || tweet.created_at || '',
    };
}

function extractAuthor(item: RawItem, trail: FieldTrail) {
    const author = trail.object(item.author, 'author');
    let name = asString(author.name);
    let handle = firstString(author.userName, author.username);
    let avatar = asString(author.profilePicture);

    if (!handle && item.user !== undefined) {
        const user = trail.object(item.user, 'user');
        handle = asString(user.screen_name);
        name = name || asString(user.name);
        avatar = avatar || asString(user.profile_image_url_https);
    }

    return { name, handle, avatar };
}

function extractPhotoUrl(item: RawItem, trail: FieldTrail): string {
    const entities = trail.object(item.entities, 'entities');
    const media = trail.firstOf(entities.media, 'entities.media');
    if (Object.keys(media).length > 0) {
        return firstString(media.media_url_https, media.media_url);
    }

    const extended = trail.object(item.extendedEntities ?? item.extended_entities, 'extendedEntities');
    const extendedMedia = trail.firstOf(extended.media, 'extendedEntities.media');
    return firstString(extendedMedia.media_url_https, extendedMedia.media_url);
}

export const twitterNormalizer: RecordMapper = {
    expectedItemType: 'tweet',
    extractKey,

    mapRecord(accepted: AcceptedItem, userId: number): MappedRecord {
        const { item, nativeId } = accepted;
        const trail = new FieldTrail();
        const author = extractAuthor(item, trail);
        const fullText = firstString(item.fullText, item.text);

        const url = firstString(item.url, item.twitterUrl)
            || (author.handle ? `https://x.com/${author.handle}/status/${nativeId}` : '');

        return {
            record: {
                userId,
                source: 'TWITTER',
                nativeId,

                url,
                text: fullText.trim(),
                fullText,
                lang: asString(item.lang),
                authorName: author.name,
                authorHandle: author.handle,
                authorAvatarUrl: author.avatar,
                mediaUrl: extractPhotoUrl(item, trail),
                likeCount: asCount(item.likeCount),
                shareCount: asCount(item.retweetCount),
                replyCount: asCount(item.replyCount),
                quoteCount: asCount(item.quoteCount),
                publishedAt: accepted.publishedAt,
                rawTimestamp: accepted.rawTimestamp,

                generatedTitle: null,
                generatedSummary: null,
            },
            degradedFields: trail.degraded,
        };
    },
};

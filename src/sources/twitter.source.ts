import { twitterPrompt } from '../ai/prompts/twitter.prompt.js';
import type { Config } from '../config/index.js';
import { buildDirectHandlesInput, buildSearchTermsInput } from '../fetchers/queries.js';
import { getRecordMapper, normalizeHandle } from '../normalizers/index.js';
import type { SourceDefinition } from './types.js';

/**
 * Profile handles. Direct-target input unless search terms are switched on.
 */
export function createTwitterSource(cfg: Config): SourceDefinition {
    return {
        source: 'TWITTER',
        referenceKind: 'profile-handle',
        actorId: cfg.twitterActorId,
        lookbackDays: cfg.twitterSinceDays,
        maxItems: cfg.twitterMaxItems,
        normalizeReference: normalizeHandle,
        buildInput: (handles, window) =>
            cfg.twitterUseSearchTerms
                ? buildSearchTermsInput(handles, window, {
                    maxItems: cfg.twitterMaxItems,
                    extraQuery: cfg.twitterExtraQuery,
                })
                : buildDirectHandlesInput(handles, window, cfg.twitterMaxItems),
        mapper: getRecordMapper('TWITTER'),
        prompt: twitterPrompt,
    };
}

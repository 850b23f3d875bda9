import { facebookPrompt } from '../ai/prompts/facebook.prompt.js';
import type { Config } from '../config/index.js';
import { buildStartUrlsInput } from '../fetchers/queries.js';
import { getRecordMapper, normalizePageUrl } from '../normalizers/index.js';
import type { SourceDefinition } from './types.js';

/**
 * Page URLs, handed to the actor as start URLs
 */
export function createFacebookSource(cfg: Config): SourceDefinition {
    return {
        source: 'FACEBOOK',
        referenceKind: 'page-url',
        actorId: cfg.facebookActorId,
        lookbackDays: cfg.facebookSinceDays,
        maxItems: cfg.facebookResultsLimit,
        normalizeReference: normalizePageUrl,
        buildInput: (urls, window) => buildStartUrlsInput(urls, window, cfg.facebookResultsLimit),
        mapper: getRecordMapper('FACEBOOK'),
        prompt: facebookPrompt,
    };
}

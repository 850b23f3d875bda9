import type { NormalizedRecord } from '../../storage/types.js';

export interface PromptContext {
    /** Display name of the target language, e.g. "German" */
    languageName: string;
    /** Used when the record carries no author or page name */
    fallbackAuthor: string;
}

export interface GeneratedText {
    title: string;
    summary: string;
}

export const UNTITLED = 'Untitled';

/**
 * Per-source prompt wording and reply layout
 */
export interface PromptTemplate {
    temperature: number;
    buildPrompt(record: NormalizedRecord, context: PromptContext): string;
    parseReply(reply: string): GeneratedText;
}

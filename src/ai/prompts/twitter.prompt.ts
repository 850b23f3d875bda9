import type { NormalizedRecord } from '../../storage/types.js';
import { UNTITLED, type GeneratedText, type PromptContext, type PromptTemplate } from './types.js';

const TITLE_MARKER = 'Post Title:';

function buildPrompt(record: NormalizedRecord, { languageName, fallbackAuthor }: PromptContext): string {
    const author = record.authorName || record.authorHandle || fallbackAuthor;
    const text = record.text || record.fullText;

    return (
        'Below is a tweet in its original language. ' +
        `Please translate and adjust it so that it is readable in ${languageName}. ` +
        `Start by saying: 'In the latest tweet from (${author})...'. ` +
        'Then provide a summary in two paragraphs or less, explaining the context or importance of the tweet, ' +
        `and finally repeat the original tweet as is. Please do it in ${languageName}. ` +
        `At the end, on a new line, output the short title in the format: '${TITLE_MARKER} [Title]'.\n\n` +
        `Original Tweet: ${text}`
    );
}

/**
 * Everything before the marker is the summary; the first line after it is the title.
 */
function parseReply(reply: string): GeneratedText {
    const index = reply.indexOf(TITLE_MARKER);
    if (index === -1) {
        return { title: UNTITLED, summary: reply.trim() };
    }

    const summary = reply.slice(0, index).trim();
    const titleLine = reply.slice(index + TITLE_MARKER.length).trim().split('\n')[0] ?? '';
    const title = titleLine.trim().replace(/^\[(.*)\]$/, '$1').trim();

    return { title: title || UNTITLED, summary };
}

export const twitterPrompt: PromptTemplate = {
    temperature: 0.3,
    buildPrompt,
    parseReply,
};

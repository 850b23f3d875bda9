import type { NormalizedRecord } from '../../storage/types.js';
import { UNTITLED, type GeneratedText, type PromptContext, type PromptTemplate } from './types.js';

const TITLE_MARKER = 'Title:';
const ARTICLE_MARKER = 'Article:';
const ORIGINAL_MARKER = 'Original Post:';

function buildPrompt(record: NormalizedRecord, { languageName, fallbackAuthor }: PromptContext): string {
    const pageName = record.authorName || fallbackAuthor;

    return [
        'Below is a Facebook post in its original language.',
        '',
        'Requirements:',
        `1) Begin the response with: "Latest Facebook post from \\"${pageName}\\""`,
        `2) Create an expanded article in ${languageName} with a short title and a summary consisting of 3-5 sentences.`,
        `3) The title must include the Facebook page name (e.g., "${pageName}: [topic]").`,
        `4) Under the header "${ARTICLE_MARKER}", summarize the main content of the post including key details.`,
        '5) Use a formal and informative tone that emphasizes the significance or context of the post.',
        `6) Finally, add a section "${ORIGINAL_MARKER}" and include the full original post enclosed in quotes.`,
        '',
        'Format your response exactly as follows:',
        '',
        `Latest Facebook post from "${pageName}"`,
        '',
        `${TITLE_MARKER} [Your generated title]`,
        '',
        ARTICLE_MARKER,
        '[Your 3-5 sentence summary]',
        '',
        ORIGINAL_MARKER,
        `"${record.text}"`,
    ].join('\n');
}

/**
 * Title is the rest of the "Title:" line; the summary is what follows, up to
 * "Original Post:", with the "Article:" header removed.
 */
function parseReply(reply: string): GeneratedText {
    const index = reply.indexOf(TITLE_MARKER);
    if (index === -1) {
        return { title: UNTITLED, summary: reply.trim() };
    }

    const afterTitle = reply.slice(index + TITLE_MARKER.length);
    const lineEnd = afterTitle.indexOf('\n');
    if (lineEnd === -1) {
        return { title: UNTITLED, summary: reply.trim() };
    }

    const title = afterTitle.slice(0, lineEnd).trim();
    const rest = afterTitle.slice(lineEnd + 1);
    const originalAt = rest.indexOf(ORIGINAL_MARKER);
    const article = originalAt === -1 ? rest : rest.slice(0, originalAt);

    return {
        title: title || UNTITLED,
        summary: article.replaceAll(ARTICLE_MARKER, '').trim(),
    };
}

export const facebookPrompt: PromptTemplate = {
    temperature: 0.2,
    buildPrompt,
    parseReply,
};

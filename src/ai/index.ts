/**
 * AI module exports
 */
export { createChatClient, OpenAIChatClient, type ChatClient, type ChatRequest } from './chat.js';
export {
    EnrichmentClient,
    createEnrichmentClient,
    type EnrichmentRequest,
    type EnrichmentResult,
} from './enrichment.js';
export { languageName, DEFAULT_LANGUAGE_CODE } from './languages.js';
export { twitterPrompt } from './prompts/twitter.prompt.js';
export { facebookPrompt } from './prompts/facebook.prompt.js';
export { UNTITLED, type GeneratedText, type PromptContext, type PromptTemplate } from './prompts/types.js';

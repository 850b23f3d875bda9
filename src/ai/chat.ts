/**
 * Text-generation client
 * One non-streaming chat completion per call.
 */
import OpenAI from 'openai';
import { EnrichmentTransportError, errorMessage } from '../utils/errors.js';

const SYSTEM_INSTRUCTION = 'You are a helpful assistant.';

export interface ChatRequest {
    prompt: string;
    temperature: number;
}

export interface ChatClient {
    complete(request: ChatRequest): Promise<string>;
}

export class OpenAIChatClient implements ChatClient {
    constructor(
        private readonly client: OpenAI,
        private readonly model: string
    ) { }

    /**
     * @throws EnrichmentTransportError on transport/API failure or an empty completion
     */
    async complete(request: ChatRequest): Promise<string> {
        let content: string | null | undefined;
        try {
            const completion = await this.client.chat.completions.create({
                model: this.model,
                messages: [
                    { role: 'system', content: SYSTEM_INSTRUCTION },
                    { role: 'user', content: request.prompt },
                ],
                temperature: request.temperature,
            });
            content = completion.choices[0]?.message?.content;
        } catch (error) {
            throw new EnrichmentTransportError(`Chat completion failed: ${errorMessage(error)}`, {
                model: this.model,
                status: error instanceof OpenAI.APIError ? error.status : undefined,
            });
        }

        const text = content?.trim() ?? '';
        if (!text) {
            throw new EnrichmentTransportError('Chat completion returned no content', { model: this.model });
        }
        return text;
    }
}

export function createChatClient(apiKey: string, model: string): ChatClient {
    return new OpenAIChatClient(new OpenAI({ apiKey, maxRetries: 0, timeout: 60_000 }), model);
}

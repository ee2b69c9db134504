import Anthropic from '@anthropic-ai/sdk';
import { config } from '../../config';
import { AIError } from '../../utils/errors';
import { logger } from '../logging';

export interface ChatMessage {
    role: 'user' | 'assistant';
    content: string;
}

export interface TextGenerator {
    generateText(history: ChatMessage[], system: string): Promise<string>;
}

export class LLMService implements TextGenerator {
    private anthropic: Anthropic;

    constructor() {
        if (!config.ai.anthropicApiKey) {
            logger.warn('Anthropic API Key is missing!');
        }
        this.anthropic = new Anthropic({
            apiKey: config.ai.anthropicApiKey || 'dummy_key',
        });
    }

    /**
     * Single completion, text blocks joined; tool use is not offered to the model
     */
    async generateText(history: ChatMessage[], system: string): Promise<string> {
        try {
            const response = await this.anthropic.messages.create({
                model: config.ai.model,
                max_tokens: config.ai.maxTokens,
                temperature: config.ai.temperature,
                system,
                messages: history.map(m => ({ role: m.role, content: m.content })),
            });

            const text = response.content
                .map(block => (block.type === 'text' ? block.text : ''))
                .join('')
                .trim();

            logger.debug('LLM response', { model: config.ai.model, length: text.length });
            return text;
        } catch (error) {
            throw new AIError('LLM generation failed', { cause: String(error) });
        }
    }
}

import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  type GenerativeModel,
} from '@google/generative-ai';
import type { LLMProvider, LLMResult } from './llm-provider';
import { traceRequest, traceResponse, type ProviderOptions } from './provider-options';
import { APIResponseError, ModelProviderError, RateLimitError, handleUnknownError } from '../errors/index';
import { createChildLogger, type Logger } from '../logging/index';

export interface GeminiConfig extends ProviderOptions {
    apiKey: string;
    model?: string;
    temperature?: number;
}

export const GeminiDefaultConfig = {
    model: 'gemini-1.5-flash',
    temperature: 0.3,
};

export class GeminiProvider implements LLMProvider {
    readonly name = 'gemini';
    private model: GenerativeModel;
    private modelName: string;
    private temperature: number;
    private options: ProviderOptions;
    private log: Logger;

    constructor(config: GeminiConfig) {
        const client = new GoogleGenerativeAI(config.apiKey);
        this.modelName = config.model ?? GeminiDefaultConfig.model;
        this.temperature = config.temperature ?? GeminiDefaultConfig.temperature;
        // Every research prompt asks for JSON
        this.model = client.getGenerativeModel({
            model: this.modelName,
            generationConfig: {
                temperature: this.temperature,
                responseMimeType: 'application/json',
            },
        });
        this.options = {
            ...(config.debug !== undefined && { debug: config.debug }),
            ...(config.showPrompt !== undefined && { showPrompt: config.showPrompt }),
        };
        this.log = createChildLogger('llm:gemini');
    }

    async complete(prompt: string): Promise<LLMResult<string>> {
        traceRequest(this.log, this.options, { model: this.modelName, temperature: this.temperature }, prompt);

        let text: string;
        let usage: LLMResult<string>['usage'];
        try {
            const result = await this.model.generateContent(prompt);
            text = result.response.text();
            const meta = result.response.usageMetadata;
            if (meta) {
                usage = { inputTokens: meta.promptTokenCount, outputTokens: meta.candidatesTokenCount };
            }
        } catch (e: unknown) {
            if (e instanceof GoogleGenerativeAIFetchError) {
                if (e.status === 429) {
                    throw new RateLimitError(`Gemini rate limit exceeded: ${e.message}`, this.name);
                }
                throw new ModelProviderError(`Gemini API error (${e.status ?? 'unknown'}): ${e.message}`, this.name, e.status);
            }
            const err = handleUnknownError(e, 'Gemini API call');
            throw new ModelProviderError(`Gemini API call failed: ${err.message}`, this.name);
        }

        traceResponse(this.log, this.options, { usage });

        if (!text.trim()) {
            throw new APIResponseError('Empty response from Gemini API (no text).', text);
        }
        return usage ? { data: text, usage } : { data: text };
    }
}

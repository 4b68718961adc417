import axios from 'axios';
import { GenerationError } from '../../domain/errors/StoryboardErrors';
import { isRetryableStatus } from '../resilience/RetryUtils';

interface ChatCompletionResponse {
    choices?: Array<{
        message?: {
            content?: string | null;
        };
    }>;
}

export interface ChatCompletionOptions {
    jsonMode?: boolean;
    temperature?: number;
    signal?: AbortSignal;
}

/**
 * Thin client for an OpenAI-compatible chat completions endpoint.
 * Failures surface as GenerationError; retries are left to the caller.
 */
export class OpenAIService {
    private readonly apiKey: string;
    private readonly baseUrl: string;
    private readonly model: string;

    constructor(
        apiKey: string,
        model: string = 'gpt-4.1',
        baseUrl: string = 'https://api.openai.com'
    ) {
        if (!apiKey) {
            throw new Error('OpenAI API key is required');
        }
        this.apiKey = apiKey;
        this.model = model;
        this.baseUrl = baseUrl.replace(/\/+$/, '');
    }

    async chatCompletion(
        prompt: string,
        systemPrompt: string,
        options: ChatCompletionOptions = {}
    ): Promise<string> {
        const { jsonMode = false, temperature = 0.7, signal } = options;

        let data: ChatCompletionResponse;
        try {
            const response = await axios.post<ChatCompletionResponse>(
                `${this.baseUrl}/v1/chat/completions`,
                {
                    model: this.model,
                    messages: [
                        { role: 'system', content: systemPrompt },
                        { role: 'user', content: prompt },
                    ],
                    temperature: temperature,
                    ...(jsonMode && { response_format: { type: 'json_object' } }),
                },
                {
                    headers: {
                        Authorization: `Bearer ${this.apiKey}`,
                        'Content-Type': 'application/json',
                    },
                    signal,
                }
            );
            data = response.data;
        } catch (error) {
            throw this.toGenerationError(error);
        }

        const content = data.choices?.[0]?.message?.content;
        if (typeof content !== 'string' || content.trim() === '') {
            throw new GenerationError('OpenAI call returned no content', true);
        }
        return content;
    }

    private toGenerationError(error: unknown): GenerationError {
        if (!axios.isAxiosError(error)) {
            const message = error instanceof Error ? error.message : String(error);
            return new GenerationError(`OpenAI call failed: ${message}`);
        }

        if (axios.isCancel(error) || error.code === 'ERR_CANCELED') {
            return new GenerationError('OpenAI call was cancelled', true);
        }

        const status = error.response?.status;
        const message = extractApiMessage(error.response?.data) ?? error.message;
        if (isRetryableStatus(status)) {
            console.warn(`[OpenAIService] Transient error (${status ?? 'network'}): ${message}`);
        }
        return new GenerationError(`OpenAI call failed: ${message}`, isRetryableStatus(status), status);
    }

    /**
     * Parses a JSON response from the LLM, handling potential markdown code blocks.
     */
    parseJSON(response: string): unknown {
        try {
            const jsonStr = response.replace(/```json\n?|\n?```/g, '').trim();
            return JSON.parse(jsonStr);
        } catch {
            throw new GenerationError(`Failed to parse LLM response as JSON: ${response.substring(0, 200)}...`);
        }
    }
}

function extractApiMessage(data: unknown): string | undefined {
    if (typeof data !== 'object' || data === null || !('error' in data)) {
        return undefined;
    }
    const apiError = data.error;
    if (typeof apiError === 'object' && apiError !== null && 'message' in apiError && typeof apiError.message === 'string') {
        return apiError.message;
    }
    return undefined;
}

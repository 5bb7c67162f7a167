// ========================================
// Docker Command Gateway - OpenAI-compatible Backend
// ========================================

import axios, { type AxiosInstance } from 'axios';
import { z } from 'zod';
import { CompletionError, errorMessage } from '../errors.js';
import type { BackendCallResult, ChatMessage, CompletionOptions, LLMBackend } from '../types.js';

const chatCompletionSchema = z.object({
    model: z.string().optional(),
    choices: z
        .array(
            z.object({
                message: z.object({
                    content: z.string().nullable(),
                }),
            }),
        )
        .min(1),
});

export interface OpenAIBackendOptions {
    baseUrl: string;
    apiKey: string;
    model: string;
    provider?: string;
}

function chatCompletionsUrl(baseUrl: string): string {
    const source = baseUrl.trim().replace(/\/+$/, '');
    if (source.endsWith('/chat/completions')) return source;
    return `${source}/chat/completions`;
}

function describeAxiosError(err: unknown): string {
    if (axios.isAxiosError(err)) {
        if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
            return `request timed out (${err.message})`;
        }
        if (err.response) {
            return `HTTP ${err.response.status} from completion endpoint`;
        }
        return err.message;
    }
    return errorMessage(err);
}

/**
 * Chat-completions client for any endpoint speaking the OpenAI wire format
 * (OpenAI, Azure-style proxies, LM Studio, vLLM, Ollama's /v1).
 */
export class OpenAIBackend implements LLMBackend {
    readonly name: string;
    private readonly http: AxiosInstance;
    private readonly url: string;
    private readonly model: string;

    constructor(opts: OpenAIBackendOptions) {
        this.name = opts.provider ?? 'openai';
        this.url = chatCompletionsUrl(opts.baseUrl);
        this.model = opts.model;
        this.http = axios.create({
            headers: {
                'Content-Type': 'application/json',
                Authorization: `Bearer ${opts.apiKey}`,
            },
        });
    }

    async call(messages: ChatMessage[], options: CompletionOptions): Promise<BackendCallResult> {
        let data: unknown;
        try {
            const response = await this.http.post(
                this.url,
                {
                    model: this.model,
                    messages,
                    temperature: options.temperature,
                    max_tokens: options.maxTokens,
                },
                { timeout: options.timeoutMs },
            );
            data = response.data;
        } catch (err) {
            throw new CompletionError(describeAxiosError(err));
        }

        const parsed = chatCompletionSchema.safeParse(data);
        if (!parsed.success) {
            throw new CompletionError('malformed completion response');
        }

        const content = parsed.data.choices[0].message.content;
        if (content === null || content.trim() === '') {
            throw new CompletionError('empty completion');
        }

        return { answer: content, model: parsed.data.model };
    }
}

import OpenAI from "openai";
import type { ChatCompletionMessageParam } from "openai/resources/chat/completions";
import type { CompletionOptions, LLMProvider, Message } from "./types.js";
import { RetryHandler } from "./retry-handler.js";
import { LLM_RETRY_ATTEMPTS, LLM_RETRY_BACKOFF_MS } from "../config/index.js";
import { logger } from "../lib/logger/structured-logger.js";

export interface OpenAiProviderOptions {
    apiKey: string;
    /** Any OpenAI-compatible chat-completions endpoint (DeepSeek by default) */
    baseUrl: string;
    defaultModel: string;
    timeoutMs: number;
}

function toChatMessage(m: Message): ChatCompletionMessageParam {
    switch (m.role) {
        case "system": return { role: "system", content: m.content };
        case "assistant": return { role: "assistant", content: m.content };
        case "user": return { role: "user", content: m.content };
    }
}

export class OpenAiProvider implements LLMProvider {
    private readonly client: OpenAI;
    private readonly retry = new RetryHandler({
        maxAttempts: LLM_RETRY_ATTEMPTS,
        backoffMs: LLM_RETRY_BACKOFF_MS,
    });

    constructor(private readonly options: OpenAiProviderOptions) {
        // Retries are ours; the SDK's own would multiply attempts
        this.client = new OpenAI({
            apiKey: options.apiKey,
            baseURL: options.baseUrl,
            maxRetries: 0,
        });
    }

    async complete(messages: Message[], opts?: CompletionOptions): Promise<string> {
        const model = opts?.model ?? this.options.defaultModel;
        const timeoutMs = opts?.timeout ?? this.options.timeoutMs;
        const tStart = Date.now();

        const text = await this.retry.executeWithRetry(async () => {
            const resp = await this.client.chat.completions.create({
                model,
                messages: messages.map(toChatMessage),
                temperature: opts?.temperature ?? 0,
                ...(opts?.maxTokens !== undefined && { max_tokens: opts.maxTokens }),
            }, { timeout: timeoutMs });
            return resp.choices[0]?.message?.content ?? "";
        }, { operation: `complete:${model}` });

        logger.debug({ event: "llm_complete_done", model, durationMs: Date.now() - tStart, chars: text.length }, "[LLM] Completion received");
        return text;
    }
}

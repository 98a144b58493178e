export type Message = {
    role: "system" | "user" | "assistant";
    content: string;
};

export interface CompletionOptions {
    model?: string;
    temperature?: number;
    maxTokens?: number;
    timeout?: number;
}

export interface LLMProvider {
    /**
     * Returns the assistant text; throws on transport failure after retries.
     */
    complete(messages: Message[], opts?: CompletionOptions): Promise<string>;
}

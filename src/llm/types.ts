import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";

export interface EmbedOptions {
    signal?: AbortSignal;
}

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
    role: ChatRole;
    content: string;
}

export interface CompletionRequest {
    messages: ChatMessage[];
    temperature: number;
    maxTokens: number;
    signal?: AbortSignal;
}

export interface CompletionResult {
    text: string;
    modelName: string;
    totalTokens: number;
    finishReason: string;
}

/** Order-preserving: one vector per input text, in input order. */
export interface EmbeddingGateway {
    embedBatch(texts: string[], options?: EmbedOptions): Promise<number[][]>;
    embedOne(text: string, options?: EmbedOptions): Promise<number[]>;
}

export interface ChatGateway {
    complete(request: CompletionRequest): Promise<CompletionResult>;
}

export interface EmbeddingProvider extends EmbeddingGateway {
    readonly config: EmbeddingModelConfig;
}

export interface ChatProvider extends ChatGateway {
    readonly config: ChatModelConfig;
}

export interface LLMClientBundle {
    embedding: EmbeddingProvider;
    chat: ChatProvider;
}

import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig, LLMConfig, LLMProviderName } from "../config/types";
import { ConfigurationError } from "../utils/errors";
import { childLogger } from "../utils/logger";
import { AnthropicChatProvider } from "./providers/anthropic";
import { GoogleChatProvider, GoogleEmbeddingProvider } from "./providers/google";
import { OpenAIChatProvider, OpenAIEmbeddingProvider } from "./providers/openai";
import type { ChatProvider, EmbeddingProvider, LLMClientBundle } from "./types";

type EmbeddingConstructor = new (config: EmbeddingModelConfig, logger?: Logger) => EmbeddingProvider;
type ChatConstructor = new (config: ChatModelConfig, logger?: Logger) => ChatProvider;

// Anthropic has no embedding endpoint.
const EMBEDDING_PROVIDERS: Partial<Record<LLMProviderName, EmbeddingConstructor>> = {
    openai: OpenAIEmbeddingProvider,
    google: GoogleEmbeddingProvider,
};

const CHAT_PROVIDERS: Record<LLMProviderName, ChatConstructor> = {
    openai: OpenAIChatProvider,
    google: GoogleChatProvider,
    anthropic: AnthropicChatProvider,
};

export function supportsEmbeddings(provider: LLMProviderName): boolean {
    return EMBEDDING_PROVIDERS[provider] !== undefined;
}

export function createEmbeddingProvider(config: EmbeddingModelConfig, logger?: Logger): EmbeddingProvider {
    const Provider = EMBEDDING_PROVIDERS[config.provider];
    if (!Provider) {
        throw new ConfigurationError(`Embedding provider "${config.provider}" is not supported.`);
    }
    return new Provider(config, childLogger(logger, { module: "llm", scope: "embedding", provider: config.provider }));
}

export function createChatProvider(config: ChatModelConfig, logger?: Logger): ChatProvider {
    const Provider = CHAT_PROVIDERS[config.provider];
    return new Provider(config, childLogger(logger, { module: "llm", scope: "chat", provider: config.provider }));
}

export function createLLMClient(config: LLMConfig, logger?: Logger): LLMClientBundle {
    const client = {
        embedding: createEmbeddingProvider(config.embedding, logger),
        chat: createChatProvider(config.chat, logger),
    };
    logger?.debug(
        { embedding: `${config.embedding.provider}:${config.embedding.model}`, chat: `${config.chat.provider}:${config.chat.model}` },
        "Created LLM clients."
    );
    return client;
}

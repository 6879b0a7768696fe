export interface LoggingConfig {
    level: "fatal" | "error" | "warn" | "info" | "debug" | "trace";
    pretty: boolean;
}

export interface ServerConfig {
    port: number;
    uploadDir: string;
    maxUploadBytes: number;
    allowedExtensions: string[];
}

export interface DatabaseConfig {
    /** When unset the in-memory store is used. */
    databaseUrl?: string;
    autoMigrate: boolean;
}

export interface ChunkingConfig {
    chunkSize: number;
    chunkOverlap: number;
    preserveParagraphs: boolean;
}

export interface RetrievalConfig {
    topK: number;
    minSimilarity: number;
    semanticWeight: number;
    keywordWeight: number;
    maxContextChars: number;
    maxSources: number;
    historyTurns: number;
}

export interface IngestionConfig {
    concurrency: number;
}

export type LLMProviderName =
    | "openai"
    | "google"
    | "anthropic";

export const LLM_PROVIDERS: readonly LLMProviderName[] = ["openai", "google", "anthropic"];

export interface ProviderLimitsConfig {
    batchSize?: number;
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
}

interface BaseModelConfig {
    provider: LLMProviderName;
    apiKey?: string;
    baseUrl?: string;
    limits?: ProviderLimitsConfig;
}

export interface EmbeddingModelConfig extends BaseModelConfig {
    model: string;
    /** Expected vector length; vectors of any other length are rejected. */
    dimensions?: number;
}

export interface ChatModelConfig extends BaseModelConfig {
    model: string;
    maxOutputTokens?: number;
    temperature: number;
}

export interface LLMConfig {
    embedding: EmbeddingModelConfig;
    chat: ChatModelConfig;
}

export interface AppConfig {
    server: ServerConfig;
    database: DatabaseConfig;
    logging: LoggingConfig;
    chunking: ChunkingConfig;
    retrieval: RetrievalConfig;
    ingestion: IngestionConfig;
    llm: LLMConfig;
}

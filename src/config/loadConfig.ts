import { config as loadDotenv } from "dotenv";
import path from "node:path";
import { ConfigurationError } from "../utils/errors";
import { LLM_PROVIDERS, type AppConfig, type LLMProviderName, type LoggingConfig } from "./types";

const PACKAGE_ROOT = path.resolve(__dirname, "..", "..");

const LOG_LEVELS: readonly LoggingConfig["level"][] = ["fatal", "error", "warn", "info", "debug", "trace"];

function getEnv(key: string, required = true): string | undefined {
    const value = process.env[key];
    if (required && !value) {
        throw new ConfigurationError(`Missing required environment variable: ${key}`);
    }
    return value;
}

function getEnvNumber(key: string): number | undefined;
function getEnvNumber(key: string, defaultValue: number): number;
function getEnvNumber(key: string, defaultValue?: number): number | undefined {
    const value = process.env[key];
    if (!value) {
        return defaultValue;
    }
    const parsed = Number.parseFloat(value);
    if (Number.isNaN(parsed)) {
        throw new ConfigurationError(`Environment variable ${key} must be a valid number, got: ${value}`);
    }
    return parsed;
}

function getEnvBoolean(key: string, defaultValue = false): boolean {
    const value = process.env[key];
    if (!value) {
        return defaultValue;
    }
    const lowered = value.toLowerCase().trim();
    return lowered === "true" || lowered === "1" || lowered === "yes";
}

function getEnvList(key: string, defaultValue: string[]): string[] {
    const value = getEnv(key, false);
    if (!value) {
        return defaultValue;
    }
    return value.split(",").map((entry) => entry.trim().toLowerCase()).filter(Boolean);
}

function getProvider(key: string): LLMProviderName {
    const value = getEnv(key)?.trim().toLowerCase();
    const provider = LLM_PROVIDERS.find((name) => name === value);
    if (!provider) {
        throw new ConfigurationError(`${key} must be one of ${LLM_PROVIDERS.join(", ")}, got: ${value}`);
    }
    return provider;
}

function getLogLevel(): LoggingConfig["level"] {
    const value = getEnv("RAGWELL_LOGGING_LEVEL", false) ?? "info";
    const level = LOG_LEVELS.find((candidate) => candidate === value);
    if (!level) {
        throw new ConfigurationError(`RAGWELL_LOGGING_LEVEL must be one of ${LOG_LEVELS.join(", ")}, got: ${value}`);
    }
    return level;
}

export function resolveConfigPath(providedPath?: string): string {
    if (providedPath) {
        return path.resolve(process.cwd(), providedPath);
    }

    if (process.env.RAGWELL_CONFIG_PATH) {
        return path.resolve(process.cwd(), process.env.RAGWELL_CONFIG_PATH);
    }

    return path.join(PACKAGE_ROOT, ".env");
}

export async function loadAppConfig(configPath?: string): Promise<AppConfig> {
    const envPath = configPath ?? resolveConfigPath();
    const result = loadDotenv({ path: envPath });

    if (result.error) {
        // Only fail if an explicit path was provided, otherwise env vars may already be loaded
        if (configPath) {
            throw new ConfigurationError(`Failed to load environment file from "${configPath}": ${result.error.message}`, { cause: result.error });
        }
    }

    const embeddingModel = getEnv("RAGWELL_LLM_EMBEDDING_MODEL", false) ?? "text-embedding-3-small";
    const chatModel = getEnv("RAGWELL_LLM_CHAT_MODEL", false) ?? "gpt-4o-mini";

    const config: AppConfig = {
        logging: {
            level: getLogLevel(),
            pretty: getEnvBoolean("RAGWELL_LOGGING_PRETTY", true),
        },
        server: {
            port: getEnvNumber("RAGWELL_SERVER_PORT", 8000),
            uploadDir: getEnv("RAGWELL_SERVER_UPLOAD_DIR", false) ?? "./uploads",
            maxUploadBytes: getEnvNumber("RAGWELL_SERVER_MAX_UPLOAD_BYTES", 10 * 1024 * 1024),
            allowedExtensions: getEnvList("RAGWELL_SERVER_ALLOWED_EXTENSIONS", [".txt", ".md"]),
        },
        database: {
            databaseUrl: getEnv("RAGWELL_DATABASE_URL", false) ?? getEnv("DATABASE_URL", false),
            autoMigrate: getEnvBoolean("RAGWELL_DATABASE_AUTO_MIGRATE", false),
        },
        chunking: {
            chunkSize: getEnvNumber("RAGWELL_CHUNK_SIZE", 1000),
            chunkOverlap: getEnvNumber("RAGWELL_CHUNK_OVERLAP", 200),
            preserveParagraphs: getEnvBoolean("RAGWELL_CHUNK_PRESERVE_PARAGRAPHS", true),
        },
        retrieval: {
            topK: getEnvNumber("RAGWELL_RETRIEVAL_TOP_K", 5),
            minSimilarity: getEnvNumber("RAGWELL_RETRIEVAL_MIN_SIMILARITY", 0),
            semanticWeight: getEnvNumber("RAGWELL_RETRIEVAL_SEMANTIC_WEIGHT", 0.7),
            keywordWeight: getEnvNumber("RAGWELL_RETRIEVAL_KEYWORD_WEIGHT", 0.3),
            maxContextChars: getEnvNumber("RAGWELL_RETRIEVAL_MAX_CONTEXT_CHARS", 6000),
            maxSources: getEnvNumber("RAGWELL_RETRIEVAL_MAX_SOURCES", 10),
            historyTurns: getEnvNumber("RAGWELL_RETRIEVAL_HISTORY_TURNS", 5),
        },
        ingestion: {
            concurrency: getEnvNumber("RAGWELL_INGESTION_CONCURRENCY", 2),
        },
        llm: {
            embedding: {
                provider: getProvider("RAGWELL_LLM_EMBEDDING_PROVIDER"),
                model: embeddingModel,
                apiKey: getEnv("RAGWELL_LLM_EMBEDDING_API_KEY", false),
                baseUrl: getEnv("RAGWELL_LLM_EMBEDDING_BASE_URL", false),
                dimensions: getEnvNumber("RAGWELL_LLM_EMBEDDING_DIMENSIONS", 1536),
                limits: {
                    batchSize: getEnvNumber("RAGWELL_LLM_EMBEDDING_LIMITS_BATCH_SIZE", 100),
                    concurrency: getEnvNumber("RAGWELL_LLM_EMBEDDING_LIMITS_CONCURRENCY", 4),
                    maxRequestsPerMinute: getEnvNumber("RAGWELL_LLM_EMBEDDING_LIMITS_MAX_REQUESTS_PER_MINUTE"),
                    maxTokensPerMinute: getEnvNumber("RAGWELL_LLM_EMBEDDING_LIMITS_MAX_TOKENS_PER_MINUTE"),
                    retries: getEnvNumber("RAGWELL_LLM_EMBEDDING_LIMITS_RETRIES"),
                },
            },
            chat: {
                provider: getProvider("RAGWELL_LLM_CHAT_PROVIDER"),
                model: chatModel,
                apiKey: getEnv("RAGWELL_LLM_CHAT_API_KEY", false),
                baseUrl: getEnv("RAGWELL_LLM_CHAT_BASE_URL", false),
                temperature: getEnvNumber("RAGWELL_LLM_CHAT_TEMPERATURE", 0.7),
                maxOutputTokens: getEnvNumber("RAGWELL_LLM_CHAT_MAX_OUTPUT_TOKENS", 500),
                limits: {
                    concurrency: getEnvNumber("RAGWELL_LLM_CHAT_LIMITS_CONCURRENCY"),
                    maxRequestsPerMinute: getEnvNumber("RAGWELL_LLM_CHAT_LIMITS_MAX_REQUESTS_PER_MINUTE"),
                    maxTokensPerMinute: getEnvNumber("RAGWELL_LLM_CHAT_LIMITS_MAX_TOKENS_PER_MINUTE"),
                    retries: getEnvNumber("RAGWELL_LLM_CHAT_LIMITS_RETRIES"),
                },
            },
        },
    };

    validateConfig(config);

    config.server.uploadDir = path.resolve(PACKAGE_ROOT, config.server.uploadDir);

    return config;
}

export function validateConfig(config: AppConfig): void {
    const { chunking, retrieval, ingestion, llm } = config;

    if (!Number.isInteger(chunking.chunkSize) || chunking.chunkSize <= 0) {
        throw new ConfigurationError(`Chunk size must be a positive integer, got: ${chunking.chunkSize}`);
    }
    if (!Number.isInteger(chunking.chunkOverlap) || chunking.chunkOverlap < 0 || chunking.chunkOverlap >= chunking.chunkSize) {
        throw new ConfigurationError(
            `Chunk overlap must be an integer in [0, ${chunking.chunkSize}), got: ${chunking.chunkOverlap}`
        );
    }
    if (retrieval.semanticWeight < 0 || retrieval.keywordWeight < 0 || retrieval.semanticWeight + retrieval.keywordWeight <= 0) {
        throw new ConfigurationError("Retrieval weights must be non-negative and must not both be zero.");
    }
    if (retrieval.topK < 1 || retrieval.maxSources < 1 || retrieval.maxContextChars < 1) {
        throw new ConfigurationError("Retrieval topK, maxSources and maxContextChars must be at least 1.");
    }
    if (llm.embedding.provider === "anthropic") {
        throw new ConfigurationError("Anthropic does not offer an embedding model; choose openai or google.");
    }
    if (ingestion.concurrency < 1) {
        throw new ConfigurationError("Ingestion concurrency must be at least 1.");
    }
}

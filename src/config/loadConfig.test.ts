import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { testConfig } from "../testing/fakes";
import type { AppConfig } from "./types";
import { ConfigurationError } from "../utils/errors";
import { loadAppConfig, resolveConfigPath, validateConfig } from "./loadConfig";

const MISSING_ENV_FILE = path.join(__dirname, "__missing__", ".env");

describe("loadAppConfig", () => {
    beforeEach(() => {
        vi.stubEnv("RAGWELL_CONFIG_PATH", MISSING_ENV_FILE);
        vi.stubEnv("RAGWELL_LLM_EMBEDDING_PROVIDER", "openai");
        vi.stubEnv("RAGWELL_LLM_CHAT_PROVIDER", "anthropic");
    });

    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it("fills in defaults from a minimal environment", async () => {
        const config = await loadAppConfig();

        expect(config.chunking).toEqual({ chunkSize: 1000, chunkOverlap: 200, preserveParagraphs: true });
        expect(config.retrieval).toMatchObject({ topK: 5, semanticWeight: 0.7, keywordWeight: 0.3, maxContextChars: 6000 });
        expect(config.server.allowedExtensions).toEqual([".txt", ".md"]);
        expect(config.llm.embedding).toMatchObject({ provider: "openai", model: "text-embedding-3-small", dimensions: 1536 });
        expect(config.llm.chat).toMatchObject({ provider: "anthropic", temperature: 0.7, maxOutputTokens: 500 });
        expect(path.isAbsolute(config.server.uploadDir)).toBe(true);
    });

    it("reads overrides from the environment", async () => {
        vi.stubEnv("RAGWELL_CHUNK_SIZE", "500");
        vi.stubEnv("RAGWELL_CHUNK_OVERLAP", "50");
        vi.stubEnv("RAGWELL_SERVER_ALLOWED_EXTENSIONS", ".TXT, .md ,.pdf");
        vi.stubEnv("RAGWELL_LLM_EMBEDDING_PROVIDER", "Google");
        vi.stubEnv("RAGWELL_LOGGING_PRETTY", "no");

        const config = await loadAppConfig();

        expect(config.chunking).toMatchObject({ chunkSize: 500, chunkOverlap: 50 });
        expect(config.server.allowedExtensions).toEqual([".txt", ".md", ".pdf"]);
        expect(config.llm.embedding.provider).toBe("google");
        expect(config.logging.pretty).toBe(false);
    });

    it("requires a known provider", async () => {
        vi.stubEnv("RAGWELL_LLM_CHAT_PROVIDER", "llamas");

        await expect(loadAppConfig()).rejects.toThrow(
            "RAGWELL_LLM_CHAT_PROVIDER must be one of openai, google, anthropic, got: llamas"
        );
    });

    it("rejects non-numeric values", async () => {
        vi.stubEnv("RAGWELL_SERVER_PORT", "eighty");

        await expect(loadAppConfig()).rejects.toThrow(
            "Environment variable RAGWELL_SERVER_PORT must be a valid number, got: eighty"
        );
    });

    it("rejects an unknown log level", async () => {
        vi.stubEnv("RAGWELL_LOGGING_LEVEL", "loud");

        await expect(loadAppConfig()).rejects.toBeInstanceOf(ConfigurationError);
    });

    it("fails when an explicit configuration file is missing", async () => {
        await expect(loadAppConfig(MISSING_ENV_FILE)).rejects.toThrow(/Failed to load environment file/);
    });
});

describe("resolveConfigPath", () => {
    afterEach(() => {
        vi.unstubAllEnvs();
    });

    it("prefers the provided path", () => {
        vi.stubEnv("RAGWELL_CONFIG_PATH", "ignored.env");

        expect(resolveConfigPath("custom.env")).toBe(path.resolve(process.cwd(), "custom.env"));
    });

    it("falls back to the environment variable", () => {
        vi.stubEnv("RAGWELL_CONFIG_PATH", "from-env.env");

        expect(resolveConfigPath()).toBe(path.resolve(process.cwd(), "from-env.env"));
    });
});

describe("validateConfig", () => {
    it("accepts the test configuration", () => {
        expect(() => validateConfig(testConfig())).not.toThrow();
    });

    const invalid: Array<[string, Partial<AppConfig>]> = [
        ["overlap not below the chunk size", { chunking: { chunkSize: 100, chunkOverlap: 100, preserveParagraphs: true } }],
        ["a zero chunk size", { chunking: { chunkSize: 0, chunkOverlap: 0, preserveParagraphs: true } }],
        [
            "all-zero retrieval weights",
            { retrieval: { ...testConfig().retrieval, semanticWeight: 0, keywordWeight: 0 } },
        ],
        ["zero ingestion workers", { ingestion: { concurrency: 0 } }],
        [
            "an embedding provider without embeddings",
            { llm: { ...testConfig().llm, embedding: { provider: "anthropic", model: "any" } } },
        ],
    ];

    it.each(invalid)("rejects %s", (_label, overrides) => {
        expect(() => validateConfig(testConfig(overrides))).toThrow(ConfigurationError);
    });
});

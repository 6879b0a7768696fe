export * from "./config/types";
export { loadAppConfig, resolveConfigPath, validateConfig } from "./config/loadConfig";
export * from "./utils/errors";
export { configureLogger, getLogger } from "./utils/logger";

export { chunkText, createChunker, type ChunkOptions, type Chunker } from "./ingest/chunker";
export { parseDocument, parseTextDocument, type ParsedDocument } from "./ingest/parsers/text";
export { processDocument, buildChunkId, type IngestionJob, type IngestionOutcome } from "./ingest/pipeline";
export { IngestionQueue, type IngestionQueueStats } from "./ingest/queue";
export { DocumentService, type UploadOutcome, type UploadRequest } from "./ingest/documents";
export { LocalFileStorage, type FileStorage } from "./ingest/storage";

export * from "./llm/types";
export { createChatProvider, createEmbeddingProvider, createLLMClient, supportsEmbeddings } from "./llm/factory";

export * from "./database";

export * from "./query/types";
export { SearchEngine, normalizeWeights } from "./query/searchEngine";
export { assembleContext } from "./query/context";
export { RagOrchestrator, evaluateResponseQuality, extractSources } from "./query/rag";

export { createApp, createServer, startServer } from "./server/server";
export { createServiceContext, closeServiceContext, type ServiceContext } from "./server/utils/context";

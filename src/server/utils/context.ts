import type { Logger } from "pino";
import type { AppConfig } from "../../config/types";
import { createStore } from "../../database";
import type { RagStore } from "../../database/types";
import { createChunker } from "../../ingest/chunker";
import { DocumentService } from "../../ingest/documents";
import { processDocument, type IngestionOutcome } from "../../ingest/pipeline";
import { IngestionQueue } from "../../ingest/queue";
import { LocalFileStorage, type FileStorage } from "../../ingest/storage";
import { createLLMClient } from "../../llm/factory";
import type { LLMClientBundle } from "../../llm/types";
import { RagOrchestrator } from "../../query/rag";
import { SearchEngine } from "../../query/searchEngine";

export interface ServiceContext {
    config: AppConfig;
    llm: LLMClientBundle;
    store: RagStore;
    storage: FileStorage;
    queue: IngestionQueue;
    documents: DocumentService;
    search: SearchEngine;
    rag: RagOrchestrator;
}

export interface ServiceContextOverrides {
    llm?: LLMClientBundle;
    store?: RagStore;
    storage?: FileStorage;
    onIngestionSettled?: (outcome: IngestionOutcome) => void;
}

/** Wires every service once; request handlers receive the result instead of reaching for globals. */
export async function createServiceContext(
    config: AppConfig,
    logger: Logger,
    overrides: ServiceContextOverrides = {}
): Promise<ServiceContext> {
    const llm = overrides.llm ?? createLLMClient(config.llm, logger);
    const store = overrides.store ?? await createStore(config.database, logger, {
        dimensions: config.llm.embedding.dimensions,
    });
    const storage = overrides.storage ?? new LocalFileStorage(config.server.uploadDir);
    const chunker = createChunker(config.chunking);

    const queue = new IngestionQueue(
        (job) => processDocument(job, { store, storage, chunker, embedding: llm.embedding, logger }),
        {
            concurrency: config.ingestion.concurrency,
            logger,
            onSettled: overrides.onIngestionSettled,
        }
    );

    const documents = new DocumentService({
        store,
        storage,
        queue,
        settings: config.server,
        logger,
    });

    const search = new SearchEngine({
        embedding: llm.embedding,
        store,
        defaults: config.retrieval,
        logger,
    });

    const rag = new RagOrchestrator({
        search,
        chat: llm.chat,
        settings: config.retrieval,
        logger,
    });

    return { config, llm, store, storage, queue, documents, search, rag };
}

export async function closeServiceContext(context: ServiceContext): Promise<void> {
    await context.queue.onIdle();
    await context.store.close();
}

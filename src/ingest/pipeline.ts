import type { Logger } from "pino";
import type { DocumentStore, NewChunk } from "../database/types";
import type { EmbeddingGateway } from "../llm/types";
import { EmbeddingGatewayError, getErrorMessage, NotFoundError } from "../utils/errors";
import { childLogger } from "../utils/logger";
import type { Chunker } from "./chunker";
import { parseDocument } from "./parsers/text";
import type { FileStorage } from "./storage";

export interface IngestionJob {
    documentId: string;
}

export interface IngestionOutcome {
    documentId: string;
    status: "completed" | "failed";
    chunkCount: number;
    error?: string;
}

export interface IngestionDependencies {
    store: Pick<DocumentStore, "transitionStatus" | "completeDocument">;
    storage: Pick<FileStorage, "read">;
    chunker: Chunker;
    embedding: EmbeddingGateway;
    logger?: Logger;
}

export function buildChunkId(documentId: string, index: number): string {
    return `chunk_${documentId}_${index}`;
}

/**
 * Runs one document through parse, chunk, embed and persist. Failures end in
 * the `failed` status and are reported in the outcome; this never rejects.
 */
export async function processDocument(job: IngestionJob, deps: IngestionDependencies): Promise<IngestionOutcome> {
    const logger = childLogger(deps.logger, { module: "ingest", documentId: job.documentId });

    try {
        const document = await deps.store.transitionStatus(job.documentId, "processing");
        logger.info({ filename: document.filename }, "Processing document.");

        const content = await deps.storage.read(document.filePath);
        const parsed = parseDocument(document.fileType, content);
        const pieces = deps.chunker(parsed.text);
        logger.debug({ chunks: pieces.length, characters: parsed.characterCount }, "Chunked document text.");

        const embeddings = await deps.embedding.embedBatch(pieces);
        if (embeddings.length !== pieces.length) {
            throw new EmbeddingGatewayError(
                "unknown",
                `Expected ${pieces.length} embeddings, received ${embeddings.length}.`
            );
        }

        const chunks: NewChunk[] = pieces.map((text, index) => ({
            chunkId: buildChunkId(job.documentId, index),
            text,
            chunkIndex: index,
            embedding: embeddings[index],
        }));

        const completed = await deps.store.completeDocument(job.documentId, {
            chunks,
            characterCount: parsed.characterCount,
            wordCount: parsed.wordCount,
        });
        logger.info({ chunkCount: completed.chunkCount }, "Document processed.");

        return { documentId: job.documentId, status: "completed", chunkCount: completed.chunkCount };
    } catch (error) {
        const message = getErrorMessage(error);
        logger.error({ err: error }, "Document processing failed.");
        await markFailed(job.documentId, message, deps, logger);
        return { documentId: job.documentId, status: "failed", chunkCount: 0, error: message };
    }
}

async function markFailed(documentId: string, message: string, deps: IngestionDependencies, logger: Logger): Promise<void> {
    try {
        await deps.store.transitionStatus(documentId, "failed", message);
    } catch (error) {
        if (error instanceof NotFoundError) {
            logger.warn("Document was deleted before its failure could be recorded.");
            return;
        }
        logger.error({ err: error }, "Could not record document failure.");
    }
}

import type { Request, Response } from "express";
import type { Logger } from "pino";
import type { ServiceContext } from "../utils/context";
import { sendError } from "../utils/respond";

export type HealthRouteContext = Pick<ServiceContext, "store" | "queue">;

export function handleHealthRequest(_req: Request, res: Response, context: HealthRouteContext): void {
    res.json({
        status: "ok",
        store: context.store.kind,
        ingestion: context.queue.stats(),
    });
}

export type RagHealthRouteContext = Pick<ServiceContext, "store" | "config">;

/** Readiness: the store answers and at least one embedded chunk is searchable. */
export async function handleRagHealthRequest(
    _req: Request,
    res: Response,
    context: RagHealthRouteContext,
    logger: Logger
): Promise<void> {
    try {
        const [documents, chunks] = await Promise.all([
            context.store.countDocuments("completed"),
            context.store.countChunks(),
        ]);

        res.json({
            status: "ok",
            ready: chunks.withEmbedding > 0,
            database: "connected",
            completedDocuments: documents,
            totalChunks: chunks.total,
            chunksWithEmbeddings: chunks.withEmbedding,
            chatModel: context.config.llm.chat.model,
            embeddingModel: context.config.llm.embedding.model,
        });
    } catch (error) {
        sendError(res, error, logger, "RAG health check");
    }
}

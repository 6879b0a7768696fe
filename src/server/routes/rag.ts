import type { Request, Response } from "express";
import type { Logger } from "pino";
import { evaluateResponseQuality, type RagOrchestrator } from "../../query/rag";
import { ragChatSchema, ragEvaluateSchema } from "../schemas";
import { parseRequest, sendError } from "../utils/respond";

export interface RagRouteContext {
    rag: RagOrchestrator;
}

export async function handleRagChatRequest(
    req: Request,
    res: Response,
    context: RagRouteContext,
    logger: Logger
): Promise<void> {
    try {
        const body = parseRequest(ragChatSchema, req.body);
        const result = await context.rag.generate({
            query: body.query,
            conversationHistory: body.conversation_history,
            documentId: body.document_id,
            topK: body.top_k,
            temperature: body.temperature,
            maxTokens: body.max_tokens,
        });

        res.json({ status: "ok", ...result });
    } catch (error) {
        sendError(res, error, logger, "RAG chat");
    }
}

export async function handleRagEvaluateRequest(
    req: Request,
    res: Response,
    _context: RagRouteContext,
    logger: Logger
): Promise<void> {
    try {
        const body = parseRequest(ragEvaluateSchema, req.body);
        const evaluation = evaluateResponseQuality(body.answer, body.sources);
        res.json({ status: "ok", ...evaluation });
    } catch (error) {
        sendError(res, error, logger, "RAG evaluation");
    }
}

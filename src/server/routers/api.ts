import { Router } from "express";
import type { Logger } from "pino";
import type { ServiceContext } from "../utils/context";
import { handleHealthRequest, handleRagHealthRequest } from "../routes/health";
import {
    handleDeleteDocumentRequest,
    handleDocumentChunksRequest,
    handleGetDocumentRequest,
    handleListDocumentsRequest,
    handleUploadRequest,
} from "../routes/documents";
import {
    handleContextSearchRequest,
    handleHybridSearchRequest,
    handleKeywordSearchRequest,
    handleSearchStatsRequest,
    handleSemanticSearchRequest,
} from "../routes/search";
import { handleChatRequest } from "../routes/chat";
import { handleRagChatRequest, handleRagEvaluateRequest } from "../routes/rag";

export function createApiRouter(context: ServiceContext, logger: Logger): Router {
    const router = Router();
    const searchContext = { search: context.search, retrieval: context.config.retrieval };

    router.get("/health", (req, res) => {
        handleHealthRequest(req, res, context);
    });

    router.post("/api/v1/documents", async (req, res) => {
        await handleUploadRequest(req, res, context, logger);
    });

    router.get("/api/v1/documents", async (req, res) => {
        await handleListDocumentsRequest(req, res, context, logger);
    });

    router.get("/api/v1/documents/:id", async (req, res) => {
        await handleGetDocumentRequest(req, res, context, logger);
    });

    router.delete("/api/v1/documents/:id", async (req, res) => {
        await handleDeleteDocumentRequest(req, res, context, logger);
    });

    router.get("/api/v1/documents/:id/chunks", async (req, res) => {
        await handleDocumentChunksRequest(req, res, context, logger);
    });

    router.get("/api/v1/search/semantic", async (req, res) => {
        await handleSemanticSearchRequest(req, res, searchContext, logger);
    });

    router.get("/api/v1/search/keyword", async (req, res) => {
        await handleKeywordSearchRequest(req, res, searchContext, logger);
    });

    router.get("/api/v1/search/hybrid", async (req, res) => {
        await handleHybridSearchRequest(req, res, searchContext, logger);
    });

    router.get("/api/v1/search/context", async (req, res) => {
        await handleContextSearchRequest(req, res, searchContext, logger);
    });

    router.get("/api/v1/search/stats", async (req, res) => {
        await handleSearchStatsRequest(req, res, searchContext, logger);
    });

    router.post("/api/v1/chat", async (req, res) => {
        await handleChatRequest(req, res, { chat: context.llm.chat }, logger);
    });

    router.post("/api/v1/rag/chat", async (req, res) => {
        await handleRagChatRequest(req, res, context, logger);
    });

    router.post("/api/v1/rag/evaluate", async (req, res) => {
        await handleRagEvaluateRequest(req, res, context, logger);
    });

    router.get("/api/v1/rag/health", async (req, res) => {
        await handleRagHealthRequest(req, res, context, logger);
    });

    return router;
}

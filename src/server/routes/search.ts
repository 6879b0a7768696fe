import type { Request, Response } from "express";
import type { Logger } from "pino";
import type { RetrievalConfig } from "../../config/types";
import type { SearchEngine } from "../../query/searchEngine";
import type { SearchHit } from "../../query/types";
import { contextSearchSchema, hybridSearchSchema, keywordSearchSchema, semanticSearchSchema } from "../schemas";
import { parseRequest, sendError } from "../utils/respond";

export interface SearchRouteContext {
    search: SearchEngine;
    retrieval: RetrievalConfig;
}

function respondWithHits<T extends SearchHit>(res: Response, query: string, searchType: string, results: T[]): void {
    res.json({
        status: "ok",
        query,
        searchType,
        totalResults: results.length,
        results: results.map(({ metadata, ...rest }) => ({
            ...rest,
            metadata: {
                fileType: metadata.fileType,
                uploadedAt: metadata.uploadedAt?.toISOString(),
            },
        })),
    });
}

export async function handleSemanticSearchRequest(
    req: Request,
    res: Response,
    context: SearchRouteContext,
    logger: Logger
): Promise<void> {
    try {
        const params = parseRequest(semanticSearchSchema, req.query);
        const results = await context.search.semanticSearch(params.query, {
            topK: params.top_k ?? context.retrieval.topK,
            documentId: params.document_id,
            minSimilarity: params.min_similarity,
        });
        respondWithHits(res, params.query, "semantic", results);
    } catch (error) {
        sendError(res, error, logger, "Semantic search");
    }
}

export async function handleKeywordSearchRequest(
    req: Request,
    res: Response,
    context: SearchRouteContext,
    logger: Logger
): Promise<void> {
    try {
        const params = parseRequest(keywordSearchSchema, req.query);
        const results = await context.search.keywordSearch(params.query, {
            topK: params.top_k ?? context.retrieval.topK,
            documentId: params.document_id,
        });
        respondWithHits(res, params.query, "keyword", results);
    } catch (error) {
        sendError(res, error, logger, "Keyword search");
    }
}

export async function handleHybridSearchRequest(
    req: Request,
    res: Response,
    context: SearchRouteContext,
    logger: Logger
): Promise<void> {
    try {
        const params = parseRequest(hybridSearchSchema, req.query);
        const results = await context.search.hybridSearch(params.query, {
            topK: params.top_k ?? context.retrieval.topK,
            documentId: params.document_id,
            minSimilarity: params.min_similarity,
            semanticWeight: params.semantic_weight,
            keywordWeight: params.keyword_weight,
        });
        respondWithHits(res, params.query, "hybrid", results);
    } catch (error) {
        sendError(res, error, logger, "Hybrid search");
    }
}

export async function handleContextSearchRequest(
    req: Request,
    res: Response,
    context: SearchRouteContext,
    logger: Logger
): Promise<void> {
    try {
        const params = parseRequest(contextSearchSchema, req.query);
        const results = await context.search.searchWithContext(params.query, {
            topK: params.top_k ?? context.retrieval.topK,
            documentId: params.document_id,
            minSimilarity: params.min_similarity,
            semanticWeight: params.semantic_weight,
            keywordWeight: params.keyword_weight,
            contextWindow: params.context_window,
        });
        respondWithHits(res, params.query, "hybrid_with_context", results);
    } catch (error) {
        sendError(res, error, logger, "Context search");
    }
}

export async function handleSearchStatsRequest(
    _req: Request,
    res: Response,
    context: SearchRouteContext,
    logger: Logger
): Promise<void> {
    try {
        const statistics = await context.search.getStatistics();
        res.json({ status: "ok", ...statistics });
    } catch (error) {
        sendError(res, error, logger, "Search statistics");
    }
}

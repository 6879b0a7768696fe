import type { Request, Response } from "express";
import type { Logger } from "pino";
import type { DocumentService } from "../../ingest/documents";
import { listChunksSchema, listDocumentsSchema, uploadDocumentSchema } from "../schemas";
import { parseRequest, sendError } from "../utils/respond";
import { toChunkResponse, toDocumentResponse } from "./serializers";

export interface DocumentsRouteContext {
    documents: DocumentService;
}

export async function handleUploadRequest(
    req: Request,
    res: Response,
    context: DocumentsRouteContext,
    logger: Logger
): Promise<void> {
    try {
        const body = parseRequest(uploadDocumentSchema, req.body);
        const content = Buffer.from(body.content, body.encoding === "base64" ? "base64" : "utf8");
        const outcome = await context.documents.acceptUpload({ filename: body.filename, content });

        res.status(outcome.duplicate ? 200 : 201).json({
            status: "ok",
            duplicate: outcome.duplicate,
            message: outcome.duplicate
                ? "A document with identical content already exists."
                : "Document accepted; processing has started.",
            document: toDocumentResponse(outcome.document),
        });
    } catch (error) {
        sendError(res, error, logger, "Document upload");
    }
}

export async function handleListDocumentsRequest(
    req: Request,
    res: Response,
    context: DocumentsRouteContext,
    logger: Logger
): Promise<void> {
    try {
        const query = parseRequest(listDocumentsSchema, req.query);
        const page = await context.documents.list(query);

        res.json({
            status: "ok",
            total: page.total,
            skip: query.skip,
            limit: query.limit,
            documents: page.documents.map(toDocumentResponse),
        });
    } catch (error) {
        sendError(res, error, logger, "Document listing");
    }
}

export async function handleGetDocumentRequest(
    req: Request,
    res: Response,
    context: DocumentsRouteContext,
    logger: Logger
): Promise<void> {
    try {
        const document = await context.documents.get(req.params.id);
        res.json({ status: "ok", document: toDocumentResponse(document) });
    } catch (error) {
        sendError(res, error, logger, "Document lookup");
    }
}

export async function handleDeleteDocumentRequest(
    req: Request,
    res: Response,
    context: DocumentsRouteContext,
    logger: Logger
): Promise<void> {
    try {
        const document = await context.documents.delete(req.params.id);
        res.json({
            status: "ok",
            message: `Deleted ${document.filename} and ${document.chunkCount} chunk${document.chunkCount === 1 ? "" : "s"}.`,
            documentId: document.documentId,
        });
    } catch (error) {
        sendError(res, error, logger, "Document deletion");
    }
}

export async function handleDocumentChunksRequest(
    req: Request,
    res: Response,
    context: DocumentsRouteContext,
    logger: Logger
): Promise<void> {
    try {
        const query = parseRequest(listChunksSchema, req.query);
        const page = query.limit !== undefined
            ? { skip: query.skip ?? 0, limit: query.limit }
            : undefined;
        const { document, chunks } = await context.documents.getChunks(req.params.id, page);

        res.json({
            status: "ok",
            documentId: document.documentId,
            filename: document.filename,
            totalChunks: document.chunkCount,
            chunks: chunks.map(toChunkResponse),
        });
    } catch (error) {
        sendError(res, error, logger, "Chunk listing");
    }
}

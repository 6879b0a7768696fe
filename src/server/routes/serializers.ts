import type { ChunkRecord, DocumentRecord } from "../../database/types";

export interface DocumentResponse {
    documentId: string;
    filename: string;
    fileType: string;
    fileSize: number;
    fileHash: string;
    characterCount?: number;
    wordCount?: number;
    chunkCount: number;
    processingStatus: string;
    errorMessage?: string;
    uploadedAt: string;
    processedAt?: string;
    updatedAt: string;
}

/** The stored file path stays server-side. */
export function toDocumentResponse(document: DocumentRecord): DocumentResponse {
    return {
        documentId: document.documentId,
        filename: document.filename,
        fileType: document.fileType,
        fileSize: document.fileSize,
        fileHash: document.fileHash,
        characterCount: document.characterCount,
        wordCount: document.wordCount,
        chunkCount: document.chunkCount,
        processingStatus: document.processingStatus,
        errorMessage: document.errorMessage,
        uploadedAt: document.uploadedAt.toISOString(),
        processedAt: document.processedAt?.toISOString(),
        updatedAt: document.updatedAt.toISOString(),
    };
}

export function toChunkResponse(chunk: ChunkRecord) {
    return {
        chunkId: chunk.chunkId,
        chunkIndex: chunk.chunkIndex,
        text: chunk.text,
        chunkSize: chunk.chunkSize,
        hasEmbedding: chunk.hasEmbedding,
        createdAt: chunk.createdAt.toISOString(),
    };
}

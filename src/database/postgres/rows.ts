import type { ChunkRecord, DocumentRecord, ProcessingStatus } from "../types";
import { PROCESSING_STATUSES } from "../types";

// Row shapes are type aliases so they satisfy pg's QueryResultRow index signature.
export type DocumentRow = {
    document_id: string;
    filename: string;
    file_type: string;
    file_size: number;
    file_hash: string;
    file_path: string;
    character_count: number | null;
    word_count: number | null;
    chunk_count: number;
    processing_status: string;
    error_message: string | null;
    uploaded_at: Date;
    processed_at: Date | null;
    updated_at: Date;
};

export type ChunkRow = {
    chunk_id: string;
    document_id: string;
    chunk_text: string;
    chunk_index: number;
    chunk_size: number;
    has_embedding: boolean;
    created_at: Date;
};

export type NearestChunkRow = ChunkRow & {
    distance: number;
};

export type CountRow = {
    count: number;
};

export const DOCUMENT_COLUMNS = `document_id, filename, file_type, file_size, file_hash, file_path,
    character_count, word_count, chunk_count, processing_status, error_message,
    uploaded_at, processed_at, updated_at`;

export const CHUNK_COLUMNS = `chunk_id, document_id, chunk_text, chunk_index, chunk_size,
    embedding IS NOT NULL AS has_embedding, created_at`;

export function toProcessingStatus(value: string): ProcessingStatus {
    const status = PROCESSING_STATUSES.find((candidate) => candidate === value);
    if (!status) {
        throw new Error(`Unknown processing status stored in database: ${value}`);
    }
    return status;
}

export function mapDocumentRow(row: DocumentRow): DocumentRecord {
    return {
        documentId: row.document_id,
        filename: row.filename,
        fileType: row.file_type,
        fileSize: row.file_size,
        fileHash: row.file_hash,
        filePath: row.file_path,
        characterCount: row.character_count ?? undefined,
        wordCount: row.word_count ?? undefined,
        chunkCount: row.chunk_count,
        processingStatus: toProcessingStatus(row.processing_status),
        errorMessage: row.error_message ?? undefined,
        uploadedAt: row.uploaded_at,
        processedAt: row.processed_at ?? undefined,
        updatedAt: row.updated_at,
    };
}

export function mapChunkRow(row: ChunkRow): ChunkRecord {
    return {
        chunkId: row.chunk_id,
        documentId: row.document_id,
        text: row.chunk_text,
        chunkIndex: row.chunk_index,
        chunkSize: row.chunk_size,
        hasEmbedding: row.has_embedding,
        createdAt: row.created_at,
    };
}

export function toVectorLiteral(vector: number[]): string {
    return `[${vector.join(",")}]`;
}

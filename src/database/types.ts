export type ProcessingStatus = "pending" | "processing" | "completed" | "failed";

export const PROCESSING_STATUSES: readonly ProcessingStatus[] = ["pending", "processing", "completed", "failed"];

export interface DocumentRecord {
    documentId: string;
    filename: string;
    fileType: string;
    fileSize: number;
    fileHash: string;
    filePath: string;
    characterCount?: number;
    wordCount?: number;
    chunkCount: number;
    processingStatus: ProcessingStatus;
    errorMessage?: string;
    uploadedAt: Date;
    processedAt?: Date;
    updatedAt: Date;
}

export interface NewDocument {
    documentId: string;
    filename: string;
    fileType: string;
    fileSize: number;
    fileHash: string;
    filePath: string;
}

export interface ChunkRecord {
    chunkId: string;
    documentId: string;
    text: string;
    chunkIndex: number;
    chunkSize: number;
    hasEmbedding: boolean;
    createdAt: Date;
}

export interface NewChunk {
    chunkId: string;
    text: string;
    chunkIndex: number;
    embedding?: number[];
}

export interface DocumentCompletion {
    chunks: NewChunk[];
    characterCount: number;
    wordCount: number;
}

export interface NearestChunk {
    chunk: ChunkRecord;
    /** Cosine distance, 0 for identical direction. */
    distance: number;
}

export interface ListDocumentsOptions {
    skip: number;
    limit: number;
    status?: ProcessingStatus;
}

export interface PageOptions {
    skip: number;
    limit: number;
}

export interface ChunkCounts {
    total: number;
    withEmbedding: number;
}

export interface KeywordQueryOptions {
    documentId?: string;
    limit: number;
}

export interface DocumentStore {
    createDocument(document: NewDocument): Promise<DocumentRecord>;
    getDocument(documentId: string): Promise<DocumentRecord | undefined>;
    findDocumentByHash(fileHash: string): Promise<DocumentRecord | undefined>;
    /** Newest first. */
    listDocuments(options: ListDocumentsOptions): Promise<DocumentRecord[]>;
    countDocuments(status?: ProcessingStatus): Promise<number>;
    /** Removes the document and its chunks; false when it did not exist. */
    deleteDocument(documentId: string): Promise<boolean>;
    /**
     * Atomically moves a document to `status` when its current status allows it.
     * Throws NotFoundError or DocumentStateError otherwise.
     */
    transitionStatus(documentId: string, status: ProcessingStatus, errorMessage?: string): Promise<DocumentRecord>;
    /** Inserts every chunk and marks the document completed in one unit. */
    completeDocument(documentId: string, completion: DocumentCompletion): Promise<DocumentRecord>;
}

export interface ChunkStore {
    /** Ordered by chunk index. */
    getChunksByDocument(documentId: string, page?: PageOptions): Promise<ChunkRecord[]>;
    countChunks(): Promise<ChunkCounts>;
}

export interface VectorIndex {
    /** Ascending cosine distance; only chunks with an embedding. */
    queryNearest(vector: number[], k: number, documentId?: string): Promise<NearestChunk[]>;
}

export interface KeywordIndex {
    /** Chunks whose lower-cased text contains `needle`, ordered by chunk index. */
    findContaining(needle: string, options: KeywordQueryOptions): Promise<ChunkRecord[]>;
}

export interface RagStore extends DocumentStore, ChunkStore, VectorIndex, KeywordIndex {
    readonly kind: "postgres" | "memory";
    verifyConnection(): Promise<void>;
    close(): Promise<void>;
}

import type { Logger } from "pino";
import { NotFoundError } from "../utils/errors";
import { childLogger } from "../utils/logger";
import { assertTransition } from "./status";
import type {
    ChunkCounts,
    ChunkRecord,
    DocumentCompletion,
    DocumentRecord,
    KeywordQueryOptions,
    ListDocumentsOptions,
    NearestChunk,
    NewDocument,
    PageOptions,
    ProcessingStatus,
    RagStore,
} from "./types";

interface StoredChunk {
    record: ChunkRecord;
    embedding?: number[];
}

interface StoredDocument {
    record: DocumentRecord;
    sequence: number;
}

export function cosineDistance(a: number[], b: number[]): number {
    if (a.length !== b.length) {
        throw new Error(`Vector dimensions differ: ${a.length} vs ${b.length}`);
    }

    let dot = 0;
    let normA = 0;
    let normB = 0;
    for (let i = 0; i < a.length; i++) {
        dot += a[i] * b[i];
        normA += a[i] * a[i];
        normB += b[i] * b[i];
    }

    if (normA === 0 || normB === 0) {
        return 1;
    }
    return 1 - dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

function byChunkOrder(a: ChunkRecord, b: ChunkRecord): number {
    return a.chunkIndex - b.chunkIndex || (a.chunkId < b.chunkId ? -1 : a.chunkId > b.chunkId ? 1 : 0);
}

/**
 * Process-local store with the same contract as the PostgreSQL store.
 * Backs the tests and deployments without a database URL.
 */
export class InMemoryStore implements RagStore {
    readonly kind = "memory";
    private readonly documents = new Map<string, StoredDocument>();
    private readonly chunks = new Map<string, StoredChunk[]>();
    private sequence = 0;
    private readonly logger: Logger;

    constructor(logger?: Logger) {
        this.logger = childLogger(logger, { module: "database" });
    }

    async verifyConnection(): Promise<void> {
        this.logger.debug("Using the in-memory store.");
    }

    async close(): Promise<void> {
        this.documents.clear();
        this.chunks.clear();
    }

    async createDocument(document: NewDocument): Promise<DocumentRecord> {
        const now = new Date();
        const record: DocumentRecord = {
            ...document,
            chunkCount: 0,
            processingStatus: "pending",
            uploadedAt: now,
            updatedAt: now,
        };
        this.documents.set(document.documentId, { record, sequence: this.sequence++ });
        return { ...record };
    }

    async getDocument(documentId: string): Promise<DocumentRecord | undefined> {
        const stored = this.documents.get(documentId);
        return stored ? { ...stored.record } : undefined;
    }

    async findDocumentByHash(fileHash: string): Promise<DocumentRecord | undefined> {
        const match = this.ordered().reverse().find((entry) => entry.record.fileHash === fileHash);
        return match ? { ...match.record } : undefined;
    }

    async listDocuments(options: ListDocumentsOptions): Promise<DocumentRecord[]> {
        return this.ordered()
            .filter((entry) => !options.status || entry.record.processingStatus === options.status)
            .slice(options.skip, options.skip + options.limit)
            .map((entry) => ({ ...entry.record }));
    }

    async countDocuments(status?: ProcessingStatus): Promise<number> {
        let count = 0;
        for (const { record } of this.documents.values()) {
            if (!status || record.processingStatus === status) {
                count++;
            }
        }
        return count;
    }

    async deleteDocument(documentId: string): Promise<boolean> {
        this.chunks.delete(documentId);
        return this.documents.delete(documentId);
    }

    async transitionStatus(documentId: string, status: ProcessingStatus, errorMessage?: string): Promise<DocumentRecord> {
        const stored = this.require(documentId);
        assertTransition(documentId, stored.record.processingStatus, status);

        stored.record = {
            ...stored.record,
            processingStatus: status,
            errorMessage,
            updatedAt: new Date(),
        };
        return { ...stored.record };
    }

    async completeDocument(documentId: string, completion: DocumentCompletion): Promise<DocumentRecord> {
        const stored = this.require(documentId);
        assertTransition(documentId, stored.record.processingStatus, "completed");

        const createdAt = new Date();
        const chunks = completion.chunks.map((chunk): StoredChunk => ({
            record: {
                chunkId: chunk.chunkId,
                documentId,
                text: chunk.text,
                chunkIndex: chunk.chunkIndex,
                chunkSize: chunk.text.length,
                hasEmbedding: chunk.embedding !== undefined,
                createdAt,
            },
            embedding: chunk.embedding ? [...chunk.embedding] : undefined,
        }));

        const indices = new Set(chunks.map((chunk) => chunk.record.chunkIndex));
        if (indices.size !== chunks.length) {
            throw new Error(`Duplicate chunk index for document ${documentId}`);
        }

        this.chunks.set(documentId, chunks);
        stored.record = {
            ...stored.record,
            chunkCount: chunks.length,
            characterCount: completion.characterCount,
            wordCount: completion.wordCount,
            processingStatus: "completed",
            errorMessage: undefined,
            processedAt: createdAt,
            updatedAt: createdAt,
        };
        return { ...stored.record };
    }

    async getChunksByDocument(documentId: string, page?: PageOptions): Promise<ChunkRecord[]> {
        const records = (this.chunks.get(documentId) ?? []).map((chunk) => ({ ...chunk.record })).sort(byChunkOrder);
        return page ? records.slice(page.skip, page.skip + page.limit) : records;
    }

    async countChunks(): Promise<ChunkCounts> {
        let total = 0;
        let withEmbedding = 0;
        for (const chunk of this.allChunks()) {
            total++;
            if (chunk.embedding) {
                withEmbedding++;
            }
        }
        return { total, withEmbedding };
    }

    async queryNearest(vector: number[], k: number, documentId?: string): Promise<NearestChunk[]> {
        const candidates: NearestChunk[] = [];
        for (const chunk of this.allChunks(documentId)) {
            if (chunk.embedding) {
                candidates.push({ chunk: { ...chunk.record }, distance: cosineDistance(vector, chunk.embedding) });
            }
        }
        return candidates.sort((a, b) => a.distance - b.distance).slice(0, k);
    }

    async findContaining(needle: string, options: KeywordQueryOptions): Promise<ChunkRecord[]> {
        const matches: ChunkRecord[] = [];
        for (const chunk of this.allChunks(options.documentId)) {
            if (chunk.record.text.toLowerCase().includes(needle)) {
                matches.push({ ...chunk.record });
            }
        }
        return matches.sort(byChunkOrder).slice(0, options.limit);
    }

    private require(documentId: string): StoredDocument {
        const stored = this.documents.get(documentId);
        if (!stored) {
            throw new NotFoundError("document", documentId);
        }
        return stored;
    }

    /** Newest first. */
    private ordered(): StoredDocument[] {
        return [...this.documents.values()].sort(
            (a, b) => b.record.uploadedAt.getTime() - a.record.uploadedAt.getTime() || b.sequence - a.sequence
        );
    }

    private allChunks(documentId?: string): StoredChunk[] {
        if (documentId) {
            return this.chunks.get(documentId) ?? [];
        }
        return [...this.chunks.values()].flat();
    }
}

import crypto from "node:crypto";
import path from "node:path";
import type { Logger } from "pino";
import type { ServerConfig } from "../config/types";
import type {
    ChunkRecord,
    ChunkStore,
    DocumentRecord,
    DocumentStore,
    ListDocumentsOptions,
    PageOptions,
} from "../database/types";
import { calculateChecksum } from "../utils/calculateChecksum";
import { NotFoundError, ValidationError } from "../utils/errors";
import { childLogger } from "../utils/logger";
import type { IngestionJob } from "./pipeline";
import type { FileStorage } from "./storage";

export interface UploadRequest {
    filename: string;
    content: Buffer;
}

export interface UploadOutcome {
    document: DocumentRecord;
    /** True when identical content was already stored; nothing new was queued. */
    duplicate: boolean;
}

export interface DocumentPage {
    documents: DocumentRecord[];
    total: number;
}

export type UploadSettings = Pick<ServerConfig, "maxUploadBytes" | "allowedExtensions">;

export interface DocumentServiceOptions {
    store: DocumentStore & Pick<ChunkStore, "getChunksByDocument">;
    storage: FileStorage;
    queue: { enqueue(job: IngestionJob): void };
    settings: UploadSettings;
    logger?: Logger;
}

export function generateDocumentId(): string {
    return `doc_${crypto.randomBytes(6).toString("hex")}`;
}

export class DocumentService {
    private readonly logger: Logger;
    /** Uploads still being stored, keyed by content hash. */
    private readonly inFlight = new Map<string, Promise<UploadOutcome>>();

    constructor(private readonly options: DocumentServiceOptions) {
        this.logger = childLogger(options.logger, { module: "documents" });
    }

    async acceptUpload(request: UploadRequest): Promise<UploadOutcome> {
        const filename = path.basename(request.filename.trim());
        if (!filename) {
            throw new ValidationError("A filename is required.");
        }

        const extension = path.extname(filename).toLowerCase();
        const { allowedExtensions, maxUploadBytes } = this.options.settings;
        if (!allowedExtensions.includes(extension)) {
            throw new ValidationError(
                `Unsupported file type "${extension || filename}". Allowed types: ${allowedExtensions.join(", ")}`
            );
        }
        if (request.content.length === 0) {
            throw new ValidationError("The uploaded file is empty.");
        }
        if (request.content.length > maxUploadBytes) {
            throw new ValidationError(
                `File is ${request.content.length} bytes; the maximum upload size is ${maxUploadBytes} bytes.`
            );
        }

        const fileHash = calculateChecksum(request.content);
        const pending = this.inFlight.get(fileHash);
        if (pending) {
            const document = await pending.then((outcome) => outcome.document, () => undefined);
            if (document) {
                this.logger.info({ documentId: document.documentId, filename }, "Duplicate of an upload in progress.");
                return { document, duplicate: true };
            }
            return this.acceptUpload(request);
        }

        // The entry is removed before the promise settles, so a waiter never sees a stale one.
        const upload = this.storeUpload(filename, extension, fileHash, request.content).finally(() => {
            this.inFlight.delete(fileHash);
        });
        this.inFlight.set(fileHash, upload);
        return upload;
    }

    private async storeUpload(filename: string, extension: string, fileHash: string, content: Buffer): Promise<UploadOutcome> {
        const existing = await this.options.store.findDocumentByHash(fileHash);
        if (existing) {
            this.logger.info({ documentId: existing.documentId, filename }, "Duplicate upload; returning existing document.");
            return { document: existing, duplicate: true };
        }

        const documentId = generateDocumentId();
        const filePath = await this.options.storage.save(documentId, extension, content);

        let document: DocumentRecord;
        try {
            document = await this.options.store.createDocument({
                documentId,
                filename,
                fileType: extension.slice(1),
                fileSize: content.length,
                fileHash,
                filePath,
            });
        } catch (error) {
            await this.options.storage.remove(filePath);
            throw error;
        }

        this.options.queue.enqueue({ documentId });
        this.logger.info({ documentId, filename, bytes: content.length }, "Accepted upload for ingestion.");

        return { document, duplicate: false };
    }

    async list(options: ListDocumentsOptions): Promise<DocumentPage> {
        const [documents, total] = await Promise.all([
            this.options.store.listDocuments(options),
            this.options.store.countDocuments(options.status),
        ]);
        return { documents, total };
    }

    async get(documentId: string): Promise<DocumentRecord> {
        const document = await this.options.store.getDocument(documentId);
        if (!document) {
            throw new NotFoundError("document", documentId);
        }
        return document;
    }

    async delete(documentId: string): Promise<DocumentRecord> {
        const document = await this.get(documentId);
        const deleted = await this.options.store.deleteDocument(documentId);
        if (!deleted) {
            throw new NotFoundError("document", documentId);
        }
        await this.options.storage.remove(document.filePath);
        this.logger.info({ documentId, chunkCount: document.chunkCount }, "Deleted document.");
        return document;
    }

    async getChunks(documentId: string, page?: PageOptions): Promise<{ document: DocumentRecord; chunks: ChunkRecord[] }> {
        const document = await this.get(documentId);
        const chunks = await this.options.store.getChunksByDocument(documentId, page);
        return { document, chunks };
    }
}

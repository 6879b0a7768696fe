import { Pool } from "pg";
import type { Logger } from "pino";
import type { DatabaseConfig } from "../../config/types";
import { ConfigurationError, RetrievalError } from "../../utils/errors";
import { childLogger } from "../../utils/logger";
import { assertTransition } from "../status";
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
} from "../types";
import * as chunks from "./chunks";
import * as documents from "./documents";
import { applySchema } from "./schema";
import * as search from "./search";

const UNDEFINED_TABLE = "42P01";

export class PostgresStore implements RagStore {
    readonly kind = "postgres";
    protected readonly logger: Logger;
    protected readonly pool: Pool;

    constructor(
        protected readonly config: DatabaseConfig,
        logger?: Logger
    ) {
        if (!config.databaseUrl) {
            throw new ConfigurationError("A database URL is required for the PostgreSQL store.");
        }

        this.logger = childLogger(logger, { module: "database" });
        this.pool = new Pool({
            connectionString: config.databaseUrl,
            max: 20,
            idleTimeoutMillis: 30000,
            connectionTimeoutMillis: 2000,
        });

        this.pool.on("error", (err) => {
            this.logger.error({ err }, "Unexpected error on idle PostgreSQL client");
        });
    }

    async verifyConnection(): Promise<void> {
        try {
            await this.pool.query(`SELECT 1 FROM documents LIMIT 1`);
            this.logger.info("Connected to the documents table.");
        } catch (error) {
            if (error instanceof Error && "code" in error && error.code === UNDEFINED_TABLE) {
                this.logger.warn("Table \"documents\" does not exist yet; apply sql/schema.sql or enable auto-migrate.");
                return;
            }
            this.logger.error({ err: error }, "Failed to connect to PostgreSQL.");
            throw new RetrievalError("database connection", error);
        }
    }

    async migrate(dimensions?: number): Promise<void> {
        await applySchema(this.pool, this.logger, dimensions);
    }

    async close(): Promise<void> {
        await this.pool.end();
    }

    async createDocument(document: NewDocument): Promise<DocumentRecord> {
        return documents.createDocument(this.pool, document);
    }

    async getDocument(documentId: string): Promise<DocumentRecord | undefined> {
        return documents.getDocument(this.pool, documentId);
    }

    async findDocumentByHash(fileHash: string): Promise<DocumentRecord | undefined> {
        return documents.findDocumentByHash(this.pool, fileHash);
    }

    async listDocuments(options: ListDocumentsOptions): Promise<DocumentRecord[]> {
        return documents.listDocuments(this.pool, options);
    }

    async countDocuments(status?: ProcessingStatus): Promise<number> {
        return documents.countDocuments(this.pool, status);
    }

    async deleteDocument(documentId: string): Promise<boolean> {
        return documents.deleteDocument(this.pool, this.logger, documentId);
    }

    async transitionStatus(documentId: string, status: ProcessingStatus, errorMessage?: string): Promise<DocumentRecord> {
        return documents.transitionStatus(this.pool, documentId, status, errorMessage);
    }

    async completeDocument(documentId: string, completion: DocumentCompletion): Promise<DocumentRecord> {
        const client = await this.pool.connect();
        try {
            await client.query("BEGIN");
            const current = await documents.lockDocumentStatus(client, documentId);
            assertTransition(documentId, current, "completed");
            await chunks.insertChunks(client, this.logger, documentId, completion.chunks);
            const completed = await documents.markCompleted(client, documentId, completion);
            await client.query("COMMIT");
            return completed;
        } catch (error) {
            await client.query("ROLLBACK");
            throw error;
        } finally {
            client.release();
        }
    }

    async getChunksByDocument(documentId: string, page?: PageOptions): Promise<ChunkRecord[]> {
        return chunks.getChunksByDocument(this.pool, documentId, page);
    }

    async countChunks(): Promise<ChunkCounts> {
        return chunks.countChunks(this.pool);
    }

    async queryNearest(vector: number[], k: number, documentId?: string): Promise<NearestChunk[]> {
        return search.queryNearest(this.pool, vector, k, documentId);
    }

    async findContaining(needle: string, options: KeywordQueryOptions): Promise<ChunkRecord[]> {
        return search.findContaining(this.pool, needle, options);
    }
}

export function createPostgresStore(config: DatabaseConfig, logger?: Logger): PostgresStore {
    return new PostgresStore(config, logger);
}

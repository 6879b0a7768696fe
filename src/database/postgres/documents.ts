import type { Pool, PoolClient } from "pg";
import type { Logger } from "pino";
import { DocumentStateError, NotFoundError } from "../../utils/errors";
import { allowedSources, assertTransition } from "../status";
import type { DocumentCompletion, DocumentRecord, ListDocumentsOptions, NewDocument, ProcessingStatus } from "../types";
import { DOCUMENT_COLUMNS, mapDocumentRow, toProcessingStatus, type CountRow, type DocumentRow } from "./rows";

export async function createDocument(pool: Pool, document: NewDocument): Promise<DocumentRecord> {
    const result = await pool.query<DocumentRow>(
        `INSERT INTO documents (document_id, filename, file_type, file_size, file_hash, file_path, processing_status)
         VALUES ($1, $2, $3, $4, $5, $6, 'pending')
         RETURNING ${DOCUMENT_COLUMNS}`,
        [document.documentId, document.filename, document.fileType, document.fileSize, document.fileHash, document.filePath]
    );
    return mapDocumentRow(result.rows[0]);
}

export async function getDocument(pool: Pool, documentId: string): Promise<DocumentRecord | undefined> {
    const result = await pool.query<DocumentRow>(
        `SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE document_id = $1`,
        [documentId]
    );
    const row = result.rows[0];
    return row ? mapDocumentRow(row) : undefined;
}

export async function findDocumentByHash(pool: Pool, fileHash: string): Promise<DocumentRecord | undefined> {
    const result = await pool.query<DocumentRow>(
        `SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE file_hash = $1 ORDER BY uploaded_at ASC LIMIT 1`,
        [fileHash]
    );
    const row = result.rows[0];
    return row ? mapDocumentRow(row) : undefined;
}

export async function listDocuments(pool: Pool, options: ListDocumentsOptions): Promise<DocumentRecord[]> {
    const values: Array<string | number> = [options.limit, options.skip];
    let filter = "";
    if (options.status) {
        values.push(options.status);
        filter = "WHERE processing_status = $3";
    }

    const result = await pool.query<DocumentRow>(
        `SELECT ${DOCUMENT_COLUMNS} FROM documents ${filter}
         ORDER BY uploaded_at DESC, document_id ASC
         LIMIT $1 OFFSET $2`,
        values
    );
    return result.rows.map(mapDocumentRow);
}

export async function countDocuments(pool: Pool, status?: ProcessingStatus): Promise<number> {
    const result = status
        ? await pool.query<CountRow>(`SELECT COUNT(*)::int AS count FROM documents WHERE processing_status = $1`, [status])
        : await pool.query<CountRow>(`SELECT COUNT(*)::int AS count FROM documents`);
    return result.rows[0]?.count ?? 0;
}

export async function deleteDocument(pool: Pool, logger: Logger, documentId: string): Promise<boolean> {
    const result = await pool.query(`DELETE FROM documents WHERE document_id = $1`, [documentId]);
    const deleted = (result.rowCount ?? 0) > 0;
    if (deleted) {
        logger.info({ documentId }, "Deleted document and its chunks.");
    }
    return deleted;
}

export async function transitionStatus(
    pool: Pool,
    documentId: string,
    status: ProcessingStatus,
    errorMessage?: string
): Promise<DocumentRecord> {
    const result = await pool.query<DocumentRow>(
        `UPDATE documents
         SET processing_status = $2, error_message = $3, updated_at = now()
         WHERE document_id = $1 AND processing_status = ANY($4::text[])
         RETURNING ${DOCUMENT_COLUMNS}`,
        [documentId, status, errorMessage ?? null, [...allowedSources(status)]]
    );

    const row = result.rows[0];
    if (row) {
        return mapDocumentRow(row);
    }

    const current = await getDocument(pool, documentId);
    if (!current) {
        throw new NotFoundError("document", documentId);
    }
    assertTransition(documentId, current.processingStatus, status);
    throw new DocumentStateError(`Document ${documentId} changed status concurrently.`);
}

/** Row lock for the duration of the caller's transaction. */
export async function lockDocumentStatus(client: PoolClient, documentId: string): Promise<ProcessingStatus> {
    const result = await client.query<Pick<DocumentRow, "processing_status">>(
        `SELECT processing_status FROM documents WHERE document_id = $1 FOR UPDATE`,
        [documentId]
    );
    const row = result.rows[0];
    if (!row) {
        throw new NotFoundError("document", documentId);
    }
    return toProcessingStatus(row.processing_status);
}

export async function markCompleted(
    client: PoolClient,
    documentId: string,
    completion: DocumentCompletion
): Promise<DocumentRecord> {
    const result = await client.query<DocumentRow>(
        `UPDATE documents
         SET chunk_count = $2, character_count = $3, word_count = $4,
             processing_status = 'completed', error_message = NULL,
             processed_at = now(), updated_at = now()
         WHERE document_id = $1
         RETURNING ${DOCUMENT_COLUMNS}`,
        [documentId, completion.chunks.length, completion.characterCount, completion.wordCount]
    );
    return mapDocumentRow(result.rows[0]);
}

import type { Pool, PoolClient } from "pg";
import type { Logger } from "pino";
import { batchItems } from "../../utils/batchItems";
import type { ChunkCounts, ChunkRecord, NewChunk, PageOptions } from "../types";
import { CHUNK_COLUMNS, mapChunkRow, toVectorLiteral, type ChunkRow } from "./rows";

const INSERT_BATCH_SIZE = 100;

type CountsRow = {
    total: number;
    with_embedding: number;
};

export async function insertChunks(
    client: PoolClient,
    logger: Logger,
    documentId: string,
    chunks: NewChunk[]
): Promise<void> {
    for (const batch of batchItems(chunks, INSERT_BATCH_SIZE)) {
        const values: Array<string | number | null> = [];
        const placeholders = batch.map((chunk) => {
            const offset = values.length;
            values.push(
                chunk.chunkId,
                documentId,
                chunk.text,
                chunk.chunkIndex,
                chunk.text.length,
                chunk.embedding ? toVectorLiteral(chunk.embedding) : null
            );
            return `($${offset + 1}, $${offset + 2}, $${offset + 3}, $${offset + 4}, $${offset + 5}, $${offset + 6}::vector)`;
        });

        await client.query(
            `INSERT INTO document_chunks (chunk_id, document_id, chunk_text, chunk_index, chunk_size, embedding)
             VALUES ${placeholders.join(", ")}`,
            values
        );
    }

    logger.debug({ documentId, chunks: chunks.length }, `Inserted ${chunks.length} chunk${chunks.length === 1 ? "" : "s"}`);
}

export async function getChunksByDocument(pool: Pool, documentId: string, page?: PageOptions): Promise<ChunkRecord[]> {
    const result = page
        ? await pool.query<ChunkRow>(
            `SELECT ${CHUNK_COLUMNS} FROM document_chunks WHERE document_id = $1
             ORDER BY chunk_index ASC LIMIT $2 OFFSET $3`,
            [documentId, page.limit, page.skip]
        )
        : await pool.query<ChunkRow>(
            `SELECT ${CHUNK_COLUMNS} FROM document_chunks WHERE document_id = $1 ORDER BY chunk_index ASC`,
            [documentId]
        );
    return result.rows.map(mapChunkRow);
}

export async function countChunks(pool: Pool): Promise<ChunkCounts> {
    const result = await pool.query<CountsRow>(
        `SELECT COUNT(*)::int AS total, COUNT(embedding)::int AS with_embedding FROM document_chunks`
    );
    const row = result.rows[0];
    return {
        total: row?.total ?? 0,
        withEmbedding: row?.with_embedding ?? 0,
    };
}

import type { Pool } from "pg";
import type { ChunkRecord, KeywordQueryOptions, NearestChunk } from "../types";
import { CHUNK_COLUMNS, mapChunkRow, toVectorLiteral, type ChunkRow, type NearestChunkRow } from "./rows";

export function escapeLikePattern(needle: string): string {
    return needle.replace(/[\\%_]/g, (match) => `\\${match}`);
}

export async function queryNearest(
    pool: Pool,
    vector: number[],
    k: number,
    documentId?: string
): Promise<NearestChunk[]> {
    const values: Array<string | number> = [toVectorLiteral(vector), k];
    let filter = "";
    if (documentId) {
        values.push(documentId);
        filter = "AND document_id = $3";
    }

    const result = await pool.query<NearestChunkRow>(
        `SELECT ${CHUNK_COLUMNS}, (embedding <=> $1::vector)::float8 AS distance
         FROM document_chunks
         WHERE embedding IS NOT NULL ${filter}
         ORDER BY embedding <=> $1::vector
         LIMIT $2`,
        values
    );

    return result.rows.map((row) => ({
        chunk: mapChunkRow(row),
        distance: row.distance,
    }));
}

export async function findContaining(
    pool: Pool,
    needle: string,
    options: KeywordQueryOptions
): Promise<ChunkRecord[]> {
    const values: Array<string | number> = [escapeLikePattern(needle), options.limit];
    let filter = "";
    if (options.documentId) {
        values.push(options.documentId);
        filter = "AND document_id = $3";
    }

    const result = await pool.query<ChunkRow>(
        `SELECT ${CHUNK_COLUMNS}
         FROM document_chunks
         WHERE lower(chunk_text) LIKE '%' || $1 || '%' ESCAPE '\\' ${filter}
         ORDER BY chunk_index ASC, chunk_id ASC
         LIMIT $2`,
        values
    );

    return result.rows.map(mapChunkRow);
}

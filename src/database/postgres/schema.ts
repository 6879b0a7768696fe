import { readFile } from "node:fs/promises";
import path from "node:path";
import type { Pool } from "pg";
import type { Logger } from "pino";

const PACKAGE_ROOT = path.resolve(__dirname, "..", "..", "..");
export const SCHEMA_PATH = path.join(PACKAGE_ROOT, "sql", "schema.sql");

/** The checked-in schema targets 1536 dimensions; other sizes are substituted on apply. */
export async function loadSchemaSql(dimensions?: number): Promise<string> {
    const sql = await readFile(SCHEMA_PATH, "utf8");
    return dimensions ? sql.replace(/vector\(\d+\)/g, `vector(${dimensions})`) : sql;
}

export async function applySchema(pool: Pool, logger: Logger, dimensions?: number): Promise<void> {
    const sql = await loadSchemaSql(dimensions);
    await pool.query(sql);
    logger.info({ schema: SCHEMA_PATH, dimensions }, "Applied database schema.");
}

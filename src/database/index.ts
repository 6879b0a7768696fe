import type { Logger } from "pino";
import type { DatabaseConfig } from "../config/types";
import { childLogger } from "../utils/logger";
import { InMemoryStore } from "./memory";
import { PostgresStore } from "./postgres/client";
import type { RagStore } from "./types";

export interface CreateStoreOptions {
    /** Vector size used when the schema is applied on start-up. */
    dimensions?: number;
}

export async function createStore(config: DatabaseConfig, logger?: Logger, options: CreateStoreOptions = {}): Promise<RagStore> {
    const log = childLogger(logger, { module: "database" });

    if (!config.databaseUrl) {
        log.warn("No database URL configured; documents are kept in memory and lost on restart.");
        return new InMemoryStore(logger);
    }

    const store = new PostgresStore(config, logger);
    if (config.autoMigrate) {
        await store.migrate(options.dimensions);
    }
    await store.verifyConnection();
    return store;
}

export { InMemoryStore } from "./memory";
export { PostgresStore } from "./postgres/client";
export * from "./types";

#!/usr/bin/env node
import { readFile } from "node:fs/promises";
import path from "node:path";
import { loadAppConfig, resolveConfigPath } from "../config/loadConfig";
import type { IngestionOutcome } from "../ingest/pipeline";
import { closeServiceContext, createServiceContext } from "../server/utils/context";
import { getErrorMessage } from "../utils/errors";
import { configureLogger, getLogger } from "../utils/logger";
import { assertPersistentStore, parseArgs, printHelp, summarize } from "./args";

async function main(): Promise<void> {
    const parsed = parseArgs(process.argv.slice(2));
    if (parsed === "help") {
        printHelp();
        return;
    }
    if (parsed.files.length === 0) {
        printHelp();
        process.exitCode = 1;
        return;
    }

    const config = await loadAppConfig(parsed.configPath);
    configureLogger(config.logging);
    const logger = getLogger();
    logger.info(`Loaded configuration from ${resolveConfigPath(parsed.configPath)}`);
    assertPersistentStore(config.database);

    const outcomes: IngestionOutcome[] = [];
    const context = await createServiceContext(config, logger, {
        onIngestionSettled: (outcome) => {
            outcomes.push(outcome);
            if (outcome.status === "completed") {
                logger.info({ documentId: outcome.documentId, chunkCount: outcome.chunkCount }, "Document ingested.");
            } else {
                logger.error({ documentId: outcome.documentId, error: outcome.error }, "Document ingestion failed.");
            }
        },
    });

    let accepted = 0;
    let duplicates = 0;
    let rejected = 0;

    try {
        for (const file of parsed.files) {
            const filePath = path.resolve(process.cwd(), file);
            try {
                const content = await readFile(filePath);
                const outcome = await context.documents.acceptUpload({ filename: path.basename(filePath), content });
                if (outcome.duplicate) {
                    duplicates++;
                    logger.info({ file, documentId: outcome.document.documentId }, "Skipped duplicate document.");
                } else {
                    accepted++;
                }
            } catch (error) {
                rejected++;
                logger.error({ file, error: getErrorMessage(error) }, "File was not accepted.");
            }
        }

        await context.queue.onIdle();
    } finally {
        await closeServiceContext(context);
    }

    const summary = summarize(outcomes, accepted, duplicates, rejected);
    logger.info(summary, "Ingestion finished.");

    if (summary.failed > 0 || summary.rejected > 0) {
        process.exitCode = 1;
    }
}

main().catch((error) => {
    const logger = getLogger();
    logger.error({ err: error }, "Ingestion failed.");
    process.exitCode = 1;
});

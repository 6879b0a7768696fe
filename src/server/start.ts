import { startServer } from "./server";
import { getLogger } from "../utils/logger";

async function main(): Promise<void> {
    const server = await startServer();
    const logger = getLogger();

    const shutdown = (signal: string): void => {
        logger.info({ signal }, "Shutting down.");
        server.close().then(
            () => process.exit(0),
            (error: unknown) => {
                logger.error({ err: error }, "Shutdown failed.");
                process.exit(1);
            }
        );
    };

    process.once("SIGINT", () => shutdown("SIGINT"));
    process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((error) => {
    const logger = getLogger();
    logger.error({ err: error }, "Failed to start server.");
    process.exitCode = 1;
});

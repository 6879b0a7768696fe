import type { Server } from "node:http";
import express, { type ErrorRequestHandler } from "express";
import type { Logger } from "pino";
import { loadAppConfig } from "../config/loadConfig";
import { configureLogger, getLogger } from "../utils/logger";
import { createApiRouter } from "./routers/api";
import { closeServiceContext, createServiceContext, type ServiceContext, type ServiceContextOverrides } from "./utils/context";

export interface ServerOptions {
    configPath?: string;
    port?: number;
}

type ExpressApp = ReturnType<typeof express>;

export interface RunningServer {
    app: ExpressApp;
    context: ServiceContext;
    port: number;
    close(): Promise<void>;
}

/** Uploads arrive as JSON strings, base64 among them, so the body limit leaves room for that encoding. */
function jsonBodyLimit(maxUploadBytes: number): number {
    return Math.ceil((maxUploadBytes * 4) / 3) + 64 * 1024;
}

function hasStatus(error: unknown): error is { status: number; type?: string } {
    return typeof error === "object" && error !== null && "status" in error && typeof error.status === "number";
}

function createErrorHandler(logger: Logger): ErrorRequestHandler {
    return (error, _req, res, next) => {
        if (res.headersSent) {
            next(error);
            return;
        }

        if (hasStatus(error) && error.status === 413) {
            logger.warn({ err: error }, "Request body exceeds the upload limit.");
            res.status(413).json({ status: "error", message: "Request body exceeds the maximum upload size." });
            return;
        }

        if (hasStatus(error) && error.status === 400) {
            res.status(400).json({ status: "error", message: "Malformed JSON body." });
            return;
        }

        logger.error({ err: error }, "Unhandled request error.");
        res.status(500).json({ status: "error", message: "Internal server error." });
    };
}

export function createApp(context: ServiceContext, logger: Logger): ExpressApp {
    const app = express();
    app.use(express.json({ limit: jsonBodyLimit(context.config.server.maxUploadBytes) }));
    app.use(createApiRouter(context, logger));
    app.use((_req, res) => {
        res.status(404).json({ status: "error", message: "Route not found." });
    });
    app.use(createErrorHandler(logger));
    return app;
}

export async function createServer(
    options: ServerOptions = {},
    overrides?: ServiceContextOverrides
): Promise<{ app: ExpressApp; context: ServiceContext }> {
    const config = await loadAppConfig(options.configPath);

    configureLogger(config.logging);
    const logger = getLogger();
    logger.info("Loaded server configuration.");

    const context = await createServiceContext(config, logger, overrides);
    return { app: createApp(context, logger), context };
}

export async function listen(app: ExpressApp, port: number): Promise<Server> {
    return new Promise((resolve, reject) => {
        const listener = app
            .listen(port, () => {
                listener.off("error", reject);
                resolve(listener);
            })
            .on("error", reject);
    });
}

export function closeHttpServer(server: Server): Promise<void> {
    return new Promise<void>((resolve, reject) => {
        server.close((error) => {
            if (error) {
                reject(error);
            } else {
                resolve();
            }
        });
    });
}

export async function startServer(options: ServerOptions = {}): Promise<RunningServer> {
    const { app, context } = await createServer(options);
    const logger = getLogger();
    const port = options.port ?? context.config.server.port;

    const server = await listen(app, port);
    logger.info({ port, store: context.store.kind }, "Server listening.");

    return {
        app,
        context,
        port,
        close: async () => {
            await closeHttpServer(server);
            await closeServiceContext(context);
        },
    };
}

import pino, { type Logger } from "pino";
import type { LoggingConfig } from "../config/types";

let loggerInstance: Logger | null = null;

// Provider configs carry API keys and are sometimes logged whole.
const REDACTED_PATHS = ["apiKey", "*.apiKey", "config.apiKey", "llm.*.apiKey"];

export function configureLogger(config: LoggingConfig): Logger {
    loggerInstance = pino({
        level: config.level,
        base: undefined,
        redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
        transport: config.pretty
            ?   {
                    target: "pino-pretty",
                    options: {
                        colorize: true,
                        translateTime: "SYS:standard",
                    }
                }
            : undefined,
    });
    return loggerInstance;
}

export function getLogger(): Logger {
    if(!loggerInstance) {
        loggerInstance = pino({
            level: process.env.RAGWELL_LOGGING_LEVEL ?? "info",
            base: undefined,
            redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
        });
    }
    return loggerInstance;
}

export function childLogger(logger: Logger | undefined, bindings: Record<string, string>): Logger {
    const base = logger ?? getLogger();
    return typeof base.child === "function" ? base.child(bindings) : base;
}

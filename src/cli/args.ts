import type { DatabaseConfig } from "../config/types";
import type { IngestionOutcome } from "../ingest/pipeline";
import { ConfigurationError } from "../utils/errors";

export interface CliOptions {
    /** As given on the command line; unset means the default lookup. */
    configPath?: string;
    files: string[];
}

export interface IngestSummary {
    accepted: number;
    duplicates: number;
    rejected: number;
    completed: number;
    failed: number;
}

export function printHelp(): void {
    const lines = [
        "Usage: ingest [--config <path-to-env>] <file...>",
        "",
        "Options:",
        "  -c, --config   Path to the .env configuration file (defaults to .env in package root).",
        "  -h, --help     Show this help message.",
    ];
    console.log(lines.join("\n"));
}

export function parseArgs(argv: string[]): CliOptions | "help" {
    let configPath: string | undefined;
    const files: string[] = [];

    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];

        if (arg === "-h" || arg === "--help") {
            return "help";
        }

        if (arg === "-c" || arg === "--config") {
            configPath = argv[i + 1];
            i += 1;
            continue;
        }

        files.push(arg);
    }

    return configPath === undefined ? { files } : { configPath, files };
}

/** Files ingested into the in-memory store would be gone when the command exits. */
export function assertPersistentStore(config: DatabaseConfig): void {
    if (!config.databaseUrl) {
        throw new ConfigurationError(
            "RAGWELL_DATABASE_URL is not set. The ingest command needs a database to write documents to."
        );
    }
}

export function summarize(outcomes: IngestionOutcome[], accepted: number, duplicates: number, rejected: number): IngestSummary {
    return {
        accepted,
        duplicates,
        rejected,
        completed: outcomes.filter((outcome) => outcome.status === "completed").length,
        failed: outcomes.filter((outcome) => outcome.status === "failed").length,
    };
}

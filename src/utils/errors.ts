export type ErrorCode =
    | "CONFIGURATION"
    | "VALIDATION"
    | "PARSE_FAILURE"
    | "EMBEDDING_GATEWAY"
    | "GENERATION_GATEWAY"
    | "RETRIEVAL"
    | "NOT_FOUND"
    | "DOCUMENT_STATE";

/**
 * Base class for every failure the service classifies. Anything else reaching
 * the outer layers is treated as an unexpected internal error.
 */
export class RagwellError extends Error {
    constructor(
        public readonly code: ErrorCode,
        message: string,
        options?: { cause?: unknown }
    ) {
        super(message, options);
        this.name = "RagwellError";
    }
}

/** Invalid chunker parameters, fusion weights or environment values. Never retried. */
export class ConfigurationError extends RagwellError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("CONFIGURATION", message, options);
        this.name = "ConfigurationError";
    }
}

export class ValidationError extends RagwellError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("VALIDATION", message, options);
        this.name = "ValidationError";
    }
}

export class ParseFailureError extends RagwellError {
    constructor(message: string, options?: { cause?: unknown }) {
        super("PARSE_FAILURE", message, options);
        this.name = "ParseFailureError";
    }
}

export class EmbeddingGatewayError extends RagwellError {
    constructor(
        public readonly provider: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super("EMBEDDING_GATEWAY", message, options);
        this.name = "EmbeddingGatewayError";
    }
}

export class GenerationGatewayError extends RagwellError {
    constructor(
        public readonly provider: string,
        message: string,
        options?: { cause?: unknown }
    ) {
        super("GENERATION_GATEWAY", message, options);
        this.name = "GenerationGatewayError";
    }
}

export class RetrievalError extends RagwellError {
    constructor(
        public readonly operation: string,
        cause: unknown
    ) {
        super("RETRIEVAL", `${operation} failed: ${getErrorMessage(cause)}`, { cause });
        this.name = "RetrievalError";
    }
}

export class NotFoundError extends RagwellError {
    constructor(
        public readonly resource: "document" | "chunk",
        public readonly id: string
    ) {
        super("NOT_FOUND", `${resource === "document" ? "Document" : "Chunk"} not found: ${id}`);
        this.name = "NotFoundError";
    }
}

export class DocumentStateError extends RagwellError {
    constructor(message: string) {
        super("DOCUMENT_STATE", message);
        this.name = "DocumentStateError";
    }
}

export function getErrorMessage(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}

export function toHttpStatus(error: unknown): number {
    if (!(error instanceof RagwellError)) {
        return 500;
    }

    switch (error.code) {
        case "CONFIGURATION":
        case "VALIDATION":
            return 400;
        case "NOT_FOUND":
            return 404;
        case "DOCUMENT_STATE":
            return 409;
        case "PARSE_FAILURE":
            return 422;
        case "EMBEDDING_GATEWAY":
        case "GENERATION_GATEWAY":
            return 502;
        default:
            return 500;
    }
}

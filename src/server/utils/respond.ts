import type { Response } from "express";
import type { Logger } from "pino";
import type { z } from "zod";
import { getErrorMessage, toHttpStatus, ValidationError } from "../../utils/errors";

export function parseRequest<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
    const result = schema.safeParse(value);
    if (!result.success) {
        const details = result.error.issues
            .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
            .join("; ");
        throw new ValidationError(`Invalid request. ${details}`, { cause: result.error });
    }
    return result.data;
}

export function sendError(res: Response, error: unknown, logger: Logger, context: string): void {
    const status = toHttpStatus(error);
    if (status >= 500) {
        logger.error({ err: error }, `${context} failed.`);
    } else {
        logger.warn({ err: error, status }, `${context} rejected.`);
    }

    res.status(status).json({
        status: "error",
        message: status === 500 ? "Internal server error." : getErrorMessage(error),
    });
}

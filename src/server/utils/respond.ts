import type { Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import { EmptyQueryError, UnknownAspectError, isAbortError } from "../../utils/errors";

export function sendError(res: Response, status: number, message: string): void {
    res.status(status).json({ status: "error", message });
}

export function describeValidationError(error: z.ZodError): string {
    const issue = error.issues[0];
    if (!issue) {
        return "Invalid request body.";
    }
    const field = issue.path.join(".");
    return field ? `Invalid '${field}': ${issue.message}` : issue.message;
}

/** Maps failures from the retrieval pipeline onto HTTP status codes. */
export function sendFailure(res: Response, error: unknown, logger: Logger, route: string): void {
    if (error instanceof EmptyQueryError || error instanceof UnknownAspectError) {
        sendError(res, 400, error.message);
        return;
    }

    if (isAbortError(error)) {
        logger.warn({ route }, "Request timed out.");
        sendError(res, 504, "Request timed out.");
        return;
    }

    logger.error({ err: error, route }, "Request failed.");
    sendError(res, 500, error instanceof Error ? error.message : "Internal server error.");
}

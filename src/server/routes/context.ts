import type { Request, Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import type { ServerContext } from "../utils/context";
import { describeValidationError, sendError, sendFailure } from "../utils/respond";

const contextRequestSchema = z.object({
    query: z.string(),
});

export async function handleContextRequest(
    req: Request,
    res: Response,
    context: ServerContext,
    logger: Logger
): Promise<void> {
    const parsed = contextRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
        sendError(res, 400, describeValidationError(parsed.error));
        return;
    }

    try {
        const prompt = await context.retriever.retrieveContext(parsed.data.query, {
            signal: AbortSignal.timeout(context.config.server.requestTimeoutMs),
        });
        res.json({ status: "ok", context: prompt });
    } catch (error) {
        sendFailure(res, error, logger, "/context");
    }
}

import type { Request, Response } from "express";
import type { Logger } from "pino";
import { z } from "zod";
import { askLeilan } from "../../query/askLeilan";
import type { ServerContext } from "../utils/context";
import { describeValidationError, sendError, sendFailure } from "../utils/respond";

const askRequestSchema = z.object({
    query: z.string(),
    aspect: z.string().trim().min(1).optional(),
});

export async function handleAskRequest(
    req: Request,
    res: Response,
    context: ServerContext,
    logger: Logger
): Promise<void> {
    const parsed = askRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
        sendError(res, 400, describeValidationError(parsed.error));
        return;
    }

    if (!context.chat) {
        sendError(res, 503, "No chat model is configured.");
        return;
    }

    try {
        const result = await askLeilan(
            context.retriever,
            context.chat,
            {
                query: parsed.data.query,
                aspect: parsed.data.aspect,
                signal: AbortSignal.timeout(context.config.server.requestTimeoutMs),
            },
            logger
        );
        res.json({ status: "ok", ...result });
    } catch (error) {
        sendFailure(res, error, logger, "/ask");
    }
}

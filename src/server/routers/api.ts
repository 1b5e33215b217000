import { Router } from "express";
import type { Logger } from "pino";
import { handleHealthRequest } from "../routes/health";
import { handleContextRequest } from "../routes/context";
import { handleAskRequest } from "../routes/ask";
import type { ServerContext } from "../utils/context";

export function createApiRouter(context: ServerContext, logger: Logger): Router {
    const router = Router();

    router.get("/health", (req, res) => {
        handleHealthRequest(req, res, { stats: context.retriever.stats, chatEnabled: Boolean(context.chat) });
    });

    router.post("/context", async (req, res) => {
        await handleContextRequest(req, res, context, logger);
    });

    router.post("/ask", async (req, res) => {
        await handleAskRequest(req, res, context, logger);
    });

    return router;
}

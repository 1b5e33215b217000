import type { Request, Response } from "express";
import type { CorpusStats } from "../../retrieval/retriever";

export interface HealthRouteContext {
    stats: CorpusStats;
    chatEnabled: boolean;
}

export function handleHealthRequest(_req: Request, res: Response, context: HealthRouteContext): void {
    res.json({
        status: "ok",
        chat: context.chatEnabled,
        chunks: {
            dialogue: context.stats.dialogue.chunks,
            essay: context.stats.essay.chunks,
            interview: context.stats.interview.chunks,
        },
    });
}

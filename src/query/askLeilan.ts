import type { Logger } from "pino";
import type { ChatProvider } from "../llm/types";
import type { ContextRetriever } from "../retrieval/retriever";
import { QUERY_MARKER } from "../retrieval/format";
import { UnknownAspectError } from "../utils/errors";
import { getLogger } from "../utils/logger";

export const DEFAULT_ASPECT = "mother";

/** Replies are cut where the model starts writing a next query of its own. */
const REPLY_STOP = QUERY_MARKER.trimEnd();

export interface AskLeilanOptions {
    query: string;
    aspect?: string;
    signal?: AbortSignal;
}

export interface AskLeilanResult {
    answer: string;
    aspect: string;
    model: string;
}

export function truncateReply(reply: string): string {
    const stop = reply.indexOf(REPLY_STOP);
    return stop === -1 ? reply : reply.slice(0, stop);
}

export function resolveAspectModel(aspects: Record<string, string>, aspect: string): string {
    const model = Object.hasOwn(aspects, aspect) ? aspects[aspect] : undefined;
    if (!model) {
        throw new UnknownAspectError(aspect, Object.keys(aspects));
    }
    return model;
}

export async function askLeilan(
    retriever: Pick<ContextRetriever, "retrieveContext">,
    chat: ChatProvider,
    options: AskLeilanOptions,
    logger?: Logger
): Promise<AskLeilanResult> {
    const activeLogger = (logger ?? getLogger()).child({ module: "ask" });
    const aspect = options.aspect ?? DEFAULT_ASPECT;
    const model = resolveAspectModel(chat.config.aspects, aspect);

    const retrievalStartedAt = Date.now();
    const context = await retriever.retrieveContext(options.query, { signal: options.signal });
    const retrievalMs = Date.now() - retrievalStartedAt;

    const generationStartedAt = Date.now();
    const reply = await chat.generateAnswer({
        prompt: context,
        model,
        temperature: chat.config.temperature,
        maxTokens: chat.config.maxOutputTokens,
        signal: options.signal,
    });

    activeLogger.info(
        { aspect, model, retrievalMs, generationMs: Date.now() - generationStartedAt },
        "Generated answer."
    );

    return { answer: truncateReply(reply), aspect, model };
}

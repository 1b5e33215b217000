import type { AppConfig } from "../../config/types";
import type { ChatProvider } from "../../llm/types";
import type { ContextRetriever } from "../../retrieval/retriever";

export interface ServerContext {
    config: AppConfig;
    retriever: Pick<ContextRetriever, "retrieveContext" | "stats">;
    /** Absent when no chat model is configured; `/ask` then answers 503. */
    chat?: ChatProvider;
}

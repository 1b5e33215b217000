import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";

export interface EmbedOptions {
    signal?: AbortSignal;
}

export interface GenerateAnswerOptions {
    prompt: string;
    /** Overrides the configured chat model for this request. */
    model?: string;
    temperature?: number;
    maxTokens?: number;
    signal?: AbortSignal;
}

export interface EmbeddingProvider {
    readonly config: EmbeddingModelConfig;
    embedQuery(query: string, options?: EmbedOptions): Promise<number[]>;
}

export type QueryEmbedder = Pick<EmbeddingProvider, "embedQuery">;

export interface ChatProvider {
    readonly config: ChatModelConfig;
    generateAnswer(options: GenerateAnswerOptions): Promise<string>;
}

export interface LLMClientBundle {
    embedding: EmbeddingProvider;
    chat?: ChatProvider;
}

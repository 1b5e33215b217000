import type { Logger } from "pino";
import { createOpenAI } from "@ai-sdk/openai";
import { embed, generateText } from "ai";
import { BaseChatProvider, BaseEmbeddingProvider, type ResolvedAnswerOptions } from "../base";
import type { ChatModelConfig, EmbeddingModelConfig } from "../../config/types";
import type { EmbedOptions } from "../types";
import { mergeLimits, requireApiKey, resolveBaseUrl } from "../../utils/providerUtils";

const OPENAI_DEFAULT_BASE_URL = "https://api.openai.com/v1/";

/**
 * Also serves any OpenAI-compatible embedding server (for example a text
 * embeddings inference host running all-mpnet-base-v2) through `baseUrl`.
 */
export class OpenAIEmbeddingProvider extends BaseEmbeddingProvider {
    private readonly sdk: ReturnType<typeof createOpenAI>;

    constructor(config: EmbeddingModelConfig, logger?: Logger) {
        const apiKey = requireApiKey(config.apiKey, "OpenAI", "embeddings");

        super(
            config,
            mergeLimits(
                {
                    concurrency: 4,
                    maxRequestsPerMinute: 1_500,
                    maxTokensPerMinute: 6_250_000,
                    retries: 6,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createOpenAI({
            apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, OPENAI_DEFAULT_BASE_URL),
        });
    }

    protected async sendEmbeddingRequest(query: string, options?: EmbedOptions): Promise<number[]> {
        const { embedding } = await embed({
            model: this.sdk.textEmbeddingModel(this.config.model),
            value: query,
            abortSignal: options?.signal,
            maxRetries: 0,
        });
        return embedding;
    }
}

export class OpenAIChatProvider extends BaseChatProvider {
    private readonly sdk: ReturnType<typeof createOpenAI>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        const apiKey = requireApiKey(config.apiKey, "OpenAI", "chat completions");

        super(
            config,
            mergeLimits(
                {
                    concurrency: 3,
                    maxRequestsPerMinute: 500,
                    maxTokensPerMinute: 90_000,
                    retries: 5,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createOpenAI({
            apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, OPENAI_DEFAULT_BASE_URL),
        });
    }

    protected async complete(options: ResolvedAnswerOptions): Promise<string> {
        const { text } = await generateText({
            model: this.sdk(options.model),
            messages: [{ role: "user", content: options.prompt }],
            temperature: options.temperature ?? this.config.temperature,
            maxTokens: options.maxTokens ?? this.config.maxOutputTokens,
            abortSignal: options.signal,
            maxRetries: 0,
        });
        return text;
    }
}

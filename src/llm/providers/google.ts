import type { Logger } from "pino";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { embed, generateText } from "ai";
import { BaseChatProvider, BaseEmbeddingProvider, type ResolvedAnswerOptions } from "../base";
import type { ChatModelConfig, EmbeddingModelConfig } from "../../config/types";
import type { EmbedOptions } from "../types";
import { mergeLimits, requireApiKey, resolveBaseUrl } from "../../utils/providerUtils";

const GEMINI_DEFAULT_BASE_URL = "https://generativelanguage.googleapis.com/v1beta/";

export class GoogleEmbeddingProvider extends BaseEmbeddingProvider {
    private readonly sdk: ReturnType<typeof createGoogleGenerativeAI>;

    constructor(config: EmbeddingModelConfig, logger?: Logger) {
        const apiKey = requireApiKey(config.apiKey, "Google Generative AI", "embeddings");

        super(
            config,
            mergeLimits(
                {
                    concurrency: 3,
                    maxRequestsPerMinute: 300,
                    maxTokensPerMinute: 1_000_000,
                    retries: 5,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createGoogleGenerativeAI({
            apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, GEMINI_DEFAULT_BASE_URL),
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

export class GoogleChatProvider extends BaseChatProvider {
    private readonly sdk: ReturnType<typeof createGoogleGenerativeAI>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        const apiKey = requireApiKey(config.apiKey, "Google Generative AI", "chat completions");

        super(
            config,
            mergeLimits(
                {
                    concurrency: 2,
                    maxRequestsPerMinute: 60,
                    maxTokensPerMinute: 120_000,
                    retries: 5,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createGoogleGenerativeAI({
            apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, GEMINI_DEFAULT_BASE_URL),
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

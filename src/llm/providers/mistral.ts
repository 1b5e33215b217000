import type { Logger } from "pino";
import { createMistral } from "@ai-sdk/mistral";
import { embed, generateText } from "ai";
import { BaseChatProvider, BaseEmbeddingProvider, type ResolvedAnswerOptions } from "../base";
import type { ChatModelConfig, EmbeddingModelConfig } from "../../config/types";
import type { EmbedOptions } from "../types";
import { mergeLimits, requireApiKey, resolveBaseUrl } from "../../utils/providerUtils";

const MISTRAL_DEFAULT_BASE_URL = "https://api.mistral.ai/v1/";

export class MistralEmbeddingProvider extends BaseEmbeddingProvider {
    private readonly sdk: ReturnType<typeof createMistral>;

    constructor(config: EmbeddingModelConfig, logger?: Logger) {
        const apiKey = requireApiKey(config.apiKey, "Mistral", "embeddings");

        super(
            config,
            mergeLimits(
                {
                    concurrency: 2,
                    maxRequestsPerMinute: 300,
                    maxTokensPerMinute: 1_000_000,
                    retries: 5,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createMistral({
            apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, MISTRAL_DEFAULT_BASE_URL),
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

export class MistralChatProvider extends BaseChatProvider {
    private readonly sdk: ReturnType<typeof createMistral>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        const apiKey = requireApiKey(config.apiKey, "Mistral", "chat completions");

        super(
            config,
            mergeLimits(
                {
                    concurrency: 2,
                    maxRequestsPerMinute: 120,
                    maxTokensPerMinute: 500_000,
                    retries: 5,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createMistral({
            apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, MISTRAL_DEFAULT_BASE_URL),
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

import type { Logger } from "pino";
import { createAnthropic } from "@ai-sdk/anthropic";
import { generateText } from "ai";
import { BaseChatProvider, type ResolvedAnswerOptions } from "../base";
import type { ChatModelConfig } from "../../config/types";
import { mergeLimits, requireApiKey, resolveBaseUrl } from "../../utils/providerUtils";

const ANTHROPIC_DEFAULT_BASE_URL = "https://api.anthropic.com/v1/";

export class AnthropicChatProvider extends BaseChatProvider {
    private readonly sdk: ReturnType<typeof createAnthropic>;

    constructor(config: ChatModelConfig, logger?: Logger) {
        const apiKey = requireApiKey(config.apiKey, "Anthropic", "chat completions");

        super(
            config,
            mergeLimits(
                {
                    concurrency: 4,
                    maxRequestsPerMinute: 200,
                    maxTokensPerMinute: 200_000,
                    retries: 5,
                },
                config.limits
            ),
            logger
        );

        this.sdk = createAnthropic({
            apiKey,
            baseURL: resolveBaseUrl(config.baseUrl, ANTHROPIC_DEFAULT_BASE_URL),
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

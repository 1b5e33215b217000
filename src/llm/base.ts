import pRetry, { type FailedAttemptError } from "p-retry";
import type Bottleneck from "bottleneck";
import type { Logger } from "pino";
import type { ChatModelConfig, EmbeddingModelConfig } from "../config/types";
import { createRateLimiter } from "../utils/rateLimiter";
import { countTokens } from "../utils/tokenEncoder";
import type { ChatProvider, EmbedOptions, EmbeddingProvider, GenerateAnswerOptions } from "./types";

export interface ProviderRateLimits {
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
}

interface ScheduleOptions {
    logPrefix: string;
    signal?: AbortSignal;
}

export type ResolvedAnswerOptions = GenerateAnswerOptions & { model: string };

export function normalizeVector(vector: number[]): number[] {
    const norm = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0));
    if (norm === 0) {
        return vector;
    }
    return vector.map((value) => value / norm);
}

abstract class RateLimitedProvider {
    protected readonly retries: number;

    private readonly requestLimiter: Bottleneck;
    private readonly tokenLimiter?: Bottleneck;

    constructor(limits: ProviderRateLimits, scope: string, protected readonly logger?: Logger) {
        this.retries = limits.retries ?? 5;
        const concurrency = Math.max(1, limits.concurrency ?? 5);

        this.requestLimiter = createRateLimiter({
            id: `${scope}:requests`,
            concurrency,
            perMinute: limits.maxRequestsPerMinute,
            logger,
        });

        if(limits.maxTokensPerMinute && Number.isFinite(limits.maxTokensPerMinute)) {
            this.tokenLimiter = createRateLimiter({
                id: `${scope}:tokens`,
                concurrency: Math.max(concurrency, Math.ceil(limits.maxTokensPerMinute)),
                perMinute: limits.maxTokensPerMinute,
                logger,
            });
        }
    }

    protected async scheduleWithRateLimits<T>(tokens: number, task: () => Promise<T>, { logPrefix, signal }: ScheduleOptions): Promise<T> {
        await this.reserveTokens(tokens);
        return this.requestLimiter.schedule(() =>
            pRetry(task, {
                retries: this.retries,
                signal,
                onFailedAttempt: (error: FailedAttemptError) => {
                    this.logger?.warn(
                        {
                            attemptNumber: error.attemptNumber,
                            retriesLeft: error.retriesLeft,
                            error: error.message,
                        },
                        `${logPrefix} failed attempt`
                    );
                },
            })
        );
    }

    private async reserveTokens(tokens: number): Promise<void> {
        if(!this.tokenLimiter || tokens <= 0) {
            return;
        }

        const weight = Math.max(1, Math.ceil(tokens));
        await this.tokenLimiter.schedule({ weight }, async () => undefined);
    }
}

export abstract class BaseEmbeddingProvider extends RateLimitedProvider implements EmbeddingProvider {
    constructor(
        public readonly config: EmbeddingModelConfig,
        limits: ProviderRateLimits,
        logger?: Logger
    ) {
        super(limits, `${config.provider}:embed`, logger);
    }

    async embedQuery(query: string, options?: EmbedOptions): Promise<number[]> {
        const tokens = countTokens(query, this.config.model);
        const embedding = await this.scheduleWithRateLimits(tokens, () => this.sendEmbeddingRequest(query, options), {
            logPrefix: `${this.config.provider}:embed`,
            signal: options?.signal,
        });

        if (embedding.length === 0) {
            throw new Error(`${this.config.provider} returned an empty embedding.`);
        }

        // similarity scoring assumes unit vectors
        return this.config.normalize ? normalizeVector(embedding) : embedding;
    }

    protected abstract sendEmbeddingRequest(query: string, options?: EmbedOptions): Promise<number[]>;
}

export abstract class BaseChatProvider extends RateLimitedProvider implements ChatProvider {
    constructor(
        public readonly config: ChatModelConfig,
        limits: ProviderRateLimits,
        logger?: Logger
    ) {
        super(limits, `${config.provider}:chat`, logger);
    }

    async generateAnswer(options: GenerateAnswerOptions): Promise<string> {
        const resolved: ResolvedAnswerOptions = { ...options, model: options.model ?? this.config.model };
        const tokens = this.estimateChatTokens(resolved);
        return this.scheduleWithRateLimits(tokens, () => this.complete(resolved), {
            logPrefix: `${this.config.provider}:chat`,
            signal: options.signal,
        });
    }

    protected estimateChatTokens(options: ResolvedAnswerOptions): number {
        const outputBudget = options.maxTokens ?? this.config.maxOutputTokens ?? 500;
        return countTokens(options.prompt, options.model) + outputBudget;
    }

    protected abstract complete(options: ResolvedAnswerOptions): Promise<string>;
}

export interface LoggingConfig {
    level: "fatal" | "error" | "warn" | "info" | "debug" | "trace";
    pretty: boolean;
}

export interface ServerConfig {
    apiKey?: string;
    requestTimeoutMs: number;
}

export interface CorpusConfig {
    embeddingsDir: string;
    remoteBaseUrl: string;
    downloadConcurrency: number;
    downloadRetries: number;
}

export type AggregationPolicy = "max" | "mean";

export interface ResultLimits {
    gpt: number;
    opus: number;
    essay: number;
    interview: number;
}

export interface RetrievalConfig {
    aggregation: AggregationPolicy;
    limits: ResultLimits;
    promptTemplatePath?: string;
}

export type LLMProviderName =
    | "openai"
    | "google"
    | "anthropic"
    | "mistral"

export interface ProviderLimitsConfig {
    concurrency?: number;
    maxRequestsPerMinute?: number;
    maxTokensPerMinute?: number;
    retries?: number;
}

interface BaseModelConfig {
    provider: LLMProviderName;
    apiKey?: string;
    baseUrl?: string;
    limits?: ProviderLimitsConfig;
}

export interface EmbeddingModelConfig extends BaseModelConfig {
    model: string;
    normalize: boolean;
}

export interface ChatModelConfig extends BaseModelConfig {
    model: string;
    maxOutputTokens?: number;
    temperature: number;
    aspects: Record<string, string>;
}

export interface LLMConfig {
    embedding: EmbeddingModelConfig;
    chat?: ChatModelConfig;
}

export interface AppConfig {
    logging: LoggingConfig;
    server: ServerConfig;
    corpus: CorpusConfig;
    retrieval: RetrievalConfig;
    llm: LLMConfig;
}

import { config as loadDotenv } from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { AggregationPolicy, AppConfig, ChatModelConfig, LLMProviderName, LoggingConfig, ProviderLimitsConfig } from "./types";

type Env = Record<string, string | undefined>;

const PACKAGE_ROOT = fileURLToPath(new URL("../..", import.meta.url));

export const DEFAULT_REMOTE_BASE_URL = "https://huggingface.co/datasets/mwatkins1970/leilan3-embeddings/resolve/main";

export const DEFAULT_ASPECT_MODELS: Record<string, string> = {
    mother: "claude-3-opus-20240229",
    crone: "claude-3-sonnet-20240229",
    maiden: "claude-3-haiku-20240307",
};

const LOG_LEVELS: ReadonlyArray<LoggingConfig["level"]> = ["fatal", "error", "warn", "info", "debug", "trace"];
const PROVIDERS: ReadonlyArray<LLMProviderName> = ["openai", "google", "anthropic", "mistral"];
const AGGREGATION_POLICIES: ReadonlyArray<AggregationPolicy> = ["max", "mean"];

function getEnv(env: Env, key: string, required = true): string | undefined {
    const value = env[key]?.trim();
    if (required && !value) {
        throw new Error(`Missing required environment variable: ${key}`);
    }
    return value || undefined;
}

function getEnvNumber(env: Env, key: string): number | undefined;
function getEnvNumber(env: Env, key: string, defaultValue: number): number;
function getEnvNumber(env: Env, key: string, defaultValue?: number): number | undefined {
    const value = env[key]?.trim();
    if (!value) {
        return defaultValue;
    }
    const parsed = Number.parseFloat(value);
    if (Number.isNaN(parsed)) {
        throw new Error(`Environment variable ${key} must be a valid number, got: ${value}`);
    }
    return parsed;
}

function getEnvPositiveInt(env: Env, key: string, defaultValue: number): number {
    const value = getEnvNumber(env, key, defaultValue);
    if (!Number.isInteger(value) || value <= 0) {
        throw new Error(`Environment variable ${key} must be a positive integer, got: ${value}`);
    }
    return value;
}

function getEnvNonNegativeInt(env: Env, key: string, defaultValue: number): number {
    const value = getEnvNumber(env, key, defaultValue);
    if (!Number.isInteger(value) || value < 0) {
        throw new Error(`Environment variable ${key} must be a non-negative integer, got: ${value}`);
    }
    return value;
}

function getEnvBoolean(env: Env, key: string, defaultValue = false): boolean {
    const value = env[key];
    if (!value) {
        return defaultValue;
    }
    const lowered = value.toLowerCase().trim();
    return lowered === "true" || lowered === "1" || lowered === "yes";
}

function getEnvChoice<T extends string>(env: Env, key: string, choices: ReadonlyArray<T>, defaultValue?: T): T {
    const value = getEnv(env, key, defaultValue === undefined);
    if (value === undefined && defaultValue !== undefined) {
        return defaultValue;
    }

    const match = choices.find((choice) => choice === value?.toLowerCase());
    if (!match) {
        throw new Error(`Environment variable ${key} must be one of ${choices.join(", ")}, got: ${value}`);
    }
    return match;
}

function getEnvLimits(env: Env, prefix: string): ProviderLimitsConfig {
    return {
        concurrency: getEnvNumber(env, `${prefix}_LIMITS_CONCURRENCY`),
        maxRequestsPerMinute: getEnvNumber(env, `${prefix}_LIMITS_MAX_REQUESTS_PER_MINUTE`),
        maxTokensPerMinute: getEnvNumber(env, `${prefix}_LIMITS_MAX_TOKENS_PER_MINUTE`),
        retries: getEnvNumber(env, `${prefix}_LIMITS_RETRIES`),
    };
}

export function parseAspectModels(value: string | undefined): Record<string, string> {
    if (!value) {
        return { ...DEFAULT_ASPECT_MODELS };
    }

    const aspects: Record<string, string> = {};
    for (const entry of value.split(",").map((part) => part.trim()).filter(Boolean)) {
        const separator = entry.indexOf("=");
        const name = entry.slice(0, separator).trim().toLowerCase();
        const model = entry.slice(separator + 1).trim();
        if (separator <= 0 || !name || !model) {
            throw new Error(`LEILAN_LLM_CHAT_ASPECTS entries must look like "aspect=model", got: ${entry}`);
        }
        aspects[name] = model;
    }
    return aspects;
}

function buildChatConfig(env: Env): ChatModelConfig | undefined {
    const model = getEnv(env, "LEILAN_LLM_CHAT_MODEL", false);
    if (!getEnv(env, "LEILAN_LLM_CHAT_PROVIDER", false) || !model) {
        return undefined;
    }

    return {
        provider: getEnvChoice(env, "LEILAN_LLM_CHAT_PROVIDER", PROVIDERS),
        model,
        apiKey: getEnv(env, "LEILAN_LLM_CHAT_API_KEY", false),
        baseUrl: getEnv(env, "LEILAN_LLM_CHAT_BASE_URL", false),
        temperature: getEnvNumber(env, "LEILAN_LLM_CHAT_TEMPERATURE", 0.8),
        maxOutputTokens: getEnvNumber(env, "LEILAN_LLM_CHAT_MAX_OUTPUT_TOKENS", 500),
        aspects: parseAspectModels(getEnv(env, "LEILAN_LLM_CHAT_ASPECTS", false)),
        limits: getEnvLimits(env, "LEILAN_LLM_CHAT"),
    };
}

export function resolveConfigPath(providedPath?: string): string {
    if (providedPath) {
        return path.resolve(process.cwd(), providedPath);
    }

    if (process.env.LEILAN_CONFIG_PATH) {
        return path.resolve(process.cwd(), process.env.LEILAN_CONFIG_PATH);
    }

    return path.join(PACKAGE_ROOT, ".env");
}

export function buildAppConfig(env: Env): AppConfig {
    const embeddingModel = getEnv(env, "LEILAN_LLM_EMBEDDING_MODEL", false);
    if (!getEnv(env, "LEILAN_LLM_EMBEDDING_PROVIDER", false) || !embeddingModel) {
        throw new Error("LLM embedding configuration requires LEILAN_LLM_EMBEDDING_PROVIDER and LEILAN_LLM_EMBEDDING_MODEL.");
    }

    const templatePath = getEnv(env, "LEILAN_PROMPT_TEMPLATE_PATH", false);

    return {
        logging: {
            level: getEnvChoice(env, "LEILAN_LOGGING_LEVEL", LOG_LEVELS, "info"),
            pretty: getEnvBoolean(env, "LEILAN_LOGGING_PRETTY", true),
        },
        server: {
            apiKey: getEnv(env, "LEILAN_SERVER_API_KEY", false),
            requestTimeoutMs: getEnvPositiveInt(env, "LEILAN_SERVER_REQUEST_TIMEOUT_MS", 60_000),
        },
        corpus: {
            embeddingsDir: path.resolve(PACKAGE_ROOT, getEnv(env, "LEILAN_EMBEDDINGS_DIR", false) ?? "embeddings"),
            remoteBaseUrl: (getEnv(env, "LEILAN_EMBEDDINGS_BASE_URL", false) ?? DEFAULT_REMOTE_BASE_URL).replace(/\/+$/, ""),
            downloadConcurrency: getEnvPositiveInt(env, "LEILAN_DOWNLOAD_CONCURRENCY", 4),
            downloadRetries: getEnvNonNegativeInt(env, "LEILAN_DOWNLOAD_RETRIES", 3),
        },
        retrieval: {
            aggregation: getEnvChoice(env, "LEILAN_AGGREGATION", AGGREGATION_POLICIES, "max"),
            limits: {
                gpt: getEnvPositiveInt(env, "LEILAN_RESULTS_GPT", 10),
                opus: getEnvPositiveInt(env, "LEILAN_RESULTS_OPUS", 10),
                essay: getEnvPositiveInt(env, "LEILAN_RESULTS_ESSAY", 5),
                interview: getEnvPositiveInt(env, "LEILAN_RESULTS_INTERVIEW", 5),
            },
            promptTemplatePath: templatePath ? path.resolve(PACKAGE_ROOT, templatePath) : undefined,
        },
        llm: {
            embedding: {
                provider: getEnvChoice(env, "LEILAN_LLM_EMBEDDING_PROVIDER", PROVIDERS),
                model: embeddingModel,
                apiKey: getEnv(env, "LEILAN_LLM_EMBEDDING_API_KEY", false),
                baseUrl: getEnv(env, "LEILAN_LLM_EMBEDDING_BASE_URL", false),
                normalize: getEnvBoolean(env, "LEILAN_LLM_EMBEDDING_NORMALIZE", true),
                limits: getEnvLimits(env, "LEILAN_LLM_EMBEDDING"),
            },
            chat: buildChatConfig(env),
        },
    };
}

export async function loadAppConfig(configPath?: string): Promise<AppConfig> {
    const envPath = configPath ?? resolveConfigPath();
    const result = loadDotenv({ path: envPath });

    if (result.error) {
        // Only fail if an explicit path was provided, otherwise env vars may already be loaded
        if (configPath) {
            throw new Error(`Failed to load environment file from "${configPath}": ${result.error.message}`);
        }
    }

    return buildAppConfig(process.env);
}

import { describe, it, expect } from "vitest";
import { DEFAULT_ASPECT_MODELS, DEFAULT_REMOTE_BASE_URL, buildAppConfig, parseAspectModels } from "../src/config/loadConfig";

const minimalEnv = {
    LEILAN_LLM_EMBEDDING_PROVIDER: "openai",
    LEILAN_LLM_EMBEDDING_MODEL: "all-mpnet-base-v2",
};

describe("buildAppConfig", () => {
    it("applies defaults", () => {
        const config = buildAppConfig(minimalEnv);

        expect(config.logging).toEqual({ level: "info", pretty: true });
        expect(config.server).toEqual({ apiKey: undefined, requestTimeoutMs: 60_000 });
        expect(config.corpus.remoteBaseUrl).toBe(DEFAULT_REMOTE_BASE_URL);
        expect(config.corpus.embeddingsDir.endsWith("embeddings")).toBe(true);
        expect(config.corpus.downloadConcurrency).toBe(4);
        expect(config.corpus.downloadRetries).toBe(3);
        expect(config.retrieval.aggregation).toBe("max");
        expect(config.retrieval.limits).toEqual({ gpt: 10, opus: 10, essay: 5, interview: 5 });
        expect(config.retrieval.promptTemplatePath).toBeUndefined();
        expect(config.llm.embedding.normalize).toBe(true);
        expect(config.llm.chat).toBeUndefined();
    });

    it("reads overrides", () => {
        const config = buildAppConfig({
            ...minimalEnv,
            LEILAN_AGGREGATION: "MEAN",
            LEILAN_RESULTS_GPT: "3",
            LEILAN_EMBEDDINGS_BASE_URL: "https://mirror.example.test/corpus//",
            LEILAN_SERVER_API_KEY: "test-secret",
            LEILAN_LLM_EMBEDDING_NORMALIZE: "false",
        });

        expect(config.retrieval.aggregation).toBe("mean");
        expect(config.retrieval.limits.gpt).toBe(3);
        expect(config.corpus.remoteBaseUrl).toBe("https://mirror.example.test/corpus");
        expect(config.server.apiKey).toBe("test-secret");
        expect(config.llm.embedding.normalize).toBe(false);
    });

    it("builds the chat model only when provider and model are both set", () => {
        expect(buildAppConfig({ ...minimalEnv, LEILAN_LLM_CHAT_PROVIDER: "anthropic" }).llm.chat).toBeUndefined();

        const chat = buildAppConfig({
            ...minimalEnv,
            LEILAN_LLM_CHAT_PROVIDER: "anthropic",
            LEILAN_LLM_CHAT_MODEL: "claude-3-opus-20240229",
            LEILAN_LLM_CHAT_API_KEY: "test-secret",
        }).llm.chat;

        expect(chat?.provider).toBe("anthropic");
        expect(chat?.temperature).toBe(0.8);
        expect(chat?.maxOutputTokens).toBe(500);
        expect(chat?.aspects).toEqual(DEFAULT_ASPECT_MODELS);
    });

    it("rejects invalid values", () => {
        expect(() => buildAppConfig({})).toThrow(
            "LLM embedding configuration requires LEILAN_LLM_EMBEDDING_PROVIDER and LEILAN_LLM_EMBEDDING_MODEL."
        );
        expect(() => buildAppConfig({ ...minimalEnv, LEILAN_AGGREGATION: "median" })).toThrow(
            "Environment variable LEILAN_AGGREGATION must be one of max, mean, got: median"
        );
        expect(() => buildAppConfig({ ...minimalEnv, LEILAN_RESULTS_OPUS: "0" })).toThrow(
            "Environment variable LEILAN_RESULTS_OPUS must be a positive integer, got: 0"
        );
        expect(() => buildAppConfig({ ...minimalEnv, LEILAN_DOWNLOAD_RETRIES: "many" })).toThrow(
            "Environment variable LEILAN_DOWNLOAD_RETRIES must be a valid number, got: many"
        );
        expect(() => buildAppConfig({ ...minimalEnv, LEILAN_DOWNLOAD_RETRIES: "-1" })).toThrow(
            "Environment variable LEILAN_DOWNLOAD_RETRIES must be a non-negative integer, got: -1"
        );
        expect(() => buildAppConfig({ ...minimalEnv, LEILAN_DOWNLOAD_RETRIES: "1.5" })).toThrow(
            "Environment variable LEILAN_DOWNLOAD_RETRIES must be a non-negative integer, got: 1.5"
        );
        expect(buildAppConfig({ ...minimalEnv, LEILAN_DOWNLOAD_RETRIES: "0" }).corpus.downloadRetries).toBe(0);
        expect(() => buildAppConfig({ ...minimalEnv, LEILAN_LLM_EMBEDDING_PROVIDER: "cohere" })).toThrow(
            "Environment variable LEILAN_LLM_EMBEDDING_PROVIDER must be one of openai, google, anthropic, mistral, got: cohere"
        );
    });
});

describe("parseAspectModels", () => {
    it("parses name=model pairs", () => {
        expect(parseAspectModels("Mother = model-a, crone=model-b")).toEqual({ mother: "model-a", crone: "model-b" });
    });

    it("falls back to the default aspects", () => {
        expect(parseAspectModels(undefined)).toEqual(DEFAULT_ASPECT_MODELS);
    });

    it("rejects malformed entries", () => {
        expect(() => parseAspectModels("mother")).toThrow(
            'LEILAN_LLM_CHAT_ASPECTS entries must look like "aspect=model", got: mother'
        );
    });
});

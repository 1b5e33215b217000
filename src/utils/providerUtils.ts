import type { ProviderRateLimits } from "../llm/base";
import type { ProviderLimitsConfig } from "../config/types";

export function resolveBaseUrl(url: string | undefined, defaultUrl: string): string {
    if (!url) {
        return defaultUrl;
    }
    return url.endsWith("/") ? url : `${url}/`;
}

export function mergeLimits(defaults: ProviderRateLimits, override?: ProviderLimitsConfig): ProviderRateLimits {
    if (!override) {
        return defaults;
    }

    const defined = Object.fromEntries(
        Object.entries(override).filter(([, value]) => value !== undefined)
    );

    return {
        ...defaults,
        ...defined,
    };
}

export function requireApiKey(apiKey: string | undefined, providerLabel: string, purpose: "embeddings" | "chat completions"): string {
    if (!apiKey) {
        throw new Error(`${providerLabel} API key is required for ${purpose}.`);
    }
    return apiKey;
}

import type { ProviderRateLimits } from "../llm/base";
import type { ProviderLimitsConfig } from "../config/types";

const LIMIT_KEYS: readonly (keyof ProviderLimitsConfig)[] = [
    "batchSize",
    "concurrency",
    "maxRequestsPerMinute",
    "maxTokensPerMinute",
    "retries",
];

export function resolveBaseUrl(url: string | undefined, defaultUrl: string): string {
    if (!url) {
        return defaultUrl;
    }
    return url.endsWith("/") ? url : `${url}/`;
}

/** Unset values in the override keep the provider default. */
export function mergeLimits(defaults: ProviderRateLimits, override?: ProviderLimitsConfig): ProviderRateLimits {
    if (!override) {
        return defaults;
    }

    const merged: ProviderRateLimits = { ...defaults };
    for (const key of LIMIT_KEYS) {
        const value = override[key];
        if (typeof value === "number" && Number.isFinite(value)) {
            merged[key] = value;
        }
    }
    return merged;
}

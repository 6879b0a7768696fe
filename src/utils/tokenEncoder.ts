import { get_encoding, encoding_for_model, type Tiktoken, type TiktokenModel } from "tiktoken";

const TOKENIZER_FALLBACK = "cl100k_base";
const encoderCache = new Map<string, Tiktoken>();

export function getEncoder(model?: string): Tiktoken {
    const key = (model ?? TOKENIZER_FALLBACK).toLowerCase();
    const cached = encoderCache.get(key);
    if (cached) {
        return cached;
    }

    let encoder: Tiktoken;
    try {
        encoder = encoding_for_model(key as TiktokenModel);
    } catch {
        encoder = get_encoding(TOKENIZER_FALLBACK);
    }

    encoderCache.set(key, encoder);
    return encoder;
}

/**
 * Token estimate used for rate limiting. Special-token literals are counted as
 * ordinary text; a character heuristic (~4 chars per token) covers encoder failures.
 */
export function countTokens(text: string, model?: string): number {
    if (!text) return 0;
    try {
        return getEncoder(model).encode(text, "all").length;
    } catch {
        return Math.ceil(text.length / 4);
    }
}

export function countTokensInBatch(texts: string[], model?: string): number {
    return texts.reduce((sum, current) => sum + countTokens(current, model), 0);
}

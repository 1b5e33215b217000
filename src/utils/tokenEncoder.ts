import { get_encoding, encoding_for_model, type Tiktoken, type TiktokenModel } from "tiktoken";

const TOKENIZER_FALLBACK = "cl100k_base";
const encoderCache = new Map<string, Tiktoken>();

export function getEncoder(model?: string): Tiktoken {
    const key = (model ?? TOKENIZER_FALLBACK).toLocaleLowerCase();
    const cached = encoderCache.get(key);
    if (cached) {
        return cached;
    }

    let encoder: Tiktoken;
    try {
        // unknown model names fall through to the generic encoding
        encoder = encoding_for_model(key as TiktokenModel);
    } catch {
        encoder = get_encoding(TOKENIZER_FALLBACK);
    }

    encoderCache.set(key, encoder);
    return encoder;
}

/**
 * Token count used to reserve provider rate-limit capacity. Special-token
 * literals in corpus text are encoded as ordinary text.
 */
export function countTokens(text: string, model?: string): number {
    if (!text) return 0;
    try {
        return getEncoder(model).encode(text, [], []).length;
    } catch {
        // ~4 characters per token for English prose
        return Math.ceil(text.length / 4);
    }
}

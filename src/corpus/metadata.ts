import type { ChunkMetadata, DialogueType, ParentReference } from "./types";

const LABEL_PREFIXES = new Map<string, DialogueType>([
    ["gpt3", "gpt"],
    ["opus", "opus"],
]);

const PARENT_INDEX_KEYS = ["original_chunk_index", "qa_index"] as const;

/**
 * Splits a dialogue label such as `gpt3_davinci` on its first underscore.
 * Labels without an underscore or with an unknown prefix carry no type.
 */
export function parseChunkLabel(label: string | null | undefined): ChunkMetadata {
    const raw = label ?? "";
    const separator = raw.indexOf("_");
    if (separator < 0) {
        return { label: raw, type: "", subtype: "" };
    }

    const type = LABEL_PREFIXES.get(raw.slice(0, separator));
    if (!type) {
        return { label: raw, type: "", subtype: "" };
    }

    return { label: raw, type, subtype: raw.slice(separator + 1) };
}

function isChunkIndex(value: unknown): value is number {
    return typeof value === "number" && Number.isInteger(value) && value >= 0;
}

export function resolveParentIndex(reference: ParentReference): number | undefined {
    if (isChunkIndex(reference)) {
        return reference;
    }

    if (typeof reference !== "object" || reference === null || Array.isArray(reference)) {
        return undefined;
    }

    for (const key of PARENT_INDEX_KEYS) {
        if (key in reference) {
            const value: unknown = Reflect.get(reference, key);
            return isChunkIndex(value) ? value : undefined;
        }
    }

    return undefined;
}

import type { DialogueCorpusTable } from "../corpus/types";
import type { ScoredChunk, SelectedChunk } from "./types";

/** gpt transcripts that repeat this prompt are stitched continuations. */
export const CONTINUATION_PHRASE = "Please continue, Leilan.";

export interface DialogueLimits {
    gpt: number;
    opus: number;
}

export interface DialogueSelection {
    gpt: SelectedChunk[];
    opus: SelectedChunk[];
}

/** Highest score first; equal scores keep ascending chunk order. */
export function rankChunks(scores: ReadonlyMap<number, number>): ScoredChunk[] {
    return Array.from(scores, ([index, score]) => ({ index, score }))
        .sort((a, b) => b.score - a.score || a.index - b.index);
}

export function countOccurrences(text: string, phrase: string): number {
    if (!phrase) {
        return 0;
    }

    let count = 0;
    let position = text.indexOf(phrase);
    while (position !== -1) {
        count += 1;
        position = text.indexOf(phrase, position + phrase.length);
    }
    return count;
}

export function selectTopChunks(
    ranked: ReadonlyArray<ScoredChunk>,
    chunks: ReadonlyArray<string>,
    limit: number
): SelectedChunk[] {
    return ranked
        .filter(({ index }) => index < chunks.length)
        .slice(0, limit)
        .map(({ index, score }) => ({ index, score, text: chunks[index] }));
}

/**
 * Walks one ranking of the dialogue corpus, filling the gpt and opus buckets
 * side by side. The walk stops once both are full, so chunks ranked below
 * that point are never considered for either bucket.
 */
export function splitDialogue(
    ranked: ReadonlyArray<ScoredChunk>,
    table: Pick<DialogueCorpusTable, "chunks" | "metadata">,
    limits: DialogueLimits
): DialogueSelection {
    const gpt: SelectedChunk[] = [];
    const opus: SelectedChunk[] = [];

    for (const { index, score } of ranked) {
        if (index >= table.metadata.length || index >= table.chunks.length) {
            continue;
        }

        const { type } = table.metadata[index];
        const text = table.chunks[index];

        if (type === "gpt") {
            if (countOccurrences(text, CONTINUATION_PHRASE) <= 1 && gpt.length < limits.gpt) {
                gpt.push({ index, score, text });
            }
        } else if (type === "opus" && opus.length < limits.opus) {
            opus.push({ index, score, text });
        }

        if (gpt.length >= limits.gpt && opus.length >= limits.opus) {
            break;
        }
    }

    return { gpt, opus };
}

export type CorpusName = "dialogue" | "essay" | "interview";

export type DialogueType = "gpt" | "opus";

export type CategoryName = DialogueType | "essay" | "interview";

export const CATEGORIES: ReadonlyArray<CategoryName> = ["gpt", "opus", "essay", "interview"];

export interface ChunkMetadata {
    label: string;
    type: DialogueType | "";
    subtype: string;
}

/** Row-major N × D matrix of sub-chunk embeddings. */
export interface EmbeddingMatrix {
    rows: number;
    dimension: number;
    data: Float32Array;
}

/**
 * Pointer from a sub-chunk to its parent chunk: a bare index, or a record
 * carrying `original_chunk_index` / `qa_index`. Kept as parsed JSON and
 * resolved during aggregation.
 */
export type ParentReference = unknown;

export interface SubchunkTable {
    texts: ReadonlyArray<string>;
    embeddings: EmbeddingMatrix;
    parents: ReadonlyArray<ParentReference>;
}

export interface CorpusTable {
    name: CorpusName;
    chunks: ReadonlyArray<string>;
    subchunks: SubchunkTable;
}

export interface DialogueCorpusTable extends CorpusTable {
    name: "dialogue";
    metadata: ReadonlyArray<ChunkMetadata>;
}

export interface CorpusStore {
    dialogue: DialogueCorpusTable;
    essay: CorpusTable;
    interview: CorpusTable;
}

export function isCategoryName(value: string): value is CategoryName {
    return CATEGORIES.some((category) => category === value);
}

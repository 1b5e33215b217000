import type { CategoryName } from "../corpus/types";

export interface ScoredChunk {
    index: number;
    score: number;
}

export interface SelectedChunk extends ScoredChunk {
    text: string;
}

export type CategorySections = Record<CategoryName, SelectedChunk[]>;

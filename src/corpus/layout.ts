import type { CorpusName } from "./types";

export const SUBCHUNK_DIR = "subchunked";

export interface CorpusArtifacts {
    chunks: string;
    labels?: string;
    subchunkTexts: string;
    embeddings: string;
    parents: string;
}

export const CORPUS_ARTIFACTS = {
    dialogue: {
        chunks: "dialogue_chunks_mpnet.json",
        labels: "dialogue_metadata_mpnet.json",
        subchunkTexts: `${SUBCHUNK_DIR}/dialogue_texts_subchunked.json`,
        embeddings: "dialogue_embeddings_mpnet.npy",
        parents: `${SUBCHUNK_DIR}/dialogue_metadata_subchunked.json`,
    },
    essay: {
        chunks: "essay_chunks_mpnet.json",
        subchunkTexts: `${SUBCHUNK_DIR}/essay_chunks_mpnet.json`,
        embeddings: "essay_embeddings_mpnet.npy",
        parents: `${SUBCHUNK_DIR}/essay_metadata_mpnet.json`,
    },
    interview: {
        chunks: "interview_chunks_mpnet.json",
        subchunkTexts: `${SUBCHUNK_DIR}/interview_chunks_mpnet.json`,
        embeddings: "interview_embeddings_mpnet.npy",
        parents: `${SUBCHUNK_DIR}/interview_metadata_mpnet.json`,
    },
} satisfies Record<CorpusName, CorpusArtifacts>;

export function requiredArtifacts(): string[] {
    const corpora: CorpusArtifacts[] = Object.values(CORPUS_ARTIFACTS);
    return corpora.flatMap((artifacts) =>
        [artifacts.chunks, artifacts.labels, artifacts.subchunkTexts, artifacts.embeddings, artifacts.parents]
            .filter((entry): entry is string => entry !== undefined)
    );
}

import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "pino";
import { z } from "zod";
import { getLogger } from "../utils/logger";
import { CorpusLoadError } from "../utils/errors";
import { ensureArtifacts } from "./artifacts";
import { CORPUS_ARTIFACTS, type CorpusArtifacts } from "./layout";
import { parseChunkLabel } from "./metadata";
import { parseNpy } from "./npy";
import type { CorpusName, CorpusStore, CorpusTable, DialogueCorpusTable, EmbeddingMatrix } from "./types";

export interface LoadCorpusOptions {
    rootDir: string;
    baseUrl: string;
    /** Skip the remote fetch and fail on any missing artifact. */
    offline?: boolean;
    downloadConcurrency?: number;
    downloadRetries?: number;
    logger?: Logger;
}

const textListSchema = z.array(z.string());
const labelListSchema = z.array(z.string().nullable());
const parentListSchema = z.array(z.unknown());

async function readArtifact(rootDir: string, relativePath: string): Promise<Buffer> {
    try {
        return await fs.readFile(path.join(rootDir, relativePath));
    } catch (error) {
        throw new CorpusLoadError("artifact is missing or unreadable.", relativePath, { cause: error });
    }
}

async function readJsonArtifact<T>(rootDir: string, relativePath: string, schema: z.ZodType<T>): Promise<T> {
    const raw = await readArtifact(rootDir, relativePath);

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw.toString("utf8"));
    } catch (error) {
        throw new CorpusLoadError("artifact is not valid JSON.", relativePath, { cause: error });
    }

    const result = schema.safeParse(parsed);
    if (!result.success) {
        const issue = result.error.issues[0];
        const location = issue?.path.length ? ` at [${issue.path.join(".")}]` : "";
        throw new CorpusLoadError(`unexpected artifact shape${location}: ${issue?.message ?? "invalid"}.`, relativePath);
    }
    return result.data;
}

async function readEmbeddingArtifact(rootDir: string, relativePath: string): Promise<EmbeddingMatrix> {
    const raw = await readArtifact(rootDir, relativePath);
    try {
        return parseNpy(raw);
    } catch (error) {
        throw new CorpusLoadError(
            error instanceof Error ? error.message : "malformed embedding matrix.",
            relativePath,
            { cause: error }
        );
    }
}

async function loadCorpusTable(
    rootDir: string,
    name: CorpusName,
    artifacts: CorpusArtifacts,
    logger: Logger
): Promise<CorpusTable> {
    const [chunks, texts, embeddings, parents] = await Promise.all([
        readJsonArtifact(rootDir, artifacts.chunks, textListSchema),
        readJsonArtifact(rootDir, artifacts.subchunkTexts, textListSchema),
        readEmbeddingArtifact(rootDir, artifacts.embeddings),
        readJsonArtifact(rootDir, artifacts.parents, parentListSchema),
    ]);

    if (embeddings.rows !== parents.length) {
        throw new CorpusLoadError(
            `embedding matrix has ${embeddings.rows} rows but ${artifacts.parents} lists ${parents.length} parents.`,
            artifacts.embeddings
        );
    }

    if (texts.length !== embeddings.rows) {
        logger.warn(
            { corpus: name, subchunkTexts: texts.length, embeddings: embeddings.rows },
            "Sub-chunk text count differs from embedding rows."
        );
    }

    logger.info(
        { corpus: name, chunks: chunks.length, subchunks: embeddings.rows, dimension: embeddings.dimension },
        "Loaded corpus table."
    );

    return {
        name,
        chunks: Object.freeze(chunks),
        subchunks: Object.freeze({
            texts: Object.freeze(texts),
            embeddings: Object.freeze(embeddings),
            parents: Object.freeze(parents),
        }),
    };
}

async function loadDialogueTable(rootDir: string, logger: Logger): Promise<DialogueCorpusTable> {
    const artifacts = CORPUS_ARTIFACTS.dialogue;
    const [table, labels] = await Promise.all([
        loadCorpusTable(rootDir, "dialogue", artifacts, logger),
        readJsonArtifact(rootDir, artifacts.labels, labelListSchema),
    ]);

    if (labels.length !== table.chunks.length) {
        logger.warn(
            { labels: labels.length, chunks: table.chunks.length },
            "Dialogue label count differs from chunk count; chunks without a label are never selected."
        );
    }

    return {
        ...table,
        name: "dialogue",
        metadata: Object.freeze(labels.map((label) => Object.freeze(parseChunkLabel(label)))),
    };
}

/**
 * Fetches any missing artifact, then parses the three corpora. The returned
 * store is frozen and safe to share between concurrent queries.
 */
export async function loadCorpusStore(options: LoadCorpusOptions): Promise<CorpusStore> {
    const logger = (options.logger ?? getLogger()).child({ module: "corpus" });

    if (!options.offline) {
        try {
            const { downloaded } = await ensureArtifacts({
                rootDir: options.rootDir,
                baseUrl: options.baseUrl,
                concurrency: options.downloadConcurrency,
                retries: options.downloadRetries,
                logger,
            });
            if (downloaded.length > 0) {
                logger.info({ downloaded }, "Fetched missing artifacts.");
            }
        } catch (error) {
            throw new CorpusLoadError(
                `could not fetch embedding artifacts: ${error instanceof Error ? error.message : String(error)}`,
                undefined,
                { cause: error }
            );
        }
    }

    logger.info({ rootDir: options.rootDir }, "Loading corpus store.");

    const [dialogue, essay, interview] = await Promise.all([
        loadDialogueTable(options.rootDir, logger),
        loadCorpusTable(options.rootDir, "essay", CORPUS_ARTIFACTS.essay, logger),
        loadCorpusTable(options.rootDir, "interview", CORPUS_ARTIFACTS.interview, logger),
    ]);

    logger.info("Corpus store ready.");

    return Object.freeze({ dialogue, essay, interview });
}

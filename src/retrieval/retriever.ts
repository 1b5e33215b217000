import type { Logger } from "pino";
import type { AggregationPolicy, AppConfig, ResultLimits } from "../config/types";
import { loadCorpusStore } from "../corpus/store";
import type { CorpusName, CorpusStore, CorpusTable } from "../corpus/types";
import type { QueryEmbedder } from "../llm/types";
import { EmptyQueryError } from "../utils/errors";
import { getLogger } from "../utils/logger";
import { aggregateScores } from "./aggregate";
import { formatContext } from "./format";
import { rankChunks, selectTopChunks, splitDialogue } from "./select";
import { scoreSubchunks } from "./similarity";
import { loadPromptTemplate } from "./template";
import type { CategorySections, ScoredChunk } from "./types";

export interface ContextRetrieverOptions {
    aggregation: AggregationPolicy;
    limits: ResultLimits;
    template: string;
    logger?: Logger;
}

export interface RetrieveOptions {
    signal?: AbortSignal;
}

export type CorpusStats = Record<CorpusName, { chunks: number; subchunks: number }>;

/**
 * Answers context queries against a loaded corpus store. Holds no per-query
 * state, so one instance serves concurrent callers.
 */
export class ContextRetriever {
    private readonly logger: Logger;

    constructor(
        private readonly store: CorpusStore,
        private readonly embedder: QueryEmbedder,
        private readonly options: ContextRetrieverOptions
    ) {
        this.logger = (options.logger ?? getLogger()).child({ module: "retriever" });
    }

    get stats(): CorpusStats {
        const describe = (table: CorpusTable) => ({ chunks: table.chunks.length, subchunks: table.subchunks.embeddings.rows });
        return {
            dialogue: describe(this.store.dialogue),
            essay: describe(this.store.essay),
            interview: describe(this.store.interview),
        };
    }

    async retrieveSections(query: string, options: RetrieveOptions = {}): Promise<CategorySections> {
        const trimmed = query.trim();
        if (!trimmed) {
            throw new EmptyQueryError();
        }

        const startedAt = Date.now();
        const embedding = await this.embedder.embedQuery(trimmed, { signal: options.signal });
        options.signal?.throwIfAborted();

        const { limits } = this.options;
        const dialogue = splitDialogue(this.rank(this.store.dialogue, embedding), this.store.dialogue, {
            gpt: limits.gpt,
            opus: limits.opus,
        });
        const essay = selectTopChunks(this.rank(this.store.essay, embedding), this.store.essay.chunks, limits.essay);
        const interview = selectTopChunks(
            this.rank(this.store.interview, embedding),
            this.store.interview.chunks,
            limits.interview
        );

        this.logger.info(
            {
                durationMs: Date.now() - startedAt,
                gpt: dialogue.gpt.length,
                opus: dialogue.opus.length,
                essay: essay.length,
                interview: interview.length,
            },
            "Retrieved context sections."
        );

        return { gpt: dialogue.gpt, opus: dialogue.opus, essay, interview };
    }

    async retrieveContext(query: string, options: RetrieveOptions = {}): Promise<string> {
        const sections = await this.retrieveSections(query, options);
        return this.render(sections, query);
    }

    /** Fills the prompt template; the query is appended as given. */
    render(sections: CategorySections, query: string): string {
        return formatContext(this.options.template, sections, query);
    }

    private rank(table: CorpusTable, embedding: ArrayLike<number>): ScoredChunk[] {
        const scores = scoreSubchunks(embedding, table.subchunks.embeddings);
        const aggregated = aggregateScores(scores, table.subchunks.parents, this.options.aggregation, {
            chunkCount: table.chunks.length,
            logger: this.logger.child({ corpus: table.name }),
        });
        return rankChunks(aggregated);
    }
}

export interface CreateRetrieverOptions {
    offline?: boolean;
}

export async function createContextRetriever(
    config: AppConfig,
    embedder: QueryEmbedder,
    logger?: Logger,
    options: CreateRetrieverOptions = {}
): Promise<ContextRetriever> {
    const activeLogger = logger ?? getLogger();
    const [store, template] = await Promise.all([
        loadCorpusStore({
            rootDir: config.corpus.embeddingsDir,
            baseUrl: config.corpus.remoteBaseUrl,
            downloadConcurrency: config.corpus.downloadConcurrency,
            downloadRetries: config.corpus.downloadRetries,
            offline: options.offline,
            logger: activeLogger,
        }),
        loadPromptTemplate(config.retrieval.promptTemplatePath, activeLogger),
    ]);

    return new ContextRetriever(store, embedder, {
        aggregation: config.retrieval.aggregation,
        limits: config.retrieval.limits,
        template,
        logger: activeLogger,
    });
}

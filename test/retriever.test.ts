import { describe, it, expect, vi } from "vitest";
import { parseChunkLabel } from "../src/corpus/metadata";
import type { CorpusStore, CorpusTable } from "../src/corpus/types";
import { ENTRY_RULE, SECTION_RULE } from "../src/retrieval/format";
import { ContextRetriever } from "../src/retrieval/retriever";
import type { EmbedOptions } from "../src/llm/types";
import { EmptyQueryError } from "../src/utils/errors";
import { SAMPLE_STORE, type CorpusFixture, silentLogger } from "./helpers/fixtures";

function toTable<N extends CorpusTable["name"]>(name: N, fixture: CorpusFixture) {
    return {
        name,
        chunks: fixture.chunks,
        subchunks: {
            texts: fixture.embeddings.map((_, i) => `sub ${i}`),
            embeddings: {
                rows: fixture.embeddings.length,
                dimension: 2,
                data: new Float32Array(fixture.embeddings.flat()),
            },
            parents: fixture.parents,
        },
    };
}

const store: CorpusStore = {
    dialogue: { ...toTable("dialogue", SAMPLE_STORE.dialogue), metadata: SAMPLE_STORE.dialogue.labels.map(parseChunkLabel) },
    essay: toTable("essay", SAMPLE_STORE.essay),
    interview: toTable("interview", SAMPLE_STORE.interview),
};

const limits = { gpt: 10, opus: 10, essay: 1, interview: 5 };
const TEMPLATE = "<gpt>|<opus>|<essay>|<interview>";

function createRetriever(aggregation: "max" | "mean" = "max") {
    const embedQuery = vi.fn(async (_query: string, _options?: EmbedOptions) => [1, 0]);
    const retriever = new ContextRetriever(store, { embedQuery }, { aggregation, limits, template: TEMPLATE, logger: silentLogger });
    return { retriever, embedQuery };
}

describe("ContextRetriever", () => {
    it("selects chunks per category", async () => {
        const { retriever, embedQuery } = createRetriever();

        const sections = await retriever.retrieveSections("  who is Leilan? ");

        expect(embedQuery).toHaveBeenCalledWith("who is Leilan?", { signal: undefined });
        expect(sections.gpt.map(({ index, text }) => [index, text])).toEqual([[0, "gpt one"], [2, "gpt two"]]);
        expect(sections.gpt[0].score).toBeCloseTo(0.9, 6);
        expect(sections.opus.map(({ text }) => text)).toEqual(["opus one"]);
        expect(sections.opus[0].score).toBeCloseTo(0.8, 6);
        expect(sections.essay.map(({ text }) => text)).toEqual(["essay b"]);
        expect(sections.interview.map(({ text }) => text)).toEqual(["interview a"]);
    });

    it("ranks by mean sub-chunk score under the mean policy", async () => {
        const { retriever } = createRetriever("mean");

        const sections = await retriever.retrieveSections("query");

        expect(sections.gpt.map(({ index }) => index)).toEqual([0, 2]);
        expect(sections.gpt[0].score).toBeCloseTo(0.5, 6);
    });

    it("formats the context with the raw query", async () => {
        const { retriever } = createRetriever();

        const context = await retriever.retrieveContext(" hello ");

        const gpt =
            `\n${SECTION_RULE}\n[semantic similarity: 0.900]\ngpt one\n${ENTRY_RULE}` +
            `\n\n[semantic similarity: 0.300]\ngpt two\n${ENTRY_RULE}`;
        const opus = `\n${SECTION_RULE}\n\nopus one\n${ENTRY_RULE}`;
        const essay = `\n${SECTION_RULE}\n\nessay b\n${ENTRY_RULE}`;
        const interview = `\n${SECTION_RULE}\n\ninterview a\n${ENTRY_RULE}`;
        expect(context).toBe(`${gpt}|${opus}|${essay}|${interview}\nQUERY:  hello `);
    });

    it("returns the same context for the same query", async () => {
        const { retriever } = createRetriever();

        expect(await retriever.retrieveContext("same")).toBe(await retriever.retrieveContext("same"));
    });

    it("rejects an empty query before embedding", async () => {
        const { retriever, embedQuery } = createRetriever();

        await expect(retriever.retrieveContext("   ")).rejects.toBeInstanceOf(EmptyQueryError);
        expect(embedQuery).not.toHaveBeenCalled();
    });

    it("stops once the request is aborted", async () => {
        const { retriever } = createRetriever();
        const controller = new AbortController();
        controller.abort();

        await expect(retriever.retrieveSections("query", { signal: controller.signal })).rejects.toThrow("This operation was aborted");
    });

    it("reports corpus sizes", () => {
        const { retriever } = createRetriever();

        expect(retriever.stats).toEqual({
            dialogue: { chunks: 3, subchunks: 4 },
            essay: { chunks: 2, subchunks: 2 },
            interview: { chunks: 1, subchunks: 1 },
        });
    });
});

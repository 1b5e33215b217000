import { describe, it, expect } from "vitest";
import { scoreSubchunks } from "../src/retrieval/similarity";

describe("scoreSubchunks", () => {
    const matrix = { rows: 3, dimension: 2, data: new Float32Array([1, 0, 0, 1, 0.5, 0.5]) };

    it("returns the dot product with every row", () => {
        const scores = scoreSubchunks([0.6, 0.8], matrix);

        expect(scores.length).toBe(3);
        expect(scores[0]).toBe(0.6);
        expect(scores[1]).toBe(0.8);
        expect(scores[2]).toBeCloseTo(0.7, 10);
    });

    it("does not renormalise the query", () => {
        expect(Array.from(scoreSubchunks([2, 0], matrix))).toEqual([2, 0, 1]);
    });

    it("throws when the query dimension differs", () => {
        expect(() => scoreSubchunks([1, 0, 0], matrix)).toThrow(
            "Query embedding has 3 dimensions but the corpus table uses 2."
        );
    });
});

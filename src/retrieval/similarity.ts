import type { EmbeddingMatrix } from "../corpus/types";

/**
 * Dot product of the query with every sub-chunk row. Both sides are expected
 * to be unit length already, which makes this the cosine similarity.
 */
export function scoreSubchunks(query: ArrayLike<number>, matrix: EmbeddingMatrix): Float64Array {
    const { rows, dimension, data } = matrix;
    if (query.length !== dimension) {
        throw new Error(`Query embedding has ${query.length} dimensions but the corpus table uses ${dimension}.`);
    }

    const scores = new Float64Array(rows);
    for (let row = 0; row < rows; row += 1) {
        const offset = row * dimension;
        let sum = 0;
        for (let col = 0; col < dimension; col += 1) {
            sum += data[offset + col] * query[col];
        }
        scores[row] = sum;
    }
    return scores;
}

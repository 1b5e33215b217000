import type { Logger } from "pino";
import type { AggregationPolicy } from "../config/types";
import { resolveParentIndex } from "../corpus/metadata";
import type { ParentReference } from "../corpus/types";

export interface AggregateOptions {
    /** Parents at or beyond this index are skipped. */
    chunkCount?: number;
    logger?: Logger;
}

interface ScoreGroup {
    max: number;
    sum: number;
    count: number;
}

/**
 * Rolls sub-chunk scores up to their parent chunk. Parents with no valid
 * sub-chunk are absent from the result.
 */
export function aggregateScores(
    scores: ArrayLike<number>,
    parents: ReadonlyArray<ParentReference>,
    policy: AggregationPolicy,
    options: AggregateOptions = {}
): Map<number, number> {
    const groups = new Map<number, ScoreGroup>();
    const unresolved: number[] = [];
    const outOfRange: number[] = [];
    const length = Math.min(scores.length, parents.length);

    for (let i = 0; i < length; i += 1) {
        const parent = resolveParentIndex(parents[i]);
        if (parent === undefined) {
            unresolved.push(i);
            continue;
        }
        if (options.chunkCount !== undefined && parent >= options.chunkCount) {
            outOfRange.push(i);
            continue;
        }

        const score = scores[i];
        const group = groups.get(parent);
        if (group) {
            group.max = Math.max(group.max, score);
            group.sum += score;
            group.count += 1;
        } else {
            groups.set(parent, { max: score, sum: score, count: 1 });
        }
    }

    if (unresolved.length > 0) {
        options.logger?.warn(
            { skipped: unresolved.length, firstSubchunk: unresolved[0], reference: parents[unresolved[0]] },
            "Unrecognized parent index format; sub-chunks skipped."
        );
    }
    if (outOfRange.length > 0) {
        options.logger?.warn(
            { skipped: outOfRange.length, firstSubchunk: outOfRange[0], chunkCount: options.chunkCount },
            "Parent index outside the chunk list; sub-chunks skipped."
        );
    }

    const aggregated = new Map<number, number>();
    for (const [parent, group] of groups) {
        // rounding can lift the mean of identical scores above their max
        aggregated.set(parent, policy === "max" ? group.max : Math.min(group.sum / group.count, group.max));
    }
    return aggregated;
}

import { isCategoryName, type CategoryName } from "../corpus/types";
import type { CategorySections, SelectedChunk } from "./types";

export const SECTION_RULE = "_".repeat(100);
export const ENTRY_RULE = "-".repeat(100);
export const QUERY_MARKER = "\nQUERY: ";

const PLACEHOLDER_PATTERN = /<(gpt|opus|essay|interview)>/g;

/** Only the gpt transcripts carry their similarity score into the prompt. */
const SCORED_CATEGORIES: ReadonlySet<CategoryName> = new Set<CategoryName>(["gpt"]);

export function placeholderFor(category: CategoryName): string {
    return `<${category}>`;
}

function renderEntry(category: CategoryName, entry: Pick<SelectedChunk, "text" | "score">): string {
    if (SCORED_CATEGORIES.has(category)) {
        return `\n[semantic similarity: ${entry.score.toFixed(3)}]\n${entry.text}\n${ENTRY_RULE}`;
    }
    return `\n\n${entry.text}\n${ENTRY_RULE}`;
}

export function renderSection(category: CategoryName, entries: ReadonlyArray<Pick<SelectedChunk, "text" | "score">>): string {
    if (entries.length === 0) {
        return "";
    }
    return `\n${SECTION_RULE}${entries.map((entry) => renderEntry(category, entry)).join("\n")}`;
}

/**
 * Substitutes every placeholder in one pass, so chunk text that happens to
 * contain `<gpt>` and friends is left alone.
 */
export function fillTemplate(template: string, rendered: Record<CategoryName, string>): string {
    return template.replace(PLACEHOLDER_PATTERN, (match: string, name: string) =>
        isCategoryName(name) ? rendered[name] : match
    );
}

export function formatContext(template: string, sections: CategorySections, query: string): string {
    const rendered: Record<CategoryName, string> = {
        gpt: renderSection("gpt", sections.gpt),
        opus: renderSection("opus", sections.opus),
        essay: renderSection("essay", sections.essay),
        interview: renderSection("interview", sections.interview),
    };
    return `${fillTemplate(template, rendered)}${QUERY_MARKER}${query}`;
}

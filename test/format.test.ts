import { describe, it, expect } from "vitest";
import { ENTRY_RULE, SECTION_RULE, fillTemplate, formatContext, renderSection } from "../src/retrieval/format";

const empty = { gpt: [], opus: [], essay: [], interview: [] };

describe("renderSection", () => {
    it("renders nothing for an empty category", () => {
        expect(renderSection("essay", [])).toBe("");
    });

    it("prefixes gpt entries with their similarity", () => {
        expect(renderSection("gpt", [{ text: "hello", score: 0.77 }])).toBe(
            `\n${SECTION_RULE}\n[semantic similarity: 0.770]\nhello\n${ENTRY_RULE}`
        );
    });

    it("separates plain entries with blank lines", () => {
        expect(renderSection("essay", [{ text: "a", score: 0.5 }, { text: "b", score: 0.4 }])).toBe(
            `\n${SECTION_RULE}\n\na\n${ENTRY_RULE}\n\n\nb\n${ENTRY_RULE}`
        );
    });

    it("uses rules of one hundred characters", () => {
        expect(SECTION_RULE).toBe("_".repeat(100));
        expect(ENTRY_RULE).toBe("-".repeat(100));
    });
});

describe("fillTemplate", () => {
    it("replaces every placeholder in a single pass", () => {
        const rendered = { gpt: "<opus>", opus: "O", essay: "E", interview: "" };

        expect(fillTemplate("A<gpt>B<opus>C<essay><interview><other>", rendered)).toBe("A<opus>BOCE<other>");
    });

    it("replaces repeated placeholders", () => {
        expect(fillTemplate("<essay>|<essay>", { gpt: "", opus: "", essay: "x", interview: "" })).toBe("x|x");
    });
});

describe("formatContext", () => {
    it("appends the raw query after the filled template", () => {
        expect(formatContext("T<gpt>", empty, "  who are you? ")).toBe("T\nQUERY:   who are you? ");
    });

    it("renders each category into its own placeholder", () => {
        const sections = {
            ...empty,
            opus: [{ index: 3, score: 0.6, text: "opus text" }],
            interview: [{ index: 0, score: 0.2, text: "answer" }],
        };

        expect(formatContext("[<opus>][<interview>]", sections, "q")).toBe(
            `[\n${SECTION_RULE}\n\nopus text\n${ENTRY_RULE}][\n${SECTION_RULE}\n\nanswer\n${ENTRY_RULE}]\nQUERY: q`
        );
    });
});

import { describe, it, expect } from "@jest/globals";
import { assembleOutline, serializeOutline } from "../../../documents/outline/OutlineAssembler.js";
import { makeCandidate } from "../../fixtures/candidates.js";

describe("OutlineAssembler", () => {
    it("sorts headings by page, then vertical position, then document order", () => {
        const result = assembleOutline({
            title: null,
            headings: [
                { level: "H2", candidate: makeCandidate({ text: "Later page", fontSize: 14, page: 2, order: 9, y: 72 }) },
                { level: "H1", candidate: makeCandidate({ text: "Lower", fontSize: 18, page: 0, order: 3, y: 400 }) },
                { level: "H2", candidate: makeCandidate({ text: "Same line, second", fontSize: 14, page: 0, order: 2, y: 100 }) },
                { level: "H2", candidate: makeCandidate({ text: "Same line, first", fontSize: 14, page: 0, order: 1, y: 100 }) }
            ]
        });
        expect(result.outline).toEqual([
            { level: "H2", text: "Same line, first", page: 0 },
            { level: "H2", text: "Same line, second", page: 0 },
            { level: "H1", text: "Lower", page: 0 },
            { level: "H2", text: "Later page", page: 2 }
        ]);
    });

    it("uses the title candidate's text when there is one", () => {
        const result = assembleOutline({
            title: makeCandidate({ text: "Field Report", fontSize: 24 }),
            headings: [{ level: "H1", candidate: makeCandidate({ text: "Introduction", fontSize: 18, page: 1 }) }]
        });
        expect(result.title).toBe("Field Report");
    });

    it("falls back to the first H1, then to an empty title", () => {
        const withHeadings = assembleOutline({
            title: null,
            headings: [
                { level: "H2", candidate: makeCandidate({ text: "Background", fontSize: 14, order: 0 }) },
                { level: "H1", candidate: makeCandidate({ text: "Chapter 1", fontSize: 20, page: 1, order: 1 }) },
                { level: "H1", candidate: makeCandidate({ text: "Chapter 2", fontSize: 20, page: 2, order: 2 }) }
            ]
        });
        expect(withHeadings.title).toBe("Chapter 1");
        expect(assembleOutline({ title: null, headings: [] })).toEqual({ title: "", outline: [] });
    });

    it("cuts overlong titles to fifty characters and an ellipsis", () => {
        const long = "Water ".repeat(18).trim();
        const exact = `${"Title ".repeat(16)}Four`;
        expect(assembleOutline({ title: makeCandidate({ text: long, fontSize: 24 }), headings: [] }).title)
            .toBe(`${"Water ".repeat(8)}Wa...`);
        expect(assembleOutline({ title: makeCandidate({ text: exact, fontSize: 24 }), headings: [] }).title).toBe(exact);
    });

    it("serializes with two-space indentation and a trailing newline", () => {
        const json = serializeOutline({ title: "Annual Report", outline: [{ level: "H1", text: "Scope", page: 0 }] });
        expect(json).toBe([
            "{",
            "  \"title\": \"Annual Report\",",
            "  \"outline\": [",
            "    {",
            "      \"level\": \"H1\",",
            "      \"text\": \"Scope\",",
            "      \"page\": 0",
            "    }",
            "  ]",
            "}",
            ""
        ].join("\n"));
    });

    it("serializes the same outline to the same bytes", () => {
        const outline = { title: "Report", outline: [{ level: "H2" as const, text: "Über uns", page: 3 }] };
        expect(serializeOutline(outline)).toBe(serializeOutline(JSON.parse(serializeOutline(outline))));
    });
});

import { describe, it, expect } from "@jest/globals";
import { buildFontTiers, classifyCandidates, selectPromotions } from "../../../documents/outline/HierarchyClassifier.js";
import type { Classification } from "../../../types.js";
import { makeCandidate, makeProfile } from "../../fixtures/candidates.js";

const profile = makeProfile();

function levels(classification: Classification): Array<[string, string]> {
    return classification.headings.map(heading => [heading.candidate.block.text, heading.level]);
}

describe("HierarchyClassifier", () => {
    describe("buildFontTiers", () => {
        it("bands sizes up to p95 and splits larger sizes into clusters", () => {
            const banded = makeProfile({ percentiles: { p75: 10, p90: 11, p95: 12 } });
            const candidates = [10, 10.8, 11.5, 12, 14, 14.4, 20].map((fontSize, order) =>
                makeCandidate({ text: `Heading ${order}`, fontSize, order })
            );
            const tiers = buildFontTiers(candidates, banded);
            expect(tiers.map(tier => tier.size)).toEqual([20, 14.4, 12, 10.8, 10]);
            expect(tiers.map(tier => tier.members.length)).toEqual([1, 2, 2, 1, 1]);
        });
    });

    describe("classifyCandidates", () => {
        it("takes a page-0-only tier as the title and levels the rest", () => {
            const result = classifyCandidates([
                makeCandidate({ text: "Field Report", fontSize: 24, order: 0 }),
                makeCandidate({ text: "Introduction", fontSize: 18, order: 1, y: 200 }),
                makeCandidate({ text: "Scope", fontSize: 14, order: 2, y: 300 }),
                makeCandidate({ text: "Methods", fontSize: 18, page: 1, order: 3 }),
                makeCandidate({ text: "Sampling", fontSize: 14, page: 1, order: 4, y: 200 })
            ], profile);

            expect(result.title?.block.text).toBe("Field Report");
            expect(levels(result)).toEqual([
                ["Introduction", "H1"],
                ["Scope", "H2"],
                ["Methods", "H1"],
                ["Sampling", "H2"]
            ]);
        });

        it("never produces H3 from two tiers", () => {
            const result = classifyCandidates([
                makeCandidate({ text: "Overview", fontSize: 20, order: 0 }),
                makeCandidate({ text: "Details", fontSize: 14, order: 1 }),
                makeCandidate({ text: "Outlook", fontSize: 20, page: 1, order: 2 })
            ], profile);

            expect(result.title).toBeNull();
            expect(result.headings.map(heading => heading.level)).toEqual(["H1", "H2", "H1"]);
        });

        it("clamps tiers past the third to H3", () => {
            const result = classifyCandidates([30, 24, 18, 14].map((fontSize, order) =>
                makeCandidate({ text: `Level ${order}`, fontSize, page: 1, order })
            ), profile);
            expect(result.headings.map(heading => heading.level)).toEqual(["H1", "H2", "H3", "H3"]);
        });

        it("has no title when the top page-0 tier continues on later pages", () => {
            const result = classifyCandidates([
                makeCandidate({ text: "Chapter 1", fontSize: 20, order: 0 }),
                makeCandidate({ text: "Chapter 2", fontSize: 20, page: 1, order: 1 })
            ], profile);
            expect(result.title).toBeNull();
            expect(levels(result)).toEqual([["Chapter 1", "H1"], ["Chapter 2", "H1"]]);
        });

        it("needs a title above body size", () => {
            const result = classifyCandidates([
                makeCandidate({ text: "Key Findings", fontSize: 10, order: 0 })
            ], profile);
            expect(result.title).toBeNull();
            expect(levels(result)).toEqual([["Key Findings", "H1"]]);
        });

        it("breaks title ties by position", () => {
            const result = classifyCandidates([
                makeCandidate({ text: "Lower Title", fontSize: 24, order: 1, y: 100, scores: { combined: 0.8 } }),
                makeCandidate({ text: "Upper Title", fontSize: 24, order: 0, y: 50, scores: { combined: 0.8 } })
            ], profile);
            expect(result.title?.block.text).toBe("Upper Title");
            expect(result.headings).toEqual([]);
        });

        it("keeps a shallower number at or above its subsection at equal size", () => {
            const result = classifyCandidates([
                makeCandidate({ text: "1 Introduction", fontSize: 18, order: 0, depth: 1 }),
                makeCandidate({ text: "2. Results", fontSize: 14, order: 1, depth: 1 }),
                makeCandidate({ text: "2.1 Subsection", fontSize: 14, order: 2, depth: 2 }),
                makeCandidate({ text: "3 Discussion", fontSize: 18, page: 1, order: 3, depth: 1 })
            ], profile);
            expect(levels(result)).toEqual([
                ["1 Introduction", "H1"],
                ["2. Results", "H1"],
                ["2.1 Subsection", "H2"],
                ["3 Discussion", "H1"]
            ]);
        });
    });

    describe("selectPromotions", () => {
        it("promotes the shallowest numbered members when depths differ", () => {
            const members = [
                makeCandidate({ text: "2. Results", fontSize: 14, depth: 1 }),
                makeCandidate({ text: "2.1 Subsection", fontSize: 14, depth: 2 }),
                makeCandidate({ text: "Notes", fontSize: 14 })
            ];
            expect(selectPromotions(members).map(member => member.block.text)).toEqual(["2. Results"]);
        });

        it("promotes a member whose content clearly leads its siblings", () => {
            const members = [
                makeCandidate({ text: "Conclusion", fontSize: 14, scores: { content: 0.9 } }),
                makeCandidate({ text: "minor aside", fontSize: 14, scores: { content: 0.5 } }),
                makeCandidate({ text: "another aside", fontSize: 14, scores: { content: 0.4 } })
            ];
            expect(selectPromotions(members).map(member => member.block.text)).toEqual(["Conclusion"]);
        });

        it("leaves close content scores alone", () => {
            const members = [
                makeCandidate({ text: "1.1 Scope", fontSize: 14, depth: 2, scores: { content: 1 } }),
                makeCandidate({ text: "2.1 Sampling", fontSize: 14, depth: 2, scores: { content: 0.8 } })
            ];
            expect(selectPromotions(members)).toEqual([]);
        });

        it("only compares members of numerically equal size", () => {
            const members = [
                makeCandidate({ text: "2. Results", fontSize: 14.2, depth: 1 }),
                makeCandidate({ text: "2.1 Subsection", fontSize: 14, depth: 2 })
            ];
            expect(selectPromotions(members)).toEqual([]);
        });
    });
});

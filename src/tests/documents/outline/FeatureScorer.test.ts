import { describe, it, expect } from "@jest/globals";
import { SCORE_WEIGHTS, contentScore, fontScore, layoutScore, scoreBlock } from "../../../documents/outline/FeatureScorer.js";
import { getScriptProfile } from "../../../documents/outline/ScriptDetector.js";
import { makeBlock, makeProfile } from "../../fixtures/candidates.js";

const latin = getScriptProfile("latin");
const profile = makeProfile({
    fontFamilyShare: new Map([["Helvetica", 0.9], ["Helvetica-Bold", 0.1]])
});

describe("FeatureScorer", () => {
    describe("fontScore", () => {
        it("saturates the size component at 1.6x body size and adds weight", () => {
            expect(fontScore(makeBlock({ text: "Overview", fontSize: 16 }), profile)).toBeCloseTo(0.85);
        });

        it("rewards a family used by few blocks", () => {
            const block = makeBlock({ text: "Overview", fontSize: 12, bold: false }, { fontName: "Garamond" });
            expect(fontScore(block, profile)).toBeCloseTo(0.35);
        });

        it("penalizes blocks that mix several sizes", () => {
            const block = makeBlock({ text: "Overview", fontSize: 16 }, { fontSizes: [16, 10] });
            expect(fontScore(block, profile)).toBeCloseTo(0.7);
        });

        it("gives body-size regular text nothing", () => {
            expect(fontScore(makeBlock({ text: "Plain body text.", fontSize: 10, bold: false }), profile)).toBe(0);
        });
    });

    describe("contentScore", () => {
        it("scores a short numbered keyword heading at the top", () => {
            expect(contentScore("2. Results", 1, latin)).toBeCloseTo(1, 5);
        });

        it("scores a punctuated sentence at zero", () => {
            expect(contentScore("This sentence, which is long, ends here.", 0, latin)).toBeCloseTo(0, 5);
        });

        it("counts characters instead of words for scripts without spacing", () => {
            expect(contentScore("第一章 概要", 1, getScriptProfile("han"))).toBeCloseTo(0.9, 5);
        });

        it("penalizes very long text", () => {
            const text = "Results ".repeat(20).trim();
            expect(contentScore(text, 0, latin)).toBeCloseTo(0.3, 5);
        });

        it("treats all caps as a heading cue", () => {
            expect(contentScore("FINANCIAL HIGHLIGHTS", 0, latin)).toBeCloseTo(0.5, 5);
        });
    });

    describe("layoutScore", () => {
        it("combines centring with the space around the block", () => {
            const block = makeBlock({ text: "Summary", fontSize: 14 }, { centered: true, indent: 100, spaceAbove: 40, spaceBelow: 10 });
            expect(layoutScore(block, 0, profile)).toBeCloseTo(0.75);
        });

        it("rewards flush-left blocks", () => {
            const block = makeBlock({ text: "Summary", fontSize: 14 }, { spaceAbove: 0, spaceBelow: 0 });
            expect(layoutScore(block, 0, profile)).toBeCloseTo(0.15);
        });

        it("rewards indentation only for nested numbering", () => {
            const block = makeBlock({ text: "2.1 Scope", fontSize: 12 }, { indent: 18, spaceAbove: 0, spaceBelow: 0 });
            expect(layoutScore(block, 2, profile)).toBeCloseTo(0.1);
            expect(layoutScore(block, 1, profile)).toBe(0);
        });
    });

    it("combines the three scores with fixed weights", () => {
        const block = makeBlock({ text: "2. Results", fontSize: 16 });
        const candidate = scoreBlock(block, profile, latin);
        const { font, content, layout, combined } = candidate.scores;

        expect(candidate.block).toBe(block);
        expect(candidate.script).toBe("latin");
        expect(candidate.numberingDepth).toBe(1);
        expect(combined).toBeCloseTo(SCORE_WEIGHTS.font * font + SCORE_WEIGHTS.content * content + SCORE_WEIGHTS.layout * layout);
        expect(SCORE_WEIGHTS.font + SCORE_WEIGHTS.content + SCORE_WEIGHTS.layout).toBeCloseTo(1);
    });
});

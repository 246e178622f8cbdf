import { describe, it, expect } from "@jest/globals";
import { escapeCharClass, escapeRegExp, numberingDepth } from "../../../documents/outline/Numbering.js";
import { getScriptProfile } from "../../../documents/outline/ScriptDetector.js";

const latin = getScriptProfile("latin");

const CASES: Array<[string, number]> = [
    ["2. Results", 1],
    ["2.1 Subsection", 2],
    ["2.1.3. Scope", 3],
    ["3) Methods", 1],
    ["7", 1],
    ["IV. Findings", 1],
    ["B) Appendix notes", 1],
    ["Chapter 4 Methods", 1],
    ["Appendix A", 1],
    ["Results", 0],
    ["1984 was a dry year", 0],
    ["Version 2.1", 0]
];

describe("numberingDepth", () => {
    it.each(CASES)("%s → %i", (text, depth) => {
        expect(numberingDepth(text, latin)).toBe(depth);
    });

    it("does not read Roman or letter markers in scripts without case", () => {
        expect(numberingDepth("IV. نتائج", getScriptProfile("arabic"))).toBe(0);
    });

    it("recognizes section markers of other scripts", () => {
        expect(numberingDepth("第3章 方法", getScriptProfile("han"))).toBe(1);
        expect(numberingDepth("Глава 2 Обзор", getScriptProfile("cyrillic"))).toBe(1);
        expect(numberingDepth("제 2 장 결과", getScriptProfile("hangul"))).toBe(1);
    });

    it("uses the script's own separators", () => {
        expect(numberingDepth("1．2 概要", getScriptProfile("han"))).toBe(2);
    });
});

describe("regex escaping", () => {
    it("escapes pattern metacharacters", () => {
        expect(escapeRegExp("a.b*(c)")).toBe("a\\.b\\*\\(c\\)");
        expect(escapeCharClass(".-")).toBe(".\\-");
    });
});

import type { ScriptName, ScriptProfile } from "../../types.js";

const ROMAN_MARKER = /^(?=[IVXLC])C{0,3}(?:XC|XL|L?X{0,3})(?:IX|IV|V?I{0,3})[.)](?=\s)/;
const LETTER_MARKER = /^\p{Lu}[.)](?=\s)/u;

const decimalPatterns = new Map<ScriptName, RegExp>();

/**
 * Depth of the leading section number: "2." → 1, "2.1" → 2, "2.1.3." → 3.
 * Roman, single-letter and keyword markers ("Chapter 4", "第3章") count as depth 1.
 * Returns 0 when the text carries no numbering.
 */
export function numberingDepth(text: string, profile: ScriptProfile): number {
    const trimmed = text.trim();
    const decimal = decimalPattern(profile).exec(trimmed);
    if (decimal) {
        return splitGroups(decimal[1], profile.numberSeparators).length;
    }
    if (profile.hasCase && (ROMAN_MARKER.test(trimmed) || LETTER_MARKER.test(trimmed))) {
        return 1;
    }
    if (profile.sectionMarkers.some(marker => marker.test(trimmed))) {
        return 1;
    }
    return 0;
}

export function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

export function escapeCharClass(value: string): string {
    return value.replace(/[\\\]\-^]/g, "\\$&");
}

function decimalPattern(profile: ScriptProfile): RegExp {
    const cached = decimalPatterns.get(profile.script);
    if (cached) return cached;
    const sep = escapeCharClass(profile.numberSeparators);
    // Groups of at most three digits, so a leading year ("1984 was") is not read as a section number.
    const pattern = new RegExp(`^(\\p{Nd}{1,3}(?:[${sep}]\\p{Nd}{1,3})*)(?:[${sep})）、:]|\\s|$)`, "u");
    decimalPatterns.set(profile.script, pattern);
    return pattern;
}

function splitGroups(value: string, separators: string): string[] {
    const splitter = new RegExp(`[${escapeCharClass(separators)}]`, "u");
    return value.split(splitter).filter(group => group.length > 0);
}

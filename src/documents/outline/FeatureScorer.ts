import type { DocumentProfile, FeatureScores, HeadingCandidate, ScriptProfile, TextBlock } from "../../types.js";
import { clamp } from "../../utils/Statistics.js";
import { familyShare } from "./DocumentProfile.js";
import { numberingDepth } from "./Numbering.js";

export const SCORE_WEIGHTS = {
    font: 0.4,
    content: 0.35,
    layout: 0.25
} as const;

/** Size ratio over body (minus one) at which the size component saturates. */
const SIZE_RATIO_SPAN = 0.6;
const RARE_FAMILY_SHARE = 0.05;
const MIXED_SIZE_PENALTY = 0.15;
const MIXED_SIZE_PENALTY_CAP = 0.3;

const SHORT_WORDS = 12;
const MEDIUM_WORDS = 20;
const SHORT_CHARS = 30;
const MEDIUM_CHARS = 50;
const LONG_TEXT_CHARS = 150;

const FLUSH_TOLERANCE_PT = 2;

const TOKEN_SPLIT = /[^\p{L}\p{M}\p{Nd}-]+/u;

export function scoreBlock(block: TextBlock, profile: DocumentProfile, scriptProfile: ScriptProfile): HeadingCandidate {
    const depth = numberingDepth(block.text, scriptProfile);
    const font = fontScore(block, profile);
    const content = contentScore(block.text, depth, scriptProfile);
    const layout = layoutScore(block, depth, profile);
    const scores: FeatureScores = {
        font,
        content,
        layout,
        combined: clamp(SCORE_WEIGHTS.font * font + SCORE_WEIGHTS.content * content + SCORE_WEIGHTS.layout * layout)
    };
    return {
        block,
        script: scriptProfile.script,
        numberingDepth: depth,
        scores
    };
}

export function fontScore(block: TextBlock, profile: DocumentProfile): number {
    const body = profile.percentiles.p75;
    let score = body > 0 ? 0.6 * clamp((block.fontSize / body - 1) / SIZE_RATIO_SPAN) : 0;
    if (block.bold) score += 0.25;
    if (block.italic) score += 0.1;
    if (familyShare(profile, block.fontName) < RARE_FAMILY_SHARE) score += 0.15;
    score -= Math.min(MIXED_SIZE_PENALTY_CAP, MIXED_SIZE_PENALTY * Math.max(0, block.fontSizes.length - 1));
    return clamp(score);
}

export function contentScore(text: string, depth: number, scriptProfile: ScriptProfile): number {
    let score = 0;
    if (depth > 0) score += 0.3;
    if (hasKeyword(text, scriptProfile)) score += 0.2;

    const last = Array.from(text).pop() ?? "";
    if (!scriptProfile.sentenceTerminators.includes(last)) score += 0.2;

    const chars = Array.from(text).length;
    if (scriptProfile.usesWordSpacing) {
        const words = text.split(/\s+/).filter(Boolean).length;
        if (words <= SHORT_WORDS) score += 0.2;
        else if (words <= MEDIUM_WORDS) score += 0.1;
    } else if (chars <= SHORT_CHARS) {
        score += 0.2;
    } else if (chars <= MEDIUM_CHARS) {
        score += 0.1;
    }

    if (scriptProfile.hasCase && isCapitalized(text, scriptProfile)) score += 0.1;

    const clauseMarks = Array.from(text).filter(char => scriptProfile.clausePunctuation.includes(char)).length;
    if (clauseMarks >= 2) score -= 0.2;
    if (chars > LONG_TEXT_CHARS) score -= 0.3;
    return clamp(score);
}

export function layoutScore(block: TextBlock, depth: number, profile: DocumentProfile): number {
    let score = 0;
    if (block.centered) score += 0.35;
    const gap = profile.bodyGap > 0 ? profile.bodyGap : 1;
    score += 0.3 * clamp(block.spaceAbove / (2 * gap));
    score += 0.2 * clamp(block.spaceBelow / (2 * gap));
    if (!block.centered) {
        if (block.indent <= FLUSH_TOLERANCE_PT) score += 0.15;
        else if (depth >= 2) score += 0.1;
    }
    return clamp(score);
}

function hasKeyword(text: string, scriptProfile: ScriptProfile): boolean {
    const lower = text.toLowerCase();
    if (!scriptProfile.usesWordSpacing) {
        return scriptProfile.keywords.some(keyword => lower.includes(keyword));
    }
    const tokens = new Set(lower.split(TOKEN_SPLIT).filter(Boolean));
    return scriptProfile.keywords.some(keyword => tokens.has(keyword));
}

/** All caps, or every word that is not a connective starts with a capital. */
function isCapitalized(text: string, scriptProfile: ScriptProfile): boolean {
    const words = text.split(/\s+/).filter(word => /\p{L}/u.test(word));
    if (words.length === 0) return false;
    const letters = words.join("").replace(/[^\p{L}]/gu, "");
    if (letters === letters.toUpperCase() && letters !== letters.toLowerCase()) return true;
    return words
        .filter((word, index) => index === 0 || !scriptProfile.fragmentWords.includes(word.toLowerCase()))
        .every(word => /^[^\p{L}]*\p{Lu}/u.test(word));
}

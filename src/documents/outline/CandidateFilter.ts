import type { DocumentProfile, HeadingCandidate, ScriptProfile } from "../../types.js";
import { familyShare } from "./DocumentProfile.js";
import { escapeRegExp } from "./Numbering.js";
import { allScriptProfiles, getScriptProfile } from "./ScriptDetector.js";

export type RejectionReason =
    | "too_short"
    | "page_number"
    | "url_or_email"
    | "repeated_header"
    | "numeric"
    | "caption"
    | "boilerplate"
    | "fragment"
    | "body_text"
    | "too_long"
    | "low_score";

export interface FilterOptions {
    maxHeadingChars: number;
}

export interface Rejection {
    candidate: HeadingCandidate;
    reason: RejectionReason;
}

export interface FilterResult {
    kept: HeadingCandidate[];
    rejected: Rejection[];
}

export const MIN_HEADING_CHARS = 2;
export const MIN_COMBINED_SCORE = 0.35;
const RARE_FAMILY_SHARE = 0.05;
const SIZE_EPSILON = 0.01;

const PAGE_CONNECTORS = ["of", "von", "de", "sur", "di", "из", "з", "من", "από", "/"];
const DASHED_PAGE_NUMBER = /^[-–—]\s*\p{Nd}+\s*[-–—]$/u;
/** Front-matter numerals up to xxxix, in one case throughout. */
const ROMAN_PAGE_NUMBER = /^(?=[ivx])x{0,3}(?:ix|iv|v?i{0,3})$|^(?=[IVX])X{0,3}(?:IX|IV|V?I{0,3})$/;
const URL_PATTERN = /(?:https?:\/\/|www\.)\S+/i;
const BARE_DOMAIN = /(?:^|[\s(])[\p{L}\p{Nd}-]+(?:\.[\p{L}\p{Nd}-]+)*\.(?:com|org|net|edu|gov|io|ca|co|info)(?=$|[\s/),;:]|\.(?:\s|$))/iu;
const CURRENCY_AMOUNT = /\p{Sc}\s*\p{Nd}|\p{Nd}\s*\p{Sc}/u;
const RIGHTS_MARK = /[©®™]|\(c\)\s*\p{Nd}{4}/iu;
const EMAIL_PATTERN = /[^\s@]+@[^\s@]+\.\p{L}{2,}/u;
const EDGE_PUNCTUATION = /^[^\p{L}\p{M}\p{Nd}]+|[^\p{L}\p{M}\p{Nd}]+$/gu;

const PAGE_NUMBER = buildPageNumberPattern();
const CAPTION = buildCaptionPattern();
const BOILERPLATE_PHRASES = Array.from(new Set(allScriptProfiles().flatMap(profile => profile.boilerplatePhrases)));

/**
 * First reason the candidate cannot be a heading, or `null` when it may be one.
 * Checks run cheapest-first and the order is stable, so the reported reason is deterministic.
 */
export function rejectionReason(
    candidate: HeadingCandidate,
    profile: DocumentProfile,
    options: FilterOptions
): RejectionReason | null {
    const block = candidate.block;
    const text = block.text.trim();
    const chars = Array.from(text).length;

    if (chars < MIN_HEADING_CHARS) return "too_short";
    if (isPageNumber(text)) return "page_number";
    if (URL_PATTERN.test(text) || EMAIL_PATTERN.test(text) || BARE_DOMAIN.test(text)) return "url_or_email";
    if (profile.repeatedBlocks.has(block.order)) return "repeated_header";
    if (isMostlyNumeric(text)) return "numeric";
    if (CAPTION.test(text)) return "caption";
    if (isBoilerplate(text)) return "boilerplate";
    if (isFragment(text, getScriptProfile(candidate.script))) return "fragment";
    if (
        block.fontSize <= profile.bodyFontSize + SIZE_EPSILON
        && !block.bold
        && !block.italic
        && familyShare(profile, block.fontName) >= RARE_FAMILY_SHARE
    ) {
        return "body_text";
    }
    if (chars > options.maxHeadingChars) return "too_long";
    if (candidate.scores.combined < MIN_COMBINED_SCORE) return "low_score";
    return null;
}

export function filterCandidates(
    candidates: readonly HeadingCandidate[],
    profile: DocumentProfile,
    options: FilterOptions
): FilterResult {
    const kept: HeadingCandidate[] = [];
    const rejected: Rejection[] = [];
    for (const candidate of candidates) {
        const reason = rejectionReason(candidate, profile, options);
        if (reason) {
            rejected.push({ candidate, reason });
        } else {
            kept.push(candidate);
        }
    }
    return { kept, rejected };
}

export function isPageNumber(text: string): boolean {
    const trimmed = text.trim();
    return PAGE_NUMBER.test(trimmed) || DASHED_PAGE_NUMBER.test(trimmed) || ROMAN_PAGE_NUMBER.test(trimmed);
}

/** No letters, at least twice as many digits as letters, or a currency amount. */
export function isMostlyNumeric(text: string): boolean {
    const letters = (text.match(/\p{L}/gu) ?? []).length;
    const digits = (text.match(/\p{Nd}/gu) ?? []).length;
    return letters === 0 || digits >= 2 * letters || CURRENCY_AMOUNT.test(text);
}

/** Copyright and trademark lines. */
export function isBoilerplate(text: string): boolean {
    if (RIGHTS_MARK.test(text)) return true;
    const lower = text.toLowerCase();
    return BOILERPLATE_PHRASES.some(phrase => lower.includes(phrase));
}

/** Starts (lowercase, cased scripts only) or ends with a connective word. */
export function isFragment(text: string, scriptProfile: ScriptProfile): boolean {
    if (scriptProfile.fragmentWords.length === 0) return false;
    const words = text.split(/\s+/).map(word => word.replace(EDGE_PUNCTUATION, "")).filter(Boolean);
    if (words.length === 0) return false;

    const last = words[words.length - 1].toLowerCase();
    if (scriptProfile.fragmentWords.includes(last)) return true;

    const first = words[0];
    return scriptProfile.hasCase
        && first === first.toLowerCase()
        && scriptProfile.fragmentWords.includes(first);
}

function buildPageNumberPattern(): RegExp {
    const words = Array.from(new Set(allScriptProfiles().flatMap(profile => profile.pageWords)))
        .sort((a, b) => b.length - a.length)
        .map(escapeRegExp)
        .join("|");
    const connectors = PAGE_CONNECTORS.map(escapeRegExp).join("|");
    return new RegExp(
        `^(?:(?:${words})\\.?\\s*)?\\p{Nd}+(?:\\s*(?:${connectors})\\s*\\p{Nd}+)?(?:\\s*(?:${words}))?$`,
        "iu"
    );
}

/** A caption word from any script followed by a figure or table number: "Table 3:", "Fig. 2.1", "图 4". */
function buildCaptionPattern(): RegExp {
    const words = Array.from(new Set(allScriptProfiles().flatMap(profile => profile.captionWords)))
        .sort((a, b) => b.length - a.length)
        .map(escapeRegExp)
        .join("|");
    return new RegExp(`^(?:${words})\\.?\\s*\\p{Nd}+(?:[.\\-–]\\p{Nd}+)*[a-z]?(?=$|[^\\p{Nd}\\p{Ll}\\p{Lu}])`, "iu");
}

import { z } from "zod";
import { invariant } from "../../errors/OutlineError.js";
import type { ScriptName, ScriptProfile } from "../../types.js";
import profileData from "./script-profiles.json";

/** Vote order; earlier entries win ties. */
const SCRIPT_PATTERNS: ReadonlyArray<readonly [ScriptName, RegExp]> = [
    ["latin", /\p{Script=Latin}/u],
    ["cyrillic", /\p{Script=Cyrillic}/u],
    ["greek", /\p{Script=Greek}/u],
    ["armenian", /\p{Script=Armenian}/u],
    ["georgian", /\p{Script=Georgian}/u],
    ["hebrew", /\p{Script=Hebrew}/u],
    ["arabic", /\p{Script=Arabic}/u],
    ["devanagari", /\p{Script=Devanagari}/u],
    ["bengali", /\p{Script=Bengali}/u],
    ["tamil", /\p{Script=Tamil}/u],
    ["thai", /\p{Script=Thai}/u],
    ["han", /\p{Script=Han}/u],
    ["kana", /[\p{Script=Hiragana}\p{Script=Katakana}]/u],
    ["hangul", /\p{Script=Hangul}/u]
];

export const SCRIPT_NAMES: readonly ScriptName[] = SCRIPT_PATTERNS.map(([name]) => name);

const FALLBACK_SCRIPT: ScriptName = "latin";
const CLASSIFIABLE = /[\p{L}\p{M}]/u;

const ScriptProfileEntrySchema = z.object({
    hasCase: z.boolean(),
    usesWordSpacing: z.boolean(),
    keywords: z.array(z.string().min(1)),
    sectionMarkers: z.array(z.string().min(1)),
    numberSeparators: z.string().min(1),
    sentenceTerminators: z.string(),
    clausePunctuation: z.string(),
    fragmentWords: z.array(z.string().min(1)),
    pageWords: z.array(z.string().min(1)),
    captionWords: z.array(z.string().min(1)),
    boilerplatePhrases: z.array(z.string().min(1))
});

const ScriptProfileTableSchema = z.record(z.string(), ScriptProfileEntrySchema);

const PROFILES: ReadonlyMap<ScriptName, ScriptProfile> = loadProfiles(profileData);

export function detectScript(text: string): ScriptName {
    const votes = new Map<ScriptName, number>();
    for (const char of text) {
        if (!CLASSIFIABLE.test(char)) continue;
        const match = SCRIPT_PATTERNS.find(([, pattern]) => pattern.test(char));
        if (!match) continue;
        votes.set(match[0], (votes.get(match[0]) ?? 0) + 1);
    }

    let winner = FALLBACK_SCRIPT;
    let best = 0;
    for (const [name] of SCRIPT_PATTERNS) {
        const count = votes.get(name) ?? 0;
        if (count > best) {
            winner = name;
            best = count;
        }
    }
    return winner;
}

export function getScriptProfile(script: ScriptName): ScriptProfile {
    const profile = PROFILES.get(script);
    invariant(profile !== undefined, `no script profile registered for "${script}"`);
    return profile;
}

/** Every profile, in vote order. Used where a rule has to hold across scripts (page labels). */
export function allScriptProfiles(): ScriptProfile[] {
    return SCRIPT_NAMES.map(getScriptProfile);
}

function loadProfiles(raw: unknown): ReadonlyMap<ScriptName, ScriptProfile> {
    const table = ScriptProfileTableSchema.parse(raw);
    const profiles = new Map<ScriptName, ScriptProfile>();
    for (const script of SCRIPT_NAMES) {
        const entry = table[script];
        invariant(entry !== undefined, `script-profiles.json is missing "${script}"`);
        profiles.set(script, {
            script,
            hasCase: entry.hasCase,
            usesWordSpacing: entry.usesWordSpacing,
            keywords: entry.keywords.map(keyword => keyword.toLowerCase()),
            sectionMarkers: entry.sectionMarkers.map(source => new RegExp(source, "iu")),
            numberSeparators: entry.numberSeparators,
            sentenceTerminators: entry.sentenceTerminators,
            clausePunctuation: entry.clausePunctuation,
            fragmentWords: entry.fragmentWords.map(word => word.toLowerCase()),
            pageWords: entry.pageWords.map(word => word.toLowerCase()),
            captionWords: entry.captionWords.map(word => word.toLowerCase()),
            boilerplatePhrases: entry.boilerplatePhrases.map(phrase => phrase.toLowerCase())
        });
    }
    return profiles;
}

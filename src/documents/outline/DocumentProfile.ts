import type { DocumentProfile, TextBlock } from "../../types.js";
import { median, weightedPercentile } from "../../utils/Statistics.js";
import { normalizeText, sameFontSize } from "./BlockConsolidator.js";

/** A running header/footer repeats on at least this many pages... */
const REPEATED_MIN_PAGES = 3;
/** ...at the same vertical position, within this many points. */
const REPEATED_POSITION_TOLERANCE_PT = 3;

/**
 * Computes the document-wide statistics every later stage reads.
 * Percentiles are weighted by character count so long body paragraphs decide the body size.
 */
export function buildDocumentProfile(blocks: readonly TextBlock[]): DocumentProfile {
    const samples = blocks.map(block => ({ value: block.fontSize, weight: Array.from(block.text).length }));
    const percentiles = {
        p75: weightedPercentile(samples, 0.75),
        p90: weightedPercentile(samples, 0.9),
        p95: weightedPercentile(samples, 0.95)
    };
    const bodyFontSize = percentiles.p75;

    return {
        pageCount: new Set(blocks.map(block => block.page)).size,
        blockCount: blocks.length,
        percentiles,
        bodyFontSize,
        bodyGap: typicalBodyGap(blocks, bodyFontSize),
        fontFamilyShare: familyShares(blocks),
        repeatedBlocks: findRepeatedBlocks(blocks)
    };
}

export function familyShare(profile: DocumentProfile, fontName: string): number {
    return profile.fontFamilyShare.get(fontName) ?? 0;
}

function familyShares(blocks: readonly TextBlock[]): ReadonlyMap<string, number> {
    const counts = new Map<string, number>();
    for (const block of blocks) {
        counts.set(block.fontName, (counts.get(block.fontName) ?? 0) + 1);
    }
    const shares = new Map<string, number>();
    for (const [name, count] of counts) {
        shares.set(name, count / blocks.length);
    }
    return shares;
}

/**
 * Median gap above body-size blocks. The first block of a page is skipped since its gap is
 * measured from the page edge. Falls back to the body font size when nothing qualifies.
 */
function typicalBodyGap(blocks: readonly TextBlock[], bodyFontSize: number): number {
    const gaps: number[] = [];
    let previousPage = -1;
    for (const block of blocks) {
        const firstOnPage = block.page !== previousPage;
        previousPage = block.page;
        if (firstOnPage || !sameFontSize(block.fontSize, bodyFontSize)) continue;
        gaps.push(block.spaceAbove);
    }
    const gap = median(gaps);
    return gap > 0 ? gap : Math.max(bodyFontSize, 1);
}

function findRepeatedBlocks(blocks: readonly TextBlock[]): ReadonlySet<number> {
    const byText = new Map<string, TextBlock[]>();
    for (const block of blocks) {
        const key = normalizeText(block.text).toLowerCase();
        const group = byText.get(key);
        if (group) {
            group.push(block);
        } else {
            byText.set(key, [block]);
        }
    }

    const repeated = new Set<number>();
    for (const group of byText.values()) {
        if (group.length < REPEATED_MIN_PAGES) continue;
        for (const block of group) {
            const pages = new Set(
                group
                    .filter(other => Math.abs(other.bbox.y0 - block.bbox.y0) <= REPEATED_POSITION_TOLERANCE_PT)
                    .map(other => other.page)
            );
            if (pages.size >= REPEATED_MIN_PAGES) {
                repeated.add(block.order);
            }
        }
    }
    return repeated;
}

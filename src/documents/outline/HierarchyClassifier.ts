import type {
    Classification,
    ClassifiedHeading,
    DocumentProfile,
    HeadingCandidate,
    HeadingLevel
} from "../../types.js";

const LEVELS: readonly HeadingLevel[] = ["H1", "H2", "H3"];
/** Sizes above p95 within this many points share a tier. */
const CLUSTER_TOLERANCE_PT = 0.5;
/** Content lead a member needs over every sibling to be promoted. */
const PROMOTION_CONTENT_MARGIN = 0.3;
const SIZE_EPSILON = 0.01;

export interface FontTier {
    /** Largest font size in the tier. */
    size: number;
    members: HeadingCandidate[];
}

/**
 * Turns filtered candidates into a title and a leveled heading list.
 * Heading order follows the candidate order; sorting is the assembler's job.
 */
export function classifyCandidates(candidates: readonly HeadingCandidate[], profile: DocumentProfile): Classification {
    const tiers = buildFontTiers(candidates, profile);
    const titleTierIndex = findTitleTier(tiers, profile);
    const title = titleTierIndex === -1 ? null : pickTitle(tiers[titleTierIndex].members);
    const ladder = tiers.filter((_, index) => index !== titleTierIndex);

    const levelByCandidate = new Map<HeadingCandidate, HeadingLevel>();
    ladder.forEach((tier, index) => {
        const level = LEVELS[Math.min(index, LEVELS.length - 1)];
        for (const member of tier.members) {
            levelByCandidate.set(member, level);
        }
        if (level !== "H1") {
            for (const promoted of selectPromotions(tier.members)) {
                levelByCandidate.set(promoted, raiseLevel(level));
            }
        }
    });

    const headings: ClassifiedHeading[] = [];
    for (const candidate of candidates) {
        const level = levelByCandidate.get(candidate);
        if (level) headings.push({ level, candidate });
    }
    return { title, headings };
}

/**
 * Groups candidates by font size. Sizes up to p95 collapse into three percentile bands;
 * every distinct size above p95 gets its own tier. Tiers are returned largest first.
 */
export function buildFontTiers(candidates: readonly HeadingCandidate[], profile: DocumentProfile): FontTier[] {
    const { p75, p90, p95 } = profile.percentiles;
    const bands: HeadingCandidate[][] = [[], [], []];
    const large: HeadingCandidate[] = [];
    for (const candidate of candidates) {
        const size = candidate.block.fontSize;
        if (size <= p75) bands[0].push(candidate);
        else if (size <= p90) bands[1].push(candidate);
        else if (size <= p95) bands[2].push(candidate);
        else large.push(candidate);
    }

    const tiers: FontTier[] = [];
    const sortedLarge = [...large].sort((a, b) => b.block.fontSize - a.block.fontSize);
    let current: FontTier | undefined;
    for (const candidate of sortedLarge) {
        if (current && current.size - candidate.block.fontSize <= CLUSTER_TOLERANCE_PT) {
            current.members.push(candidate);
        } else {
            current = { size: candidate.block.fontSize, members: [candidate] };
            tiers.push(current);
        }
    }
    for (const band of bands) {
        if (band.length === 0) continue;
        tiers.push({ size: Math.max(...band.map(member => member.block.fontSize)), members: band });
    }

    for (const tier of tiers) {
        tier.members.sort((a, b) => a.block.order - b.block.order);
    }
    return tiers.sort((a, b) => b.size - a.size);
}

/**
 * Within one tier, members of numerically equal size form a group. Mixed numbering depths
 * promote the shallowest numbered members; otherwise a member whose content score leads every
 * sibling by more than the margin is promoted.
 */
export function selectPromotions(members: readonly HeadingCandidate[]): HeadingCandidate[] {
    const promoted: HeadingCandidate[] = [];
    for (const group of groupBySize(members)) {
        if (group.length < 2) continue;

        const numbered = group.filter(member => member.numberingDepth > 0);
        const depths = new Set(numbered.map(member => member.numberingDepth));
        if (depths.size > 1) {
            const shallowest = Math.min(...depths);
            promoted.push(...numbered.filter(member => member.numberingDepth === shallowest));
            continue;
        }

        for (const member of group) {
            const others = group.filter(other => other !== member);
            const best = Math.max(...others.map(other => other.scores.content));
            if (member.scores.content - best > PROMOTION_CONTENT_MARGIN) {
                promoted.push(member);
            }
        }
    }
    return promoted;
}

function findTitleTier(tiers: readonly FontTier[], profile: DocumentProfile): number {
    const index = tiers.findIndex(tier =>
        tier.members.some(member => member.block.page === 0 && member.block.fontSize > profile.bodyFontSize + SIZE_EPSILON)
    );
    if (index === -1) return -1;
    return tiers[index].members.every(member => member.block.page === 0) ? index : -1;
}

function pickTitle(members: readonly HeadingCandidate[]): HeadingCandidate | null {
    let best: HeadingCandidate | null = null;
    for (const member of members) {
        if (!best || compareTitleCandidates(member, best) < 0) {
            best = member;
        }
    }
    return best;
}

function compareTitleCandidates(a: HeadingCandidate, b: HeadingCandidate): number {
    return b.scores.combined - a.scores.combined
        || a.block.page - b.block.page
        || a.block.bbox.y0 - b.block.bbox.y0
        || a.block.order - b.block.order;
}

function groupBySize(members: readonly HeadingCandidate[]): HeadingCandidate[][] {
    const groups = new Map<number, HeadingCandidate[]>();
    for (const member of members) {
        const group = groups.get(member.block.fontSize);
        if (group) {
            group.push(member);
        } else {
            groups.set(member.block.fontSize, [member]);
        }
    }
    return Array.from(groups.values());
}

function raiseLevel(level: HeadingLevel): HeadingLevel {
    return level === "H3" ? "H2" : "H1";
}

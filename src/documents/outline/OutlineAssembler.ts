import type { AssembledOutline, Classification, ClassifiedHeading, OutlineEntry } from "../../types.js";

/** Longer titles are cut to `TRUNCATED_TITLE_CHARS` characters plus an ellipsis. */
export const MAX_TITLE_CHARS = 100;
const TRUNCATED_TITLE_CHARS = 50;

export function assembleOutline(classification: Classification): AssembledOutline {
    const ordered = [...classification.headings].sort(compareHeadings);
    const outline: OutlineEntry[] = ordered.map(heading => ({
        level: heading.level,
        text: heading.candidate.block.text,
        page: heading.candidate.block.page
    }));

    const title = classification.title?.block.text
        ?? outline.find(entry => entry.level === "H1")?.text
        ?? "";
    return { title: boundTitle(title), outline };
}

/**
 * Output bytes: `{ title, outline }` with two-space indentation and a trailing newline.
 * Only the outline fields are written, so extra keys on the input never leak.
 */
export function serializeOutline(result: AssembledOutline): string {
    const payload = {
        title: result.title,
        outline: result.outline.map(entry => ({ level: entry.level, text: entry.text, page: entry.page }))
    };
    return `${JSON.stringify(payload, null, 2)}\n`;
}

function boundTitle(text: string): string {
    const chars = Array.from(text);
    if (chars.length <= MAX_TITLE_CHARS) return text;
    return `${chars.slice(0, TRUNCATED_TITLE_CHARS).join("").trimEnd()}...`;
}

function compareHeadings(a: ClassifiedHeading, b: ClassifiedHeading): number {
    const left = a.candidate.block;
    const right = b.candidate.block;
    return left.page - right.page || left.bbox.y0 - right.bbox.y0 || left.order - right.order;
}

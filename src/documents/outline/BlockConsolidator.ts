import type { BoundingBox, PageSpans, TextBlock, TextLine, TextSpan } from "../../types.js";
import { roundTo, weightedMode } from "../../utils/Statistics.js";

/** Max vertical-centre distance for spans on one line, as a fraction of the smaller font size. */
const LINE_CENTER_TOLERANCE = 0.5;
const SIZE_TOLERANCE_PT = 0.5;
const SIZE_TOLERANCE_RATIO = 0.1;
/** Horizontal gap (fraction of font size) above which neighbouring spans are separated by a space. */
const WORD_GAP_RATIO = 0.15;
/** Max vertical gap between lines of one block, as a fraction of font size. */
const BLOCK_GAP_RATIO = 0.7;
const ALIGN_TOLERANCE_PT = 2;
const ALIGN_TOLERANCE_RATIO = 0.5;
const CENTER_TOLERANCE_RATIO = 0.05;
const CENTERED_MAX_WIDTH_RATIO = 0.85;

const NO_SPACE_SCRIPT = /[\p{Script=Han}\p{Script=Hiragana}\p{Script=Katakana}\p{Script=Thai}]/u;

export type ConsolidatedBlock = Omit<TextBlock, "order">;

/**
 * Consolidates every page and numbers the blocks in document order.
 */
export function consolidatePages(pages: readonly PageSpans[]): TextBlock[] {
    const blocks: TextBlock[] = [];
    for (const page of pages) {
        for (const block of consolidatePage(page)) {
            blocks.push({ ...block, order: blocks.length });
        }
    }
    return blocks;
}

export function consolidatePage(page: PageSpans): ConsolidatedBlock[] {
    const lines = groupSpansIntoLines(page.spans.filter(span => span.text.trim().length > 0));
    if (lines.length === 0) return [];

    const bodyLeft = estimateBodyLeft(lines);
    const groups = groupLinesIntoBlocks(lines);

    const blocks: ConsolidatedBlock[] = [];
    for (const group of groups) {
        const text = normalizeText(joinLines(group));
        if (!text) continue;
        blocks.push(buildBlock(group, text, page, bodyLeft));
    }

    for (let index = 0; index < blocks.length; index += 1) {
        const block = blocks[index];
        const previous = blocks[index - 1];
        const next = blocks[index + 1];
        block.spaceAbove = Math.max(0, previous ? block.bbox.y0 - previous.bbox.y1 : block.bbox.y0);
        block.spaceBelow = Math.max(0, next ? next.bbox.y0 - block.bbox.y1 : page.height - block.bbox.y1);
    }
    return blocks;
}

export function normalizeText(value: string): string {
    return value.normalize("NFC").replace(/\s+/g, " ").trim();
}

export function sameFontSize(a: number, b: number): boolean {
    return Math.abs(a - b) <= Math.max(SIZE_TOLERANCE_PT, SIZE_TOLERANCE_RATIO * Math.min(a, b));
}

function groupSpansIntoLines(spans: TextSpan[]): TextLine[] {
    const sorted = [...spans].sort((a, b) => centerY(a.bbox) - centerY(b.bbox) || a.bbox.x0 - b.bbox.x0);
    const open: TextSpan[][] = [];

    for (const span of sorted) {
        let target: TextSpan[] | undefined;
        // Lines close to this span's centre sit at the tail because spans arrive sorted by centre.
        for (let index = open.length - 1; index >= 0; index -= 1) {
            const line = open[index];
            const anchor = line[0];
            const tolerance = LINE_CENTER_TOLERANCE * Math.min(anchor.fontSize, span.fontSize);
            if (Math.abs(centerY(anchor.bbox) - centerY(span.bbox)) >= tolerance) break;
            if (sameFontSize(anchor.fontSize, span.fontSize) && anchor.bold === span.bold) {
                target = line;
                break;
            }
        }
        if (target) {
            target.push(span);
        } else {
            open.push([span]);
        }
    }

    return open
        .map(buildLine)
        .sort((a, b) => a.bbox.y0 - b.bbox.y0 || a.bbox.x0 - b.bbox.x0);
}

function buildLine(spans: TextSpan[]): TextLine {
    const ordered = [...spans].sort((a, b) => a.bbox.x0 - b.bbox.x0);
    let text = "";
    let previous: TextSpan | undefined;
    for (const span of ordered) {
        if (previous && needsSpace(previous, span, text)) {
            text += " ";
        }
        text += span.text;
        previous = span;
    }

    const dominant = dominantSpan(ordered);
    return {
        spans: ordered,
        text,
        fontSize: weightedMode(ordered.map(span => ({ value: span.fontSize, weight: charCount(span.text) }))),
        fontName: dominant.fontName,
        bold: dominant.bold,
        italic: dominant.italic,
        bbox: unionBoxes(ordered.map(span => span.bbox)),
        page: dominant.page
    };
}

function needsSpace(previous: TextSpan, current: TextSpan, textSoFar: string): boolean {
    if (/\s$/.test(textSoFar) || /^\s/.test(current.text)) return false;
    const gap = current.bbox.x0 - previous.bbox.x1;
    return gap > WORD_GAP_RATIO * Math.min(previous.fontSize, current.fontSize);
}

function groupLinesIntoBlocks(lines: TextLine[]): TextLine[][] {
    const groups: TextLine[][] = [];
    let current: TextLine[] = [];
    for (const line of lines) {
        const last = current[current.length - 1];
        if (last && continuesBlock(last, line)) {
            current.push(line);
        } else {
            if (current.length > 0) groups.push(current);
            current = [line];
        }
    }
    if (current.length > 0) groups.push(current);
    return groups;
}

function continuesBlock(previous: TextLine, line: TextLine): boolean {
    if (!sameFontSize(previous.fontSize, line.fontSize)) return false;
    if (previous.bold !== line.bold || previous.fontName !== line.fontName) return false;

    const gap = line.bbox.y0 - previous.bbox.y1;
    if (gap >= BLOCK_GAP_RATIO * Math.max(previous.fontSize, line.fontSize)) return false;

    const tolerance = Math.max(ALIGN_TOLERANCE_PT, ALIGN_TOLERANCE_RATIO * line.fontSize);
    const leftAligned = Math.abs(previous.bbox.x0 - line.bbox.x0) <= tolerance;
    const sameAxis = Math.abs(centerX(previous.bbox) - centerX(line.bbox)) <= tolerance;
    return leftAligned || sameAxis;
}

function joinLines(lines: TextLine[]): string {
    let text = "";
    for (const line of lines) {
        const next = line.text.trim();
        if (!text) {
            text = next;
            continue;
        }
        const tail = Array.from(text).pop() ?? "";
        const head = Array.from(next)[0] ?? "";
        text += NO_SPACE_SCRIPT.test(tail) && NO_SPACE_SCRIPT.test(head) ? next : ` ${next}`;
    }
    return text;
}

function buildBlock(lines: TextLine[], text: string, page: PageSpans, bodyLeft: number): ConsolidatedBlock {
    const spans = lines.flatMap(line => line.spans);
    const dominant = dominantSpan(spans);
    const bbox = unionBoxes(lines.map(line => line.bbox));
    const width = bbox.x1 - bbox.x0;
    const indent = Math.max(0, bbox.x0 - bodyLeft);
    const fontSize = weightedMode(spans.map(span => ({ value: span.fontSize, weight: charCount(span.text) })));
    // A block starting at the body margin is left-aligned, however close its centre is.
    const centered = Math.abs(centerX(bbox) - page.width / 2) <= CENTER_TOLERANCE_RATIO * page.width
        && width < CENTERED_MAX_WIDTH_RATIO * page.width
        && indent > Math.max(ALIGN_TOLERANCE_PT, ALIGN_TOLERANCE_RATIO * fontSize);
    const fontSizes = Array.from(new Set(spans.map(span => roundTo(span.fontSize, 0.1)))).sort((a, b) => b - a);

    return {
        page: page.page,
        pageWidth: page.width,
        pageHeight: page.height,
        lines,
        text,
        fontSize,
        fontSizes,
        fontName: dominant.fontName,
        bold: dominant.bold,
        italic: dominant.italic,
        bbox,
        indent,
        centered,
        spaceAbove: 0,
        spaceBelow: 0
    };
}

/** Most common line start, weighted by characters, so body text decides the margin. */
function estimateBodyLeft(lines: TextLine[]): number {
    return weightedMode(lines.map(line => ({ value: roundTo(line.bbox.x0, 1), weight: charCount(line.text) })));
}

function dominantSpan(spans: TextSpan[]): TextSpan {
    let best = spans[0];
    let bestChars = -1;
    for (const span of spans) {
        const chars = charCount(span.text);
        if (chars > bestChars) {
            best = span;
            bestChars = chars;
        }
    }
    return best;
}

function charCount(text: string): number {
    return Array.from(text.replace(/\s+/g, "")).length;
}

function unionBoxes(boxes: BoundingBox[]): BoundingBox {
    return {
        x0: Math.min(...boxes.map(box => box.x0)),
        y0: Math.min(...boxes.map(box => box.y0)),
        x1: Math.max(...boxes.map(box => box.x1)),
        y1: Math.max(...boxes.map(box => box.y1))
    };
}

function centerX(box: BoundingBox): number {
    return (box.x0 + box.x1) / 2;
}

function centerY(box: BoundingBox): number {
    return (box.y0 + box.y1) / 2;
}

/**
 * Page-space rectangle. Origin is the top-left corner of the page and y grows downward,
 * so `y0` is the top edge and `y1` the bottom edge.
 */
export interface BoundingBox {
    x0: number;
    y0: number;
    x1: number;
    y1: number;
}

export interface TextSpan {
    text: string;
    fontSize: number;
    fontName: string;
    bold: boolean;
    italic: boolean;
    bbox: BoundingBox;
    /** Zero-based page index. */
    page: number;
}

export interface PageSpans {
    kind: "spans";
    page: number;
    width: number;
    height: number;
    spans: TextSpan[];
}

export interface FailedPage {
    kind: "failed";
    page: number;
    reason: string;
}

export type PageInput = PageSpans | FailedPage;

export interface TextLine {
    spans: TextSpan[];
    text: string;
    fontSize: number;
    fontName: string;
    bold: boolean;
    italic: boolean;
    bbox: BoundingBox;
    page: number;
}

export interface TextBlock {
    /** Position of the block in document order (page, then top-to-bottom). */
    order: number;
    page: number;
    pageWidth: number;
    pageHeight: number;
    lines: TextLine[];
    text: string;
    fontSize: number;
    /** Distinct font sizes the block mixes, descending. */
    fontSizes: number[];
    fontName: string;
    bold: boolean;
    italic: boolean;
    bbox: BoundingBox;
    indent: number;
    centered: boolean;
    spaceAbove: number;
    spaceBelow: number;
}

export type ScriptName =
    | "latin"
    | "cyrillic"
    | "greek"
    | "armenian"
    | "georgian"
    | "hebrew"
    | "arabic"
    | "devanagari"
    | "bengali"
    | "tamil"
    | "thai"
    | "han"
    | "kana"
    | "hangul";

export interface ScriptProfile {
    script: ScriptName;
    hasCase: boolean;
    usesWordSpacing: boolean;
    keywords: string[];
    sectionMarkers: RegExp[];
    numberSeparators: string;
    sentenceTerminators: string;
    clausePunctuation: string;
    fragmentWords: string[];
    pageWords: string[];
    /** Words that open a figure or table caption ("Table 1:"). */
    captionWords: string[];
    boilerplatePhrases: string[];
}

export interface FeatureScores {
    font: number;
    content: number;
    layout: number;
    combined: number;
}

export interface HeadingCandidate {
    block: TextBlock;
    script: ScriptName;
    numberingDepth: number;
    scores: FeatureScores;
}

export interface FontSizePercentiles {
    p75: number;
    p90: number;
    p95: number;
}

/**
 * Document-wide statistics, computed once per document and passed read-only
 * into the scorer, filter and classifier.
 */
export interface DocumentProfile {
    pageCount: number;
    blockCount: number;
    percentiles: FontSizePercentiles;
    bodyFontSize: number;
    bodyGap: number;
    fontFamilyShare: ReadonlyMap<string, number>;
    repeatedBlocks: ReadonlySet<number>;
}

export type HeadingLevel = "H1" | "H2" | "H3";

export interface ClassifiedHeading {
    level: HeadingLevel;
    candidate: HeadingCandidate;
}

export interface Classification {
    title: HeadingCandidate | null;
    headings: ClassifiedHeading[];
}

export interface OutlineEntry {
    level: HeadingLevel;
    text: string;
    page: number;
}

export interface AssembledOutline {
    title: string;
    outline: OutlineEntry[];
}

export type OutlineErrorReason =
    | "malformed_document"
    | "unsupported_document"
    | "resource_exceeded"
    | "internal_invariant";

export interface OutlineWarning {
    reason: OutlineErrorReason;
    message: string;
    page?: number;
}

export interface OutlineStats {
    pagesProcessed: number;
    blockCount: number;
    candidateCount: number;
    headingCount: number;
    elapsedMs: number;
}

export interface OutlineResult extends AssembledOutline {
    warnings: OutlineWarning[];
    partial: boolean;
    stats: OutlineStats;
}

export interface PipelineConfig {
    maxPages: number;
    memoryLimitMb: number;
    timeLimitMs: number;
    verbose: boolean;
    maxHeadingChars: number;
}

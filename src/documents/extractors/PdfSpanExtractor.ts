import { OutlineError, describeError } from "../../errors/OutlineError.js";
import type { PageInput, TextSpan } from "../../types.js";
import type { BudgetExhaustion, ResourceBudget } from "../../utils/ResourceBudget.js";
import { createLogger } from "../../utils/StructuredLogger.js";

const logger = createLogger("PdfSpanExtractor");

const PDFJS_MODULE = "pdfjs-dist/legacy/build/pdf.js";
const DEFAULT_ASCENT = 0.8;
const DEFAULT_DESCENT = -0.2;

const SUBSET_PREFIX = /^[A-Z]{6}\+/;
const BOLD_WEIGHT = /bold|black|heavy|semibold|demi/i;
const ITALIC_STYLE = /italic|oblique/i;

interface PdfTextItem {
    str: string;
    transform: number[];
    width: number;
    height: number;
    fontName: string;
}

interface PdfTextStyle {
    fontFamily?: string;
    ascent?: number;
    descent?: number;
}

interface PdfViewport {
    width: number;
    height: number;
    convertToViewportPoint(x: number, y: number): number[];
}

interface PdfObjects {
    has(id: string): boolean;
    get(id: string): unknown;
}

interface PdfPage {
    getViewport(params: { scale: number }): PdfViewport;
    getTextContent(): Promise<{ items: unknown[]; styles: Record<string, PdfTextStyle> }>;
    getOperatorList(): Promise<unknown>;
    commonObjs: PdfObjects;
    cleanup(): unknown;
}

interface PdfDocument {
    numPages: number;
    getPage(pageNumber: number): Promise<PdfPage>;
}

interface PdfLoadingTask {
    promise: Promise<PdfDocument>;
    destroy(): Promise<void>;
}

interface PdfjsModule {
    getDocument(params: {
        data: Uint8Array;
        isEvalSupported: boolean;
        disableFontFace: boolean;
        useSystemFonts: boolean;
        verbosity: number;
    }): PdfLoadingTask;
}

export interface FontStyle {
    family: string;
    bold: boolean;
    italic: boolean;
}

export interface SpanExtractionOptions {
    maxPages: number;
    budget?: ResourceBudget;
}

export interface SpanExtraction {
    pages: PageInput[];
    totalPages: number;
    /** Pages past `maxPages` were not read. */
    truncated: boolean;
    /** Set when the budget stopped extraction early. */
    exhaustion: BudgetExhaustion | null;
}

let cachedPdfjs: PdfjsModule | undefined;

/**
 * Loads pdfjs lazily so the rest of the pipeline works (and tests run) without it.
 * Throws `unsupported_document` when the parser cannot be loaded.
 */
export function loadPdfjs(): PdfjsModule {
    if (cachedPdfjs) return cachedPdfjs;
    let loaded: unknown;
    try {
        loaded = require(PDFJS_MODULE);
    } catch (error) {
        throw new OutlineError("unsupported_document", `pdf parser unavailable: ${describeError(error)}`);
    }
    const candidate = isRecord(loaded) && !isPdfjsModule(loaded) ? loaded.default : loaded;
    if (!isPdfjsModule(candidate)) {
        throw new OutlineError("unsupported_document", "pdf parser unavailable: getDocument not exported");
    }
    cachedPdfjs = candidate;
    return candidate;
}

/**
 * Reads styled text spans page by page. Container failures (not a PDF, encrypted) throw
 * `unsupported_document`; a page that fails to decode becomes a failed page.
 */
export async function extractPageSpans(data: Uint8Array, options: SpanExtractionOptions): Promise<SpanExtraction> {
    const pdfjs = loadPdfjs();
    const loadingTask = pdfjs.getDocument({
        data: new Uint8Array(data),
        isEvalSupported: false,
        disableFontFace: true,
        useSystemFonts: false,
        verbosity: 0
    });

    try {
        let pdf: PdfDocument;
        try {
            pdf = await loadingTask.promise;
        } catch (error) {
            throw new OutlineError("unsupported_document", `cannot open document: ${describeError(error)}`);
        }

        const totalPages = pdf.numPages;
        const pageLimit = Math.min(totalPages, options.maxPages);
        const pages: PageInput[] = [];
        let exhaustion: BudgetExhaustion | null = null;

        for (let index = 0; index < pageLimit; index += 1) {
            exhaustion = index > 0 ? options.budget?.check() ?? null : null;
            if (exhaustion) {
                logger.warn("Stopping extraction, budget exhausted", { page: index, exhaustion });
                break;
            }
            pages.push(await extractPage(pdf, index));
        }

        return { pages, totalPages, truncated: totalPages > pageLimit, exhaustion };
    } finally {
        await loadingTask.destroy();
    }
}

export function parseFontName(raw: string): FontStyle {
    const family = raw.replace(SUBSET_PREFIX, "").trim();
    return {
        family: family || raw,
        bold: BOLD_WEIGHT.test(family),
        italic: ITALIC_STYLE.test(family)
    };
}

async function extractPage(pdf: PdfDocument, index: number): Promise<PageInput> {
    let page: PdfPage | undefined;
    try {
        page = await pdf.getPage(index + 1);
        const viewport = page.getViewport({ scale: 1 });
        // Resolves the page's fonts into commonObjs so their real names can be read.
        await page.getOperatorList();
        const content = await page.getTextContent();

        const spans: TextSpan[] = [];
        const fonts = new Map<string, FontStyle>();
        for (const item of content.items) {
            if (!isTextItem(item) || item.str.trim().length === 0) continue;
            let font = fonts.get(item.fontName);
            if (!font) {
                font = resolveFont(page, item.fontName, content.styles[item.fontName]);
                fonts.set(item.fontName, font);
            }
            spans.push(toSpan(item, font, content.styles[item.fontName], viewport, index));
        }
        return { kind: "spans", page: index, width: viewport.width, height: viewport.height, spans };
    } catch (error) {
        logger.warn("Page failed to decode", { page: index, error: describeError(error) });
        return { kind: "failed", page: index, reason: describeError(error) };
    } finally {
        page?.cleanup();
    }
}

function toSpan(item: PdfTextItem, font: FontStyle, style: PdfTextStyle | undefined, viewport: PdfViewport, page: number): TextSpan {
    const [, , c, d, e, f] = item.transform;
    const fontSize = Math.hypot(c, d) || item.height || 1;
    const [x, baseline] = viewport.convertToViewportPoint(e, f);
    const ascent = style?.ascent ?? DEFAULT_ASCENT;
    const descent = style?.descent ?? DEFAULT_DESCENT;
    return {
        text: item.str,
        fontSize,
        fontName: font.family,
        bold: font.bold,
        italic: font.italic,
        bbox: {
            x0: x,
            y0: baseline - ascent * fontSize,
            x1: x + item.width,
            y1: baseline - descent * fontSize
        },
        page
    };
}

function resolveFont(page: PdfPage, id: string, style: PdfTextStyle | undefined): FontStyle {
    const loaded = page.commonObjs.has(id) ? page.commonObjs.get(id) : undefined;
    if (isRecord(loaded) && typeof loaded.name === "string" && loaded.name.length > 0) {
        const parsed = parseFontName(loaded.name);
        return {
            family: parsed.family,
            bold: parsed.bold || loaded.bold === true || loaded.black === true,
            italic: parsed.italic || loaded.italic === true
        };
    }
    return parseFontName(style?.fontFamily ?? id);
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null;
}

function isPdfjsModule(value: unknown): value is PdfjsModule {
    return isRecord(value) && typeof value.getDocument === "function";
}

function isTextItem(value: unknown): value is PdfTextItem {
    return isRecord(value)
        && typeof value.str === "string"
        && typeof value.fontName === "string"
        && typeof value.width === "number"
        && typeof value.height === "number"
        && Array.isArray(value.transform)
        && value.transform.length >= 6
        && value.transform.every(entry => typeof entry === "number");
}

import { promises as fs } from "fs";
import { OutlineError, describeError, invariant } from "../../errors/OutlineError.js";
import { extractPageSpans, type SpanExtraction } from "../extractors/PdfSpanExtractor.js";
import type { OutlineResult, OutlineWarning, PageInput, PipelineConfig, TextBlock } from "../../types.js";
import { ResourceBudget } from "../../utils/ResourceBudget.js";
import { createLogger } from "../../utils/StructuredLogger.js";
import { consolidatePage } from "./BlockConsolidator.js";
import { filterCandidates } from "./CandidateFilter.js";
import { buildDocumentProfile } from "./DocumentProfile.js";
import { scoreBlock } from "./FeatureScorer.js";
import { classifyCandidates } from "./HierarchyClassifier.js";
import { assembleOutline } from "./OutlineAssembler.js";
import { detectScript, getScriptProfile } from "./ScriptDetector.js";

const logger = createLogger("OutlinePipeline");

/**
 * Runs consolidation through assembly over already-extracted pages.
 * Failed pages become warnings; pages past `maxPages` and pages left when the budget runs out
 * are dropped and the result is flagged partial.
 */
export function runOutlinePipeline(
    pages: readonly PageInput[],
    config: PipelineConfig,
    budget: ResourceBudget = new ResourceBudget(config)
): OutlineResult {
    const warnings: OutlineWarning[] = [];
    const blocks: TextBlock[] = [];
    let partial = false;
    let pagesProcessed = 0;

    const inRange = pages.filter(page => page.page < config.maxPages);
    if (inRange.length < pages.length) {
        partial = true;
        warnings.push({
            reason: "resource_exceeded",
            message: `page limit of ${config.maxPages} reached; ${pages.length - inRange.length} page(s) skipped`
        });
    }

    for (const page of inRange) {
        const exhaustion = pagesProcessed > 0 ? budget.check() : null;
        if (exhaustion) {
            partial = true;
            warnings.push({ reason: "resource_exceeded", message: budget.describe(exhaustion), page: page.page });
            break;
        }
        pagesProcessed += 1;
        if (page.kind === "failed") {
            warnings.push({ reason: "malformed_document", message: page.reason, page: page.page });
            continue;
        }
        for (const block of consolidatePage(page)) {
            blocks.push({ ...block, order: blocks.length });
        }
    }

    if (pagesProcessed > 0 && blocks.length === 0 && warnings.every(warning => warning.reason !== "resource_exceeded")) {
        warnings.push({ reason: "unsupported_document", message: "no extractable text" });
    }

    const profile = buildDocumentProfile(blocks);
    const candidates = blocks.map(block => scoreBlock(block, profile, getScriptProfile(detectScript(block.text))));
    const { kept, rejected } = filterCandidates(candidates, profile, config);
    const classification = classifyCandidates(kept, profile);
    const assembled = assembleOutline(classification);

    for (const entry of assembled.outline) {
        invariant(entry.page >= 0 && entry.page < config.maxPages, `heading page ${entry.page} outside the page limit`);
    }

    if (config.verbose) {
        for (const { candidate, reason } of rejected) {
            logger.debug("Rejected candidate", { page: candidate.block.page, text: candidate.block.text, reason });
        }
    }

    const stats = {
        pagesProcessed,
        blockCount: blocks.length,
        candidateCount: kept.length,
        headingCount: assembled.outline.length,
        elapsedMs: budget.elapsedMs()
    };
    logger.debug("Outline assembled", { ...stats, partial, warnings: warnings.length });

    return { ...assembled, warnings, partial, stats };
}

/**
 * Reads a PDF and builds its outline under one budget. Documents that cannot be opened yield an
 * empty outline with an `unsupported_document` warning; only internal invariant failures throw.
 */
export async function extractOutlineFromFile(filePath: string, config: PipelineConfig): Promise<OutlineResult> {
    const budget = new ResourceBudget(config);

    let extraction: SpanExtraction;
    try {
        const data = await fs.readFile(filePath);
        extraction = await extractPageSpans(data, { maxPages: config.maxPages, budget });
    } catch (error) {
        if (error instanceof OutlineError && error.reason === "internal_invariant") throw error;
        const warning: OutlineWarning = error instanceof OutlineError
            ? error.toWarning()
            : { reason: "unsupported_document", message: describeError(error) };
        logger.warn("Document could not be read", { filePath, ...warning });
        return emptyResult([warning], budget);
    }

    // Pages read before the budget ran out are still assembled, under a budget of their own.
    const result = runOutlinePipeline(extraction.pages, config, extraction.exhaustion ? new ResourceBudget(config) : budget);
    const warnings = [...result.warnings];
    if (extraction.truncated) {
        warnings.push({
            reason: "resource_exceeded",
            message: `page limit of ${config.maxPages} reached; ${extraction.totalPages - config.maxPages} page(s) not read`
        });
    }
    if (extraction.exhaustion) {
        warnings.push({ reason: "resource_exceeded", message: budget.describe(extraction.exhaustion) });
    }
    return {
        ...result,
        warnings,
        partial: result.partial || extraction.truncated || extraction.exhaustion !== null
    };
}

function emptyResult(warnings: OutlineWarning[], budget: ResourceBudget): OutlineResult {
    return {
        title: "",
        outline: [],
        warnings,
        partial: false,
        stats: { pagesProcessed: 0, blockCount: 0, candidateCount: 0, headingCount: 0, elapsedMs: budget.elapsedMs() }
    };
}

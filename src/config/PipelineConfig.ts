import { z } from "zod";
import type { PipelineConfig } from "../types.js";

export const DEFAULT_MAX_PAGES = 50;
export const DEFAULT_MEMORY_LIMIT_MB = 200;
export const DEFAULT_TIME_LIMIT_MS = 10_000;
export const DEFAULT_MAX_HEADING_CHARS = 200;

export const PipelineConfigSchema = z.object({
    maxPages: z.number().int().positive(),
    memoryLimitMb: z.number().int().positive(),
    timeLimitMs: z.number().int().positive(),
    verbose: z.boolean(),
    maxHeadingChars: z.number().int().min(2)
});

export const PipelineOverridesSchema = PipelineConfigSchema.partial();

export type PipelineOverrides = z.infer<typeof PipelineOverridesSchema>;

export const DEFAULT_PIPELINE_CONFIG: PipelineConfig = {
    maxPages: DEFAULT_MAX_PAGES,
    memoryLimitMb: DEFAULT_MEMORY_LIMIT_MB,
    timeLimitMs: DEFAULT_TIME_LIMIT_MS,
    verbose: false,
    maxHeadingChars: DEFAULT_MAX_HEADING_CHARS
};

export function resolvePipelineConfigFromEnv(env: NodeJS.ProcessEnv = process.env): PipelineConfig {
    return {
        maxPages: normalizeLimit(env.OUTLINE_MAX_PAGES, DEFAULT_MAX_PAGES),
        memoryLimitMb: normalizeLimit(env.OUTLINE_MEMORY_LIMIT_MB, DEFAULT_MEMORY_LIMIT_MB),
        timeLimitMs: normalizeLimit(env.OUTLINE_TIME_LIMIT_MS, DEFAULT_TIME_LIMIT_MS),
        verbose: parseFlag(env.OUTLINE_VERBOSE),
        maxHeadingChars: normalizeLimit(env.OUTLINE_MAX_HEADING_CHARS, DEFAULT_MAX_HEADING_CHARS)
    };
}

/**
 * Applies CLI or tool-call overrides on top of a base configuration and validates the result.
 * Throws a `ZodError` when an override is out of range.
 */
export function mergePipelineConfig(base: PipelineConfig, overrides: PipelineOverrides = {}): PipelineConfig {
    const defined = Object.fromEntries(
        Object.entries(overrides).filter(([, value]) => value !== undefined)
    );
    return PipelineConfigSchema.parse({ ...base, ...defined });
}

function normalizeLimit(value: string | undefined, fallback: number): number {
    const parsed = Number.parseInt(value ?? "", 10);
    return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

function parseFlag(value: string | undefined): boolean {
    if (!value) return false;
    const normalized = value.trim().toLowerCase();
    return normalized === "true" || normalized === "1" || normalized === "on";
}

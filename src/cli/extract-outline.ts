#!/usr/bin/env node

import * as fs from "fs";
import * as path from "path";
import { mergePipelineConfig, resolvePipelineConfigFromEnv, type PipelineOverrides } from "../config/PipelineConfig.js";
import { extractOutlineFromFile } from "../documents/outline/OutlinePipeline.js";
import { serializeOutline } from "../documents/outline/OutlineAssembler.js";
import { describeError } from "../errors/OutlineError.js";
import { setLogLevel } from "../utils/StructuredLogger.js";

const DEFAULT_OUTPUT_DIR = "output";

export interface CliOptions {
    inputs: string[];
    outputDir: string;
    stdout: boolean;
    verbose: boolean;
    help: boolean;
    overrides: PipelineOverrides;
}

export function parseCliArgs(argv: string[]): CliOptions {
    const options: CliOptions = {
        inputs: [],
        outputDir: DEFAULT_OUTPUT_DIR,
        stdout: false,
        verbose: false,
        help: false,
        overrides: {}
    };
    for (let i = 0; i < argv.length; i += 1) {
        const arg = argv[i];
        if (arg === "--help" || arg === "-h") options.help = true;
        else if (arg === "--stdout") options.stdout = true;
        else if (arg === "--verbose") options.verbose = true;
        else if (arg === "--output") options.outputDir = argv[++i] ?? DEFAULT_OUTPUT_DIR;
        else if (arg === "--max-pages") options.overrides.maxPages = parseNumberFlag(arg, argv[++i]);
        else if (arg === "--time-limit-ms") options.overrides.timeLimitMs = parseNumberFlag(arg, argv[++i]);
        else if (arg.startsWith("--")) throw new Error(`Unknown option: ${arg}`);
        else options.inputs.push(arg);
    }
    if (options.verbose) options.overrides.verbose = true;
    return options;
}

export function usage(): string {
    return [
        "Usage: doc-outline <file.pdf|directory>... [--output DIR] [--stdout] [--verbose]",
        "                   [--max-pages N] [--time-limit-ms N]",
        "",
        "Notes:",
        `- Writes <name>.json per PDF into --output (default ${DEFAULT_OUTPUT_DIR}/), or to stdout with --stdout.`,
        "- Defaults come from OUTLINE_* env config (max pages, memory/time limits, heading length).",
        "- Exits with 1 when any file fails; unreadable PDFs still produce an empty outline."
    ].join("\n");
}

/** Expands directories into the PDFs they contain, sorted by name. */
export function collectPdfPaths(inputs: string[]): string[] {
    const files: string[] = [];
    for (const input of inputs) {
        const stat = fs.statSync(input);
        if (stat.isDirectory()) {
            const entries = fs.readdirSync(input)
                .filter(name => name.toLowerCase().endsWith(".pdf"))
                .sort();
            files.push(...entries.map(name => path.join(input, name)));
        } else {
            files.push(input);
        }
    }
    return files;
}

export async function runCli(argv: string[]): Promise<number> {
    const options = parseCliArgs(argv);
    if (options.help || options.inputs.length === 0) {
        console.log(usage());
        return options.help ? 0 : 1;
    }
    if (options.verbose) setLogLevel("debug");

    const config = mergePipelineConfig(resolvePipelineConfigFromEnv(), options.overrides);
    let files: string[];
    try {
        files = collectPdfPaths(options.inputs);
    } catch (error) {
        console.error(`[doc-outline] Cannot read input: ${describeError(error)}`);
        return 1;
    }
    if (!options.stdout) {
        fs.mkdirSync(options.outputDir, { recursive: true });
    }

    let failures = 0;
    for (const file of files) {
        try {
            const result = await extractOutlineFromFile(file, config);
            const json = serializeOutline(result);
            if (options.stdout) {
                process.stdout.write(json);
            } else {
                const target = path.join(options.outputDir, `${path.parse(file).name}.json`);
                fs.writeFileSync(target, json, "utf8");
            }
            const flags = [result.partial ? "partial" : "", ...result.warnings.map(warning => warning.reason)].filter(Boolean);
            console.error(
                `[doc-outline] ${path.basename(file)}: ${result.outline.length} heading(s), `
                + `${result.stats.pagesProcessed} page(s), ${result.stats.elapsedMs}ms`
                + (flags.length > 0 ? ` [${Array.from(new Set(flags)).join(", ")}]` : "")
            );
        } catch (error) {
            failures += 1;
            console.error(`[doc-outline] ${path.basename(file)}: failed: ${describeError(error)}`);
        }
    }
    return failures > 0 ? 1 : 0;
}

function parseNumberFlag(flag: string, value: string | undefined): number {
    const parsed = Number.parseInt(value ?? "", 10);
    if (!Number.isFinite(parsed) || parsed <= 0) {
        throw new Error(`${flag} expects a positive integer, got "${value ?? ""}"`);
    }
    return parsed;
}

if (require.main === module) {
    runCli(process.argv.slice(2))
        .then(code => {
            process.exitCode = code;
        })
        .catch((err) => {
            console.error("[doc-outline] Failed:", describeError(err));
            process.exitCode = 1;
        });
}

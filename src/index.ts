import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import * as path from "path";
import { z } from "zod";
import { mergePipelineConfig, resolvePipelineConfigFromEnv } from "./config/PipelineConfig.js";
import { extractOutlineFromFile } from "./documents/outline/OutlinePipeline.js";
import { OutlineError, describeError } from "./errors/OutlineError.js";
import type { PipelineConfig } from "./types.js";
import { createLogger, routeConsoleToLogger } from "./utils/StructuredLogger.js";

const logger = createLogger("OutlineServer");

const ExtractOutlineArgsSchema = z.object({
    path: z.string().min(1),
    maxPages: z.number().int().positive().optional(),
    timeLimitMs: z.number().int().positive().optional()
});

export type ToolResponse = {
    isError?: boolean;
    content: Array<{ type: "text"; text: string }>;
};

export class OutlineServer {
    private readonly server: Server;
    private readonly rootPath: string;

    constructor(rootPath: string, private readonly baseConfig: PipelineConfig = resolvePipelineConfigFromEnv()) {
        this.server = new Server({
            name: "doc-outline-mcp",
            version: "1.0.0",
        }, {
            capabilities: { tools: {} },
        });
        this.rootPath = path.resolve(rootPath);
        this.setupHandlers();
    }

    public listTools() {
        return [
            {
                name: "extract_outline",
                description: "Extract the title and H1-H3 heading outline of a PDF. Pages are zero-based.",
                inputSchema: {
                    type: "object" as const,
                    properties: {
                        path: { type: "string", description: "PDF path inside the server root, absolute or relative to it." },
                        maxPages: { type: "integer", minimum: 1 },
                        timeLimitMs: { type: "integer", minimum: 1 }
                    },
                    required: ["path"]
                }
            }
        ];
    }

    public async handleCallTool(name: string, args: unknown): Promise<ToolResponse> {
        if (name !== "extract_outline") {
            return this.errorResponse("UnknownTool", `Unknown tool: ${name}`);
        }
        const parsed = ExtractOutlineArgsSchema.safeParse(args ?? {});
        if (!parsed.success) {
            return this.errorResponse("InvalidArguments", parsed.error.issues.map(issue => `${issue.path.join(".")}: ${issue.message}`).join("; "));
        }

        const config = mergePipelineConfig(this.baseConfig, {
            maxPages: parsed.data.maxPages,
            timeLimitMs: parsed.data.timeLimitMs
        });
        const filePath = path.resolve(this.rootPath, parsed.data.path);
        if (!this.isInsideRoot(filePath)) {
            return this.errorResponse("PathOutsideRoot", `Path is outside the server root: ${parsed.data.path}`);
        }
        try {
            const result = await extractOutlineFromFile(filePath, config);
            return this.jsonResponse({
                title: result.title,
                outline: result.outline,
                warnings: result.warnings,
                partial: result.partial
            });
        } catch (error) {
            logger.error("extract_outline failed", { filePath, error: describeError(error) });
            const code = error instanceof OutlineError ? error.reason : "InternalError";
            return this.errorResponse(code, describeError(error));
        }
    }

    public async run(): Promise<void> {
        routeConsoleToLogger();
        const transport = new StdioServerTransport();
        await this.server.connect(transport);
        logger.info("Outline MCP server running on stdio", { root: this.rootPath });
    }

    private setupHandlers(): void {
        this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
            tools: this.listTools(),
        }));

        this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
            return this.handleCallTool(request.params.name, request.params.arguments);
        });
    }

    private isInsideRoot(filePath: string): boolean {
        const relative = path.relative(this.rootPath, filePath);
        return relative !== ".." && !relative.startsWith(`..${path.sep}`) && !path.isAbsolute(relative);
    }

    private jsonResponse(payload: unknown): ToolResponse {
        return { content: [{ type: "text", text: JSON.stringify(payload, null, 2) }] };
    }

    private errorResponse(errorCode: string, message: string): ToolResponse {
        return {
            isError: true,
            content: [{ type: "text", text: JSON.stringify({ errorCode, message }) }]
        };
    }
}

if (require.main === module) {
    const envRoot = process.env.OUTLINE_ROOT;
    const resolvedRoot = envRoot && envRoot.trim().length > 0 ? envRoot : process.cwd();
    new OutlineServer(resolvedRoot).run().catch(error => {
        logger.error("Server failed to start", { error: describeError(error) });
        process.exitCode = 1;
    });
}

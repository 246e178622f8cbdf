export type BudgetExhaustion = "time" | "memory";

export interface ResourceBudgetOptions {
    timeLimitMs: number;
    memoryLimitMb: number;
    now?: () => number;
    /** Resident set size in bytes. The limit applies to growth over the reading taken at construction. */
    memoryUsage?: () => number;
}

const BYTES_PER_MB = 1024 * 1024;

/**
 * Cooperative budget for one document. Callers check it between page iterations, after the first
 * page; nothing is interrupted preemptively. Memory is measured as growth since construction, so a
 * long-lived host that already holds memory is not charged for it.
 */
export class ResourceBudget {
    private readonly now: () => number;
    private readonly memoryUsage: () => number;
    private readonly startedAt: number;
    private readonly baselineBytes: number;

    constructor(private readonly options: ResourceBudgetOptions) {
        this.now = options.now ?? Date.now;
        this.memoryUsage = options.memoryUsage ?? (() => process.memoryUsage().rss);
        this.startedAt = this.now();
        this.baselineBytes = this.memoryUsage();
    }

    public elapsedMs(): number {
        return Math.max(0, this.now() - this.startedAt);
    }

    public check(): BudgetExhaustion | null {
        if (this.elapsedMs() > this.options.timeLimitMs) return "time";
        if (this.memoryUsage() - this.baselineBytes > this.options.memoryLimitMb * BYTES_PER_MB) return "memory";
        return null;
    }

    public describe(exhaustion: BudgetExhaustion): string {
        return exhaustion === "time"
            ? `time budget of ${this.options.timeLimitMs}ms exceeded after ${this.elapsedMs()}ms`
            : `memory growth over ${this.options.memoryLimitMb}MB`;
    }
}

import { describe, it, expect } from "@jest/globals";
import { ResourceBudget } from "../../utils/ResourceBudget.js";

const MB = 1024 * 1024;

function sequence(values: number[]): () => number {
    let call = 0;
    return () => values[Math.min(call++, values.length - 1)];
}

function budgetAt(clock: number[], rssMb: number[] = [10]) {
    return new ResourceBudget({
        timeLimitMs: 1000,
        memoryLimitMb: 100,
        now: sequence(clock),
        memoryUsage: sequence(rssMb.map(value => value * MB))
    });
}

describe("ResourceBudget", () => {
    it("measures elapsed time from construction", () => {
        expect(budgetAt([5000, 5250]).elapsedMs()).toBe(250);
    });

    it("stays within budget until the time limit is passed", () => {
        expect(budgetAt([0, 1000]).check()).toBeNull();
        expect(budgetAt([0, 1001]).check()).toBe("time");
    });

    it("charges only memory growth since construction", () => {
        expect(budgetAt([0, 10], [900, 1000]).check()).toBeNull();
        expect(budgetAt([0, 10], [900, 1001]).check()).toBe("memory");
    });

    it("does not charge a host that already held memory before the document started", () => {
        const budget = new ResourceBudget({ timeLimitMs: 60_000, memoryLimitMb: 64 });
        expect(process.memoryUsage().rss).toBeGreaterThan(64 * MB);
        expect(budget.check()).toBeNull();
    });

    it("describes what ran out", () => {
        const budget = budgetAt([0, 1500]);
        expect(budget.describe("time")).toBe("time budget of 1000ms exceeded after 1500ms");
        expect(budget.describe("memory")).toBe("memory growth over 100MB");
    });

    it("never reports negative elapsed time", () => {
        expect(budgetAt([100, 40]).elapsedMs()).toBe(0);
    });
});

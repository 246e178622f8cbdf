export function clamp(value: number, min = 0, max = 1): number {
    if (Number.isNaN(value)) return min;
    return Math.min(max, Math.max(min, value));
}

export function median(values: readonly number[]): number {
    if (values.length === 0) return 0;
    const sorted = [...values].sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
}

export interface WeightedValue {
    value: number;
    weight: number;
}

/**
 * Smallest value whose cumulative weight reaches `p` (0..1) of the total weight.
 * Returns 0 for an empty or weightless sample.
 */
export function weightedPercentile(samples: readonly WeightedValue[], p: number): number {
    const usable = samples.filter(sample => sample.weight > 0 && Number.isFinite(sample.value));
    if (usable.length === 0) return 0;
    const sorted = [...usable].sort((a, b) => a.value - b.value);
    const total = sorted.reduce((sum, sample) => sum + sample.weight, 0);
    const target = clamp(p) * total;
    let cumulative = 0;
    for (const sample of sorted) {
        cumulative += sample.weight;
        if (cumulative >= target) return sample.value;
    }
    return sorted[sorted.length - 1].value;
}

/** Value carrying the largest total weight; ties go to the larger value. */
export function weightedMode(samples: readonly WeightedValue[]): number {
    const totals = new Map<number, number>();
    for (const sample of samples) {
        if (sample.weight <= 0) continue;
        totals.set(sample.value, (totals.get(sample.value) ?? 0) + sample.weight);
    }
    let best = 0;
    let bestWeight = -1;
    for (const [value, weight] of totals) {
        if (weight > bestWeight || (weight === bestWeight && value > best)) {
            best = value;
            bestWeight = weight;
        }
    }
    return best;
}

export function roundTo(value: number, step: number): number {
    return Number((Math.round(value / step) * step).toFixed(6));
}

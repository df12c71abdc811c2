/**
 * Small numeric helpers shared by the policy and the episode runner.
 */

export function sum(values: Iterable<number>): number {
    let total = 0;
    for (const v of values) total += v;
    return total;
}

export function mean(values: readonly number[]): number {
    if (values.length === 0) return 0;
    return sum(values) / values.length;
}

/**
 * Population variance (divides by n). Returns 0 for an empty series.
 */
export function variance(values: readonly number[]): number {
    if (values.length === 0) return 0;
    const mu = mean(values);
    let acc = 0;
    for (const v of values) acc += (v - mu) ** 2;
    return acc / values.length;
}

export function standardDeviation(values: readonly number[]): number {
    return Math.sqrt(variance(values));
}

export function clamp(value: number, min: number, max: number): number {
    return Math.min(Math.max(value, min), max);
}

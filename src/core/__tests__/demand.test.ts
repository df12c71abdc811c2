import { describe, it, expect } from "vitest";
import { createDemandSchedule } from "../../core/demand.js";

describe("createDemandSchedule", () => {
    it("repeats a constant", () => {
        const demand = createDemandSchedule({ kind: "constant", value: 6 });
        expect([0, 1, 50].map(demand)).toEqual([6, 6, 6]);
    });

    it("steps up at the configured period", () => {
        const demand = createDemandSchedule({ kind: "step", before: 4, after: 8, at: 4 });
        expect([0, 3, 4, 10].map(demand)).toEqual([4, 4, 8, 8]);
    });

    it("holds the last value of a sequence", () => {
        const demand = createDemandSchedule({ kind: "sequence", values: [1, 2, 3] });
        expect([0, 1, 2, 3, 7].map(demand)).toEqual([1, 2, 3, 3, 3]);
    });

    it("draws reproducible, non-negative integers from a seed", () => {
        const pattern = { kind: "noisy", mean: 10, std_dev: 3, seed: 11 } as const;
        const first = createDemandSchedule(pattern);
        const second = createDemandSchedule(pattern);

        // Read out of order on one schedule, in order on the other.
        const late = first(9);
        const series = Array.from({ length: 10 }, (_, t) => second(t));
        expect(late).toBe(series[9]);
        expect(Array.from({ length: 10 }, (_, t) => first(t))).toEqual(series);
        for (const value of series) {
            expect(Number.isInteger(value)).toBe(true);
            expect(value).toBeGreaterThanOrEqual(0);
        }
    });

    it("collapses to the rounded mean without spread", () => {
        const demand = createDemandSchedule({ kind: "noisy", mean: 7.4, std_dev: 0, seed: 3 });
        expect([0, 1, 2].map(demand)).toEqual([7, 7, 7]);
    });
});

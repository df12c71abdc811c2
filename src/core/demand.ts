/**
 * Customer demand schedules for the reference environment.
 */
import type { DemandPattern } from "../schemas/config.js";
import { createRng } from "./rng.js";

/** Demand at a given period (0-based). */
export type DemandSchedule = (period: number) => number;

export function createDemandSchedule(pattern: DemandPattern): DemandSchedule {
    switch (pattern.kind) {
        case "constant":
            return () => pattern.value;
        case "step":
            return (period) => (period < pattern.at ? pattern.before : pattern.after);
        case "sequence": {
            const { values } = pattern;
            return (period) => values[Math.min(period, values.length - 1)];
        }
        case "noisy": {
            // Drawn lazily and cached so a period always maps to the same value.
            const rng = createRng(pattern.seed);
            const drawn: number[] = [];
            return (period) => {
                while (drawn.length <= period) {
                    drawn.push(Math.max(0, Math.round(rng.normal(pattern.mean, pattern.std_dev))));
                }
                return drawn[period];
            };
        }
    }
}

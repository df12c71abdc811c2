export { SupplyChainEnvironment } from "./environment.js";
export type {
    ActionSpace,
    ChainEnvironment,
    PeriodInfo,
    StepResult,
    SupplyChainEvents,
} from "./environment.js";
export { createDemandSchedule } from "./demand.js";
export type { DemandSchedule } from "./demand.js";
export { RingBuffer } from "./ring.js";
export { sum, mean, variance, standardDeviation, clamp } from "./statistics.js";

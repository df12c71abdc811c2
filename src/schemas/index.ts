/**
 * Schema barrel export — all Zod schemas and inferred types.
 */

// Observation
export {
    OBSERVATION_KEYS,
    Observation,
    toObservation,
    formatIssues,
} from "./observation.js";
export type { ObservationKey, ObservationVector, ObservationInput } from "./observation.js";

// Configuration
export {
    PolicyParameterFields,
    PolicyOverrides,
    PolicyParameters,
    DemandPattern,
    ChainConfig,
    DEFAULT_AGENTS,
} from "./config.js";
export type { PolicyParametersInput, ChainConfigInput } from "./config.js";

// Scenario
export { Scenario } from "./scenario.js";

/**
 * Echelon — Public API
 *
 * Heuristic base-stock ordering policy for agents in a linear supply chain,
 * plus a reference beer-game environment and an episode runner.
 */

// Core
export { SupplyChainEnvironment, createDemandSchedule, RingBuffer } from "./core/index.js";
export { sum, mean, variance, standardDeviation, clamp } from "./core/index.js";
export type { ActionSpace, ChainEnvironment, PeriodInfo, StepResult, SupplyChainEvents, DemandSchedule } from "./core/index.js";

// Agents
export {
    OrderingPolicy,
    HeuristicAgent,
    estimateLeadTime,
    upstreamAmplification,
    SERVICE_LEVEL_Z,
    DEMAND_HISTORY_CAPACITY,
    ORDER_HISTORY_CAPACITY,
} from "./agents/index.js";
export type {
    OrderingPolicyOptions,
    AgentConfig,
    AgentStateSnapshot,
    DecisionTrace,
    PolicyStatus,
    HeuristicAgentOptions,
} from "./agents/index.js";

// Schemas
export {
    OBSERVATION_KEYS,
    Observation,
    toObservation,
    formatIssues,
    PolicyParameters,
    PolicyOverrides,
    DemandPattern,
    ChainConfig,
    DEFAULT_AGENTS,
    Scenario,
} from "./schemas/index.js";
export type {
    ObservationKey,
    ObservationVector,
    ObservationInput,
    PolicyParametersInput,
    ChainConfigInput,
} from "./schemas/index.js";

// Errors
export {
    ObservationContractError,
    InvalidPolicyConfigError,
    UnknownAgentError,
    ActionOutOfBoundsError,
    EpisodeFinishedError,
} from "./errors/index.js";

// Orchestration
export { runEpisode, runScenario } from "./orchestrator.js";
export type {
    SupplyChainAgent,
    EpisodeOptions,
    EpisodeSummary,
    AgentEpisodeResult,
    ScenarioRunOptions,
} from "./orchestrator.js";

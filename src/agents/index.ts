/**
 * Agents barrel export.
 */
export {
    OrderingPolicy,
    estimateLeadTime,
    upstreamAmplification,
    SERVICE_LEVEL_Z,
    DEMAND_HISTORY_CAPACITY,
    ORDER_HISTORY_CAPACITY,
} from "./policy.js";
export type {
    OrderingPolicyOptions,
    AgentConfig,
    AgentStateSnapshot,
    DecisionTrace,
    PolicyStatus,
} from "./policy.js";

export { HeuristicAgent } from "./heuristic.js";
export type { HeuristicAgentOptions } from "./heuristic.js";

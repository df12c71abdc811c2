/**
 * Orchestrator — drives one episode of a supply-chain environment.
 *
 * Each period every live agent chooses an order from its own observation,
 * the environment advances, and costs and orders are accumulated. When the
 * episode ends every agent receives its final observation with the terminal
 * flags raised, so each policy settles into its terminated state.
 */
import { v4 as uuidv4 } from "uuid";
import { SupplyChainEnvironment } from "./core/environment.js";
import { HeuristicAgent } from "./agents/heuristic.js";
import type { ObservationInput, ObservationVector } from "./schemas/observation.js";
import type { DemandPattern, PolicyParametersInput } from "./schemas/config.js";
import type { Scenario } from "./schemas/scenario.js";
import { variance } from "./core/statistics.js";
import { UnknownAgentError } from "./errors/index.js";

/** Anything that can pick an order from an observation. */
export interface SupplyChainAgent {
    chooseAction(observation: ObservationInput, reward?: number, terminated?: boolean, truncated?: boolean): number;
}

export interface EpisodeOptions {
    env: SupplyChainEnvironment;
    /** One agent per environment seat, keyed by agent name. */
    agents: Record<string, SupplyChainAgent>;
    /** Callback for real-time period logging. */
    onPeriodComplete?: (period: number, orders: Record<string, number>, customerDemand: number) => void;
}

export interface AgentEpisodeResult {
    agentId: string;
    position: number;
    totalCost: number;
    orders: number[];
    /**
     * Variance of this agent's orders over variance of customer demand.
     * Null when customer demand never varied.
     */
    bullwhipRatio: number | null;
}

export interface EpisodeSummary {
    id: string;
    periods: number;
    customerDemand: number[];
    agents: AgentEpisodeResult[];
    totalCost: number;
}

/**
 * Run a complete episode: reset, loop step() until every agent is done.
 */
export function runEpisode(options: EpisodeOptions): EpisodeSummary {
    const { env, agents, onPeriodComplete } = options;

    for (const agentId of env.possibleAgents) {
        if (!agents[agentId]) throw new UnknownAgentError(agentId, "has no agent mounted");
    }

    const orders: Record<string, number[]> = {};
    const costs: Record<string, number> = {};
    for (const agentId of env.possibleAgents) {
        orders[agentId] = [];
        costs[agentId] = 0;
    }
    const customerDemand: number[] = [];

    let observations: Record<string, ObservationVector> = env.reset();
    let rewards: Record<string, number> = {};
    let terminations: Record<string, boolean> = {};
    let truncations: Record<string, boolean> = {};

    while (env.agents.length > 0) {
        const actions: Record<string, number> = {};
        for (const agentId of env.agents) {
            const quantity = agents[agentId].chooseAction(observations[agentId], rewards[agentId] ?? 0);
            actions[agentId] = quantity;
            orders[agentId].push(quantity);
        }

        const result = env.step(actions);
        for (const agentId of env.possibleAgents) {
            costs[agentId] -= result.rewards[agentId];
        }
        customerDemand.push(result.customerDemand);
        onPeriodComplete?.(customerDemand.length - 1, actions, result.customerDemand);

        ({ observations, rewards, terminations, truncations } = result);
    }

    // Final observation with the terminal flags; the returned order is always 0.
    for (const agentId of env.possibleAgents) {
        agents[agentId].chooseAction(
            observations[agentId],
            rewards[agentId] ?? 0,
            terminations[agentId] ?? false,
            truncations[agentId] ?? true,
        );
    }

    const demandVariance = variance(customerDemand);
    const results = env.possibleAgents.map((agentId, position) => ({
        agentId,
        position,
        totalCost: costs[agentId],
        orders: orders[agentId],
        bullwhipRatio: demandVariance > 0 ? variance(orders[agentId]) / demandVariance : null,
    }));

    return {
        id: uuidv4(),
        periods: customerDemand.length,
        customerDemand,
        agents: results,
        totalCost: results.reduce((total, r) => total + r.totalCost, 0),
    };
}

export interface ScenarioRunOptions {
    /** Policy parameters for every agent. Defaults to the scenario's own overrides. */
    policy?: PolicyParametersInput;
    /** Episodes to run. Defaults to `scenario.episodes`. */
    episodes?: number;
    onEpisodeComplete?: (episode: number, summary: EpisodeSummary) => void;
    onPeriodComplete?: (episode: number, period: number, orders: Record<string, number>, customerDemand: number) => void;
}

/** Seeded demand moves on by one seed per episode so episodes differ but stay reproducible. */
function demandForEpisode(pattern: DemandPattern, episode: number): DemandPattern {
    return pattern.kind === "noisy" ? { ...pattern, seed: pattern.seed + episode } : pattern;
}

/**
 * Run every episode of a scenario with one HeuristicAgent per seat.
 * Each episode gets a fresh environment and fresh agents.
 */
export function runScenario(scenario: Scenario, options: ScenarioRunOptions = {}): EpisodeSummary[] {
    const { policy = scenario.policy, episodes = scenario.episodes, onEpisodeComplete, onPeriodComplete } = options;
    const summaries: EpisodeSummary[] = [];

    for (let episode = 0; episode < episodes; episode++) {
        const env = new SupplyChainEnvironment({
            ...scenario.chain,
            demand: demandForEpisode(scenario.chain.demand, episode),
        });
        const agents: Record<string, HeuristicAgent> = {};
        for (const playerName of env.possibleAgents) {
            agents[playerName] = new HeuristicAgent(env, { playerName, parameters: policy });
        }

        const summary = runEpisode({
            env,
            agents,
            onPeriodComplete: onPeriodComplete
                ? (period, orders, demand) => onPeriodComplete(episode, period, orders, demand)
                : undefined,
        });
        summaries.push(summary);
        onEpisodeComplete?.(episode, summary);
    }

    return summaries;
}

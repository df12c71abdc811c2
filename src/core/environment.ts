/**
 * SupplyChainEnvironment — a beer-game style linear chain.
 *
 * Every period all live agents submit an order at once. The environment then
 * walks the chain from the retailer upstream: shipments at the front of each
 * inbound pipeline arrive, incoming demand plus backlog is served from stock,
 * shipped units enter the downstream agent's pipeline, and the factory's own
 * order enters its production pipeline. Costs are charged on the closing
 * stock and backlog, and the episode is truncated after `episode_length`
 * periods.
 */
import { EventEmitter } from "events";
import { ChainConfig } from "../schemas/config.js";
import type { ChainConfigInput } from "../schemas/config.js";
import type { ObservationVector } from "../schemas/observation.js";
import { createDemandSchedule } from "./demand.js";
import type { DemandSchedule } from "./demand.js";
import { sum } from "./statistics.js";
import {
    ActionOutOfBoundsError,
    EpisodeFinishedError,
    UnknownAgentError,
} from "../errors/index.js";

/** Continuous order range an agent may submit. */
export interface ActionSpace {
    readonly low: number;
    readonly high: number;
}

/** The view of an environment an agent needs to bind itself to a position. */
export interface ChainEnvironment {
    readonly possibleAgents: readonly string[];
    readonly agents: readonly string[];
    actionSpace(agentId: string): ActionSpace;
}

export interface PeriodInfo {
    period: number;
    /** Units that arrived from the inbound pipeline this period. */
    arrived: number;
    /** Units shipped downstream (or to the customer) this period. */
    shipped: number;
}

export interface StepResult {
    observations: Record<string, ObservationVector>;
    rewards: Record<string, number>;
    terminations: Record<string, boolean>;
    truncations: Record<string, boolean>;
    infos: Record<string, PeriodInfo>;
    /** End-customer demand served by the retailer this period. */
    customerDemand: number;
}

/** Supported events emitted by the SupplyChainEnvironment. */
export interface SupplyChainEvents {
    "episode:start": [{ observations: Record<string, ObservationVector> }];
    "period:complete": [{ period: number; customerDemand: number; actions: Record<string, number>; rewards: Record<string, number> }];
    "episode:complete": [{ periods: number; totalCosts: Record<string, number> }];
}

interface EchelonState {
    inventory: number;
    backorders: number;
    /** Inbound shipments, front arrives next. Length is always the shipping delay. */
    pipeline: number[];
    /** Demand received this period. */
    incomingOrder: number;
    totalCost: number;
}

export class SupplyChainEnvironment extends EventEmitter<SupplyChainEvents> implements ChainEnvironment {
    public readonly config: ChainConfig;
    public readonly possibleAgents: readonly string[];

    /** Agents still acting this episode. Emptied once the episode is truncated. */
    public agents: string[];

    private states: EchelonState[] = [];
    private demand: DemandSchedule;
    private period = 0;
    private finished = false;

    constructor(config: ChainConfigInput = {}) {
        super();
        this.config = ChainConfig.parse(config);
        this.possibleAgents = Object.freeze([...this.config.agents]);
        this.agents = [...this.possibleAgents];
        this.demand = createDemandSchedule(this.config.demand);
    }

    get currentPeriod(): number {
        return this.period;
    }

    actionSpace(agentId: string): ActionSpace {
        if (!this.possibleAgents.includes(agentId)) throw new UnknownAgentError(agentId);
        return { low: 0, high: this.config.order_ceiling };
    }

    /**
     * Start a new episode and return each agent's opening observation.
     */
    reset(): Record<string, ObservationVector> {
        const { initial_inventory, initial_pipeline, shipping_delay } = this.config;

        this.period = 0;
        this.finished = false;
        this.agents = [...this.possibleAgents];
        this.demand = createDemandSchedule(this.config.demand);
        this.states = this.possibleAgents.map((_, position) => ({
            inventory: initial_inventory,
            backorders: 0,
            pipeline: Array.from({ length: shipping_delay }, () => initial_pipeline),
            incomingOrder: position === 0 ? this.demand(0) : initial_pipeline,
            totalCost: 0,
        }));

        const observations = this.observeAll();
        this.emit("episode:start", { observations });
        return observations;
    }

    /**
     * Advance one period with every live agent's order.
     *
     * @throws EpisodeFinishedError when the episode was already truncated
     * @throws UnknownAgentError for a missing or unrecognised agent
     * @throws ActionOutOfBoundsError for a non-finite or out-of-range order
     */
    step(actions: Record<string, number>): StepResult {
        if (this.finished) throw new EpisodeFinishedError(this.period);
        if (this.states.length === 0) this.reset();
        this.validateActions(actions);

        const { holding_cost, backorder_cost, episode_length } = this.config;
        const customerDemand = this.demand(this.period);
        const infos: Record<string, PeriodInfo> = {};
        const rewards: Record<string, number> = {};
        const last = this.states.length - 1;

        this.states.forEach((state, position) => {
            const agentId = this.possibleAgents[position];
            const arrived = state.pipeline.shift() ?? 0;
            state.inventory += arrived;

            const incoming = position === 0 ? customerDemand : actions[this.possibleAgents[position - 1]];
            const owed = incoming + state.backorders;
            const shipped = Math.min(state.inventory, owed);
            state.inventory -= shipped;
            state.backorders = owed - shipped;
            state.incomingOrder = incoming;

            // Downstream pipelines were already advanced this period, so the shipment lands at the back.
            if (position > 0) this.states[position - 1].pipeline.push(shipped);
            if (position === last) state.pipeline.push(actions[agentId]);

            const cost = state.inventory * holding_cost + state.backorders * backorder_cost;
            state.totalCost += cost;
            rewards[agentId] = -cost;
            infos[agentId] = { period: this.period, arrived, shipped };
        });

        this.emit("period:complete", { period: this.period, customerDemand, actions: { ...actions }, rewards });

        this.period++;
        const truncated = this.period >= episode_length;
        const observations = this.observeAll();
        const terminations: Record<string, boolean> = {};
        const truncations: Record<string, boolean> = {};
        for (const agentId of this.possibleAgents) {
            terminations[agentId] = false;
            truncations[agentId] = truncated;
        }

        if (truncated) {
            this.finished = true;
            this.agents = [];
            const totalCosts: Record<string, number> = {};
            this.states.forEach((state, position) => {
                totalCosts[this.possibleAgents[position]] = state.totalCost;
            });
            this.emit("episode:complete", { periods: this.period, totalCosts });
        }

        return { observations, rewards, terminations, truncations, infos, customerDemand };
    }

    private validateActions(actions: Record<string, number>): void {
        for (const agentId of Object.keys(actions)) {
            if (!this.possibleAgents.includes(agentId)) throw new UnknownAgentError(agentId);
        }
        const high = this.config.order_ceiling;
        for (const agentId of this.agents) {
            const quantity = actions[agentId];
            if (quantity === undefined) throw new UnknownAgentError(agentId, "did not submit an order");
            if (!Number.isFinite(quantity) || quantity < 0 || quantity > high) {
                throw new ActionOutOfBoundsError(agentId, quantity, high);
            }
        }
    }

    private observeAll(): Record<string, ObservationVector> {
        const { holding_cost, backorder_cost } = this.config;
        const observations: Record<string, ObservationVector> = {};
        this.states.forEach((state, position) => {
            observations[this.possibleAgents[position]] = [
                state.inventory,
                state.backorders,
                state.incomingOrder,
                sum(state.pipeline),
                state.inventory * holding_cost,
                state.backorders * backorder_cost,
            ];
        });
        return observations;
    }
}

/**
 * OrderingPolicy — per-agent heuristic base-stock ordering rule.
 *
 * Each period the policy reads one observation, updates its demand estimate,
 * sizes safety and pipeline stock from the agent's lead time, and orders the
 * gap between that target and the current inventory position. Orders are
 * blended with the previous one to damp bullwhip oscillation, scaled up for
 * upstream echelons, and clamped to the action-space ceiling.
 */
import { z } from "zod/v4";
import { RingBuffer } from "../core/ring.js";
import { clamp, standardDeviation, sum } from "../core/statistics.js";
import { PolicyParameters } from "../schemas/config.js";
import type { PolicyParametersInput } from "../schemas/config.js";
import { formatIssues, toObservation } from "../schemas/observation.js";
import type { Observation, ObservationInput } from "../schemas/observation.js";
import { InvalidPolicyConfigError } from "../errors/index.js";

/** One-sided 95% service level multiplier. */
export const SERVICE_LEVEL_Z = 1.96;
export const DEMAND_HISTORY_CAPACITY = 8;
export const ORDER_HISTORY_CAPACITY = 4;
/** Variability proxy, as a share of smoothed demand, while history holds a single sample. */
export const FALLBACK_VARIABILITY_RATIO = 0.2;
/** Blend weights of the freshly computed quantity and the previous order. */
export const ORDER_BLEND_WEIGHT = 0.7;
export const PREVIOUS_ORDER_WEIGHT = 0.3;
/** Extra order share per step upstream of the retailer. */
export const UPSTREAM_AMPLIFICATION_STEP = 0.1;

export interface OrderingPolicyOptions {
    /** Index in the chain. 0 is the echelon facing the end customer. */
    position: number;
    /** Upper bound on any single order, taken from the action space. */
    orderCeiling: number;
    /** Overrides for the tunable constants. */
    parameters?: PolicyParametersInput;
}

/** Immutable per-agent configuration derived at construction. */
export interface AgentConfig {
    readonly position: number;
    readonly safetyStockFactor: number;
    readonly targetInventoryDays: number;
    readonly smoothingFactor: number;
    readonly leadTime: number;
    readonly orderCeiling: number;
}

export type PolicyStatus = "active" | "terminated";

/** Copy of the mutable episode state. */
export interface AgentStateSnapshot {
    demandHistory: number[];
    lastOrders: number[];
    smoothedDemand: number | null;
    status: PolicyStatus;
}

/** Every intermediate value behind one order decision. */
export interface DecisionTrace {
    demand: number;
    smoothedDemand: number;
    demandStd: number;
    safetyStock: number;
    pipelineStock: number;
    targetStock: number;
    inventoryPosition: number;
    /** Base-stock quantity before blending, amplification and clamping. */
    baseQuantity: number;
    quantity: number;
}

const PolicyBounds = z.object({
    position: z.number().int().nonnegative(),
    orderCeiling: z.number().nonnegative(),
});

export function estimateLeadTime(position: number, baseLeadTime: number, positionFactor: number): number {
    return baseLeadTime + position * positionFactor;
}

export function upstreamAmplification(position: number): number {
    return position > 0 ? 1 + UPSTREAM_AMPLIFICATION_STEP * position : 1;
}

export class OrderingPolicy {
    public readonly config: AgentConfig;

    private readonly demandHistory = new RingBuffer<number>(DEMAND_HISTORY_CAPACITY);
    private readonly lastOrders = new RingBuffer<number>(ORDER_HISTORY_CAPACITY);
    private smoothedDemand: number | null = null;
    private status: PolicyStatus = "active";
    private trace: DecisionTrace | null = null;

    constructor(opts: OrderingPolicyOptions) {
        const bounds = PolicyBounds.safeParse({ position: opts.position, orderCeiling: opts.orderCeiling });
        const params = PolicyParameters.safeParse(opts.parameters ?? {});
        const issues = [
            ...(bounds.success ? [] : formatIssues(bounds.error)),
            ...(params.success ? [] : formatIssues(params.error).map((issue) => `parameters.${issue}`)),
        ];
        if (!bounds.success || !params.success) {
            throw new InvalidPolicyConfigError(issues);
        }

        const p = params.data;
        this.config = Object.freeze({
            position: bounds.data.position,
            safetyStockFactor: p.safety_stock_factor,
            targetInventoryDays: p.target_inventory_days,
            smoothingFactor: p.smoothing_factor,
            leadTime: estimateLeadTime(bounds.data.position, p.base_lead_time, p.position_factor),
            orderCeiling: bounds.data.orderCeiling,
        });
    }

    /** Values behind the most recent non-terminal decision, if any. */
    get lastTrace(): DecisionTrace | null {
        return this.trace;
    }

    get isTerminated(): boolean {
        return this.status === "terminated";
    }

    snapshot(): AgentStateSnapshot {
        return {
            demandHistory: this.demandHistory.toArray(),
            lastOrders: this.lastOrders.toArray(),
            smoothedDemand: this.smoothedDemand,
            status: this.status,
        };
    }

    /**
     * Decide this period's order quantity.
     *
     * Once either flag is raised the policy stays terminated: every later call
     * returns 0 and leaves the history untouched.
     *
     * @throws ObservationContractError on a malformed observation (state is left unchanged)
     */
    decide(observation: ObservationInput, terminated = false, truncated = false): number {
        if (this.status === "terminated" || terminated || truncated) {
            this.status = "terminated";
            return 0;
        }

        const obs = toObservation(observation);
        const trace = this.computeOrder(obs);
        this.lastOrders.push(trace.quantity);
        this.trace = trace;
        return trace.quantity;
    }

    private estimateDemand(demand: number): number {
        this.demandHistory.push(demand);
        const alpha = this.config.smoothingFactor;
        this.smoothedDemand =
            this.smoothedDemand === null ? demand : alpha * demand + (1 - alpha) * this.smoothedDemand;
        return this.smoothedDemand;
    }

    private computeOrder(obs: Observation): DecisionTrace {
        const { leadTime, position, orderCeiling } = this.config;

        const expectedDemand = this.estimateDemand(obs.orders);
        const demandStd =
            this.demandHistory.size > 1
                ? standardDeviation(this.demandHistory.toArray())
                : expectedDemand * FALLBACK_VARIABILITY_RATIO;

        const safetyStock = SERVICE_LEVEL_Z * demandStd * Math.sqrt(leadTime);
        const pipelineStock = expectedDemand * leadTime;
        const targetStock = safetyStock + pipelineStock;

        // Counts every tracked past order, including ones that may already have arrived.
        const inventoryPosition = obs.inventory - obs.backorders + obs.incomingShipments + sum(this.lastOrders);

        const baseQuantity = Math.max(0, expectedDemand + (targetStock - inventoryPosition));

        let quantity = baseQuantity;
        const previous = this.lastOrders.last();
        if (previous !== undefined) {
            quantity = ORDER_BLEND_WEIGHT * quantity + PREVIOUS_ORDER_WEIGHT * previous;
        }
        quantity *= upstreamAmplification(position);

        return {
            demand: obs.orders,
            smoothedDemand: expectedDemand,
            demandStd,
            safetyStock,
            pipelineStock,
            targetStock,
            inventoryPosition,
            baseQuantity,
            quantity: clamp(quantity, 0, orderCeiling),
        };
    }
}

/**
 * OrderingPolicy Tests — decision arithmetic, bounded history and the
 * terminal no-op, using hand-built observations.
 */
import { describe, it, expect } from "vitest";
import {
    OrderingPolicy,
    estimateLeadTime,
    upstreamAmplification,
} from "../../agents/policy.js";
import type { ObservationVector } from "../../schemas/observation.js";
import { InvalidPolicyConfigError, ObservationContractError } from "../../errors/index.js";

// --- Helpers ---

/** inventory=10, backorders=0, orders=demand, incomingShipments=0, holdingCost=1, backorderCost=2 */
function obs(demand = 5): ObservationVector {
    return [10, 0, demand, 0, 1, 2];
}

/** Deep backlog so the base-stock quantity stays positive. */
function backlogged(demand: number): ObservationVector {
    return [0, 100, demand, 0, 0, 100];
}

// --- Tests ---

describe("position-derived configuration", () => {
    it("derives lead time from base delay plus a per-position factor", () => {
        expect(estimateLeadTime(0, 2, 1.5)).toBe(2);
        expect(estimateLeadTime(3, 2, 1.5)).toBe(6.5);
        expect(new OrderingPolicy({ position: 2, orderCeiling: 100 }).config.leadTime).toBe(5);
    });

    it("amplifies orders only upstream of the retailer", () => {
        expect(upstreamAmplification(0)).toBe(1);
        expect(upstreamAmplification(3)).toBeCloseTo(1.3, 12);
    });

    it("applies parameter overrides", () => {
        const policy = new OrderingPolicy({
            position: 1,
            orderCeiling: 50,
            parameters: { smoothing_factor: 0.5, base_lead_time: 1, position_factor: 1 },
        });
        expect(policy.config).toEqual({
            position: 1,
            safetyStockFactor: 1.5,
            targetInventoryDays: 14,
            smoothingFactor: 0.5,
            leadTime: 2,
            orderCeiling: 50,
        });
    });

    it("rejects a negative ceiling", () => {
        expect(() => new OrderingPolicy({ position: 0, orderCeiling: -1 })).toThrow(InvalidPolicyConfigError);
    });

    it("rejects a fractional position and an out-of-range smoothing factor together", () => {
        try {
            new OrderingPolicy({ position: 1.5, orderCeiling: 10, parameters: { smoothing_factor: 0 } });
            expect.unreachable();
        } catch (err) {
            if (!(err instanceof InvalidPolicyConfigError)) throw err;
            const issues = err.issues;
            expect(issues).toHaveLength(2);
            expect(issues[0].startsWith("position:")).toBe(true);
            expect(issues[1].startsWith("parameters.smoothing_factor:")).toBe(true);
        }
    });
});

describe("OrderingPolicy.decide()", () => {
    it("orders a positive quantity on the first retailer call and records it", () => {
        const policy = new OrderingPolicy({ position: 0, orderCeiling: 100 });

        const quantity = policy.decide(obs());

        // smoothed 5, std fallback 1, safety 1.96 * sqrt(2), pipeline 10, position 10
        expect(quantity).toBeCloseTo(5 + 1.96 * Math.SQRT2, 10);
        expect(quantity).toBeGreaterThan(0);
        expect(quantity).toBeLessThanOrEqual(100);
        expect(policy.snapshot().lastOrders).toEqual([quantity]);
    });

    it("takes the first demand sample as the smoothed estimate", () => {
        const policy = new OrderingPolicy({ position: 0, orderCeiling: 100 });
        policy.decide(obs(7));
        expect(policy.snapshot().smoothedDemand).toBe(7);
    });

    it("smooths later samples exponentially", () => {
        const policy = new OrderingPolicy({ position: 0, orderCeiling: 100 });
        policy.decide(obs(10));
        policy.decide(obs(20));
        expect(policy.snapshot().smoothedDemand).toBeCloseTo(13, 12);
    });

    it("blends the second order with the first", () => {
        const policy = new OrderingPolicy({ position: 0, orderCeiling: 100 });
        const first = policy.decide(obs());
        const second = policy.decide(obs());

        // Position 10 + first order exceeds the target, so the base quantity is 0.
        expect(policy.lastTrace?.baseQuantity).toBe(0);
        expect(policy.lastTrace?.inventoryPosition).toBeCloseTo(10 + first, 12);
        expect(second).toBeCloseTo(0.3 * first, 12);
    });

    it("accepts the keyed observation form", () => {
        const vector = new OrderingPolicy({ position: 0, orderCeiling: 100 });
        const keyed = new OrderingPolicy({ position: 0, orderCeiling: 100 });
        const fromVector = vector.decide(obs());
        const fromKeyed = keyed.decide({
            inventory: 10,
            backorders: 0,
            orders: 5,
            incomingShipments: 0,
            holdingCost: 1,
            backorderCost: 2,
        });
        expect(fromKeyed).toBe(fromVector);
    });

    it("orders more at the factory than at the retailer for the same stream", () => {
        const retailer = new OrderingPolicy({ position: 0, orderCeiling: 100 });
        const factory = new OrderingPolicy({ position: 3, orderCeiling: 100 });

        const retailerOrders = Array.from({ length: 5 }, () => retailer.decide(obs()));
        const factoryOrders = Array.from({ length: 5 }, () => factory.decide(obs()));

        expect(factoryOrders[0]).toBeCloseTo(42.246150860317215, 9);
        expect(factoryOrders[4]).toBeCloseTo(0.977339774924431, 9);
        expect(retailerOrders[4]).toBeCloseTo(0.06295205451623526, 9);
        factoryOrders.forEach((quantity, i) => {
            expect(quantity).toBeGreaterThan(retailerOrders[i]);
        });
    });

    it("holds more safety stock, and orders more, when demand alternates", () => {
        const alternating = new OrderingPolicy({ position: 0, orderCeiling: 1000 });
        const steady = new OrderingPolicy({ position: 0, orderCeiling: 1000 });

        alternating.decide(backlogged(0));
        steady.decide(backlogged(10));
        const volatileOrder = alternating.decide(backlogged(20));
        const steadyOrder = steady.decide(backlogged(10));

        expect(alternating.lastTrace?.demandStd).toBe(10);
        expect(steady.lastTrace?.demandStd).toBe(0);
        expect(alternating.lastTrace?.safetyStock).toBeCloseTo(1.96 * 10 * Math.SQRT2, 10);
        expect(steady.lastTrace?.safetyStock).toBe(0);
        expect(volatileOrder).toBeCloseTo(62.003010075758866, 9);
        expect(steadyOrder).toBeCloseTo(40.66311514935076, 9);
        expect(volatileOrder).toBeGreaterThan(steadyOrder);
    });

    it("clamps to the order ceiling", () => {
        const policy = new OrderingPolicy({ position: 3, orderCeiling: 20 });
        expect(policy.decide(obs())).toBe(20);
        expect(policy.snapshot().lastOrders).toEqual([20]);
    });

    it("never returns less for a larger ceiling", () => {
        const ceilings = [0, 1, 5, 7, 10, 50, 100];
        const quantities = ceilings.map((orderCeiling) =>
            new OrderingPolicy({ position: 0, orderCeiling }).decide(obs()),
        );
        for (let i = 1; i < quantities.length; i++) {
            expect(quantities[i]).toBeGreaterThanOrEqual(quantities[i - 1]);
        }
        expect(quantities[0]).toBe(0);
        expect(quantities[2]).toBe(5);
    });

    it("stays within [0, ceiling] across a long erratic run", () => {
        const policy = new OrderingPolicy({ position: 2, orderCeiling: 40 });
        for (let t = 0; t < 200; t++) {
            const demand = (t * 37) % 23;
            const quantity = policy.decide([(t * 11) % 30 - 10, t % 5, demand, (t * 7) % 13, 1, 2]);
            expect(quantity).toBeGreaterThanOrEqual(0);
            expect(quantity).toBeLessThanOrEqual(40);
        }
    });

    it("keeps only the last 8 demands and last 4 orders", () => {
        const policy = new OrderingPolicy({ position: 0, orderCeiling: 100 });
        const orders: number[] = [];
        for (let demand = 1; demand <= 20; demand++) {
            orders.push(policy.decide(obs(demand)));
            const snapshot = policy.snapshot();
            expect(snapshot.demandHistory.length).toBeLessThanOrEqual(8);
            expect(snapshot.lastOrders.length).toBeLessThanOrEqual(4);
        }
        const snapshot = policy.snapshot();
        expect(snapshot.demandHistory).toEqual([13, 14, 15, 16, 17, 18, 19, 20]);
        expect(snapshot.lastOrders).toEqual(orders.slice(-4));
    });
});

describe("terminal handling", () => {
    it("returns 0 and leaves a fresh policy untouched", () => {
        const policy = new OrderingPolicy({ position: 0, orderCeiling: 100 });

        expect(policy.decide(obs(), true)).toBe(0);

        expect(policy.snapshot()).toEqual({
            demandHistory: [],
            lastOrders: [],
            smoothedDemand: null,
            status: "terminated",
        });
        expect(policy.lastTrace).toBeNull();
    });

    it("treats truncation like termination", () => {
        const policy = new OrderingPolicy({ position: 1, orderCeiling: 100 });
        policy.decide(obs());
        const before = policy.snapshot();

        expect(policy.decide(obs(9), false, true)).toBe(0);

        expect(policy.snapshot()).toEqual({ ...before, status: "terminated" });
    });

    it("keeps returning 0 after termination", () => {
        const policy = new OrderingPolicy({ position: 0, orderCeiling: 100 });
        policy.decide(obs());
        policy.decide(obs(), true);
        const after = policy.snapshot();

        expect(policy.decide(obs(12))).toBe(0);
        expect(policy.decide(obs(12), true)).toBe(0);
        expect(policy.snapshot()).toEqual(after);
        expect(policy.isTerminated).toBe(true);
    });

    it("does not validate the observation once terminal", () => {
        const policy = new OrderingPolicy({ position: 0, orderCeiling: 100 });
        expect(policy.decide([1, 2, 3], true)).toBe(0);
    });
});

describe("observation contract", () => {
    it("rejects a vector of the wrong length without touching state", () => {
        const policy = new OrderingPolicy({ position: 0, orderCeiling: 100 });
        expect(() => policy.decide([10, 0, 5, 0, 1])).toThrow(ObservationContractError);
        expect(policy.snapshot().demandHistory).toEqual([]);
        expect(policy.snapshot().smoothedDemand).toBeNull();
    });

    it("names the offending field", () => {
        const policy = new OrderingPolicy({ position: 0, orderCeiling: 100 });
        try {
            policy.decide([10, 0, Number.NaN, 0, 1, 2]);
            expect.unreachable();
        } catch (err) {
            if (!(err instanceof ObservationContractError)) throw err;
            const issues = err.issues;
            expect(issues).toHaveLength(1);
            expect(issues[0].startsWith("orders:")).toBe(true);
        }
    });
});

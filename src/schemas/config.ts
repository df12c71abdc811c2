/**
 * Configuration — tunable policy constants and the reference chain settings.
 */
import { z } from "zod/v4";

/** Bounds of each tunable policy constant, without defaults. */
export const PolicyParameterFields = z.object({
    /** Carried on the agent config; the safety-stock rule uses a fixed z of 1.96. */
    safety_stock_factor: z.number().positive(),
    /** Carried on the agent config; not consulted by the order rule. */
    target_inventory_days: z.number().positive(),
    /** Exponential smoothing weight applied to the newest demand sample. */
    smoothing_factor: z.number().gt(0).max(1),
    /** Processing delay every echelon pays, in periods. */
    base_lead_time: z.number().nonnegative(),
    /** Additional delay per step away from the end customer. */
    position_factor: z.number().nonnegative(),
});

/** Overrides only: fields left out stay absent. */
export const PolicyOverrides = PolicyParameterFields.partial();
export type PolicyOverrides = z.infer<typeof PolicyOverrides>;

/**
 * Fixed-parameter constants of the heuristic ordering policy.
 * Lead time is derived from these once per agent: base_lead_time + position * position_factor.
 */
const fields = PolicyParameterFields.shape;
export const PolicyParameters = z.object({
    safety_stock_factor: fields.safety_stock_factor.default(1.5),
    target_inventory_days: fields.target_inventory_days.default(14),
    smoothing_factor: fields.smoothing_factor.default(0.3),
    base_lead_time: fields.base_lead_time.default(2),
    position_factor: fields.position_factor.default(1.5),
});
export type PolicyParameters = z.infer<typeof PolicyParameters>;
export type PolicyParametersInput = z.input<typeof PolicyParameters>;

/** Customer demand stream fed to the retailer. */
export const DemandPattern = z.discriminatedUnion("kind", [
    z.object({
        kind: z.literal("constant"),
        value: z.number().nonnegative(),
    }),
    /** Classic beer-game shock: `before` units per period, then `after` from period `at` on. */
    z.object({
        kind: z.literal("step"),
        before: z.number().nonnegative().default(4),
        after: z.number().nonnegative().default(8),
        at: z.number().int().nonnegative().default(4),
    }),
    /** Explicit series; the last value repeats once it runs out. */
    z.object({
        kind: z.literal("sequence"),
        values: z.array(z.number().nonnegative()).min(1),
    }),
    /** Rounded normal draws floored at zero, reproducible from the seed. */
    z.object({
        kind: z.literal("noisy"),
        mean: z.number().nonnegative(),
        std_dev: z.number().nonnegative(),
        seed: z.number().int().default(42),
    }),
]);
export type DemandPattern = z.infer<typeof DemandPattern>;

export const DEFAULT_AGENTS: readonly string[] = ["retailer", "wholesaler", "distributor", "factory"];

/**
 * Settings of the reference supply-chain environment.
 */
export const ChainConfig = z.object({
    /** Agent names from the end customer upstream. Index = position. */
    agents: z
        .array(z.string().min(1))
        .min(1)
        .refine((names) => new Set(names).size === names.length, {
            message: "Agent names must be unique",
        })
        .default(() => [...DEFAULT_AGENTS]),
    /** Periods before the episode is truncated. */
    episode_length: z.number().int().positive().default(36),
    initial_inventory: z.number().nonnegative().default(12),
    /** Units already in each shipping slot when the episode starts. */
    initial_pipeline: z.number().nonnegative().default(4),
    /** Periods a shipment (or the factory's production run) spends in transit. */
    shipping_delay: z.number().int().positive().default(2),
    /** Cost per unit of on-hand stock per period. */
    holding_cost: z.number().nonnegative().default(0.5),
    /** Cost per unit of backlog per period. */
    backorder_cost: z.number().nonnegative().default(1),
    /** Upper bound of every agent's action space. */
    order_ceiling: z.number().positive().default(100),
    demand: DemandPattern.prefault({ kind: "step" }),
});
export type ChainConfig = z.infer<typeof ChainConfig>;
export type ChainConfigInput = z.input<typeof ChainConfig>;

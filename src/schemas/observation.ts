/**
 * Observation Schemas — the per-period signal an agent receives from the
 * supply-chain environment, in keyed or positional form.
 */
import { z } from "zod/v4";
import { ObservationContractError } from "../errors/index.js";

/** Positional order of the six observation fields in the flat vector form. */
export const OBSERVATION_KEYS = [
    "inventory",
    "backorders",
    "orders",
    "incomingShipments",
    "holdingCost",
    "backorderCost",
] as const;
export type ObservationKey = (typeof OBSERVATION_KEYS)[number];

/**
 * Keyed observation. Inventory and backorders may be read as a net position,
 * so only the flows and cost signals are held non-negative.
 */
export const Observation = z.object({
    /** On-hand stock at the end of the period. */
    inventory: z.number(),
    /** Unfilled demand carried into the next period. */
    backorders: z.number(),
    /** Demand received from downstream this period. */
    orders: z.number().nonnegative(),
    /** Units already shipped to this agent but still in transit. */
    incomingShipments: z.number().nonnegative(),
    holdingCost: z.number().nonnegative(),
    backorderCost: z.number().nonnegative(),
});
export type Observation = z.infer<typeof Observation>;

export type ObservationVector = readonly [number, number, number, number, number, number];

/** Anything `toObservation` accepts. */
export type ObservationInput = Observation | ObservationVector | readonly number[];

export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const path = issue.path.map((segment) => String(segment)).join(".");
        return path ? `${path}: ${issue.message}` : issue.message;
    });
}

/**
 * Normalize a raw observation into the keyed form.
 * Arrays are mapped positionally onto OBSERVATION_KEYS.
 *
 * @throws ObservationContractError when a field is missing, non-finite, or negative where it must not be
 */
export function toObservation(input: unknown): Observation {
    let candidate: unknown = input;
    if (Array.isArray(input)) {
        if (input.length !== OBSERVATION_KEYS.length) {
            throw new ObservationContractError([
                `expected ${OBSERVATION_KEYS.length} values, received ${input.length}`,
            ]);
        }
        const keyed: Record<string, unknown> = {};
        for (let i = 0; i < OBSERVATION_KEYS.length; i++) {
            keyed[OBSERVATION_KEYS[i]] = input[i];
        }
        candidate = keyed;
    }

    const result = Observation.safeParse(candidate);
    if (!result.success) {
        throw new ObservationContractError(formatIssues(result.error));
    }
    return result.data;
}

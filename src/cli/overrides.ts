import { z } from "zod/v4";
import type { PolicyParametersInput } from "../schemas/config.js";

const EnvOverrides = z.object({
    ECHELON_SMOOTHING_FACTOR: z.coerce.number().optional(),
    ECHELON_BASE_LEAD_TIME: z.coerce.number().optional(),
    ECHELON_POSITION_FACTOR: z.coerce.number().optional(),
});

/**
 * Read policy parameter overrides from the process environment.
 * Unset or blank variables are ignored.
 */
export function policyOverridesFromEnv(env: NodeJS.ProcessEnv): PolicyParametersInput {
    const present = Object.fromEntries(
        Object.entries(env).filter(([key, value]) => key.startsWith("ECHELON_") && value !== undefined && value.trim() !== ""),
    );
    const parsed = EnvOverrides.parse(present);

    const overrides: PolicyParametersInput = {};
    if (parsed.ECHELON_SMOOTHING_FACTOR !== undefined) overrides.smoothing_factor = parsed.ECHELON_SMOOTHING_FACTOR;
    if (parsed.ECHELON_BASE_LEAD_TIME !== undefined) overrides.base_lead_time = parsed.ECHELON_BASE_LEAD_TIME;
    if (parsed.ECHELON_POSITION_FACTOR !== undefined) overrides.position_factor = parsed.ECHELON_POSITION_FACTOR;
    return overrides;
}

/**
 * Scenario — the JSON file the CLI loads to run a simulation.
 */
import { z } from "zod/v4";
import { ChainConfig, PolicyOverrides } from "./config.js";

export const Scenario = z.object({
    name: z.string().min(1),
    description: z.string().optional(),
    chain: ChainConfig.prefault({}),
    /** Overrides applied to every agent's policy. */
    policy: PolicyOverrides.default({}),
    /** Independent episodes to run back to back. */
    episodes: z.number().int().positive().default(1),
});
export type Scenario = z.infer<typeof Scenario>;

/**
 * HeuristicAgent — binds an OrderingPolicy to a seat in a supply-chain environment.
 *
 * The agent's position is its index in the environment's agent list and its
 * order ceiling is the upper bound of its action space, both read once here.
 */
import type { ChainEnvironment } from "../core/environment.js";
import type { PolicyParametersInput } from "../schemas/config.js";
import type { ObservationInput } from "../schemas/observation.js";
import { UnknownAgentError } from "../errors/index.js";
import { OrderingPolicy } from "./policy.js";

export interface HeuristicAgentOptions {
    /** Seat to occupy. Defaults to the first live agent of the environment. */
    playerName?: string;
    parameters?: PolicyParametersInput;
}

export class HeuristicAgent {
    public readonly playerName: string;
    public readonly position: number;
    public readonly policy: OrderingPolicy;

    constructor(env: ChainEnvironment, opts: HeuristicAgentOptions = {}) {
        const playerName = opts.playerName ?? env.agents[0];
        if (playerName === undefined) {
            throw new UnknownAgentError("<unnamed>", "cannot be inferred: the environment has no live agents");
        }

        const position = env.possibleAgents.indexOf(playerName);
        if (position === -1) throw new UnknownAgentError(playerName);

        this.playerName = playerName;
        this.position = position;
        this.policy = new OrderingPolicy({
            position,
            orderCeiling: env.actionSpace(playerName).high,
            parameters: opts.parameters,
        });
    }

    /**
     * Choose this period's order. Reward, info and action mask are accepted so
     * the agent plugs into a standard step loop; the policy does not use them.
     */
    chooseAction(
        observation: ObservationInput,
        _reward = 0,
        terminated = false,
        truncated = false,
        _info?: Record<string, unknown>,
        _actionMask?: readonly number[],
    ): number {
        return this.policy.decide(observation, terminated, truncated);
    }
}

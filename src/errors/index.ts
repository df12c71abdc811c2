/**
 * Custom Error Classes — boundary failures raised by the policy, the agent
 * wrapper and the reference environment. Each carries the offending context
 * as readonly fields so callers can branch without parsing messages.
 */

/**
 * Thrown when an observation is missing fields, has the wrong arity, or
 * carries non-numeric / negative values where the contract forbids them.
 */
export class ObservationContractError extends Error {
    public readonly issues: string[];

    constructor(issues: string[]) {
        super(`Malformed observation: ${issues.join("; ")}`);
        this.name = "ObservationContractError";
        this.issues = issues;
    }
}

/**
 * Thrown at construction when a policy is given a negative ceiling, a
 * fractional position, or tunables outside their ranges.
 */
export class InvalidPolicyConfigError extends Error {
    public readonly issues: string[];

    constructor(issues: string[]) {
        super(`Invalid policy configuration: ${issues.join("; ")}`);
        this.name = "InvalidPolicyConfigError";
        this.issues = issues;
    }
}

/**
 * Thrown when an agent name is not part of the environment's chain, or a
 * live agent did not submit an action for the period.
 */
export class UnknownAgentError extends Error {
    public readonly agentId: string;

    constructor(agentId: string, detail = "is not part of this supply chain") {
        super(`Agent "${agentId}" ${detail}.`);
        this.name = "UnknownAgentError";
        this.agentId = agentId;
    }
}

/** Thrown when an order falls outside the environment's action space. */
export class ActionOutOfBoundsError extends Error {
    public readonly agentId: string;
    public readonly quantity: number;
    public readonly high: number;

    constructor(agentId: string, quantity: number, high: number) {
        super(`Order of ${quantity} from "${agentId}" is outside the action space [0, ${high}].`);
        this.name = "ActionOutOfBoundsError";
        this.agentId = agentId;
        this.quantity = quantity;
        this.high = high;
    }
}

/** Thrown when step() is called after the episode has been truncated. */
export class EpisodeFinishedError extends Error {
    public readonly period: number;

    constructor(period: number) {
        super(`Episode already finished at period ${period}. Call reset() first.`);
        this.name = "EpisodeFinishedError";
        this.period = period;
    }
}

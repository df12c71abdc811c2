import * as p from "@clack/prompts";
import chalk from "chalk";
import fs from "fs/promises";
import path from "path";
import { z } from "zod/v4";
import { runScenario } from "../../orchestrator.js";
import type { EpisodeSummary } from "../../orchestrator.js";
import { PolicyParameters, Scenario, formatIssues, mean } from "../../index.js";
import { policyOverridesFromEnv } from "../overrides.js";

interface SimulateOptions {
    scenario: string;
    episodes?: string;
    verbose?: boolean;
    yes?: boolean;
}

export interface SummaryRow {
    agentId: string;
    position: number;
    totalCost: string;
    meanOrder: string;
    bullwhip: string;
}

export async function loadScenario(filePath: string): Promise<Scenario> {
    const content = await fs.readFile(filePath, "utf-8");
    return Scenario.parse(JSON.parse(content));
}

/** Plain-text table rows for one episode, two decimals throughout. */
export function summarizeEpisode(summary: EpisodeSummary): SummaryRow[] {
    return summary.agents.map((agent) => ({
        agentId: agent.agentId,
        position: agent.position,
        totalCost: agent.totalCost.toFixed(2),
        meanOrder: mean(agent.orders).toFixed(2),
        bullwhip: agent.bullwhipRatio === null ? "n/a" : agent.bullwhipRatio.toFixed(2),
    }));
}

function renderRows(rows: SummaryRow[]): string {
    const header = ["#", "agent", "cost", "mean order", "bullwhip"];
    const body = rows.map((r) => [String(r.position), r.agentId, r.totalCost, r.meanOrder, r.bullwhip]);
    const widths = header.map((h, i) => Math.max(h.length, ...body.map((line) => line[i].length)));
    const format = (cells: string[]) => cells.map((c, i) => c.padEnd(widths[i])).join("  ");
    return [chalk.bold(format(header)), ...body.map(format)].join("\n");
}

function parseEpisodes(value: string | undefined): number | undefined {
    if (value === undefined) return undefined;
    const episodes = Number(value);
    if (!Number.isInteger(episodes) || episodes < 1) {
        throw new Error(`Invalid --episodes value: ${value}`);
    }
    return episodes;
}

export async function simulateCommand(options: SimulateOptions) {
    p.intro(chalk.bgCyan.black(" Echelon - Supply Chain Simulation "));

    try {
        const scenarioPath = path.resolve(process.cwd(), options.scenario);
        const scenario = await loadScenario(scenarioPath);
        const episodes = parseEpisodes(options.episodes) ?? scenario.episodes;
        const policy = PolicyParameters.parse({ ...scenario.policy, ...policyOverridesFromEnv(process.env) });

        p.log.info(chalk.bold(`Scenario: ${scenario.name}`));
        if (scenario.description) p.log.info(chalk.dim(scenario.description));
        p.log.step(
            `${scenario.chain.agents.length} echelons, ${scenario.chain.episode_length} periods, ` +
            `demand ${chalk.cyan(scenario.chain.demand.kind)}, ${episodes} episode(s)`,
        );

        if (!options.yes) {
            const start = await p.confirm({ message: "Start the simulation?" });
            if (p.isCancel(start) || !start) {
                p.outro("Simulation aborted.");
                return;
            }
        }

        const summaries = runScenario(scenario, {
            policy,
            episodes,
            onPeriodComplete: options.verbose
                ? (episode, period, orders, demand) => {
                    const placed = Object.entries(orders)
                        .map(([agentId, quantity]) => `${agentId}=${quantity.toFixed(1)}`)
                        .join(" ");
                    p.log.message(chalk.dim(`[ep ${episode} t ${period}] demand=${demand} `) + placed);
                }
                : undefined,
            onEpisodeComplete: (episode, summary) => {
                p.note(renderRows(summarizeEpisode(summary)), `Episode ${episode} (${summary.id})`);
            },
        });

        const costs = summaries.map((s) => s.totalCost);
        p.log.success(`Mean chain cost over ${summaries.length} episode(s): ${chalk.green(mean(costs).toFixed(2))}`);
        p.outro("Simulation completed.");
    } catch (err) {
        p.log.error(chalk.red("Simulation error:"));
        if (err instanceof z.ZodError) {
            for (const issue of formatIssues(err)) p.log.error(issue);
        } else {
            p.log.error(err instanceof Error ? err.message : String(err));
        }
        process.exit(1);
    }
}

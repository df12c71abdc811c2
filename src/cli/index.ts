#!/usr/bin/env node

import dotenv from "dotenv";

dotenv.config({ quiet: true });

import { Command } from "commander";
import { simulateCommand } from "./commands/index.js";

const program = new Command();

program
    .name("echelon")
    .description("Multi-echelon inventory ordering policy - CLI")
    .version("1.0.0");

program
    .command("simulate")
    .description("Run a supply-chain scenario with one heuristic agent per echelon")
    .option("-s, --scenario <path>", "Path to the scenario JSON file", "scenarios/beer-game.json")
    .option("-e, --episodes <number>", "Override the number of episodes")
    .option("-v, --verbose", "Log every period's orders")
    .option("-y, --yes", "Skip confirmation prompt before starting the simulation")
    .action(simulateCommand);

program.parse(process.argv);

#!/usr/bin/env node
import { Command, InvalidArgumentError, Option } from 'commander';
import { config as loadEnv } from 'dotenv';

import { loadSimulationConfig, type ConfigOverrides } from './config.js';
import type { BandMode } from './matchmaker.js';
import { runSimulation } from './simulation.js';
import { createLogger, type Logger } from './telemetry.js';
import type { SimulationConfig } from './validators.js';

export interface CliOptions {
  players?: number;
  matches?: number;
  initialRating?: number;
  kFactor?: number;
  range?: number;
  bandMode?: BandMode;
  seed?: number;
  random?: boolean;
}

export interface ProgramDependencies {
  env?: NodeJS.ProcessEnv;
  execute?: (config: SimulationConfig) => void;
  logger?: Logger;
}

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`Expected an integer, got "${value}".`);
  }
  return parsed;
}

function parseDecimal(value: string): number {
  const parsed = Number(value);
  if (value.trim() === '' || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError(`Expected a number, got "${value}".`);
  }
  return parsed;
}

export function toOverrides(options: CliOptions): ConfigOverrides {
  return {
    numPlayers: options.players,
    numMatches: options.matches,
    initialRating: options.initialRating,
    kFactor: options.kFactor,
    ratingRangePercentage: options.range,
    bandMode: options.bandMode,
    seed: options.seed,
    unseeded: options.random
  };
}

export function createProgram(deps: ProgramDependencies = {}): Command {
  const execute =
    deps.execute ??
    ((config: SimulationConfig) => {
      runSimulation(config, { logger: deps.logger });
    });
  const program = new Command();
  program
    .name('rating-sim')
    .description('Monte Carlo simulation of an Elo rating ecosystem with rating-band matchmaking')
    .option('--players <count>', 'Number of players in the population', parseInteger)
    .option('--matches <count>', 'Number of rounds to simulate', parseInteger)
    .option('--initial-rating <rating>', 'Starting rating for every player', parseDecimal)
    .option('--k-factor <k>', 'Elo K-factor', parseDecimal)
    .option('--range <fraction>', 'Matchmaking band as a fraction of the subject rating', parseDecimal)
    .addOption(new Option('--band-mode <mode>', 'How the matchmaking band is derived').choices(['proportional', 'absolute']))
    .option('--seed <seed>', 'Seed for the deterministic random source', parseInteger)
    .option('--random', 'Ignore any configured seed and draw nondeterministically')
    .action((options: CliOptions) => {
      execute(loadSimulationConfig(deps.env ?? process.env, toOverrides(options)));
    });
  return program;
}

function main(): void {
  loadEnv();
  const logger = createLogger('rating-sim-cli');
  try {
    createProgram({ logger }).parse(process.argv);
  } catch (error) {
    logger.error({ err: error }, 'Rating simulation failed');
    process.exitCode = 1;
  }
}

if (require.main === module) {
  main();
}

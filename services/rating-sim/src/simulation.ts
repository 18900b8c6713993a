import { MatchSimulator, type MatchWinner } from './match.js';
import { Matchmaker } from './matchmaker.js';
import type { Player } from './player.js';
import { Population } from './population.js';
import { createRandomSource, type RandomSource } from './random.js';
import { createLogger, type Logger } from './telemetry.js';
import { parseSimulationConfig, type SimulationConfig, type SimulationConfigInput } from './validators.js';

export interface SimulationOptions {
  /** Overrides the source derived from `config.seed`. */
  random?: RandomSource;
  /** Defaults to a `rating-sim` logger created for this driver. */
  logger?: Logger;
}

export interface SimulationResult {
  population: readonly Player[];
  /** Winner of each round, in round order. `player1` is the subject. */
  results: MatchWinner[];
  fallbackMatches: number;
  seed?: number;
}

export class SimulationDriver {
  readonly config: SimulationConfig;
  private readonly random: RandomSource;
  private readonly logger: Logger;

  constructor(config: SimulationConfigInput, options: SimulationOptions = {}) {
    this.config = parseSimulationConfig(config);
    this.random = options.random ?? createRandomSource(this.config.seed);
    this.logger = options.logger ?? createLogger('rating-sim');
  }

  run(): SimulationResult {
    const { numPlayers, numMatches, initialRating, ratingRangePercentage, bandMode, kFactor, seed } = this.config;
    const startedAt = Date.now();
    this.logger.info({ config: this.config }, 'Starting rating simulation');

    const population = Population.create(numPlayers, initialRating);
    const matchmaker = new Matchmaker(population, { ratingRangePercentage, bandMode });
    const simulator = new MatchSimulator({ kFactor });

    const results: MatchWinner[] = [];
    let fallbackMatches = 0;

    for (let round = 0; round < numMatches; round += 1) {
      const subject = population.pick(this.random);
      const { opponent, fallback } = matchmaker.pair(subject, this.random);
      if (fallback) {
        fallbackMatches += 1;
        this.logger.debug({ round, subject: subject.id, rating: subject.rating }, 'No opponent in rating band');
      }
      results.push(simulator.simulate(subject, opponent, this.random));
    }

    const player1Wins = results.filter((winner) => winner === 'player1').length;
    this.logger.info(
      {
        rounds: results.length,
        player1Wins,
        player2Wins: results.length - player1Wins,
        fallbackMatches,
        durationMs: Date.now() - startedAt
      },
      'Rating simulation complete'
    );

    return { population: population.players, results, fallbackMatches, seed };
  }
}

export function runSimulation(config: SimulationConfigInput, options: SimulationOptions = {}): SimulationResult {
  return new SimulationDriver(config, options).run();
}

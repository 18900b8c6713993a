export { DEFAULT_K_FACTOR, RATING_SCALE, expectedScore, ratingDelta } from './elo.js';
export type { MatchScore } from './elo.js';
export { Player } from './player.js';
export { Population } from './population.js';
export { SeededRandom, MathRandom, MAX_SEED, createRandomSource, pick } from './random.js';
export type { RandomSource } from './random.js';
export { Matchmaker, DEFAULT_RATING_RANGE_PERCENTAGE } from './matchmaker.js';
export type { BandMode, MatchmakerOptions, RatingBand, CandidateSet, Pairing } from './matchmaker.js';
export { MatchSimulator } from './match.js';
export type { MatchWinner, MatchSimulatorOptions } from './match.js';
export { SimulationDriver, runSimulation } from './simulation.js';
export type { SimulationOptions, SimulationResult } from './simulation.js';
export { simulationConfigSchema, parseSimulationConfig, DEFAULT_INITIAL_RATING } from './validators.js';
export type { SimulationConfig, SimulationConfigInput } from './validators.js';
export { loadSimulationConfig } from './config.js';
export type { ConfigOverrides } from './config.js';
export { SimulationError, PreconditionViolationError, InvalidConfigurationError } from './errors.js';
export type { SimulationErrorCode, ConfigurationIssue } from './errors.js';
export { createLogger, createSilentLogger } from './telemetry.js';

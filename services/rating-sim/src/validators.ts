import { z } from 'zod';
import { DEFAULT_K_FACTOR } from './elo.js';
import { InvalidConfigurationError } from './errors.js';
import { DEFAULT_RATING_RANGE_PERCENTAGE } from './matchmaker.js';
import { MAX_SEED } from './random.js';

export const DEFAULT_INITIAL_RATING = 1500;

export const bandModeSchema = z.enum(['proportional', 'absolute']);

export const simulationConfigSchema = z.object({
  numPlayers: z.number().int().positive(),
  numMatches: z.number().int().positive(),
  initialRating: z.number().finite().default(DEFAULT_INITIAL_RATING),
  ratingRangePercentage: z.number().min(0).max(1).default(DEFAULT_RATING_RANGE_PERCENTAGE),
  kFactor: z.number().finite().positive().default(DEFAULT_K_FACTOR),
  bandMode: bandModeSchema.default('proportional'),
  seed: z.number().int().min(0).max(MAX_SEED).optional()
});

export type SimulationConfigInput = z.input<typeof simulationConfigSchema>;
export type SimulationConfig = z.output<typeof simulationConfigSchema>;

export function parseSimulationConfig(input: unknown): SimulationConfig {
  const parsed = simulationConfigSchema.safeParse(input);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message
    }));
    const summary = issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
    throw new InvalidConfigurationError(`Invalid simulation configuration: ${summary}`, issues);
  }
  return parsed.data;
}

import { z } from 'zod';
import { InvalidConfigurationError } from './errors.js';
import { MAX_SEED } from './random.js';
import {
  DEFAULT_INITIAL_RATING,
  bandModeSchema,
  parseSimulationConfig,
  type SimulationConfig,
  type SimulationConfigInput
} from './validators.js';

// An unset variable and one left blank in .env both mean "use the default".
const blankAsUndefined = (value: unknown) => (value === '' ? undefined : value);

const envValue = <T extends z.ZodTypeAny>(schema: T) => z.preprocess(blankAsUndefined, schema);

const envSchema = z.object({
  SIM_NUM_PLAYERS: envValue(z.coerce.number().int().positive().default(1000)),
  SIM_NUM_MATCHES: envValue(z.coerce.number().int().positive().default(100_000)),
  SIM_SEED: envValue(z.coerce.number().int().min(0).max(MAX_SEED).optional()),
  ELO_INITIAL_RATING: envValue(z.coerce.number().finite().default(DEFAULT_INITIAL_RATING)),
  ELO_K_FACTOR: envValue(z.coerce.number().positive().default(32)),
  MATCHMAKING_RATING_RANGE: envValue(z.coerce.number().min(0).max(1).default(0.2)),
  MATCHMAKING_BAND_MODE: envValue(bandModeSchema.default('proportional'))
});

export type ConfigOverrides = Partial<SimulationConfigInput> & {
  /** Drop the seed so the run draws from a nondeterministic source. */
  unseeded?: boolean;
};

export function loadSimulationConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): SimulationConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message
    }));
    const fieldErrors = JSON.stringify(parsed.error.flatten().fieldErrors, null, 2);
    throw new InvalidConfigurationError(`Invalid environment configuration: ${fieldErrors}`, issues);
  }

  const values = parsed.data;
  return parseSimulationConfig({
    numPlayers: overrides.numPlayers ?? values.SIM_NUM_PLAYERS,
    numMatches: overrides.numMatches ?? values.SIM_NUM_MATCHES,
    initialRating: overrides.initialRating ?? values.ELO_INITIAL_RATING,
    kFactor: overrides.kFactor ?? values.ELO_K_FACTOR,
    ratingRangePercentage: overrides.ratingRangePercentage ?? values.MATCHMAKING_RATING_RANGE,
    bandMode: overrides.bandMode ?? values.MATCHMAKING_BAND_MODE,
    seed: overrides.unseeded ? undefined : overrides.seed ?? values.SIM_SEED
  });
}

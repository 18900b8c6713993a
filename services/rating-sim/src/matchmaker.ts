import { PreconditionViolationError } from './errors.js';
import type { Player } from './player.js';
import type { Population } from './population.js';
import { pick, type RandomSource } from './random.js';

export const DEFAULT_RATING_RANGE_PERCENTAGE = 0.2;

/**
 * `proportional` scales the rating by `1 ± pct`, so a negative rating yields
 * an inverted (empty) band and always falls back. `absolute` widens by
 * `|rating| * pct` on both sides instead.
 */
export type BandMode = 'proportional' | 'absolute';

export interface MatchmakerOptions {
  ratingRangePercentage?: number;
  bandMode?: BandMode;
}

export interface RatingBand {
  min: number;
  max: number;
}

export interface CandidateSet {
  candidates: Player[];
  fallback: boolean;
}

export interface Pairing {
  opponent: Player;
  fallback: boolean;
}

export class Matchmaker {
  readonly ratingRangePercentage: number;
  readonly bandMode: BandMode;

  constructor(
    private readonly population: Population,
    options: MatchmakerOptions = {}
  ) {
    this.ratingRangePercentage = options.ratingRangePercentage ?? DEFAULT_RATING_RANGE_PERCENTAGE;
    this.bandMode = options.bandMode ?? 'proportional';
  }

  ratingBand(subject: Player): RatingBand {
    const { rating } = subject;
    if (this.bandMode === 'absolute') {
      const spread = Math.abs(rating) * this.ratingRangePercentage;
      return { min: rating - spread, max: rating + spread };
    }
    return {
      min: rating * (1 - this.ratingRangePercentage),
      max: rating * (1 + this.ratingRangePercentage)
    };
  }

  candidatesFor(subject: Player): CandidateSet {
    const others = this.population.others(subject);
    const { min, max } = this.ratingBand(subject);
    const inBand = others.filter((player) => min <= player.rating && player.rating <= max);
    if (inBand.length > 0) {
      return { candidates: inBand, fallback: false };
    }
    return { candidates: others, fallback: true };
  }

  findMatch(subject: Player, random: RandomSource): Player {
    return this.pair(subject, random).opponent;
  }

  pair(subject: Player, random: RandomSource): Pairing {
    if (this.population.size < 2) {
      throw new PreconditionViolationError(
        `Matchmaking needs at least 2 players, population has ${this.population.size}`
      );
    }
    const { candidates, fallback } = this.candidatesFor(subject);
    return { opponent: pick(random, candidates), fallback };
  }
}

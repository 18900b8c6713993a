export const DEFAULT_K_FACTOR = 32;
export const RATING_SCALE = 400;

/** Score a player earns from one match. Draws are never simulated. */
export type MatchScore = 0 | 1;

export function expectedScore(rating: number, opponentRating: number): number {
  return 1 / (1 + 10 ** ((opponentRating - rating) / RATING_SCALE));
}

export function ratingDelta(expected: number, actualScore: MatchScore, kFactor = DEFAULT_K_FACTOR): number {
  return kFactor * (actualScore - expected);
}

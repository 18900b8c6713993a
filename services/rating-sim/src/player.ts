import { DEFAULT_K_FACTOR, expectedScore, ratingDelta, type MatchScore } from './elo.js';

export class Player {
  private currentRating: number;
  private readonly history: number[];
  private played = 0;

  constructor(
    public readonly id: number,
    initialRating: number
  ) {
    this.currentRating = initialRating;
    this.history = [initialRating];
  }

  get rating(): number {
    return this.currentRating;
  }

  /** One entry per completed match, preceded by the initial rating. */
  get ratingHistory(): readonly number[] {
    return this.history;
  }

  get matchesPlayed(): number {
    return this.played;
  }

  expectedScore(opponentRating: number): number {
    return expectedScore(this.currentRating, opponentRating);
  }

  update(opponentRating: number, actualScore: MatchScore, kFactor = DEFAULT_K_FACTOR): number {
    const delta = ratingDelta(this.expectedScore(opponentRating), actualScore, kFactor);
    this.currentRating += delta;
    this.history.push(this.currentRating);
    this.played += 1;
    return delta;
  }
}

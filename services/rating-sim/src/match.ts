import { DEFAULT_K_FACTOR, expectedScore } from './elo.js';
import { PreconditionViolationError } from './errors.js';
import type { Player } from './player.js';
import type { RandomSource } from './random.js';

export type MatchWinner = 'player1' | 'player2';

export interface MatchSimulatorOptions {
  kFactor?: number;
}

export class MatchSimulator {
  readonly kFactor: number;

  constructor(options: MatchSimulatorOptions = {}) {
    this.kFactor = options.kFactor ?? DEFAULT_K_FACTOR;
  }

  simulate(player1: Player, player2: Player, random: RandomSource): MatchWinner {
    if (player1 === player2) {
      throw new PreconditionViolationError(`Player ${player1.id} cannot be matched against itself`);
    }
    // Both updates read the ratings from before the match.
    const rating1 = player1.rating;
    const rating2 = player2.rating;
    const player1Wins = random.next() < expectedScore(rating1, rating2);

    player1.update(rating2, player1Wins ? 1 : 0, this.kFactor);
    player2.update(rating1, player1Wins ? 0 : 1, this.kFactor);
    return player1Wins ? 'player1' : 'player2';
  }
}

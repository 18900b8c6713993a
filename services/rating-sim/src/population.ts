import { Player } from './player.js';
import { pick, type RandomSource } from './random.js';

/**
 * Fixed set of players for one run. Other components borrow players from
 * here and must not hold on to them past the run.
 */
export class Population {
  private readonly members: readonly Player[];

  constructor(players: readonly Player[]) {
    this.members = [...players];
  }

  static create(size: number, initialRating: number): Population {
    return new Population(Array.from({ length: size }, (_, index) => new Player(index, initialRating)));
  }

  get players(): readonly Player[] {
    return this.members;
  }

  get size(): number {
    return this.members.length;
  }

  pick(random: RandomSource): Player {
    return pick(random, this.members);
  }

  others(subject: Player): Player[] {
    return this.members.filter((player) => player !== subject);
  }
}

import { LETTER_COUNTS } from "../shared/constants.js";
import type { DrawPool, ExchangeResult } from "./types.js";

export interface TileBagOptions {
  rng?: () => number;
  counts?: Record<string, number>;
}

export class TileBag implements DrawPool {
  private readonly tiles: string[] = [];
  private readonly rng: () => number;

  constructor(options: TileBagOptions = {}) {
    this.rng = options.rng ?? Math.random;
    Object.entries(options.counts ?? LETTER_COUNTS).forEach(([letter, count]) => {
      for (let i = 0; i < Math.max(0, count); i += 1) {
        this.tiles.push(letter);
      }
    });
  }

  remaining(): number {
    return this.tiles.length;
  }

  draw(count: number): string[] {
    const drawn: string[] = [];
    while (drawn.length < count && this.tiles.length) {
      const index = Math.min(Math.floor(this.rng() * this.tiles.length), this.tiles.length - 1);
      drawn.push(...this.tiles.splice(index, 1));
    }
    return drawn;
  }

  exchange(tiles: string[]): ExchangeResult {
    if (!tiles.length) {
      return { success: false, error: "Select tiles to swap." };
    }
    if (tiles.length > this.tiles.length) {
      return {
        success: false,
        error: `Only ${this.tiles.length} tile(s) left in the bag.`
      };
    }
    // draw before returning so a player never gets their own tiles straight back
    const drawn = this.draw(tiles.length);
    this.tiles.push(...tiles);
    return { success: true, tiles: drawn };
  }
}

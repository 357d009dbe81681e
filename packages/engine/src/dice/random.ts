import { randomInt } from "node:crypto";

/** Integer source for every roll the engine makes; swap it out to replay a session */
export interface RandomSource {
  /** Uniform integer in [min, max], both inclusive */
  int(min: number, max: number): number;
}

export const cryptoRandom: RandomSource = {
  // randomInt(min, max) — min is inclusive, max is exclusive
  int: (min, max) => randomInt(min, max + 1),
};

import { createHmac } from "node:crypto";
import { InvariantViolationError } from "../errors.js";
import type { RandomSource } from "./random.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ParsedFormula = {
  count: number;
  sides: number;
  modifier: number;
};

export type DiceRollResult = {
  formula: string;
  rolls: number[];
  modifier: number;
  total: number;
  /** Unix millis the signature covers */
  signedAt: number;
  /** HMAC-SHA256 hex digest, null when no signing secret is configured */
  signed: string | null;
};

export type DiceOptions = {
  rng: RandomSource;
  signingSecret?: string;
  now?: () => number;
};

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/**
 * Parse a dice formula string into its component parts.
 *
 * Supported formats:
 *   "2d10", "2d6+3", "3d8-2", "1d100", "4d6"
 */
export function parseFormula(formula: string): ParsedFormula {
  const match = formula.trim().match(/^(\d+)d(\d+)([+-]\d+)?$/i);
  if (!match) {
    throw new InvariantViolationError(`Invalid dice formula: "${formula}"`);
  }

  const count = parseInt(match[1], 10);
  const sides = parseInt(match[2], 10);
  const modifier = match[3] ? parseInt(match[3], 10) : 0;

  if (count < 1 || count > 100) {
    throw new InvariantViolationError("Dice count must be between 1 and 100");
  }
  if (sides < 2 || sides > 100) {
    throw new InvariantViolationError("Dice sides must be between 2 and 100");
  }

  return { count, sides, modifier };
}

// ---------------------------------------------------------------------------
// Rolling
// ---------------------------------------------------------------------------

export function rollDie(rng: RandomSource, sides: number): number {
  return rng.int(1, sides);
}

/** Roll a formula; the result is signed when a secret is configured */
export function rollDice(formula: string, options: DiceOptions): DiceRollResult {
  const { count, sides, modifier } = parseFormula(formula);

  const rolls: number[] = [];
  for (let i = 0; i < count; i++) {
    rolls.push(rollDie(options.rng, sides));
  }

  const total = rolls.reduce((a, b) => a + b, 0) + modifier;
  const signedAt = (options.now ?? Date.now)();
  const signed = options.signingSecret
    ? signRoll(options.signingSecret, { formula, rolls, total, ts: signedAt })
    : null;

  return { formula, rolls, modifier, total, signedAt, signed };
}

// ---------------------------------------------------------------------------
// Signing
// ---------------------------------------------------------------------------

export type SignedPayload = {
  formula: string;
  rolls: number[];
  total: number;
  ts: number;
};

/** HMAC-SHA256 over the roll; the timestamp keeps replays distinguishable */
export function signRoll(secret: string, payload: SignedPayload): string {
  return createHmac("sha256", secret)
    .update(JSON.stringify(payload))
    .digest("hex");
}

export function verifyRoll(secret: string, roll: DiceRollResult): boolean {
  if (roll.signed === null) return false;
  const expected = signRoll(secret, {
    formula: roll.formula,
    rolls: roll.rolls,
    total: roll.total,
    ts: roll.signedAt,
  });
  return expected === roll.signed;
}

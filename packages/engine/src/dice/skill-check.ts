import type { Advantage, OutcomeTier } from "@wayfarer/shared";
import { EntityNotFoundError, InvariantViolationError } from "../errors.js";
import type { NeedsEngine } from "../needs/needs-engine.js";
import type { Repositories } from "../store/repositories.js";
import type { TurnScope } from "../types.js";
import { rollDice, type DiceOptions } from "./dice.js";

// ---------------------------------------------------------------------------
// 2d10 skill checks
// ---------------------------------------------------------------------------

export type SkillCheckInput = {
  skillName: string;
  dc: number;
  skillModifier: number;
  /** Raw attribute score (1..30); null when no attribute applies */
  attributeScore: number | null;
  /** Non-positive penalty from critically low needs */
  needsPenalty: number;
  advantage: Advantage;
};

export type SkillCheckResult = {
  skillName: string;
  dc: number;
  success: boolean;
  /** Every die thrown; null for an automatic success */
  rolls: number[] | null;
  /** The two dice that count */
  kept: number[] | null;
  total: number | null;
  totalModifier: number;
  needsPenalty: number;
  margin: number;
  tier: OutcomeTier;
  isAutoSuccess: boolean;
  isCriticalSuccess: boolean;
  isCriticalFailure: boolean;
  signed: string | null;
};

/** Which attribute backs a skill when the caller does not name one */
export const SKILL_ATTRIBUTES: Record<string, string> = {
  athletics: "strength",
  climbing: "strength",
  swimming: "strength",
  acrobatics: "dexterity",
  riding: "dexterity",
  stealth: "dexterity",
  sleight_of_hand: "dexterity",
  endurance: "constitution",
  survival: "wisdom",
  navigation: "wisdom",
  perception: "wisdom",
  medicine: "wisdom",
  investigation: "intelligence",
  lore: "intelligence",
  persuasion: "charisma",
  deception: "charisma",
  intimidation: "charisma",
};

export function attributeModifier(score: number): number {
  return Math.floor((score - 10) / 2);
}

export function outcomeTier(margin: number): OutcomeTier {
  if (margin >= 10) return "exceptional";
  if (margin >= 5) return "clear_success";
  if (margin >= 1) return "narrow_success";
  if (margin === 0) return "bare_success";
  if (margin >= -4) return "partial_failure";
  if (margin >= -9) return "clear_failure";
  return "catastrophic";
}

/** Two kept dice: best two of three with advantage, worst two with disadvantage */
export function keptDice(rolls: number[], advantage: Advantage): number[] {
  if (advantage === "normal") return rolls.slice(0, 2);
  const sorted = [...rolls].sort((a, b) => a - b);
  return advantage === "advantage" ? sorted.slice(-2) : sorted.slice(0, 2);
}

/**
 * Resolve a check. Routine tasks (DC at or below 10 + modifier) succeed
 * without a roll; otherwise 2d10 + modifier must meet the DC. Double 10
 * always succeeds and double 1 always fails.
 */
export function resolveSkillCheck(
  input: SkillCheckInput,
  dice: DiceOptions,
): SkillCheckResult {
  if (!Number.isInteger(input.dc) || input.dc < 1) {
    throw new InvariantViolationError(`DC must be a positive integer, got ${input.dc}`);
  }
  const totalModifier =
    input.skillModifier +
    (input.attributeScore === null ? 0 : attributeModifier(input.attributeScore)) +
    input.needsPenalty;
  const base = {
    skillName: input.skillName,
    dc: input.dc,
    totalModifier,
    needsPenalty: input.needsPenalty,
  };

  if (input.dc <= 10 + totalModifier) {
    const margin = 11 + totalModifier - input.dc;
    return {
      ...base,
      success: true,
      rolls: null,
      kept: null,
      total: null,
      margin,
      tier: outcomeTier(margin),
      isAutoSuccess: true,
      isCriticalSuccess: false,
      isCriticalFailure: false,
      signed: null,
    };
  }

  const count = input.advantage === "normal" ? 2 : 3;
  const roll = rollDice(`${count}d10`, dice);
  const kept = keptDice(roll.rolls, input.advantage);
  const total = kept[0] + kept[1] + totalModifier;
  const margin = total - input.dc;
  const isCriticalSuccess = kept[0] === 10 && kept[1] === 10;
  const isCriticalFailure = kept[0] === 1 && kept[1] === 1;

  let success = margin >= 0;
  let tier = outcomeTier(margin);
  if (isCriticalSuccess) {
    success = true;
    tier = "exceptional";
  } else if (isCriticalFailure) {
    success = false;
    tier = "catastrophic";
  }

  return {
    ...base,
    success,
    rolls: roll.rolls,
    kept,
    total,
    margin,
    tier,
    isAutoSuccess: false,
    isCriticalSuccess,
    isCriticalFailure,
    signed: roll.signed,
  };
}

// ---------------------------------------------------------------------------
// Entity-backed checks
// ---------------------------------------------------------------------------

export type EntityCheckRequest = {
  skillName: string;
  dc: number;
  attributeKey?: string;
  advantage?: Advantage;
};

export class SkillChecker {
  constructor(
    private readonly repos: Repositories,
    private readonly scope: TurnScope,
    private readonly needs: NeedsEngine,
    private readonly dice: DiceOptions,
  ) {}

  /** Check using the entity's skill and attribute scores and its needs penalty */
  async check(entityKey: string, request: EntityCheckRequest): Promise<SkillCheckResult> {
    const entity = await this.repos.entities.find(this.scope.sessionId, entityKey);
    if (!entity) throw new EntityNotFoundError(entityKey);

    const skillKey = request.skillName.trim().toLowerCase();
    const attributeKey = request.attributeKey ?? SKILL_ATTRIBUTES[skillKey];
    const attributeScore =
      attributeKey === undefined ? null : (entity.attributes[attributeKey] ?? null);
    // Entities without needs (scenery NPCs) take no penalty
    const needsPenalty = (await this.needs.getNeeds(entityKey))
      ? await this.needs.checkPenalty(entityKey)
      : 0;

    return resolveSkillCheck(
      {
        skillName: request.skillName,
        dc: request.dc,
        skillModifier: entity.skills[skillKey] ?? 0,
        attributeScore,
        needsPenalty,
        advantage: request.advantage ?? "normal",
      },
      this.dice,
    );
  }
}

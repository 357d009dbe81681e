import { describe, expect, it } from "vitest";
import type { DiceOptions } from "../dice/dice.js";
import {
  attributeModifier,
  keptDice,
  outcomeTier,
  resolveSkillCheck,
  type SkillCheckInput,
} from "../dice/skill-check.js";
import { EntityNotFoundError, InvariantViolationError } from "../errors.js";
import { entityFixture, inTurn, scriptedRandom } from "./helpers.js";

function input(overrides: Partial<SkillCheckInput> = {}): SkillCheckInput {
  return {
    skillName: "climbing",
    dc: 15,
    skillModifier: 2,
    attributeScore: 12,
    needsPenalty: 0,
    advantage: "normal",
    ...overrides,
  };
}

const dice = (rolls: number[]): DiceOptions => ({ rng: scriptedRandom(rolls) });

describe("building blocks", () => {
  it("derives attribute modifiers", () => {
    expect(attributeModifier(10)).toBe(0);
    expect(attributeModifier(12)).toBe(1);
    expect(attributeModifier(9)).toBe(-1);
    expect(attributeModifier(18)).toBe(4);
  });

  it("maps margins to tiers", () => {
    expect(outcomeTier(10)).toBe("exceptional");
    expect(outcomeTier(5)).toBe("clear_success");
    expect(outcomeTier(1)).toBe("narrow_success");
    expect(outcomeTier(0)).toBe("bare_success");
    expect(outcomeTier(-4)).toBe("partial_failure");
    expect(outcomeTier(-9)).toBe("clear_failure");
    expect(outcomeTier(-10)).toBe("catastrophic");
  });

  it("keeps the best or worst two of three", () => {
    expect(keptDice([3, 9, 5], "advantage")).toEqual([5, 9]);
    expect(keptDice([3, 9, 5], "disadvantage")).toEqual([3, 5]);
    expect(keptDice([3, 9], "normal")).toEqual([3, 9]);
  });
});

describe("resolveSkillCheck", () => {
  it("adds skill and attribute modifiers to 2d10", () => {
    const result = resolveSkillCheck(input(), dice([6, 7]));
    expect(result).toMatchObject({
      success: true,
      rolls: [6, 7],
      kept: [6, 7],
      total: 16,
      totalModifier: 3,
      margin: 1,
      tier: "narrow_success",
      isAutoSuccess: false,
    });
  });

  it("succeeds without rolling on routine tasks", () => {
    // No dice scripted: rolling would throw
    const result = resolveSkillCheck(input({ dc: 12 }), dice([]));
    expect(result).toMatchObject({
      success: true,
      rolls: null,
      total: null,
      margin: 2,
      tier: "narrow_success",
      isAutoSuccess: true,
    });
  });

  it("applies the needs penalty", () => {
    const result = resolveSkillCheck(input({ needsPenalty: -4 }), dice([6, 7]));
    expect(result.totalModifier).toBe(-1);
    expect(result.total).toBe(12);
    expect(result.success).toBe(false);
    expect(result.tier).toBe("partial_failure");
  });

  it("rolls three dice with advantage", () => {
    const result = resolveSkillCheck(input({ advantage: "advantage" }), dice([2, 9, 8]));
    expect(result.rolls).toEqual([2, 9, 8]);
    expect(result.kept).toEqual([8, 9]);
    expect(result.total).toBe(20);
  });

  it("lets double ten beat any DC", () => {
    const result = resolveSkillCheck(input({ dc: 40 }), dice([10, 10]));
    expect(result).toMatchObject({
      success: true,
      margin: -17,
      tier: "exceptional",
      isCriticalSuccess: true,
    });
  });

  it("makes double one fail whatever the modifier", () => {
    const result = resolveSkillCheck(
      input({ dc: 14, skillModifier: 10, attributeScore: 30 }),
      dice([]),
    );
    expect(result.isAutoSuccess).toBe(true);

    const rolled = resolveSkillCheck(input({ dc: 16, skillModifier: 4 }), dice([1, 1]));
    expect(rolled).toMatchObject({
      success: false,
      total: 7,
      tier: "catastrophic",
      isCriticalFailure: true,
    });
  });

  it("signs the roll when a secret is configured", () => {
    const result = resolveSkillCheck(input(), {
      rng: scriptedRandom([6, 7]),
      signingSecret: "test-secret",
      now: () => 1000,
    });
    expect(result.signed).toHaveLength(64);
  });

  it("rejects a non-positive DC", () => {
    expect(() => resolveSkillCheck(input({ dc: 0 }), dice([]))).toThrow(InvariantViolationError);
  });
});

describe("SkillChecker", () => {
  it("reads the entity's skill, default attribute and needs penalty", async () => {
    const fx = await entityFixture({
      needs: { hunger: 3, stamina: 10 },
      deps: { rng: scriptedRandom([5, 5]) },
      entity: { skills: { stealth: 3 }, attributes: { dexterity: 14 } },
    });

    const result = await inTurn(fx, (s) =>
      s.checker.check("aria", { skillName: "Stealth", dc: 15 }),
    );
    expect(result).toMatchObject({
      skillName: "Stealth",
      needsPenalty: -6,
      totalModifier: -1,
      total: 9,
      success: false,
    });
  });

  it("uses an explicit attribute over the default", async () => {
    const fx = await entityFixture({
      deps: { rng: scriptedRandom([5, 5]) },
      entity: { attributes: { intelligence: 16, wisdom: 8 } },
    });
    // lore defaults to intelligence (+3), which would make DC 11 routine
    const result = await inTurn(fx, (s) =>
      s.checker.check("aria", { skillName: "lore", dc: 11, attributeKey: "wisdom" }),
    );
    expect(result.totalModifier).toBe(-1);
    expect(result.isAutoSuccess).toBe(false);
    expect(result.total).toBe(9);
  });

  it("fails for unknown entities", async () => {
    const fx = await entityFixture();
    await expect(
      inTurn(fx, (s) => s.checker.check("ghost", { skillName: "lore", dc: 10 })),
    ).rejects.toBeInstanceOf(EntityNotFoundError);
  });
});

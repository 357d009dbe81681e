import type { ModifierSource, NeedName, TraitFlag } from "@wayfarer/shared";
import { z } from "zod";
import type { ChangeLog } from "../changes.js";
import {
  AdaptationNotFoundError,
  EntityNotFoundError,
  InvariantViolationError,
} from "../errors.js";
import type { Repositories } from "../store/repositories.js";
import type {
  ModifierKey,
  NeedAdaptation,
  NeedModifier,
  TurnScope,
} from "../types.js";
import { NEED_MAX } from "./constants.js";
import {
  AGE_EFFECTS,
  ageBand,
  TRAIT_EFFECTS,
  type ModifierEffect,
} from "./preferences.js";

export type SetModifierInput = {
  entityKey: string;
  need: NeedName;
  source: ModifierSource;
  sourceDetail?: string;
  decayRateMultiplier?: number;
  satisfactionMultiplier?: number;
  maxIntensityCap?: number | null;
  thresholdAdjustment?: number;
  expiresAtTurn?: number | null;
  isActive?: boolean;
};

export type ModifierTarget = Omit<ModifierKey, "sessionId">;

export type RecordAdaptationInput = {
  entityKey: string;
  need: NeedName;
  delta: number;
  reason: string;
  trigger: string;
  startedTurn?: number;
  isGradual?: boolean;
  durationDays?: number | null;
  isReversible?: boolean;
  reversalTrigger?: string | null;
};

/** Composite effect of every live modifier on one need */
export type ResolvedModifiers = {
  decayMultiplier: number;
  satisfactionMultiplier: number;
  cap: number;
  thresholdAdjustment: number;
};

const ModifierValues = z.object({
  decayRateMultiplier: z.number().finite().nonnegative(),
  satisfactionMultiplier: z.number().finite().nonnegative(),
  maxIntensityCap: z.number().int().min(0).max(NEED_MAX).nullable(),
  thresholdAdjustment: z.number().int(),
  expiresAtTurn: z.number().int().nonnegative().nullable(),
});

const NEUTRAL: ResolvedModifiers = {
  decayMultiplier: 1,
  satisfactionMultiplier: 1,
  cap: NEED_MAX,
  thresholdAdjustment: 0,
};

// Adaptations collapse into one modifier per need
const ADAPTATION_DETAIL = "cumulative";

export function isLive(modifier: NeedModifier, turn: number): boolean {
  return (
    modifier.isActive &&
    (modifier.expiresAtTurn === null || modifier.expiresAtTurn > turn)
  );
}

/** Multiply rates, take the lowest cap, sum thresholds */
export function combineModifiers(
  modifiers: NeedModifier[],
  turn: number,
): ResolvedModifiers {
  return modifiers
    .filter((m) => isLive(m, turn))
    .reduce<ResolvedModifiers>(
      (acc, m) => ({
        decayMultiplier: acc.decayMultiplier * m.decayRateMultiplier,
        satisfactionMultiplier:
          acc.satisfactionMultiplier * m.satisfactionMultiplier,
        cap: m.maxIntensityCap === null ? acc.cap : Math.min(acc.cap, m.maxIntensityCap),
        thresholdAdjustment: acc.thresholdAdjustment + m.thresholdAdjustment,
      }),
      NEUTRAL,
    );
}

/**
 * Per-entity, per-need adjustments from traits, age, adaptations, custom and
 * temporary sources. One modifier per (entity, need, source, source_detail).
 */
export class ModifierRegistry {
  constructor(
    private readonly repos: Repositories,
    private readonly scope: TurnScope,
    private readonly changes: ChangeLog,
  ) {}

  // -------------------------------------------------------------------------
  // Lifecycle
  // -------------------------------------------------------------------------

  async setModifier(input: SetModifierInput): Promise<NeedModifier> {
    const parsed = ModifierValues.safeParse({
      decayRateMultiplier: input.decayRateMultiplier ?? 1,
      satisfactionMultiplier: input.satisfactionMultiplier ?? 1,
      maxIntensityCap: input.maxIntensityCap ?? null,
      thresholdAdjustment: input.thresholdAdjustment ?? 0,
      expiresAtTurn: input.expiresAtTurn ?? null,
    });
    if (!parsed.success) {
      const detail = parsed.error.issues
        .map((i) => `${i.path.join(".")}: ${i.message}`)
        .join("; ");
      throw new InvariantViolationError(`Invalid modifier for "${input.entityKey}": ${detail}`);
    }
    const entity = await this.repos.entities.find(this.scope.sessionId, input.entityKey);
    if (!entity) throw new EntityNotFoundError(input.entityKey);

    const modifier = await this.repos.modifiers.upsert({
      sessionId: this.scope.sessionId,
      entityKey: input.entityKey,
      need: input.need,
      source: input.source,
      sourceDetail: input.sourceDetail ?? "",
      ...parsed.data,
      isActive: input.isActive ?? true,
    });
    this.recordSet(modifier);
    return modifier;
  }

  /** Turn a modifier off without deleting it; false when none exists */
  async deactivate(target: ModifierTarget): Promise<boolean> {
    const key = { sessionId: this.scope.sessionId, ...target };
    const existing = await this.repos.modifiers.find(key);
    if (!existing) return false;
    if (existing.isActive) {
      await this.repos.modifiers.setActive(key, false);
      this.recordSet({ ...existing, isActive: false });
    }
    return true;
  }

  /**
   * Deactivate modifiers whose expiry turn has been reached. Must run once
   * per turn advance, before decay.
   */
  async expireStale(turn: number = this.scope.turn): Promise<number> {
    return this.repos.modifiers.expireStale(this.scope.sessionId, turn);
  }

  // -------------------------------------------------------------------------
  // Resolution
  // -------------------------------------------------------------------------

  async resolve(entityKey: string, need: NeedName): Promise<ResolvedModifiers> {
    const modifiers = await this.repos.modifiers.list(
      this.scope.sessionId,
      entityKey,
      need,
    );
    return combineModifiers(modifiers, this.scope.turn);
  }

  /** Every need at once, for decay */
  async resolveAll(entityKey: string): Promise<Map<NeedName, ResolvedModifiers>> {
    const modifiers = await this.repos.modifiers.list(
      this.scope.sessionId,
      entityKey,
    );
    const byNeed = new Map<NeedName, NeedModifier[]>();
    for (const m of modifiers) {
      byNeed.set(m.need, [...(byNeed.get(m.need) ?? []), m]);
    }
    const resolved = new Map<NeedName, ResolvedModifiers>();
    for (const [need, list] of byNeed) {
      resolved.set(need, combineModifiers(list, this.scope.turn));
    }
    return resolved;
  }

  async getDecayMultiplier(entityKey: string, need: NeedName): Promise<number> {
    return (await this.resolve(entityKey, need)).decayMultiplier;
  }

  async getSatisfactionMultiplier(
    entityKey: string,
    need: NeedName,
  ): Promise<number> {
    return (await this.resolve(entityKey, need)).satisfactionMultiplier;
  }

  async getCap(entityKey: string, need: NeedName): Promise<number> {
    return (await this.resolve(entityKey, need)).cap;
  }

  async getThresholdAdjustment(
    entityKey: string,
    need: NeedName,
  ): Promise<number> {
    return (await this.resolve(entityKey, need)).thresholdAdjustment;
  }

  // -------------------------------------------------------------------------
  // Adaptations
  // -------------------------------------------------------------------------

  async recordAdaptation(input: RecordAdaptationInput): Promise<NeedAdaptation> {
    if (!Number.isInteger(input.delta)) {
      throw new InvariantViolationError("Adaptation delta must be an integer");
    }
    const startedTurn = input.startedTurn ?? this.scope.turn;
    const isGradual = input.isGradual ?? false;
    const adaptation = await this.repos.adaptations.insert({
      sessionId: this.scope.sessionId,
      entityKey: input.entityKey,
      need: input.need,
      delta: input.delta,
      reason: input.reason,
      trigger: input.trigger,
      startedTurn,
      completedTurn: isGradual ? null : startedTurn,
      isGradual,
      durationDays: input.durationDays ?? null,
      isReversible: input.isReversible ?? true,
      reversalTrigger: input.reversalTrigger ?? null,
      reversedBy: null,
    });
    await this.syncAdaptationModifier(input.entityKey, input.need);
    return adaptation;
  }

  /**
   * Write the equal-and-opposite record and neutralize the modifier.
   * Reversing twice returns the same compensating record.
   */
  async reverseAdaptation(
    adaptationId: string,
    trigger?: string,
  ): Promise<NeedAdaptation> {
    const original = await this.repos.adaptations.find(
      this.scope.sessionId,
      adaptationId,
    );
    if (!original) throw new AdaptationNotFoundError(adaptationId);
    if (original.reversedBy !== null) {
      const existing = await this.repos.adaptations.find(
        this.scope.sessionId,
        original.reversedBy,
      );
      if (existing) return existing;
    }
    if (!original.isReversible) {
      throw new InvariantViolationError(
        `Adaptation ${adaptationId} is not reversible`,
      );
    }

    const reversal = await this.repos.adaptations.insert({
      sessionId: this.scope.sessionId,
      entityKey: original.entityKey,
      need: original.need,
      delta: -original.delta,
      reason: `reversal: ${original.reason}`,
      trigger: trigger ?? original.reversalTrigger ?? "reversed",
      startedTurn: this.scope.turn,
      completedTurn: this.scope.turn,
      isGradual: false,
      durationDays: null,
      isReversible: false,
      reversalTrigger: null,
      reversedBy: null,
    });
    await this.repos.adaptations.markReversed(
      this.scope.sessionId,
      original.id,
      reversal.id,
    );
    await this.syncAdaptationModifier(original.entityKey, original.need);
    return reversal;
  }

  /** Sum of every adaptation delta recorded for the need */
  async cumulativeAdaptation(entityKey: string, need: NeedName): Promise<number> {
    const records = await this.repos.adaptations.list(
      this.scope.sessionId,
      entityKey,
      need,
    );
    return records.reduce((sum, a) => sum + a.delta, 0);
  }

  private async syncAdaptationModifier(
    entityKey: string,
    need: NeedName,
  ): Promise<void> {
    const total = await this.cumulativeAdaptation(entityKey, need);
    if (total === 0) {
      await this.deactivate({
        entityKey,
        need,
        source: "adaptation",
        sourceDetail: ADAPTATION_DETAIL,
      });
      return;
    }
    await this.setModifier({
      entityKey,
      need,
      source: "adaptation",
      sourceDetail: ADAPTATION_DETAIL,
      thresholdAdjustment: total,
    });
  }

  // -------------------------------------------------------------------------
  // Trait & age sync
  // -------------------------------------------------------------------------

  /** Upsert modifiers for present traits, deactivate those for removed ones */
  async syncTraitModifiers(
    entityKey: string,
    traits: TraitFlag[],
  ): Promise<NeedModifier[]> {
    const wanted = traits.flatMap((trait) =>
      TRAIT_EFFECTS[trait].map((effect) => ({ detail: trait, effect })),
    );
    return this.syncSource(entityKey, "trait", wanted);
  }

  /** Age band modifiers; `null` age clears them */
  async syncAgeModifiers(
    entityKey: string,
    age: number | null,
  ): Promise<NeedModifier[]> {
    if (age !== null && (!Number.isInteger(age) || age < 0)) {
      throw new InvariantViolationError("Age must be a non-negative integer");
    }
    const band = age === null ? null : ageBand(age);
    const wanted =
      band === null
        ? []
        : AGE_EFFECTS[band].map((effect) => ({ detail: band, effect }));
    return this.syncSource(entityKey, "age", wanted);
  }

  private async syncSource(
    entityKey: string,
    source: ModifierSource,
    wanted: { detail: string; effect: ModifierEffect }[],
  ): Promise<NeedModifier[]> {
    const written: NeedModifier[] = [];
    for (const { detail, effect } of wanted) {
      written.push(
        await this.setModifier({
          entityKey,
          need: effect.need,
          source,
          sourceDetail: detail,
          decayRateMultiplier: effect.decayRateMultiplier,
          satisfactionMultiplier: effect.satisfactionMultiplier,
          maxIntensityCap: effect.maxIntensityCap,
          thresholdAdjustment: effect.thresholdAdjustment,
        }),
      );
    }

    const keep = new Set(wanted.map((w) => `${w.effect.need}/${w.detail}`));
    const existing = await this.repos.modifiers.listBySource(
      this.scope.sessionId,
      entityKey,
      source,
    );
    for (const m of existing) {
      if (m.isActive && !keep.has(`${m.need}/${m.sourceDetail}`)) {
        await this.deactivate({
          entityKey,
          need: m.need,
          source,
          sourceDetail: m.sourceDetail,
        });
      }
    }
    return written;
  }

  private recordSet(modifier: NeedModifier): void {
    this.changes.record({
      kind: "modifier_set",
      entity_key: modifier.entityKey,
      need: modifier.need,
      source: modifier.source,
      source_detail: modifier.sourceDetail,
      is_active: modifier.isActive,
    });
  }
}

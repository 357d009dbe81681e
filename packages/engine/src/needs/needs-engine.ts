import {
  NeedName,
  type ActivityType,
  type NeedChangeCause,
  type Quality,
} from "@wayfarer/shared";
import type { ChangeLog } from "../changes.js";
import type { EngineConfig } from "../config.js";
import {
  EntityNotFoundError,
  InvariantViolationError,
  NeedsUninitializedError,
} from "../errors.js";
import type { Repositories } from "../store/repositories.js";
import type { NeedRecord, NeedState, TurnScope } from "../types.js";
import {
  ALERT_VALUE_SHIFT,
  carriesCraving,
  CHECK_PENALTY_CRITICAL,
  CHECK_PENALTY_FLOOR,
  CHECK_PENALTY_LOW,
  DECAY_RATES_PER_HOUR,
  DEFAULT_NEED_VALUES,
  INTIMACY_DECAY_PER_DAY,
  MORALE_PENALTY_BANDS,
  NEED_MAX,
  NEED_MIN,
  SOCIAL_RECOVERY_IN_COMPANY_PER_HOUR,
  VITAL_NEEDS,
} from "./constants.js";
import type { ModifierRegistry, ResolvedModifiers } from "./modifier-registry.js";
import { preferenceMultiplier } from "./preferences.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type DecayOptions = {
  activity?: ActivityType;
  /** Social connection recovers instead of fading when false */
  isAlone?: boolean;
  /** Extra factor on declines, per need (travel fatigue) */
  extraMultipliers?: Partial<Record<NeedName, number>>;
};

export type SatisfyContext = {
  actionType?: string;
  quality?: Quality;
};

export type SatisfyResult = {
  need: NeedName;
  oldValue: number;
  newValue: number;
  delta: number;
  baseAmount: number;
  preferenceMultiplier: number;
  satisfactionMultiplier: number;
};

export type NeedAlert = {
  need: NeedName;
  value: number;
  craving: number;
  effective: number;
  threshold: number;
  urgent: boolean;
  shouldCommunicate: boolean;
};

const NO_MODIFIERS: ResolvedModifiers = {
  decayMultiplier: 1,
  satisfactionMultiplier: 1,
  cap: NEED_MAX,
  thresholdAdjustment: 0,
};

/** Reported values are the floor of the stored value */
export const reported = (value: number): number => Math.floor(value);

const clamp = (value: number, max: number = NEED_MAX): number =>
  Math.min(max, Math.max(NEED_MIN, value));

// ---------------------------------------------------------------------------
// Engine
// ---------------------------------------------------------------------------

export class NeedsEngine {
  constructor(
    private readonly repos: Repositories,
    private readonly scope: TurnScope,
    private readonly changes: ChangeLog,
    private readonly modifiers: ModifierRegistry,
    private readonly config: EngineConfig,
  ) {}

  async getNeeds(entityKey: string): Promise<NeedState | null> {
    const records = await this.repos.needs.find(this.scope.sessionId, entityKey);
    if (records.length === 0) return null;
    const byNeed = new Map(records.map((r) => [r.need, r]));
    const pick = (need: NeedName): NeedRecord => {
      const record = byNeed.get(need);
      if (!record) {
        throw new InvariantViolationError(
          `Entity "${entityKey}" is missing its ${need} record`,
        );
      }
      return record;
    };
    const needs: Record<NeedName, NeedRecord> = {
      hunger: pick("hunger"),
      thirst: pick("thirst"),
      stamina: pick("stamina"),
      sleep_pressure: pick("sleep_pressure"),
      hygiene: pick("hygiene"),
      comfort: pick("comfort"),
      wellness: pick("wellness"),
      social_connection: pick("social_connection"),
      morale: pick("morale"),
      sense_of_purpose: pick("sense_of_purpose"),
      intimacy: pick("intimacy"),
    };
    return { sessionId: this.scope.sessionId, entityKey, needs };
  }

  /** Needs of an existing entity; throws when either is missing */
  async requireNeeds(entityKey: string): Promise<NeedState> {
    const state = await this.getNeeds(entityKey);
    if (state) return state;
    const entity = await this.repos.entities.find(this.scope.sessionId, entityKey);
    if (!entity) throw new EntityNotFoundError(entityKey);
    throw new NeedsUninitializedError(entityKey);
  }

  async initializeNeeds(
    entityKey: string,
    overrides: Partial<Record<NeedName, number>> = {},
  ): Promise<NeedState> {
    const entity = await this.repos.entities.find(this.scope.sessionId, entityKey);
    if (!entity) throw new EntityNotFoundError(entityKey);
    if (await this.getNeeds(entityKey)) {
      throw new InvariantViolationError(
        `Needs for "${entityKey}" are already initialized`,
      );
    }

    const resolved = await this.modifiers.resolveAll(entityKey);
    const records = NeedName.options.map((need): NeedRecord => {
      const value = overrides[need] ?? DEFAULT_NEED_VALUES[need];
      if (!Number.isFinite(value) || value < NEED_MIN || value > NEED_MAX) {
        throw new InvariantViolationError(
          `Initial ${need} must be within [0, 100], got ${value}`,
        );
      }
      return {
        need,
        value: Math.min(value, (resolved.get(need) ?? NO_MODIFIERS).cap),
        craving: 0,
        lastSatisfiedTurn: null,
        lastCommunicatedTurn: null,
        lastCommunicatedValue: null,
      };
    });
    await this.repos.needs.save(this.scope.sessionId, entityKey, records);
    for (const r of records) {
      this.recordValue(entityKey, r.need, 0, r.value, "initialized");
    }
    return this.requireNeeds(entityKey);
  }

  // -------------------------------------------------------------------------
  // Satisfaction & raw adjustments
  // -------------------------------------------------------------------------

  /**
   * Apply one satisfaction event. Preference and modifier multipliers are
   * applied here and nowhere else; callers pass the unscaled base amount.
   */
  async satisfyNeed(
    entityKey: string,
    need: NeedName,
    baseAmount: number,
    context: SatisfyContext = {},
  ): Promise<SatisfyResult> {
    if (!Number.isFinite(baseAmount) || baseAmount < -100 || baseAmount > 100) {
      throw new InvariantViolationError(
        `base_amount must be within [-100, 100], got ${baseAmount}`,
      );
    }
    const state = await this.requireNeeds(entityKey);
    const prefs = await this.repos.preferences.find(this.scope.sessionId, entityKey);
    const mods = await this.modifiers.resolve(entityKey, need);
    const prefMultiplier = preferenceMultiplier(
      prefs,
      need,
      context.actionType ?? "",
      context.quality ?? "basic",
    );

    const amount = Math.trunc(baseAmount * prefMultiplier * mods.satisfactionMultiplier);
    const record = state.needs[need];
    const oldValue = record.value;
    record.value = clamp(oldValue + amount, mods.cap);

    if (amount > 0) {
      record.lastSatisfiedTurn = this.scope.turn;
      if (record.craving > 0) {
        this.recordCraving(entityKey, need, record.craving, 0);
        record.craving = 0;
      }
    }

    await this.repos.needs.save(this.scope.sessionId, entityKey, [record]);
    this.recordValue(entityKey, need, oldValue, record.value, "satisfaction");

    return {
      need,
      oldValue: reported(oldValue),
      newValue: reported(record.value),
      delta: reported(record.value) - reported(oldValue),
      baseAmount,
      preferenceMultiplier: prefMultiplier,
      satisfactionMultiplier: mods.satisfactionMultiplier,
    };
  }

  /** Raw change with no multipliers: hazard penalties, memory stimuli */
  async adjustNeed(
    entityKey: string,
    need: NeedName,
    delta: number,
    cause: NeedChangeCause = "penalty",
  ): Promise<{ oldValue: number; newValue: number }> {
    const state = await this.requireNeeds(entityKey);
    const mods = await this.modifiers.resolve(entityKey, need);
    const record = state.needs[need];
    const oldValue = record.value;
    record.value = clamp(oldValue + delta, mods.cap);
    await this.repos.needs.save(this.scope.sessionId, entityKey, [record]);
    this.recordValue(entityKey, need, oldValue, record.value, cause);
    return { oldValue: reported(oldValue), newValue: reported(record.value) };
  }

  // -------------------------------------------------------------------------
  // Decay
  // -------------------------------------------------------------------------

  async applyDecay(
    entityKey: string,
    minutes: number,
    options: DecayOptions = {},
  ): Promise<NeedState> {
    if (!Number.isFinite(minutes) || minutes < 0) {
      throw new InvariantViolationError(
        `Elapsed minutes must be >= 0, got ${minutes}`,
      );
    }
    const state = await this.requireNeeds(entityKey);
    if (minutes === 0) return state;

    const activity = options.activity ?? "active";
    const isAlone = options.isAlone ?? true;
    const resolved = await this.modifiers.resolveAll(entityKey);
    const prefs = await this.repos.preferences.find(this.scope.sessionId, entityKey);
    const before = new Map(
      NeedName.options.map((n) => [n, state.needs[n].value] as const),
    );

    for (const need of NeedName.options) {
      const mods = resolved.get(need) ?? NO_MODIFIERS;
      let rate =
        need === "intimacy"
          ? -INTIMACY_DECAY_PER_DAY[prefs?.intimacyDrive ?? "moderate"] / 24
          : DECAY_RATES_PER_HOUR[need][activity];
      if (need === "social_connection" && !isAlone) {
        rate = SOCIAL_RECOVERY_IN_COMPANY_PER_HOUR;
      }

      // Multipliers scale declines only; recovery runs at the base rate
      const multiplier =
        rate < 0 ? mods.decayMultiplier * (options.extraMultipliers?.[need] ?? 1) : 1;
      const delta = (rate * multiplier * minutes) / 60;
      const record = state.needs[need];
      record.value = clamp(record.value + delta, mods.cap);
    }

    this.driftMorale(state, minutes, resolved.get("morale") ?? NO_MODIFIERS);
    this.decayCravings(state, minutes);

    const records = NeedName.options.map((n) => state.needs[n]);
    await this.repos.needs.save(this.scope.sessionId, entityKey, records);
    for (const r of records) {
      this.recordValue(entityKey, r.need, before.get(r.need) ?? r.value, r.value, "decay");
    }
    return state;
  }

  private driftMorale(
    state: NeedState,
    minutes: number,
    mods: ResolvedModifiers,
  ): void {
    let baseline = this.config.moraleBaseline;
    for (const need of NeedName.options) {
      const value = state.needs[need].value;
      const band = MORALE_PENALTY_BANDS[need]?.find((b) => value < b.below);
      if (band) baseline += band.penalty;
    }
    const morale = state.needs.morale;
    const diff = baseline - morale.value;
    const step = Math.min(Math.abs(diff), (this.config.moraleDriftPerHour * minutes) / 60);
    morale.value = clamp(morale.value + Math.sign(diff) * step, mods.cap);
  }

  private decayCravings(state: NeedState, minutes: number): void {
    const drop = (this.config.cravingDecayPer30Minutes * minutes) / 30;
    for (const need of NeedName.options) {
      const record = state.needs[need];
      if (record.craving <= 0) continue;
      const next = Math.max(0, record.craving - drop);
      this.recordCraving(state.entityKey, need, record.craving, next);
      record.craving = next;
    }
  }

  // -------------------------------------------------------------------------
  // Cravings
  // -------------------------------------------------------------------------

  /**
   * Add a stimulus-driven craving overlay. The need value itself is never
   * touched. Returns the boost applied (0 for needs without cravings).
   */
  async applyCraving(
    entityKey: string,
    need: NeedName,
    relevance: number,
  ): Promise<number> {
    if (!Number.isFinite(relevance) || relevance < 0 || relevance > 1) {
      throw new InvariantViolationError(
        `relevance must be within [0, 1], got ${relevance}`,
      );
    }
    const state = await this.requireNeeds(entityKey);
    if (!carriesCraving(need)) return 0;

    const record = state.needs[need];
    const { cravingAttentionFactor, cravingScale, cravingCap } = this.config;
    const boost = Math.min(
      cravingCap,
      Math.round(relevance * cravingAttentionFactor * (NEED_MAX - record.value) * cravingScale),
    );
    if (boost === 0) return 0;

    const old = record.craving;
    record.craving = clamp(old + boost);
    await this.repos.needs.save(this.scope.sessionId, entityKey, [record]);
    this.recordCraving(entityKey, need, old, record.craving);
    return boost;
  }

  // -------------------------------------------------------------------------
  // Derived values
  // -------------------------------------------------------------------------

  async getAlerts(entityKey: string): Promise<NeedAlert[]> {
    const state = await this.requireNeeds(entityKey);
    const resolved = await this.modifiers.resolveAll(entityKey);
    return NeedName.options.map((need) => {
      const record = state.needs[need];
      const value = reported(record.value);
      const craving = reported(record.craving);
      const effective = Math.max(0, value - craving);
      const threshold =
        this.config.urgencyThreshold +
        (resolved.get(need) ?? NO_MODIFIERS).thresholdAdjustment;
      const urgent = effective < threshold;
      return {
        need,
        value,
        craving,
        effective,
        threshold,
        urgent,
        shouldCommunicate: urgent && this.isDue(record, value),
      };
    });
  }

  private isDue(record: NeedRecord, value: number): boolean {
    if (record.lastCommunicatedTurn === null || record.lastCommunicatedValue === null) {
      return true;
    }
    if (this.scope.turn - record.lastCommunicatedTurn >= this.config.reminderIntervalTurns) {
      return true;
    }
    return Math.abs(value - record.lastCommunicatedValue) >= ALERT_VALUE_SHIFT;
  }

  async markCommunicated(entityKey: string, need: NeedName): Promise<void> {
    const state = await this.requireNeeds(entityKey);
    const record = state.needs[need];
    record.lastCommunicatedTurn = this.scope.turn;
    record.lastCommunicatedValue = reported(record.value);
    await this.repos.needs.save(this.scope.sessionId, entityKey, [record]);
  }

  /** Skill-check penalty from critically low vital needs (0 to -8) */
  async checkPenalty(entityKey: string): Promise<number> {
    const state = await this.requireNeeds(entityKey);
    let penalty = 0;
    for (const need of VITAL_NEEDS) {
      const value = state.needs[need].value;
      if (value < CHECK_PENALTY_CRITICAL.below) penalty += CHECK_PENALTY_CRITICAL.penalty;
      else if (value < CHECK_PENALTY_LOW.below) penalty += CHECK_PENALTY_LOW.penalty;
    }
    return Math.max(CHECK_PENALTY_FLOOR, penalty);
  }

  // -------------------------------------------------------------------------
  // Change log
  // -------------------------------------------------------------------------

  private recordValue(
    entityKey: string,
    need: NeedName,
    oldValue: number,
    newValue: number,
    cause: NeedChangeCause,
  ): void {
    // Decay only reports changes a reader can see
    const visible =
      cause === "decay"
        ? reported(oldValue) !== reported(newValue)
        : oldValue !== newValue;
    if (!visible) return;
    this.changes.record({
      kind: "need_changed",
      entity_key: entityKey,
      need,
      old_value: reported(oldValue),
      new_value: reported(newValue),
      cause,
    });
  }

  private recordCraving(
    entityKey: string,
    need: NeedName,
    oldValue: number,
    newValue: number,
  ): void {
    this.changes.record({
      kind: "craving_changed",
      entity_key: entityKey,
      need,
      old_value: reported(oldValue),
      new_value: reported(newValue),
    });
  }
}

import type { DriveLevel, NeedName, Quality, TraitFlag } from "@wayfarer/shared";
import type { CharacterPreferences } from "../types.js";

// ---------------------------------------------------------------------------
// Trait and age tables → modifier values
// ---------------------------------------------------------------------------

export type ModifierEffect = {
  need: NeedName;
  decayRateMultiplier?: number;
  satisfactionMultiplier?: number;
  maxIntensityCap?: number;
  thresholdAdjustment?: number;
};

export const TRAIT_EFFECTS: Record<TraitFlag, ModifierEffect[]> = {
  greedy_eater: [{ need: "hunger", decayRateMultiplier: 1.2 }],
  picky_eater: [{ need: "hunger", thresholdAdjustment: 5 }],
  social_butterfly: [{ need: "social_connection", decayRateMultiplier: 1.5 }],
  loner: [{ need: "social_connection", decayRateMultiplier: 0.5 }],
  high_stamina: [{ need: "stamina", decayRateMultiplier: 0.8 }],
  low_stamina: [{ need: "stamina", decayRateMultiplier: 1.3 }],
  insomniac: [{ need: "sleep_pressure", decayRateMultiplier: 1.3 }],
  heavy_sleeper: [{ need: "sleep_pressure", decayRateMultiplier: 0.8 }],
};

export type AgeBand = "child" | "teen" | "adult" | "elder";

export function ageBand(age: number): AgeBand {
  if (age < 13) return "child";
  if (age < 18) return "teen";
  if (age < 60) return "adult";
  return "elder";
}

export const AGE_EFFECTS: Record<AgeBand, ModifierEffect[]> = {
  child: [
    { need: "hunger", decayRateMultiplier: 1.2 },
    { need: "sleep_pressure", decayRateMultiplier: 1.2 },
    { need: "intimacy", decayRateMultiplier: 0 },
  ],
  teen: [
    { need: "hunger", decayRateMultiplier: 1.3 },
    { need: "sleep_pressure", decayRateMultiplier: 1.1 },
  ],
  adult: [],
  elder: [
    { need: "hunger", decayRateMultiplier: 0.8 },
    { need: "stamina", decayRateMultiplier: 1.3, maxIntensityCap: 85 },
  ],
};

// ---------------------------------------------------------------------------
// Preference multiplier — how much a given action satisfies this character
// ---------------------------------------------------------------------------

const DRIVE_SATISFACTION: Record<DriveLevel, number> = {
  asexual: 0,
  very_low: 0.5,
  low: 0.8,
  moderate: 1,
  high: 1.2,
  very_high: 1.5,
};

const GROUP_ACTIONS = ["group", "party", "gathering"];
const ONE_ON_ONE_ACTIONS = ["conversation", "talk", "chat"];
const REST_ACTIONS = ["sleep", "rest"];

function mentions(actionType: string, words: string[]): boolean {
  const action = actionType.toLowerCase();
  return words.some((w) => action.includes(w));
}

/**
 * Multiplier from traits and preferences for one satisfaction action.
 * Returns 1 when the entity has no preferences record.
 */
export function preferenceMultiplier(
  prefs: CharacterPreferences | null,
  need: NeedName,
  actionType: string,
  quality: Quality,
): number {
  if (!prefs) return 1;
  const has = (trait: TraitFlag) => prefs.traits.includes(trait);
  let multiplier = 1;

  switch (need) {
    case "hunger":
      if (has("greedy_eater")) multiplier *= 1.3;
      if (has("picky_eater")) {
        if (quality === "excellent" || quality === "exceptional") multiplier *= 1.3;
        else if (quality === "poor") multiplier *= 0.5;
      }
      break;

    case "stamina":
    case "sleep_pressure":
      if (need === "stamina") {
        if (has("high_stamina")) multiplier *= 1.2;
        if (has("low_stamina")) multiplier *= 0.8;
      }
      if (mentions(actionType, REST_ACTIONS)) {
        if (has("heavy_sleeper")) multiplier *= 1.3;
        if (has("insomniac")) multiplier *= 0.6;
      }
      break;

    case "social_connection":
      if (has("social_butterfly")) multiplier *= 1.3;
      if (has("loner")) multiplier *= 0.5;
      if (mentions(actionType, GROUP_ACTIONS)) {
        if (prefs.socialTendency === "extrovert") multiplier *= 1.2;
        if (prefs.socialTendency === "introvert") multiplier *= 0.8;
      } else if (
        prefs.socialTendency === "introvert" &&
        mentions(actionType, ONE_ON_ONE_ACTIONS)
      ) {
        multiplier *= 1.2;
      }
      break;

    case "intimacy":
      multiplier *= DRIVE_SATISFACTION[prefs.intimacyDrive];
      if (prefs.intimacyStyle === "casual" && mentions(actionType, ["encounter", "physical"])) {
        multiplier *= 1.3;
      }
      if (prefs.intimacyStyle === "emotional") {
        if (mentions(actionType, ["emotional", "vulnerability"])) multiplier *= 1.5;
        else if (mentions(actionType, ["encounter"])) multiplier *= 0.8;
      }
      break;

    default:
      break;
  }

  return multiplier;
}

/** Defaults for entities created without an explicit preferences block */
export function defaultPreferences(
  sessionId: string,
  entityKey: string,
): CharacterPreferences {
  return {
    sessionId,
    entityKey,
    favoriteFoods: [],
    favoriteDrinks: [],
    dislikedFoods: [],
    allergies: [],
    dietaryFlags: [],
    alcoholTolerance: "moderate",
    intimacyDrive: "moderate",
    intimacyStyle: "selective",
    attraction: null,
    socialTendency: "ambivert",
    preferredGroupSize: 3,
    traits: [],
    age: null,
  };
}

import type {
  ActivityType,
  CravingNeed,
  DriveLevel,
  NeedName,
} from "@wayfarer/shared";

// ---------------------------------------------------------------------------
// Baselines
// ---------------------------------------------------------------------------

export const NEED_MIN = 0;
export const NEED_MAX = 100;

export const DEFAULT_NEED_VALUES: Record<NeedName, number> = {
  hunger: 50,
  thirst: 80,
  stamina: 80,
  sleep_pressure: 80,
  hygiene: 80,
  comfort: 70,
  wellness: 100,
  social_connection: 60,
  morale: 70,
  sense_of_purpose: 50,
  intimacy: 70,
};

export const CRAVING_NEEDS: readonly CravingNeed[] = [
  "hunger",
  "thirst",
  "social_connection",
  "intimacy",
];

export function carriesCraving(need: NeedName): need is CravingNeed {
  return CRAVING_NEEDS.some((n) => n === need);
}

// ---------------------------------------------------------------------------
// Decay — points per hour by activity (negative = decline, positive = recovery)
// ---------------------------------------------------------------------------

type HourlyRates = Record<ActivityType, number>;

export const DECAY_RATES_PER_HOUR: Record<
  Exclude<NeedName, "intimacy">,
  HourlyRates
> = {
  hunger: { active: -6, resting: -3, sleeping: -1, combat: -6 },
  thirst: { active: -10, resting: -5, sleeping: -2, combat: -15 },
  stamina: { active: -8, resting: 15, sleeping: 50, combat: -25 },
  sleep_pressure: { active: -4.5, resting: -4.5, sleeping: 12, combat: -6 },
  hygiene: { active: -3, resting: -1, sleeping: 0, combat: -8 },
  comfort: { active: 0, resting: 0, sleeping: 0, combat: -10 },
  wellness: { active: 0, resting: 1, sleeping: 2, combat: 0 },
  social_connection: { active: -2, resting: -2, sleeping: 0, combat: 0 },
  morale: { active: 0, resting: 0, sleeping: 0, combat: 0 },
  sense_of_purpose: { active: -0.5, resting: -0.5, sleeping: 0, combat: 0 },
};

/** Intimacy fades per day, by drive level */
export const INTIMACY_DECAY_PER_DAY: Record<DriveLevel, number> = {
  asexual: 0,
  very_low: 1,
  low: 3,
  moderate: 5,
  high: 7,
  very_high: 10,
};

export const SOCIAL_RECOVERY_IN_COMPANY_PER_HOUR = 5;

// ---------------------------------------------------------------------------
// Morale & skill-check penalties
// ---------------------------------------------------------------------------

/** Needs whose critical values drag morale down and penalize skill checks */
export const VITAL_NEEDS = [
  "hunger",
  "thirst",
  "stamina",
  "sleep_pressure",
  "wellness",
] as const satisfies readonly NeedName[];

export type MoraleBand = { readonly below: number; readonly penalty: number };

/**
 * Per-need morale baseline penalties, most severe band first; only the
 * first matching band counts. Sleep pressure reads 100 = rested.
 */
export const MORALE_PENALTY_BANDS: Partial<Record<NeedName, readonly MoraleBand[]>> = {
  hunger: [
    { below: 15, penalty: -20 },
    { below: 30, penalty: -10 },
  ],
  thirst: [
    { below: 5, penalty: -25 },
    { below: 15, penalty: -15 },
    { below: 30, penalty: -5 },
  ],
  stamina: [
    { below: 20, penalty: -10 },
    { below: 40, penalty: -5 },
  ],
  sleep_pressure: [
    { below: 20, penalty: -15 },
    { below: 40, penalty: -8 },
  ],
  wellness: [
    { below: 40, penalty: -25 },
    { below: 60, penalty: -15 },
  ],
  social_connection: [
    { below: 20, penalty: -25 },
    { below: 40, penalty: -10 },
  ],
  comfort: [{ below: 20, penalty: -10 }],
};

export const CHECK_PENALTY_CRITICAL = { below: 5, penalty: -4 } as const;
export const CHECK_PENALTY_LOW = { below: 15, penalty: -2 } as const;
export const CHECK_PENALTY_FLOOR = -8;

/** Value change that re-triggers an urgent-need reminder early */
export const ALERT_VALUE_SHIFT = 10;

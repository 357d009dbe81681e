import { z } from "zod";

// ---------------------------------------------------------------------------
// Engine tunables — game-design constants, not invariants
// ---------------------------------------------------------------------------

export const EngineConfig = z.object({
  /** Share of a stimulus that reaches the character's attention */
  cravingAttentionFactor: z.number().min(0).max(1).default(0.6),
  /** Scales the unmet portion of a need into a craving boost */
  cravingScale: z.number().min(0).max(1).default(0.6),
  /** Largest boost a single stimulus can add */
  cravingCap: z.number().int().min(0).max(100).default(50),
  /** Craving points lost per 30 minutes of elapsed time */
  cravingDecayPer30Minutes: z.number().nonnegative().default(20),
  /** Effective need value below which a need counts as urgent */
  urgencyThreshold: z.number().int().min(0).max(100).default(30),
  /** Re-announce a still-urgent need after this many turns */
  reminderIntervalTurns: z.number().int().positive().default(12),
  /** Morale drifts toward this value, lowered by severe needs */
  moraleBaseline: z.number().min(0).max(100).default(50),
  moraleDriftPerHour: z.number().nonnegative().default(5),
  /** Planning weight applied to edges into road/trail zones when prefer_roads is set */
  preferRoadsBias: z.number().positive().max(1).default(0.5),
  /** Attempts per tool call when the store reports a transient conflict */
  maxTransactionAttempts: z.number().int().min(1).max(10).default(3),
});
export type EngineConfig = z.infer<typeof EngineConfig>;

export const DEFAULT_ENGINE_CONFIG: EngineConfig = EngineConfig.parse({});

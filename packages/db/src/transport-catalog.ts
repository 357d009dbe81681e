import type { TransportModeDefinition } from "@wayfarer/shared";
import type { Database } from "./client.js";
import { transportMode } from "./schema/index.js";

/**
 * Insert or refresh the global transport catalog, keyed by `mode_key`.
 * Returns the number of modes written.
 */
export async function upsertTransportModes(
  db: Database,
  modes: TransportModeDefinition[],
): Promise<number> {
  for (const mode of modes) {
    const values = {
      displayName: mode.display_name,
      transportType: mode.type,
      terrainCosts: mode.terrain_costs,
      requiresSkill: mode.requires_skill,
      requiresItem: mode.requires_item,
      fatigueRate: mode.fatigue_rate,
      encounterModifier: mode.encounter_modifier,
    };
    await db
      .insert(transportMode)
      .values({ modeKey: mode.key, ...values })
      .onConflictDoUpdate({ target: transportMode.modeKey, set: values });
  }
  return modes.length;
}

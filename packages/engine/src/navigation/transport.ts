import type { TerrainType, TransportModeDefinition } from "@wayfarer/shared";
import type { TransportMode, Zone } from "../types.js";

// ---------------------------------------------------------------------------
// Transport model — per-terrain multipliers and single-zone accessibility
// ---------------------------------------------------------------------------

export function toTransportMode(def: TransportModeDefinition): TransportMode {
  return {
    key: def.key,
    displayName: def.display_name,
    type: def.type,
    terrainCosts: def.terrain_costs,
    requiresSkill: def.requires_skill,
    requiresItem: def.requires_item,
    fatigueRate: def.fatigue_rate,
    encounterModifier: def.encounter_modifier,
  };
}

/** `null` when the mode cannot cross this terrain at all */
export function terrainMultiplier(
  mode: TransportMode,
  terrain: TerrainType,
): number | null {
  return mode.terrainCosts[terrain] ?? null;
}

export type Accessibility = {
  canEnter: boolean;
  reason: string | null;
  requiresSkill: string | null;
  skillDifficulty: number | null;
  /** Minutes to cross the zone itself; null when it cannot be entered */
  travelCost: number | null;
};

/** Minutes to cross a zone once inside it, or null when impassable */
export function zoneTraversalMinutes(
  zone: Zone,
  mode: TransportMode,
): number | null {
  const multiplier = terrainMultiplier(mode, zone.terrain);
  if (multiplier === null) return null;
  if (mode.type === "mounted") return zone.mountedTravelCost;
  return Math.round(zone.baseTravelCost * multiplier);
}

/** Single-hop check, independent of full pathfinding */
export function checkAccessibility(
  zone: Zone,
  mode: TransportMode,
): Accessibility {
  const gate = {
    requiresSkill: zone.requiresSkill,
    skillDifficulty: zone.skillDifficulty,
  };
  if (!zone.isAccessible) {
    return {
      canEnter: false,
      reason: zone.blockedReason ?? `${zone.displayName} is inaccessible`,
      ...gate,
      travelCost: null,
    };
  }
  if (terrainMultiplier(mode, zone.terrain) === null) {
    return {
      canEnter: false,
      reason: `${mode.displayName} cannot cross ${zone.terrain} terrain`,
      ...gate,
      travelCost: null,
    };
  }
  const travelCost = zoneTraversalMinutes(zone, mode);
  if (travelCost === null) {
    return {
      canEnter: false,
      reason: `${zone.displayName} cannot be entered while mounted`,
      ...gate,
      travelCost: null,
    };
  }
  return { canEnter: true, reason: null, ...gate, travelCost };
}

import { z } from "zod";
import {
  AlcoholTolerance,
  ConnectionType,
  DiscoveryMethod,
  DriveLevel,
  EncounterFrequency,
  EntityKind,
  FailureConsequence,
  IntimacyStyle,
  LocationVisibility,
  NeedName,
  SocialTendency,
  TerrainType,
  TraitFlag,
  TransportType,
  VisibilityRange,
} from "./enums.js";
import { Key } from "./tools.js";

// ---------------------------------------------------------------------------
// World authoring schemas — what a session is built from
// ---------------------------------------------------------------------------

export const TerrainCosts = z.record(TerrainType, z.number().positive());
export type TerrainCosts = z.infer<typeof TerrainCosts>;

export const TransportModeDefinition = z.object({
  key: Key,
  display_name: z.string().min(1),
  type: TransportType,
  terrain_costs: TerrainCosts,
  requires_skill: z.string().min(1).nullable().default(null),
  requires_item: z.string().min(1).nullable().default(null),
  fatigue_rate: z.number().nonnegative().default(1),
  encounter_modifier: z.number().nonnegative().default(1),
});
export type TransportModeDefinition = z.infer<typeof TransportModeDefinition>;

export const ZoneDefinition = z.object({
  key: Key,
  display_name: z.string().min(1),
  terrain: TerrainType,
  parent_zone_key: Key.nullable().default(null),
  base_travel_cost: z.number().int().nonnegative().default(10),
  mounted_travel_cost: z.number().int().nonnegative().nullable().default(null),
  requires_skill: z.string().min(1).nullable().default(null),
  skill_difficulty: z.number().int().min(1).max(40).nullable().default(null),
  failure_consequence: FailureConsequence.nullable().default(null),
  visibility_range: VisibilityRange.default("medium"),
  encounter_frequency: EncounterFrequency.default("low"),
  is_accessible: z.boolean().default(true),
  blocked_reason: z.string().nullable().default(null),
  description: z.string().default(""),
});
export type ZoneDefinition = z.infer<typeof ZoneDefinition>;
export type ZoneDefinitionInput = z.input<typeof ZoneDefinition>;

export const ConnectionDefinition = z.object({
  from_zone_key: Key,
  to_zone_key: Key,
  connection_type: ConnectionType.default("open"),
  crossing_minutes: z.number().int().nonnegative().default(0),
  requires_skill: z.string().min(1).nullable().default(null),
  skill_difficulty: z.number().int().min(1).max(40).nullable().default(null),
  is_bidirectional: z.boolean().default(true),
  is_passable: z.boolean().default(true),
  blocked_reason: z.string().nullable().default(null),
  is_visible: z.boolean().default(true),
  direction: z.string().nullable().default(null),
});
export type ConnectionDefinition = z.infer<typeof ConnectionDefinition>;

export const LocationDefinition = z.object({
  key: Key,
  display_name: z.string().min(1),
  zone_key: Key,
  visibility: LocationVisibility.default("visible_from_zone"),
  description: z.string().default(""),
});
export type LocationDefinition = z.infer<typeof LocationDefinition>;

export const PreferencesDefinition = z.object({
  favorite_foods: z.array(z.string()).default([]),
  favorite_drinks: z.array(z.string()).default([]),
  disliked_foods: z.array(z.string()).default([]),
  allergies: z.array(z.string()).default([]),
  dietary_flags: z.array(z.string()).default([]),
  alcohol_tolerance: AlcoholTolerance.default("moderate"),
  intimacy_drive: DriveLevel.default("moderate"),
  intimacy_style: IntimacyStyle.default("selective"),
  attraction: z.string().nullable().default(null),
  social_tendency: SocialTendency.default("ambivert"),
  preferred_group_size: z.number().int().min(1).default(3),
  traits: z.array(TraitFlag).default([]),
  age: z.number().int().nonnegative().nullable().default(null),
});
export type PreferencesDefinition = z.infer<typeof PreferencesDefinition>;

export const EntityDefinition = z.object({
  key: Key,
  display_name: z.string().min(1),
  kind: EntityKind.default("npc"),
  current_zone_key: Key.nullable().default(null),
  skills: z.record(z.number().int()).default({}),
  attributes: z.record(z.number().int().min(1).max(30)).default({}),
  extra: z.record(z.string()).default({}),
  /** Omit to create an entity without needs (scenery NPCs) */
  needs: z.record(NeedName, z.number().min(0).max(100)).optional(),
  preferences: PreferencesDefinition.optional(),
});
export type EntityDefinition = z.infer<typeof EntityDefinition>;

export const StartingKnowledge = z.object({
  zone_key: Key,
  method: DiscoveryMethod.default("starting_knowledge"),
});
export type StartingKnowledge = z.infer<typeof StartingKnowledge>;

export const WorldDefinition = z.object({
  name: z.string().min(1),
  minutes_per_turn: z.number().int().positive().default(5),
  zones: z.array(ZoneDefinition).min(1),
  connections: z.array(ConnectionDefinition).default([]),
  locations: z.array(LocationDefinition).default([]),
  entities: z.array(EntityDefinition).default([]),
  known_zones: z.array(StartingKnowledge).default([]),
});
export type WorldDefinition = z.infer<typeof WorldDefinition>;
export type WorldDefinitionInput = z.input<typeof WorldDefinition>;

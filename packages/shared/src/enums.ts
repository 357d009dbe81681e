import { z } from "zod";

// ---------------------------------------------------------------------------
// Needs
// ---------------------------------------------------------------------------
export const NeedName = z.enum([
  "hunger",
  "thirst",
  "stamina",
  "sleep_pressure",
  "hygiene",
  "comfort",
  "wellness",
  "social_connection",
  "morale",
  "sense_of_purpose",
  "intimacy",
]);
export type NeedName = z.infer<typeof NeedName>;

/** Needs that carry a craving overlay */
export const CravingNeed = z.enum([
  "hunger",
  "thirst",
  "social_connection",
  "intimacy",
]);
export type CravingNeed = z.infer<typeof CravingNeed>;

export const ModifierSource = z.enum([
  "trait",
  "age",
  "adaptation",
  "custom",
  "temporary",
]);
export type ModifierSource = z.infer<typeof ModifierSource>;

export const ActivityType = z.enum(["active", "resting", "sleeping", "combat"]);
export type ActivityType = z.infer<typeof ActivityType>;

export const Quality = z.enum([
  "poor",
  "basic",
  "good",
  "excellent",
  "exceptional",
]);
export type Quality = z.infer<typeof Quality>;

// ---------------------------------------------------------------------------
// Stimuli (apply_stimulus)
// ---------------------------------------------------------------------------
export const StimulusType = z.enum([
  "food_sight",
  "drink_sight",
  "social_atmosphere",
  "intimacy_trigger",
  "memory_trigger",
]);
export type StimulusType = z.infer<typeof StimulusType>;

export const StimulusIntensity = z.enum(["mild", "moderate", "strong"]);
export type StimulusIntensity = z.infer<typeof StimulusIntensity>;

// ---------------------------------------------------------------------------
// Character preferences
// ---------------------------------------------------------------------------
export const DriveLevel = z.enum([
  "asexual",
  "very_low",
  "low",
  "moderate",
  "high",
  "very_high",
]);
export type DriveLevel = z.infer<typeof DriveLevel>;

export const IntimacyStyle = z.enum(["casual", "emotional", "selective"]);
export type IntimacyStyle = z.infer<typeof IntimacyStyle>;

export const SocialTendency = z.enum(["introvert", "ambivert", "extrovert"]);
export type SocialTendency = z.infer<typeof SocialTendency>;

export const AlcoholTolerance = z.enum([
  "none",
  "low",
  "moderate",
  "high",
  "very_high",
]);
export type AlcoholTolerance = z.infer<typeof AlcoholTolerance>;

export const TraitFlag = z.enum([
  "greedy_eater",
  "picky_eater",
  "social_butterfly",
  "loner",
  "high_stamina",
  "low_stamina",
  "insomniac",
  "heavy_sleeper",
]);
export type TraitFlag = z.infer<typeof TraitFlag>;

// ---------------------------------------------------------------------------
// Entities
// ---------------------------------------------------------------------------
export const EntityKind = z.enum(["player", "npc", "creature"]);
export type EntityKind = z.infer<typeof EntityKind>;

// ---------------------------------------------------------------------------
// Zones & connections
// ---------------------------------------------------------------------------
export const TerrainType = z.enum([
  "plains",
  "forest",
  "road",
  "trail",
  "mountain",
  "swamp",
  "desert",
  "lake",
  "river",
  "ocean",
  "cliff",
  "cave",
  "urban",
  "ruins",
]);
export type TerrainType = z.infer<typeof TerrainType>;

export const ConnectionType = z.enum([
  "open",
  "path",
  "bridge",
  "climb",
  "swim",
  "door",
  "gate",
  "hidden",
]);
export type ConnectionType = z.infer<typeof ConnectionType>;

export const VisibilityRange = z.enum(["far", "medium", "short", "none"]);
export type VisibilityRange = z.infer<typeof VisibilityRange>;

export const EncounterFrequency = z.enum([
  "none",
  "low",
  "medium",
  "high",
  "very_high",
]);
export type EncounterFrequency = z.infer<typeof EncounterFrequency>;

/** What happens when a traveller fails a zone's skill check */
export const FailureConsequence = z.enum([
  "halt",
  "turn_back",
  "fall_damage",
  "drowning",
  "exhaustion",
  "lost",
]);
export type FailureConsequence = z.infer<typeof FailureConsequence>;

export const LocationVisibility = z.enum([
  "visible_from_zone",
  "hidden",
  "requires_search",
]);
export type LocationVisibility = z.infer<typeof LocationVisibility>;

// ---------------------------------------------------------------------------
// Transport
// ---------------------------------------------------------------------------
export const TransportType = z.enum([
  "walking",
  "running",
  "mounted",
  "swimming",
  "climbing",
  "flying",
  "boat",
  "ship",
  "vehicle",
]);
export type TransportType = z.infer<typeof TransportType>;

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------
export const DiscoveryMethod = z.enum([
  "visited",
  "told_by_npc",
  "map_viewed",
  "digital_lookup",
  "visible_from",
  "starting_knowledge",
]);
export type DiscoveryMethod = z.infer<typeof DiscoveryMethod>;

// ---------------------------------------------------------------------------
// Journeys
// ---------------------------------------------------------------------------
export const JourneyStatus = z.enum([
  "in_progress",
  "awaiting_check",
  "arrived",
  "aborted",
  "halted",
  "interrupted",
]);
export type JourneyStatus = z.infer<typeof JourneyStatus>;

// ---------------------------------------------------------------------------
// Skill checks
// ---------------------------------------------------------------------------
export const Advantage = z.enum(["normal", "advantage", "disadvantage"]);
export type Advantage = z.infer<typeof Advantage>;

export const OutcomeTier = z.enum([
  "exceptional",
  "clear_success",
  "narrow_success",
  "bare_success",
  "partial_failure",
  "clear_failure",
  "catastrophic",
]);
export type OutcomeTier = z.infer<typeof OutcomeTier>;

// ---------------------------------------------------------------------------
// Canonical tool names (17)
// ---------------------------------------------------------------------------
export const ToolName = z.enum([
  "skill_check",
  "satisfy_need",
  "apply_stimulus",
  "check_route",
  "start_travel",
  "advance_travel",
  "resolve_travel_check",
  "abort_travel",
  "move_to_zone",
  "check_terrain",
  "discover_zone",
  "discover_location",
  "get_needs",
  "interrupt_travel",
  "resume_travel",
  "detour_travel",
  "get_journey",
]);
export type ToolName = z.infer<typeof ToolName>;

// ---------------------------------------------------------------------------
// @wayfarer/shared — barrel export
// ---------------------------------------------------------------------------

// Enums
export {
  ActivityType,
  Advantage,
  AlcoholTolerance,
  ConnectionType,
  CravingNeed,
  DiscoveryMethod,
  DriveLevel,
  EncounterFrequency,
  EntityKind,
  FailureConsequence,
  IntimacyStyle,
  JourneyStatus,
  LocationVisibility,
  ModifierSource,
  NeedName,
  OutcomeTier,
  Quality,
  SocialTendency,
  StimulusIntensity,
  StimulusType,
  TerrainType,
  ToolName,
  TraitFlag,
  TransportType,
  VisibilityRange,
} from "./enums.js";

// Tool schemas + shared references
export {
  AbortTravelTool,
  AdvanceTravelTool,
  ApplyStimulusTool,
  CheckRouteTool,
  CheckTerrainTool,
  DetourTravelTool,
  DiscoverLocationTool,
  DiscoverZoneTool,
  GetJourneyTool,
  GetNeedsTool,
  InterruptTravelTool,
  Key,
  MoveToZoneTool,
  ResolveTravelCheckTool,
  ResumeTravelTool,
  SatisfyNeedTool,
  SkillCheckTool,
  StartTravelTool,
  ToolCall,
  type ToolCallInput,
} from "./tools.js";

// Tool results + mutation batch
export type {
  AccessibilityPayload,
  ApplyStimulusPayload,
  DiscoveryPayload,
  JourneyPayload,
  JourneyStatePayload,
  NeedChangeCause,
  NeedPayload,
  NeedsPayload,
  ResolveTravelCheckPayload,
  RoutePayload,
  SatisfyNeedPayload,
  SkillCheckPayload,
  SkillGatePayload,
  StateChange,
  ToolOutcome,
  ToolResultPayload,
  TravelPayload,
  TravelStepPayload,
} from "./results.js";

// World authoring
export {
  ConnectionDefinition,
  EntityDefinition,
  LocationDefinition,
  PreferencesDefinition,
  StartingKnowledge,
  TerrainCosts,
  TransportModeDefinition,
  WorldDefinition,
  type WorldDefinitionInput,
  ZoneDefinition,
  type ZoneDefinitionInput,
} from "./world.js";

// Default transport catalog
export { DEFAULT_TRANSPORT_MODES } from "./catalog.js";

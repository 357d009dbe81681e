import type {
  AlcoholTolerance,
  ConnectionType,
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
  SocialTendency,
  TerrainCosts,
  TerrainType,
  TraitFlag,
  TransportType,
  VisibilityRange,
} from "@wayfarer/shared";

// ---------------------------------------------------------------------------
// Sessions & entities
// ---------------------------------------------------------------------------

export interface GameSession {
  id: string;
  name: string;
  currentTurn: number;
  minutesPerTurn: number;
}

export interface Entity {
  sessionId: string;
  key: string;
  displayName: string;
  kind: EntityKind;
  currentZoneKey: string | null;
  skills: Record<string, number>;
  attributes: Record<string, number>;
  extra: Record<string, string>;
}

/** Everything that identifies the turn a tool call runs in */
export type TurnScope = {
  sessionId: string;
  turn: number;
};

// ---------------------------------------------------------------------------
// Needs
// ---------------------------------------------------------------------------

export interface NeedRecord {
  need: NeedName;
  value: number;
  craving: number;
  lastSatisfiedTurn: number | null;
  lastCommunicatedTurn: number | null;
  lastCommunicatedValue: number | null;
}

export type NeedState = {
  sessionId: string;
  entityKey: string;
  needs: Record<NeedName, NeedRecord>;
};

export interface NeedModifier {
  id: string;
  sessionId: string;
  entityKey: string;
  need: NeedName;
  source: ModifierSource;
  sourceDetail: string;
  decayRateMultiplier: number;
  satisfactionMultiplier: number;
  maxIntensityCap: number | null;
  thresholdAdjustment: number;
  isActive: boolean;
  expiresAtTurn: number | null;
}

export type ModifierKey = Pick<
  NeedModifier,
  "sessionId" | "entityKey" | "need" | "source" | "sourceDetail"
>;

export interface NeedAdaptation {
  id: string;
  sessionId: string;
  entityKey: string;
  need: NeedName;
  delta: number;
  reason: string;
  trigger: string;
  startedTurn: number;
  completedTurn: number | null;
  isGradual: boolean;
  durationDays: number | null;
  isReversible: boolean;
  reversalTrigger: string | null;
  reversedBy: string | null;
}

export interface CharacterPreferences {
  sessionId: string;
  entityKey: string;
  favoriteFoods: string[];
  favoriteDrinks: string[];
  dislikedFoods: string[];
  allergies: string[];
  dietaryFlags: string[];
  alcoholTolerance: AlcoholTolerance;
  intimacyDrive: DriveLevel;
  intimacyStyle: IntimacyStyle;
  attraction: string | null;
  socialTendency: SocialTendency;
  preferredGroupSize: number;
  traits: TraitFlag[];
  age: number | null;
}

// ---------------------------------------------------------------------------
// Geography
// ---------------------------------------------------------------------------

export interface Zone {
  sessionId: string;
  key: string;
  displayName: string;
  terrain: TerrainType;
  parentZoneKey: string | null;
  baseTravelCost: number;
  mountedTravelCost: number | null;
  requiresSkill: string | null;
  skillDifficulty: number | null;
  failureConsequence: FailureConsequence | null;
  visibilityRange: VisibilityRange;
  encounterFrequency: EncounterFrequency;
  isAccessible: boolean;
  blockedReason: string | null;
  description: string;
}

export interface ZoneConnection {
  id: string;
  sessionId: string;
  fromZoneKey: string;
  toZoneKey: string;
  connectionType: ConnectionType;
  crossingMinutes: number;
  requiresSkill: string | null;
  skillDifficulty: number | null;
  isBidirectional: boolean;
  isPassable: boolean;
  blockedReason: string | null;
  isVisible: boolean;
  direction: string | null;
}

export interface Location {
  sessionId: string;
  key: string;
  displayName: string;
  zoneKey: string;
  visibility: LocationVisibility;
  description: string;
}

export interface TransportMode {
  key: string;
  displayName: string;
  type: TransportType;
  terrainCosts: TerrainCosts;
  requiresSkill: string | null;
  requiresItem: string | null;
  fatigueRate: number;
  encounterModifier: number;
}

// ---------------------------------------------------------------------------
// Discovery
// ---------------------------------------------------------------------------

export interface DiscoverySource {
  entityKey?: string;
  mapKey?: string;
  zoneKey?: string;
}

export interface DiscoveryRecord {
  sessionId: string;
  /** Zone key or location key, depending on the table */
  key: string;
  discoveredTurn: number;
  method: DiscoveryMethod;
  sourceEntityKey: string | null;
  sourceMapKey: string | null;
  sourceZoneKey: string | null;
}

// ---------------------------------------------------------------------------
// Travel
// ---------------------------------------------------------------------------

export type SkillGate = {
  zoneKey: string;
  connectionId: string | null;
  skill: string;
  difficulty: number;
  consequence: FailureConsequence | null;
};

export interface Journey {
  id: string;
  sessionId: string;
  entityKey: string;
  originZoneKey: string;
  destinationZoneKey: string;
  transportModeKey: string;
  path: string[];
  /** Connection used to enter `path[i]`; index 0 is always null */
  connectionIds: (string | null)[];
  positionIndex: number;
  elapsedMinutes: number;
  estimatedTotalMinutes: number;
  preferRoads: boolean;
  status: JourneyStatus;
  /** Why an `interrupted` journey stopped (rest, explore, detour) */
  interruptReason: string | null;
  pendingCheck: SkillGate | null;
  visitedZoneKeys: string[];
  createdTurn: number;
  updatedTurn: number;
}

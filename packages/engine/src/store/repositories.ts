import type { ModifierSource, NeedName } from "@wayfarer/shared";
import type {
  CharacterPreferences,
  DiscoveryRecord,
  Entity,
  GameSession,
  Journey,
  Location,
  ModifierKey,
  NeedAdaptation,
  NeedModifier,
  NeedRecord,
  TransportMode,
  Zone,
  ZoneConnection,
} from "../types.js";

// ---------------------------------------------------------------------------
// Repository contracts — one per side table, all scoped by session
// ---------------------------------------------------------------------------

export interface SessionRepository {
  find(sessionId: string): Promise<GameSession | null>;
  create(input: { name: string; minutesPerTurn: number }): Promise<GameSession>;
  setTurn(sessionId: string, turn: number): Promise<void>;
}

export interface EntityRepository {
  find(sessionId: string, key: string): Promise<Entity | null>;
  insert(entity: Entity): Promise<void>;
  setZone(sessionId: string, key: string, zoneKey: string): Promise<void>;
}

export interface NeedRepository {
  /** Empty when the entity's needs were never initialized */
  find(sessionId: string, entityKey: string): Promise<NeedRecord[]>;
  listEntityKeys(sessionId: string): Promise<string[]>;
  save(sessionId: string, entityKey: string, records: NeedRecord[]): Promise<void>;
}

export interface ModifierRepository {
  list(sessionId: string, entityKey: string, need?: NeedName): Promise<NeedModifier[]>;
  find(key: ModifierKey): Promise<NeedModifier | null>;
  /** Insert or replace by (entity, need, source, source_detail) */
  upsert(modifier: Omit<NeedModifier, "id">): Promise<NeedModifier>;
  setActive(key: ModifierKey, isActive: boolean): Promise<boolean>;
  listBySource(
    sessionId: string,
    entityKey: string,
    source: ModifierSource,
  ): Promise<NeedModifier[]>;
  /** Deactivate active modifiers with expires_at_turn <= turn; returns the count */
  expireStale(sessionId: string, turn: number): Promise<number>;
}

export interface AdaptationRepository {
  insert(adaptation: Omit<NeedAdaptation, "id">): Promise<NeedAdaptation>;
  find(sessionId: string, id: string): Promise<NeedAdaptation | null>;
  list(sessionId: string, entityKey: string, need: NeedName): Promise<NeedAdaptation[]>;
  markReversed(sessionId: string, id: string, reversedBy: string): Promise<void>;
}

export interface PreferencesRepository {
  find(sessionId: string, entityKey: string): Promise<CharacterPreferences | null>;
  save(preferences: CharacterPreferences): Promise<void>;
}

export interface ZoneRepository {
  list(sessionId: string): Promise<Zone[]>;
  find(sessionId: string, key: string): Promise<Zone | null>;
  insert(zone: Zone): Promise<void>;
}

export interface ConnectionRepository {
  list(sessionId: string): Promise<ZoneConnection[]>;
  insert(connection: Omit<ZoneConnection, "id">): Promise<ZoneConnection>;
  setVisible(sessionId: string, id: string, isVisible: boolean): Promise<boolean>;
}

export interface LocationRepository {
  list(sessionId: string, zoneKey?: string): Promise<Location[]>;
  find(sessionId: string, key: string): Promise<Location | null>;
  insert(location: Location): Promise<void>;
}

export interface TransportModeRepository {
  find(key: string): Promise<TransportMode | null>;
}

export interface DiscoveryRepository {
  findZone(sessionId: string, zoneKey: string): Promise<DiscoveryRecord | null>;
  /** Returns false (and writes nothing) when the zone is already known */
  insertZone(record: DiscoveryRecord): Promise<boolean>;
  listZones(sessionId: string): Promise<DiscoveryRecord[]>;
  findLocation(sessionId: string, locationKey: string): Promise<DiscoveryRecord | null>;
  insertLocation(record: DiscoveryRecord): Promise<boolean>;
  listLocations(sessionId: string): Promise<DiscoveryRecord[]>;
}

export interface JourneyRepository {
  /** The traveller's journey in progress, awaiting a check, halted or interrupted */
  findActive(sessionId: string, entityKey: string): Promise<Journey | null>;
  insert(journey: Omit<Journey, "id">): Promise<Journey>;
  update(journey: Journey): Promise<void>;
}

export interface Repositories {
  sessions: SessionRepository;
  entities: EntityRepository;
  needs: NeedRepository;
  modifiers: ModifierRepository;
  adaptations: AdaptationRepository;
  preferences: PreferencesRepository;
  zones: ZoneRepository;
  connections: ConnectionRepository;
  locations: LocationRepository;
  transportModes: TransportModeRepository;
  discoveries: DiscoveryRepository;
  journeys: JourneyRepository;
}

/**
 * Transactional entity store. Every tool call runs inside exactly one
 * `transaction`; a thrown error rolls back everything the call wrote.
 */
export interface WorldStore {
  transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T>;
  close(): Promise<void>;
}

export const ACTIVE_JOURNEY_STATUSES = [
  "in_progress",
  "awaiting_check",
  "halted",
  "interrupted",
] as const;

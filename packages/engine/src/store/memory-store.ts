import {
  DEFAULT_TRANSPORT_MODES,
  type ModifierSource,
  type NeedName,
  type TransportModeDefinition,
} from "@wayfarer/shared";
import { randomUUID } from "node:crypto";
import { toTransportMode } from "../navigation/transport.js";
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
import {
  ACTIVE_JOURNEY_STATUSES,
  type Repositories,
  type WorldStore,
} from "./repositories.js";

// ---------------------------------------------------------------------------
// In-process store — tests, local play, and the `STORE=memory` server mode
// ---------------------------------------------------------------------------

type MemoryState = {
  sessions: Map<string, GameSession>;
  entities: Map<string, Entity>;
  needs: Map<string, NeedRecord[]>;
  modifiers: NeedModifier[];
  adaptations: NeedAdaptation[];
  preferences: Map<string, CharacterPreferences>;
  zones: Map<string, Zone>;
  connections: ZoneConnection[];
  locations: Map<string, Location>;
  transportModes: Map<string, TransportMode>;
  zoneDiscoveries: Map<string, DiscoveryRecord>;
  locationDiscoveries: Map<string, DiscoveryRecord>;
  journeys: Journey[];
};

const scoped = (sessionId: string, key: string) => `${sessionId}/${key}`;

const sameModifierKey = (m: NeedModifier, key: ModifierKey) =>
  m.sessionId === key.sessionId &&
  m.entityKey === key.entityKey &&
  m.need === key.need &&
  m.source === key.source &&
  m.sourceDetail === key.sourceDetail;

function isActiveJourney(journey: Journey): boolean {
  return ACTIVE_JOURNEY_STATUSES.some((status) => status === journey.status);
}

export class MemoryWorldStore implements WorldStore {
  private readonly state: MemoryState;
  private readonly repos: Repositories;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    transportModes: TransportModeDefinition[] = DEFAULT_TRANSPORT_MODES,
  ) {
    this.state = {
      sessions: new Map(),
      entities: new Map(),
      needs: new Map(),
      modifiers: [],
      adaptations: [],
      preferences: new Map(),
      zones: new Map(),
      connections: [],
      locations: new Map(),
      transportModes: new Map(
        transportModes.map((def) => [def.key, toTransportMode(def)]),
      ),
      zoneDiscoveries: new Map(),
      locationDiscoveries: new Map(),
      journeys: [],
    };
    this.repos = createMemoryRepositories(this.state);
  }

  /**
   * Run `work` with exclusive access. Transactions are serialized; a thrown
   * error restores the state captured before `work` started.
   */
  transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    const run = async (): Promise<T> => {
      const snapshot = structuredClone(this.state);
      try {
        return await work(this.repos);
      } catch (err) {
        Object.assign(this.state, snapshot);
        throw err;
      }
    };
    const result = this.queue.then(run, run);
    // The caller observes the failure through `result`; the queue only orders
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }

  async close(): Promise<void> {
    await this.queue;
  }
}

// ---------------------------------------------------------------------------
// Repositories over the shared state object
// ---------------------------------------------------------------------------

function createMemoryRepositories(state: MemoryState): Repositories {
  const copy = <T>(value: T): T => structuredClone(value);

  return {
    sessions: {
      async find(sessionId) {
        const session = state.sessions.get(sessionId);
        return session ? copy(session) : null;
      },
      async create(input) {
        const session: GameSession = {
          id: randomUUID(),
          name: input.name,
          currentTurn: 0,
          minutesPerTurn: input.minutesPerTurn,
        };
        state.sessions.set(session.id, session);
        return copy(session);
      },
      async setTurn(sessionId, turn) {
        const session = state.sessions.get(sessionId);
        if (session) session.currentTurn = turn;
      },
    },

    entities: {
      async find(sessionId, key) {
        const entity = state.entities.get(scoped(sessionId, key));
        return entity ? copy(entity) : null;
      },
      async insert(entity) {
        state.entities.set(scoped(entity.sessionId, entity.key), copy(entity));
      },
      async setZone(sessionId, key, zoneKey) {
        const entity = state.entities.get(scoped(sessionId, key));
        if (entity) entity.currentZoneKey = zoneKey;
      },
    },

    needs: {
      async find(sessionId, entityKey) {
        return copy(state.needs.get(scoped(sessionId, entityKey)) ?? []);
      },
      async listEntityKeys(sessionId) {
        return [...state.needs.keys()]
          .filter((k) => k.startsWith(`${sessionId}/`))
          .map((k) => k.slice(sessionId.length + 1))
          .sort();
      },
      async save(sessionId, entityKey, records) {
        const key = scoped(sessionId, entityKey);
        const existing = new Map(
          (state.needs.get(key) ?? []).map((r) => [r.need, r]),
        );
        for (const record of records) existing.set(record.need, copy(record));
        state.needs.set(key, [...existing.values()]);
      },
    },

    modifiers: {
      async list(sessionId, entityKey, need?: NeedName) {
        return copy(
          state.modifiers.filter(
            (m) =>
              m.sessionId === sessionId &&
              m.entityKey === entityKey &&
              (need === undefined || m.need === need),
          ),
        );
      },
      async find(key) {
        const found = state.modifiers.find((m) => sameModifierKey(m, key));
        return found ? copy(found) : null;
      },
      async upsert(modifier) {
        const index = state.modifiers.findIndex((m) =>
          sameModifierKey(m, modifier),
        );
        const id = index >= 0 ? state.modifiers[index].id : randomUUID();
        const row: NeedModifier = { id, ...copy(modifier) };
        if (index >= 0) state.modifiers[index] = row;
        else state.modifiers.push(row);
        return copy(row);
      },
      async setActive(key, isActive) {
        const found = state.modifiers.find((m) => sameModifierKey(m, key));
        if (!found) return false;
        found.isActive = isActive;
        return true;
      },
      async listBySource(sessionId, entityKey, source: ModifierSource) {
        return copy(
          state.modifiers.filter(
            (m) =>
              m.sessionId === sessionId &&
              m.entityKey === entityKey &&
              m.source === source,
          ),
        );
      },
      async expireStale(sessionId, turn) {
        let count = 0;
        for (const m of state.modifiers) {
          if (
            m.sessionId === sessionId &&
            m.isActive &&
            m.expiresAtTurn !== null &&
            m.expiresAtTurn <= turn
          ) {
            m.isActive = false;
            count++;
          }
        }
        return count;
      },
    },

    adaptations: {
      async insert(adaptation) {
        const row: NeedAdaptation = { id: randomUUID(), ...copy(adaptation) };
        state.adaptations.push(row);
        return copy(row);
      },
      async find(sessionId, id) {
        const found = state.adaptations.find(
          (a) => a.sessionId === sessionId && a.id === id,
        );
        return found ? copy(found) : null;
      },
      async list(sessionId, entityKey, need) {
        return copy(
          state.adaptations.filter(
            (a) =>
              a.sessionId === sessionId &&
              a.entityKey === entityKey &&
              a.need === need,
          ),
        );
      },
      async markReversed(sessionId, id, reversedBy) {
        const found = state.adaptations.find(
          (a) => a.sessionId === sessionId && a.id === id,
        );
        if (found) found.reversedBy = reversedBy;
      },
    },

    preferences: {
      async find(sessionId, entityKey) {
        const prefs = state.preferences.get(scoped(sessionId, entityKey));
        return prefs ? copy(prefs) : null;
      },
      async save(preferences) {
        state.preferences.set(
          scoped(preferences.sessionId, preferences.entityKey),
          copy(preferences),
        );
      },
    },

    zones: {
      async list(sessionId) {
        return copy(
          [...state.zones.values()].filter((z) => z.sessionId === sessionId),
        );
      },
      async find(sessionId, key) {
        const zone = state.zones.get(scoped(sessionId, key));
        return zone ? copy(zone) : null;
      },
      async insert(zone) {
        state.zones.set(scoped(zone.sessionId, zone.key), copy(zone));
      },
    },

    connections: {
      async list(sessionId) {
        return copy(state.connections.filter((c) => c.sessionId === sessionId));
      },
      async insert(connection) {
        const row: ZoneConnection = { id: randomUUID(), ...copy(connection) };
        state.connections.push(row);
        return copy(row);
      },
      async setVisible(sessionId, id, isVisible) {
        const found = state.connections.find(
          (c) => c.sessionId === sessionId && c.id === id,
        );
        if (!found) return false;
        found.isVisible = isVisible;
        return true;
      },
    },

    locations: {
      async list(sessionId, zoneKey) {
        return copy(
          [...state.locations.values()].filter(
            (l) =>
              l.sessionId === sessionId &&
              (zoneKey === undefined || l.zoneKey === zoneKey),
          ),
        );
      },
      async find(sessionId, key) {
        const found = state.locations.get(scoped(sessionId, key));
        return found ? copy(found) : null;
      },
      async insert(location) {
        state.locations.set(
          scoped(location.sessionId, location.key),
          copy(location),
        );
      },
    },

    transportModes: {
      async find(key) {
        const mode = state.transportModes.get(key);
        return mode ? copy(mode) : null;
      },
    },

    discoveries: {
      async findZone(sessionId, zoneKey) {
        const found = state.zoneDiscoveries.get(scoped(sessionId, zoneKey));
        return found ? copy(found) : null;
      },
      async insertZone(record) {
        const key = scoped(record.sessionId, record.key);
        if (state.zoneDiscoveries.has(key)) return false;
        state.zoneDiscoveries.set(key, copy(record));
        return true;
      },
      async listZones(sessionId) {
        return copy(
          [...state.zoneDiscoveries.values()].filter(
            (d) => d.sessionId === sessionId,
          ),
        );
      },
      async findLocation(sessionId, locationKey) {
        const found = state.locationDiscoveries.get(
          scoped(sessionId, locationKey),
        );
        return found ? copy(found) : null;
      },
      async insertLocation(record) {
        const key = scoped(record.sessionId, record.key);
        if (state.locationDiscoveries.has(key)) return false;
        state.locationDiscoveries.set(key, copy(record));
        return true;
      },
      async listLocations(sessionId) {
        return copy(
          [...state.locationDiscoveries.values()].filter(
            (d) => d.sessionId === sessionId,
          ),
        );
      },
    },

    journeys: {
      async findActive(sessionId, entityKey) {
        const found = state.journeys.find(
          (j) =>
            j.sessionId === sessionId &&
            j.entityKey === entityKey &&
            isActiveJourney(j),
        );
        return found ? copy(found) : null;
      },
      async insert(journey) {
        const row: Journey = { id: randomUUID(), ...copy(journey) };
        state.journeys.push(row);
        return copy(row);
      },
      async update(journey) {
        const index = state.journeys.findIndex((j) => j.id === journey.id);
        if (index >= 0) state.journeys[index] = copy(journey);
      },
    },
  };
}

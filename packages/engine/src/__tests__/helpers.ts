import {
  DEFAULT_TRANSPORT_MODES,
  type NeedName,
  type TerrainType,
  type WorldDefinitionInput,
} from "@wayfarer/shared";
import pino from "pino";
import { DEFAULT_ENGINE_CONFIG } from "../config.js";
import type { RandomSource } from "../dice/random.js";
import { createEngine, type Engine } from "../engine.js";
import { toTransportMode } from "../navigation/transport.js";
import { DEFAULT_SATISFACTION_CATALOG } from "../needs/satisfaction-catalog.js";
import { createTurnServices, type EngineDeps, type TurnServices } from "../services.js";
import { MemoryWorldStore } from "../store/memory-store.js";
import type { Repositories } from "../store/repositories.js";
import type { Entity, TransportMode, Zone, ZoneConnection } from "../types.js";

// ---------------------------------------------------------------------------
// Deterministic collaborators
// ---------------------------------------------------------------------------

/** Plays back the given values in order; fails the test when it runs dry */
export function scriptedRandom(values: number[]): RandomSource {
  const queue = [...values];
  return {
    int(min, max) {
      const next = queue.shift();
      if (next === undefined) throw new Error("scriptedRandom exhausted");
      if (next < min || next > max) {
        throw new Error(`scripted value ${next} outside [${min}, ${max}]`);
      }
      return next;
    },
  };
}

/** Always returns the same value, e.g. 1 for "no encounter on a d100" */
export function constantRandom(value: number): RandomSource {
  return { int: (min, max) => Math.min(max, Math.max(min, value)) };
}

export const silentLogger = pino({ level: "silent" });

export function testDeps(overrides: Partial<EngineDeps> = {}): EngineDeps {
  return {
    config: DEFAULT_ENGINE_CONFIG,
    rng: constantRandom(1),
    catalog: DEFAULT_SATISFACTION_CATALOG,
    logger: silentLogger,
    ...overrides,
  };
}

export function transportMode(key: string): TransportMode {
  const def = DEFAULT_TRANSPORT_MODES.find((m) => m.key === key);
  if (!def) throw new Error(`unknown transport mode ${key}`);
  return toTransportMode(def);
}

// ---------------------------------------------------------------------------
// Graph builders for pure pathfinding tests
// ---------------------------------------------------------------------------

export function makeZone(
  key: string,
  terrain: TerrainType,
  overrides: Partial<Zone> = {},
): Zone {
  return {
    sessionId: "s",
    key,
    displayName: key,
    terrain,
    parentZoneKey: null,
    baseTravelCost: 10,
    mountedTravelCost: null,
    requiresSkill: null,
    skillDifficulty: null,
    failureConsequence: null,
    visibilityRange: "medium",
    encounterFrequency: "none",
    isAccessible: true,
    blockedReason: null,
    description: "",
    ...overrides,
  };
}

export function makeConnection(
  id: string,
  from: string,
  to: string,
  crossingMinutes: number,
  overrides: Partial<ZoneConnection> = {},
): ZoneConnection {
  return {
    id,
    sessionId: "s",
    fromZoneKey: from,
    toZoneKey: to,
    connectionType: "path",
    crossingMinutes,
    requiresSkill: null,
    skillDifficulty: null,
    isBidirectional: true,
    isPassable: true,
    blockedReason: null,
    isVisible: true,
    direction: null,
    ...overrides,
  };
}

// ---------------------------------------------------------------------------
// Store-backed fixtures
// ---------------------------------------------------------------------------

export type Fixture = {
  store: MemoryWorldStore;
  deps: EngineDeps;
  sessionId: string;
};

/** A session holding one entity, optionally with needs */
export async function entityFixture(
  options: {
    needs?: Partial<Record<NeedName, number>> | null;
    deps?: Partial<EngineDeps>;
    entity?: Partial<Pick<Entity, "skills" | "attributes" | "currentZoneKey">>;
  } = {},
): Promise<Fixture> {
  const store = new MemoryWorldStore();
  const deps = testDeps(options.deps);
  const sessionId = await store.transaction(async (repos) => {
    const session = await repos.sessions.create({ name: "test", minutesPerTurn: 5 });
    await repos.entities.insert({
      sessionId: session.id,
      key: "aria",
      displayName: "Aria",
      kind: "player",
      currentZoneKey: null,
      skills: {},
      attributes: {},
      extra: {},
      ...options.entity,
    });
    if (options.needs !== null) {
      const services = createTurnServices(repos, { sessionId: session.id, turn: 0 }, deps);
      await services.needs.initializeNeeds("aria", options.needs ?? {});
    }
    return session.id;
  });
  return { store, deps, sessionId };
}

/** Run `work` in one transaction with services bound to `turn` */
export function inTurn<T>(
  fixture: Fixture,
  work: (services: TurnServices, repos: Repositories) => Promise<T>,
  turn = 0,
): Promise<T> {
  return fixture.store.transaction((repos) =>
    work(createTurnServices(repos, { sessionId: fixture.sessionId, turn }, fixture.deps), repos),
  );
}

// ---------------------------------------------------------------------------
// A small valley for travel and executor tests
// ---------------------------------------------------------------------------
//
//   village(urban) ─5─ road(road) ─5─ forest(forest) ─10─ ridge(mountain, climb DC 14)
//                        │                                    │
//                        └─────20──── meadow(plains) ──5────── peak(mountain)
//   forest ─(hidden, 2)─ glade(forest)        ruins: far away, never connected

export const VALLEY: WorldDefinitionInput = {
  name: "Valley",
  minutes_per_turn: 10,
  zones: [
    { key: "valley", display_name: "The Valley", terrain: "plains", visibility_range: "none", encounter_frequency: "none" },
    { key: "village", display_name: "Village", terrain: "urban", parent_zone_key: "valley", base_travel_cost: 5, visibility_range: "short", encounter_frequency: "none" },
    { key: "road", display_name: "East Road", terrain: "road", parent_zone_key: "valley", base_travel_cost: 10, visibility_range: "short", encounter_frequency: "none" },
    { key: "forest", display_name: "Dark Forest", terrain: "forest", parent_zone_key: "valley", base_travel_cost: 10, visibility_range: "short", encounter_frequency: "none" },
    { key: "meadow", display_name: "Meadow", terrain: "plains", parent_zone_key: "valley", base_travel_cost: 10, visibility_range: "short", encounter_frequency: "none" },
    {
      key: "ridge",
      display_name: "Ridge",
      terrain: "mountain",
      base_travel_cost: 10,
      requires_skill: "climbing",
      skill_difficulty: 14,
      failure_consequence: "fall_damage",
      visibility_range: "short",
      encounter_frequency: "none",
    },
    { key: "peak", display_name: "Peak", terrain: "mountain", base_travel_cost: 10, visibility_range: "far", encounter_frequency: "none" },
    { key: "glade", display_name: "Hidden Glade", terrain: "forest", base_travel_cost: 10, visibility_range: "short", encounter_frequency: "none" },
    { key: "ruins", display_name: "Old Ruins", terrain: "ruins", visibility_range: "short", encounter_frequency: "none" },
  ],
  connections: [
    { from_zone_key: "village", to_zone_key: "road", crossing_minutes: 5 },
    { from_zone_key: "road", to_zone_key: "forest", crossing_minutes: 5 },
    { from_zone_key: "forest", to_zone_key: "ridge", crossing_minutes: 10 },
    { from_zone_key: "road", to_zone_key: "meadow", crossing_minutes: 20 },
    { from_zone_key: "meadow", to_zone_key: "peak", crossing_minutes: 5 },
    { from_zone_key: "ridge", to_zone_key: "peak", crossing_minutes: 5 },
    { from_zone_key: "forest", to_zone_key: "glade", crossing_minutes: 2, is_visible: false, connection_type: "hidden" },
  ],
  locations: [
    { key: "inn", display_name: "The Inn", zone_key: "village" },
    { key: "cellar", display_name: "Cellar", zone_key: "village", visibility: "hidden" },
  ],
  entities: [
    {
      key: "aria",
      display_name: "Aria",
      kind: "player",
      current_zone_key: "village",
      skills: { climbing: 2 },
      attributes: { strength: 12 },
      needs: {},
    },
    { key: "statue", display_name: "Statue", kind: "npc", current_zone_key: "village" },
  ],
  known_zones: [{ zone_key: "forest" }, { zone_key: "ridge" }, { zone_key: "ruins" }],
};

export async function valleyEngine(
  options: { rng?: RandomSource; diceSigningSecret?: string } = {},
): Promise<{ engine: Engine; store: MemoryWorldStore; sessionId: string }> {
  const store = new MemoryWorldStore();
  const engine = createEngine(store, {
    rng: options.rng ?? constantRandom(1),
    diceSigningSecret: options.diceSigningSecret,
    logger: silentLogger,
  });
  const { session } = await engine.loadWorld(VALLEY);
  return { engine, store, sessionId: session.id };
}

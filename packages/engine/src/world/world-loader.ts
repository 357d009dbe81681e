import {
  WorldDefinition,
  type PreferencesDefinition,
  type WorldDefinitionInput,
  type ZoneDefinition,
} from "@wayfarer/shared";
import { InvariantViolationError } from "../errors.js";
import { ZoneGraph } from "../navigation/zone-graph.js";
import { defaultPreferences } from "../needs/preferences.js";
import { createTurnServices, type EngineDeps } from "../services.js";
import type { Repositories } from "../store/repositories.js";
import type { CharacterPreferences, GameSession, Zone } from "../types.js";

export type LoadedWorld = {
  session: GameSession;
  zones: number;
  connections: number;
  locations: number;
  entities: number;
};

/** Parents before children; throws on missing parents and cycles */
export function orderZonesParentFirst(zones: ZoneDefinition[]): ZoneDefinition[] {
  const byKey = new Map(zones.map((z) => [z.key, z]));
  if (byKey.size !== zones.length) {
    throw new InvariantViolationError("Zone keys must be unique within a world");
  }
  const ordered: ZoneDefinition[] = [];
  const state = new Map<string, "visiting" | "done">();

  const visit = (zone: ZoneDefinition): void => {
    const mark = state.get(zone.key);
    if (mark === "done") return;
    if (mark === "visiting") {
      throw new InvariantViolationError(`Zone hierarchy cycle at "${zone.key}"`);
    }
    state.set(zone.key, "visiting");
    if (zone.parent_zone_key !== null) {
      const parent = byKey.get(zone.parent_zone_key);
      if (!parent) {
        throw new InvariantViolationError(
          `Zone "${zone.key}" references missing parent "${zone.parent_zone_key}"`,
        );
      }
      visit(parent);
    }
    state.set(zone.key, "done");
    ordered.push(zone);
  };

  for (const zone of zones) visit(zone);
  return ordered;
}

function requireUniqueKeys(items: { key: string }[], what: string): void {
  const seen = new Set<string>();
  for (const { key } of items) {
    if (seen.has(key)) {
      throw new InvariantViolationError(`${what} key "${key}" appears more than once`);
    }
    seen.add(key);
  }
}

function toZone(sessionId: string, def: ZoneDefinition): Zone {
  return {
    sessionId,
    key: def.key,
    displayName: def.display_name,
    terrain: def.terrain,
    parentZoneKey: def.parent_zone_key,
    baseTravelCost: def.base_travel_cost,
    mountedTravelCost: def.mounted_travel_cost,
    requiresSkill: def.requires_skill,
    skillDifficulty: def.skill_difficulty,
    failureConsequence: def.failure_consequence,
    visibilityRange: def.visibility_range,
    encounterFrequency: def.encounter_frequency,
    isAccessible: def.is_accessible,
    blockedReason: def.blocked_reason,
    description: def.description,
  };
}

function toPreferences(
  sessionId: string,
  entityKey: string,
  def: PreferencesDefinition,
): CharacterPreferences {
  return {
    sessionId,
    entityKey,
    favoriteFoods: def.favorite_foods,
    favoriteDrinks: def.favorite_drinks,
    dislikedFoods: def.disliked_foods,
    allergies: def.allergies,
    dietaryFlags: def.dietary_flags,
    alcoholTolerance: def.alcohol_tolerance,
    intimacyDrive: def.intimacy_drive,
    intimacyStyle: def.intimacy_style,
    attraction: def.attraction,
    socialTendency: def.social_tendency,
    preferredGroupSize: def.preferred_group_size,
    traits: def.traits,
    age: def.age,
  };
}

/**
 * Create a session from a world definition: geography first, then entities
 * with their needs and preference-driven modifiers, then starting knowledge.
 * Players standing in a zone see their surroundings straight away.
 */
export async function loadWorld(
  repos: Repositories,
  deps: EngineDeps,
  input: WorldDefinitionInput,
): Promise<LoadedWorld> {
  const world = WorldDefinition.parse(input);
  requireUniqueKeys(world.locations, "Location");
  requireUniqueKeys(world.entities, "Entity");
  const zoneKeys = new Set(world.zones.map((z) => z.key));
  const requireZone = (key: string, what: string): void => {
    if (!zoneKeys.has(key)) {
      throw new InvariantViolationError(`${what} references unknown zone "${key}"`);
    }
  };

  const session = await repos.sessions.create({
    name: world.name,
    minutesPerTurn: world.minutes_per_turn,
  });
  const sessionId = session.id;
  const services = createTurnServices(
    repos,
    { sessionId, turn: session.currentTurn },
    deps,
  );

  for (const def of orderZonesParentFirst(world.zones)) {
    await repos.zones.insert(toZone(sessionId, def));
  }

  for (const def of world.connections) {
    requireZone(def.from_zone_key, "Connection");
    requireZone(def.to_zone_key, "Connection");
    await repos.connections.insert({
      sessionId,
      fromZoneKey: def.from_zone_key,
      toZoneKey: def.to_zone_key,
      connectionType: def.connection_type,
      crossingMinutes: def.crossing_minutes,
      requiresSkill: def.requires_skill,
      skillDifficulty: def.skill_difficulty,
      isBidirectional: def.is_bidirectional,
      isPassable: def.is_passable,
      blockedReason: def.blocked_reason,
      isVisible: def.is_visible,
      direction: def.direction,
    });
  }
  const graph = await ZoneGraph.load(repos, sessionId);
  graph.validateHierarchy();

  for (const def of world.locations) {
    requireZone(def.zone_key, `Location "${def.key}"`);
    await repos.locations.insert({
      sessionId,
      key: def.key,
      displayName: def.display_name,
      zoneKey: def.zone_key,
      visibility: def.visibility,
      description: def.description,
    });
  }

  for (const def of world.entities) {
    if (def.current_zone_key !== null) requireZone(def.current_zone_key, `Entity "${def.key}"`);
    await repos.entities.insert({
      sessionId,
      key: def.key,
      displayName: def.display_name,
      kind: def.kind,
      currentZoneKey: def.current_zone_key,
      skills: def.skills,
      attributes: def.attributes,
      extra: def.extra,
    });

    const preferences = def.preferences
      ? toPreferences(sessionId, def.key, def.preferences)
      : def.needs
        ? defaultPreferences(sessionId, def.key)
        : null;
    if (preferences) {
      await repos.preferences.save(preferences);
      await services.modifiers.syncTraitModifiers(def.key, preferences.traits);
      await services.modifiers.syncAgeModifiers(def.key, preferences.age);
    }
    if (def.needs) {
      await services.needs.initializeNeeds(def.key, def.needs);
    }
  }

  for (const known of world.known_zones) {
    requireZone(known.zone_key, "Starting knowledge");
    await services.discovery.discoverZone(known.zone_key, known.method);
  }
  for (const def of world.entities) {
    if (def.kind === "player" && def.current_zone_key !== null) {
      await services.discovery.autoDiscoverSurroundings(def.current_zone_key, graph);
    }
  }

  deps.logger.info(
    { sessionId, zones: world.zones.length, entities: world.entities.length },
    "world_loaded",
  );
  return {
    session,
    zones: world.zones.length,
    connections: world.connections.length,
    locations: world.locations.length,
    entities: world.entities.length,
  };
}

import type {
  Advantage,
  EncounterFrequency,
  FailureConsequence,
  NeedName,
  TerrainType,
} from "@wayfarer/shared";
import type { ChangeLog } from "../changes.js";
import type { RandomSource } from "../dice/random.js";
import type { SkillChecker, SkillCheckResult } from "../dice/skill-check.js";
import {
  EntityNotFoundError,
  InvariantViolationError,
  JourneyNotFoundError,
  ZoneNotFoundError,
} from "../errors.js";
import type { NeedsEngine } from "../needs/needs-engine.js";
import type { Repositories } from "../store/repositories.js";
import type {
  Entity,
  Journey,
  SkillGate,
  TransportMode,
  TurnScope,
  Zone,
} from "../types.js";
import type { DiscoveryTracker } from "./discovery.js";
import {
  edgeCost,
  findPath,
  stepGate,
  type PathResult,
  type Pathfinder,
} from "./pathfinding.js";
import { zoneTraversalMinutes } from "./transport.js";
import type { Edge, ZoneGraph } from "./zone-graph.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type EncounterRoll = {
  rolled: number;
  threshold: number;
  triggered: boolean;
};

export type TravelStep = {
  fromZoneKey: string;
  toZoneKey: string;
  minutes: number;
  encounter: EncounterRoll;
  zonesDiscovered: string[];
};

export type TravelOutcome = {
  success: boolean;
  reason: string | null;
  journey: Journey | null;
  steps: TravelStep[];
  checkRequired: SkillGate | null;
};

export type NeedPenalty = { need: NeedName; amount: number };

export type CheckResolution = {
  check: SkillCheckResult;
  consequence: FailureConsequence | null;
  needPenalty: NeedPenalty | null;
  journey: Journey;
  step: TravelStep | null;
};

export type JourneyProgress = {
  journey: Journey;
  /** Share of the path's legs already walked, 0-100 */
  progressPercent: number;
  zonesRemaining: number;
};

export type RouteRequest = {
  destinationZoneKey: string;
  modeKey: string;
  preferRoads?: boolean;
  /** Plan from here instead of the traveller's current zone */
  fromZoneKey?: string;
};

/** A d100 at or above the threshold triggers an encounter; 101 never does */
export const ENCOUNTER_THRESHOLDS: Record<EncounterFrequency, number> = {
  none: 101,
  low: 85,
  medium: 65,
  high: 40,
  very_high: 20,
};

type ConsequenceEffect = {
  stepBack: boolean;
  penalty: NeedPenalty | null;
  extraMinutes: number;
};

export const CONSEQUENCE_EFFECTS: Record<FailureConsequence, ConsequenceEffect> = {
  halt: { stepBack: false, penalty: null, extraMinutes: 0 },
  turn_back: { stepBack: true, penalty: null, extraMinutes: 0 },
  fall_damage: { stepBack: false, penalty: { need: "wellness", amount: -20 }, extraMinutes: 0 },
  drowning: { stepBack: true, penalty: { need: "wellness", amount: -25 }, extraMinutes: 0 },
  exhaustion: { stepBack: false, penalty: { need: "stamina", amount: -30 }, extraMinutes: 0 },
  lost: { stepBack: false, penalty: { need: "morale", amount: -5 }, extraMinutes: 60 },
};

/** Encounter threshold after the transport mode scales the zone's chance */
export function encounterThreshold(
  frequency: EncounterFrequency,
  encounterModifier: number,
): number {
  const chance = Math.round((101 - ENCOUNTER_THRESHOLDS[frequency]) * encounterModifier);
  return Math.max(1, 101 - Math.min(100, chance));
}

/** Minutes for one step: crossing the connection, then the zone itself */
export function stepMinutes(crossing: number, zone: Zone, mode: TransportMode): number {
  return Math.round(crossing + (zoneTraversalMinutes(zone, mode) ?? 0));
}

export function estimateJourneyMinutes(
  graph: ZoneGraph,
  route: PathResult,
  mode: TransportMode,
): number {
  let total = 0;
  for (let i = 1; i < route.path.length; i++) {
    total += stepMinutes(route.edgeCosts[i], graph.zone(route.path[i]), mode);
  }
  return total;
}

export function journeyProgress(journey: Journey): JourneyProgress {
  const legs = journey.path.length - 1;
  return {
    journey,
    progressPercent: legs <= 0 ? 100 : Math.round((journey.positionIndex / legs) * 100),
    zonesRemaining: Math.max(0, legs - journey.positionIndex),
  };
}

const fail = (reason: string, journey: Journey | null = null): TravelOutcome => ({
  success: false,
  reason,
  journey,
  steps: [],
  checkRequired: null,
});

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

/**
 * Turns routes into resumable journeys. Each step moves one zone, costs real
 * minutes fed to the traveller's needs, and may stop on a skill gate until
 * the check is resolved.
 */
export class TravelOrchestrator {
  constructor(
    private readonly repos: Repositories,
    private readonly scope: TurnScope,
    private readonly changes: ChangeLog,
    private readonly needs: NeedsEngine,
    private readonly discovery: DiscoveryTracker,
    private readonly pathfinder: Pathfinder,
    private readonly checker: SkillChecker,
    private readonly rng: RandomSource,
    private readonly roadBias: number,
  ) {}

  // -------------------------------------------------------------------------
  // Planning
  // -------------------------------------------------------------------------

  /** Route for the traveller; unknown destinations are never planned */
  async planRoute(entityKey: string, request: RouteRequest): Promise<PathResult> {
    const entity = await this.requireEntity(entityKey);
    const mode = await this.pathfinder.requireMode(request.modeKey);
    const graph = await this.pathfinder.loadGraph();
    const fromKey = request.fromZoneKey ?? entity.currentZoneKey;
    if (fromKey === null) {
      return unplanned(`${entity.displayName} is not in any zone`);
    }
    const destination = graph.zone(request.destinationZoneKey);
    if (!graph.has(fromKey)) throw new ZoneNotFoundError(fromKey);
    if (!(await this.discovery.isZoneDiscovered(destination.key))) {
      return unplanned(
        `Destination "${destination.key}" is unknown; it must be discovered before travelling there`,
        fromKey,
      );
    }
    return findPath(
      graph,
      fromKey,
      destination.key,
      mode,
      { preferRoads: request.preferRoads ?? false },
      this.roadBias,
    );
  }

  // -------------------------------------------------------------------------
  // Journey lifecycle
  // -------------------------------------------------------------------------

  async startJourney(
    entityKey: string,
    destinationZoneKey: string,
    modeKey: string,
    preferRoads = false,
  ): Promise<TravelOutcome> {
    const entity = await this.requireEntity(entityKey);
    await this.needs.requireNeeds(entityKey);
    const destination = await this.repos.zones.find(this.scope.sessionId, destinationZoneKey);
    if (!destination) throw new ZoneNotFoundError(destinationZoneKey);

    const active = await this.repos.journeys.findActive(this.scope.sessionId, entityKey);
    if (active) {
      return fail(
        `${entity.displayName} is already travelling to "${active.destinationZoneKey}"`,
        active,
      );
    }
    if (entity.currentZoneKey === destinationZoneKey) {
      return fail(`${entity.displayName} is already in ${destination.displayName}`);
    }

    const route = await this.planRoute(entityKey, {
      destinationZoneKey,
      modeKey,
      preferRoads,
    });
    if (!route.found) {
      return fail(route.reason ?? "No route");
    }

    const mode = await this.pathfinder.requireMode(modeKey);
    const graph = await this.pathfinder.loadGraph();
    const journey = await this.createJourney(entity, route, mode, graph, preferRoads);
    return { success: true, reason: null, journey, steps: [], checkRequired: null };
  }

  /** Advance up to `steps` zones; stops early on arrival, a gate, or a blockage */
  async advanceJourney(entityKey: string, steps = 1): Promise<TravelOutcome> {
    if (!Number.isInteger(steps) || steps < 1) {
      throw new InvariantViolationError(`steps must be a positive integer, got ${steps}`);
    }
    const journey = await this.requireJourney(entityKey);
    if (journey.status === "awaiting_check") return pendingCheck(journey);
    if (journey.status === "interrupted") {
      return fail("The journey is interrupted; resume it before moving on", journey);
    }
    journey.status = "in_progress";

    const mode = await this.pathfinder.requireMode(journey.transportModeKey);
    const graph = await this.pathfinder.loadGraph();
    const taken: TravelStep[] = [];

    for (let i = 0; i < steps && journey.status === "in_progress"; i++) {
      const edge = this.nextEdge(journey, graph);
      const cost = edge ? edgeCost(graph, edge, mode) : null;
      if (!edge || cost === null) {
        journey.status = "halted";
        await this.save(journey);
        const blocked = graph.zone(journey.path[journey.positionIndex + 1]);
        return {
          success: false,
          reason: `Path blocked at ${blocked.displayName}${blocked.blockedReason ? `: ${blocked.blockedReason}` : ""}`,
          journey,
          steps: taken,
          checkRequired: null,
        };
      }

      const gate = stepGate(edge.connection, graph.zone(edge.to));
      if (gate) {
        journey.status = "awaiting_check";
        journey.pendingCheck = gate;
        await this.save(journey);
        return { success: true, reason: null, journey, steps: taken, checkRequired: gate };
      }

      taken.push(await this.takeStep(journey, graph, edge, cost, mode));
    }

    await this.save(journey);
    return { success: true, reason: null, journey, steps: taken, checkRequired: null };
  }

  /**
   * Roll the pending gate. Success enters the gated zone; failure applies the
   * zone's consequence and halts the journey where the traveller ends up.
   */
  async resolvePendingCheck(
    entityKey: string,
    advantage: Advantage = "normal",
  ): Promise<CheckResolution> {
    const journey = await this.requireJourney(entityKey);
    const gate = journey.pendingCheck;
    if (journey.status !== "awaiting_check" || gate === null) {
      throw new InvariantViolationError(`No skill check is pending for "${entityKey}"`);
    }

    const check = await this.checker.check(entityKey, {
      skillName: gate.skill,
      dc: gate.difficulty,
      advantage,
    });
    journey.pendingCheck = null;

    const mode = await this.pathfinder.requireMode(journey.transportModeKey);
    const graph = await this.pathfinder.loadGraph();

    if (check.success) {
      journey.status = "in_progress";
      const edge = this.nextEdge(journey, graph);
      const cost = edge ? edgeCost(graph, edge, mode) : null;
      if (!edge || cost === null) {
        journey.status = "halted";
        await this.save(journey);
        return { check, consequence: null, needPenalty: null, journey, step: null };
      }
      const step = await this.takeStep(journey, graph, edge, cost, mode);
      await this.save(journey);
      return { check, consequence: null, needPenalty: null, journey, step };
    }

    const consequence = gate.consequence ?? "halt";
    const effect = CONSEQUENCE_EFFECTS[consequence];
    let step: TravelStep | null = null;
    if (effect.stepBack) {
      step = await this.stepBack(journey, graph, mode);
    }
    if (effect.extraMinutes > 0) {
      await this.spendMinutes(entityKey, effect.extraMinutes, mode);
      journey.elapsedMinutes += effect.extraMinutes;
    }
    if (effect.penalty) {
      await this.needs.adjustNeed(entityKey, effect.penalty.need, effect.penalty.amount);
    }
    journey.status = "halted";
    await this.save(journey);
    return { check, consequence, needPenalty: effect.penalty, journey, step };
  }

  /** Stop at the current zone; discoveries made on the way stay */
  async abortJourney(entityKey: string, reason?: string): Promise<TravelOutcome> {
    const journey = await this.requireJourney(entityKey);
    journey.status = "aborted";
    journey.pendingCheck = null;
    await this.save(journey);
    return {
      success: true,
      reason: reason ?? null,
      journey,
      steps: [],
      checkRequired: null,
    };
  }

  /** Pause where the traveller stands; the route and position are kept */
  async interruptJourney(entityKey: string, reason: string): Promise<TravelOutcome> {
    const journey = await this.requireJourney(entityKey);
    if (journey.status === "interrupted") {
      return fail(
        `The journey is already interrupted (${journey.interruptReason ?? "no reason"})`,
        journey,
      );
    }
    // A gate left pending is met again once the journey moves on
    journey.status = "interrupted";
    journey.interruptReason = reason;
    journey.pendingCheck = null;
    await this.save(journey);
    return { success: true, reason, journey, steps: [], checkRequired: null };
  }

  async resumeJourney(entityKey: string): Promise<TravelOutcome> {
    const journey = await this.requireJourney(entityKey);
    if (journey.status !== "interrupted") {
      return fail("The journey is not interrupted", journey);
    }
    journey.status = "in_progress";
    journey.interruptReason = null;
    await this.save(journey);
    return { success: true, reason: null, journey, steps: [], checkRequired: null };
  }

  /**
   * Side trip from the route. The way out and the way back are spliced into
   * the path at the traveller's position, the traveller walks out, and the
   * journey is left interrupted at the detour zone. Resuming leads back onto
   * the route.
   */
  async detourToZone(entityKey: string, zoneKey: string): Promise<TravelOutcome> {
    const journey = await this.requireJourney(entityKey);
    if (journey.status === "awaiting_check") return pendingCheck(journey);

    const graph = await this.pathfinder.loadGraph();
    const mode = await this.pathfinder.requireMode(journey.transportModeKey);
    const here = journey.path[journey.positionIndex];
    const target = graph.zone(zoneKey);
    if (here === zoneKey) {
      return fail(`The journey already stands in ${target.displayName}`, journey);
    }

    const outbound = await this.planRoute(entityKey, {
      destinationZoneKey: zoneKey,
      modeKey: mode.key,
      preferRoads: journey.preferRoads,
      fromZoneKey: here,
    });
    if (!outbound.found) return fail(outbound.reason ?? "No route", journey);
    const back = findPath(
      graph,
      zoneKey,
      here,
      mode,
      { preferRoads: journey.preferRoads },
      this.roadBias,
    );
    if (!back.found) {
      return fail(
        `No way back from ${target.displayName} to ${graph.zone(here).displayName}`,
        journey,
      );
    }

    const at = journey.positionIndex + 1;
    journey.path = [
      ...journey.path.slice(0, at),
      ...outbound.path.slice(1),
      ...back.path.slice(1),
      ...journey.path.slice(at),
    ];
    journey.connectionIds = [
      ...journey.connectionIds.slice(0, at),
      ...outbound.connectionIds.slice(1),
      ...back.connectionIds.slice(1),
      ...journey.connectionIds.slice(at),
    ];
    journey.estimatedTotalMinutes +=
      estimateJourneyMinutes(graph, outbound, mode) + estimateJourneyMinutes(graph, back, mode);
    journey.status = "in_progress";
    journey.interruptReason = null;
    await this.save(journey);

    const outcome = await this.advanceJourney(entityKey, outbound.path.length - 1);
    const moved = outcome.journey;
    if (moved && moved.status === "in_progress" && moved.path[moved.positionIndex] === zoneKey) {
      moved.status = "interrupted";
      moved.interruptReason = "detour";
      await this.save(moved);
    }
    return outcome;
  }

  /** Progress of the active journey; null when the entity is not travelling */
  async getJourney(entityKey: string): Promise<JourneyProgress | null> {
    await this.requireEntity(entityKey);
    const journey = await this.repos.journeys.findActive(this.scope.sessionId, entityKey);
    return journey ? journeyProgress(journey) : null;
  }

  /**
   * Single hop into a connected zone. It needs no prior discovery and runs
   * as a one-step journey, so gates resolve the same way as on long trips.
   */
  async moveToAdjacent(
    entityKey: string,
    zoneKey: string,
    modeKey: string,
  ): Promise<TravelOutcome> {
    const entity = await this.requireEntity(entityKey);
    await this.needs.requireNeeds(entityKey);
    const mode = await this.pathfinder.requireMode(modeKey);
    const graph = await this.pathfinder.loadGraph();
    const target = graph.zone(zoneKey);

    const active = await this.repos.journeys.findActive(this.scope.sessionId, entityKey);
    if (active) {
      return fail(`${entity.displayName} is travelling; abort the journey first`, active);
    }
    const fromKey = entity.currentZoneKey;
    if (fromKey === null) return fail(`${entity.displayName} is not in any zone`);
    if (fromKey === zoneKey) {
      return fail(`${entity.displayName} is already in ${target.displayName}`);
    }

    const edges = graph.edgesBetween(fromKey, zoneKey);
    if (edges.length === 0) {
      return fail(`${target.displayName} is not adjacent to ${graph.zone(fromKey).displayName}`);
    }
    let best: { edge: Edge; cost: number } | null = null;
    for (const edge of edges) {
      const cost = edgeCost(graph, edge, mode);
      if (cost !== null && (best === null || cost < best.cost)) best = { edge, cost };
    }
    if (best === null) {
      const route = findPath(graph, fromKey, zoneKey, mode);
      return fail(route.reason ?? `${target.displayName} cannot be entered`);
    }

    const terrainMinutes: Partial<Record<TerrainType, number>> = {};
    terrainMinutes[target.terrain] = best.cost;
    const route: PathResult = {
      found: true,
      path: [fromKey, zoneKey],
      connectionIds: [null, best.edge.connection.id],
      edgeCosts: [0, best.cost],
      totalCost: Math.round(best.cost),
      reason: null,
      skillChecks: [],
      terrainMinutes,
    };
    await this.createJourney(entity, route, mode, graph, false);
    return this.advanceJourney(entityKey, 1);
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private async requireEntity(entityKey: string): Promise<Entity> {
    const entity = await this.repos.entities.find(this.scope.sessionId, entityKey);
    if (!entity) throw new EntityNotFoundError(entityKey);
    return entity;
  }

  private async requireJourney(entityKey: string): Promise<Journey> {
    await this.requireEntity(entityKey);
    const journey = await this.repos.journeys.findActive(this.scope.sessionId, entityKey);
    if (!journey) throw new JourneyNotFoundError(entityKey);
    return journey;
  }

  private async createJourney(
    entity: Entity,
    route: PathResult,
    mode: TransportMode,
    graph: ZoneGraph,
    preferRoads: boolean,
  ): Promise<Journey> {
    const origin = route.path[0];
    const journey = await this.repos.journeys.insert({
      sessionId: this.scope.sessionId,
      entityKey: entity.key,
      originZoneKey: origin,
      destinationZoneKey: route.path[route.path.length - 1],
      transportModeKey: mode.key,
      path: route.path,
      connectionIds: route.connectionIds,
      positionIndex: 0,
      elapsedMinutes: 0,
      estimatedTotalMinutes: estimateJourneyMinutes(graph, route, mode),
      preferRoads,
      status: "in_progress",
      interruptReason: null,
      pendingCheck: null,
      visitedZoneKeys: [origin],
      createdTurn: this.scope.turn,
      updatedTurn: this.scope.turn,
    });
    this.recordJourney(journey);
    return journey;
  }

  /** The planned edge into the next zone, if it still exists */
  private nextEdge(journey: Journey, graph: ZoneGraph): Edge | null {
    const next = journey.positionIndex + 1;
    if (next >= journey.path.length) return null;
    const from = journey.path[journey.positionIndex];
    const connectionId = journey.connectionIds[next];
    return (
      graph
        .edgesBetween(from, journey.path[next])
        .find((e) => e.connection.id === connectionId) ?? null
    );
  }

  private async takeStep(
    journey: Journey,
    graph: ZoneGraph,
    edge: Edge,
    crossing: number,
    mode: TransportMode,
  ): Promise<TravelStep> {
    const zone = graph.zone(edge.to);
    const minutes = stepMinutes(crossing, zone, mode);
    await this.spendMinutes(journey.entityKey, minutes, mode);
    await this.moveEntity(journey.entityKey, edge.from, edge.to);

    journey.positionIndex += 1;
    journey.elapsedMinutes += minutes;
    if (!journey.visitedZoneKeys.includes(edge.to)) journey.visitedZoneKeys.push(edge.to);
    if (journey.positionIndex === journey.path.length - 1) journey.status = "arrived";

    const { zonesDiscovered } = await this.discovery.autoDiscoverSurroundings(edge.to, graph);
    return {
      fromZoneKey: edge.from,
      toZoneKey: edge.to,
      minutes,
      encounter: this.rollEncounter(zone, mode),
      zonesDiscovered,
    };
  }

  /** Retreat to the previous zone on the path; stays put at the origin */
  private async stepBack(
    journey: Journey,
    graph: ZoneGraph,
    mode: TransportMode,
  ): Promise<TravelStep | null> {
    if (journey.positionIndex === 0) return null;
    const from = journey.path[journey.positionIndex];
    const to = journey.path[journey.positionIndex - 1];
    const back = graph
      .edgesBetween(from, to)
      .map((edge) => ({ edge, cost: edgeCost(graph, edge, mode) }))
      .find((c) => c.cost !== null);
    if (!back || back.cost === null) return null;

    const minutes = stepMinutes(back.cost, graph.zone(to), mode);
    await this.spendMinutes(journey.entityKey, minutes, mode);
    await this.moveEntity(journey.entityKey, from, to);
    journey.positionIndex -= 1;
    journey.elapsedMinutes += minutes;
    return {
      fromZoneKey: from,
      toZoneKey: to,
      minutes,
      encounter: { rolled: 0, threshold: 101, triggered: false },
      zonesDiscovered: [],
    };
  }

  /** Travel time is never free: decay with stamina scaled by the mode's fatigue */
  private async spendMinutes(
    entityKey: string,
    minutes: number,
    mode: TransportMode,
  ): Promise<void> {
    await this.needs.applyDecay(entityKey, minutes, {
      activity: "active",
      extraMultipliers: { stamina: mode.fatigueRate },
    });
  }

  private async moveEntity(entityKey: string, from: string, to: string): Promise<void> {
    await this.repos.entities.setZone(this.scope.sessionId, entityKey, to);
    this.changes.record({
      kind: "entity_moved",
      entity_key: entityKey,
      from_zone_key: from,
      to_zone_key: to,
    });
  }

  private rollEncounter(zone: Zone, mode: TransportMode): EncounterRoll {
    const threshold = encounterThreshold(zone.encounterFrequency, mode.encounterModifier);
    const rolled = this.rng.int(1, 100);
    return { rolled, threshold, triggered: rolled >= threshold };
  }

  private async save(journey: Journey): Promise<void> {
    journey.updatedTurn = this.scope.turn;
    await this.repos.journeys.update(journey);
    this.recordJourney(journey);
  }

  private recordJourney(journey: Journey): void {
    this.changes.record({
      kind: "journey_updated",
      journey_id: journey.id,
      status: journey.status,
      position_index: journey.positionIndex,
    });
  }
}

function pendingCheck(journey: Journey): TravelOutcome {
  return {
    ...fail("A skill check is pending; resolve it before moving on", journey),
    checkRequired: journey.pendingCheck,
  };
}

function unplanned(reason: string, fromKey?: string): PathResult {
  return {
    found: false,
    path: fromKey === undefined ? [] : [fromKey],
    connectionIds: fromKey === undefined ? [] : [null],
    edgeCosts: fromKey === undefined ? [] : [0],
    totalCost: 0,
    reason,
    skillChecks: [],
    terrainMinutes: {},
  };
}

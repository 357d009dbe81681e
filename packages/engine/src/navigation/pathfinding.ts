import { TerrainType } from "@wayfarer/shared";
import type { ChangeLog } from "../changes.js";
import type { EngineConfig } from "../config.js";
import {
  InvariantViolationError,
  TransportModeNotFoundError,
  ZoneNotFoundError,
} from "../errors.js";
import type { Repositories } from "../store/repositories.js";
import type {
  SkillGate,
  TransportMode,
  TurnScope,
  Zone,
  ZoneConnection,
} from "../types.js";
import {
  checkAccessibility,
  terrainMultiplier,
  type Accessibility,
} from "./transport.js";
import { compareStrings, type Edge, ZoneGraph } from "./zone-graph.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type PathOptions = {
  /** Weight edges into road/trail zones down for planning only */
  preferRoads?: boolean;
  avoidTerrain?: TerrainType[];
};

export type PathResult = {
  found: boolean;
  path: string[];
  /** Connection used to enter `path[i]`; index 0 is null */
  connectionIds: (string | null)[];
  /** Real minutes spent on the edge into `path[i]`; index 0 is 0 */
  edgeCosts: number[];
  totalCost: number;
  reason: string | null;
  skillChecks: SkillGate[];
  terrainMinutes: Partial<Record<TerrainType, number>>;
};

type Label = {
  cost: number;
  planCost: number;
  gated: number;
  path: string[];
  edges: Edge[];
};

const EPSILON = 1e-9;
const ROAD_TERRAIN: readonly TerrainType[] = ["road", "trail"];

// ---------------------------------------------------------------------------
// Gates & edge costs
// ---------------------------------------------------------------------------

function hasGate(entity: {
  requiresSkill: string | null;
  skillDifficulty: number | null;
}): boolean {
  return entity.requiresSkill !== null && entity.skillDifficulty !== null;
}

/** The check guarding a step; the connection's gate wins over the zone's */
export function stepGate(
  connection: ZoneConnection | null,
  zone: Zone,
): SkillGate | null {
  if (connection && connection.requiresSkill !== null && connection.skillDifficulty !== null) {
    return {
      zoneKey: zone.key,
      connectionId: connection.id,
      skill: connection.requiresSkill,
      difficulty: connection.skillDifficulty,
      consequence: zone.failureConsequence,
    };
  }
  if (zone.requiresSkill !== null && zone.skillDifficulty !== null) {
    return {
      zoneKey: zone.key,
      connectionId: connection?.id ?? null,
      skill: zone.requiresSkill,
      difficulty: zone.skillDifficulty,
      consequence: zone.failureConsequence,
    };
  }
  return null;
}

/**
 * Real minutes to cross `edge` with `mode`, or null when the edge cannot be
 * used right now.
 */
export function edgeCost(
  graph: ZoneGraph,
  edge: Edge,
  mode: TransportMode,
  avoidTerrain: readonly TerrainType[] = [],
): number | null {
  const { connection } = edge;
  const to = graph.zone(edge.to);
  if (!connection.isVisible || !connection.isPassable) return null;
  if (!to.isAccessible) return null;
  if (avoidTerrain.includes(to.terrain)) return null;
  const multiplier = terrainMultiplier(mode, to.terrain);
  if (multiplier === null) return null;
  if (mode.type === "mounted" && to.mountedTravelCost === null) return null;
  return connection.crossingMinutes * multiplier;
}

/** Planning order: cost, then fewer gates, then zone-key sequence */
function compareLabels(a: Label, b: Label): number {
  if (Math.abs(a.planCost - b.planCost) > EPSILON) return a.planCost - b.planCost;
  if (a.gated !== b.gated) return a.gated - b.gated;
  const n = Math.min(a.path.length, b.path.length);
  for (let i = 0; i < n; i++) {
    const c = compareStrings(a.path[i], b.path[i]);
    if (c !== 0) return c;
  }
  return a.path.length - b.path.length;
}

// ---------------------------------------------------------------------------
// Search
// ---------------------------------------------------------------------------

/**
 * Deterministic Dijkstra over the zone graph. Skill-gated edges stay in the
 * graph and are reported; they are resolved when travelled, not here.
 */
export function findPath(
  graph: ZoneGraph,
  fromKey: string,
  toKey: string,
  mode: TransportMode,
  options: PathOptions = {},
  roadBias = 0.5,
): PathResult {
  const from = graph.zone(fromKey);
  const to = graph.zone(toKey);
  const start: Label = { cost: 0, planCost: 0, gated: 0, path: [fromKey], edges: [] };
  if (fromKey === toKey) return summarize(graph, start, mode);

  const avoid = options.avoidTerrain ?? [];
  const best = new Map<string, Label>([[fromKey, start]]);
  const settled = new Set<string>();

  for (;;) {
    let current: Label | null = null;
    let currentKey: string | null = null;
    for (const [key, label] of best) {
      if (settled.has(key)) continue;
      if (current === null || compareLabels(label, current) < 0) {
        current = label;
        currentKey = key;
      }
    }
    if (current === null || currentKey === null) break;
    if (currentKey === toKey) return summarize(graph, current, mode);
    settled.add(currentKey);

    for (const edge of graph.edgesFrom(currentKey)) {
      if (settled.has(edge.to)) continue;
      const cost = edgeCost(graph, edge, mode, avoid);
      if (cost === null) continue;
      const target = graph.zone(edge.to);
      const bias = options.preferRoads && ROAD_TERRAIN.includes(target.terrain) ? roadBias : 1;
      const gated = hasGate(edge.connection) || hasGate(target) ? 1 : 0;
      const candidate: Label = {
        cost: current.cost + cost,
        planCost: current.planCost + cost * bias,
        gated: current.gated + gated,
        path: [...current.path, edge.to],
        edges: [...current.edges, edge],
      };
      const existing = best.get(edge.to);
      if (!existing || compareLabels(candidate, existing) < 0) {
        best.set(edge.to, candidate);
      }
    }
  }

  return notFound(fromKey, unreachableReason(from, to, mode));
}

function unreachableReason(from: Zone, to: Zone, mode: TransportMode): string {
  if (!to.isAccessible) {
    return to.blockedReason
      ? `${to.displayName} is inaccessible: ${to.blockedReason}`
      : `${to.displayName} is inaccessible`;
  }
  if (terrainMultiplier(mode, to.terrain) === null) {
    return `${mode.displayName} cannot cross ${to.terrain} terrain to reach ${to.displayName}`;
  }
  return `No route from ${from.displayName} to ${to.displayName} by ${mode.displayName.toLowerCase()}`;
}

function notFound(fromKey: string, reason: string): PathResult {
  return {
    found: false,
    path: [fromKey],
    connectionIds: [null],
    edgeCosts: [0],
    totalCost: 0,
    reason,
    skillChecks: [],
    terrainMinutes: {},
  };
}

function summarize(graph: ZoneGraph, label: Label, mode: TransportMode): PathResult {
  const edgeCosts = [0];
  const skillChecks: SkillGate[] = [];
  const terrainMinutes: Partial<Record<TerrainType, number>> = {};
  for (const edge of label.edges) {
    const zone = graph.zone(edge.to);
    const cost = edgeCost(graph, edge, mode) ?? 0;
    edgeCosts.push(cost);
    terrainMinutes[zone.terrain] = (terrainMinutes[zone.terrain] ?? 0) + cost;
    const gate = stepGate(edge.connection, zone);
    if (gate) skillChecks.push(gate);
  }
  return {
    found: true,
    path: label.path,
    connectionIds: [null, ...label.edges.map((e) => e.connection.id)],
    edgeCosts,
    totalCost: Math.round(label.cost),
    reason: null,
    skillChecks,
    terrainMinutes,
  };
}

/** Chain legs through each waypoint; the first unreachable leg fails the whole route */
export function findPathVia(
  graph: ZoneGraph,
  waypoints: string[],
  mode: TransportMode,
  options: PathOptions = {},
  roadBias = 0.5,
): PathResult {
  if (waypoints.length < 2) {
    throw new InvariantViolationError("A route needs at least two waypoints");
  }
  let route = findPath(graph, waypoints[0], waypoints[0], mode, options, roadBias);
  let realCost = 0;
  for (let i = 1; i < waypoints.length; i++) {
    const leg = findPath(graph, waypoints[i - 1], waypoints[i], mode, options, roadBias);
    if (!leg.found) return { ...leg, path: route.path };
    realCost += leg.edgeCosts.reduce((a, b) => a + b, 0);
    const terrainMinutes = { ...route.terrainMinutes };
    for (const terrain of TerrainType.options) {
      const minutes = leg.terrainMinutes[terrain];
      if (minutes !== undefined) {
        terrainMinutes[terrain] = (terrainMinutes[terrain] ?? 0) + minutes;
      }
    }
    route = {
      found: true,
      path: [...route.path, ...leg.path.slice(1)],
      connectionIds: [...route.connectionIds, ...leg.connectionIds.slice(1)],
      edgeCosts: [...route.edgeCosts, ...leg.edgeCosts.slice(1)],
      totalCost: Math.round(realCost),
      reason: null,
      skillChecks: [...route.skillChecks, ...leg.skillChecks],
      terrainMinutes,
    };
  }
  return route;
}

// ---------------------------------------------------------------------------
// Service over the store
// ---------------------------------------------------------------------------

export class Pathfinder {
  constructor(
    private readonly repos: Repositories,
    private readonly scope: TurnScope,
    private readonly changes: ChangeLog,
    private readonly config: EngineConfig,
  ) {}

  loadGraph(): Promise<ZoneGraph> {
    return ZoneGraph.load(this.repos, this.scope.sessionId);
  }

  async requireMode(key: string): Promise<TransportMode> {
    const mode = await this.repos.transportModes.find(key);
    if (!mode) throw new TransportModeNotFoundError(key);
    return mode;
  }

  async findOptimalPath(
    fromKey: string,
    toKey: string,
    modeKey: string,
    options: PathOptions = {},
  ): Promise<PathResult> {
    const mode = await this.requireMode(modeKey);
    const graph = await this.loadGraph();
    return findPath(graph, fromKey, toKey, mode, options, this.config.preferRoadsBias);
  }

  async findPathVia(
    waypoints: string[],
    modeKey: string,
    options: PathOptions = {},
  ): Promise<PathResult> {
    const mode = await this.requireMode(modeKey);
    const graph = await this.loadGraph();
    return findPathVia(graph, waypoints, mode, options, this.config.preferRoadsBias);
  }

  async checkAccessibility(zoneKey: string, modeKey: string): Promise<Accessibility> {
    const mode = await this.requireMode(modeKey);
    const zone = await this.repos.zones.find(this.scope.sessionId, zoneKey);
    if (!zone) throw new ZoneNotFoundError(zoneKey);
    return checkAccessibility(zone, mode);
  }

  /**
   * Make every hidden connection that leads into `zoneKey` usable for
   * planning. Returns the connections revealed, in id order.
   */
  async revealHiddenPathsTo(zoneKey: string): Promise<ZoneConnection[]> {
    const hidden = (await this.repos.connections.list(this.scope.sessionId))
      .filter(
        (c) =>
          !c.isVisible &&
          (c.toZoneKey === zoneKey || (c.isBidirectional && c.fromZoneKey === zoneKey)),
      )
      .sort((a, b) => compareStrings(a.id, b.id));

    for (const connection of hidden) {
      const updated = await this.repos.connections.setVisible(
        this.scope.sessionId,
        connection.id,
        true,
      );
      if (!updated) {
        throw new InvariantViolationError(`Connection ${connection.id} not found`);
      }
      this.changes.record({
        kind: "connection_revealed",
        connection_id: connection.id,
        from_zone_key: connection.fromZoneKey,
        to_zone_key: connection.toZoneKey,
      });
    }
    return hidden.map((c) => ({ ...c, isVisible: true }));
  }
}

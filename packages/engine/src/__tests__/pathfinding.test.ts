import { describe, expect, it } from "vitest";
import { InvariantViolationError } from "../errors.js";
import { findPath, findPathVia } from "../navigation/pathfinding.js";
import { ZoneGraph } from "../navigation/zone-graph.js";
import type { ZoneConnection } from "../types.js";
import { makeConnection, makeZone, transportMode } from "./helpers.js";

const walking = transportMode("walking");

function villageToForest(overrides: Partial<ZoneConnection> = {}): ZoneGraph {
  return new ZoneGraph(
    [
      makeZone("village", "road", { baseTravelCost: 5 }),
      makeZone("forest", "forest", { baseTravelCost: 10 }),
      makeZone("island", "plains"),
    ],
    [makeConnection("c1", "village", "forest", 5, { connectionType: "road", ...overrides })],
  );
}

/** a → b → d and a → c → d, every leg 5 minutes of plains */
function diamond(bGate = false): ZoneGraph {
  return new ZoneGraph(
    [
      makeZone("a", "plains"),
      makeZone(
        "b",
        "plains",
        bGate ? { requiresSkill: "climbing", skillDifficulty: 10 } : {},
      ),
      makeZone("c", "plains"),
      makeZone("d", "plains"),
    ],
    [
      makeConnection("ab", "a", "b", 5),
      makeConnection("bd", "b", "d", 5),
      makeConnection("ac", "a", "c", 5),
      makeConnection("cd", "c", "d", 5),
    ],
  );
}

describe("findPath", () => {
  it("costs crossing minutes by the destination terrain", () => {
    expect(findPath(villageToForest(), "village", "forest", walking)).toEqual({
      found: true,
      path: ["village", "forest"],
      connectionIds: [null, "c1"],
      edgeCosts: [0, 10],
      totalCost: 10,
      reason: null,
      skillChecks: [],
      terrainMinutes: { forest: 10 },
    });
  });

  it("returns the same route on every call", () => {
    const graph = diamond();
    const first = findPath(graph, "a", "d", walking);
    for (let i = 0; i < 5; i++) {
      expect(findPath(graph, "a", "d", walking)).toEqual(first);
    }
  });

  it("breaks cost ties by zone-key order", () => {
    const route = findPath(diamond(), "a", "d", walking);
    expect(route.path).toEqual(["a", "b", "d"]);
    expect(route.totalCost).toBe(10);
  });

  it("prefers the route with fewer skill gates at equal cost", () => {
    const route = findPath(diamond(true), "a", "d", walking);
    expect(route.path).toEqual(["a", "c", "d"]);
    expect(route.skillChecks).toEqual([]);
  });

  it("reports a disconnected destination", () => {
    const route = findPath(villageToForest(), "village", "island", walking);
    expect(route.found).toBe(false);
    expect(route.path).toEqual(["village"]);
    expect(route.reason).toBe("No route from village to island by walking");
  });

  it("explains terrain the mode cannot cross", () => {
    const graph = new ZoneGraph(
      [makeZone("shore", "plains"), makeZone("lake", "lake")],
      [makeConnection("c1", "shore", "lake", 5)],
    );
    expect(findPath(graph, "shore", "lake", walking).reason).toBe(
      "Walking cannot cross lake terrain to reach lake",
    );
    expect(findPath(graph, "shore", "lake", transportMode("swimming"))).toMatchObject({
      found: true,
      totalCost: 8,
      edgeCosts: [0, 7.5],
    });
  });

  it("explains an inaccessible destination", () => {
    const graph = new ZoneGraph(
      [
        makeZone("camp", "plains"),
        makeZone("cave", "cave", { isAccessible: false, blockedReason: "rockslide" }),
      ],
      [makeConnection("c1", "camp", "cave", 5)],
    );
    expect(findPath(graph, "camp", "cave", walking).reason).toBe(
      "cave is inaccessible: rockslide",
    );
  });

  it("skips hidden and impassable connections", () => {
    expect(
      findPath(villageToForest({ isVisible: false }), "village", "forest", walking).found,
    ).toBe(false);
    expect(
      findPath(villageToForest({ isPassable: false }), "village", "forest", walking).found,
    ).toBe(false);
  });

  it("rides around zones with no mounted cost", () => {
    const graph = new ZoneGraph(
      [
        makeZone("meadow", "plains", { mountedTravelCost: 5 }),
        makeZone("bog", "plains"),
        makeZone("lane", "road", { mountedTravelCost: 4 }),
        makeZone("town", "urban", { mountedTravelCost: 3 }),
      ],
      [
        makeConnection("mb", "meadow", "bog", 5),
        makeConnection("bt", "bog", "town", 5),
        makeConnection("ml", "meadow", "lane", 20),
        makeConnection("lt", "lane", "town", 20),
      ],
    );
    const mounted = transportMode("mounted");

    expect(findPath(graph, "meadow", "town", walking).path).toEqual(["meadow", "bog", "town"]);
    const ride = findPath(graph, "meadow", "town", mounted);
    expect(ride.path).toEqual(["meadow", "lane", "town"]);
    expect(ride.totalCost).toBe(18);
    expect(findPath(graph, "meadow", "bog", mounted)).toMatchObject({
      found: false,
      reason: "No route from meadow to bog by mounted",
    });
  });

  it("honors avoided terrain", () => {
    const route = findPath(villageToForest(), "village", "forest", walking, {
      avoidTerrain: ["forest"],
    });
    expect(route.found).toBe(false);
  });

  it("biases planning toward roads without changing real minutes", () => {
    const graph = new ZoneGraph(
      [
        makeZone("a", "plains"),
        makeZone("r", "road"),
        makeZone("p", "plains"),
        makeZone("d", "plains"),
      ],
      [
        makeConnection("ar", "a", "r", 10),
        makeConnection("rd", "r", "d", 10),
        makeConnection("ap", "a", "p", 8),
        makeConnection("pd", "p", "d", 8),
      ],
    );
    expect(findPath(graph, "a", "d", walking).path).toEqual(["a", "p", "d"]);

    const roads = findPath(graph, "a", "d", walking, { preferRoads: true });
    expect(roads.path).toEqual(["a", "r", "d"]);
    expect(roads.totalCost).toBe(18);
    expect(roads.terrainMinutes).toEqual({ road: 8, plains: 10 });
  });

  it("reports the gate guarding a connection", () => {
    const graph = villageToForest({ requiresSkill: "swimming", skillDifficulty: 12 });
    expect(findPath(graph, "village", "forest", walking).skillChecks).toEqual([
      {
        zoneKey: "forest",
        connectionId: "c1",
        skill: "swimming",
        difficulty: 12,
        consequence: null,
      },
    ]);
  });

  it("returns a zero-length route when already there", () => {
    expect(findPath(diamond(), "a", "a", walking)).toMatchObject({
      found: true,
      path: ["a"],
      totalCost: 0,
    });
  });
});

describe("findPathVia", () => {
  it("chains legs through each waypoint", () => {
    const route = findPathVia(diamond(), ["a", "c", "d"], walking);
    expect(route.path).toEqual(["a", "c", "d"]);
    expect(route.connectionIds).toEqual([null, "ac", "cd"]);
    expect(route.edgeCosts).toEqual([0, 5, 5]);
    expect(route.totalCost).toBe(10);
    expect(route.terrainMinutes).toEqual({ plains: 10 });
  });

  it("fails on the first unreachable leg", () => {
    const route = findPathVia(villageToForest(), ["village", "forest", "island"], walking);
    expect(route.found).toBe(false);
    expect(route.path).toEqual(["village", "forest"]);
    expect(route.reason).toBe("No route from forest to island by walking");
  });

  it("needs two waypoints", () => {
    expect(() => findPathVia(diamond(), ["a"], walking)).toThrow(InvariantViolationError);
  });
});

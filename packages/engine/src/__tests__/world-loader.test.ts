import { ZoneDefinition, type WorldDefinitionInput } from "@wayfarer/shared";
import { describe, expect, it } from "vitest";
import { ZodError } from "zod";
import { createEngine } from "../engine.js";
import { InvariantViolationError } from "../errors.js";
import { MemoryWorldStore } from "../store/memory-store.js";
import { orderZonesParentFirst } from "../world/world-loader.js";
import { inTurn, silentLogger, valleyEngine } from "./helpers.js";

const zone = (key: string, parent: string | null = null) =>
  ZoneDefinition.parse({ key, display_name: key, terrain: "plains", parent_zone_key: parent });

function freshEngine() {
  const store = new MemoryWorldStore();
  return { store, engine: createEngine(store, { logger: silentLogger }) };
}

describe("orderZonesParentFirst", () => {
  it("puts parents ahead of their children", () => {
    const ordered = orderZonesParentFirst([zone("town", "county"), zone("county", "realm"), zone("realm")]);
    expect(ordered.map((z) => z.key)).toEqual(["realm", "county", "town"]);
  });

  it("rejects duplicates, cycles and missing parents", () => {
    expect(() => orderZonesParentFirst([zone("a"), zone("a")])).toThrow(
      "Zone keys must be unique within a world",
    );
    expect(() => orderZonesParentFirst([zone("a", "b"), zone("b", "a")])).toThrow(
      'Zone hierarchy cycle at "a"',
    );
    expect(() => orderZonesParentFirst([zone("a", "ghost")])).toThrow(
      'Zone "a" references missing parent "ghost"',
    );
  });
});

describe("loadWorld", () => {
  it("creates a session with everything in the definition", async () => {
    const { engine, store, sessionId } = await valleyEngine();
    const fx = { store, deps: engine.deps, sessionId };
    const zones = await inTurn(fx, (_s, repos) => repos.zones.list(sessionId));
    const connections = await inTurn(fx, (_s, repos) => repos.connections.list(sessionId));
    expect(zones).toHaveLength(9);
    expect(connections).toHaveLength(7);
    expect(zones.find((z) => z.key === "village")?.parentZoneKey).toBe("valley");

    const aria = await inTurn(fx, (_s, repos) => repos.entities.find(sessionId, "aria"));
    expect(aria).toMatchObject({ kind: "player", currentZoneKey: "village", skills: { climbing: 2 } });
    expect(await inTurn(fx, (s) => s.needs.getNeeds("statue"))).toBeNull();
  });

  it("reports what it loaded", async () => {
    const { engine } = freshEngine();
    const loaded = await engine.loadWorld({
      name: "Hamlet",
      zones: [{ key: "square", display_name: "Square", terrain: "urban" }],
      entities: [{ key: "tom", display_name: "Tom", current_zone_key: "square", needs: {} }],
    });
    expect(loaded).toMatchObject({
      session: { name: "Hamlet", currentTurn: 0, minutesPerTurn: 5 },
      zones: 1,
      connections: 0,
      locations: 0,
      entities: 1,
    });
  });

  it("syncs trait and age modifiers from preferences", async () => {
    const { store, engine } = freshEngine();
    const { session } = await engine.loadWorld({
      name: "Hamlet",
      zones: [{ key: "square", display_name: "Square", terrain: "urban" }],
      entities: [
        {
          key: "tom",
          display_name: "Tom",
          needs: {},
          preferences: { traits: ["loner"], age: 70 },
        },
      ],
    });
    const fx = { store, deps: engine.deps, sessionId: session.id };
    expect(await inTurn(fx, (s) => s.modifiers.getDecayMultiplier("tom", "social_connection"))).toBe(0.5);
    expect(await inTurn(fx, (s) => s.modifiers.getCap("tom", "stamina"))).toBe(85);
  });

  it("starts an elder's needs under the age caps", async () => {
    const { store, engine } = freshEngine();
    const { session } = await engine.loadWorld({
      name: "Hamlet",
      zones: [{ key: "square", display_name: "Square", terrain: "urban" }],
      entities: [
        {
          key: "edda",
          display_name: "Edda",
          needs: { stamina: 100, hunger: 90 },
          preferences: { age: 70 },
        },
      ],
    });
    const fx = { store, deps: engine.deps, sessionId: session.id };
    const state = await inTurn(fx, (s) => s.needs.requireNeeds("edda"));
    expect(state.needs.stamina.value).toBe(85);
    expect(state.needs.hunger.value).toBe(90);
  });

  it("gives scenery entities no needs", async () => {
    const { store, engine } = freshEngine();
    const { session } = await engine.loadWorld({
      name: "Hamlet",
      zones: [{ key: "square", display_name: "Square", terrain: "urban" }],
      entities: [{ key: "well", display_name: "Well", current_zone_key: "square" }],
    });
    const fx = { store, deps: engine.deps, sessionId: session.id };
    expect(await inTurn(fx, (s) => s.needs.getNeeds("well"))).toBeNull();
  });

  it("rejects references to unknown zones", async () => {
    const { engine } = freshEngine();
    const world: WorldDefinitionInput = {
      name: "Broken",
      zones: [{ key: "square", display_name: "Square", terrain: "urban" }],
      connections: [{ from_zone_key: "square", to_zone_key: "nowhere" }],
    };
    await expect(engine.loadWorld(world)).rejects.toThrow(
      new InvariantViolationError('Connection references unknown zone "nowhere"'),
    );
  });

  it("rejects duplicate location and entity keys", async () => {
    const { engine } = freshEngine();
    const zones = [{ key: "square", display_name: "Square", terrain: "urban" as const }];
    await expect(
      engine.loadWorld({
        name: "Twins",
        zones,
        locations: [
          { key: "well", display_name: "Well", zone_key: "square" },
          { key: "well", display_name: "Other Well", zone_key: "square" },
        ],
      }),
    ).rejects.toThrow(new InvariantViolationError('Location key "well" appears more than once'));
    await expect(
      engine.loadWorld({
        name: "Twins",
        zones,
        entities: [
          { key: "tom", display_name: "Tom" },
          { key: "tom", display_name: "Tom Again" },
        ],
      }),
    ).rejects.toThrow(new InvariantViolationError('Entity key "tom" appears more than once'));
  });

  it("validates the definition", async () => {
    const { engine } = freshEngine();
    await expect(engine.loadWorld({ name: "Empty", zones: [] })).rejects.toBeInstanceOf(ZodError);
  });
});

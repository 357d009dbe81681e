import type { FailureConsequence, ZoneDefinitionInput } from "@wayfarer/shared";
import { describe, expect, it } from "vitest";
import type { RandomSource } from "../dice/random.js";
import { createEngine } from "../engine.js";
import {
  EntityNotFoundError,
  InvariantViolationError,
  JourneyNotFoundError,
  NeedsUninitializedError,
} from "../errors.js";
import { encounterThreshold } from "../navigation/travel.js";
import { MemoryWorldStore } from "../store/memory-store.js";
import {
  constantRandom,
  type Fixture,
  inTurn,
  scriptedRandom,
  silentLogger,
  VALLEY,
  valleyEngine,
} from "./helpers.js";

async function valley(rng: RandomSource = constantRandom(1)): Promise<Fixture> {
  const { engine, store, sessionId } = await valleyEngine({ rng });
  return { store, deps: engine.deps, sessionId };
}

/** The valley with some zones reshaped */
async function reshapedValley(
  patch: (zone: ZoneDefinitionInput) => ZoneDefinitionInput,
  rng: RandomSource = constantRandom(1),
): Promise<Fixture> {
  const store = new MemoryWorldStore();
  const engine = createEngine(store, { rng, logger: silentLogger });
  const { session } = await engine.loadWorld({ ...VALLEY, zones: VALLEY.zones.map(patch) });
  return { store, deps: engine.deps, sessionId: session.id };
}

function valleyWithRidgeFailure(
  consequence: FailureConsequence,
  rng: RandomSource,
): Promise<Fixture> {
  return reshapedValley(
    (z) => (z.key === "ridge" ? { ...z, failure_consequence: consequence } : z),
    rng,
  );
}

async function zoneOf(fx: Fixture, entityKey: string): Promise<string | null> {
  const entity = await inTurn(fx, (_s, repos) => repos.entities.find(fx.sessionId, entityKey));
  return entity?.currentZoneKey ?? null;
}

describe("encounterThreshold", () => {
  it("scales the zone's chance by the transport mode", () => {
    expect(encounterThreshold("medium", 1)).toBe(65);
    expect(encounterThreshold("high", 0.7)).toBe(58);
    expect(encounterThreshold("none", 1.2)).toBe(101);
    expect(encounterThreshold("very_high", 2)).toBe(1);
  });
});

describe("planRoute", () => {
  it("plans to a known zone", async () => {
    const fx = await valley();
    const route = await inTurn(fx, (s) =>
      s.travel.planRoute("aria", { destinationZoneKey: "forest", modeKey: "walking" }),
    );
    expect(route.path).toEqual(["village", "road", "forest"]);
    expect(route.edgeCosts).toEqual([0, 4, 10]);
    expect(route.totalCost).toBe(14);
  });

  it("refuses an undiscovered destination", async () => {
    const fx = await valley();
    const route = await inTurn(fx, (s) =>
      s.travel.planRoute("aria", { destinationZoneKey: "meadow", modeKey: "walking" }),
    );
    expect(route.found).toBe(false);
    expect(route.reason).toBe(
      'Destination "meadow" is unknown; it must be discovered before travelling there',
    );
  });
});

describe("journeys", () => {
  it("refuses to start towards an undiscovered zone", async () => {
    const fx = await valley();
    const outcome = await inTurn(fx, (s) => s.travel.startJourney("aria", "glade", "walking"));
    expect(outcome).toEqual({
      success: false,
      reason: 'Destination "glade" is unknown; it must be discovered before travelling there',
      journey: null,
      steps: [],
      checkRequired: null,
    });
  });

  it("walks step by step, spending minutes and revealing the way", async () => {
    const fx = await valley();
    const started = await inTurn(fx, (s) => s.travel.startJourney("aria", "forest", "walking"));
    expect(started.success).toBe(true);
    expect(started.journey).toMatchObject({
      originZoneKey: "village",
      destinationZoneKey: "forest",
      estimatedTotalMinutes: 42,
      status: "in_progress",
      positionIndex: 0,
    });

    const outcome = await inTurn(fx, (s) => s.travel.advanceJourney("aria", 5), 1);
    expect(outcome.steps).toEqual([
      {
        fromZoneKey: "village",
        toZoneKey: "road",
        minutes: 12,
        encounter: { rolled: 1, threshold: 101, triggered: false },
        zonesDiscovered: ["meadow", "peak"],
      },
      {
        fromZoneKey: "road",
        toZoneKey: "forest",
        minutes: 30,
        encounter: { rolled: 1, threshold: 101, triggered: false },
        zonesDiscovered: [],
      },
    ]);
    expect(outcome.journey).toMatchObject({
      status: "arrived",
      positionIndex: 2,
      elapsedMinutes: 42,
      visitedZoneKeys: ["village", "road", "forest"],
      updatedTurn: 1,
    });
    expect(await zoneOf(fx, "aria")).toBe("forest");

    const needs = await inTurn(fx, (s) => s.needs.getNeeds("aria"));
    expect(needs?.needs.stamina.value).toBeCloseTo(74.4);
    expect(needs?.needs.hunger.value).toBeCloseTo(45.8);
  });

  it("moves one zone per step by default", async () => {
    const fx = await valley();
    await inTurn(fx, (s) => s.travel.startJourney("aria", "forest", "walking"));
    const outcome = await inTurn(fx, (s) => s.travel.advanceJourney("aria"));
    expect(outcome.steps.map((step) => step.toZoneKey)).toEqual(["road"]);
    expect(outcome.journey?.status).toBe("in_progress");
    expect(await zoneOf(fx, "aria")).toBe("road");
  });

  it("refuses a second journey and a trip to where the traveller stands", async () => {
    const fx = await valley();
    await inTurn(fx, (s) => s.travel.startJourney("aria", "forest", "walking"));
    const second = await inTurn(fx, (s) => s.travel.startJourney("aria", "ridge", "walking"));
    expect(second.reason).toBe('Aria is already travelling to "forest"');

    const other = await valley();
    const here = await inTurn(other, (s) => s.travel.startJourney("aria", "village", "walking"));
    expect(here.reason).toBe("Aria is already in Village");
  });

  it("requires needs and a known entity", async () => {
    const fx = await valley();
    await expect(
      inTurn(fx, (s) => s.travel.startJourney("statue", "forest", "walking")),
    ).rejects.toBeInstanceOf(NeedsUninitializedError);
    await expect(
      inTurn(fx, (s) => s.travel.startJourney("ghost", "forest", "walking")),
    ).rejects.toBeInstanceOf(EntityNotFoundError);
  });

  it("rejects a non-positive step count", async () => {
    const fx = await valley();
    await inTurn(fx, (s) => s.travel.startJourney("aria", "forest", "walking"));
    await expect(
      inTurn(fx, (s) => s.travel.advanceJourney("aria", 0)),
    ).rejects.toBeInstanceOf(InvariantViolationError);
  });

  it("aborts where the traveller stands", async () => {
    const fx = await valley();
    await inTurn(fx, (s) => s.travel.startJourney("aria", "forest", "walking"));
    await inTurn(fx, (s) => s.travel.advanceJourney("aria", 1));
    const aborted = await inTurn(fx, (s) => s.travel.abortJourney("aria", "storm coming"));
    expect(aborted.reason).toBe("storm coming");
    expect(aborted.journey?.status).toBe("aborted");
    expect(await zoneOf(fx, "aria")).toBe("road");
    await expect(
      inTurn(fx, (s) => s.travel.advanceJourney("aria")),
    ).rejects.toBeInstanceOf(JourneyNotFoundError);
  });
});

describe("skill gates", () => {
  it("stops at the gate until the check is resolved", async () => {
    const fx = await valley(scriptedRandom([1, 1, 9, 8, 1]));
    await inTurn(fx, (s) => s.travel.startJourney("aria", "ridge", "walking"));

    const outcome = await inTurn(fx, (s) => s.travel.advanceJourney("aria", 5));
    expect(outcome.steps).toHaveLength(2);
    expect(outcome.journey?.status).toBe("awaiting_check");
    expect(outcome.checkRequired).toMatchObject({
      zoneKey: "ridge",
      skill: "climbing",
      difficulty: 14,
      consequence: "fall_damage",
    });

    const blocked = await inTurn(fx, (s) => s.travel.advanceJourney("aria"));
    expect(blocked.success).toBe(false);
    expect(blocked.reason).toBe("A skill check is pending; resolve it before moving on");
    expect(blocked.checkRequired?.zoneKey).toBe("ridge");

    const resolution = await inTurn(fx, (s) => s.travel.resolvePendingCheck("aria"));
    expect(resolution.check).toMatchObject({
      success: true,
      rolls: [9, 8],
      totalModifier: 3,
      total: 20,
      margin: 6,
      tier: "clear_success",
    });
    expect(resolution.step?.toZoneKey).toBe("ridge");
    expect(resolution.step?.minutes).toBe(60);
    expect(resolution.journey.status).toBe("arrived");
    expect(await zoneOf(fx, "aria")).toBe("ridge");
  });

  it("applies fall damage and halts on failure, then resumes at the gate", async () => {
    const fx = await valley(scriptedRandom([1, 1, 2, 3]));
    await inTurn(fx, (s) => s.travel.startJourney("aria", "ridge", "walking"));
    await inTurn(fx, (s) => s.travel.advanceJourney("aria", 5));

    const resolution = await inTurn(fx, (s) => s.travel.resolvePendingCheck("aria"));
    expect(resolution.check.success).toBe(false);
    expect(resolution.check.tier).toBe("clear_failure");
    expect(resolution.consequence).toBe("fall_damage");
    expect(resolution.needPenalty).toEqual({ need: "wellness", amount: -20 });
    expect(resolution.step).toBeNull();
    expect(resolution.journey).toMatchObject({ status: "halted", positionIndex: 2 });
    expect(await zoneOf(fx, "aria")).toBe("forest");

    const needs = await inTurn(fx, (s) => s.needs.getNeeds("aria"));
    expect(needs?.needs.wellness.value).toBe(80);

    const resumed = await inTurn(fx, (s) => s.travel.advanceJourney("aria"));
    expect(resumed.journey?.status).toBe("awaiting_check");
    expect(resumed.steps).toEqual([]);
  });

  it("turns back one zone on a turn_back failure", async () => {
    const fx = await valleyWithRidgeFailure("turn_back", scriptedRandom([1, 1, 2, 3]));
    await inTurn(fx, (s) => s.travel.startJourney("aria", "ridge", "walking"));
    await inTurn(fx, (s) => s.travel.advanceJourney("aria", 5));

    const resolution = await inTurn(fx, (s) => s.travel.resolvePendingCheck("aria"));
    expect(resolution.consequence).toBe("turn_back");
    expect(resolution.needPenalty).toBeNull();
    expect(resolution.step).toMatchObject({ fromZoneKey: "forest", toZoneKey: "road", minutes: 12 });
    expect(resolution.journey).toMatchObject({
      status: "halted",
      positionIndex: 1,
      elapsedMinutes: 54,
    });
    expect(await zoneOf(fx, "aria")).toBe("road");
  });

  it("steps back and hurts on a drowning failure", async () => {
    const fx = await valleyWithRidgeFailure("drowning", scriptedRandom([1, 1, 2, 3]));
    await inTurn(fx, (s) => s.travel.startJourney("aria", "ridge", "walking"));
    await inTurn(fx, (s) => s.travel.advanceJourney("aria", 5));

    const resolution = await inTurn(fx, (s) => s.travel.resolvePendingCheck("aria"));
    expect(resolution.consequence).toBe("drowning");
    expect(resolution.needPenalty).toEqual({ need: "wellness", amount: -25 });
    expect(resolution.step).toMatchObject({ fromZoneKey: "forest", toZoneKey: "road", minutes: 12 });
    expect(resolution.journey).toMatchObject({ status: "halted", positionIndex: 1, elapsedMinutes: 54 });
    expect(await zoneOf(fx, "aria")).toBe("road");

    const needs = await inTurn(fx, (s) => s.needs.getNeeds("aria"));
    expect(needs?.needs.wellness.value).toBe(75);
  });

  it("loses an hour of decay and some morale when lost", async () => {
    const fx = await valleyWithRidgeFailure("lost", scriptedRandom([1, 1, 2, 3]));
    await inTurn(fx, (s) => s.travel.startJourney("aria", "ridge", "walking"));
    await inTurn(fx, (s) => s.travel.advanceJourney("aria", 5));

    const resolution = await inTurn(fx, (s) => s.travel.resolvePendingCheck("aria"));
    expect(resolution.consequence).toBe("lost");
    expect(resolution.needPenalty).toEqual({ need: "morale", amount: -5 });
    expect(resolution.step).toBeNull();
    expect(resolution.journey).toMatchObject({ status: "halted", positionIndex: 2, elapsedMinutes: 102 });
    expect(await zoneOf(fx, "aria")).toBe("forest");

    // 42 minutes on the way plus the lost hour
    const needs = await inTurn(fx, (s) => s.needs.getNeeds("aria"));
    expect(needs?.needs.hunger.value).toBeCloseTo(39.8);
    expect(needs?.needs.morale.value).toBeCloseTo(56.5);
  });

  it("drains stamina on an exhaustion failure", async () => {
    const fx = await valleyWithRidgeFailure("exhaustion", scriptedRandom([1, 1, 2, 3]));
    await inTurn(fx, (s) => s.travel.startJourney("aria", "ridge", "walking"));
    await inTurn(fx, (s) => s.travel.advanceJourney("aria", 5));

    const resolution = await inTurn(fx, (s) => s.travel.resolvePendingCheck("aria"));
    expect(resolution.consequence).toBe("exhaustion");
    expect(resolution.needPenalty).toEqual({ need: "stamina", amount: -30 });
    expect(resolution.journey).toMatchObject({ status: "halted", positionIndex: 2, elapsedMinutes: 42 });

    const needs = await inTurn(fx, (s) => s.needs.getNeeds("aria"));
    expect(needs?.needs.stamina.value).toBeCloseTo(44.4);
  });

  it("halts in place on a halt failure", async () => {
    const fx = await valleyWithRidgeFailure("halt", scriptedRandom([1, 1, 1, 1]));
    await inTurn(fx, (s) => s.travel.startJourney("aria", "ridge", "walking"));
    await inTurn(fx, (s) => s.travel.advanceJourney("aria", 5));

    const resolution = await inTurn(fx, (s) => s.travel.resolvePendingCheck("aria"));
    expect(resolution.check).toMatchObject({
      success: false,
      isCriticalFailure: true,
      tier: "catastrophic",
    });
    expect(resolution.consequence).toBe("halt");
    expect(resolution.journey.status).toBe("halted");
    expect(await zoneOf(fx, "aria")).toBe("forest");
  });

  it("refuses to resolve when nothing is pending", async () => {
    const fx = await valley();
    await inTurn(fx, (s) => s.travel.startJourney("aria", "forest", "walking"));
    await expect(
      inTurn(fx, (s) => s.travel.resolvePendingCheck("aria")),
    ).rejects.toBeInstanceOf(InvariantViolationError);
  });
});

describe("moveToAdjacent", () => {
  it("hops into a connected zone as a one-step journey", async () => {
    const fx = await valley();
    const outcome = await inTurn(fx, (s) => s.travel.moveToAdjacent("aria", "road", "walking"));
    expect(outcome.success).toBe(true);
    expect(outcome.steps.map((step) => [step.toZoneKey, step.minutes])).toEqual([["road", 12]]);
    expect(outcome.journey?.status).toBe("arrived");
    expect(await zoneOf(fx, "aria")).toBe("road");
  });

  it("needs no prior discovery of the target", async () => {
    // An NPC traveller reveals nothing when the world loads
    const store = new MemoryWorldStore();
    const engine = createEngine(store, { rng: constantRandom(1), logger: silentLogger });
    const { session } = await engine.loadWorld({
      ...VALLEY,
      entities: (VALLEY.entities ?? []).map((e) =>
        e.key === "aria" ? { ...e, kind: "npc" as const } : e,
      ),
    });
    const fx = { store, deps: engine.deps, sessionId: session.id };
    expect(await inTurn(fx, (s) => s.discovery.isZoneDiscovered("road"))).toBe(false);
    const planned = await inTurn(fx, (s) => s.travel.startJourney("aria", "road", "walking"));
    expect(planned.success).toBe(false);

    const outcome = await inTurn(fx, (s) => s.travel.moveToAdjacent("aria", "road", "walking"));
    expect(outcome.success).toBe(true);
    expect(await zoneOf(fx, "aria")).toBe("road");
    expect(await inTurn(fx, (s) => s.discovery.isZoneDiscovered("road"))).toBe(true);
  });

  it("refuses zones that are not adjacent", async () => {
    const fx = await valley();
    const outcome = await inTurn(fx, (s) => s.travel.moveToAdjacent("aria", "forest", "walking"));
    expect(outcome.success).toBe(false);
    expect(outcome.reason).toBe("Dark Forest is not adjacent to Village");
  });

  it("cannot use a hidden connection", async () => {
    const fx = await valley();
    await inTurn(fx, (s) => s.travel.startJourney("aria", "forest", "walking"));
    await inTurn(fx, (s) => s.travel.advanceJourney("aria", 2));
    const outcome = await inTurn(fx, (s) => s.travel.moveToAdjacent("aria", "glade", "walking"));
    expect(outcome.reason).toBe("No route from Dark Forest to Hidden Glade by walking");
  });

  it("waits while a journey is under way", async () => {
    const fx = await valley();
    await inTurn(fx, (s) => s.travel.startJourney("aria", "forest", "walking"));
    const outcome = await inTurn(fx, (s) => s.travel.moveToAdjacent("aria", "road", "walking"));
    expect(outcome.success).toBe(false);
    expect(outcome.reason).toBe("Aria is travelling; abort the journey first");
  });

  it("stops at a gate like any journey", async () => {
    const fx = await valley();
    await inTurn(fx, (s) => s.travel.startJourney("aria", "forest", "walking"));
    await inTurn(fx, (s) => s.travel.advanceJourney("aria", 2));
    const outcome = await inTurn(fx, (s) => s.travel.moveToAdjacent("aria", "ridge", "walking"));
    expect(outcome.journey?.status).toBe("awaiting_check");
    expect(outcome.checkRequired?.difficulty).toBe(14);
  });
});

describe("interruptions and detours", () => {
  it("keeps the route and position across an interruption", async () => {
    const fx = await valley();
    await inTurn(fx, (s) => s.travel.startJourney("aria", "forest", "walking"));
    await inTurn(fx, (s) => s.travel.advanceJourney("aria"));

    const paused = await inTurn(fx, (s) => s.travel.interruptJourney("aria", "rest"));
    expect(paused.success).toBe(true);
    expect(paused.journey).toMatchObject({
      status: "interrupted",
      interruptReason: "rest",
      positionIndex: 1,
      path: ["village", "road", "forest"],
    });

    const blocked = await inTurn(fx, (s) => s.travel.advanceJourney("aria"));
    expect(blocked.reason).toBe("The journey is interrupted; resume it before moving on");
    const second = await inTurn(fx, (s) => s.travel.startJourney("aria", "ridge", "walking"));
    expect(second.reason).toBe('Aria is already travelling to "forest"');
    const again = await inTurn(fx, (s) => s.travel.interruptJourney("aria", "nap"));
    expect(again.reason).toBe("The journey is already interrupted (rest)");

    const resumed = await inTurn(fx, (s) => s.travel.resumeJourney("aria"));
    expect(resumed.journey).toMatchObject({
      status: "in_progress",
      interruptReason: null,
      positionIndex: 1,
    });
    const arrived = await inTurn(fx, (s) => s.travel.advanceJourney("aria"));
    expect(arrived.steps.map((step) => step.toZoneKey)).toEqual(["forest"]);
    expect(arrived.journey?.status).toBe("arrived");
  });

  it("only resumes an interrupted journey", async () => {
    const fx = await valley();
    await inTurn(fx, (s) => s.travel.startJourney("aria", "forest", "walking"));
    const outcome = await inTurn(fx, (s) => s.travel.resumeJourney("aria"));
    expect(outcome.success).toBe(false);
    expect(outcome.reason).toBe("The journey is not interrupted");
  });

  it("meets a pending gate again after an interruption", async () => {
    const fx = await valley(scriptedRandom([1, 1]));
    await inTurn(fx, (s) => s.travel.startJourney("aria", "ridge", "walking"));
    await inTurn(fx, (s) => s.travel.advanceJourney("aria", 5));

    const paused = await inTurn(fx, (s) => s.travel.interruptJourney("aria", "think it over"));
    expect(paused.journey).toMatchObject({ status: "interrupted", pendingCheck: null });
    await inTurn(fx, (s) => s.travel.resumeJourney("aria"));

    const outcome = await inTurn(fx, (s) => s.travel.advanceJourney("aria"));
    expect(outcome.steps).toEqual([]);
    expect(outcome.journey?.status).toBe("awaiting_check");
    expect(outcome.checkRequired?.zoneKey).toBe("ridge");
  });

  it("walks out to a side zone and back onto the route", async () => {
    const fx = await valley();
    await inTurn(fx, (s) => s.travel.startJourney("aria", "forest", "walking"));
    await inTurn(fx, (s) => s.travel.advanceJourney("aria"));

    const detour = await inTurn(fx, (s) => s.travel.detourToZone("aria", "meadow"));
    expect(detour.success).toBe(true);
    expect(detour.steps.map((step) => [step.fromZoneKey, step.toZoneKey, step.minutes])).toEqual([
      ["road", "meadow", 30],
    ]);
    // road → meadow 30 and meadow → road 24 on top of the original 42
    expect(detour.journey).toMatchObject({
      status: "interrupted",
      interruptReason: "detour",
      path: ["village", "road", "meadow", "road", "forest"],
      positionIndex: 2,
      elapsedMinutes: 42,
      estimatedTotalMinutes: 96,
    });
    expect(await zoneOf(fx, "aria")).toBe("meadow");

    await inTurn(fx, (s) => s.travel.resumeJourney("aria"));
    const finished = await inTurn(fx, (s) => s.travel.advanceJourney("aria", 5));
    expect(finished.steps.map((step) => [step.toZoneKey, step.minutes])).toEqual([
      ["road", 24],
      ["forest", 30],
    ]);
    expect(finished.journey).toMatchObject({
      status: "arrived",
      elapsedMinutes: 96,
      visitedZoneKeys: ["village", "road", "meadow", "forest"],
    });
    expect(await zoneOf(fx, "aria")).toBe("forest");
  });

  it("refuses a detour to an unknown zone", async () => {
    const fx = await valley();
    await inTurn(fx, (s) => s.travel.startJourney("aria", "forest", "walking"));
    const outcome = await inTurn(fx, (s) => s.travel.detourToZone("aria", "glade"));
    expect(outcome.success).toBe(false);
    expect(outcome.reason).toBe(
      'Destination "glade" is unknown; it must be discovered before travelling there',
    );
    expect(outcome.journey?.path).toEqual(["village", "road", "forest"]);
  });

  it("reports progress of the active journey", async () => {
    const fx = await valley();
    expect(await inTurn(fx, (s) => s.travel.getJourney("aria"))).toBeNull();

    await inTurn(fx, (s) => s.travel.startJourney("aria", "forest", "walking"));
    await inTurn(fx, (s) => s.travel.advanceJourney("aria"));
    const progress = await inTurn(fx, (s) => s.travel.getJourney("aria"));
    expect(progress).toMatchObject({ progressPercent: 50, zonesRemaining: 1 });
    expect(progress?.journey.visitedZoneKeys).toEqual(["village", "road"]);
    await expect(
      inTurn(fx, (s) => s.travel.getJourney("ghost")),
    ).rejects.toBeInstanceOf(EntityNotFoundError);
  });
});

import { ChangeLog } from "./changes.js";
import type { EngineConfig } from "./config.js";
import type { DiceOptions } from "./dice/dice.js";
import type { RandomSource } from "./dice/random.js";
import { SkillChecker } from "./dice/skill-check.js";
import type { Logger } from "./logger.js";
import { DiscoveryTracker } from "./navigation/discovery.js";
import { Pathfinder } from "./navigation/pathfinding.js";
import { TravelOrchestrator } from "./navigation/travel.js";
import { ModifierRegistry } from "./needs/modifier-registry.js";
import { NeedsEngine } from "./needs/needs-engine.js";
import type { SatisfactionCatalog } from "./needs/satisfaction-catalog.js";
import type { Repositories } from "./store/repositories.js";
import type { TurnScope } from "./types.js";

/** Long-lived collaborators shared by every tool call */
export type EngineDeps = {
  config: EngineConfig;
  rng: RandomSource;
  /** HMAC key for roll signatures; rolls go unsigned without one */
  diceSigningSecret?: string;
  catalog: SatisfactionCatalog;
  logger: Logger;
};

/** Services bound to one transaction and one turn */
export type TurnServices = {
  scope: TurnScope;
  changes: ChangeLog;
  modifiers: ModifierRegistry;
  needs: NeedsEngine;
  pathfinder: Pathfinder;
  discovery: DiscoveryTracker;
  checker: SkillChecker;
  travel: TravelOrchestrator;
  dice: DiceOptions;
};

export function createTurnServices(
  repos: Repositories,
  scope: TurnScope,
  deps: EngineDeps,
): TurnServices {
  const changes = new ChangeLog();
  const modifiers = new ModifierRegistry(repos, scope, changes);
  const needs = new NeedsEngine(repos, scope, changes, modifiers, deps.config);
  const pathfinder = new Pathfinder(repos, scope, changes, deps.config);
  const discovery = new DiscoveryTracker(repos, scope, changes);
  const dice: DiceOptions = { rng: deps.rng, signingSecret: deps.diceSigningSecret };
  const checker = new SkillChecker(repos, scope, needs, dice);
  const travel = new TravelOrchestrator(
    repos,
    scope,
    changes,
    needs,
    discovery,
    pathfinder,
    checker,
    deps.rng,
    deps.config.preferRoadsBias,
  );
  return { scope, changes, modifiers, needs, pathfinder, discovery, checker, travel, dice };
}

// ---------------------------------------------------------------------------
// @wayfarer/engine — barrel export
// ---------------------------------------------------------------------------

// Entry point
export { createEngine, type Engine, type EngineOptions } from "./engine.js";
export { createTurnServices, type EngineDeps, type TurnServices } from "./services.js";
export { DEFAULT_ENGINE_CONFIG, EngineConfig } from "./config.js";
export { createLogger, type Logger } from "./logger.js";
export { ChangeLog } from "./changes.js";

// Errors
export {
  AdaptationNotFoundError,
  DomainError,
  EntityNotFoundError,
  InvariantViolationError,
  JourneyNotFoundError,
  LocationNotFoundError,
  NeedsUninitializedError,
  SessionNotFoundError,
  TransportModeNotFoundError,
  ZoneNotFoundError,
  type DomainErrorCode,
} from "./errors.js";

// Stores
export { MemoryWorldStore } from "./store/memory-store.js";
export { DrizzleWorldStore, type DrizzleStoreOptions } from "./store/drizzle-store.js";
export { isTransientConflict, withRetry } from "./store/retry.js";
export type { Repositories, WorldStore } from "./store/repositories.js";

// Needs
export { ModifierRegistry } from "./needs/modifier-registry.js";
export { NeedsEngine, reported } from "./needs/needs-engine.js";
export {
  DEFAULT_SATISFACTION_CATALOG,
  estimateBaseAmount,
  type SatisfactionCatalog,
} from "./needs/satisfaction-catalog.js";

// Navigation
export { ZoneGraph } from "./navigation/zone-graph.js";
export { findPath, findPathVia, Pathfinder, type PathResult } from "./navigation/pathfinding.js";
export { DiscoveryTracker } from "./navigation/discovery.js";
export {
  journeyProgress,
  TravelOrchestrator,
  type JourneyProgress,
  type TravelOutcome,
} from "./navigation/travel.js";

// Dice
export { cryptoRandom, type RandomSource } from "./dice/random.js";
export { parseFormula, rollDice, verifyRoll } from "./dice/dice.js";
export { resolveSkillCheck } from "./dice/skill-check.js";

// Turns & world
export { advanceTurn, type TurnReport } from "./turn/turn-processor.js";
export { loadWorld, type LoadedWorld } from "./world/world-loader.js";

export type * from "./types.js";

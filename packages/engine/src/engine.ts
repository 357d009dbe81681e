import type { ToolCall, ToolOutcome, WorldDefinitionInput } from "@wayfarer/shared";
import type { z } from "zod";
import { EngineConfig } from "./config.js";
import { cryptoRandom, type RandomSource } from "./dice/random.js";
import { createLogger, type Logger } from "./logger.js";
import {
  DEFAULT_SATISFACTION_CATALOG,
  type SatisfactionCatalog,
} from "./needs/satisfaction-catalog.js";
import type { EngineDeps } from "./services.js";
import type { WorldStore } from "./store/repositories.js";
import { ToolExecutor } from "./tools/executor.js";
import { advanceTurn, type TurnOptions, type TurnReport } from "./turn/turn-processor.js";
import { loadWorld, type LoadedWorld } from "./world/world-loader.js";

export type EngineOptions = {
  config?: z.input<typeof EngineConfig>;
  rng?: RandomSource;
  diceSigningSecret?: string;
  catalog?: SatisfactionCatalog;
  logger?: Logger;
};

export interface Engine {
  readonly deps: EngineDeps;
  execute(call: ToolCall): Promise<ToolOutcome>;
  advanceTurn(sessionId: string, options?: TurnOptions): Promise<TurnReport>;
  loadWorld(world: WorldDefinitionInput): Promise<LoadedWorld>;
  close(): Promise<void>;
}

/** Wire the simulation over a store; every entry point is one transaction */
export function createEngine(store: WorldStore, options: EngineOptions = {}): Engine {
  const deps: EngineDeps = {
    config: EngineConfig.parse(options.config ?? {}),
    rng: options.rng ?? cryptoRandom,
    diceSigningSecret: options.diceSigningSecret,
    catalog: options.catalog ?? DEFAULT_SATISFACTION_CATALOG,
    logger: options.logger ?? createLogger(),
  };
  const executor = new ToolExecutor(store, deps);

  return {
    deps,
    execute: (call) => executor.execute(call),
    advanceTurn: (sessionId, turnOptions) =>
      store.transaction((repos) => advanceTurn(repos, deps, sessionId, turnOptions)),
    loadWorld: (world) => store.transaction((repos) => loadWorld(repos, deps, world)),
    close: () => store.close(),
  };
}

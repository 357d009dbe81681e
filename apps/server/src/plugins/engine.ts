// ---------------------------------------------------------------------------
// Fastify plugin: world store + simulation engine
// ---------------------------------------------------------------------------

import { createDb, upsertTransportModes } from "@wayfarer/db";
import {
  createEngine,
  DrizzleWorldStore,
  EngineConfig,
  MemoryWorldStore,
  type Engine,
  type EngineOptions,
  type Logger,
  type WorldStore,
} from "@wayfarer/engine";
import { DEFAULT_TRANSPORT_MODES } from "@wayfarer/shared";
import type { FastifyInstance } from "fastify";
import fp from "fastify-plugin";

declare module "fastify" {
  interface FastifyInstance {
    engine: Engine;
  }
}

export type EnginePluginOptions = {
  logger: Logger;
  /** Merged over the env-derived options (tests pass config overrides here) */
  engine?: EngineOptions;
};

export default fp<EnginePluginOptions>(
  async function enginePlugin(app: FastifyInstance, options) {
    const config = EngineConfig.parse(options.engine?.config ?? {});
    const logger = options.logger.child({ component: "engine" });

    let store: WorldStore;
    if (app.env.STORE === "memory") {
      store = new MemoryWorldStore();
    } else {
      const { db, pool } = createDb(app.env.DATABASE_URL);
      try {
        const modes = await upsertTransportModes(db, DEFAULT_TRANSPORT_MODES);
        logger.info({ modes }, "transport_catalog_synced");
      } catch (err) {
        await pool.end();
        throw err;
      }
      store = new DrizzleWorldStore(db, {
        pool,
        maxAttempts: config.maxTransactionAttempts,
        logger,
      });
    }

    const engine = createEngine(store, {
      diceSigningSecret: app.env.DICE_SIGNING_SECRET,
      ...options.engine,
      config,
      logger,
    });
    app.decorate("engine", engine);

    app.addHook("onClose", async () => {
      await engine.close();
    });

    logger.info({ store: app.env.STORE }, "engine_ready");
  },
  { name: "engine" },
);

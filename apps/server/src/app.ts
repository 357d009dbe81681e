// ---------------------------------------------------------------------------
// Fastify app factory — used by both the entry point and tests
// ---------------------------------------------------------------------------

import cors from "@fastify/cors";
import { createLogger, DomainError, type EngineOptions } from "@wayfarer/engine";
import Fastify, { type FastifyInstance } from "fastify";
import { type AppEnv, loadEnv } from "./lib/env.js";
import { AppError, statusForDomainCode } from "./lib/errors.js";
import enginePlugin from "./plugins/engine.js";
import sessionRoutes from "./routes/sessions.js";
import toolRoutes from "./routes/tools.js";

declare module "fastify" {
  interface FastifyInstance {
    env: AppEnv;
  }
}

export interface BuildAppOptions {
  /** Override the loaded env (tests run on the memory store) */
  env?: Partial<AppEnv>;
  /** Engine overrides such as a scripted rng */
  engine?: EngineOptions;
}

export async function buildApp(
  options: BuildAppOptions = {},
): Promise<FastifyInstance> {
  const env: AppEnv = { ...loadEnv(), ...options.env };
  const logger = createLogger(env.LOG_LEVEL);

  // Request logging stays off; the engine logs every tool call through `logger`
  const app = Fastify({ logger: false });

  // Decorate env so plugins can access it
  app.decorate("env", env);

  // CORS
  await app.register(cors, { origin: true });

  await app.register(enginePlugin, { logger, engine: options.engine });

  await app.register(toolRoutes);
  await app.register(sessionRoutes);

  // Health check
  app.get("/api/health", async () => ({ status: "ok" }));

  // Global error handler
  app.setErrorHandler((error: Error & { statusCode?: number }, request, reply) => {
    if (error instanceof AppError) {
      return reply.status(error.statusCode).send({ error: error.message });
    }
    if (error instanceof DomainError) {
      return reply
        .status(statusForDomainCode(error.code))
        .send({ error: error.message, code: error.code });
    }
    logger.error({ err: error, url: request.url }, "request_failed");
    return reply
      .status(error.statusCode ?? 500)
      .send({ error: error.message || "Internal server error" });
  });

  return app;
}

// ---------------------------------------------------------------------------
// apps/server — production entry point
// ---------------------------------------------------------------------------

import "dotenv/config";
import { buildApp } from "./app.js";
import { loadEnv } from "./lib/env.js";

async function main() {
  const env = loadEnv();
  const app = await buildApp({ env });

  await app.listen({ port: env.PORT, host: env.HOST });
  app.engine.deps.logger.info({ host: env.HOST, port: env.PORT }, "listening");

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      app.engine.deps.logger.info({ signal }, "shutting_down");
      app.close().then(
        () => process.exit(0),
        (err: unknown) => {
          app.engine.deps.logger.error({ err }, "shutdown_failed");
          process.exit(1);
        },
      );
    });
  }
}

main().catch((err: unknown) => {
  console.error("[server] failed to start:", err);
  process.exit(1);
});

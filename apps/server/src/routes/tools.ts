// ---------------------------------------------------------------------------
// Tool routes: the single entry point the game master calls into
// ---------------------------------------------------------------------------

import { ToolCall } from "@wayfarer/shared";
import type { FastifyInstance } from "fastify";
import { sendZodError } from "../lib/errors.js";

export default async function toolRoutes(app: FastifyInstance) {
  // -----------------------------------------------------------------
  // POST /api/tools/execute
  // -----------------------------------------------------------------
  // Domain failures come back as `ok: false` outcomes with a 200; only a
  // malformed call is an HTTP error.
  app.post("/api/tools/execute", async (request, reply) => {
    const parsed = ToolCall.safeParse(request.body);
    if (!parsed.success) return sendZodError(reply, parsed.error);

    return reply.send(await app.engine.execute(parsed.data));
  });
}

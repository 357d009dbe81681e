// ---------------------------------------------------------------------------
// Session routes: world loading, turn advancement, needs inspection
// ---------------------------------------------------------------------------

import { ActivityType, WorldDefinition } from "@wayfarer/shared";
import type { FastifyInstance } from "fastify";
import { z } from "zod";
import { AppError, sendZodError, statusForDomainCode } from "../lib/errors.js";

const SessionParam = z.object({
  sessionId: z.string().uuid(),
});

const EntityNeedsParam = SessionParam.extend({
  entityKey: z.string().min(1),
});

const AdvanceTurnBody = z
  .object({
    minutes: z.number().int().min(0).optional(),
    activity: ActivityType.optional(),
  })
  .default({});

export default async function sessionRoutes(app: FastifyInstance) {
  // -----------------------------------------------------------------
  // POST /api/worlds
  // -----------------------------------------------------------------
  app.post("/api/worlds", async (request, reply) => {
    const parsed = WorldDefinition.safeParse(request.body);
    if (!parsed.success) return sendZodError(reply, parsed.error);

    const loaded = await app.engine.loadWorld(parsed.data);
    return reply.status(201).send({
      session: {
        id: loaded.session.id,
        name: loaded.session.name,
        current_turn: loaded.session.currentTurn,
        minutes_per_turn: loaded.session.minutesPerTurn,
      },
      counts: {
        zones: loaded.zones,
        connections: loaded.connections,
        locations: loaded.locations,
        entities: loaded.entities,
      },
    });
  });

  // -----------------------------------------------------------------
  // POST /api/sessions/:sessionId/turns
  // -----------------------------------------------------------------
  app.post("/api/sessions/:sessionId/turns", async (request, reply) => {
    const paramParsed = SessionParam.safeParse(request.params);
    if (!paramParsed.success) return sendZodError(reply, paramParsed.error);

    const bodyParsed = AdvanceTurnBody.safeParse(request.body);
    if (!bodyParsed.success) return sendZodError(reply, bodyParsed.error);

    const report = await app.engine.advanceTurn(paramParsed.data.sessionId, bodyParsed.data);
    return reply.send({
      turn: report.turn,
      minutes: report.minutes,
      expired_modifiers: report.expiredModifiers,
      decayed_entities: report.decayedEntities,
      changes: report.changes,
    });
  });

  // -----------------------------------------------------------------
  // GET /api/sessions/:sessionId/entities/:entityKey/needs
  // -----------------------------------------------------------------
  app.get("/api/sessions/:sessionId/entities/:entityKey/needs", async (request, reply) => {
    const parsed = EntityNeedsParam.safeParse(request.params);
    if (!parsed.success) return sendZodError(reply, parsed.error);

    const outcome = await app.engine.execute({
      tool: "get_needs",
      args: { session_id: parsed.data.sessionId, entity_key: parsed.data.entityKey },
    });
    if (!outcome.ok) {
      throw new AppError(statusForDomainCode(outcome.code), outcome.error);
    }
    return reply.send(outcome.result);
  });
}

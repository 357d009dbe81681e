// ---------------------------------------------------------------------------
// Test helpers — shared across the route tests
// ---------------------------------------------------------------------------

import type { WorldDefinitionInput } from "@wayfarer/shared";
import type { FastifyInstance } from "fastify";
import { buildApp, type BuildAppOptions } from "../app.js";

/** Build an app on the in-memory store with logging off */
export async function getTestApp(
  options: Pick<BuildAppOptions, "engine"> = {},
): Promise<FastifyInstance> {
  const app = await buildApp({
    env: { STORE: "memory", LOG_LEVEL: "silent", DICE_SIGNING_SECRET: "test-secret" },
    engine: options.engine,
  });
  await app.ready();
  return app;
}

export const HAMLET: WorldDefinitionInput = {
  name: "Hamlet",
  minutes_per_turn: 10,
  zones: [
    { key: "square", display_name: "Market Square", terrain: "urban", visibility_range: "short", encounter_frequency: "none" },
    { key: "lane", display_name: "Mill Lane", terrain: "road", visibility_range: "short", encounter_frequency: "none" },
  ],
  connections: [{ from_zone_key: "square", to_zone_key: "lane", crossing_minutes: 5 }],
  locations: [{ key: "well", display_name: "Old Well", zone_key: "square" }],
  entities: [
    { key: "mira", display_name: "Mira", kind: "player", current_zone_key: "square", needs: {} },
    { key: "cart", display_name: "Cart", current_zone_key: "square" },
  ],
};

/** Load HAMLET and return the new session id */
export async function loadHamlet(app: FastifyInstance): Promise<string> {
  const res = await app.inject({ method: "POST", url: "/api/worlds", payload: HAMLET });
  return res.json().session.id;
}

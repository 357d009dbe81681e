import { DEFAULT_TRANSPORT_MODES } from "@wayfarer/shared";
import "dotenv/config";
import { createDb, DEFAULT_DATABASE_URL } from "./client.js";
import { upsertTransportModes } from "./transport-catalog.js";

async function main() {
  const { db, pool } = createDb(process.env.DATABASE_URL ?? DEFAULT_DATABASE_URL);

  const count = await upsertTransportModes(db, DEFAULT_TRANSPORT_MODES);

  await pool.end();

  console.log("Seed data created:");
  console.log(`  Transport modes: ${count}`);
}

main().catch((err) => {
  console.error("Seed failed:", err);
  process.exit(1);
});

import "dotenv/config";
import { fileURLToPath } from "node:url";
import { migrate } from "drizzle-orm/node-postgres/migrator";
import { createDb, DEFAULT_DATABASE_URL } from "./client.js";

// drizzle-kit writes migrations to packages/db/drizzle (see drizzle.config.ts)
const migrationsFolder = fileURLToPath(new URL("../drizzle", import.meta.url));

async function main() {
  const { db, pool } = createDb(process.env.DATABASE_URL ?? DEFAULT_DATABASE_URL, {
    maxConnections: 1,
  });
  try {
    await migrate(db, { migrationsFolder });
    console.log(`Migrations applied from ${migrationsFolder}`);
  } finally {
    await pool.end();
  }
}

main().catch((err: unknown) => {
  console.error("Migration failed:", err);
  process.exit(1);
});

import { getTableName } from "drizzle-orm";
import { getTableConfig, type PgTable } from "drizzle-orm/pg-core";
import { describe, expect, it } from "vitest";
import * as schema from "../schema/index.js";

// ---------------------------------------------------------------------------
// Helpers — inspect the drizzle table metadata in-process (no database)
// ---------------------------------------------------------------------------

function uniqueIndexColumns(table: PgTable): string[][] {
  return getTableConfig(table)
    .indexes.filter((idx) => idx.config.unique)
    .map((idx) =>
      idx.config.columns.map((col) => ("name" in col ? String(col.name) : "")),
    );
}

function foreignKeys(table: PgTable) {
  return getTableConfig(table).foreignKeys.map((fk) => {
    const ref = fk.reference();
    return {
      columns: ref.columns.map((c) => c.name),
      foreignTable: getTableName(ref.foreignTable),
      foreignColumns: ref.foreignColumns.map((c) => c.name),
      onDelete: fk.onDelete,
    };
  });
}

function column(table: PgTable, name: string) {
  const col = getTableConfig(table).columns.find((c) => c.name === name);
  if (!col) throw new Error(`column ${name} missing`);
  return col;
}

// ---------------------------------------------------------------------------
// Uniqueness
// ---------------------------------------------------------------------------

describe("schema uniqueness", () => {
  it("allows one modifier per (entity, need, source, source_detail)", () => {
    expect(uniqueIndexColumns(schema.needModifier)).toContainEqual([
      "session_id",
      "entity_key",
      "need_name",
      "source",
      "source_detail",
    ]);
  });

  it("keeps source_detail non-null so the unique index deduplicates", () => {
    const col = column(schema.needModifier, "source_detail");
    expect(col.notNull).toBe(true);
    expect(col.default).toBe("");
  });

  it("stores one need value per (entity, need)", () => {
    expect(uniqueIndexColumns(schema.needValue)).toContainEqual([
      "session_id",
      "entity_key",
      "need_name",
    ]);
  });

  it("allows one zone discovery per (session, zone)", () => {
    expect(uniqueIndexColumns(schema.zoneDiscovery)).toContainEqual([
      "session_id",
      "zone_key",
    ]);
  });

  it("allows one location discovery per (session, location)", () => {
    expect(uniqueIndexColumns(schema.locationDiscovery)).toContainEqual([
      "session_id",
      "location_key",
    ]);
  });

  it("scopes zone and entity keys to a session", () => {
    expect(uniqueIndexColumns(schema.terrainZone)).toContainEqual([
      "session_id",
      "zone_key",
    ]);
    expect(uniqueIndexColumns(schema.entity)).toContainEqual([
      "session_id",
      "entity_key",
    ]);
  });
});

// ---------------------------------------------------------------------------
// Cascade on session removal
// ---------------------------------------------------------------------------

describe("schema foreign keys", () => {
  it.each([
    ["need_value", schema.needValue],
    ["need_modifier", schema.needModifier],
    ["need_adaptation", schema.needAdaptation],
    ["character_preferences", schema.characterPreferences],
    ["journey", schema.journey],
  ])("%s cascades from its entity", (_name, table) => {
    expect(foreignKeys(table)).toContainEqual({
      columns: ["session_id", "entity_key"],
      foreignTable: "entity",
      foreignColumns: ["session_id", "entity_key"],
      onDelete: "cascade",
    });
  });

  it("connections cascade from both endpoint zones", () => {
    const fks = foreignKeys(schema.zoneConnection);
    expect(fks.map((fk) => fk.columns)).toEqual([
      ["session_id", "from_zone_key"],
      ["session_id", "to_zone_key"],
    ]);
    expect(fks.every((fk) => fk.onDelete === "cascade")).toBe(true);
  });

  it("zones and entities cascade from the session", () => {
    for (const table of [schema.terrainZone, schema.entity]) {
      expect(foreignKeys(table)).toContainEqual({
        columns: ["session_id"],
        foreignTable: "game_session",
        foreignColumns: ["id"],
        onDelete: "cascade",
      });
    }
  });

  it("zone parents reference a zone in the same session without cascading", () => {
    const parent = foreignKeys(schema.terrainZone).find(
      (fk) => fk.columns[1] === "parent_zone_key",
    );
    expect(parent?.foreignTable).toBe("terrain_zone");
    expect(parent?.foreignColumns).toEqual(["session_id", "zone_key"]);
    expect(parent?.onDelete).not.toBe("cascade");
  });

  it("keeps the transport catalog global", () => {
    const names = getTableConfig(schema.transportMode).columns.map(
      (c) => c.name,
    );
    expect(names).not.toContain("session_id");
    expect(column(schema.transportMode, "mode_key").isUnique).toBe(true);
  });
});

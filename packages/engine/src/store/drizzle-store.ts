import {
  characterPreferences,
  entity,
  gameSession,
  journey,
  location,
  locationDiscovery,
  needAdaptation,
  needModifier,
  needValue,
  terrainZone,
  transportMode,
  zoneConnection,
  zoneDiscovery,
  type Database,
  type Transaction,
} from "@wayfarer/db";
import { and, desc, eq, inArray, isNotNull, lte } from "drizzle-orm";
import type { Logger } from "../logger.js";
import type {
  DiscoveryRecord,
  ModifierKey,
  NeedModifier,
  Zone,
} from "../types.js";
import {
  ACTIVE_JOURNEY_STATUSES,
  type Repositories,
  type WorldStore,
} from "./repositories.js";
import { withRetry } from "./retry.js";

export type DrizzleStoreOptions = {
  /** Closed by `close()`; usually the pool returned by `createDb` */
  pool: { end(): Promise<void> };
  maxAttempts: number;
  logger?: Logger;
};

/**
 * Postgres-backed store. Each transaction runs SERIALIZABLE and is retried
 * on serialization failures and deadlocks; domain errors are never retried.
 */
export class DrizzleWorldStore implements WorldStore {
  constructor(
    private readonly db: Database,
    private readonly options: DrizzleStoreOptions,
  ) {}

  transaction<T>(work: (repos: Repositories) => Promise<T>): Promise<T> {
    return withRetry(
      () =>
        this.db.transaction((tx) => work(createDrizzleRepositories(tx)), {
          isolationLevel: "serializable",
        }),
      this.options.maxAttempts,
      this.options.logger,
    );
  }

  async close(): Promise<void> {
    await this.options.pool.end();
  }
}

// ---------------------------------------------------------------------------
// Row mapping
// ---------------------------------------------------------------------------

function modifierWhere(key: ModifierKey) {
  return and(
    eq(needModifier.sessionId, key.sessionId),
    eq(needModifier.entityKey, key.entityKey),
    eq(needModifier.needName, key.need),
    eq(needModifier.source, key.source),
    eq(needModifier.sourceDetail, key.sourceDetail),
  );
}

function toModifier(row: typeof needModifier.$inferSelect): NeedModifier {
  return {
    id: row.id,
    sessionId: row.sessionId,
    entityKey: row.entityKey,
    need: row.needName,
    source: row.source,
    sourceDetail: row.sourceDetail,
    decayRateMultiplier: row.decayRateMultiplier,
    satisfactionMultiplier: row.satisfactionMultiplier,
    maxIntensityCap: row.maxIntensityCap,
    thresholdAdjustment: row.thresholdAdjustment,
    isActive: row.isActive,
    expiresAtTurn: row.expiresAtTurn,
  };
}

function toZone(row: typeof terrainZone.$inferSelect): Zone {
  return {
    sessionId: row.sessionId,
    key: row.zoneKey,
    displayName: row.displayName,
    terrain: row.terrain,
    parentZoneKey: row.parentZoneKey,
    baseTravelCost: row.baseTravelCost,
    mountedTravelCost: row.mountedTravelCost,
    requiresSkill: row.requiresSkill,
    skillDifficulty: row.skillDifficulty,
    failureConsequence: row.failureConsequence,
    visibilityRange: row.visibilityRange,
    encounterFrequency: row.encounterFrequency,
    isAccessible: row.isAccessible,
    blockedReason: row.blockedReason,
    description: row.description,
  };
}

function toZoneDiscovery(
  row: typeof zoneDiscovery.$inferSelect,
): DiscoveryRecord {
  return {
    sessionId: row.sessionId,
    key: row.zoneKey,
    discoveredTurn: row.discoveredTurn,
    method: row.method,
    sourceEntityKey: row.sourceEntityKey,
    sourceMapKey: row.sourceMapKey,
    sourceZoneKey: row.sourceZoneKey,
  };
}

function toLocationDiscovery(
  row: typeof locationDiscovery.$inferSelect,
): DiscoveryRecord {
  return {
    sessionId: row.sessionId,
    key: row.locationKey,
    discoveredTurn: row.discoveredTurn,
    method: row.method,
    sourceEntityKey: row.sourceEntityKey,
    sourceMapKey: row.sourceMapKey,
    sourceZoneKey: row.sourceZoneKey,
  };
}

// ---------------------------------------------------------------------------
// Repositories bound to one transaction
// ---------------------------------------------------------------------------

function createDrizzleRepositories(tx: Transaction): Repositories {
  return {
    sessions: {
      async find(sessionId) {
        const [row] = await tx
          .select()
          .from(gameSession)
          .where(eq(gameSession.id, sessionId))
          .limit(1);
        if (!row) return null;
        return {
          id: row.id,
          name: row.name,
          currentTurn: row.currentTurn,
          minutesPerTurn: row.minutesPerTurn,
        };
      },
      async create(input) {
        const [row] = await tx
          .insert(gameSession)
          .values({ name: input.name, minutesPerTurn: input.minutesPerTurn })
          .returning();
        return {
          id: row.id,
          name: row.name,
          currentTurn: row.currentTurn,
          minutesPerTurn: row.minutesPerTurn,
        };
      },
      async setTurn(sessionId, turn) {
        await tx
          .update(gameSession)
          .set({ currentTurn: turn })
          .where(eq(gameSession.id, sessionId));
      },
    },

    entities: {
      async find(sessionId, key) {
        const [row] = await tx
          .select()
          .from(entity)
          .where(and(eq(entity.sessionId, sessionId), eq(entity.entityKey, key)))
          .limit(1);
        if (!row) return null;
        return {
          sessionId: row.sessionId,
          key: row.entityKey,
          displayName: row.displayName,
          kind: row.kind,
          currentZoneKey: row.currentZoneKey,
          skills: row.skills,
          attributes: row.attributes,
          extra: row.extra,
        };
      },
      async insert(e) {
        await tx.insert(entity).values({
          sessionId: e.sessionId,
          entityKey: e.key,
          displayName: e.displayName,
          kind: e.kind,
          currentZoneKey: e.currentZoneKey,
          skills: e.skills,
          attributes: e.attributes,
          extra: e.extra,
        });
      },
      async setZone(sessionId, key, zoneKey) {
        await tx
          .update(entity)
          .set({ currentZoneKey: zoneKey })
          .where(and(eq(entity.sessionId, sessionId), eq(entity.entityKey, key)));
      },
    },

    needs: {
      async find(sessionId, entityKey) {
        const rows = await tx
          .select()
          .from(needValue)
          .where(
            and(
              eq(needValue.sessionId, sessionId),
              eq(needValue.entityKey, entityKey),
            ),
          );
        return rows.map((row) => ({
          need: row.needName,
          value: row.value,
          craving: row.craving,
          lastSatisfiedTurn: row.lastSatisfiedTurn,
          lastCommunicatedTurn: row.lastCommunicatedTurn,
          lastCommunicatedValue: row.lastCommunicatedValue,
        }));
      },
      async listEntityKeys(sessionId) {
        const rows = await tx
          .selectDistinct({ entityKey: needValue.entityKey })
          .from(needValue)
          .where(eq(needValue.sessionId, sessionId))
          .orderBy(needValue.entityKey);
        return rows.map((row) => row.entityKey);
      },
      async save(sessionId, entityKey, records) {
        for (const record of records) {
          const values = {
            value: record.value,
            craving: record.craving,
            lastSatisfiedTurn: record.lastSatisfiedTurn,
            lastCommunicatedTurn: record.lastCommunicatedTurn,
            lastCommunicatedValue: record.lastCommunicatedValue,
          };
          await tx
            .insert(needValue)
            .values({ sessionId, entityKey, needName: record.need, ...values })
            .onConflictDoUpdate({
              target: [needValue.sessionId, needValue.entityKey, needValue.needName],
              set: values,
            });
        }
      },
    },

    modifiers: {
      async list(sessionId, entityKey, need) {
        const rows = await tx
          .select()
          .from(needModifier)
          .where(
            and(
              eq(needModifier.sessionId, sessionId),
              eq(needModifier.entityKey, entityKey),
              need === undefined ? undefined : eq(needModifier.needName, need),
            ),
          );
        return rows.map(toModifier);
      },
      async find(key) {
        const [row] = await tx
          .select()
          .from(needModifier)
          .where(modifierWhere(key))
          .limit(1);
        return row ? toModifier(row) : null;
      },
      async upsert(m) {
        const values = {
          decayRateMultiplier: m.decayRateMultiplier,
          satisfactionMultiplier: m.satisfactionMultiplier,
          maxIntensityCap: m.maxIntensityCap,
          thresholdAdjustment: m.thresholdAdjustment,
          isActive: m.isActive,
          expiresAtTurn: m.expiresAtTurn,
        };
        const [row] = await tx
          .insert(needModifier)
          .values({
            sessionId: m.sessionId,
            entityKey: m.entityKey,
            needName: m.need,
            source: m.source,
            sourceDetail: m.sourceDetail,
            ...values,
          })
          .onConflictDoUpdate({
            target: [
              needModifier.sessionId,
              needModifier.entityKey,
              needModifier.needName,
              needModifier.source,
              needModifier.sourceDetail,
            ],
            set: values,
          })
          .returning();
        return toModifier(row);
      },
      async setActive(key, isActive) {
        const rows = await tx
          .update(needModifier)
          .set({ isActive })
          .where(modifierWhere(key))
          .returning({ id: needModifier.id });
        return rows.length > 0;
      },
      async listBySource(sessionId, entityKey, source) {
        const rows = await tx
          .select()
          .from(needModifier)
          .where(
            and(
              eq(needModifier.sessionId, sessionId),
              eq(needModifier.entityKey, entityKey),
              eq(needModifier.source, source),
            ),
          );
        return rows.map(toModifier);
      },
      async expireStale(sessionId, turn) {
        const rows = await tx
          .update(needModifier)
          .set({ isActive: false })
          .where(
            and(
              eq(needModifier.sessionId, sessionId),
              eq(needModifier.isActive, true),
              isNotNull(needModifier.expiresAtTurn),
              lte(needModifier.expiresAtTurn, turn),
            ),
          )
          .returning({ id: needModifier.id });
        return rows.length;
      },
    },

    adaptations: {
      async insert(a) {
        const [row] = await tx
          .insert(needAdaptation)
          .values({
            sessionId: a.sessionId,
            entityKey: a.entityKey,
            needName: a.need,
            delta: a.delta,
            reason: a.reason,
            trigger: a.trigger,
            startedTurn: a.startedTurn,
            completedTurn: a.completedTurn,
            isGradual: a.isGradual,
            durationDays: a.durationDays,
            isReversible: a.isReversible,
            reversalTrigger: a.reversalTrigger,
            reversedBy: a.reversedBy,
          })
          .returning({ id: needAdaptation.id });
        return { id: row.id, ...a };
      },
      async find(sessionId, id) {
        const [row] = await tx
          .select()
          .from(needAdaptation)
          .where(
            and(eq(needAdaptation.sessionId, sessionId), eq(needAdaptation.id, id)),
          )
          .limit(1);
        if (!row) return null;
        const { needName, ...rest } = row;
        return { ...rest, need: needName };
      },
      async list(sessionId, entityKey, need) {
        const rows = await tx
          .select()
          .from(needAdaptation)
          .where(
            and(
              eq(needAdaptation.sessionId, sessionId),
              eq(needAdaptation.entityKey, entityKey),
              eq(needAdaptation.needName, need),
            ),
          )
          .orderBy(needAdaptation.startedTurn);
        return rows.map(({ needName, ...rest }) => ({ ...rest, need: needName }));
      },
      async markReversed(sessionId, id, reversedBy) {
        await tx
          .update(needAdaptation)
          .set({ reversedBy })
          .where(
            and(eq(needAdaptation.sessionId, sessionId), eq(needAdaptation.id, id)),
          );
      },
    },

    preferences: {
      async find(sessionId, entityKey) {
        const [row] = await tx
          .select()
          .from(characterPreferences)
          .where(
            and(
              eq(characterPreferences.sessionId, sessionId),
              eq(characterPreferences.entityKey, entityKey),
            ),
          )
          .limit(1);
        if (!row) return null;
        const { id: _id, ...prefs } = row;
        return prefs;
      },
      async save(prefs) {
        const { sessionId: _sessionId, entityKey: _entityKey, ...values } = prefs;
        await tx
          .insert(characterPreferences)
          .values(prefs)
          .onConflictDoUpdate({
            target: [characterPreferences.sessionId, characterPreferences.entityKey],
            set: values,
          });
      },
    },

    zones: {
      async list(sessionId) {
        const rows = await tx
          .select()
          .from(terrainZone)
          .where(eq(terrainZone.sessionId, sessionId));
        return rows.map(toZone);
      },
      async find(sessionId, key) {
        const [row] = await tx
          .select()
          .from(terrainZone)
          .where(
            and(eq(terrainZone.sessionId, sessionId), eq(terrainZone.zoneKey, key)),
          )
          .limit(1);
        return row ? toZone(row) : null;
      },
      async insert(zone) {
        const { key, ...rest } = zone;
        await tx.insert(terrainZone).values({ ...rest, zoneKey: key });
      },
    },

    connections: {
      async list(sessionId) {
        return tx
          .select()
          .from(zoneConnection)
          .where(eq(zoneConnection.sessionId, sessionId));
      },
      async insert(connection) {
        const [row] = await tx
          .insert(zoneConnection)
          .values(connection)
          .returning();
        return row;
      },
      async setVisible(sessionId, id, isVisible) {
        const rows = await tx
          .update(zoneConnection)
          .set({ isVisible })
          .where(
            and(eq(zoneConnection.sessionId, sessionId), eq(zoneConnection.id, id)),
          )
          .returning({ id: zoneConnection.id });
        return rows.length > 0;
      },
    },

    locations: {
      async list(sessionId, zoneKey) {
        const rows = await tx
          .select()
          .from(location)
          .where(
            and(
              eq(location.sessionId, sessionId),
              zoneKey === undefined ? undefined : eq(location.zoneKey, zoneKey),
            ),
          );
        return rows.map(({ id: _id, locationKey, ...rest }) => ({
          ...rest,
          key: locationKey,
        }));
      },
      async find(sessionId, key) {
        const [row] = await tx
          .select()
          .from(location)
          .where(and(eq(location.sessionId, sessionId), eq(location.locationKey, key)))
          .limit(1);
        if (!row) return null;
        const { id: _id, locationKey, ...rest } = row;
        return { ...rest, key: locationKey };
      },
      async insert(loc) {
        const { key, ...rest } = loc;
        await tx.insert(location).values({ ...rest, locationKey: key });
      },
    },

    transportModes: {
      async find(key) {
        const [row] = await tx
          .select()
          .from(transportMode)
          .where(eq(transportMode.modeKey, key))
          .limit(1);
        if (!row) return null;
        return {
          key: row.modeKey,
          displayName: row.displayName,
          type: row.transportType,
          terrainCosts: row.terrainCosts,
          requiresSkill: row.requiresSkill,
          requiresItem: row.requiresItem,
          fatigueRate: row.fatigueRate,
          encounterModifier: row.encounterModifier,
        };
      },
    },

    discoveries: {
      async findZone(sessionId, zoneKey) {
        const [row] = await tx
          .select()
          .from(zoneDiscovery)
          .where(
            and(
              eq(zoneDiscovery.sessionId, sessionId),
              eq(zoneDiscovery.zoneKey, zoneKey),
            ),
          )
          .limit(1);
        return row ? toZoneDiscovery(row) : null;
      },
      async insertZone(record) {
        const { key, ...rest } = record;
        const rows = await tx
          .insert(zoneDiscovery)
          .values({ ...rest, zoneKey: key })
          .onConflictDoNothing({
            target: [zoneDiscovery.sessionId, zoneDiscovery.zoneKey],
          })
          .returning({ id: zoneDiscovery.id });
        return rows.length > 0;
      },
      async listZones(sessionId) {
        const rows = await tx
          .select()
          .from(zoneDiscovery)
          .where(eq(zoneDiscovery.sessionId, sessionId));
        return rows.map(toZoneDiscovery);
      },
      async findLocation(sessionId, locationKey) {
        const [row] = await tx
          .select()
          .from(locationDiscovery)
          .where(
            and(
              eq(locationDiscovery.sessionId, sessionId),
              eq(locationDiscovery.locationKey, locationKey),
            ),
          )
          .limit(1);
        return row ? toLocationDiscovery(row) : null;
      },
      async insertLocation(record) {
        const { key, ...rest } = record;
        const rows = await tx
          .insert(locationDiscovery)
          .values({ ...rest, locationKey: key })
          .onConflictDoNothing({
            target: [locationDiscovery.sessionId, locationDiscovery.locationKey],
          })
          .returning({ id: locationDiscovery.id });
        return rows.length > 0;
      },
      async listLocations(sessionId) {
        const rows = await tx
          .select()
          .from(locationDiscovery)
          .where(eq(locationDiscovery.sessionId, sessionId));
        return rows.map(toLocationDiscovery);
      },
    },

    journeys: {
      async findActive(sessionId, entityKey) {
        const [row] = await tx
          .select()
          .from(journey)
          .where(
            and(
              eq(journey.sessionId, sessionId),
              eq(journey.entityKey, entityKey),
              inArray(journey.status, [...ACTIVE_JOURNEY_STATUSES]),
            ),
          )
          .orderBy(desc(journey.createdAt))
          .limit(1);
        if (!row) return null;
        const { createdAt: _createdAt, ...rest } = row;
        return rest;
      },
      async insert(j) {
        const [row] = await tx
          .insert(journey)
          .values(j)
          .returning({ id: journey.id });
        return { id: row.id, ...j };
      },
      async update(j) {
        const { id, sessionId: _sessionId, entityKey: _entityKey, ...values } = j;
        await tx.update(journey).set(values).where(eq(journey.id, id));
      },
    },
  };
}

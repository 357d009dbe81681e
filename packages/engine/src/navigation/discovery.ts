import type { DiscoveryMethod, VisibilityRange } from "@wayfarer/shared";
import type { ChangeLog } from "../changes.js";
import { LocationNotFoundError, ZoneNotFoundError } from "../errors.js";
import type { Repositories } from "../store/repositories.js";
import type {
  DiscoveryRecord,
  DiscoverySource,
  Location,
  TurnScope,
  Zone,
} from "../types.js";
import { compareStrings, type ZoneGraph } from "./zone-graph.js";

export type ZoneDiscovery = {
  zone: Zone;
  record: DiscoveryRecord;
  newlyDiscovered: boolean;
};

export type LocationDiscovery = {
  location: Location;
  record: DiscoveryRecord;
  newlyDiscovered: boolean;
};

export type Surroundings = {
  zonesDiscovered: string[];
  locationsDiscovered: string[];
};

/** How many connection hops an observer standing in the zone can see */
export const VISIBILITY_HOPS: Record<VisibilityRange, number> = {
  far: 2,
  medium: 1,
  short: 1,
  none: 0,
};

const byKey = (a: { key: string }, b: { key: string }) => compareStrings(a.key, b.key);

/**
 * Fog of war: which zones and locations the session knows about. The first
 * discovery of anything wins; repeats are no-ops.
 */
export class DiscoveryTracker {
  constructor(
    private readonly repos: Repositories,
    private readonly scope: TurnScope,
    private readonly changes: ChangeLog,
  ) {}

  async discoverZone(
    zoneKey: string,
    method: DiscoveryMethod,
    source: DiscoverySource = {},
  ): Promise<ZoneDiscovery> {
    const zone = await this.repos.zones.find(this.scope.sessionId, zoneKey);
    if (!zone) throw new ZoneNotFoundError(zoneKey);

    const record = this.newRecord(zoneKey, method, source);
    const inserted = await this.repos.discoveries.insertZone(record);
    if (!inserted) {
      const existing = await this.repos.discoveries.findZone(this.scope.sessionId, zoneKey);
      return { zone, record: existing ?? record, newlyDiscovered: false };
    }
    this.changes.record({ kind: "zone_discovered", zone_key: zoneKey, method });
    return { zone, record, newlyDiscovered: true };
  }

  async discoverLocation(
    locationKey: string,
    method: DiscoveryMethod,
    source: DiscoverySource = {},
  ): Promise<LocationDiscovery> {
    const location = await this.repos.locations.find(this.scope.sessionId, locationKey);
    if (!location) throw new LocationNotFoundError(locationKey);

    const record = this.newRecord(locationKey, method, source);
    const inserted = await this.repos.discoveries.insertLocation(record);
    if (!inserted) {
      const existing = await this.repos.discoveries.findLocation(
        this.scope.sessionId,
        locationKey,
      );
      return { location, record: existing ?? record, newlyDiscovered: false };
    }
    this.changes.record({
      kind: "location_discovered",
      location_key: locationKey,
      method,
    });
    return { location, record, newlyDiscovered: true };
  }

  async isZoneDiscovered(zoneKey: string): Promise<boolean> {
    return (await this.repos.discoveries.findZone(this.scope.sessionId, zoneKey)) !== null;
  }

  async isLocationDiscovered(locationKey: string): Promise<boolean> {
    return (
      (await this.repos.discoveries.findLocation(this.scope.sessionId, locationKey)) !== null
    );
  }

  async knownZones(): Promise<DiscoveryRecord[]> {
    return (await this.repos.discoveries.listZones(this.scope.sessionId)).sort(byKey);
  }

  async knownLocations(): Promise<DiscoveryRecord[]> {
    return (await this.repos.discoveries.listLocations(this.scope.sessionId)).sort(byKey);
  }

  /**
   * On arrival: mark the zone visited, reveal what can be seen from it, and
   * note locations that are visible from inside it. Returns only what was new.
   */
  async autoDiscoverSurroundings(
    zoneKey: string,
    graph: ZoneGraph,
  ): Promise<Surroundings> {
    const here = graph.zone(zoneKey);
    const zonesDiscovered: string[] = [];

    if ((await this.discoverZone(zoneKey, "visited")).newlyDiscovered) {
      zonesDiscovered.push(zoneKey);
    }

    for (const key of this.visibleFrom(here, graph)) {
      const result = await this.discoverZone(key, "visible_from", { zoneKey });
      if (result.newlyDiscovered) zonesDiscovered.push(key);
    }

    const locationsDiscovered: string[] = [];
    const locations = (await this.repos.locations.list(this.scope.sessionId, zoneKey))
      .filter((l) => l.visibility === "visible_from_zone")
      .sort(byKey);
    for (const location of locations) {
      const result = await this.discoverLocation(location.key, "visited", { zoneKey });
      if (result.newlyDiscovered) locationsDiscovered.push(location.key);
    }

    return { zonesDiscovered, locationsDiscovered };
  }

  /**
   * Zones within the observer's hop range over visible connections (never
   * less than the neighbors), plus far-visibility landmarks one hop beyond
   * it. Sorted, observer excluded.
   */
  private visibleFrom(here: Zone, graph: ZoneGraph): string[] {
    // Adjacent zones are always in sight
    const hops = Math.max(1, VISIBILITY_HOPS[here.visibilityRange]);
    const distance = new Map<string, number>([[here.key, 0]]);
    let frontier = [here.key];
    for (let d = 1; d <= hops + 1 && frontier.length > 0; d++) {
      const next: string[] = [];
      for (const key of frontier) {
        for (const edge of graph.edgesFrom(key)) {
          if (!edge.connection.isVisible || distance.has(edge.to)) continue;
          distance.set(edge.to, d);
          next.push(edge.to);
        }
      }
      frontier = next;
    }

    return [...distance.entries()]
      .filter(([key, d]) => {
        if (key === here.key) return false;
        if (d <= hops) return true;
        return graph.zone(key).visibilityRange === "far";
      })
      .map(([key]) => key)
      .sort(compareStrings);
  }

  private newRecord(
    key: string,
    method: DiscoveryMethod,
    source: DiscoverySource,
  ): DiscoveryRecord {
    return {
      sessionId: this.scope.sessionId,
      key,
      discoveredTurn: this.scope.turn,
      method,
      sourceEntityKey: source.entityKey ?? null,
      sourceMapKey: source.mapKey ?? null,
      sourceZoneKey: source.zoneKey ?? null,
    };
  }
}

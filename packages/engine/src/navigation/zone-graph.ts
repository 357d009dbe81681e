import { InvariantViolationError, ZoneNotFoundError } from "../errors.js";
import type { Repositories } from "../store/repositories.js";
import type { Zone, ZoneConnection } from "../types.js";

export type Edge = {
  from: string;
  to: string;
  connection: ZoneConnection;
};

/**
 * Session map snapshot: zones plus directed edges. Built fresh for each
 * query since zones and connections can change mid-session.
 */
export class ZoneGraph {
  private readonly zones = new Map<string, Zone>();
  private readonly adjacency = new Map<string, Edge[]>();

  constructor(zones: Zone[], connections: ZoneConnection[]) {
    for (const zone of zones) {
      this.zones.set(zone.key, zone);
      this.adjacency.set(zone.key, []);
    }
    for (const connection of connections) {
      this.addEdge(connection.fromZoneKey, connection.toZoneKey, connection);
      if (connection.isBidirectional) {
        this.addEdge(connection.toZoneKey, connection.fromZoneKey, connection);
      }
    }
    for (const edges of this.adjacency.values()) {
      edges.sort((a, b) =>
        a.to === b.to
          ? compareStrings(a.connection.id, b.connection.id)
          : compareStrings(a.to, b.to),
      );
    }
  }

  static async load(repos: Repositories, sessionId: string): Promise<ZoneGraph> {
    const [zones, connections] = await Promise.all([
      repos.zones.list(sessionId),
      repos.connections.list(sessionId),
    ]);
    return new ZoneGraph(zones, connections);
  }

  private addEdge(from: string, to: string, connection: ZoneConnection): void {
    const edges = this.adjacency.get(from);
    // Dangling endpoints are ignored; the store enforces them with foreign keys
    if (!edges || !this.zones.has(to)) return;
    edges.push({ from, to, connection });
  }

  has(key: string): boolean {
    return this.zones.has(key);
  }

  zone(key: string): Zone {
    const zone = this.zones.get(key);
    if (!zone) throw new ZoneNotFoundError(key);
    return zone;
  }

  allZones(): Zone[] {
    return [...this.zones.values()];
  }

  /** Outgoing edges, sorted by destination key then connection id */
  edgesFrom(key: string): Edge[] {
    return this.adjacency.get(key) ?? [];
  }

  edgesBetween(from: string, to: string): Edge[] {
    return this.edgesFrom(from).filter((e) => e.to === to);
  }

  /** Parent chain, nearest first */
  ancestors(key: string): Zone[] {
    const chain: Zone[] = [];
    const seen = new Set([key]);
    let parentKey = this.zone(key).parentZoneKey;
    while (parentKey !== null) {
      if (seen.has(parentKey)) {
        throw new InvariantViolationError(`Zone hierarchy cycle at "${parentKey}"`);
      }
      seen.add(parentKey);
      const parent = this.zone(parentKey);
      chain.push(parent);
      parentKey = parent.parentZoneKey;
    }
    return chain;
  }

  children(key: string): Zone[] {
    return this.allZones()
      .filter((z) => z.parentZoneKey === key)
      .sort((a, b) => compareStrings(a.key, b.key));
  }

  /** Parent references must resolve and form a forest */
  validateHierarchy(): void {
    for (const zone of this.zones.values()) {
      if (zone.parentZoneKey !== null && !this.zones.has(zone.parentZoneKey)) {
        throw new InvariantViolationError(
          `Zone "${zone.key}" references missing parent "${zone.parentZoneKey}"`,
        );
      }
      this.ancestors(zone.key);
    }
  }
}

export function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

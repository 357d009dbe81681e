// ---------------------------------------------------------------------------
// Domain errors
// ---------------------------------------------------------------------------
// Not-found and invariant errors are thrown; expected game outcomes (no
// route, undiscovered destination, failed check) are returned as results.

export type DomainErrorCode =
  | "session_not_found"
  | "entity_not_found"
  | "needs_uninitialized"
  | "zone_not_found"
  | "location_not_found"
  | "transport_mode_not_found"
  | "journey_not_found"
  | "adaptation_not_found"
  | "invariant_violation";

export class DomainError extends Error {
  constructor(
    public readonly code: DomainErrorCode,
    message: string,
  ) {
    super(message);
    this.name = "DomainError";
  }

  /** True for the not-found family (mapped to 404 at the HTTP boundary) */
  get isNotFound(): boolean {
    return this.code !== "invariant_violation";
  }
}

export class SessionNotFoundError extends DomainError {
  constructor(sessionId: string) {
    super("session_not_found", `Session ${sessionId} not found`);
    this.name = "SessionNotFoundError";
  }
}

export class EntityNotFoundError extends DomainError {
  constructor(entityKey: string) {
    super("entity_not_found", `Entity "${entityKey}" not found`);
    this.name = "EntityNotFoundError";
  }
}

export class NeedsUninitializedError extends DomainError {
  constructor(entityKey: string) {
    super(
      "needs_uninitialized",
      `Entity "${entityKey}" has no needs; initialize them when the entity is created`,
    );
    this.name = "NeedsUninitializedError";
  }
}

export class ZoneNotFoundError extends DomainError {
  constructor(zoneKey: string) {
    super("zone_not_found", `Zone "${zoneKey}" not found`);
    this.name = "ZoneNotFoundError";
  }
}

export class LocationNotFoundError extends DomainError {
  constructor(locationKey: string) {
    super("location_not_found", `Location "${locationKey}" not found`);
    this.name = "LocationNotFoundError";
  }
}

export class TransportModeNotFoundError extends DomainError {
  constructor(modeKey: string) {
    super("transport_mode_not_found", `Transport mode "${modeKey}" not found`);
    this.name = "TransportModeNotFoundError";
  }
}

export class JourneyNotFoundError extends DomainError {
  constructor(entityKey: string) {
    super("journey_not_found", `Entity "${entityKey}" is not travelling`);
    this.name = "JourneyNotFoundError";
  }
}

export class AdaptationNotFoundError extends DomainError {
  constructor(adaptationId: string) {
    super("adaptation_not_found", `Adaptation ${adaptationId} not found`);
    this.name = "AdaptationNotFoundError";
  }
}

export class InvariantViolationError extends DomainError {
  constructor(message: string) {
    super("invariant_violation", message);
    this.name = "InvariantViolationError";
  }
}

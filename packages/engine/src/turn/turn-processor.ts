import type { ActivityType, StateChange } from "@wayfarer/shared";
import { InvariantViolationError, SessionNotFoundError } from "../errors.js";
import { createTurnServices, type EngineDeps } from "../services.js";
import type { Repositories } from "../store/repositories.js";

export type TurnOptions = {
  /** Defaults to the session's minutes per turn */
  minutes?: number;
  activity?: ActivityType;
};

export type TurnReport = {
  turn: number;
  minutes: number;
  expiredModifiers: number;
  decayedEntities: string[];
  changes: StateChange[];
};

/**
 * Advance a session by one turn. Stale modifiers are expired before any
 * decay runs, so decay never sees a modifier past its expiry turn.
 */
export async function advanceTurn(
  repos: Repositories,
  deps: EngineDeps,
  sessionId: string,
  options: TurnOptions = {},
): Promise<TurnReport> {
  const session = await repos.sessions.find(sessionId);
  if (!session) throw new SessionNotFoundError(sessionId);

  const minutes = options.minutes ?? session.minutesPerTurn;
  if (!Number.isInteger(minutes) || minutes < 0) {
    throw new InvariantViolationError(`Turn minutes must be a non-negative integer, got ${minutes}`);
  }

  const turn = session.currentTurn + 1;
  await repos.sessions.setTurn(sessionId, turn);
  const services = createTurnServices(repos, { sessionId, turn }, deps);

  const expiredModifiers = await services.modifiers.expireStale(turn);
  if (expiredModifiers > 0) {
    services.changes.record({ kind: "modifiers_expired", turn, count: expiredModifiers });
  }

  const decayedEntities = await repos.needs.listEntityKeys(sessionId);
  for (const entityKey of decayedEntities) {
    await services.needs.applyDecay(entityKey, minutes, { activity: options.activity });
  }

  services.changes.record({ kind: "turn_advanced", turn, minutes });
  deps.logger.debug(
    { sessionId, turn, expiredModifiers, entities: decayedEntities.length },
    "turn_advanced",
  );

  return {
    turn,
    minutes,
    expiredModifiers,
    decayedEntities,
    changes: services.changes.list(),
  };
}

import type { ToolCall, ToolOutcome, ToolResultPayload } from "@wayfarer/shared";
import { DomainError, SessionNotFoundError } from "../errors.js";
import { estimateBaseAmount } from "../needs/satisfaction-catalog.js";
import { applyStimulus } from "../needs/stimulus.js";
import { createTurnServices, type EngineDeps, type TurnServices } from "../services.js";
import type { WorldStore } from "../store/repositories.js";
import {
  accessibilityPayload,
  discoveryPayload,
  journeyStatePayload,
  needsPayload,
  resolutionPayload,
  routePayload,
  satisfyNeedPayload,
  skillCheckPayload,
  stimulusPayload,
  travelPayload,
} from "./payloads.js";

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Runs one validated tool call per store transaction. Domain errors roll the
 * call back and come out as `{ ok: false }`; anything else propagates.
 */
export class ToolExecutor {
  constructor(
    private readonly store: WorldStore,
    private readonly deps: EngineDeps,
  ) {}

  async execute(call: ToolCall): Promise<ToolOutcome> {
    const sessionId = call.args.session_id;
    try {
      const { result, changes } = await this.store.transaction(async (repos) => {
        const session = await repos.sessions.find(sessionId);
        if (!session) throw new SessionNotFoundError(sessionId);
        const services = createTurnServices(
          repos,
          { sessionId, turn: session.currentTurn },
          this.deps,
        );
        const result = await executeSingleTool(services, this.deps, call);
        return { result, changes: services.changes.list() };
      });
      this.deps.logger.info({ tool: call.tool, sessionId, ok: true }, "tool_executed");
      return { tool: call.tool, ok: true, result, changes };
    } catch (err) {
      if (!(err instanceof DomainError)) throw err;
      this.deps.logger.info(
        { tool: call.tool, sessionId, ok: false, code: err.code },
        "tool_executed",
      );
      return { tool: call.tool, ok: false, error: err.message, code: err.code };
    }
  }
}

// ---------------------------------------------------------------------------
// Individual tool executors
// ---------------------------------------------------------------------------

async function executeSingleTool(
  services: TurnServices,
  deps: EngineDeps,
  call: ToolCall,
): Promise<ToolResultPayload> {
  const { needs, travel, discovery, pathfinder, checker } = services;

  switch (call.tool) {
    case "skill_check": {
      const { args } = call;
      const check = await checker.check(args.entity_key, {
        skillName: args.skill_name,
        dc: args.dc,
        attributeKey: args.attribute_key,
        advantage: args.advantage,
      });
      return skillCheckPayload(check);
    }

    case "satisfy_need": {
      const { args } = call;
      // Unscaled base; multipliers are applied once, inside the needs engine
      const baseAmount =
        args.base_amount ??
        estimateBaseAmount(deps.catalog, args.need_name, args.action_type, args.quality)
          .baseAmount;
      const result = await needs.satisfyNeed(args.entity_key, args.need_name, baseAmount, {
        actionType: args.action_type,
        quality: args.quality,
      });
      return satisfyNeedPayload(result);
    }

    case "apply_stimulus": {
      const { args } = call;
      const result = await applyStimulus(needs, {
        entityKey: args.entity_key,
        stimulusType: args.stimulus_type,
        intensity: args.intensity,
        memoryEmotion: args.memory_emotion,
      });
      return stimulusPayload(result);
    }

    case "check_route": {
      const { args } = call;
      const route = await travel.planRoute(args.entity_key, {
        destinationZoneKey: args.destination_zone_key,
        modeKey: args.transport_mode,
        preferRoads: args.prefer_roads,
        fromZoneKey: args.from_zone_key,
      });
      return routePayload(route);
    }

    case "start_travel": {
      const { args } = call;
      const outcome = await travel.startJourney(
        args.entity_key,
        args.destination_zone_key,
        args.transport_mode,
        args.prefer_roads,
      );
      return travelPayload(outcome);
    }

    case "advance_travel":
      return travelPayload(await travel.advanceJourney(call.args.entity_key, call.args.steps));

    case "resolve_travel_check":
      return resolutionPayload(
        await travel.resolvePendingCheck(call.args.entity_key, call.args.advantage),
      );

    case "abort_travel":
      return travelPayload(await travel.abortJourney(call.args.entity_key, call.args.reason));

    case "move_to_zone": {
      const { args } = call;
      const outcome = await travel.moveToAdjacent(
        args.entity_key,
        args.zone_key,
        args.transport_mode,
      );
      return travelPayload(outcome);
    }

    case "check_terrain": {
      const { args } = call;
      const access = await pathfinder.checkAccessibility(args.zone_key, args.transport_mode);
      return accessibilityPayload(args.zone_key, access);
    }

    case "discover_zone": {
      const { args } = call;
      const found = await discovery.discoverZone(args.zone_key, args.method, {
        entityKey: args.source_entity_key,
        mapKey: args.source_map_key,
      });
      if (args.reveal_hidden_paths) await pathfinder.revealHiddenPathsTo(args.zone_key);
      return discoveryPayload(found.zone.displayName, found.record, found.newlyDiscovered);
    }

    case "discover_location": {
      const { args } = call;
      const found = await discovery.discoverLocation(args.location_key, args.method, {
        entityKey: args.source_entity_key,
        mapKey: args.source_map_key,
      });
      return discoveryPayload(
        found.location.displayName,
        found.record,
        found.newlyDiscovered,
      );
    }

    case "get_needs": {
      const alerts = await needs.getAlerts(call.args.entity_key);
      return needsPayload(call.args.entity_key, alerts);
    }

    case "interrupt_travel":
      return travelPayload(
        await travel.interruptJourney(call.args.entity_key, call.args.reason),
      );

    case "resume_travel":
      return travelPayload(await travel.resumeJourney(call.args.entity_key));

    case "detour_travel":
      return travelPayload(await travel.detourToZone(call.args.entity_key, call.args.zone_key));

    case "get_journey":
      return journeyStatePayload(await travel.getJourney(call.args.entity_key));
  }
}

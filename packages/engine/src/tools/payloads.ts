import type {
  AccessibilityPayload,
  ApplyStimulusPayload,
  DiscoveryPayload,
  JourneyPayload,
  JourneyStatePayload,
  NeedsPayload,
  ResolveTravelCheckPayload,
  RoutePayload,
  SatisfyNeedPayload,
  SkillCheckPayload,
  SkillGatePayload,
  TravelPayload,
  TravelStepPayload,
} from "@wayfarer/shared";
import type { SkillCheckResult } from "../dice/skill-check.js";
import type { PathResult } from "../navigation/pathfinding.js";
import type { Accessibility } from "../navigation/transport.js";
import type {
  CheckResolution,
  JourneyProgress,
  TravelOutcome,
  TravelStep,
} from "../navigation/travel.js";
import type { NeedAlert, SatisfyResult } from "../needs/needs-engine.js";
import type { StimulusResult } from "../needs/stimulus.js";
import type { DiscoveryRecord, Journey, SkillGate } from "../types.js";

// ---------------------------------------------------------------------------
// Engine results → snake_case tool payloads
// ---------------------------------------------------------------------------

export function skillCheckPayload(check: SkillCheckResult): SkillCheckPayload {
  return {
    skill_name: check.skillName,
    dc: check.dc,
    success: check.success,
    roll: check.rolls,
    total: check.total,
    total_modifier: check.totalModifier,
    needs_penalty: check.needsPenalty,
    margin: check.margin,
    outcome_tier: check.tier,
    is_auto_success: check.isAutoSuccess,
    is_critical_success: check.isCriticalSuccess,
    is_critical_failure: check.isCriticalFailure,
    signed: check.signed,
  };
}

export function satisfyNeedPayload(result: SatisfyResult): SatisfyNeedPayload {
  return {
    need_name: result.need,
    old_value: result.oldValue,
    new_value: result.newValue,
    delta: result.delta,
    base_amount: result.baseAmount,
    preference_multiplier: result.preferenceMultiplier,
    satisfaction_multiplier: result.satisfactionMultiplier,
  };
}

export function stimulusPayload(result: StimulusResult): ApplyStimulusPayload {
  return {
    stimulus_type: result.stimulusType,
    need_affected: result.needAffected,
    craving_boost: result.cravingBoost,
    morale_change: result.moraleChange,
  };
}

export function gatePayload(gate: SkillGate): SkillGatePayload {
  return {
    zone_key: gate.zoneKey,
    connection_id: gate.connectionId,
    skill: gate.skill,
    difficulty: gate.difficulty,
    consequence: gate.consequence,
  };
}

export function routePayload(route: PathResult): RoutePayload {
  return {
    found: route.found,
    path: route.path,
    total_cost: route.totalCost,
    reason: route.reason,
    skill_checks: route.skillChecks.map(gatePayload),
    terrain_minutes: route.terrainMinutes,
  };
}

export function journeyPayload(journey: Journey): JourneyPayload {
  return {
    journey_id: journey.id,
    origin_zone_key: journey.originZoneKey,
    destination_zone_key: journey.destinationZoneKey,
    transport_mode: journey.transportModeKey,
    path: journey.path,
    position_index: journey.positionIndex,
    current_zone_key: journey.path[journey.positionIndex],
    elapsed_minutes: journey.elapsedMinutes,
    estimated_total_minutes: journey.estimatedTotalMinutes,
    status: journey.status,
    pending_check: journey.pendingCheck ? gatePayload(journey.pendingCheck) : null,
  };
}

export function stepPayload(step: TravelStep): TravelStepPayload {
  return {
    from_zone_key: step.fromZoneKey,
    to_zone_key: step.toZoneKey,
    minutes: step.minutes,
    encounter: step.encounter.triggered,
    zones_discovered: step.zonesDiscovered,
  };
}

export function travelPayload(outcome: TravelOutcome): TravelPayload {
  return {
    success: outcome.success,
    reason: outcome.reason,
    journey: outcome.journey ? journeyPayload(outcome.journey) : null,
    steps: outcome.steps.map(stepPayload),
    skill_check_required: outcome.checkRequired ? gatePayload(outcome.checkRequired) : null,
  };
}

export function journeyStatePayload(progress: JourneyProgress | null): JourneyStatePayload {
  if (!progress) {
    return {
      travelling: false,
      journey: null,
      interrupt_reason: null,
      progress_percent: null,
      zones_remaining: null,
      visited_zone_keys: [],
    };
  }
  const { journey } = progress;
  return {
    travelling: true,
    journey: journeyPayload(journey),
    interrupt_reason: journey.interruptReason,
    progress_percent: progress.progressPercent,
    zones_remaining: progress.zonesRemaining,
    visited_zone_keys: journey.visitedZoneKeys,
  };
}

export function resolutionPayload(resolution: CheckResolution): ResolveTravelCheckPayload {
  return {
    check: skillCheckPayload(resolution.check),
    consequence: resolution.consequence,
    need_penalty: resolution.needPenalty,
    journey: journeyPayload(resolution.journey),
    step: resolution.step ? stepPayload(resolution.step) : null,
  };
}

export function accessibilityPayload(
  zoneKey: string,
  access: Accessibility,
): AccessibilityPayload {
  return {
    zone_key: zoneKey,
    can_enter: access.canEnter,
    reason: access.reason,
    requires_skill: access.requiresSkill,
    skill_difficulty: access.skillDifficulty,
    travel_cost: access.travelCost,
  };
}

export function discoveryPayload(
  displayName: string,
  record: DiscoveryRecord,
  newlyDiscovered: boolean,
): DiscoveryPayload {
  return {
    key: record.key,
    display_name: displayName,
    newly_discovered: newlyDiscovered,
    method: record.method,
    discovered_turn: record.discoveredTurn,
  };
}

export function needsPayload(entityKey: string, alerts: NeedAlert[]): NeedsPayload {
  return {
    entity_key: entityKey,
    needs: alerts.map((a) => ({
      need: a.need,
      value: a.value,
      craving: a.craving,
      effective: a.effective,
      urgent: a.urgent,
    })),
  };
}

import type {
  DiscoveryMethod,
  FailureConsequence,
  JourneyStatus,
  ModifierSource,
  NeedName,
  OutcomeTier,
  StimulusType,
  TerrainType,
  ToolName,
} from "./enums.js";

// ---------------------------------------------------------------------------
// Mutation batch — every state change a single tool call produced
// ---------------------------------------------------------------------------

export type NeedChangeCause =
  | "decay"
  | "satisfaction"
  | "penalty"
  | "stimulus"
  | "initialized";

export type StateChange =
  | {
      kind: "need_changed";
      entity_key: string;
      need: NeedName;
      old_value: number;
      new_value: number;
      cause: NeedChangeCause;
    }
  | {
      kind: "craving_changed";
      entity_key: string;
      need: NeedName;
      old_value: number;
      new_value: number;
    }
  | {
      kind: "modifier_set";
      entity_key: string;
      need: NeedName;
      source: ModifierSource;
      source_detail: string;
      is_active: boolean;
    }
  | { kind: "modifiers_expired"; turn: number; count: number }
  | { kind: "zone_discovered"; zone_key: string; method: DiscoveryMethod }
  | {
      kind: "location_discovered";
      location_key: string;
      method: DiscoveryMethod;
    }
  | {
      kind: "connection_revealed";
      connection_id: string;
      from_zone_key: string;
      to_zone_key: string;
    }
  | {
      kind: "entity_moved";
      entity_key: string;
      from_zone_key: string | null;
      to_zone_key: string;
    }
  | {
      kind: "journey_updated";
      journey_id: string;
      status: JourneyStatus;
      position_index: number;
    }
  | { kind: "turn_advanced"; turn: number; minutes: number };

// ---------------------------------------------------------------------------
// Per-tool result payloads
// ---------------------------------------------------------------------------

export type SkillCheckPayload = {
  skill_name: string;
  dc: number;
  success: boolean;
  roll: number[] | null;
  total: number | null;
  total_modifier: number;
  needs_penalty: number;
  margin: number;
  outcome_tier: OutcomeTier;
  is_auto_success: boolean;
  is_critical_success: boolean;
  is_critical_failure: boolean;
  signed: string | null;
};

export type SatisfyNeedPayload = {
  need_name: NeedName;
  old_value: number;
  new_value: number;
  delta: number;
  base_amount: number;
  preference_multiplier: number;
  satisfaction_multiplier: number;
};

export type ApplyStimulusPayload = {
  stimulus_type: StimulusType;
  need_affected: NeedName | null;
  craving_boost: number | null;
  morale_change: number | null;
};

export type SkillGatePayload = {
  zone_key: string;
  connection_id: string | null;
  skill: string;
  difficulty: number;
  consequence: FailureConsequence | null;
};

export type RoutePayload = {
  found: boolean;
  path: string[];
  total_cost: number;
  reason: string | null;
  skill_checks: SkillGatePayload[];
  terrain_minutes: Partial<Record<TerrainType, number>>;
};

export type JourneyPayload = {
  journey_id: string;
  origin_zone_key: string;
  destination_zone_key: string;
  transport_mode: string;
  path: string[];
  position_index: number;
  current_zone_key: string;
  elapsed_minutes: number;
  estimated_total_minutes: number;
  status: JourneyStatus;
  pending_check: SkillGatePayload | null;
};

export type TravelStepPayload = {
  from_zone_key: string;
  to_zone_key: string;
  minutes: number;
  encounter: boolean;
  zones_discovered: string[];
};

export type TravelPayload = {
  success: boolean;
  reason: string | null;
  journey: JourneyPayload | null;
  steps: TravelStepPayload[];
  skill_check_required: SkillGatePayload | null;
};

export type JourneyStatePayload = {
  travelling: boolean;
  journey: JourneyPayload | null;
  interrupt_reason: string | null;
  progress_percent: number | null;
  zones_remaining: number | null;
  visited_zone_keys: string[];
};

export type ResolveTravelCheckPayload = {
  check: SkillCheckPayload;
  consequence: FailureConsequence | null;
  need_penalty: { need: NeedName; amount: number } | null;
  journey: JourneyPayload;
  step: TravelStepPayload | null;
};

export type AccessibilityPayload = {
  zone_key: string;
  can_enter: boolean;
  reason: string | null;
  requires_skill: string | null;
  skill_difficulty: number | null;
  travel_cost: number | null;
};

export type DiscoveryPayload = {
  key: string;
  display_name: string;
  newly_discovered: boolean;
  method: DiscoveryMethod;
  discovered_turn: number;
};

export type NeedPayload = {
  need: NeedName;
  value: number;
  craving: number;
  effective: number;
  urgent: boolean;
};

export type NeedsPayload = {
  entity_key: string;
  needs: NeedPayload[];
};

export type ToolResultPayload =
  | SkillCheckPayload
  | SatisfyNeedPayload
  | ApplyStimulusPayload
  | RoutePayload
  | TravelPayload
  | JourneyStatePayload
  | ResolveTravelCheckPayload
  | AccessibilityPayload
  | DiscoveryPayload
  | NeedsPayload;

// ---------------------------------------------------------------------------
// Tool outcome envelope
// ---------------------------------------------------------------------------

export type ToolOutcome =
  | {
      tool: ToolName;
      ok: true;
      result: ToolResultPayload;
      changes: StateChange[];
    }
  | { tool: ToolName; ok: false; error: string; code: string };

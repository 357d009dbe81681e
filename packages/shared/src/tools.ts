import { z } from "zod";
import {
  Advantage,
  DiscoveryMethod,
  NeedName,
  Quality,
  StimulusIntensity,
  StimulusType,
} from "./enums.js";

// ---------------------------------------------------------------------------
// Shared reference patterns
// ---------------------------------------------------------------------------

/** Session-scoped key: `aria`, `mill_road`, `npc:old-tom` */
export const Key = z
  .string()
  .min(1)
  .max(100)
  .regex(/^[a-z0-9][a-z0-9_:.-]*$/i, "Must be an alphanumeric key");
export type Key = z.infer<typeof Key>;

const SessionId = z.string().uuid();

/** Transport mode keys default to walking when the narrator omits them */
const TransportModeKey = Key.default("walking");

// ---------------------------------------------------------------------------
// 1. skill_check
// ---------------------------------------------------------------------------
export const SkillCheckTool = z.object({
  session_id: SessionId,
  entity_key: Key,
  dc: z.number().int().min(1).max(40),
  skill_name: z.string().min(1),
  attribute_key: z.string().min(1).optional(),
  advantage: Advantage.default("normal"),
});
export type SkillCheckTool = z.infer<typeof SkillCheckTool>;

// ---------------------------------------------------------------------------
// 2. satisfy_need
// ---------------------------------------------------------------------------
export const SatisfyNeedTool = z.object({
  session_id: SessionId,
  entity_key: Key,
  need_name: NeedName,
  action_type: z.string().min(1),
  quality: Quality.default("basic"),
  base_amount: z.number().int().min(-100).max(100).optional(),
});
export type SatisfyNeedTool = z.infer<typeof SatisfyNeedTool>;

// ---------------------------------------------------------------------------
// 3. apply_stimulus
// ---------------------------------------------------------------------------
export const ApplyStimulusTool = z.object({
  session_id: SessionId,
  entity_key: Key,
  stimulus_type: StimulusType,
  stimulus_description: z.string().min(1),
  intensity: StimulusIntensity.default("moderate"),
  memory_emotion: z.string().min(1).optional(),
});
export type ApplyStimulusTool = z.infer<typeof ApplyStimulusTool>;

// ---------------------------------------------------------------------------
// 4. check_route
// ---------------------------------------------------------------------------
export const CheckRouteTool = z.object({
  session_id: SessionId,
  entity_key: Key,
  destination_zone_key: Key,
  /** Plan from this zone instead of the entity's current zone */
  from_zone_key: Key.optional(),
  transport_mode: TransportModeKey,
  prefer_roads: z.boolean().default(false),
});
export type CheckRouteTool = z.infer<typeof CheckRouteTool>;

// ---------------------------------------------------------------------------
// 5. start_travel
// ---------------------------------------------------------------------------
export const StartTravelTool = z.object({
  session_id: SessionId,
  entity_key: Key,
  destination_zone_key: Key,
  transport_mode: TransportModeKey,
  prefer_roads: z.boolean().default(false),
});
export type StartTravelTool = z.infer<typeof StartTravelTool>;

// ---------------------------------------------------------------------------
// 6. advance_travel
// ---------------------------------------------------------------------------
export const AdvanceTravelTool = z.object({
  session_id: SessionId,
  entity_key: Key,
  steps: z.number().int().min(1).max(20).default(1),
});
export type AdvanceTravelTool = z.infer<typeof AdvanceTravelTool>;

// ---------------------------------------------------------------------------
// 7. resolve_travel_check
// ---------------------------------------------------------------------------
export const ResolveTravelCheckTool = z.object({
  session_id: SessionId,
  entity_key: Key,
  advantage: Advantage.default("normal"),
});
export type ResolveTravelCheckTool = z.infer<typeof ResolveTravelCheckTool>;

// ---------------------------------------------------------------------------
// 8. abort_travel
// ---------------------------------------------------------------------------
export const AbortTravelTool = z.object({
  session_id: SessionId,
  entity_key: Key,
  reason: z.string().min(1).optional(),
});
export type AbortTravelTool = z.infer<typeof AbortTravelTool>;

// ---------------------------------------------------------------------------
// 9. move_to_zone
// ---------------------------------------------------------------------------
export const MoveToZoneTool = z.object({
  session_id: SessionId,
  entity_key: Key,
  zone_key: Key,
  transport_mode: TransportModeKey,
});
export type MoveToZoneTool = z.infer<typeof MoveToZoneTool>;

// ---------------------------------------------------------------------------
// 10. check_terrain
// ---------------------------------------------------------------------------
export const CheckTerrainTool = z.object({
  session_id: SessionId,
  zone_key: Key,
  transport_mode: TransportModeKey,
});
export type CheckTerrainTool = z.infer<typeof CheckTerrainTool>;

// ---------------------------------------------------------------------------
// 11. discover_zone
// ---------------------------------------------------------------------------
export const DiscoverZoneTool = z.object({
  session_id: SessionId,
  zone_key: Key,
  method: DiscoveryMethod,
  source_entity_key: Key.optional(),
  source_map_key: Key.optional(),
  /** Also open hidden connections into the zone (a secret path on a map) */
  reveal_hidden_paths: z.boolean().default(false),
});
export type DiscoverZoneTool = z.infer<typeof DiscoverZoneTool>;

// ---------------------------------------------------------------------------
// 12. discover_location
// ---------------------------------------------------------------------------
export const DiscoverLocationTool = z.object({
  session_id: SessionId,
  location_key: Key,
  method: DiscoveryMethod,
  source_entity_key: Key.optional(),
  source_map_key: Key.optional(),
});
export type DiscoverLocationTool = z.infer<typeof DiscoverLocationTool>;

// ---------------------------------------------------------------------------
// 13. get_needs
// ---------------------------------------------------------------------------
export const GetNeedsTool = z.object({
  session_id: SessionId,
  entity_key: Key,
});
export type GetNeedsTool = z.infer<typeof GetNeedsTool>;

// ---------------------------------------------------------------------------
// 14. interrupt_travel
// ---------------------------------------------------------------------------
export const InterruptTravelTool = z.object({
  session_id: SessionId,
  entity_key: Key,
  reason: z.string().min(1).default("interrupted"),
});
export type InterruptTravelTool = z.infer<typeof InterruptTravelTool>;

// ---------------------------------------------------------------------------
// 15. resume_travel
// ---------------------------------------------------------------------------
export const ResumeTravelTool = z.object({
  session_id: SessionId,
  entity_key: Key,
});
export type ResumeTravelTool = z.infer<typeof ResumeTravelTool>;

// ---------------------------------------------------------------------------
// 16. detour_travel
// ---------------------------------------------------------------------------
export const DetourTravelTool = z.object({
  session_id: SessionId,
  entity_key: Key,
  /** Side trip target; the journey comes back to the route afterwards */
  zone_key: Key,
});
export type DetourTravelTool = z.infer<typeof DetourTravelTool>;

// ---------------------------------------------------------------------------
// 17. get_journey
// ---------------------------------------------------------------------------
export const GetJourneyTool = z.object({
  session_id: SessionId,
  entity_key: Key,
});
export type GetJourneyTool = z.infer<typeof GetJourneyTool>;

// ---------------------------------------------------------------------------
// Discriminated tool-call union
// ---------------------------------------------------------------------------
export const ToolCall = z.discriminatedUnion("tool", [
  z.object({ tool: z.literal("skill_check"), args: SkillCheckTool }),
  z.object({ tool: z.literal("satisfy_need"), args: SatisfyNeedTool }),
  z.object({ tool: z.literal("apply_stimulus"), args: ApplyStimulusTool }),
  z.object({ tool: z.literal("check_route"), args: CheckRouteTool }),
  z.object({ tool: z.literal("start_travel"), args: StartTravelTool }),
  z.object({ tool: z.literal("advance_travel"), args: AdvanceTravelTool }),
  z.object({
    tool: z.literal("resolve_travel_check"),
    args: ResolveTravelCheckTool,
  }),
  z.object({ tool: z.literal("abort_travel"), args: AbortTravelTool }),
  z.object({ tool: z.literal("move_to_zone"), args: MoveToZoneTool }),
  z.object({ tool: z.literal("check_terrain"), args: CheckTerrainTool }),
  z.object({ tool: z.literal("discover_zone"), args: DiscoverZoneTool }),
  z.object({
    tool: z.literal("discover_location"),
    args: DiscoverLocationTool,
  }),
  z.object({ tool: z.literal("get_needs"), args: GetNeedsTool }),
  z.object({ tool: z.literal("interrupt_travel"), args: InterruptTravelTool }),
  z.object({ tool: z.literal("resume_travel"), args: ResumeTravelTool }),
  z.object({ tool: z.literal("detour_travel"), args: DetourTravelTool }),
  z.object({ tool: z.literal("get_journey"), args: GetJourneyTool }),
]);
export type ToolCall = z.infer<typeof ToolCall>;

/** Tool-call shape before zod applies defaults (what the LLM actually sends) */
export type ToolCallInput = z.input<typeof ToolCall>;

import type { TransportModeDefinition } from "./world.js";

// ---------------------------------------------------------------------------
// Default transport catalog (global, session-independent)
// ---------------------------------------------------------------------------
// A terrain missing from `terrain_costs` is impassable for that mode.

export const DEFAULT_TRANSPORT_MODES: TransportModeDefinition[] = [
  {
    key: "walking",
    display_name: "Walking",
    type: "walking",
    terrain_costs: {
      plains: 1.0,
      forest: 2.0,
      road: 0.8,
      trail: 1.2,
      mountain: 3.0,
      swamp: 2.5,
      desert: 1.5,
      urban: 0.9,
      ruins: 1.5,
      cave: 1.5,
    },
    requires_skill: null,
    requires_item: null,
    fatigue_rate: 1.0,
    encounter_modifier: 1.0,
  },
  {
    key: "running",
    display_name: "Running",
    type: "running",
    terrain_costs: {
      plains: 0.6,
      forest: 1.5,
      road: 0.5,
      trail: 0.8,
      mountain: 2.0,
      swamp: 2.0,
      desert: 1.2,
      urban: 0.6,
      ruins: 1.2,
      cave: 1.2,
    },
    requires_skill: null,
    requires_item: null,
    fatigue_rate: 2.5,
    encounter_modifier: 0.8,
  },
  {
    key: "mounted",
    display_name: "Mounted",
    type: "mounted",
    terrain_costs: {
      plains: 0.5,
      road: 0.3,
      trail: 0.7,
      desert: 0.8,
      urban: 0.6,
    },
    requires_skill: "riding",
    requires_item: "mount",
    fatigue_rate: 0.5,
    encounter_modifier: 0.7,
  },
  {
    key: "swimming",
    display_name: "Swimming",
    type: "swimming",
    terrain_costs: { lake: 1.5, river: 2.0, ocean: 3.0, swamp: 2.0 },
    requires_skill: "swimming",
    requires_item: null,
    fatigue_rate: 3.0,
    encounter_modifier: 1.2,
  },
  {
    key: "climbing",
    display_name: "Climbing",
    type: "climbing",
    terrain_costs: { cliff: 5.0, mountain: 3.0 },
    requires_skill: "climbing",
    requires_item: null,
    fatigue_rate: 4.0,
    encounter_modifier: 0.5,
  },
];

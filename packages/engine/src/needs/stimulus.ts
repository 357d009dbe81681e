import type {
  NeedName,
  StimulusIntensity,
  StimulusType,
} from "@wayfarer/shared";
import type { NeedsEngine } from "./needs-engine.js";

// ---------------------------------------------------------------------------
// Stimulus → craving / morale
// ---------------------------------------------------------------------------

export const INTENSITY_RELEVANCE: Record<StimulusIntensity, number> = {
  mild: 0.3,
  moderate: 0.6,
  strong: 0.9,
};

const STIMULUS_NEED: Record<StimulusType, NeedName> = {
  food_sight: "hunger",
  drink_sight: "thirst",
  social_atmosphere: "social_connection",
  intimacy_trigger: "intimacy",
  memory_trigger: "morale",
};

const NEGATIVE_EMOTIONS = new Set(["grief", "fear", "anger", "shame", "guilt", "sadness"]);
const POSITIVE_EMOTIONS = new Set(["joy", "pride", "love", "nostalgia", "hope"]);

/** Morale shift for a memory surfacing with the given emotion */
export function memoryMoraleChange(
  emotion: string | undefined,
  relevance: number,
): number {
  const key = emotion?.trim().toLowerCase() ?? "";
  if (NEGATIVE_EMOTIONS.has(key)) return -Math.trunc(relevance * 15);
  if (POSITIVE_EMOTIONS.has(key)) return Math.trunc(relevance * 10);
  return 0;
}

export type StimulusInput = {
  entityKey: string;
  stimulusType: StimulusType;
  intensity: StimulusIntensity;
  memoryEmotion?: string;
};

export type StimulusResult = {
  stimulusType: StimulusType;
  needAffected: NeedName | null;
  cravingBoost: number | null;
  moraleChange: number | null;
};

export async function applyStimulus(
  needs: NeedsEngine,
  input: StimulusInput,
): Promise<StimulusResult> {
  const relevance = INTENSITY_RELEVANCE[input.intensity];
  const need = STIMULUS_NEED[input.stimulusType];

  if (input.stimulusType === "memory_trigger") {
    const change = memoryMoraleChange(input.memoryEmotion, relevance);
    if (change !== 0) {
      await needs.adjustNeed(input.entityKey, "morale", change, "stimulus");
    } else {
      await needs.requireNeeds(input.entityKey);
    }
    return {
      stimulusType: input.stimulusType,
      needAffected: change === 0 ? null : need,
      cravingBoost: null,
      moraleChange: change,
    };
  }

  const boost = await needs.applyCraving(input.entityKey, need, relevance);
  return {
    stimulusType: input.stimulusType,
    needAffected: need,
    cravingBoost: boost,
    moraleChange: null,
  };
}

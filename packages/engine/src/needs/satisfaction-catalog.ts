import { NeedName, Quality } from "@wayfarer/shared";
import { z } from "zod";
import catalogData from "./data/satisfaction-catalog.json" with { type: "json" };

// ---------------------------------------------------------------------------
// Action → base amount lookup for satisfy_need calls without `base_amount`
// ---------------------------------------------------------------------------

export const SatisfactionCatalogSchema = z.object({
  default_amount: z.number().int(),
  quality_multipliers: z.record(Quality, z.number().positive()),
  actions: z.record(NeedName, z.record(z.number().int().min(-100).max(100))),
});
export type SatisfactionCatalog = z.infer<typeof SatisfactionCatalogSchema>;

export const DEFAULT_SATISFACTION_CATALOG: SatisfactionCatalog =
  SatisfactionCatalogSchema.parse(catalogData);

export type SatisfactionEstimate = {
  baseAmount: number;
  /** False when the action was not in the catalog and the default was used */
  matched: boolean;
};

/** `"Full Meal"` → `"full_meal"` */
export function normalizeAction(actionType: string): string {
  return actionType.trim().toLowerCase().replace(/[\s-]+/g, "_");
}

/**
 * Estimate the base amount for an action: catalog midpoint scaled by the
 * quality multiplier, truncated toward zero and kept within [-100, 100].
 */
export function estimateBaseAmount(
  catalog: SatisfactionCatalog,
  need: NeedName,
  actionType: string,
  quality: Quality,
): SatisfactionEstimate {
  const base = catalog.actions[need]?.[normalizeAction(actionType)];
  const multiplier = catalog.quality_multipliers[quality] ?? 1;
  const matched = base !== undefined;
  const amount = Math.trunc((base ?? catalog.default_amount) * multiplier);
  return {
    baseAmount: Math.max(-100, Math.min(100, amount)),
    matched,
  };
}

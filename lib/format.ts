import type { ProgressTier } from "./goal-progress";
import { roundWeight, toDisplayWeight, WEIGHT_UNIT_LABELS, type WeightUnit } from "./weight-units";

export const TIER_COLORS: Record<ProgressTier, string> = {
  high: "#34D399",
  moderate: "#FBBF24",
  low: "#EF4444",
};

export const MUTED_COLOR = "#6B7280";

// Truncates like the progress bar label does: 99.9% reads "99%", never "100%".
export function fmtFracToPctTrunc(x: number | null | undefined): string {
  if (x == null) return "—";
  return `${Math.trunc(x * 100)}%`;
}

export function fmtDelta(x: number | null | undefined, decimals: number = 2, suffix: string = ""): string {
  if (x == null) return "—";
  return `${x >= 0 ? "+" : ""}${x.toFixed(decimals)}${suffix}`;
}

export function fmtWeight(kg: number | null | undefined, unit: WeightUnit, decimals: number = 1): string {
  if (kg == null) return "--";
  const v = roundWeight(toDisplayWeight(kg, unit), decimals);
  return `${v.toFixed(decimals)} ${WEIGHT_UNIT_LABELS[unit]}`;
}

export function fmtWeightDelta(kg: number | null | undefined, unit: WeightUnit, decimals: number = 1): string {
  if (kg == null) return "—";
  const v = roundWeight(toDisplayWeight(kg, unit), decimals);
  return fmtDelta(v, decimals, ` ${WEIGHT_UNIT_LABELS[unit]}`);
}

export function progressTierColor(tier: ProgressTier | null | undefined): string {
  if (tier == null) return MUTED_COLOR;
  return TIER_COLORS[tier];
}

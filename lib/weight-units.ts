export type WeightUnit = "kg" | "lb";

export const KG_TO_LB = 2.20462;

export const WEIGHT_UNIT_LABELS: Record<WeightUnit, string> = {
  kg: "kg",
  lb: "lbs",
};

export function kgToLb(kg: number): number {
  return kg * KG_TO_LB;
}

export function lbToKg(lb: number): number {
  return lb / KG_TO_LB;
}

export function roundWeight(value: number, decimals: number = 1): number {
  const f = 10 ** decimals;
  return Math.round(value * f) / f;
}

// Weights are stored in kg; these two sit at the display boundary.
export function toDisplayWeight(kg: number, unit: WeightUnit): number {
  return unit === "lb" ? kgToLb(kg) : kg;
}

export function toStorageWeight(value: number, unit: WeightUnit): number {
  return unit === "lb" ? lbToKg(value) : value;
}

export function parseWeightUnit(raw: unknown): WeightUnit | null {
  if (typeof raw !== "string") return null;
  const v = raw.trim().toLowerCase();
  if (v === "kg" || v === "kgs" || v === "kilograms") return "kg";
  if (v === "lb" || v === "lbs" || v === "pounds") return "lb";
  return null;
}

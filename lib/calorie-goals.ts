export type PetSpecies = "dog" | "cat";
export type PetLifeStage = "puppy" | "adult" | "senior" | "pregnant" | "lactating";
export type PetActivityLevel = "low" | "moderate" | "high";

export const PET_SPECIES: readonly PetSpecies[] = ["dog", "cat"];
export const PET_LIFE_STAGES: readonly PetLifeStage[] = ["puppy", "adult", "senior", "pregnant", "lactating"];
export const PET_ACTIVITY_LEVELS: readonly PetActivityLevel[] = ["low", "moderate", "high"];

export interface PetProfile {
  species: PetSpecies;
  lifeStage: PetLifeStage;
  activityLevel: PetActivityLevel | null;
  weightKg: number | null;
}

export const KCAL_PER_KG_BASE = 30;

export const ACTIVITY_MULTIPLIER: Record<PetActivityLevel, number> = {
  low: 0.8,
  moderate: 1.0,
  high: 1.2,
};

export const LIFE_STAGE_MULTIPLIER: Record<PetLifeStage, number> = {
  puppy: 1.5,
  adult: 1.0,
  senior: 0.9,
  pregnant: 1.3,
  lactating: 1.4,
};

const DEFAULT_DAILY_KCAL: Record<PetSpecies, Partial<Record<PetLifeStage, number>>> = {
  dog: { puppy: 400, adult: 600, senior: 500 },
  cat: { puppy: 250, adult: 275, senior: 250 },
};

const FALLBACK_DAILY_KCAL = 300;
const CLOSE_TO_GOAL_PCT = 80;

export type CalorieGoalStatus = "over" | "met" | "close" | "under";

export interface CalorieGoalProgress {
  goalCalories: number;
  consumedCalories: number;
  remainingCalories: number;
  progressPercentage: number;
  isGoalMet: boolean;
  isOverGoal: boolean;
  status: CalorieGoalStatus;
}

export function effectiveActivityLevel(pet: Pick<PetProfile, "activityLevel">): PetActivityLevel {
  return pet.activityLevel ?? "moderate";
}

export function defaultDailyCalories(species: PetSpecies, lifeStage: PetLifeStage): number {
  return DEFAULT_DAILY_KCAL[species][lifeStage] ?? FALLBACK_DAILY_KCAL;
}

export function suggestDailyCalories(pet: PetProfile): number {
  if (pet.weightKg == null || pet.weightKg <= 0) {
    return defaultDailyCalories(pet.species, pet.lifeStage);
  }
  const base = pet.weightKg * KCAL_PER_KG_BASE;
  const kcal = base * ACTIVITY_MULTIPLIER[effectiveActivityLevel(pet)] * LIFE_STAGE_MULTIPLIER[pet.lifeStage];
  return Math.round(kcal);
}

export function computeCalorieGoalProgress(goalCalories: number, consumedCalories: number): CalorieGoalProgress {
  const progressPercentage = goalCalories > 0 ? (consumedCalories / goalCalories) * 100 : 0;
  const isGoalMet = consumedCalories >= goalCalories;
  const isOverGoal = consumedCalories > goalCalories;

  let status: CalorieGoalStatus = "under";
  if (isOverGoal) status = "over";
  else if (isGoalMet) status = "met";
  else if (progressPercentage >= CLOSE_TO_GOAL_PCT) status = "close";

  return {
    goalCalories,
    consumedCalories,
    remainingCalories: Math.max(0, goalCalories - consumedCalories),
    progressPercentage,
    isGoalMet,
    isOverGoal,
    status,
  };
}

export function formatCalorieGoalStatus(goalCalories: number | null | undefined): string {
  if (goalCalories == null) return "No goal set";
  return `Goal: ${Math.trunc(goalCalories)} kcal/day`;
}

export function isPetSpecies(value: unknown): value is PetSpecies {
  return typeof value === "string" && PET_SPECIES.some((v) => v === value);
}

export function isPetLifeStage(value: unknown): value is PetLifeStage {
  return typeof value === "string" && PET_LIFE_STAGES.some((v) => v === value);
}

export function isPetActivityLevel(value: unknown): value is PetActivityLevel {
  return typeof value === "string" && PET_ACTIVITY_LEVELS.some((v) => v === value);
}

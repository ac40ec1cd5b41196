export type WeightGoalType =
  | "weight_loss"
  | "weight_gain"
  | "maintenance"
  | "health_improvement";

export const WEIGHT_GOAL_TYPES: readonly WeightGoalType[] = [
  "weight_loss",
  "weight_gain",
  "maintenance",
  "health_improvement",
];

export const GOAL_TYPE_LABELS: Record<WeightGoalType, string> = {
  weight_loss: "Weight Loss",
  weight_gain: "Weight Gain",
  maintenance: "Maintenance",
  health_improvement: "Health Improvement",
};

export type ProgressTier = "low" | "moderate" | "high";

export type GoalMisconfiguration = "target_not_below_start" | "target_not_above_start";

export interface WeightGoal {
  goalType: WeightGoalType;
  startingWeightKg: number | null;
  targetWeightKg: number | null;
}

export interface ProgressResult {
  fraction: number;
  tier: ProgressTier;
}

export interface ProgressTrace {
  goalType: WeightGoalType;
  current: number;
  target: number;
  starting: number;
  startingSubstituted: boolean;
  fraction: number;
}

export const TIER_THRESH = {
  HIGH: 0.8,
  MODERATE: 0.5,
} as const;

const MIN_MAINTENANCE_DISTANCE_KG = 1.0;

const clamp = (x: number, lo: number, hi: number) => Math.max(lo, Math.min(hi, x));

export function isWeightGoalType(value: unknown): value is WeightGoalType {
  return typeof value === "string" && WEIGHT_GOAL_TYPES.some((v) => v === value);
}

/**
 * Baseline for progress measurement. A goal saved without a starting weight
 * measures from the pet's current weight, so it reads 0% until the weight moves.
 */
export function resolveStartingWeight(goal: Pick<WeightGoal, "startingWeightKg">, currentWeightKg: number): number {
  return goal.startingWeightKg ?? currentWeightKg;
}

/**
 * Fraction in [0, 1] of the way from `starting` to `target`.
 *
 * Loss and gain goals only count movement in the goal's direction; a goal
 * whose target is already on the wrong side of the start reads 0.
 * Maintenance and health goals score closeness to the target, relative to
 * how far the start was from it (never less than 1 kg).
 */
export function computeProgress(
  current: number,
  target: number,
  starting: number,
  goalType: WeightGoalType,
): number {
  switch (goalType) {
    case "weight_loss": {
      const totalToLose = starting - target;
      if (totalToLose <= 0) return 0;
      const lost = starting - current;
      if (lost <= 0) return 0;
      return clamp(lost / totalToLose, 0, 1);
    }
    case "weight_gain": {
      const totalToGain = target - starting;
      if (totalToGain <= 0) return 0;
      const gained = current - starting;
      if (gained <= 0) return 0;
      return clamp(gained / totalToGain, 0, 1);
    }
    case "maintenance":
    case "health_improvement": {
      const distance = Math.abs(current - target);
      const maxDistance = Math.max(Math.abs(starting - target), MIN_MAINTENANCE_DISTANCE_KG);
      return clamp(1 - distance / maxDistance, 0, 1);
    }
  }
}

export function classifyProgressTier(fraction: number): ProgressTier {
  if (fraction >= TIER_THRESH.HIGH) return "high";
  if (fraction >= TIER_THRESH.MODERATE) return "moderate";
  return "low";
}

export function detectGoalMisconfiguration(
  goalType: WeightGoalType,
  starting: number,
  target: number,
): GoalMisconfiguration | null {
  if (goalType === "weight_loss" && target >= starting) return "target_not_below_start";
  if (goalType === "weight_gain" && target <= starting) return "target_not_above_start";
  return null;
}

export function evaluateGoalProgress(
  goal: WeightGoal,
  currentWeightKg: number | null,
  onTrace?: (trace: ProgressTrace) => void,
): ProgressResult | null {
  if (currentWeightKg == null || goal.targetWeightKg == null) return null;

  const starting = resolveStartingWeight(goal, currentWeightKg);
  const fraction = computeProgress(currentWeightKg, goal.targetWeightKg, starting, goal.goalType);

  onTrace?.({
    goalType: goal.goalType,
    current: currentWeightKg,
    target: goal.targetWeightKg,
    starting,
    startingSubstituted: goal.startingWeightKg == null,
    fraction,
  });

  return { fraction, tier: classifyProgressTier(fraction) };
}

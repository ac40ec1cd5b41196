import {
  detectGoalMisconfiguration,
  evaluateGoalProgress,
  resolveStartingWeight,
  GOAL_TYPE_LABELS,
  type GoalMisconfiguration,
  type ProgressTier,
  type ProgressTrace,
  type WeightGoal,
} from "./goal-progress";
import { fmtFracToPctTrunc, fmtWeight, fmtWeightDelta, progressTierColor } from "./format";
import type { WeightUnit } from "./weight-units";

export const EMPTY_PROGRESS_MESSAGE = "Set a target weight to track progress";

const MISCONFIGURATION_MESSAGES: Record<GoalMisconfiguration, string> = {
  target_not_below_start: "Target weight is not below the starting weight",
  target_not_above_start: "Target weight is not above the starting weight",
};

export interface GoalProgressCardInput {
  goal: WeightGoal;
  currentWeightKg: number | null;
  unit: WeightUnit;
  onTrace?: (trace: ProgressTrace) => void;
}

export interface GoalProgressCardProgress {
  fraction: number;
  percentText: string;
  tier: ProgressTier;
  color: string;
  currentText: string;
  targetText: string;
  // Only present when the goal recorded a starting weight.
  changeText: string | null;
  changeDirection: "up" | "down" | null;
  warning: string | null;
}

export interface GoalProgressCardModel {
  title: string;
  goalTypeLabel: string;
  progress: GoalProgressCardProgress | null;
  emptyMessage: string | null;
}

export function buildGoalProgressCard(input: GoalProgressCardInput): GoalProgressCardModel {
  const { goal, currentWeightKg, unit, onTrace } = input;
  const base = { title: "Goal Progress", goalTypeLabel: GOAL_TYPE_LABELS[goal.goalType] };

  const result = evaluateGoalProgress(goal, currentWeightKg, onTrace);
  if (result == null || currentWeightKg == null || goal.targetWeightKg == null) {
    return { ...base, progress: null, emptyMessage: EMPTY_PROGRESS_MESSAGE };
  }

  const starting = resolveStartingWeight(goal, currentWeightKg);
  const misconfig = detectGoalMisconfiguration(goal.goalType, starting, goal.targetWeightKg);
  const change = goal.startingWeightKg != null ? currentWeightKg - goal.startingWeightKg : null;

  return {
    ...base,
    progress: {
      fraction: result.fraction,
      percentText: fmtFracToPctTrunc(result.fraction),
      tier: result.tier,
      color: progressTierColor(result.tier),
      currentText: fmtWeight(currentWeightKg, unit),
      targetText: fmtWeight(goal.targetWeightKg, unit),
      changeText: change != null ? fmtWeightDelta(change, unit) : null,
      changeDirection: change == null ? null : change >= 0 ? "up" : "down",
      // A goal saved without a starting weight cannot be judged until one exists.
      warning: misconfig != null && goal.startingWeightKg != null ? MISCONFIGURATION_MESSAGES[misconfig] : null,
    },
    emptyMessage: null,
  };
}

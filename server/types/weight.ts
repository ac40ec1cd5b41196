import type { ProgressResult, WeightGoalType } from "../../lib/goal-progress";
import type { PetActivityLevel, PetLifeStage, PetSpecies } from "../../lib/calorie-goals";

export type PetRecord = {
  id: string;
  ownerId: string;
  name: string;
  species: PetSpecies;
  lifeStage: PetLifeStage;
  activityLevel: PetActivityLevel | null;
  weightKg: number | null;
};

export type WeightRecord = {
  id: string;
  petId: string;
  weightKg: number;
  recordedAt: string;
  notes: string | null;
  recordedByOwnerId: string;
};

export type NewWeightRecord = {
  petId: string;
  weightKg: number;
  recordedAt: string;
  notes: string | null;
  recordedByOwnerId: string;
};

export type WeightGoalRecord = {
  id: string;
  petId: string;
  goalType: WeightGoalType;
  targetWeightKg: number | null;
  startingWeightKg: number | null;
  targetDate: string | null;
  isActive: boolean;
  notes: string | null;
  createdAt: string;
  updatedAt: string;
};

export type WeightGoalInput = {
  petId: string;
  goalType: WeightGoalType;
  targetWeightKg: number | null;
  startingWeightKg: number | null;
  targetDate: string | null;
  isActive: boolean;
  notes: string | null;
};

export type TrendDirection = "increasing" | "decreasing" | "stable";
export type TrendStrength = "weak" | "moderate" | "strong";

export type WeightTrendAnalysis = {
  trendDirection: TrendDirection;
  weightChangeKg: number;
  averageDailyChange: number;
  trendStrength: TrendStrength;
  daysAnalyzed: number;
  confidenceLevel: number;
};

export type WeeklyWeightProgress = {
  weekStart: string;
  weekEnd: string;
  startWeightKg: number;
  endWeightKg: number;
  weightChangeKg: number;
  measurements: number;
};

export type WeightManagementDashboard = {
  petId: string;
  currentWeightKg: number | null;
  targetWeightKg: number | null;
  weightGoal: WeightGoalRecord | null;
  recentTrend: WeightTrendAnalysis;
  weeklyProgress: WeeklyWeightProgress[];
  goalProgress: ProgressResult | null;
};

export type DeleteWeightRecordResult = {
  message: string;
  updatedWeightKg: number | null;
};

export type CalorieGoalRecord = {
  id: string;
  petId: string;
  dailyCalories: number;
  notes: string | null;
  createdAt: string;
  updatedAt: string;
};

export type CalorieGoalInput = {
  petId: string;
  dailyCalories: number;
  notes: string | null;
};

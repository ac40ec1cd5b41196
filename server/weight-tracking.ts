import { evaluateGoalProgress } from "../lib/goal-progress";
import { NotFoundError } from "./errors";
import type { WeightStore } from "./weight-storage";
import type { WeightGoalBody, WeightRecordBody } from "./validation";
import type {
  DeleteWeightRecordResult,
  PetRecord,
  TrendDirection,
  TrendStrength,
  WeeklyWeightProgress,
  WeightGoalRecord,
  WeightManagementDashboard,
  WeightRecord,
  WeightTrendAnalysis,
} from "./types/weight";

const DAY_MS = 86400000;

export const TREND_THRESH = {
  DIRECTION_KG: 0.5,
  STRONG_KG: 2.0,
  MODERATE_KG: 0.5,
  FULL_CONFIDENCE_RECORDS: 14,
} as const;

export const DEFAULT_HISTORY_DAYS = 365;
export const DEFAULT_TREND_DAYS = 30;
export const DASHBOARD_WEEKS = 4;

function round(x: number, decimals: number): number {
  const f = 10 ** decimals;
  return Math.round(x * f) / f;
}

function isoDate(d: Date): string {
  return d.toISOString().slice(0, 10);
}

export function analyzeWeightTrend(records: WeightRecord[]): WeightTrendAnalysis {
  if (records.length < 2) {
    return {
      trendDirection: "stable",
      weightChangeKg: 0,
      averageDailyChange: 0,
      trendStrength: "weak",
      daysAnalyzed: records.length,
      confidenceLevel: 0,
    };
  }

  const sorted = [...records].sort((a, b) => a.recordedAt.localeCompare(b.recordedAt));
  const first = sorted[0];
  const last = sorted[sorted.length - 1];
  const change = last.weightKg - first.weightKg;

  const daysSpan = Math.floor((Date.parse(last.recordedAt) - Date.parse(first.recordedAt)) / DAY_MS);
  const dailyChange = daysSpan > 0 ? change / daysSpan : 0;

  let trendDirection: TrendDirection = "stable";
  if (change > TREND_THRESH.DIRECTION_KG) trendDirection = "increasing";
  else if (change < -TREND_THRESH.DIRECTION_KG) trendDirection = "decreasing";

  const absChange = Math.abs(change);
  let trendStrength: TrendStrength = "weak";
  if (absChange > TREND_THRESH.STRONG_KG) trendStrength = "strong";
  else if (absChange > TREND_THRESH.MODERATE_KG) trendStrength = "moderate";

  return {
    trendDirection,
    weightChangeKg: round(change, 2),
    averageDailyChange: round(dailyChange, 3),
    trendStrength,
    daysAnalyzed: records.length,
    confidenceLevel: Math.min(1, records.length / TREND_THRESH.FULL_CONFIDENCE_RECORDS),
  };
}

/**
 * Week k (0 = most recent) runs from `now - (k + 1) weeks` for seven calendar
 * days, compared on UTC dates. Weeks without measurements are left out.
 */
export function computeWeeklyProgress(
  records: WeightRecord[],
  now: Date,
  weeks: number = DASHBOARD_WEEKS,
): WeeklyWeightProgress[] {
  const out: WeeklyWeightProgress[] = [];

  for (let k = 0; k < weeks; k++) {
    const weekStart = new Date(now.getTime() - (k + 1) * 7 * DAY_MS);
    const weekEnd = new Date(weekStart.getTime() + 6 * DAY_MS);
    const startDay = isoDate(weekStart);
    const endDay = isoDate(weekEnd);

    const inWeek = records
      .filter((r) => {
        const day = r.recordedAt.slice(0, 10);
        return day >= startDay && day <= endDay;
      })
      .sort((a, b) => a.recordedAt.localeCompare(b.recordedAt));

    if (inWeek.length === 0) continue;

    const startWeightKg = inWeek[0].weightKg;
    const endWeightKg = inWeek[inWeek.length - 1].weightKg;
    out.push({
      weekStart: startDay,
      weekEnd: endDay,
      startWeightKg,
      endWeightKg,
      weightChangeKg: round(endWeightKg - startWeightKg, 2),
      measurements: inWeek.length,
    });
  }

  return out;
}

export interface WeightTrackingServiceOptions {
  now?: () => Date;
}

export interface WeightTrackingService {
  recordWeight(ownerId: string, input: WeightRecordBody): Promise<WeightRecord>;
  getWeightHistory(ownerId: string, petId: string, daysBack?: number): Promise<WeightRecord[]>;
  deleteWeightRecord(ownerId: string, petId: string, recordId: string): Promise<DeleteWeightRecordResult>;
  upsertWeightGoal(ownerId: string, input: WeightGoalBody): Promise<WeightGoalRecord>;
  getActiveWeightGoal(ownerId: string, petId: string): Promise<WeightGoalRecord | null>;
  getWeightTrend(ownerId: string, petId: string, daysBack?: number): Promise<WeightTrendAnalysis>;
  getDashboard(ownerId: string, petId: string): Promise<WeightManagementDashboard>;
}

export function createWeightTrackingService(
  store: WeightStore,
  options: WeightTrackingServiceOptions = {},
): WeightTrackingService {
  const now = options.now ?? (() => new Date());

  async function requireOwnedPet(ownerId: string, petId: string): Promise<PetRecord> {
    const pet = await store.getPet(petId);
    if (!pet || pet.ownerId !== ownerId) throw new NotFoundError("Pet not found");
    return pet;
  }

  async function history(petId: string, daysBack: number): Promise<WeightRecord[]> {
    const since = daysBack > 0 ? new Date(now().getTime() - daysBack * DAY_MS) : null;
    return store.listWeightRecords(petId, since);
  }

  async function activeGoal(petId: string): Promise<WeightGoalRecord | null> {
    const goal = await store.getWeightGoal(petId);
    return goal && goal.isActive ? goal : null;
  }

  return {
    async recordWeight(ownerId, input) {
      await requireOwnedPet(ownerId, input.petId);

      const record = await store.insertWeightRecord({
        petId: input.petId,
        weightKg: input.weightKg,
        recordedAt: input.recordedAt ?? now().toISOString(),
        notes: input.notes,
        recordedByOwnerId: ownerId,
      });
      console.log(`[weight] recorded ${record.weightKg} kg for pet ${record.petId}`);

      // The record is already stored; a stale profile weight is logged, not surfaced.
      try {
        const newest = await store.listWeightRecords(input.petId, null);
        await store.setPetWeight(input.petId, newest.length > 0 ? newest[0].weightKg : record.weightKg);
      } catch (err) {
        console.error(`[weight] failed to update pet ${input.petId} weight:`, err);
      }

      return record;
    },

    async getWeightHistory(ownerId, petId, daysBack = DEFAULT_HISTORY_DAYS) {
      await requireOwnedPet(ownerId, petId);
      return history(petId, daysBack);
    },

    async deleteWeightRecord(ownerId, petId, recordId) {
      await requireOwnedPet(ownerId, petId);

      const record = await store.getWeightRecord(recordId);
      if (!record || record.petId !== petId) throw new NotFoundError("Weight record not found");

      const deleted = await store.deleteWeightRecord(recordId);
      if (!deleted) throw new NotFoundError("Weight record not found");

      const remaining = await store.listWeightRecords(petId, null);
      if (remaining.length > 0) {
        const previous = remaining[0].weightKg;
        await store.setPetWeight(petId, previous);
        console.log(`[weight] deleted record ${recordId}; pet ${petId} weight restored to ${previous} kg`);
        return {
          message: "Weight record deleted and pet weight updated to previous record",
          updatedWeightKg: previous,
        };
      }

      await store.setPetWeight(petId, null);
      console.log(`[weight] deleted record ${recordId}; pet ${petId} has no weights left`);
      return {
        message: "Weight record deleted and pet weight cleared (no previous records)",
        updatedWeightKg: null,
      };
    },

    async upsertWeightGoal(ownerId, input) {
      const pet = await requireOwnedPet(ownerId, input.petId);
      const existing = await store.getWeightGoal(input.petId);
      // The baseline is fixed when the goal is first saved.
      const startingWeightKg = input.startingWeightKg ?? existing?.startingWeightKg ?? pet.weightKg;
      const goal = await store.upsertWeightGoal({
        petId: input.petId,
        goalType: input.goalType,
        targetWeightKg: input.targetWeightKg,
        startingWeightKg,
        targetDate: input.targetDate,
        isActive: input.isActive,
        notes: input.notes,
      });
      console.log(`[weight] goal ${goal.goalType} saved for pet ${goal.petId}`);
      return goal;
    },

    async getActiveWeightGoal(ownerId, petId) {
      await requireOwnedPet(ownerId, petId);
      return activeGoal(petId);
    },

    async getWeightTrend(ownerId, petId, daysBack = DEFAULT_TREND_DAYS) {
      await requireOwnedPet(ownerId, petId);
      return analyzeWeightTrend(await history(petId, daysBack));
    },

    async getDashboard(ownerId, petId) {
      const pet = await requireOwnedPet(ownerId, petId);

      const [all, weightGoal] = await Promise.all([
        store.listWeightRecords(petId, null),
        activeGoal(petId),
      ]);

      const currentWeightKg = all.length > 0 ? all[0].weightKg : pet.weightKg;
      const cutoff = now().getTime() - DEFAULT_TREND_DAYS * DAY_MS;
      const recent = all.filter((r) => Date.parse(r.recordedAt) >= cutoff);

      return {
        petId,
        currentWeightKg,
        targetWeightKg: weightGoal?.targetWeightKg ?? null,
        weightGoal,
        recentTrend: analyzeWeightTrend(recent),
        weeklyProgress: computeWeeklyProgress(all, now()),
        goalProgress: weightGoal ? evaluateGoalProgress(weightGoal, currentWeightKg) : null,
      };
    },
  };
}

import {
  analyzeWeightTrend,
  computeWeeklyProgress,
  createWeightTrackingService,
  type WeightTrackingService,
} from "../weight-tracking";
import { NotFoundError } from "../errors";
import { MemoryWeightStore, makePet, OWNER, OTHER_OWNER } from "./helpers/memory-stores";
import type { WeightRecord } from "../types/weight";

const NOW = new Date("2026-03-01T12:00:00.000Z");

function rec(petId: string, recordedAt: string, weightKg: number): WeightRecord {
  return { id: `${petId}-${recordedAt}`, petId, weightKg, recordedAt, notes: null, recordedByOwnerId: OWNER };
}

describe("analyzeWeightTrend", () => {
  test("fewer than two records is stable with zero confidence", () => {
    expect(analyzeWeightTrend([rec("p", "2026-02-20T12:00:00.000Z", 10)])).toEqual({
      trendDirection: "stable",
      weightChangeKg: 0,
      averageDailyChange: 0,
      trendStrength: "weak",
      daysAnalyzed: 1,
      confidenceLevel: 0,
    });
  });

  test("one kilo up over ten days", () => {
    const trend = analyzeWeightTrend([
      rec("p", "2026-02-28T12:00:00.000Z", 11),
      rec("p", "2026-02-18T12:00:00.000Z", 10),
    ]);
    expect(trend.trendDirection).toBe("increasing");
    expect(trend.trendStrength).toBe("moderate");
    expect(trend.weightChangeKg).toBe(1);
    expect(trend.averageDailyChange).toBe(0.1);
    expect(trend.daysAnalyzed).toBe(2);
    expect(trend.confidenceLevel).toBeCloseTo(1 / 7, 10);
  });

  test("changes within half a kilo are stable", () => {
    const trend = analyzeWeightTrend([
      rec("p", "2026-02-18T12:00:00.000Z", 10),
      rec("p", "2026-02-28T12:00:00.000Z", 10.5),
    ]);
    expect(trend.trendDirection).toBe("stable");
    expect(trend.trendStrength).toBe("weak");
  });

  test("strong loss above two kilos", () => {
    const trend = analyzeWeightTrend([
      rec("p", "2026-02-01T12:00:00.000Z", 20),
      rec("p", "2026-02-11T12:00:00.000Z", 17.5),
    ]);
    expect(trend.trendDirection).toBe("decreasing");
    expect(trend.trendStrength).toBe("strong");
    expect(trend.weightChangeKg).toBe(-2.5);
    expect(trend.averageDailyChange).toBe(-0.25);
  });

  test("confidence caps at 1 from fourteen records", () => {
    const records = Array.from({ length: 20 }, (_, i) =>
      rec("p", new Date(Date.UTC(2026, 1, 1 + i, 12)).toISOString(), 10),
    );
    expect(analyzeWeightTrend(records).confidenceLevel).toBe(1);
  });
});

describe("computeWeeklyProgress", () => {
  test("groups by calendar week back from now and skips empty weeks", () => {
    const weeks = computeWeeklyProgress(
      [
        rec("p", "2026-03-01T08:00:00.000Z", 9.8),
        rec("p", "2026-02-27T08:00:00.000Z", 10.0),
        rec("p", "2026-02-23T08:00:00.000Z", 10.4),
        rec("p", "2026-02-10T08:00:00.000Z", 11.0),
      ],
      NOW,
    );
    expect(weeks).toEqual([
      {
        weekStart: "2026-02-22",
        weekEnd: "2026-02-28",
        startWeightKg: 10.4,
        endWeightKg: 10.0,
        weightChangeKg: -0.4,
        measurements: 2,
      },
      {
        weekStart: "2026-02-08",
        weekEnd: "2026-02-14",
        startWeightKg: 11.0,
        endWeightKg: 11.0,
        weightChangeKg: 0,
        measurements: 1,
      },
    ]);
  });

  test("no records, no weeks", () => {
    expect(computeWeeklyProgress([], NOW)).toEqual([]);
  });
});

describe("WeightTrackingService", () => {
  let store: MemoryWeightStore;
  let service: WeightTrackingService;

  beforeEach(() => {
    jest.spyOn(console, "log").mockImplementation(() => {});
    jest.spyOn(console, "error").mockImplementation(() => {});
    store = new MemoryWeightStore();
    service = createWeightTrackingService(store, { now: () => NOW });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  describe("recordWeight", () => {
    test("stores the record and updates the pet weight", async () => {
      const pet = store.addPet(makePet());
      const record = await service.recordWeight(OWNER, { petId: pet.id, weightKg: 9.5, recordedAt: null, notes: "after walk" });

      expect(record.recordedAt).toBe("2026-03-01T12:00:00.000Z");
      expect(record.recordedByOwnerId).toBe(OWNER);
      expect(record.notes).toBe("after walk");
      expect(store.records).toHaveLength(1);
      expect(store.pets.get(pet.id)?.weightKg).toBe(9.5);
    });

    test("a backdated entry does not replace the newest weight", async () => {
      const pet = store.addPet(makePet());
      await service.recordWeight(OWNER, { petId: pet.id, weightKg: 9, recordedAt: null, notes: null });
      await service.recordWeight(OWNER, {
        petId: pet.id,
        weightKg: 12,
        recordedAt: "2026-02-01T12:00:00.000Z",
        notes: null,
      });
      expect(store.pets.get(pet.id)?.weightKg).toBe(9);
    });

    test("a failed pet weight update is logged and the record kept", async () => {
      const pet = store.addPet(makePet());
      store.failPetWeightUpdates = true;
      const record = await service.recordWeight(OWNER, { petId: pet.id, weightKg: 9, recordedAt: null, notes: null });

      expect(record.weightKg).toBe(9);
      expect(store.records).toHaveLength(1);
      expect(console.error).toHaveBeenCalledTimes(1);
    });

    test("another owner's pet is not found", async () => {
      const pet = store.addPet(makePet({ ownerId: OTHER_OWNER }));
      await expect(
        service.recordWeight(OWNER, { petId: pet.id, weightKg: 9, recordedAt: null, notes: null }),
      ).rejects.toThrow(new NotFoundError("Pet not found"));
      expect(store.records).toHaveLength(0);
    });
  });

  describe("getWeightHistory", () => {
    test("limits to the last N days, newest first", async () => {
      const pet = store.addPet(makePet());
      store.records.push(
        rec(pet.id, "2026-02-20T12:00:00.000Z", 10),
        rec(pet.id, "2026-02-25T12:00:00.000Z", 9.8),
        rec(pet.id, "2026-02-27T12:00:00.000Z", 9.7),
      );

      const week = await service.getWeightHistory(OWNER, pet.id, 7);
      expect(week.map((r) => r.weightKg)).toEqual([9.7, 9.8]);

      const all = await service.getWeightHistory(OWNER, pet.id, 0);
      expect(all.map((r) => r.weightKg)).toEqual([9.7, 9.8, 10]);
    });
  });

  describe("deleteWeightRecord", () => {
    test("restores the previous weight, then clears it", async () => {
      const pet = store.addPet(makePet({ weightKg: 9.7 }));
      const older = rec(pet.id, "2026-02-25T12:00:00.000Z", 9.8);
      const newer = rec(pet.id, "2026-02-27T12:00:00.000Z", 9.7);
      store.records.push(older, newer);

      const first = await service.deleteWeightRecord(OWNER, pet.id, newer.id);
      expect(first).toEqual({
        message: "Weight record deleted and pet weight updated to previous record",
        updatedWeightKg: 9.8,
      });
      expect(store.pets.get(pet.id)?.weightKg).toBe(9.8);

      const second = await service.deleteWeightRecord(OWNER, pet.id, older.id);
      expect(second).toEqual({
        message: "Weight record deleted and pet weight cleared (no previous records)",
        updatedWeightKg: null,
      });
      expect(store.pets.get(pet.id)?.weightKg).toBeNull();
    });

    test("a record of another pet is not found", async () => {
      const pet = store.addPet(makePet());
      const other = store.addPet(makePet());
      const r = rec(other.id, "2026-02-25T12:00:00.000Z", 5);
      store.records.push(r);

      await expect(service.deleteWeightRecord(OWNER, pet.id, r.id)).rejects.toThrow("Weight record not found");
      expect(store.records).toHaveLength(1);
    });
  });

  describe("weight goals", () => {
    test("starting weight defaults to the pet's weight", async () => {
      const pet = store.addPet(makePet({ weightKg: 10 }));
      const goal = await service.upsertWeightGoal(OWNER, {
        petId: pet.id,
        goalType: "weight_loss",
        targetWeightKg: 8,
        startingWeightKg: null,
        targetDate: "2026-06-01",
        isActive: true,
        notes: null,
      });
      expect(goal.startingWeightKg).toBe(10);
      expect(await service.getActiveWeightGoal(OWNER, pet.id)).toEqual(goal);
    });

    test("saving again replaces the goal", async () => {
      const pet = store.addPet(makePet({ weightKg: 10 }));
      const base = { petId: pet.id, startingWeightKg: 10, targetDate: null, isActive: true, notes: null };
      const first = await service.upsertWeightGoal(OWNER, { ...base, goalType: "weight_loss", targetWeightKg: 8 });
      const second = await service.upsertWeightGoal(OWNER, { ...base, goalType: "weight_gain", targetWeightKg: 12 });

      expect(second.id).toBe(first.id);
      expect(second.goalType).toBe("weight_gain");
      expect(store.goals.size).toBe(1);
    });

    test("re-saving without a starting weight keeps the original baseline", async () => {
      const pet = store.addPet(makePet({ weightKg: 10 }));
      const base = {
        petId: pet.id,
        goalType: "weight_loss" as const,
        targetWeightKg: 8,
        startingWeightKg: null,
        targetDate: null,
        isActive: true,
      };
      await service.upsertWeightGoal(OWNER, { ...base, notes: null });
      await service.recordWeight(OWNER, { petId: pet.id, weightKg: 9, recordedAt: null, notes: null });
      expect(store.pets.get(pet.id)?.weightKg).toBe(9);

      const updated = await service.upsertWeightGoal(OWNER, { ...base, notes: "vet says slow down" });

      expect(updated.startingWeightKg).toBe(10);
      expect(updated.notes).toBe("vet says slow down");
      const dashboard = await service.getDashboard(OWNER, pet.id);
      expect(dashboard.goalProgress).toEqual({ fraction: 0.5, tier: "moderate" });
    });

    test("an explicit starting weight replaces the baseline", async () => {
      const pet = store.addPet(makePet({ weightKg: 10 }));
      const base = { petId: pet.id, goalType: "weight_loss" as const, targetWeightKg: 8, targetDate: null, isActive: true, notes: null };
      await service.upsertWeightGoal(OWNER, { ...base, startingWeightKg: null });
      const updated = await service.upsertWeightGoal(OWNER, { ...base, startingWeightKg: 11 });
      expect(updated.startingWeightKg).toBe(11);
    });

    test("an inactive goal is not returned as active", async () => {
      const pet = store.addPet(makePet());
      await service.upsertWeightGoal(OWNER, {
        petId: pet.id,
        goalType: "maintenance",
        targetWeightKg: 10,
        startingWeightKg: 10,
        targetDate: null,
        isActive: false,
        notes: null,
      });
      expect(await service.getActiveWeightGoal(OWNER, pet.id)).toBeNull();
    });
  });

  describe("getDashboard", () => {
    test("combines current weight, trend, weekly progress and goal progress", async () => {
      const pet = store.addPet(makePet({ weightKg: 10 }));
      store.records.push(
        rec(pet.id, "2026-02-22T12:00:00.000Z", 10),
        rec(pet.id, "2026-03-01T12:00:00.000Z", 9),
      );
      await service.upsertWeightGoal(OWNER, {
        petId: pet.id,
        goalType: "weight_loss",
        targetWeightKg: 8,
        startingWeightKg: 10,
        targetDate: null,
        isActive: true,
        notes: null,
      });

      const dashboard = await service.getDashboard(OWNER, pet.id);

      expect(dashboard.currentWeightKg).toBe(9);
      expect(dashboard.targetWeightKg).toBe(8);
      expect(dashboard.goalProgress).toEqual({ fraction: 0.5, tier: "moderate" });
      expect(dashboard.recentTrend.trendDirection).toBe("decreasing");
      expect(dashboard.recentTrend.averageDailyChange).toBe(-0.143);
      expect(dashboard.weeklyProgress).toEqual([
        {
          weekStart: "2026-02-22",
          weekEnd: "2026-02-28",
          startWeightKg: 10,
          endWeightKg: 10,
          weightChangeKg: 0,
          measurements: 1,
        },
      ]);
    });

    test("without records or goal falls back to the profile weight", async () => {
      const pet = store.addPet(makePet({ weightKg: 7 }));
      const dashboard = await service.getDashboard(OWNER, pet.id);

      expect(dashboard.currentWeightKg).toBe(7);
      expect(dashboard.weightGoal).toBeNull();
      expect(dashboard.goalProgress).toBeNull();
      expect(dashboard.weeklyProgress).toEqual([]);
      expect(dashboard.recentTrend.daysAnalyzed).toBe(0);
    });
  });
});

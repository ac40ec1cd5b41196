import { buildGoalProgressCard, EMPTY_PROGRESS_MESSAGE } from "../goal-progress-card";
import { fmtFracToPctTrunc, fmtWeight, fmtWeightDelta, progressTierColor, TIER_COLORS, MUTED_COLOR } from "../format";

describe("format helpers", () => {
  test("progress percent truncates instead of rounding up", () => {
    expect(fmtFracToPctTrunc(0.999)).toBe("99%");
    expect(fmtFracToPctTrunc(0.29)).toBe("28%");
    expect(fmtFracToPctTrunc(0.5)).toBe("50%");
    expect(fmtFracToPctTrunc(1)).toBe("100%");
    expect(fmtFracToPctTrunc(null)).toBe("—");
  });

  test("weights render in the chosen unit", () => {
    expect(fmtWeight(9, "kg")).toBe("9.0 kg");
    expect(fmtWeight(9, "lb")).toBe("19.8 lbs");
    expect(fmtWeight(null, "kg")).toBe("--");
  });

  test("weight deltas carry a sign", () => {
    expect(fmtWeightDelta(0.5, "kg")).toBe("+0.5 kg");
    expect(fmtWeightDelta(-1, "lb")).toBe("-2.2 lbs");
    expect(fmtWeightDelta(undefined, "kg")).toBe("—");
  });

  test("tier colours", () => {
    expect(progressTierColor("high")).toBe(TIER_COLORS.high);
    expect(progressTierColor("moderate")).toBe("#FBBF24");
    expect(progressTierColor(null)).toBe(MUTED_COLOR);
  });
});

describe("buildGoalProgressCard", () => {
  test("loss goal halfway there", () => {
    const card = buildGoalProgressCard({
      goal: { goalType: "weight_loss", startingWeightKg: 10, targetWeightKg: 8 },
      currentWeightKg: 9,
      unit: "kg",
    });
    expect(card.title).toBe("Goal Progress");
    expect(card.goalTypeLabel).toBe("Weight Loss");
    expect(card.emptyMessage).toBeNull();
    expect(card.progress).toEqual({
      fraction: 0.5,
      percentText: "50%",
      tier: "moderate",
      color: "#FBBF24",
      currentText: "9.0 kg",
      targetText: "8.0 kg",
      changeText: "-1.0 kg",
      changeDirection: "down",
      warning: null,
    });
  });

  test("renders in pounds", () => {
    const card = buildGoalProgressCard({
      goal: { goalType: "weight_loss", startingWeightKg: 10, targetWeightKg: 8 },
      currentWeightKg: 9,
      unit: "lb",
    });
    expect(card.progress?.currentText).toBe("19.8 lbs");
    expect(card.progress?.targetText).toBe("17.6 lbs");
    expect(card.progress?.changeText).toBe("-2.2 lbs");
  });

  test("misconfigured loss goal shows 0% with a warning", () => {
    const card = buildGoalProgressCard({
      goal: { goalType: "weight_loss", startingWeightKg: 8, targetWeightKg: 10 },
      currentWeightKg: 9,
      unit: "kg",
    });
    expect(card.progress?.percentText).toBe("0%");
    expect(card.progress?.tier).toBe("low");
    expect(card.progress?.changeText).toBe("+1.0 kg");
    expect(card.progress?.changeDirection).toBe("up");
    expect(card.progress?.warning).toBe("Target weight is not below the starting weight");
  });

  test("goal without a starting weight has no change line and no warning", () => {
    const card = buildGoalProgressCard({
      goal: { goalType: "weight_gain", startingWeightKg: null, targetWeightKg: 12 },
      currentWeightKg: 10,
      unit: "kg",
    });
    expect(card.goalTypeLabel).toBe("Weight Gain");
    expect(card.progress?.percentText).toBe("0%");
    expect(card.progress?.changeText).toBeNull();
    expect(card.progress?.changeDirection).toBeNull();
    expect(card.progress?.warning).toBeNull();
  });

  test("no target weight shows the empty state", () => {
    const card = buildGoalProgressCard({
      goal: { goalType: "maintenance", startingWeightKg: 10, targetWeightKg: null },
      currentWeightKg: 10,
      unit: "kg",
    });
    expect(card.progress).toBeNull();
    expect(card.emptyMessage).toBe(EMPTY_PROGRESS_MESSAGE);
  });

  test("no current weight shows the empty state", () => {
    const card = buildGoalProgressCard({
      goal: { goalType: "maintenance", startingWeightKg: 10, targetWeightKg: 10 },
      currentWeightKg: null,
      unit: "kg",
    });
    expect(card.progress).toBeNull();
    expect(card.emptyMessage).toBe("Set a target weight to track progress");
  });
});

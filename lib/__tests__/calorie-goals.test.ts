import {
  suggestDailyCalories,
  defaultDailyCalories,
  computeCalorieGoalProgress,
  formatCalorieGoalStatus,
  isPetSpecies,
  isPetLifeStage,
} from "../calorie-goals";

describe("suggestDailyCalories", () => {
  test("30 kcal/kg for an adult of moderate activity", () => {
    expect(suggestDailyCalories({ species: "dog", lifeStage: "adult", activityLevel: "moderate", weightKg: 10 })).toBe(300);
  });

  test("activity and life stage multiply together", () => {
    expect(suggestDailyCalories({ species: "dog", lifeStage: "puppy", activityLevel: "high", weightKg: 5 })).toBe(270);
    expect(suggestDailyCalories({ species: "cat", lifeStage: "senior", activityLevel: "low", weightKg: 4 })).toBe(86);
    expect(suggestDailyCalories({ species: "dog", lifeStage: "lactating", activityLevel: "moderate", weightKg: 20 })).toBe(840);
  });

  test("unknown activity level counts as moderate", () => {
    expect(suggestDailyCalories({ species: "cat", lifeStage: "adult", activityLevel: null, weightKg: 4 })).toBe(120);
  });

  test("without a weight falls back to species and life stage defaults", () => {
    expect(suggestDailyCalories({ species: "dog", lifeStage: "adult", activityLevel: "high", weightKg: null })).toBe(600);
    expect(suggestDailyCalories({ species: "cat", lifeStage: "puppy", activityLevel: null, weightKg: null })).toBe(250);
    expect(suggestDailyCalories({ species: "cat", lifeStage: "pregnant", activityLevel: null, weightKg: null })).toBe(300);
  });

  test("defaultDailyCalories table", () => {
    expect(defaultDailyCalories("dog", "puppy")).toBe(400);
    expect(defaultDailyCalories("dog", "senior")).toBe(500);
    expect(defaultDailyCalories("cat", "adult")).toBe(275);
    expect(defaultDailyCalories("dog", "lactating")).toBe(300);
  });
});

describe("computeCalorieGoalProgress", () => {
  test("80% counts as close", () => {
    const p = computeCalorieGoalProgress(500, 400);
    expect(p.progressPercentage).toBeCloseTo(80, 10);
    expect(p.remainingCalories).toBe(100);
    expect(p.status).toBe("close");
    expect(p.isGoalMet).toBe(false);
  });

  test("exactly on goal is met, not over", () => {
    const p = computeCalorieGoalProgress(500, 500);
    expect(p.status).toBe("met");
    expect(p.isGoalMet).toBe(true);
    expect(p.isOverGoal).toBe(false);
  });

  test("over goal leaves nothing remaining", () => {
    const p = computeCalorieGoalProgress(500, 520);
    expect(p.status).toBe("over");
    expect(p.remainingCalories).toBe(0);
    expect(p.progressPercentage).toBeCloseTo(104, 10);
  });

  test("well under", () => {
    const p = computeCalorieGoalProgress(500, 100);
    expect(p.status).toBe("under");
    expect(p.progressPercentage).toBeCloseTo(20, 10);
  });
});

describe("formatCalorieGoalStatus", () => {
  test("formats whole kcal", () => {
    expect(formatCalorieGoalStatus(620.7)).toBe("Goal: 620 kcal/day");
    expect(formatCalorieGoalStatus(null)).toBe("No goal set");
  });
});

describe("guards", () => {
  test("species and life stage", () => {
    expect(isPetSpecies("cat")).toBe(true);
    expect(isPetSpecies("ferret")).toBe(false);
    expect(isPetLifeStage("senior")).toBe(true);
    expect(isPetLifeStage("kitten")).toBe(false);
  });
});

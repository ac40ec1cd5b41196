import { suggestDailyCalories } from "../lib/calorie-goals";
import { NotFoundError } from "./errors";
import type { CalorieGoalStore } from "./calorie-goals-storage";
import type { WeightStore } from "./weight-storage";
import type { CalorieGoalBody } from "./validation";
import type { CalorieGoalRecord, PetRecord } from "./types/weight";

export interface SuggestedCalories {
  petId: string;
  suggestedDailyCalories: number;
  basedOnWeightKg: number | null;
}

export interface CalorieGoalService {
  upsertCalorieGoal(ownerId: string, input: CalorieGoalBody): Promise<CalorieGoalRecord>;
  getCalorieGoal(ownerId: string, petId: string): Promise<CalorieGoalRecord | null>;
  listCalorieGoals(ownerId: string): Promise<CalorieGoalRecord[]>;
  deleteCalorieGoal(ownerId: string, petId: string): Promise<void>;
  suggestCalorieGoal(ownerId: string, petId: string): Promise<SuggestedCalories>;
}

type PetLookup = Pick<WeightStore, "getPet">;

export function createCalorieGoalService(store: CalorieGoalStore, pets: PetLookup): CalorieGoalService {
  async function requireOwnedPet(ownerId: string, petId: string): Promise<PetRecord> {
    const pet = await pets.getPet(petId);
    if (!pet || pet.ownerId !== ownerId) throw new NotFoundError("Pet not found");
    return pet;
  }

  return {
    async upsertCalorieGoal(ownerId, input) {
      await requireOwnedPet(ownerId, input.petId);
      const goal = await store.upsertCalorieGoal(input);
      console.log(`[calorie-goals] ${goal.dailyCalories} kcal/day saved for pet ${goal.petId}`);
      return goal;
    },

    async getCalorieGoal(ownerId, petId) {
      await requireOwnedPet(ownerId, petId);
      return store.getCalorieGoal(petId);
    },

    async listCalorieGoals(ownerId) {
      return store.listCalorieGoals(ownerId);
    },

    async deleteCalorieGoal(ownerId, petId) {
      await requireOwnedPet(ownerId, petId);
      const deleted = await store.deleteCalorieGoal(petId);
      if (!deleted) throw new NotFoundError("Calorie goal not found");
      console.log(`[calorie-goals] deleted goal for pet ${petId}`);
    },

    async suggestCalorieGoal(ownerId, petId) {
      const pet = await requireOwnedPet(ownerId, petId);
      return {
        petId,
        suggestedDailyCalories: suggestDailyCalories(pet),
        basedOnWeightKg: pet.weightKg,
      };
    },
  };
}

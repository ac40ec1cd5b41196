import type { Pool } from "pg";
import { isUuid } from "./weight-storage";
import type { CalorieGoalInput, CalorieGoalRecord } from "./types/weight";

export interface CalorieGoalStore {
  getCalorieGoal(petId: string): Promise<CalorieGoalRecord | null>;
  listCalorieGoals(ownerId: string): Promise<CalorieGoalRecord[]>;
  upsertCalorieGoal(input: CalorieGoalInput): Promise<CalorieGoalRecord>;
  deleteCalorieGoal(petId: string): Promise<boolean>;
}

type CalorieGoalRow = {
  id: string;
  pet_id: string;
  daily_calories: number;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
};

function mapCalorieGoalRow(row: CalorieGoalRow): CalorieGoalRecord {
  return {
    id: row.id,
    petId: row.pet_id,
    dailyCalories: row.daily_calories,
    notes: row.notes,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}

export function createPgCalorieGoalStore(db: Pool): CalorieGoalStore {
  return {
    async getCalorieGoal(petId) {
      if (!isUuid(petId)) return null;
      const { rows } = await db.query<CalorieGoalRow>(
        `SELECT id, pet_id, daily_calories, notes, created_at, updated_at
         FROM calorie_goals WHERE pet_id = $1
         LIMIT 1`,
        [petId]
      );
      return rows.length > 0 ? mapCalorieGoalRow(rows[0]) : null;
    },

    async listCalorieGoals(ownerId) {
      const { rows } = await db.query<CalorieGoalRow>(
        `SELECT cg.id, cg.pet_id, cg.daily_calories, cg.notes, cg.created_at, cg.updated_at
         FROM calorie_goals cg
         JOIN pets p ON p.id = cg.pet_id
         WHERE p.owner_id = $1
         ORDER BY cg.created_at`,
        [ownerId]
      );
      return rows.map(mapCalorieGoalRow);
    },

    async upsertCalorieGoal(input) {
      const { rows } = await db.query<CalorieGoalRow>(
        `
        INSERT INTO calorie_goals (pet_id, daily_calories, notes)
        VALUES ($1, $2, $3)
        ON CONFLICT (pet_id) DO UPDATE SET
          daily_calories = EXCLUDED.daily_calories,
          notes = EXCLUDED.notes,
          updated_at = NOW()
        RETURNING id, pet_id, daily_calories, notes, created_at, updated_at
        `,
        [input.petId, input.dailyCalories, input.notes]
      );
      return mapCalorieGoalRow(rows[0]);
    },

    async deleteCalorieGoal(petId) {
      if (!isUuid(petId)) return false;
      const res = await db.query(`DELETE FROM calorie_goals WHERE pet_id = $1`, [petId]);
      return (res.rowCount ?? 0) > 0;
    },
  };
}

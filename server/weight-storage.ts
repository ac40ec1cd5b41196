import type { Pool } from "pg";
import { isWeightGoalType } from "../lib/goal-progress";
import { isPetActivityLevel, isPetLifeStage, isPetSpecies } from "../lib/calorie-goals";
import type {
  NewWeightRecord,
  PetRecord,
  WeightGoalInput,
  WeightGoalRecord,
  WeightRecord,
} from "./types/weight";

export interface WeightStore {
  getPet(petId: string): Promise<PetRecord | null>;
  setPetWeight(petId: string, weightKg: number | null): Promise<void>;
  insertWeightRecord(input: NewWeightRecord): Promise<WeightRecord>;
  /** Newest first. `since` null means every record. */
  listWeightRecords(petId: string, since: Date | null): Promise<WeightRecord[]>;
  getWeightRecord(recordId: string): Promise<WeightRecord | null>;
  deleteWeightRecord(recordId: string): Promise<boolean>;
  getWeightGoal(petId: string): Promise<WeightGoalRecord | null>;
  upsertWeightGoal(input: WeightGoalInput): Promise<WeightGoalRecord>;
}

type PetRow = {
  id: string;
  owner_id: string;
  name: string;
  species: string;
  life_stage: string;
  activity_level: string | null;
  weight_kg: number | null;
};

type WeightRecordRow = {
  id: string;
  pet_id: string;
  weight_kg: number;
  recorded_at: Date;
  notes: string | null;
  recorded_by_owner_id: string;
};

type WeightGoalRow = {
  id: string;
  pet_id: string;
  goal_type: string;
  target_weight_kg: number | null;
  starting_weight_kg: number | null;
  target_date: string | null;
  is_active: boolean;
  notes: string | null;
  created_at: Date;
  updated_at: Date;
};

const UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

// Postgres rejects malformed uuids with an error; treat them as "no such row".
export function isUuid(id: string): boolean {
  return UUID_REGEX.test(id);
}

export function mapPetRow(row: PetRow): PetRecord {
  if (!isPetSpecies(row.species)) throw new Error(`pets.species: unknown value "${row.species}"`);
  if (!isPetLifeStage(row.life_stage)) throw new Error(`pets.life_stage: unknown value "${row.life_stage}"`);
  return {
    id: row.id,
    ownerId: row.owner_id,
    name: row.name,
    species: row.species,
    lifeStage: row.life_stage,
    activityLevel: isPetActivityLevel(row.activity_level) ? row.activity_level : null,
    weightKg: row.weight_kg,
  };
}

function mapWeightRecordRow(row: WeightRecordRow): WeightRecord {
  return {
    id: row.id,
    petId: row.pet_id,
    weightKg: row.weight_kg,
    recordedAt: row.recorded_at.toISOString(),
    notes: row.notes,
    recordedByOwnerId: row.recorded_by_owner_id,
  };
}

function mapWeightGoalRow(row: WeightGoalRow): WeightGoalRecord {
  if (!isWeightGoalType(row.goal_type)) {
    throw new Error(`pet_weight_goals.goal_type: unknown value "${row.goal_type}"`);
  }
  return {
    id: row.id,
    petId: row.pet_id,
    goalType: row.goal_type,
    targetWeightKg: row.target_weight_kg,
    startingWeightKg: row.starting_weight_kg,
    targetDate: row.target_date,
    isActive: row.is_active,
    notes: row.notes,
    createdAt: row.created_at.toISOString(),
    updatedAt: row.updated_at.toISOString(),
  };
}

const GOAL_COLUMNS = `
  id, pet_id, goal_type, target_weight_kg, starting_weight_kg,
  target_date::text AS target_date, is_active, notes, created_at, updated_at
`;

export function createPgWeightStore(db: Pool): WeightStore {
  return {
    async getPet(petId) {
      if (!isUuid(petId)) return null;
      const { rows } = await db.query<PetRow>(
        `SELECT id, owner_id, name, species, life_stage, activity_level, weight_kg
         FROM pets WHERE id = $1`,
        [petId]
      );
      return rows.length > 0 ? mapPetRow(rows[0]) : null;
    },

    async setPetWeight(petId, weightKg) {
      await db.query(
        `UPDATE pets SET weight_kg = $2, updated_at = NOW() WHERE id = $1`,
        [petId, weightKg]
      );
    },

    async insertWeightRecord(input) {
      const { rows } = await db.query<WeightRecordRow>(
        `INSERT INTO pet_weight_records (pet_id, weight_kg, recorded_at, notes, recorded_by_owner_id)
         VALUES ($1, $2, $3, $4, $5)
         RETURNING id, pet_id, weight_kg, recorded_at, notes, recorded_by_owner_id`,
        [input.petId, input.weightKg, input.recordedAt, input.notes, input.recordedByOwnerId]
      );
      return mapWeightRecordRow(rows[0]);
    },

    async listWeightRecords(petId, since) {
      const params: unknown[] = [petId];
      let where = `pet_id = $1`;
      if (since) {
        params.push(since.toISOString());
        where += ` AND recorded_at >= $2`;
      }
      const { rows } = await db.query<WeightRecordRow>(
        `SELECT id, pet_id, weight_kg, recorded_at, notes, recorded_by_owner_id
         FROM pet_weight_records
         WHERE ${where}
         ORDER BY recorded_at DESC`,
        params
      );
      return rows.map(mapWeightRecordRow);
    },

    async getWeightRecord(recordId) {
      if (!isUuid(recordId)) return null;
      const { rows } = await db.query<WeightRecordRow>(
        `SELECT id, pet_id, weight_kg, recorded_at, notes, recorded_by_owner_id
         FROM pet_weight_records WHERE id = $1`,
        [recordId]
      );
      return rows.length > 0 ? mapWeightRecordRow(rows[0]) : null;
    },

    async deleteWeightRecord(recordId) {
      if (!isUuid(recordId)) return false;
      const res = await db.query(`DELETE FROM pet_weight_records WHERE id = $1`, [recordId]);
      return (res.rowCount ?? 0) > 0;
    },

    async getWeightGoal(petId) {
      if (!isUuid(petId)) return null;
      const { rows } = await db.query<WeightGoalRow>(
        `SELECT ${GOAL_COLUMNS} FROM pet_weight_goals WHERE pet_id = $1`,
        [petId]
      );
      return rows.length > 0 ? mapWeightGoalRow(rows[0]) : null;
    },

    async upsertWeightGoal(input) {
      const { rows } = await db.query<WeightGoalRow>(
        `
        INSERT INTO pet_weight_goals (pet_id, goal_type, target_weight_kg, starting_weight_kg, target_date, is_active, notes)
        VALUES ($1, $2, $3, $4, $5, $6, $7)
        ON CONFLICT (pet_id) DO UPDATE SET
          goal_type = EXCLUDED.goal_type,
          target_weight_kg = EXCLUDED.target_weight_kg,
          starting_weight_kg = EXCLUDED.starting_weight_kg,
          target_date = EXCLUDED.target_date,
          is_active = EXCLUDED.is_active,
          notes = EXCLUDED.notes,
          updated_at = NOW()
        RETURNING ${GOAL_COLUMNS}
        `,
        [
          input.petId,
          input.goalType,
          input.targetWeightKg,
          input.startingWeightKg,
          input.targetDate,
          input.isActive,
          input.notes,
        ]
      );
      return mapWeightGoalRow(rows[0]);
    },
  };
}

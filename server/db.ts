import pg from "pg";
import { loadConfig } from "./config";

export const pool = new pg.Pool({
  connectionString: loadConfig().databaseUrl,
});

export async function runMigration(db: pg.Pool, name: string, sql: string): Promise<void> {
  const { rows } = await db.query(
    `SELECT id FROM schema_migrations WHERE name = $1`,
    [name]
  );
  if (rows.length > 0) return;
  console.log(`[migration] applying: ${name}`);
  await db.query(sql);
  await db.query(
    `INSERT INTO schema_migrations (name) VALUES ($1)`,
    [name]
  );
  console.log(`[migration] applied: ${name}`);
}

export async function initDb(db: pg.Pool = pool): Promise<void> {
  await db.query(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id SERIAL PRIMARY KEY,
      name TEXT UNIQUE NOT NULL,
      applied_at TIMESTAMPTZ NOT NULL DEFAULT NOW()
    );
  `);

  await db.query(`
    CREATE TABLE IF NOT EXISTS pets (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      owner_id TEXT NOT NULL,
      name TEXT NOT NULL,
      species TEXT NOT NULL CHECK (species IN ('dog', 'cat')),
      life_stage TEXT NOT NULL DEFAULT 'adult',
      activity_level TEXT,
      weight_kg DOUBLE PRECISION,
      created_at TIMESTAMPTZ DEFAULT NOW(),
      updated_at TIMESTAMPTZ DEFAULT NOW()
    );

    CREATE INDEX IF NOT EXISTS idx_pets_owner_id ON pets(owner_id);

    CREATE TABLE IF NOT EXISTS pet_weight_records (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      pet_id UUID NOT NULL REFERENCES pets(id) ON DELETE CASCADE,
      weight_kg DOUBLE PRECISION NOT NULL CHECK (weight_kg > 0),
      recorded_at TIMESTAMPTZ NOT NULL,
      notes TEXT,
      recorded_by_owner_id TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_pet_weight_records_pet_recorded
      ON pet_weight_records(pet_id, recorded_at DESC);

    CREATE TABLE IF NOT EXISTS pet_weight_goals (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      pet_id UUID NOT NULL UNIQUE REFERENCES pets(id) ON DELETE CASCADE,
      goal_type TEXT NOT NULL,
      target_weight_kg DOUBLE PRECISION,
      starting_weight_kg DOUBLE PRECISION,
      target_date DATE,
      is_active BOOLEAN NOT NULL DEFAULT true,
      notes TEXT,
      created_at TIMESTAMPTZ DEFAULT NOW(),
      updated_at TIMESTAMPTZ DEFAULT NOW()
    );

    CREATE TABLE IF NOT EXISTS calorie_goals (
      id UUID PRIMARY KEY DEFAULT gen_random_uuid(),
      pet_id UUID NOT NULL UNIQUE REFERENCES pets(id) ON DELETE CASCADE,
      daily_calories DOUBLE PRECISION NOT NULL CHECK (daily_calories > 0),
      notes TEXT CHECK (LENGTH(notes) <= 500),
      created_at TIMESTAMPTZ DEFAULT NOW(),
      updated_at TIMESTAMPTZ DEFAULT NOW()
    );
  `);

  await runMigration(
    db,
    "pet_weight_goals_goal_type_check",
    `ALTER TABLE pet_weight_goals ADD CONSTRAINT pet_weight_goals_goal_type_check
       CHECK (goal_type IN ('weight_loss', 'weight_gain', 'maintenance', 'health_improvement'))`
  );
}

import { isWeightGoalType, type WeightGoalType } from "../lib/goal-progress";
import { parseWeightUnit, roundWeight, toStorageWeight } from "../lib/weight-units";

const ISO_REGEX = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d{1,6})?(?:Z|[+-]\d{2}:?\d{2})$/;
const DATE_REGEX = /^\d{4}-\d{2}-\d{2}$/;

export const MAX_PET_WEIGHT_KG = 200;
export const MAX_DAILY_CALORIES = 20000;
export const MAX_NOTES_LENGTH = 500;
export const MAX_HISTORY_DAYS = 3650;

export interface ValidationResult {
  ok: boolean;
  errors: string[];
}

export type ParseResult<T> =
  | { ok: true; value: T; errors: string[] }
  | { ok: false; errors: string[] };

export interface WeightRecordBody {
  petId: string;
  weightKg: number;
  recordedAt: string | null;
  notes: string | null;
}

export interface WeightGoalBody {
  petId: string;
  goalType: WeightGoalType;
  targetWeightKg: number | null;
  startingWeightKg: number | null;
  targetDate: string | null;
  isActive: boolean;
  notes: string | null;
}

export interface CalorieGoalBody {
  petId: string;
  dailyCalories: number;
  notes: string | null;
}

export function parseStrictISO(ts: string): Date | null {
  if (typeof ts !== 'string') return null;
  if (!ISO_REGEX.test(ts)) return null;
  const d = new Date(ts);
  if (isNaN(d.getTime())) return null;
  return d;
}

export function isValidDateString(date: string): boolean {
  if (typeof date !== 'string') return false;
  if (!DATE_REGEX.test(date)) return false;
  const d = new Date(date + 'T00:00:00Z');
  return !isNaN(d.getTime()) && d.toISOString().slice(0, 10) === date;
}

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function validatePetWeightKg(val: unknown): val is number {
  return typeof val === 'number' && Number.isFinite(val) && val > 0 && val <= MAX_PET_WEIGHT_KG;
}

function readNotes(b: Record<string, unknown>, errors: string[]): string | null {
  if (b.notes == null) return null;
  if (typeof b.notes !== "string") {
    errors.push("notes: must be a string");
    return null;
  }
  if (b.notes.length > MAX_NOTES_LENGTH) {
    errors.push(`notes: at most ${MAX_NOTES_LENGTH} characters, got ${b.notes.length}`);
  }
  return b.notes;
}

function readPetId(b: Record<string, unknown>, errors: string[]): string {
  if (typeof b.petId !== "string" || b.petId.trim() === "") {
    errors.push("petId is required");
    return "";
  }
  return b.petId;
}

function readOptionalWeight(b: Record<string, unknown>, field: string, errors: string[]): number | null {
  const v = b[field];
  if (v == null) return null;
  if (!validatePetWeightKg(v)) {
    errors.push(`${field}: out of range (0-${MAX_PET_WEIGHT_KG}], got ${String(v)}`);
    return null;
  }
  return v;
}

/**
 * Accepts `weightKg`, or `weight` plus `unit` ("kg" | "lb") as the app sends
 * when the owner enters pounds.
 */
export function validateWeightRecordInput(body: unknown): ParseResult<WeightRecordBody> {
  if (!isRecord(body)) return { ok: false, errors: ["body must be a JSON object"] };
  const errors: string[] = [];
  const petId = readPetId(body, errors);

  let weightKg: number | null = null;
  if (body.weightKg != null) {
    weightKg = readOptionalWeight(body, "weightKg", errors);
  } else if (body.weight != null) {
    const unit = parseWeightUnit(body.unit ?? "kg");
    if (unit == null) {
      errors.push(`unit: must be kg or lb, got "${String(body.unit)}"`);
    } else if (typeof body.weight !== "number" || !Number.isFinite(body.weight)) {
      errors.push(`weight: must be a number, got ${String(body.weight)}`);
    } else {
      const kg = roundWeight(toStorageWeight(body.weight, unit), 3);
      if (validatePetWeightKg(kg)) weightKg = kg;
      else errors.push(`weight: out of range (0-${MAX_PET_WEIGHT_KG}] kg, got ${kg}`);
    }
  } else {
    errors.push("weightKg is required");
  }

  let recordedAt: string | null = null;
  if (body.recordedAt != null) {
    const d = typeof body.recordedAt === "string" ? parseStrictISO(body.recordedAt) : null;
    if (d == null) errors.push(`recordedAt: invalid ISO timestamp "${String(body.recordedAt)}"`);
    else recordedAt = d.toISOString();
  }

  const notes = readNotes(body, errors);

  if (errors.length > 0 || weightKg == null) return { ok: false, errors };
  return { ok: true, value: { petId, weightKg, recordedAt, notes }, errors };
}

export function validateWeightGoalInput(body: unknown): ParseResult<WeightGoalBody> {
  if (!isRecord(body)) return { ok: false, errors: ["body must be a JSON object"] };
  const errors: string[] = [];
  const petId = readPetId(body, errors);

  const goalType = body.goalType;
  if (!isWeightGoalType(goalType)) {
    errors.push(`goalType: must be one of weight_loss, weight_gain, maintenance, health_improvement, got "${String(goalType)}"`);
  }

  const targetWeightKg = readOptionalWeight(body, "targetWeightKg", errors);
  const startingWeightKg = readOptionalWeight(body, "startingWeightKg", errors);

  let targetDate: string | null = null;
  if (body.targetDate != null) {
    if (typeof body.targetDate !== "string" || !isValidDateString(body.targetDate)) {
      errors.push(`targetDate: invalid date string "${String(body.targetDate)}"`);
    } else {
      targetDate = body.targetDate;
    }
  }

  let isActive = true;
  if (body.isActive != null) {
    if (typeof body.isActive !== "boolean") errors.push("isActive: must be a boolean");
    else isActive = body.isActive;
  }

  const notes = readNotes(body, errors);

  if (errors.length > 0 || !isWeightGoalType(goalType)) return { ok: false, errors };
  return {
    ok: true,
    value: { petId, goalType, targetWeightKg, startingWeightKg, targetDate, isActive, notes },
    errors,
  };
}

export function validateCalorieGoalInput(body: unknown): ParseResult<CalorieGoalBody> {
  if (!isRecord(body)) return { ok: false, errors: ["body must be a JSON object"] };
  const errors: string[] = [];
  const petId = readPetId(body, errors);

  const dailyCalories = body.dailyCalories;
  const caloriesOk =
    typeof dailyCalories === "number" &&
    Number.isFinite(dailyCalories) &&
    dailyCalories > 0 &&
    dailyCalories <= MAX_DAILY_CALORIES;
  if (!caloriesOk) {
    errors.push(`dailyCalories: out of range (0-${MAX_DAILY_CALORIES}], got ${String(dailyCalories)}`);
  }

  const notes = readNotes(body, errors);

  if (errors.length > 0 || typeof dailyCalories !== "number") return { ok: false, errors };
  return { ok: true, value: { petId, dailyCalories, notes }, errors };
}

export function parseDaysParam(raw: unknown, fallback: number): ParseResult<number> {
  if (raw == null || raw === "") return { ok: true, value: fallback, errors: [] };
  if (typeof raw !== "string" || !/^\d+$/.test(raw)) {
    return { ok: false, errors: [`days: must be a non-negative integer, got "${String(raw)}"`] };
  }
  const n = parseInt(raw, 10);
  if (n > MAX_HISTORY_DAYS) {
    return { ok: false, errors: [`days: at most ${MAX_HISTORY_DAYS}, got ${n}`] };
  }
  return { ok: true, value: n, errors: [] };
}

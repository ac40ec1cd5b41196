import { QueryClient } from "@tanstack/query-core";
import { isWeightGoalType } from "./goal-progress";
import { buildGoalProgressCard, type GoalProgressCardModel } from "./goal-progress-card";
import type { WeightUnit } from "./weight-units";
import type { WeightGoalRecord, WeightRecord } from "../server/types/weight";

export class ApiError extends Error {
  constructor(
    public readonly status: number,
    message: string,
  ) {
    super(`${status}: ${message}`);
    this.name = "ApiError";
  }
}

export interface ApiClientOptions {
  baseUrl: string;
  apiKey?: string;
  ownerId?: string;
  fetchImpl?: typeof fetch;
}

export interface ApiClient {
  request(method: string, route: string, data?: unknown): Promise<unknown>;
}

export interface NewWeightEntry {
  petId: string;
  weight: number;
  unit: WeightUnit;
  recordedAt?: string;
  notes?: string;
}

/** What the screens depend on; the HTTP client below is one implementation. */
export interface WeightTrackingService {
  getCurrentWeight(petId: string): Promise<number | null>;
  getActiveGoal(petId: string): Promise<WeightGoalRecord | null>;
  getHistory(petId: string, days?: number): Promise<WeightRecord[]>;
  recordWeight(entry: NewWeightEntry): Promise<WeightRecord>;
}

export function getApiUrl(env: NodeJS.ProcessEnv = process.env): string {
  const host = env.PET_API_URL;
  if (!host) {
    throw new Error("PET_API_URL is not set");
  }
  const url = new URL(host.includes("://") ? host : `https://${host}`);
  return url.href;
}

function errorMessage(text: string): string {
  try {
    const body: unknown = JSON.parse(text);
    return isObject(body) && typeof body.error === "string" ? body.error : text;
  } catch {
    return text;
  }
}

async function throwIfResNotOk(res: Response) {
  if (!res.ok) {
    const text = (await res.text()) || res.statusText;
    throw new ApiError(res.status, errorMessage(text));
  }
}

export function createApiClient(options: ApiClientOptions): ApiClient {
  const doFetch = options.fetchImpl ?? fetch;

  return {
    async request(method, route, data) {
      const url = new URL(route, options.baseUrl);

      const headers: Record<string, string> = {};
      if (data !== undefined) headers["Content-Type"] = "application/json";
      if (options.apiKey) headers["Authorization"] = `Bearer ${options.apiKey}`;
      if (options.ownerId) headers["X-Owner-Id"] = options.ownerId;

      const res = await doFetch(url.toString(), {
        method,
        headers,
        body: data !== undefined ? JSON.stringify(data) : undefined,
      });

      await throwIfResNotOk(res);
      return res.json();
    },
  };
}

export function createQueryClient(): QueryClient {
  return new QueryClient({
    defaultOptions: {
      queries: {
        staleTime: Infinity,
        retry: false,
      },
      mutations: {
        retry: false,
      },
    },
  });
}

function isObject(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

function numOrNull(v: unknown): number | null {
  return typeof v === "number" && Number.isFinite(v) ? v : null;
}

function strOrNull(v: unknown): string | null {
  return typeof v === "string" ? v : null;
}

export function decodeWeightRecord(v: unknown): WeightRecord {
  if (!isObject(v)) throw new Error("weight record: expected an object");
  const weightKg = numOrNull(v.weightKg);
  if (typeof v.id !== "string" || typeof v.petId !== "string" || weightKg == null || typeof v.recordedAt !== "string") {
    throw new Error("weight record: missing id, petId, weightKg or recordedAt");
  }
  return {
    id: v.id,
    petId: v.petId,
    weightKg,
    recordedAt: v.recordedAt,
    notes: strOrNull(v.notes),
    recordedByOwnerId: typeof v.recordedByOwnerId === "string" ? v.recordedByOwnerId : "",
  };
}

export function decodeWeightGoal(v: unknown): WeightGoalRecord | null {
  if (v == null) return null;
  if (!isObject(v)) throw new Error("weight goal: expected an object");
  if (typeof v.id !== "string" || typeof v.petId !== "string" || !isWeightGoalType(v.goalType)) {
    throw new Error("weight goal: missing id, petId or goalType");
  }
  return {
    id: v.id,
    petId: v.petId,
    goalType: v.goalType,
    targetWeightKg: numOrNull(v.targetWeightKg),
    startingWeightKg: numOrNull(v.startingWeightKg),
    targetDate: strOrNull(v.targetDate),
    isActive: v.isActive !== false,
    notes: strOrNull(v.notes),
    createdAt: strOrNull(v.createdAt) ?? "",
    updatedAt: strOrNull(v.updatedAt) ?? "",
  };
}

function field(body: unknown, key: string): unknown {
  return isObject(body) ? body[key] : undefined;
}

export function createWeightTrackingClient(
  api: ApiClient,
  queryClient: QueryClient = createQueryClient(),
): WeightTrackingService {
  const history = async (petId: string, days: number) => {
    const body = await api.request("GET", `/api/weight/history/${encodeURIComponent(petId)}?days=${days}`);
    const records = field(body, "records");
    return Array.isArray(records) ? records.map(decodeWeightRecord) : [];
  };

  return {
    // Cached per pet until a new weight is recorded for it.
    getCurrentWeight(petId) {
      return queryClient.fetchQuery({
        queryKey: ["weight", petId, "current"],
        queryFn: async () => {
          const records = await history(petId, 0);
          return records.length > 0 ? records[0].weightKg : null;
        },
      });
    },

    async getActiveGoal(petId) {
      const body = await api.request("GET", `/api/weight/goals/${encodeURIComponent(petId)}/active`);
      return decodeWeightGoal(field(body, "goal"));
    },

    getHistory(petId, days = 365) {
      return history(petId, days);
    },

    async recordWeight(entry) {
      const body = await api.request("POST", "/api/weight/record", entry);
      const record = decodeWeightRecord(field(body, "record"));
      await queryClient.invalidateQueries({ queryKey: ["weight", entry.petId] });
      return record;
    },
  };
}

export async function loadGoalProgressCard(
  service: Pick<WeightTrackingService, "getCurrentWeight" | "getActiveGoal">,
  petId: string,
  unit: WeightUnit,
): Promise<GoalProgressCardModel | null> {
  const [currentWeightKg, goal] = await Promise.all([
    service.getCurrentWeight(petId),
    service.getActiveGoal(petId),
  ]);
  if (!goal) return null;
  return buildGoalProgressCard({ goal, currentWeightKg, unit });
}

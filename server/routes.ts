import type { Express, NextFunction, Request, Response } from "express";
import { createServer, type Server } from "node:http";
import { HttpError, ValidationError } from "./errors";
import {
  parseDaysParam,
  validateCalorieGoalInput,
  validateWeightGoalInput,
  validateWeightRecordInput,
  type ParseResult,
} from "./validation";
import { DEFAULT_HISTORY_DAYS, DEFAULT_TREND_DAYS, type WeightTrackingService } from "./weight-tracking";
import type { CalorieGoalService } from "./calorie-goals";

export const DEFAULT_OWNER_ID = "local_default";

export interface RouteDeps {
  apiKey: string | undefined;
  weight: WeightTrackingService;
  calorieGoals: CalorieGoalService;
  writeRateLimit?: { windowMs: number; maxRequests: number };
}

const PUBLIC_PATHS = ["/api/health"];

function getOwnerId(res: Response): string {
  const ownerId: unknown = res.locals.ownerId;
  return typeof ownerId === "string" ? ownerId : DEFAULT_OWNER_ID;
}

function requireAuth(apiKey: string | undefined) {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!apiKey) {
      return res.status(500).json({ ok: false, error: "Server missing API_KEY" });
    }
    const authHeader = req.headers.authorization || "";
    const token = authHeader.startsWith("Bearer ") ? authHeader.slice(7) : "";
    if (token !== apiKey) {
      return res.status(401).json({ ok: false, error: "Unauthorized" });
    }
    // Set by the gateway in front of the API; a bare key acts as the single local owner.
    const ownerHeader = req.headers["x-owner-id"];
    res.locals.ownerId = typeof ownerHeader === "string" && ownerHeader.trim() !== "" ? ownerHeader.trim() : DEFAULT_OWNER_ID;
    next();
  };
}

export interface HitWindow {
  /** Records a hit for `key`; false when the key is already at the limit. */
  hit(key: string, now: number): boolean;
  readonly size: number;
}

export function createHitWindow(windowMs: number, maxRequests: number): HitWindow {
  const hits = new Map<string, number[]>();
  let lastSweep = 0;

  // Keys idle for a whole window are dropped, at most once per window.
  const sweep = (now: number) => {
    if (now - lastSweep < windowMs) return;
    lastSweep = now;
    for (const [key, timestamps] of hits) {
      if (timestamps.length === 0 || timestamps[timestamps.length - 1] <= now - windowMs) hits.delete(key);
    }
  };

  return {
    hit(key, now) {
      sweep(now);
      const timestamps = (hits.get(key) || []).filter(t => t > now - windowMs);
      if (timestamps.length >= maxRequests) {
        hits.set(key, timestamps);
        return false;
      }
      timestamps.push(now);
      hits.set(key, timestamps);
      return true;
    },
    get size() {
      return hits.size;
    },
  };
}

function rateLimit(windowMs: number, maxRequests: number) {
  const counter = createHitWindow(windowMs, maxRequests);
  return (req: Request, res: Response, next: NextFunction) => {
    const key = `${req.path}:${getOwnerId(res)}`;
    if (!counter.hit(key, Date.now())) {
      return res.status(429).json({ ok: false, error: "Too many requests. Try again later." });
    }
    next();
  };
}

function unwrap<T>(parsed: ParseResult<T>): T {
  if (!parsed.ok) throw new ValidationError(parsed.errors);
  return parsed.value;
}

function sendError(res: Response, action: string, err: unknown) {
  if (err instanceof ValidationError) {
    return res.status(400).json({ ok: false, error: err.errors[0], errors: err.errors });
  }
  if (err instanceof HttpError) {
    return res.status(err.status).json({ ok: false, error: err.message });
  }
  console.error(`${action} error:`, err);
  return res.status(500).json({ ok: false, error: `Failed to ${action}` });
}

export function registerRoutes(app: Express, deps: RouteDeps): Server {
  const { weight, calorieGoals } = deps;
  const auth = requireAuth(deps.apiKey);
  const limit = deps.writeRateLimit ?? { windowMs: 60000, maxRequests: 60 };
  const writeLimit = rateLimit(limit.windowMs, limit.maxRequests);

  app.use((req, res, next) => {
    if (PUBLIC_PATHS.includes(req.path) || !req.path.startsWith("/api")) {
      return next();
    }
    auth(req, res, next);
  });

  app.get("/api/health", (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  app.post("/api/weight/record", writeLimit, async (req: Request, res: Response) => {
    try {
      const input = unwrap(validateWeightRecordInput(req.body));
      const record = await weight.recordWeight(getOwnerId(res), input);
      res.status(201).json({ ok: true, record });
    } catch (err) {
      sendError(res, "record weight", err);
    }
  });

  app.get("/api/weight/history/:petId", async (req: Request, res: Response) => {
    try {
      const days = unwrap(parseDaysParam(req.query.days, DEFAULT_HISTORY_DAYS));
      const records = await weight.getWeightHistory(getOwnerId(res), req.params.petId, days);
      res.json({ ok: true, records });
    } catch (err) {
      sendError(res, "get weight history", err);
    }
  });

  app.delete("/api/weight/record/:petId/:recordId", writeLimit, async (req: Request, res: Response) => {
    try {
      const result = await weight.deleteWeightRecord(getOwnerId(res), req.params.petId, req.params.recordId);
      res.json({ ok: true, ...result });
    } catch (err) {
      sendError(res, "delete weight record", err);
    }
  });

  const upsertGoal = async (req: Request, res: Response) => {
    try {
      const input = unwrap(validateWeightGoalInput(req.body));
      const goal = await weight.upsertWeightGoal(getOwnerId(res), input);
      res.json({ ok: true, goal });
    } catch (err) {
      sendError(res, "save weight goal", err);
    }
  };
  app.put("/api/weight/goals", writeLimit, upsertGoal);
  app.post("/api/weight/goals", writeLimit, upsertGoal);

  app.get("/api/weight/goals/:petId/active", async (req: Request, res: Response) => {
    try {
      const goal = await weight.getActiveWeightGoal(getOwnerId(res), req.params.petId);
      res.json({ ok: true, goal });
    } catch (err) {
      sendError(res, "get active weight goal", err);
    }
  });

  app.get("/api/weight/trend/:petId", async (req: Request, res: Response) => {
    try {
      const days = unwrap(parseDaysParam(req.query.days, DEFAULT_TREND_DAYS));
      const trend = await weight.getWeightTrend(getOwnerId(res), req.params.petId, days);
      res.json({ ok: true, trend });
    } catch (err) {
      sendError(res, "analyze weight trend", err);
    }
  });

  app.get("/api/weight/dashboard/:petId", async (req: Request, res: Response) => {
    try {
      const dashboard = await weight.getDashboard(getOwnerId(res), req.params.petId);
      res.json({ ok: true, dashboard });
    } catch (err) {
      sendError(res, "get weight dashboard", err);
    }
  });

  app.put("/api/calorie-goals", writeLimit, async (req: Request, res: Response) => {
    try {
      const input = unwrap(validateCalorieGoalInput(req.body));
      const goal = await calorieGoals.upsertCalorieGoal(getOwnerId(res), input);
      res.json({ ok: true, goal });
    } catch (err) {
      sendError(res, "save calorie goal", err);
    }
  });

  app.get("/api/calorie-goals", async (_req: Request, res: Response) => {
    try {
      const goals = await calorieGoals.listCalorieGoals(getOwnerId(res));
      res.json({ ok: true, goals });
    } catch (err) {
      sendError(res, "get calorie goals", err);
    }
  });

  app.get("/api/calorie-goals/:petId/suggested", async (req: Request, res: Response) => {
    try {
      const suggestion = await calorieGoals.suggestCalorieGoal(getOwnerId(res), req.params.petId);
      res.json({ ok: true, ...suggestion });
    } catch (err) {
      sendError(res, "suggest calorie goal", err);
    }
  });

  app.get("/api/calorie-goals/:petId", async (req: Request, res: Response) => {
    try {
      const goal = await calorieGoals.getCalorieGoal(getOwnerId(res), req.params.petId);
      res.json({ ok: true, goal });
    } catch (err) {
      sendError(res, "get calorie goal", err);
    }
  });

  app.delete("/api/calorie-goals/:petId", writeLimit, async (req: Request, res: Response) => {
    try {
      await calorieGoals.deleteCalorieGoal(getOwnerId(res), req.params.petId);
      res.json({ ok: true, message: "Calorie goal deleted successfully" });
    } catch (err) {
      sendError(res, "delete calorie goal", err);
    }
  });

  const httpServer = createServer(app);
  return httpServer;
}

import express, { type ErrorRequestHandler, type Express } from "express";
import type { Server } from "node:http";
import { registerRoutes, type RouteDeps } from "./routes";
import { isRecord } from "./validation";

// Body-parser rejections carry `type` and a 4xx `status`.
const jsonErrors: ErrorRequestHandler = (err: unknown, _req, res, next) => {
  if (res.headersSent) return next(err);

  if (isRecord(err) && err.type === "entity.parse.failed") {
    return res.status(400).json({ ok: false, error: "body must be valid JSON" });
  }
  if (isRecord(err) && typeof err.status === "number" && err.status >= 400 && err.status < 500) {
    const message = typeof err.message === "string" ? err.message : "Bad request";
    return res.status(err.status).json({ ok: false, error: message });
  }

  console.error("request error:", err);
  return res.status(500).json({ ok: false, error: "Internal server error" });
};

export function createApp(deps: RouteDeps): { app: Express; server: Server } {
  const app = express();
  app.use(express.json({ limit: "1mb" }));
  const server = registerRoutes(app, deps);
  app.use(jsonErrors);
  return { app, server };
}

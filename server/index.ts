import { createApp } from "./app";
import { createCalorieGoalService } from "./calorie-goals";
import { createPgCalorieGoalStore } from "./calorie-goals-storage";
import { loadConfig } from "./config";
import { initDb, pool } from "./db";
import { createPgWeightStore } from "./weight-storage";
import { createWeightTrackingService } from "./weight-tracking";

async function main(): Promise<void> {
  const config = loadConfig();
  if (!config.databaseUrl) {
    throw new Error("DATABASE_URL is not set");
  }

  await initDb(pool);

  const weightStore = createPgWeightStore(pool);
  const { server } = createApp({
    apiKey: config.apiKey,
    weight: createWeightTrackingService(weightStore),
    calorieGoals: createCalorieGoalService(createPgCalorieGoalStore(pool), weightStore),
  });

  server.listen(config.port, () => {
    console.log(`[server] listening on port ${config.port}`);
  });

  const shutdown = () => {
    console.log("[server] shutting down");
    server.close(() => {
      pool.end().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error("[server] pool shutdown error:", err);
          process.exit(1);
        },
      );
    });
  };
  process.on("SIGINT", shutdown);
  process.on("SIGTERM", shutdown);
}

main().catch((err: unknown) => {
  console.error("[server] startup error:", err);
  process.exit(1);
});

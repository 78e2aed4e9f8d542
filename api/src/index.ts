// api/src/index.ts
import { config } from "./config.js"; // loads .env before anything reads it

import { createApp } from "./app.js";
import { closePool, migrate } from "./db.js";
import { goalDb } from "./goalDb.js";
import { settingsDb } from "./settingsDb.js";
import type { Stores } from "./stores.js";
import { healthSyncDb, measurementDb, nutritionDb, stepsDb } from "./trackingDb.js";
import { historyDb, trainingDb } from "./trainingDb.js";

const stores: Stores = {
  trainings: trainingDb,
  measurements: measurementDb,
  steps: stepsDb,
  health: healthSyncDb,
  goals: goalDb,
  history: historyDb,
  nutrition: nutritionDb,
  preferences: settingsDb,
};

async function main() {
  await migrate();
  const app = createApp({ stores, jwtSecret: config.jwtSecret, corsOrigin: config.corsOrigin });
  const server = app.listen(config.port, () => {
    console.log("api:" + config.port);
  });

  const shutdown = (signal: string) => {
    console.log(`api: ${signal} received, shutting down`);
    server.close(() => {
      closePool()
        .catch((err: unknown) => console.error("DB: close failed", err))
        .finally(() => process.exit(0));
    });
  };
  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  console.error("api: failed to start", err);
  process.exit(1);
});

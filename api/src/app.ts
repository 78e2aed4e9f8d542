// api/src/app.ts
import express from "express";
import cors from "cors";

import { requireAuth } from "./auth.js";
import type { AppContext } from "./context.js";
import { historyRouter } from "./history.js";
import { measurementsRouter } from "./measurements.js";
import { errorHandler } from "./middleware/errorHandler.js";
import { nutritionRouter } from "./nutrition.js";
import { progressRouter } from "./progress.js";
import { settingsRouter } from "./settings.js";
import { stepsRouter } from "./steps.js";
import type { Stores } from "./stores.js";
import { workoutRouter } from "./workout.js";

export type AppOptions = {
  stores: Stores;
  jwtSecret: string;
  corsOrigin?: string[];
  now?: () => Date;
};

export function createApp(options: AppOptions): express.Express {
  const ctx: AppContext = { stores: options.stores, now: options.now ?? (() => new Date()) };
  const auth = requireAuth(options.jwtSecret);
  const app = express();

  app.use(express.json({ limit: "1mb" }));
  app.use(cors({ origin: options.corsOrigin ?? true, credentials: true }));

  // health/ping without DB
  app.get("/health", (_req, res) => res.json({ ok: true }));

  app.use("/trainings", auth, workoutRouter(ctx));
  app.use("/history", auth, historyRouter(ctx));
  app.use("/settings", auth, settingsRouter(ctx));
  app.use("/measurements", auth, measurementsRouter(ctx));
  app.use("/steps", auth, stepsRouter(ctx));
  app.use("/nutrition", auth, nutritionRouter(ctx));
  app.use("/progress", auth, progressRouter(ctx));

  app.use((_req, res) => res.status(404).json({ error: "Not found" }));
  app.use(errorHandler);

  return app;
}

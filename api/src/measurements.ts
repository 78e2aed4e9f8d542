// measurements.ts
// Body weight and circumference log. One measurement per trainee per day.

import { Router } from "express";
import { traineeIdOf } from "./auth.js";
import { todayOf } from "./context.js";
import type { AppContext } from "./context.js";
import { AppError, asyncHandler } from "./middleware/errorHandler.js";
import { weeklyMeasurementAverages, withDeltas } from "./progressCalculator.js";
import { formatDayLabel } from "./utils/dates.js";
import { MeasurementBodySchema, validate } from "./validation.js";

export function measurementsRouter(ctx: AppContext): Router {
  const router = Router();
  const { measurements } = ctx.stores;

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const list = await measurements.getForTrainee(traineeIdOf(req));
      const now = ctx.now();
      const rows = withDeltas(list, (m) => m.weight)
        .reverse()
        .map(({ entry, delta }) => ({
          ...entry,
          weightDelta: delta,
          dayLabel: formatDayLabel(entry.date, now),
        }));
      res.json({ measurements: rows });
    })
  );

  router.get(
    "/today",
    asyncHandler(async (req, res) => {
      const measurement = await measurements.getToday(traineeIdOf(req), todayOf(ctx));
      res.json({ measurement });
    })
  );

  // Re-submitting on the same day replaces that day's measurement.
  router.put(
    "/today",
    asyncHandler(async (req, res) => {
      const v = validate(MeasurementBodySchema, req.body);
      if (!v.success) throw new AppError(v.error, 400, { code: "bad_request" });
      const measurement = await measurements.upsert({
        traineeId: traineeIdOf(req),
        date: todayOf(ctx),
        weight: v.data.weight,
        bodyMeasurements: v.data.bodyMeasurements,
      });
      res.json({ measurement });
    })
  );

  router.get(
    "/weekly",
    asyncHandler(async (req, res) => {
      const list = await measurements.getForTrainee(traineeIdOf(req));
      res.json(weeklyMeasurementAverages(list, todayOf(ctx)));
    })
  );

  return router;
}

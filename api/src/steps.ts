import { Router } from "express";
import { traineeIdOf } from "./auth.js";
import { todayOf } from "./context.js";
import type { AppContext } from "./context.js";
import { resolveTodaySteps } from "./dailySteps.js";
import { AppError, asyncHandler } from "./middleware/errorHandler.js";
import { weeklyAverage } from "./progressCalculator.js";
import { isISODate } from "./utils/dates.js";
import { DeviceStepsSchema, ManualStepsSchema, validate } from "./validation.js";

export function stepsRouter(ctx: AppContext): Router {
  const router = Router();
  const { steps, health } = ctx.stores;

  router.get(
    "/today",
    asyncHandler(async (req, res) => {
      const traineeId = traineeIdOf(req);
      const today = todayOf(ctx);
      const [entry, history] = await Promise.all([
        resolveTodaySteps(steps, health, traineeId, today),
        steps.getForTrainee(traineeId),
      ]);
      // today's resolved figure replaces whatever the log holds for today
      const points = history
        .filter((e) => e.date !== today)
        .map((e) => ({ date: e.date, value: e.steps }))
        .concat({ date: today, value: entry.steps });
      res.json({ entry, weeklyAverage: weeklyAverage(points, today) });
    })
  );

  router.put(
    "/:date",
    asyncHandler(async (req, res) => {
      const date = req.params.date;
      if (!isISODate(date)) throw new AppError("date must be YYYY-MM-DD", 400, { code: "bad_request" });
      if (date > todayOf(ctx)) throw new AppError("Cannot log steps for a future day", 400, { code: "bad_request" });
      const v = validate(ManualStepsSchema, req.body);
      if (!v.success) throw new AppError(v.error, 400, { code: "bad_request" });
      const entry = await steps.logManual(traineeIdOf(req), date, v.data.steps);
      res.json({ entry });
    })
  );

  // Device samples are additive; the day's synced total is their sum and is
  // written to the steps log unless the trainee entered that day by hand.
  router.post(
    "/sync",
    asyncHandler(async (req, res) => {
      const v = validate(DeviceStepsSchema, req.body);
      if (!v.success) throw new AppError(v.error, 400, { code: "bad_request" });
      const traineeId = traineeIdOf(req);
      await health.recordSample(traineeId, v.data.date, v.data.steps);
      const total = await health.getTodaySteps(traineeId, v.data.date);
      const entry = await steps.recordDeviceTotal(traineeId, v.data.date, total);
      res.status(201).json({ date: v.data.date, syncedSteps: total, entry });
    })
  );

  return router;
}

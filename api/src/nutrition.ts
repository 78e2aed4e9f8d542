// api/src/nutrition.ts
// Food log per calendar day, checked against the trainee's active plan.
import { Router } from "express";
import { traineeIdOf } from "./auth.js";
import type { AppContext } from "./context.js";
import { asyncHandler, AppError } from "./middleware/errorHandler.js";
import { calorieDelta, dailyCalories, nutritionTotal } from "./progressCalculator.js";
import { isISODate } from "./utils/dates.js";
import { LogFoodsSchema, validate } from "./validation.js";

function dayParam(raw: string): string {
  if (!isISODate(raw)) throw new AppError("date must be YYYY-MM-DD", 400, { code: "bad_request" });
  return raw;
}

export function nutritionRouter(ctx: AppContext): Router {
  const router = Router();
  const { nutrition } = ctx.stores;

  router.get(
    "/:date",
    asyncHandler(async (req, res) => {
      const traineeId = traineeIdOf(req);
      const date = dayParam(req.params.date);
      const [entries, plan] = await Promise.all([
        nutrition.getEntries(traineeId, date),
        nutrition.getActivePlan(traineeId),
      ]);
      const consumed = dailyCalories(entries);
      res.json({
        date,
        entries: entries.map((e) => ({ ...e, totalCalories: nutritionTotal(e) })),
        consumed,
        plan,
        delta: plan ? calorieDelta(plan.dailyCalories, consumed) : null,
      });
    })
  );

  router.post(
    "/:date/foods",
    asyncHandler(async (req, res) => {
      const date = dayParam(req.params.date);
      const v = validate(LogFoodsSchema, req.body);
      if (!v.success) throw new AppError(v.error, 400, { code: "bad_request" });
      const entry = await nutrition.logFoods(traineeIdOf(req), date, v.data.foods);
      res.status(201).json({ entry: { ...entry, totalCalories: nutritionTotal(entry) } });
    })
  );

  return router;
}

import { Router } from "express";
import { traineeIdOf } from "./auth.js";
import { todayOf } from "./context.js";
import type { AppContext } from "./context.js";
import { resolveTodaySteps } from "./dailySteps.js";
import { asyncHandler } from "./middleware/errorHandler.js";
import {
  calorieDelta,
  completionSummary,
  dailyCalories,
  goalPercentage,
  goalPercentLabel,
  weeklyAverage,
  weeklyMeasurementAverages,
} from "./progressCalculator.js";

export function progressRouter(ctx: AppContext): Router {
  const router = Router();
  const { stores } = ctx;

  // GET /progress/summary — dashboard figures for the current week
  router.get(
    "/summary",
    asyncHandler(async (req, res) => {
      const traineeId = traineeIdOf(req);
      const today = todayOf(ctx);

      const [goals, measurements, trainings, stepsLog, todaySteps, entries, plan] = await Promise.all([
        stores.goals.getForTrainee(traineeId),
        stores.measurements.getForTrainee(traineeId),
        stores.trainings.getForTrainee(traineeId),
        stores.steps.getForTrainee(traineeId),
        resolveTodaySteps(stores.steps, stores.health, traineeId, today),
        stores.nutrition.getEntries(traineeId, today),
        stores.nutrition.getActivePlan(traineeId),
      ]);

      const stepPoints = stepsLog
        .filter((e) => e.date !== today)
        .map((e) => ({ date: e.date, value: e.steps }))
        .concat({ date: today, value: todaySteps.steps });
      const consumed = dailyCalories(entries);

      res.json({
        today,
        goals: goals.map((g) => ({
          ...g,
          percentage: goalPercentage(g),
          percentLabel: goalPercentLabel(g),
        })),
        measurements: weeklyMeasurementAverages(measurements, today),
        steps: { today: todaySteps, weeklyAverage: weeklyAverage(stepPoints, today) },
        workouts: completionSummary(trainings, today),
        calories: {
          consumed,
          target: plan?.dailyCalories ?? null,
          delta: plan ? calorieDelta(plan.dailyCalories, consumed) : null,
        },
      });
    })
  );

  return router;
}

import { Router } from "express";
import { traineeIdOf } from "./auth.js";
import type { AppContext } from "./context.js";
import { HistoryMatcher } from "./historyMatcher.js";
import { AppError, asyncHandler } from "./middleware/errorHandler.js";
import { exerciseStats } from "./performanceReport.js";

const MAX_RECORDS = 50;

export function historyRouter(ctx: AppContext): Router {
  const router = Router();
  const matcher = new HistoryMatcher(ctx.stores.history);

  // GET /history/:exerciseName?limit=10
  // The name is matched exactly as given (URL-decoded by express).
  router.get(
    "/:exerciseName",
    asyncHandler(async (req, res) => {
      const traineeId = traineeIdOf(req);
      const exerciseName = req.params.exerciseName;
      const rawLimit = typeof req.query.limit === "string" ? Number(req.query.limit) : 10;
      if (!Number.isInteger(rawLimit) || rawLimit <= 0) {
        throw new AppError("limit must be a positive integer", 400, { code: "bad_request" });
      }
      const limit = Math.min(rawLimit, MAX_RECORDS);

      const [last, records] = await Promise.all([
        matcher.findLastPerformance(traineeId, exerciseName),
        ctx.stores.history.getForExercise(traineeId, exerciseName, limit),
      ]);
      res.json({ exerciseName, lastPerformance: last, records, stats: exerciseStats(records) });
    })
  );

  return router;
}

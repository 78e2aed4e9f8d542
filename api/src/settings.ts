import { Router } from "express";
import { traineeIdOf } from "./auth.js";
import type { AppContext } from "./context.js";
import { AppError, asyncHandler } from "./middleware/errorHandler.js";
import { DEFAULT_WORKOUT_MODE } from "./sessionMode.js";
import { WorkoutModeBodySchema, validate } from "./validation.js";

export function settingsRouter(ctx: AppContext): Router {
  const router = Router();
  const { preferences } = ctx.stores;

  router.get(
    "/workout-mode",
    asyncHandler(async (req, res) => {
      const stored = await preferences.getWorkoutMode(traineeIdOf(req));
      res.json({ mode: stored ?? DEFAULT_WORKOUT_MODE, isDefault: stored === null });
    })
  );

  router.put(
    "/workout-mode",
    asyncHandler(async (req, res) => {
      const v = validate(WorkoutModeBodySchema, req.body);
      if (!v.success) throw new AppError(v.error, 400, { code: "bad_request" });
      await preferences.setWorkoutMode(traineeIdOf(req), v.data.mode);
      res.json({ mode: v.data.mode, isDefault: false });
    })
  );

  return router;
}

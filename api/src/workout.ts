// workout.ts
// HTTP surface of the workout-session engine. Each request gets its own
// SessionController; requests for one training are applied in arrival order.

import { Router, Response } from "express";
import { traineeIdOf } from "./auth.js";
import type { AppContext } from "./context.js";
import { HistoryMatcher, prefillBulkEntries } from "./historyMatcher.js";
import { AppError, asyncHandler, describeError } from "./middleware/errorHandler.js";
import { buildProgressReport } from "./performanceReport.js";
import { exerciseProgress, trainingProgress } from "./progressCalculator.js";
import { SessionController } from "./sessionController.js";
import type { SessionResult } from "./sessionController.js";
import { resolveMode, resumePoint, sessionState } from "./sessionMode.js";
import type { HistoryRecord, Training, WorkoutMode } from "./types.js";
import { KeyedQueue } from "./utils/keyedQueue.js";
import {
  BulkSaveSchema,
  CompleteSchema,
  RecordSetSchema,
  validate,
} from "./validation.js";

function sendSessionResult(res: Response, result: SessionResult, preferred: WorkoutMode | null) {
  if (result.ok) {
    const training = result.value;
    return res.json({
      training,
      state: sessionState(training),
      mode: resolveMode(training, preferred),
      progress: trainingProgress(training),
    });
  }
  const { error } = result;
  switch (error.kind) {
    case "validation":
      return res.status(400).json({ error: "invalid_set", code: error.code, details: error });
    case "incomplete":
      return res.status(422).json({ error: "incomplete_workout", issues: error.issues });
    case "store":
      return res.status(503).json({ error: "store_unavailable", message: error.message });
  }
}

export function workoutRouter(ctx: AppContext): Router {
  const { stores } = ctx;
  const router = Router();
  const sessions = new KeyedQueue();
  const matcher = new HistoryMatcher(stores.history);

  async function loadTraining(traineeId: string, trainingId: string): Promise<Training> {
    const trainings = await stores.trainings.getForTrainee(traineeId);
    const training = trainings.find((t) => t.id === trainingId);
    if (!training) throw new AppError("Training not found", 404, { code: "training_not_found" });
    return training;
  }

  function withSession(
    traineeId: string,
    trainingId: string,
    op: (session: SessionController) => Promise<SessionResult>
  ): Promise<SessionResult> {
    return sessions.run(trainingId, async () => {
      const training = await loadTraining(traineeId, trainingId);
      const session = new SessionController(training, {
        trainings: stores.trainings,
        history: stores.history,
        now: ctx.now,
      });
      return op(session);
    });
  }

  router.get(
    "/",
    asyncHandler(async (req, res) => {
      const traineeId = traineeIdOf(req);
      const [trainings, preferred] = await Promise.all([
        stores.trainings.getForTrainee(traineeId),
        stores.preferences.getWorkoutMode(traineeId),
      ]);
      res.json({
        trainings: trainings.map((t) => ({
          id: t.id,
          name: t.name,
          difficulty: t.difficulty,
          scheduledDate: t.scheduledDate,
          isCompleted: t.isCompleted,
          completedAt: t.completedAt ?? null,
          state: sessionState(t),
          mode: resolveMode(t, preferred),
          progress: trainingProgress(t),
        })),
      });
    })
  );

  router.get(
    "/:id",
    asyncHandler(async (req, res) => {
      const traineeId = traineeIdOf(req);
      const training = await loadTraining(traineeId, req.params.id);
      const [preferred, history] = await Promise.all([
        stores.preferences.getWorkoutMode(traineeId),
        matcher.forTraining(training),
      ]);
      res.json({
        training,
        state: sessionState(training),
        mode: resolveMode(training, preferred),
        resume: resumePoint(training),
        progress: trainingProgress(training),
        exercises: training.exercises.map((ex) => ({
          id: ex.id,
          progress: exerciseProgress(ex),
          lastPerformance: history.get(ex.name) ?? null,
        })),
        bulkEntries: prefillBulkEntries(training, history),
      });
    })
  );

  router.post(
    "/:id/sets",
    asyncHandler(async (req, res) => {
      const v = validate(RecordSetSchema, req.body);
      if (!v.success) throw new AppError(v.error, 400, { code: "bad_request" });
      const traineeId = traineeIdOf(req);
      const { exerciseId, setIndex, reps, weight } = v.data;
      const result = await withSession(traineeId, req.params.id, (s) =>
        s.recordSet(exerciseId, setIndex, reps, weight)
      );
      sendSessionResult(res, result, await stores.preferences.getWorkoutMode(traineeId));
    })
  );

  router.put(
    "/:id/bulk",
    asyncHandler(async (req, res) => {
      const v = validate(BulkSaveSchema, req.body);
      if (!v.success) throw new AppError(v.error, 400, { code: "bad_request" });
      const traineeId = traineeIdOf(req);
      const result = await withSession(traineeId, req.params.id, (s) => s.applyBulkEntries(v.data.entries));
      sendSessionResult(res, result, await stores.preferences.getWorkoutMode(traineeId));
    })
  );

  router.post(
    "/:id/complete",
    asyncHandler(async (req, res) => {
      const v = validate(CompleteSchema, req.body ?? {});
      if (!v.success) throw new AppError(v.error, 400, { code: "bad_request" });
      const traineeId = traineeIdOf(req);
      const result = await withSession(traineeId, req.params.id, (s) => s.complete(v.data.entries));
      if (result.ok) console.log(`workout: training ${result.value.id} completed by ${traineeId}`);
      sendSessionResult(res, result, await stores.preferences.getWorkoutMode(traineeId));
    })
  );

  router.post(
    "/:id/save",
    asyncHandler(async (req, res) => {
      const traineeId = traineeIdOf(req);
      const result = await withSession(traineeId, req.params.id, (s) => s.saveAndExit());
      sendSessionResult(res, result, await stores.preferences.getWorkoutMode(traineeId));
    })
  );

  router.get(
    "/:id/report",
    asyncHandler(async (req, res) => {
      const traineeId = traineeIdOf(req);
      const training = await loadTraining(traineeId, req.params.id);
      if (!training.isCompleted) {
        throw new AppError("Training must be completed to build a report", 409, { code: "not_completed" });
      }
      const performed = training.exercises.filter((ex) => ex.actualSets.length > 0);
      const previous = await Promise.all(
        performed.map(async (ex) => {
          const records = await stores.history.getForExercise(traineeId, ex.name).catch((err: unknown): HistoryRecord[] => {
            console.warn(`report: history lookup failed for "${ex.name}":`, describeError(err));
            return [];
          });
          const earlier: HistoryRecord | null = records.find((r) => r.trainingId !== training.id) ?? null;
          return [ex.name, earlier] as const;
        })
      );
      res.json({ report: buildProgressReport(training, new Map(previous)) });
    })
  );

  return router;
}

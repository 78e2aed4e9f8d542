// trainingDb.ts
// Trainings and per-exercise performance history in PostgreSQL

import { randomUUID } from "node:crypto";
import { q, withTransaction } from "./db.js";
import { AppError } from "./middleware/errorHandler.js";
import type { HistoryStore, TrainingStore } from "./stores.js";
import type { Difficulty, HistoryRecord, Training } from "./types.js";
import { normalizeDay, toISODate } from "./utils/dates.js";
import { ExerciseListSchema, StoredSetsSchema } from "./validation.js";

type TrainingRow = {
  id: string;
  trainee_id: string;
  name: string;
  description: string;
  difficulty: string;
  scheduled_date: string;
  exercises: unknown;
  notes: string | null;
  is_completed: boolean;
  completed_at: Date | null;
};

type HistoryRow = {
  id: string;
  trainee_id: string;
  training_id: string;
  exercise_name: string;
  workout_date: string;
  completed_at: Date;
  sets: unknown;
};

const TRAINING_COLUMNS = `id, trainee_id, name, description, difficulty,
  to_char(scheduled_date, 'YYYY-MM-DD') AS scheduled_date,
  exercises, notes, is_completed, completed_at`;

function toDifficulty(value: string): Difficulty {
  return value === "intermediate" || value === "advanced" ? value : "beginner";
}

function parseJson(value: unknown): unknown {
  return typeof value === "string" ? JSON.parse(value) : value;
}

function mapTrainingRow(row: TrainingRow): Training {
  const exercises = ExerciseListSchema.safeParse(parseJson(row.exercises));
  if (!exercises.success) {
    throw new AppError(`Training ${row.id} has malformed exercises`, 500, { code: "bad_training_row" });
  }
  return {
    id: row.id,
    traineeId: row.trainee_id,
    name: row.name,
    description: row.description,
    difficulty: toDifficulty(row.difficulty),
    scheduledDate: normalizeDay(row.scheduled_date),
    exercises: exercises.data,
    notes: row.notes,
    isCompleted: row.is_completed,
    completedAt: row.completed_at ? row.completed_at.toISOString() : null,
  };
}

function mapHistoryRow(row: HistoryRow): HistoryRecord {
  const sets = StoredSetsSchema.safeParse(parseJson(row.sets));
  return {
    id: row.id,
    traineeId: row.trainee_id,
    trainingId: row.training_id,
    exerciseName: row.exercise_name,
    date: normalizeDay(row.workout_date),
    completedAt: row.completed_at.toISOString(),
    actualSets: sets.success ? sets.data : [],
  };
}

export const trainingDb: TrainingStore = {
  async getForTrainee(traineeId) {
    const rows = await q<TrainingRow>(
      `SELECT ${TRAINING_COLUMNS}
         FROM trainings
        WHERE trainee_id = $1
        ORDER BY scheduled_date DESC, id`,
      [traineeId]
    );
    return rows.map(mapTrainingRow);
  },

  async upsert(training) {
    // is_completed only ever moves forward
    const rows = await q<TrainingRow>(
      `INSERT INTO trainings
         (id, trainee_id, name, description, difficulty, scheduled_date, exercises, notes, is_completed, completed_at, updated_at)
       VALUES ($1, $2, $3, $4, $5, $6::date, $7::jsonb, $8, $9, $10::timestamptz, now())
       ON CONFLICT (id) DO UPDATE SET
         exercises = EXCLUDED.exercises,
         notes = EXCLUDED.notes,
         is_completed = trainings.is_completed OR EXCLUDED.is_completed,
         completed_at = COALESCE(EXCLUDED.completed_at, trainings.completed_at),
         updated_at = now()
       RETURNING ${TRAINING_COLUMNS}`,
      [
        training.id,
        training.traineeId,
        training.name,
        training.description,
        training.difficulty,
        training.scheduledDate,
        JSON.stringify(training.exercises),
        training.notes ?? null,
        training.isCompleted,
        training.completedAt ?? null,
      ]
    );
    return mapTrainingRow(rows[0]);
  },
};

export const historyDb: HistoryStore = {
  async getLast(traineeId, exerciseName) {
    const [row] = await historyDb.getForExercise(traineeId, exerciseName, 1);
    return row ?? null;
  },

  async getForExercise(traineeId, exerciseName, limit) {
    const rows = await q<HistoryRow>(
      `SELECT id, trainee_id, training_id, exercise_name,
              to_char(workout_date, 'YYYY-MM-DD') AS workout_date, completed_at, sets
         FROM exercise_history
        WHERE trainee_id = $1 AND exercise_name = $2
        ORDER BY completed_at DESC
        LIMIT $3`,
      [traineeId, exerciseName, limit && limit > 0 ? limit : null]
    );
    return rows.map(mapHistoryRow);
  },

  async save(training) {
    if (!training.isCompleted || !training.completedAt) {
      throw new AppError("Training must be completed to save history", 409, { code: "not_completed" });
    }
    const completedAt = training.completedAt;
    const workoutDate = toISODate(new Date(completedAt));
    await withTransaction(async () => {
      for (const ex of training.exercises) {
        if (ex.actualSets.length === 0) continue;
        await q(
          `INSERT INTO exercise_history
             (id, trainee_id, training_id, exercise_name, workout_date, completed_at, sets)
           VALUES ($1::uuid, $2, $3, $4, $5::date, $6::timestamptz, $7::jsonb)
           ON CONFLICT (trainee_id, exercise_name, workout_date) DO UPDATE SET
             training_id = EXCLUDED.training_id,
             completed_at = EXCLUDED.completed_at,
             sets = EXCLUDED.sets`,
          [
            randomUUID(),
            training.traineeId,
            training.id,
            ex.name,
            workoutDate,
            completedAt,
            JSON.stringify(ex.actualSets),
          ]
        );
      }
    });
  },
};

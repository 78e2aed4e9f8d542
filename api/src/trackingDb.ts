// trackingDb.ts
// Measurements, steps and food log: the data the trainee records directly.
// Measurements and steps are one row per trainee per day (upsert).

import { randomUUID } from "node:crypto";
import { q } from "./db.js";
import { AppError } from "./middleware/errorHandler.js";
import type { HealthSync, MeasurementStore, NutritionStore, StepsStore } from "./stores.js";
import type { Measurement, NutritionEntry, StepsEntry } from "./types.js";
import { normalizeDay } from "./utils/dates.js";
import { BodyMeasurementsSchema, FoodItemSchema, MacrosSchema } from "./validation.js";

type MeasurementRow = {
  id: string;
  trainee_id: string;
  measured_on: string;
  weight: string;
  body: unknown;
};

type StepsRow = { trainee_id: string; step_date: string; steps: number; origin: string };

type NutritionRow = { id: string; trainee_id: string; entry_date: string; foods: unknown };

type PlanRow = { id: string; trainee_id: string; name: string; daily_calories: number; macros: unknown };

function mapMeasurement(row: MeasurementRow): Measurement {
  const body = BodyMeasurementsSchema.safeParse(row.body ?? {});
  return {
    id: row.id,
    traineeId: row.trainee_id,
    date: normalizeDay(row.measured_on),
    weight: Number(row.weight),
    bodyMeasurements: body.success ? body.data : {},
  };
}

function mapSteps(row: StepsRow): StepsEntry {
  return {
    traineeId: row.trainee_id,
    date: normalizeDay(row.step_date),
    steps: row.steps,
    origin: row.origin === "device-sync" ? "device-sync" : "manual",
  };
}

function mapNutrition(row: NutritionRow): NutritionEntry {
  const foods = FoodItemSchema.array().safeParse(row.foods);
  return {
    id: row.id,
    traineeId: row.trainee_id,
    date: normalizeDay(row.entry_date),
    foods: foods.success ? foods.data : [],
  };
}

const MEASUREMENT_COLUMNS = `id, trainee_id, to_char(measured_on, 'YYYY-MM-DD') AS measured_on, weight, body`;

export const measurementDb: MeasurementStore = {
  async getForTrainee(traineeId) {
    const rows = await q<MeasurementRow>(
      `SELECT ${MEASUREMENT_COLUMNS}
         FROM measurements
        WHERE trainee_id = $1
        ORDER BY measured_on DESC`,
      [traineeId]
    );
    return rows.map(mapMeasurement);
  },

  async getToday(traineeId, today) {
    const [row] = await q<MeasurementRow>(
      `SELECT ${MEASUREMENT_COLUMNS}
         FROM measurements
        WHERE trainee_id = $1 AND measured_on = $2::date`,
      [traineeId, today]
    );
    return row ? mapMeasurement(row) : null;
  },

  async upsert({ traineeId, date, weight, bodyMeasurements }) {
    const rows = await q<MeasurementRow>(
      `INSERT INTO measurements (id, trainee_id, measured_on, weight, body, updated_at)
       VALUES ($1::uuid, $2, $3::date, $4, $5::jsonb, now())
       ON CONFLICT (trainee_id, measured_on) DO UPDATE SET
         weight = EXCLUDED.weight,
         body = EXCLUDED.body,
         updated_at = now()
       RETURNING ${MEASUREMENT_COLUMNS}`,
      [randomUUID(), traineeId, date, weight, JSON.stringify(bodyMeasurements ?? {})]
    );
    return mapMeasurement(rows[0]);
  },
};

const STEPS_COLUMNS = `trainee_id, to_char(step_date, 'YYYY-MM-DD') AS step_date, steps, origin`;

export const stepsDb: StepsStore = {
  async getToday(traineeId, today) {
    const [row] = await q<StepsRow>(
      `SELECT ${STEPS_COLUMNS} FROM steps_entries WHERE trainee_id = $1 AND step_date = $2::date`,
      [traineeId, today]
    );
    return row ? mapSteps(row) : null;
  },

  async getForTrainee(traineeId) {
    const rows = await q<StepsRow>(
      `SELECT ${STEPS_COLUMNS} FROM steps_entries WHERE trainee_id = $1 ORDER BY step_date DESC`,
      [traineeId]
    );
    return rows.map(mapSteps);
  },

  async logManual(traineeId, date, steps) {
    const rows = await q<StepsRow>(
      `INSERT INTO steps_entries (trainee_id, step_date, steps, origin, updated_at)
       VALUES ($1, $2::date, $3, 'manual', now())
       ON CONFLICT (trainee_id, step_date) DO UPDATE SET
         steps = EXCLUDED.steps,
         origin = 'manual',
         updated_at = now()
       RETURNING ${STEPS_COLUMNS}`,
      [traineeId, date, steps]
    );
    return mapSteps(rows[0]);
  },

  async recordDeviceTotal(traineeId, date, steps) {
    // a manual row is left as it is; RETURNING is then empty
    const rows = await q<StepsRow>(
      `INSERT INTO steps_entries (trainee_id, step_date, steps, origin, updated_at)
       VALUES ($1, $2::date, $3, 'device-sync', now())
       ON CONFLICT (trainee_id, step_date) DO UPDATE SET
         steps = EXCLUDED.steps,
         updated_at = now()
       WHERE steps_entries.origin = 'device-sync'
       RETURNING ${STEPS_COLUMNS}`,
      [traineeId, date, steps]
    );
    if (rows[0]) return mapSteps(rows[0]);
    const current = await stepsDb.getToday(traineeId, date);
    if (!current) throw new AppError("Steps entry vanished during sync", 409, { code: "steps_conflict" });
    return current;
  },
};

export const healthSyncDb: HealthSync = {
  async getTodaySteps(traineeId, today) {
    const [row] = await q<{ total: string | null }>(
      `SELECT SUM(steps)::text AS total
         FROM device_step_samples
        WHERE trainee_id = $1 AND step_date = $2::date`,
      [traineeId, today]
    );
    return row?.total ? Number(row.total) : 0;
  },

  async recordSample(traineeId, date, steps) {
    await q(
      `INSERT INTO device_step_samples (id, trainee_id, step_date, steps)
       VALUES ($1::uuid, $2, $3::date, $4)`,
      [randomUUID(), traineeId, date, steps]
    );
  },
};

export const nutritionDb: NutritionStore = {
  async getEntries(traineeId, date) {
    const rows = await q<NutritionRow>(
      `SELECT id, trainee_id, to_char(entry_date, 'YYYY-MM-DD') AS entry_date, foods
         FROM nutrition_entries
        WHERE trainee_id = $1 AND entry_date = $2::date
        ORDER BY created_at`,
      [traineeId, date]
    );
    return rows.map(mapNutrition);
  },

  async logFoods(traineeId, date, foods) {
    const rows = await q<NutritionRow>(
      `INSERT INTO nutrition_entries (id, trainee_id, entry_date, foods)
       VALUES ($1::uuid, $2, $3::date, $4::jsonb)
       RETURNING id, trainee_id, to_char(entry_date, 'YYYY-MM-DD') AS entry_date, foods`,
      [randomUUID(), traineeId, date, JSON.stringify(foods)]
    );
    return mapNutrition(rows[0]);
  },

  async getActivePlan(traineeId) {
    const [row] = await q<PlanRow>(
      `SELECT id, trainee_id, name, daily_calories, macros
         FROM nutrition_plans
        WHERE trainee_id = $1
        ORDER BY created_at DESC
        LIMIT 1`,
      [traineeId]
    );
    if (!row) return null;
    const macros = MacrosSchema.safeParse(row.macros ?? {});
    return {
      id: row.id,
      traineeId: row.trainee_id,
      name: row.name,
      dailyCalories: row.daily_calories,
      macros: macros.success ? macros.data : {},
    };
  },
};

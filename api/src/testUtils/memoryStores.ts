// In-process stand-ins for the PostgreSQL stores. Same upsert keys and
// ordering as the SQL in trainingDb.ts / trackingDb.ts.

import type {
  GoalStore,
  HealthSync,
  HistoryStore,
  MeasurementStore,
  NutritionStore,
  PreferenceStore,
  StepsStore,
  TrainingStore,
} from "../stores.js";
import type {
  BodyMeasurements,
  FoodItem,
  Goal,
  HistoryRecord,
  Measurement,
  NutritionEntry,
  NutritionPlan,
  StepsEntry,
  Training,
  WorkoutMode,
} from "../types.js";
import { toISODate } from "../utils/dates.js";

const offline = () => new Error("store offline");

function byNewest<T extends { date: string }>(a: T, b: T): number {
  return a.date < b.date ? 1 : a.date > b.date ? -1 : 0;
}

export class MemoryTrainingStore implements TrainingStore {
  private readonly rows = new Map<string, Training>();
  failWrites = false;
  upserts = 0;

  seed(...trainings: Training[]): this {
    for (const t of trainings) this.rows.set(t.id, structuredClone(t));
    return this;
  }

  get(id: string): Training | undefined {
    const row = this.rows.get(id);
    return row ? structuredClone(row) : undefined;
  }

  async getForTrainee(traineeId: string): Promise<Training[]> {
    return [...this.rows.values()]
      .filter((t) => t.traineeId === traineeId)
      .sort((a, b) =>
        a.scheduledDate !== b.scheduledDate
          ? b.scheduledDate.localeCompare(a.scheduledDate)
          : a.id.localeCompare(b.id)
      )
      .map((t) => structuredClone(t));
  }

  async upsert(training: Training): Promise<Training> {
    if (this.failWrites) throw offline();
    this.upserts++;
    const existing = this.rows.get(training.id);
    const next: Training = existing
      ? {
          ...existing,
          exercises: training.exercises,
          notes: training.notes ?? null,
          isCompleted: existing.isCompleted || training.isCompleted,
          completedAt: training.completedAt ?? existing.completedAt ?? null,
        }
      : { ...training, notes: training.notes ?? null, completedAt: training.completedAt ?? null };
    this.rows.set(training.id, structuredClone(next));
    return structuredClone(next);
  }
}

export class MemoryHistoryStore implements HistoryStore {
  readonly records: HistoryRecord[] = [];
  failReads = false;
  failWrites = false;
  private seq = 0;

  seed(...records: HistoryRecord[]): this {
    this.records.push(...records.map((r) => structuredClone(r)));
    return this;
  }

  async getLast(traineeId: string, exerciseName: string): Promise<HistoryRecord | null> {
    const [latest] = await this.getForExercise(traineeId, exerciseName, 1);
    return latest ?? null;
  }

  async getForExercise(traineeId: string, exerciseName: string, limit?: number): Promise<HistoryRecord[]> {
    if (this.failReads) throw offline();
    const found = this.records
      .filter((r) => r.traineeId === traineeId && r.exerciseName === exerciseName)
      .sort((a, b) => b.completedAt.localeCompare(a.completedAt))
      .map((r) => structuredClone(r));
    return limit && limit > 0 ? found.slice(0, limit) : found;
  }

  async save(training: Training): Promise<void> {
    if (this.failWrites) throw offline();
    if (!training.isCompleted || !training.completedAt) throw new Error("Training must be completed");
    const completedAt = training.completedAt;
    const date = toISODate(new Date(completedAt));
    for (const ex of training.exercises) {
      if (ex.actualSets.length === 0) continue;
      const record: HistoryRecord = {
        id: `h-${++this.seq}`,
        traineeId: training.traineeId,
        trainingId: training.id,
        exerciseName: ex.name,
        date,
        completedAt,
        actualSets: [...ex.actualSets],
      };
      const at = this.records.findIndex(
        (r) => r.traineeId === record.traineeId && r.exerciseName === record.exerciseName && r.date === date
      );
      if (at >= 0) this.records[at] = { ...record, id: this.records[at].id };
      else this.records.push(record);
    }
  }
}

export class MemoryMeasurementStore implements MeasurementStore {
  readonly rows: Measurement[] = [];
  private seq = 0;

  seed(...measurements: Measurement[]): this {
    this.rows.push(...measurements);
    return this;
  }

  async getForTrainee(traineeId: string): Promise<Measurement[]> {
    return this.rows.filter((m) => m.traineeId === traineeId).sort(byNewest);
  }

  async getToday(traineeId: string, today: string): Promise<Measurement | null> {
    return this.rows.find((m) => m.traineeId === traineeId && m.date === today) ?? null;
  }

  async upsert(input: {
    traineeId: string;
    date: string;
    weight: number;
    bodyMeasurements?: BodyMeasurements;
  }): Promise<Measurement> {
    const at = this.rows.findIndex((m) => m.traineeId === input.traineeId && m.date === input.date);
    const measurement: Measurement = {
      id: at >= 0 ? this.rows[at].id : `m-${++this.seq}`,
      traineeId: input.traineeId,
      date: input.date,
      weight: input.weight,
      bodyMeasurements: input.bodyMeasurements ?? {},
    };
    if (at >= 0) this.rows[at] = measurement;
    else this.rows.push(measurement);
    return measurement;
  }
}

export class MemoryStepsStore implements StepsStore {
  readonly rows: StepsEntry[] = [];

  seed(...entries: StepsEntry[]): this {
    this.rows.push(...entries);
    return this;
  }

  async getToday(traineeId: string, today: string): Promise<StepsEntry | null> {
    return this.rows.find((e) => e.traineeId === traineeId && e.date === today) ?? null;
  }

  async getForTrainee(traineeId: string): Promise<StepsEntry[]> {
    return this.rows.filter((e) => e.traineeId === traineeId).sort(byNewest);
  }

  async logManual(traineeId: string, date: string, steps: number): Promise<StepsEntry> {
    const entry: StepsEntry = { traineeId, date, steps, origin: "manual" };
    const at = this.rows.findIndex((e) => e.traineeId === traineeId && e.date === date);
    if (at >= 0) this.rows[at] = entry;
    else this.rows.push(entry);
    return entry;
  }

  async recordDeviceTotal(traineeId: string, date: string, steps: number): Promise<StepsEntry> {
    const at = this.rows.findIndex((e) => e.traineeId === traineeId && e.date === date);
    if (at >= 0 && this.rows[at].origin === "manual") return this.rows[at];
    const entry: StepsEntry = { traineeId, date, steps, origin: "device-sync" };
    if (at >= 0) this.rows[at] = entry;
    else this.rows.push(entry);
    return entry;
  }
}

export class MemoryHealthSync implements HealthSync {
  readonly samples: Array<{ traineeId: string; date: string; steps: number }> = [];
  failReads = false;

  async getTodaySteps(traineeId: string, today: string): Promise<number> {
    if (this.failReads) throw new Error("health sync unavailable");
    return this.samples
      .filter((s) => s.traineeId === traineeId && s.date === today)
      .reduce((sum, s) => sum + s.steps, 0);
  }

  async recordSample(traineeId: string, date: string, steps: number): Promise<void> {
    this.samples.push({ traineeId, date, steps });
  }
}

export class MemoryGoalStore implements GoalStore {
  readonly goals: Goal[] = [];

  seed(...goals: Goal[]): this {
    this.goals.push(...goals);
    return this;
  }

  async getForTrainee(traineeId: string): Promise<Goal[]> {
    return this.goals.filter((g) => g.traineeId === traineeId);
  }
}

export class MemoryNutritionStore implements NutritionStore {
  readonly entries: NutritionEntry[] = [];
  readonly plans: NutritionPlan[] = [];
  private seq = 0;

  async getEntries(traineeId: string, date: string): Promise<NutritionEntry[]> {
    return this.entries.filter((e) => e.traineeId === traineeId && e.date === date);
  }

  async logFoods(traineeId: string, date: string, foods: FoodItem[]): Promise<NutritionEntry> {
    const entry: NutritionEntry = { id: `n-${++this.seq}`, traineeId, date, foods: [...foods] };
    this.entries.push(entry);
    return entry;
  }

  async getActivePlan(traineeId: string): Promise<NutritionPlan | null> {
    const mine = this.plans.filter((p) => p.traineeId === traineeId);
    return mine[mine.length - 1] ?? null;
  }
}

export class MemoryPreferenceStore implements PreferenceStore {
  private readonly modes = new Map<string, WorkoutMode>();

  async getWorkoutMode(traineeId: string): Promise<WorkoutMode | null> {
    return this.modes.get(traineeId) ?? null;
  }

  async setWorkoutMode(traineeId: string, mode: WorkoutMode): Promise<void> {
    this.modes.set(traineeId, mode);
  }
}

export function createMemoryStores() {
  return {
    trainings: new MemoryTrainingStore(),
    measurements: new MemoryMeasurementStore(),
    steps: new MemoryStepsStore(),
    health: new MemoryHealthSync(),
    goals: new MemoryGoalStore(),
    history: new MemoryHistoryStore(),
    nutrition: new MemoryNutritionStore(),
    preferences: new MemoryPreferenceStore(),
  };
}

export type MemoryStores = ReturnType<typeof createMemoryStores>;

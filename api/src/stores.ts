// stores.ts
// Collaborators of the session engine. Calendar days are passed in explicitly;
// no store reads the clock on its own.

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
} from "./types.js";

export interface TrainingStore {
  getForTrainee(traineeId: string): Promise<Training[]>;
  /** Atomic per training. A completed training never goes back to not completed. */
  upsert(training: Training): Promise<Training>;
}

export interface MeasurementStore {
  /** Newest first. */
  getForTrainee(traineeId: string): Promise<Measurement[]>;
  getToday(traineeId: string, today: string): Promise<Measurement | null>;
  /** One measurement per trainee per day: a second write for the day replaces the first. */
  upsert(input: {
    traineeId: string;
    date: string;
    weight: number;
    bodyMeasurements?: BodyMeasurements;
  }): Promise<Measurement>;
}

export interface StepsStore {
  getToday(traineeId: string, today: string): Promise<StepsEntry | null>;
  /** Newest first. */
  getForTrainee(traineeId: string): Promise<StepsEntry[]>;
  logManual(traineeId: string, date: string, steps: number): Promise<StepsEntry>;
  /** Stores the synced total for a day unless a manual entry already holds it. */
  recordDeviceTotal(traineeId: string, date: string, steps: number): Promise<StepsEntry>;
}

export interface HealthSync {
  getTodaySteps(traineeId: string, today: string): Promise<number>;
  recordSample(traineeId: string, date: string, steps: number): Promise<void>;
}

export interface GoalStore {
  getForTrainee(traineeId: string): Promise<Goal[]>;
}

export interface HistoryStore {
  /** Most recent record for an exact (case-sensitive) exercise name. */
  getLast(traineeId: string, exerciseName: string): Promise<HistoryRecord | null>;
  /** Newest first. */
  getForExercise(traineeId: string, exerciseName: string, limit?: number): Promise<HistoryRecord[]>;
  /** Upserts one record per performed exercise, keyed by (trainee, exercise name, day). */
  save(training: Training): Promise<void>;
}

export interface NutritionStore {
  getEntries(traineeId: string, date: string): Promise<NutritionEntry[]>;
  logFoods(traineeId: string, date: string, foods: FoodItem[]): Promise<NutritionEntry>;
  getActivePlan(traineeId: string): Promise<NutritionPlan | null>;
}

export const WORKOUT_MODE_KEY = "workout_mode";

export interface PreferenceStore {
  getWorkoutMode(traineeId: string): Promise<WorkoutMode | null>;
  setWorkoutMode(traineeId: string, mode: WorkoutMode): Promise<void>;
}

export type Stores = {
  trainings: TrainingStore;
  measurements: MeasurementStore;
  steps: StepsStore;
  health: HealthSync;
  goals: GoalStore;
  history: HistoryStore;
  nutrition: NutritionStore;
  preferences: PreferenceStore;
};
